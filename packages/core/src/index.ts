/**
 * trivia-kit core public API
 *
 * Queries and rewrites over the trivia between tokens:
 * - Classifier: whitespace, line breaks, conditional directives
 * - Scanner: boundary indices within a trivia list
 * - Composer: the combined list spanning two adjacent tokens
 * - Mutator: whitespace and blank-line removal, directive-aware
 */

export {
	comment,
	createToken,
	createTrivia,
	type Diagnostic,
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DirectiveKind,
	directive,
	endOfLine,
	getDiagnostic,
	InspectionContext,
	interpolateMessage,
	locateToken,
	type NavigationOptions,
	renderToken,
	renderTokens,
	SourceIndex,
	type SourceLocation,
	TRIVIA_KIND_NAMES,
	type Token,
	type TokenId,
	TokenStore,
	type Trivia,
	TriviaKind,
	type TriviaList,
	tokenId,
	triviaKindFromName,
	triviaText,
	whitespace,
	withLeadingTrivia,
	withTrailingTrivia,
} from './core/index.ts'
export { hasTrailingWhitespace, type InspectOptions, type InspectResult, inspect } from './inspect/index.ts'
export {
	type ContainingTriviaList,
	getContainingTriviaList,
	hasLeadingBlankLines,
	indexOfFirstNonBlankLineTrivia,
	indexOfFirstNonWhitespaceTrivia,
	indexOfIndentation,
	indexOfTrailingWhitespace,
	isComment,
	isDirective,
	isEndOfLine,
	isLayout,
	isWhitespace,
	TriviaContractError,
	throwTriviaNotOwned,
	withoutLeadingBlankLines,
	withoutLeadingWhitespace,
	withoutTrailingWhitespace,
} from './trivia/index.ts'
