/**
 * Core data structures: trivia, tokens in stream order, source rendering and
 * the inspection context.
 */

export { type Diagnostic, InspectionContext } from './context.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
export { locateToken, renderToken, renderTokens, SourceIndex, type SourceLocation } from './source.ts'
export {
	createToken,
	type NavigationOptions,
	type Token,
	type TokenId,
	TokenStore,
	tokenId,
	withLeadingTrivia,
	withTrailingTrivia,
} from './tokens.ts'
export {
	comment,
	createTrivia,
	type DirectiveKind,
	directive,
	endOfLine,
	TRIVIA_KIND_NAMES,
	type Trivia,
	TriviaKind,
	type TriviaList,
	triviaKindFromName,
	triviaText,
	whitespace,
} from './trivia.ts'
