export {
	hasLeadingBlankLines,
	indexOfIndentation,
	withoutLeadingBlankLines,
	withoutLeadingWhitespace,
	withoutTrailingWhitespace,
} from './blank-lines.ts'
export { isComment, isDirective, isEndOfLine, isLayout, isWhitespace } from './classify.ts'
export { type ContainingTriviaList, getContainingTriviaList } from './compose.ts'
export { TriviaContractError, throwTriviaNotOwned } from './errors.ts'
export {
	indexOfFirstNonBlankLineTrivia,
	indexOfFirstNonWhitespaceTrivia,
	indexOfTrailingWhitespace,
} from './scan.ts'
