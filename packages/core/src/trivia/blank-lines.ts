/**
 * Whitespace and blank-line rewrites. Every function returns a new value and
 * leaves its input as it was.
 */

import { type Token, withLeadingTrivia } from '../core/tokens.ts'
import type { TriviaList } from '../core/trivia.ts'
import { isDirective, isEndOfLine, isLayout, isWhitespace } from './classify.ts'
import { indexOfFirstNonWhitespaceTrivia, indexOfTrailingWhitespace } from './scan.ts'

export function withoutTrailingWhitespace(list: TriviaList): TriviaList {
	const start = indexOfTrailingWhitespace(list)
	return start === null ? list : list.slice(0, start)
}

export function withoutLeadingWhitespace(list: TriviaList): TriviaList {
	const start = indexOfFirstNonWhitespaceTrivia(list)
	return start === null ? [] : list.slice(start)
}

/**
 * Start of the whitespace run directly in front of the token, on its own line.
 * Equals `list.length` when the token is not indented.
 */
export function indexOfIndentation(list: TriviaList): number {
	let index = list.length
	while (index > 0 && isWhitespace(list[index - 1])) {
		index--
	}
	return index
}

/**
 * Whether blank lines separate the token from the line above it.
 * Whitespace on the token's own line is ignored.
 */
export function hasLeadingBlankLines(token: Token): boolean {
	const list = token.leading

	let index = indexOfIndentation(list) - 1
	if (!isEndOfLine(list[index])) {
		return false
	}

	let blankLines = -1
	for (; index >= 0; index--) {
		const trivia = list[index]
		if (isWhitespace(trivia)) continue
		if (isEndOfLine(trivia)) {
			blankLines++
			continue
		}

		// directives end their own line
		if (isDirective(trivia)) blankLines++
		return blankLines > 0
	}

	// nothing but blank lines up to the previous token or start of file
	return true
}

/**
 * Index of the first trivium that belongs to the blank lines in front of the
 * indentation starting at `indentStart`.
 */
function indexOfLeadingBlankLines(list: TriviaList, indentStart: number): number {
	for (let index = indentStart - 1; index >= 0; index--) {
		const trivia = list[index]
		if (isLayout(trivia)) continue

		if (isDirective(trivia)) {
			return index + 1
		}

		// keep the line break that ends the content line
		for (let next = index + 1; next < indentStart; next++) {
			if (isEndOfLine(list[next])) return next + 1
		}
		return indentStart
	}
	return 0
}

/**
 * Removes the blank lines in front of a token, keeping its indentation.
 * Directives, and the line break after the last content line, are kept.
 */
export function withoutLeadingBlankLines(token: Token): Token {
	const list = token.leading
	const indentStart = indexOfIndentation(list)
	const blankLinesStart = indexOfLeadingBlankLines(list, indentStart)
	if (blankLinesStart === indentStart) {
		return token
	}
	return withLeadingTrivia(token, [...list.slice(0, blankLinesStart), ...list.slice(indentStart)])
}
