/**
 * Index queries over a trivia list. Each returns an index into the list, or
 * null when there is nothing to point at.
 */

import type { TriviaList } from '../core/trivia.ts'
import { isEndOfLine, isLayout, isWhitespace } from './classify.ts'

/**
 * Index of the first trivium that is neither whitespace nor a line break.
 */
export function indexOfFirstNonWhitespaceTrivia(list: TriviaList): number | null {
	const index = list.findIndex((trivia) => !isLayout(trivia))
	return index === -1 ? null : index
}

/**
 * Index where the trivia stop being blank lines: the start of the line that
 * holds the first content, or of the indentation in front of the token.
 * Null when the list is empty or ends in a line break after blank lines only.
 */
export function indexOfFirstNonBlankLineTrivia(list: TriviaList): number | null {
	if (list.length === 0) return null

	const anchor = indexOfFirstNonWhitespaceTrivia(list) ?? list.length
	for (let index = anchor - 1; index >= 0; index--) {
		if (isEndOfLine(list[index])) {
			return index === list.length - 1 ? null : index + 1
		}
	}

	// no line break before the anchor: whitespace on a single line
	return 0
}

/**
 * Index where the removable whitespace at the end of the list starts.
 * The line break ending the last content line is not removable, whatever
 * kind of trivium that line ends with.
 */
export function indexOfTrailingWhitespace(list: TriviaList): number | null {
	let start: number | null = null
	let lastWasEndOfLine = false

	for (let index = list.length - 1; index >= 0; index--) {
		const trivia = list[index]
		if (isLayout(trivia)) {
			start = index
			lastWasEndOfLine = !isWhitespace(trivia)
			continue
		}

		if (start !== null && lastWasEndOfLine) {
			start++
		}
		break
	}

	return start !== null && start < list.length ? start : null
}
