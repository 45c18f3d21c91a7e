/**
 * Source reconstruction from a token stream.
 * Leading trivia, text and trailing trivia of every token, in order, cover
 * the original source exactly.
 */

import type { Token, TokenId, TokenStore } from './tokens.ts'
import { triviaText } from './trivia.ts'

export interface SourceLocation {
	/** 1-indexed */
	readonly line: number
	/** 1-indexed */
	readonly column: number
}

export function renderToken(token: Token): string {
	return `${triviaText(token.leading)}${token.text}${triviaText(token.trailing)}`
}

export function renderTokens(tokens: TokenStore): string {
	const parts: string[] = []
	for (const [, token] of tokens) {
		parts.push(renderToken(token))
	}
	return parts.join('')
}

/**
 * Rendered source of a token stream with the offset of every token's text and
 * of every line, built once so locating a token is a binary search.
 */
export class SourceIndex {
	readonly text: string

	private readonly offsets: number[] = []

	private readonly lineStarts: number[] = [0]

	constructor(tokens: TokenStore) {
		const parts: string[] = []
		let offset = 0
		for (const [, token] of tokens) {
			const leading = triviaText(token.leading)
			offset += leading.length
			this.offsets.push(offset)
			offset += token.text.length + triviaText(token.trailing).length
			parts.push(leading, token.text, triviaText(token.trailing))
		}
		this.text = parts.join('')

		for (let index = 0; index < this.text.length; index++) {
			if (this.text[index] === '\n') {
				this.lineStarts.push(index + 1)
			}
		}
	}

	/**
	 * Location of the first character of a token's text.
	 */
	locate(id: TokenId): SourceLocation {
		const offset = this.offsets[id]
		if (offset === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}

		let low = 0
		let high = this.lineStarts.length - 1
		while (low < high) {
			const mid = (low + high + 1) >> 1
			if ((this.lineStarts[mid] ?? 0) <= offset) {
				low = mid
			} else {
				high = mid - 1
			}
		}

		const lineStart = this.lineStarts[low] ?? 0
		return { column: offset - lineStart + 1, line: low + 1 }
	}
}

/**
 * Location of the first character of a token's text. Builds a `SourceIndex`
 * for the one lookup; hold on to one when locating many tokens.
 */
export function locateToken(tokens: TokenStore, id: TokenId): SourceLocation {
	return new SourceIndex(tokens).locate(id)
}
