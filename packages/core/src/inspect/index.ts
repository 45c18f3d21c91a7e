/**
 * Read-only layout inspection over a token stream.
 * Reports what the blank-line and trailing-whitespace mutators would change.
 */

import type { InspectionContext } from '../core/context.ts'
import type { Token } from '../core/tokens.ts'
import { hasLeadingBlankLines } from '../trivia/blank-lines.ts'
import { isEndOfLine } from '../trivia/classify.ts'
import { indexOfTrailingWhitespace } from '../trivia/scan.ts'

export interface InspectOptions {
	/** Report blank lines in front of tokens (default true) */
	blankLines?: boolean
	/** Report whitespace before the line break that ends a token's line (default true) */
	trailingWhitespace?: boolean
}

export interface InspectResult {
	readonly findings: number
}

/**
 * Whether the token's line ends with whitespace in front of its line break.
 */
export function hasTrailingWhitespace(token: Token): boolean {
	const start = indexOfTrailingWhitespace(token.trailing)
	if (start === null) return false

	// only layout follows `start`, so anything before the line break is whitespace
	return token.trailing.slice(start).findIndex(isEndOfLine) > 0
}

function displayText(token: Token): string {
	return token.text.length > 0 ? token.text : '<end of file>'
}

export function inspect(ctx: InspectionContext, options: InspectOptions = {}): InspectResult {
	const { blankLines = true, trailingWhitespace = true } = options
	const before = ctx.getDiagnostics().length

	for (const [id, token] of ctx.tokens) {
		const args = { text: displayText(token) }
		if (blankLines && hasLeadingBlankLines(token)) {
			ctx.emitAtToken('TKLAYOUT050', id, args)
		}
		if (trailingWhitespace && hasTrailingWhitespace(token)) {
			ctx.emitAtToken('TKLAYOUT051', id, args)
		}
	}

	return { findings: ctx.getDiagnostics().length - before }
}
