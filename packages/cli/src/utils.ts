import { basename } from 'node:path'
import {
	createToken,
	createTrivia,
	type InspectionContext,
	type InspectOptions,
	type Token,
	TokenStore,
	type Trivia,
	triviaKindFromName,
} from '@trivia-kit/core'
import { formatCodedMessage, TKCLI001, TKCLI002, TKCLI003 } from '@trivia-kit/diagnostics'

/**
 * Error thrown when a token stream file does not have the expected shape.
 */
export class TokenStreamError extends Error {
	readonly detail: string

	constructor(detail: string) {
		super(formatCodedMessage(TKCLI003, { detail }))
		this.name = 'TokenStreamError'
		this.detail = detail
	}
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCodedMessage(TKCLI001, { path: filePath })
	}
	return formatCodedMessage(TKCLI002, { reason: getErrorMessage(error) })
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseTrivia(value: unknown, path: string): Trivia {
	if (!isRecord(value)) {
		throw new TokenStreamError(`${path} must be an object`)
	}
	const { kind, text } = value
	if (typeof kind !== 'string') {
		throw new TokenStreamError(`${path}.kind must be a string`)
	}
	const triviaKind = triviaKindFromName(kind)
	if (triviaKind === null) {
		throw new TokenStreamError(`${path}.kind "${kind}" is not a trivia kind`)
	}
	if (typeof text !== 'string') {
		throw new TokenStreamError(`${path}.text must be a string`)
	}
	return createTrivia(triviaKind, text)
}

function parseTriviaList(value: unknown, path: string): Trivia[] {
	if (value === undefined) return []
	if (!Array.isArray(value)) {
		throw new TokenStreamError(`${path} must be an array`)
	}
	return value.map((item: unknown, i) => parseTrivia(item, `${path}[${i}]`))
}

function parseToken(value: unknown, path: string): Token {
	if (!isRecord(value)) {
		throw new TokenStreamError(`${path} must be an object`)
	}
	if (typeof value.text !== 'string') {
		throw new TokenStreamError(`${path}.text must be a string`)
	}
	return createToken(
		value.text,
		parseTriviaList(value.leading, `${path}.leading`),
		parseTriviaList(value.trailing, `${path}.trailing`)
	)
}

/**
 * Parses a token stream file:
 * `{ "tokens": [{ "text": "a", "leading": [{ "kind": "whitespace", "text": " " }], "trailing": [] }] }`
 *
 * @throws TokenStreamError if the content is not a token stream
 */
export function parseTokenStream(content: string): TokenStore {
	let data: unknown
	try {
		data = JSON.parse(content)
	} catch (error: unknown) {
		throw new TokenStreamError(`invalid JSON (${getErrorMessage(error)})`)
	}

	const tokens = isRecord(data) ? data.tokens : undefined
	if (!Array.isArray(tokens)) {
		throw new TokenStreamError('expected an object with a "tokens" array')
	}
	return new TokenStore(tokens.map((item: unknown, i) => parseToken(item, `tokens[${i}]`)))
}

export function resolveInspectOptions(skipBlankLines: boolean, skipTrailingWhitespace: boolean): InspectOptions {
	return { blankLines: !skipBlankLines, trailingWhitespace: !skipTrailingWhitespace }
}

export function formatSummary(ctx: InspectionContext): string {
	const name = basename(ctx.filename)
	const diagnostics = ctx.getDiagnostics()
	if (diagnostics.length === 0) return `${name}: no findings`

	const summary = `${name}: ${diagnostics.length} ${diagnostics.length === 1 ? 'finding' : 'findings'}`
	const fixable = diagnostics.filter((d) => d.def.fixable).length
	return fixable > 0 ? `${summary}, ${fixable} fixable` : summary
}
