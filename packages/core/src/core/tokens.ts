/**
 * Tokens and their stream order.
 * A token owns exactly one leading and one trailing trivia list; the trailing
 * list runs up to and including the line break that ends the token's line.
 */

import type { TriviaList } from './trivia.ts'

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

export interface Token {
	readonly text: string
	readonly leading: TriviaList
	readonly trailing: TriviaList
}

export function createToken(text: string, leading: TriviaList = [], trailing: TriviaList = []): Token {
	return { leading, text, trailing }
}

export function withLeadingTrivia(token: Token, leading: TriviaList): Token {
	return { ...token, leading }
}

export function withTrailingTrivia(token: Token, trailing: TriviaList): Token {
	return { ...token, trailing }
}

export interface NavigationOptions {
	/** Also stop at tokens without text, such as end-of-file. */
	includeZeroWidth?: boolean
}

/**
 * Dense array storage for tokens in stream order.
 * Append-only while the stream is built; substitution goes through
 * `replace`, which leaves this store untouched.
 */
export class TokenStore {
	private readonly tokens: Token[]

	constructor(tokens: Iterable<Token> = []) {
		this.tokens = [...tokens]
	}

	add(token: Token): TokenId {
		const id = tokenId(this.tokens.length)
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return Number.isInteger(id) && id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [tokenId(i), token]
		}
	}

	/** Returns tokens in range [start, end). */
	slice(start: TokenId, end: TokenId): Token[] {
		return this.tokens.slice(start, end)
	}

	next(id: TokenId, options: NavigationOptions = {}): TokenId | null {
		this.get(id)
		return this.step(id, 1, options.includeZeroWidth ?? false)
	}

	previous(id: TokenId, options: NavigationOptions = {}): TokenId | null {
		this.get(id)
		return this.step(id, -1, options.includeZeroWidth ?? false)
	}

	/** Returns a new store with the token at `id` substituted. */
	replace(id: TokenId, token: Token): TokenStore {
		this.get(id)
		const tokens = [...this.tokens]
		tokens[id] = token
		return new TokenStore(tokens)
	}

	private step(from: TokenId, delta: 1 | -1, includeZeroWidth: boolean): TokenId | null {
		for (let i = from + delta; i >= 0 && i < this.tokens.length; i += delta) {
			const token = this.tokens[i]
			if (token !== undefined && (includeZeroWidth || token.text.length > 0)) {
				return tokenId(i)
			}
		}
		return null
	}
}
