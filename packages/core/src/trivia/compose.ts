import type { TokenId, TokenStore } from '../core/tokens.ts'
import type { Trivia, TriviaList } from '../core/trivia.ts'
import { throwTriviaNotOwned } from './errors.ts'

/**
 * The trivia between two adjacent tokens, seen as one list.
 * The lexer splits a run of layout between the trailing trivia of one token
 * and the leading trivia of the next at an arbitrary point.
 */
export interface ContainingTriviaList {
	readonly list: TriviaList
	/** Position of the requested trivium within `list` */
	readonly index: number
}

const EMPTY: TriviaList = []

/**
 * Builds the containing list of a trivium attached to `id`.
 * Trailing trivia join the next token's leading trivia (end-of-file
 * included); leading trivia join the previous token's trailing trivia.
 *
 * @throws TriviaContractError if the trivium is not attached to the token
 */
export function getContainingTriviaList(
	tokens: TokenStore,
	id: TokenId,
	trivia: Trivia
): ContainingTriviaList {
	const token = tokens.get(id)

	const trailingIndex = token.trailing.indexOf(trivia)
	if (trailingIndex !== -1) {
		const nextId = tokens.next(id, { includeZeroWidth: true })
		const following = nextId === null ? EMPTY : tokens.get(nextId).leading
		return { index: trailingIndex, list: [...token.trailing, ...following] }
	}

	const leadingIndex = token.leading.indexOf(trivia)
	if (leadingIndex === -1) {
		throwTriviaNotOwned(id, trivia)
	}

	const previousId = tokens.previous(id)
	const preceding = previousId === null ? EMPTY : tokens.get(previousId).trailing
	return {
		index: preceding.length + leadingIndex,
		list: [...preceding, ...token.leading],
	}
}
