import { formatCodedMessage, getDiagnostic } from '../core/diagnostics.ts'
import type { TokenId } from '../core/tokens.ts'
import { TRIVIA_KIND_NAMES, type Trivia } from '../core/trivia.ts'

/**
 * Error thrown when a caller breaks the library's contract, such as pairing a
 * trivium with a token it does not belong to.
 */
export class TriviaContractError extends Error {
	readonly code: string
	readonly tokenId: TokenId

	constructor(message: string, code: string, tokenId: TokenId) {
		super(message)
		this.name = 'TriviaContractError'
		this.code = code
		this.tokenId = tokenId
	}
}

export function throwTriviaNotOwned(tokenId: TokenId, trivia: Trivia): never {
	const def = getDiagnostic('TKTRIVIA001')
	const message = formatCodedMessage(def, { kind: TRIVIA_KIND_NAMES[trivia.kind], tokenId })
	throw new TriviaContractError(message, def.code, tokenId)
}
