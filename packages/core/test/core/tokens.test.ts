import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	createToken,
	TokenStore,
	tokenId,
	withLeadingTrivia,
	withTrailingTrivia,
} from '../../src/core/tokens.ts'
import { endOfLine, whitespace } from '../../src/core/trivia.ts'

function createStore(): TokenStore {
	return new TokenStore([
		createToken('if', [], [whitespace()]),
		createToken('(', [], []),
		createToken('', [], []),
		createToken('x', [], [endOfLine()]),
		createToken('', [], []),
	])
}

describe('core/tokens', () => {
	describe('tokenId', () => {
		it('should create TokenId from number', () => {
			assert.strictEqual(tokenId(5), 5)
		})
	})

	describe('token helpers', () => {
		it('should default trivia to empty lists', () => {
			const token = createToken('return')
			assert.deepStrictEqual(token.leading, [])
			assert.deepStrictEqual(token.trailing, [])
		})

		it('should replace leading trivia without touching the original', () => {
			const token = createToken('return', [whitespace()], [endOfLine()])
			const leading = [whitespace('\t')]
			const updated = withLeadingTrivia(token, leading)

			assert.strictEqual(updated.leading, leading)
			assert.strictEqual(updated.trailing, token.trailing)
			assert.strictEqual(token.leading.length, 1)
			assert.strictEqual(token.leading[0]?.text, ' ')
		})

		it('should replace trailing trivia', () => {
			const token = createToken(';', [], [whitespace(), endOfLine()])
			const updated = withTrailingTrivia(token, [])
			assert.deepStrictEqual(updated.trailing, [])
			assert.strictEqual(token.trailing.length, 2)
		})
	})

	describe('TokenStore', () => {
		it('should add tokens and return sequential IDs', () => {
			const store = new TokenStore()
			assert.strictEqual(store.add(createToken('a')), 0)
			assert.strictEqual(store.add(createToken('b')), 1)
			assert.strictEqual(store.count(), 2)
		})

		it('should throw on invalid ID', () => {
			const store = new TokenStore()
			assert.throws(() => store.get(tokenId(0)), /Invalid TokenId/)
		})

		it('should validate IDs', () => {
			const store = createStore()
			assert.strictEqual(store.isValid(tokenId(4)), true)
			assert.strictEqual(store.isValid(tokenId(5)), false)
			assert.strictEqual(store.isValid(tokenId(-1)), false)
			assert.strictEqual(store.isValid(tokenId(1.5)), false)
		})

		it('should iterate in stream order', () => {
			const texts = [...createStore()].map(([id, token]) => `${id}:${token.text}`)
			assert.deepStrictEqual(texts, ['0:if', '1:(', '2:', '3:x', '4:'])
		})

		it('should slice a range', () => {
			const slice = createStore().slice(tokenId(1), tokenId(3))
			assert.deepStrictEqual(
				slice.map((token) => token.text),
				['(', '']
			)
		})

		describe('next', () => {
			it('should skip zero-width tokens by default', () => {
				assert.strictEqual(createStore().next(tokenId(1)), 3)
			})

			it('should visit zero-width tokens when asked', () => {
				assert.strictEqual(createStore().next(tokenId(1), { includeZeroWidth: true }), 2)
			})

			it('should return null after the last token', () => {
				assert.strictEqual(createStore().next(tokenId(3)), null)
				assert.strictEqual(createStore().next(tokenId(3), { includeZeroWidth: true }), 4)
				assert.strictEqual(createStore().next(tokenId(4), { includeZeroWidth: true }), null)
			})

			it('should throw for an unknown token', () => {
				assert.throws(() => createStore().next(tokenId(9)), /Invalid TokenId/)
			})
		})

		describe('previous', () => {
			it('should skip zero-width tokens by default', () => {
				assert.strictEqual(createStore().previous(tokenId(3)), 1)
			})

			it('should visit zero-width tokens when asked', () => {
				assert.strictEqual(createStore().previous(tokenId(3), { includeZeroWidth: true }), 2)
			})

			it('should return null before the first token', () => {
				assert.strictEqual(createStore().previous(tokenId(0)), null)
			})
		})

		describe('replace', () => {
			it('should return a new store with the substitution', () => {
				const store = createStore()
				const replaced = store.replace(tokenId(1), createToken('['))

				assert.notStrictEqual(replaced, store)
				assert.strictEqual(replaced.get(tokenId(1)).text, '[')
				assert.strictEqual(replaced.get(tokenId(0)), store.get(tokenId(0)))
			})

			it('should leave the original store untouched', () => {
				const store = createStore()
				store.replace(tokenId(1), createToken('['))
				assert.strictEqual(store.get(tokenId(1)).text, '(')
			})

			it('should throw for an unknown token', () => {
				assert.throws(() => createStore().replace(tokenId(7), createToken('[')), /Invalid TokenId/)
			})
		})
	})
})
