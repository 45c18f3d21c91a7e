import assert from 'node:assert'
import { describe, it } from 'node:test'
import { InspectionContext } from '../../src/core/context.ts'
import { DiagnosticSeverity } from '../../src/core/diagnostics.ts'
import { createToken, TokenStore, tokenId } from '../../src/core/tokens.ts'
import { endOfLine, whitespace } from '../../src/core/trivia.ts'

function createStore(): TokenStore {
	return new TokenStore([
		createToken('a', [], [whitespace()]),
		createToken('=', [], [whitespace()]),
		createToken('1', [], []),
		createToken(';', [], [endOfLine()]),
		createToken('b', [endOfLine(), whitespace('  ')], []),
		createToken(';', [], [whitespace('  '), endOfLine()]),
		createToken('', [], []),
	])
}

describe('core/context', () => {
	describe('InspectionContext', () => {
		it('should render the source and keep the filename', () => {
			const ctx = new InspectionContext(createStore(), 'test.json')
			assert.strictEqual(ctx.source, 'a = 1;\n\n  b;  \n')
			assert.strictEqual(ctx.filename, 'test.json')
		})

		it('should use default filename if not provided', () => {
			const ctx = new InspectionContext(createStore())
			assert.strictEqual(ctx.filename, '<input>')
		})

		it('should start with no diagnostics', () => {
			const ctx = new InspectionContext(createStore())
			assert.strictEqual(ctx.hasErrors(), false)
			assert.strictEqual(ctx.getErrorCount(), 0)
			assert.deepStrictEqual(ctx.getDiagnostics(), [])
		})

		it('should emit diagnostics at the token location', () => {
			const ctx = new InspectionContext(createStore())
			ctx.emitAtToken('TKLAYOUT050', tokenId(4), { text: 'b' })

			const [diagnostic] = ctx.getDiagnostics()
			assert.ok(diagnostic)
			assert.strictEqual(diagnostic.def.code, 'TKLAYOUT050')
			assert.strictEqual(diagnostic.message, 'blank lines before `b`')
			assert.strictEqual(diagnostic.line, 3)
			assert.strictEqual(diagnostic.column, 3)
			assert.strictEqual(diagnostic.tokenId, 4)
			assert.deepStrictEqual(diagnostic.args, { text: 'b' })
		})

		it('should count only errors as errors', () => {
			const ctx = new InspectionContext(createStore())
			ctx.emitAtToken('TKLAYOUT051', tokenId(5), { text: ';' })
			assert.strictEqual(ctx.hasErrors(), false)

			ctx.emitAtToken('TKTRIVIA001', tokenId(0), { kind: 'comment', tokenId: 0 })
			assert.strictEqual(ctx.hasErrors(), true)
			assert.strictEqual(ctx.getErrorCount(), 1)
			assert.strictEqual(ctx.getDiagnostics()[1]?.def.severity, DiagnosticSeverity.Error)
		})

		it('should return source lines by 1-indexed number', () => {
			const ctx = new InspectionContext(createStore())
			assert.strictEqual(ctx.getSourceLine(1), 'a = 1;')
			assert.strictEqual(ctx.getSourceLine(2), '')
			assert.strictEqual(ctx.getSourceLine(3), '  b;  ')
			assert.strictEqual(ctx.getSourceLine(9), undefined)
		})

		it('should format a diagnostic with source context and help', () => {
			const ctx = new InspectionContext(createStore(), 'test.json')
			ctx.emitAtToken('TKLAYOUT050', tokenId(4), { text: 'b' })
			const [diagnostic] = ctx.getDiagnostics()
			assert.ok(diagnostic)

			assert.strictEqual(
				ctx.formatDiagnostic(diagnostic),
				[
					'warning[TKLAYOUT050]: blank lines before `b`',
					'  --> test.json:3:3',
					'   |',
					' 3 |   b;  ',
					'   |   ^',
					'   |',
					'   = help: Remove the blank lines above `b`.',
					'   = note: fixable by removing trivia',
				].join('\n')
			)
		})

		it('should leave the fixable note off diagnostics that cannot be fixed', () => {
			const ctx = new InspectionContext(createStore(), 'test.json')
			ctx.emitAtToken('TKTRIVIA001', tokenId(0), { kind: 'comment', tokenId: 0 })
			const [diagnostic] = ctx.getDiagnostics()
			assert.ok(diagnostic)

			assert.strictEqual(
				ctx.formatDiagnostic(diagnostic),
				[
					'error[TKTRIVIA001]: comment trivia is not attached to token 0',
					'  --> test.json:1:1',
					'   |',
					' 1 | a = 1;',
					'   | ^',
					'   |',
					'   = help: Pass the token whose leading or trailing trivia holds this trivium.',
				].join('\n')
			)
		})

		it('should join all formatted diagnostics with a blank line', () => {
			const ctx = new InspectionContext(createStore(), 'test.json')
			ctx.emitAtToken('TKLAYOUT050', tokenId(4), { text: 'b' })
			ctx.emitAtToken('TKLAYOUT051', tokenId(5), { text: ';' })

			const parts = ctx.formatAllDiagnostics().split('\n\n')
			assert.strictEqual(parts.length, 2)
			assert.strictEqual(parts[1]?.split('\n')[0], 'warning[TKLAYOUT051]: trailing whitespace after `;`')
		})
	})
})
