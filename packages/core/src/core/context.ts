/**
 * Inspection context that flows through a read-only pass over a token stream.
 * Holds the stream, the source it renders to, and diagnostic collection.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
} from './diagnostics.ts'
import { SourceIndex } from './source.ts'
import type { TokenId, TokenStore } from './tokens.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
	/** Token the diagnostic points at */
	readonly tokenId: TokenId
}

/**
 * Design principles:
 * - The token stream is never modified; fixes are computed, not applied
 * - Centralized diagnostics: all findings collected in one place
 */
export class InspectionContext {
	readonly tokens: TokenStore

	/** Source filename for messages */
	readonly filename: string

	/** Source text reconstructed from the token stream */
	readonly source: string

	private readonly index: SourceIndex

	private readonly diagnostics: Diagnostic[] = []

	private errorCount = 0

	private lines: string[] | null = null

	constructor(tokens: TokenStore, filename = '<input>') {
		this.tokens = tokens
		this.filename = filename
		this.index = new SourceIndex(tokens)
		this.source = this.index.text
	}

	/**
	 * Emit a diagnostic by code at a token's location.
	 */
	emitAtToken(code: DiagnosticCode, tokenId: TokenId, args?: DiagnosticArgs): void {
		const { column, line } = this.index.locate(tokenId)
		const def = getDiagnostic(code)
		this.diagnostics.push({
			column,
			def,
			line,
			message: interpolateMessage(def.message, args),
			tokenId,
			...(args ? { args } : {}),
		})
		if (def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
	}

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getSourceLine(line: number): string | undefined {
		this.lines ??= this.source.split(/\r?\n/)
		return this.lines[line - 1]
	}

	private getSeverityLabel(severity: DiagnosticSeverity): string {
		const labels: Record<DiagnosticSeverity, string> = {
			[DiagnosticSeverity.Error]: 'error',
			[DiagnosticSeverity.Warning]: 'warning',
			[DiagnosticSeverity.Note]: 'note',
		}
		return labels[severity]
	}

	/**
	 * Format a diagnostic for display.
	 *
	 * Example:
	 * ```
	 * warning[TKLAYOUT050]: blank lines before `return`
	 *   --> tokens.json:4:5
	 *    |
	 *  4 |     return
	 *    |     ^
	 *    |
	 *    = help: Remove the blank lines above `return`.
	 *    = note: fixable by removing trivia
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${this.getSeverityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const pad = ' '.repeat(String(diagnostic.line).length)
		const emptyPrefix = ` ${pad} |`
		const pointer = `${' '.repeat(diagnostic.column - 1)}^`
		const lines = [
			header,
			location,
			emptyPrefix,
			` ${diagnostic.line} | ${sourceLine}`,
			`${emptyPrefix} ${pointer}`,
		]

		const notes: string[] = []
		if (def.suggestion) {
			notes.push(`help: ${interpolateMessage(def.suggestion, diagnostic.args)}`)
		}
		if (def.fixable) {
			notes.push('note: fixable by removing trivia')
		}
		if (notes.length > 0) {
			lines.push(emptyPrefix, ...notes.map((note) => ` ${pad} = ${note}`))
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
