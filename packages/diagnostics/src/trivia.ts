/**
 * Trivia library diagnostic definitions.
 *
 * Error code format: TK<AREA><NUMBER>
 * - TKTRIVIA: Contract violations (001-049)
 * - TKLAYOUT: Layout findings reported by inspection (050-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CONTRACT ERRORS (TKTRIVIA001-049)
// =============================================================================

export const TKTRIVIA001: DiagnosticDef = {
	code: 'TKTRIVIA001',
	description:
		'A trivium was passed together with a token it is not attached to. The containing trivia list cannot be built from the wrong token.',
	message: '{kind} trivia is not attached to token {tokenId}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass the token whose leading or trailing trivia holds this trivium.',
}

// =============================================================================
// LAYOUT FINDINGS (TKLAYOUT050-099)
// =============================================================================

export const TKLAYOUT050: DiagnosticDef = {
	code: 'TKLAYOUT050',
	description: 'One or more blank lines separate `{text}` from the line above it.',
	fixable: true,
	message: 'blank lines before `{text}`',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Remove the blank lines above `{text}`.',
}

export const TKLAYOUT051: DiagnosticDef = {
	code: 'TKLAYOUT051',
	description: 'The line ending after `{text}` carries whitespace before its line break.',
	fixable: true,
	message: 'trailing whitespace after `{text}`',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Delete the whitespace at the end of the line.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all trivia library diagnostics.
 */
export const TRIVIA_DIAGNOSTICS = {
	// Layout findings
	TKLAYOUT050,
	TKLAYOUT051,
	// Contract errors
	TKTRIVIA001,
} as const

/**
 * All valid trivia library diagnostic codes.
 */
export type TriviaDiagnosticCode = keyof typeof TRIVIA_DIAGNOSTICS
