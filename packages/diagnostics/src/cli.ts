/**
 * CLI diagnostic definitions.
 *
 * Error code format: TKCLI<NUMBER>
 * - TKCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (TKCLI001-099)
// =============================================================================

export const TKCLI001: DiagnosticDef = {
	code: 'TKCLI001',
	description: 'There is no file at this path.',
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const TKCLI002: DiagnosticDef = {
	code: 'TKCLI002',
	description: 'The file exists but cannot be opened.',
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const TKCLI003: DiagnosticDef = {
	code: 'TKCLI003',
	description: 'The file is not a token stream: a JSON object with a `tokens` array.',
	message: 'malformed token stream: {detail}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Each token needs a `text` string and optional `leading`/`trailing` trivia arrays.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all CLI diagnostics.
 */
export const CLI_DIAGNOSTICS = {
	TKCLI001,
	TKCLI002,
	TKCLI003,
} as const

/**
 * All valid CLI diagnostic codes.
 */
export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
