/**
 * @trivia-kit/diagnostics
 *
 * Shared diagnostic types and definitions for trivia-kit packages.
 */

export { CLI_DIAGNOSTICS, type CliDiagnosticCode, TKCLI001, TKCLI002, TKCLI003 } from './cli.ts'
export { formatCodedMessage, interpolateMessage } from './format.ts'
export {
	TKLAYOUT050,
	TKLAYOUT051,
	TKTRIVIA001,
	TRIVIA_DIAGNOSTICS,
	type TriviaDiagnosticCode,
} from './trivia.ts'
export { type DiagnosticArgs, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { TRIVIA_DIAGNOSTICS } from './trivia.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...TRIVIA_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
