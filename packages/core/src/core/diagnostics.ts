/**
 * Diagnostic lookup for the trivia codes, over the shared catalog.
 */

import { TRIVIA_DIAGNOSTICS } from '@trivia-kit/diagnostics'

export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	formatCodedMessage,
	interpolateMessage,
} from '@trivia-kit/diagnostics'

export type DiagnosticCode = keyof typeof TRIVIA_DIAGNOSTICS

export function getDiagnostic(code: DiagnosticCode): (typeof TRIVIA_DIAGNOSTICS)[typeof code] {
	return TRIVIA_DIAGNOSTICS[code]
}
