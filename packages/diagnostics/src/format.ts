import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Interpolate template arguments into a message.
 * Unknown keys are left in place so a missing argument stays visible.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(PLACEHOLDER, (placeholder: string, key: string) => {
		const value = args[key]
		return value === undefined ? placeholder : String(value)
	})
}

/**
 * One-line `[CODE] message` rendering used for thrown errors and CLI output.
 */
export function formatCodedMessage(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}
