import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args; unknown keys are left as written.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(PLACEHOLDER, (_, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : `{${key}}`
	})
}

/**
 * Render a definition as a single `[CODE] message` line.
 */
export function formatCoded(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}
