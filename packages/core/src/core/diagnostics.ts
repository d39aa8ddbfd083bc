/**
 * Re-export diagnostic types and core definitions from the shared package.
 */

import { CORE_DIAGNOSTICS } from '@quilt/diagnostics'

export {
	CORE_DIAGNOSTICS,
	type CoreDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
	severityLabel,
} from '@quilt/diagnostics'

/**
 * All valid diagnostic codes for the core library.
 */
export type DiagnosticCode = keyof typeof CORE_DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof CORE_DIAGNOSTICS)[typeof code] {
	return CORE_DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in CORE_DIAGNOSTICS
}
