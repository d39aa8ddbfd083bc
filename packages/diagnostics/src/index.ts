/**
 * @quilt/diagnostics
 *
 * Shared diagnostic types and definitions for the Quilt packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	QTCLI001,
	QTCLI002,
	QTCLI003,
	QTCLI004,
	QTCLI005,
	QTCLI006,
} from './cli.ts'
export {
	CORE_DIAGNOSTICS,
	type CoreDiagnosticCode,
	QTEXPR001,
	QTEXPR002,
	QTLEX001,
	QTLEX002,
	QTPARSE001,
	QTPARSE002,
	QTPARSE003,
	QTVAL001,
	QTVAL002,
	QTVAL003,
	QTVAL004,
	QTVAL005,
} from './core.ts'
export { formatCoded, interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCatalog,
	type DiagnosticDef,
	DiagnosticSeverity,
	severityLabel,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { CORE_DIAGNOSTICS } from './core.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...CORE_DIAGNOSTICS,
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
