/**
 * CLI diagnostic definitions.
 *
 * Error code format: QTCLI<NUMBER>
 */

import { type DiagnosticCatalog, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (QTCLI001-099)
// =============================================================================

export const QTCLI001: DiagnosticDef = {
	code: 'QTCLI001',
	description: 'There is no file at this path.',
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const QTCLI002: DiagnosticDef = {
	code: 'QTCLI002',
	description: 'The file exists but could not be opened.',
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const QTCLI003: DiagnosticDef = {
	code: 'QTCLI003',
	description: 'The output could not be saved.',
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the output path.',
}

export const QTCLI004: DiagnosticDef = {
	code: 'QTCLI004',
	description: 'The graph command only knows a fixed set of output formats.',
	message: 'unknown format "{format}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--format text` or `--format json`.',
}

export const QTCLI005: DiagnosticDef = {
	code: 'QTCLI005',
	description: 'Something unexpected went wrong while processing the program.',
	message: 'processing failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check your source file, or report this if it seems like a bug.',
}

export const QTCLI006: DiagnosticDef = {
	code: 'QTCLI006',
	description: 'Validation found problems and --strict was given.',
	message: '{count} validation finding(s) in strict mode',
	severity: DiagnosticSeverity.Error,
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	QTCLI001,
	QTCLI002,
	QTCLI003,
	QTCLI004,
	QTCLI005,
	QTCLI006,
} as const satisfies DiagnosticCatalog

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
