/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	/** Message template, `{name}` placeholders are filled from DiagnosticArgs. */
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>

/** A group of definitions keyed by their code. */
export type DiagnosticCatalog = Readonly<Record<string, DiagnosticDef>>

const SEVERITY_LABELS: Record<DiagnosticSeverity, string> = {
	[DiagnosticSeverity.Error]: 'error',
	[DiagnosticSeverity.Note]: 'note',
	[DiagnosticSeverity.Warning]: 'warning',
}

export function severityLabel(severity: DiagnosticSeverity): string {
	return SEVERITY_LABELS[severity]
}
