import {
	type BasicBlock,
	formatInstruction,
	type GraphOptions,
	parseProgram,
	type Program,
	SourceContext,
	tokenize,
	type ValidationError,
} from '@quilt/core'
import {
	formatCoded,
	QTCLI001,
	QTCLI002,
	QTCLI003,
	QTCLI004,
	QTCLI005,
	QTCLI006,
} from '@quilt/diagnostics'

export type GraphFormat = 'json' | 'text'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCoded(QTCLI001, { path: filePath })
	}
	return formatCoded(QTCLI002, { reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatCoded(QTCLI003, { reason: getErrorMessage(error) })
}

export function formatInvalidFormatError(format: string): string {
	return formatCoded(QTCLI004, { format })
}

export function formatProcessingError(error: unknown): string {
	return formatCoded(QTCLI005, { reason: getErrorMessage(error) })
}

export function formatStrictFailure(count: number): string {
	return formatCoded(QTCLI006, { count })
}

export function isValidFormat(value: string): value is GraphFormat {
	return value === 'json' || value === 'text'
}

// ============================================================================
// Source analysis
// ============================================================================

export interface Analysis {
	readonly context: SourceContext
	/** null when lexing or parsing failed; the context holds the diagnostic. */
	readonly program: Program | null
}

/**
 * Lexes and parses a source file, keeping the diagnostics in the context so
 * they can be printed with source excerpts.
 */
export function analyzeSource(source: string, filename: string): Analysis {
	const context = new SourceContext(source, filename)
	if (!tokenize(context).succeeded) return { context, program: null }
	const result = parseProgram(context)
	return { context, program: result.program ?? null }
}

/** Reports validation findings to the context and returns them formatted. */
export function formatValidationFindings(context: SourceContext, findings: readonly ValidationError[]): string[] {
	return findings.map((finding) => {
		const line = finding.location?.line ?? 1
		const column = finding.location?.column ?? 1
		context.emit(finding.code, line, column, finding.args)
		const diagnostics = context.getDiagnostics()
		const diagnostic = diagnostics[diagnostics.length - 1]
		return diagnostic === undefined ? finding.message : context.formatDiagnostic(diagnostic)
	})
}

// ============================================================================
// Graph rendering
// ============================================================================

interface RenderedBlock {
	readonly label: string | null
	readonly nodes: { readonly id: number; readonly instruction: string }[]
	readonly edges: (readonly [number, number])[]
	readonly terminator: string | null
}

function renderBlock(block: BasicBlock, options: GraphOptions): RenderedBlock {
	const graph = block.dependencyGraph(options)
	return {
		edges: graph.edges().map(([from, to]) => [from, to] as const),
		label: block.label,
		nodes: graph.nodes().map((id) => ({ id, instruction: graph.label(id) })),
		terminator: block.terminator === null ? null : formatInstruction(block.terminator),
	}
}

function blockTitle(index: number, label: string | null): string {
	return label === null ? `block ${index}` : `block ${index} @${label}`
}

/**
 * Plain text, one section per basic block:
 *
 * ```
 * block 0
 *   0: H 0
 *   1: CNOT 0 1
 *   edges: 0 -> 1
 * ```
 */
export function renderGraphText(blocks: readonly BasicBlock[], options: GraphOptions = {}): string {
	const sections = blocks.map((block, index) => {
		const rendered = renderBlock(block, options)
		const lines = [blockTitle(index, rendered.label)]
		for (const node of rendered.nodes) lines.push(`  ${node.id}: ${node.instruction}`)
		const edges = rendered.edges.map(([from, to]) => `${from} -> ${to}`)
		lines.push(`  edges: ${edges.length === 0 ? 'none' : edges.join(', ')}`)
		if (rendered.terminator !== null) lines.push(`  then: ${rendered.terminator}`)
		return lines.join('\n')
	})
	return sections.join('\n\n')
}

export function renderGraphJson(blocks: readonly BasicBlock[], options: GraphOptions = {}): string {
	return JSON.stringify({ blocks: blocks.map((block) => renderBlock(block, options)) }, null, 2)
}

export function renderGraph(blocks: readonly BasicBlock[], format: GraphFormat, options: GraphOptions = {}): string {
	return format === 'json' ? renderGraphJson(blocks, options) : renderGraphText(blocks, options)
}
