/**
 * Ordering constraints between the instructions of one basic block.
 *
 * Nodes are indices into the block's instruction list. An edge `(from, to)`
 * always has `from < to` and means `from` must execute no later than `to`.
 * The graph is therefore acyclic and every topological order is a valid
 * reordering of the block.
 */

import { InternalError } from '../core/errors.ts'
import type { Instruction } from '../program/instructions.ts'
import type { MemoryRegion } from '../program/program.ts'
import { formatInstruction } from '../serialize/serializer.ts'
import { type Access, instructionAccesses } from './resources.ts'

export type Edge = readonly [from: number, to: number]

/**
 * Read-only view for consumers such as renderers; nodes are opaque indices
 * and `label` is the only way to describe one.
 */
export interface GraphView {
	nodes(): readonly number[]
	edges(): readonly Edge[]
	label(node: number): string
}

export interface GraphOptions {
	/** Drop edges implied by a longer path. Reachability is unchanged. */
	readonly transitiveReduction?: boolean
}

/** Input of buildDependencyGraph: a basic block or anything shaped like one. */
export interface InstructionBlock {
	readonly instructions: readonly Instruction[]
	readonly memoryRegions?: ReadonlyMap<string, MemoryRegion>
}

export class DependencyGraph implements GraphView {
	readonly instructions: readonly Instruction[]
	private readonly outgoing: Set<number>[]
	private readonly incoming: Set<number>[]
	private edgeCount = 0

	constructor(instructions: readonly Instruction[]) {
		this.instructions = instructions
		this.outgoing = instructions.map(() => new Set<number>())
		this.incoming = instructions.map(() => new Set<number>())
	}

	/**
	 * Adds the constraint `from` before `to`. Returns false if it already existed.
	 *
	 * @throws {InternalError} for a backward, self or out-of-range edge
	 */
	addEdge(from: number, to: number): boolean {
		const out = this.outgoing[from]
		const into = this.incoming[to]
		if (out === undefined || into === undefined || from >= to) {
			throw new InternalError(`invalid dependency edge ${from} -> ${to}`)
		}
		if (out.has(to)) return false
		out.add(to)
		into.add(from)
		this.edgeCount++
		return true
	}

	size(): number {
		return this.instructions.length
	}

	nodes(): number[] {
		return this.instructions.map((_, i) => i)
	}

	/** Edges ordered by source, then target. */
	edges(): Edge[] {
		const edges: Edge[] = []
		this.outgoing.forEach((targets, from) => {
			for (const to of [...targets].sort((a, b) => a - b)) edges.push([from, to])
		})
		return edges
	}

	getEdgeCount(): number {
		return this.edgeCount
	}

	label(node: number): string {
		const instruction = this.instructions[node]
		if (instruction === undefined) throw new InternalError(`invalid node ${node}`)
		return formatInstruction(instruction)
	}

	successors(node: number): number[] {
		return [...(this.outgoing[node] ?? [])].sort((a, b) => a - b)
	}

	predecessors(node: number): number[] {
		return [...(this.incoming[node] ?? [])].sort((a, b) => a - b)
	}

	hasEdge(from: number, to: number): boolean {
		return this.outgoing[from]?.has(to) ?? false
	}

	/** Whether a path of one or more edges leads from `from` to `to`. */
	reaches(from: number, to: number): boolean {
		if (from >= to) return false
		const visited = new Set<number>()
		const stack = [from]
		while (stack.length > 0) {
			const node = stack.pop()
			if (node === undefined) break
			for (const next of this.outgoing[node] ?? []) {
				if (next === to) return true
				// edges only point forward, so nothing past `to` can lead back to it
				if (next < to && !visited.has(next)) {
					visited.add(next)
					stack.push(next)
				}
			}
		}
		return false
	}

	/** Kahn's algorithm, taking the lowest ready index first. */
	topologicalOrder(): number[] {
		const remaining = this.incoming.map((sources) => sources.size)
		const ready = remaining.flatMap((count, node) => (count === 0 ? [node] : []))
		const order: number[] = []
		while (ready.length > 0) {
			ready.sort((a, b) => a - b)
			const node = ready.shift()
			if (node === undefined) break
			order.push(node)
			for (const next of this.outgoing[node] ?? []) {
				const count = (remaining[next] ?? 0) - 1
				remaining[next] = count
				if (count === 0) ready.push(next)
			}
		}
		return order
	}

	/** A copy without the edges implied by longer paths. */
	transitiveReduction(): DependencyGraph {
		const reduced = new DependencyGraph(this.instructions)
		// descendants[n]: every node reachable from n through one or more edges
		const descendants: Set<number>[] = this.instructions.map(() => new Set<number>())
		for (let node = this.size() - 1; node >= 0; node--) {
			const reach = descendants[node]
			if (reach === undefined) continue
			const targets = this.successors(node)
			for (const next of targets) {
				reach.add(next)
				for (const further of descendants[next] ?? []) reach.add(further)
			}
			for (const next of targets) {
				const implied = targets.some((other) => other !== next && (descendants[other]?.has(next) ?? false))
				if (!implied) reduced.addEdge(node, next)
			}
		}
		return reduced
	}
}

// ============================================================================
// Builder
// ============================================================================

/** Last writer and readers since it, for one slot or a whole domain. */
interface AccessState {
	writer: number | null
	readers: number[]
}

interface DomainState {
	readonly whole: AccessState
	readonly slots: Map<string, AccessState>
}

function emptyAccess(): AccessState {
	return { readers: [], writer: null }
}

function link(graph: DependencyGraph, from: number | null, to: number): void {
	if (from !== null && from < to) graph.addEdge(from, to)
}

function linkAll(graph: DependencyGraph, state: AccessState, to: number): void {
	link(graph, state.writer, to)
	for (const reader of state.readers) link(graph, reader, to)
}

function recordSlotAccess(graph: DependencyGraph, domain: DomainState, slot: string, node: number, write: boolean): void {
	let state = domain.slots.get(slot)
	if (state === undefined) {
		state = emptyAccess()
		domain.slots.set(slot, state)
	}
	link(graph, domain.whole.writer, node)
	link(graph, state.writer, node)
	if (!write) {
		state.readers.push(node)
		return
	}
	for (const reader of state.readers) link(graph, reader, node)
	for (const reader of domain.whole.readers) link(graph, reader, node)
	state.writer = node
	state.readers = []
}

function recordWholeAccess(graph: DependencyGraph, domain: DomainState, node: number, write: boolean): void {
	link(graph, domain.whole.writer, node)
	for (const slot of domain.slots.values()) {
		if (write) linkAll(graph, slot, node)
		else link(graph, slot.writer, node)
	}
	if (!write) {
		domain.whole.readers.push(node)
		return
	}
	for (const reader of domain.whole.readers) link(graph, reader, node)
	domain.whole.writer = node
	domain.whole.readers = []
	domain.slots.clear()
}

function recordAccess(graph: DependencyGraph, domains: Map<string, DomainState>, node: number, access: Access): void {
	let domain = domains.get(access.domain)
	if (domain === undefined) {
		domain = { slots: new Map(), whole: emptyAccess() }
		domains.set(access.domain, domain)
	}
	if (access.slot === null) recordWholeAccess(graph, domain, node, access.write)
	else recordSlotAccess(graph, domain, access.slot, node, access.write)
}

/**
 * Builds the dependency graph of a block's instructions (its label and
 * terminator are not nodes).
 *
 * Per resource the builder keeps the last writer and the readers since it.
 * Each access is ordered after the last writer; a write is also ordered after
 * those readers and becomes the new last writer.
 */
export function buildDependencyGraph(block: InstructionBlock, options: GraphOptions = {}): DependencyGraph {
	const graph = new DependencyGraph(block.instructions)
	const domains = new Map<string, DomainState>()
	const regions = block.memoryRegions ?? new Map<string, MemoryRegion>()

	block.instructions.forEach((instruction, node) => {
		for (const access of instructionAccesses(instruction, regions)) {
			recordAccess(graph, domains, node, access)
		}
	})

	return options.transitiveReduction ? graph.transitiveReduction() : graph
}
