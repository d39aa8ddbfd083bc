import { describe, it } from 'node:test'
import fc from 'fast-check'
import { buildDependencyGraph } from '../../src/graph/dependency-graph.ts'
import { type Access, instructionAccesses } from '../../src/graph/resources.ts'
import { fixedQubit, type Instruction, type Qubit, qubitVariable } from '../../src/program/instructions.ts'
import type { MemoryRegion } from '../../src/program/program.ts'

const REGIONS: ReadonlyMap<string, MemoryRegion> = new Map<string, MemoryRegion>([
	['ro', { name: 'ro', sharing: null, size: { length: 4, type: 'BIT' } }],
	['view', { name: 'view', sharing: { name: 'ro', offsets: [] }, size: { length: 1, type: 'BIT' } }],
])

const qubit: fc.Arbitrary<Qubit> = fc.oneof(
	{ arbitrary: fc.integer({ max: 3, min: 0 }).map(fixedQubit), weight: 5 },
	{ arbitrary: fc.constant(qubitVariable('q')), weight: 1 }
)

const slot = fc.record({
	index: fc.integer({ max: 3, min: 0 }),
	name: fc.constantFrom('ro', 'view'),
})

const instruction: fc.Arbitrary<Instruction> = fc.oneof(
	{
		arbitrary: fc.array(qubit, { maxLength: 2, minLength: 1 }).map(
			(qubits): Instruction => ({ kind: 'Gate', modifiers: [], name: 'G', parameters: [], qubits })
		),
		weight: 4,
	},
	{
		arbitrary: fc.tuple(qubit, slot).map(([q, target]): Instruction => ({ kind: 'Measurement', qubit: q, target })),
		weight: 2,
	},
	{
		arbitrary: fc.tuple(slot, slot).map(
			([destination, source]): Instruction => ({
				destination,
				kind: 'Move',
				source: { kind: 'Memory', reference: source },
			})
		),
		weight: 2,
	},
	{
		arbitrary: fc.constantFrom<Instruction>({ kind: 'Wait' }, { kind: 'Nop' }, { kind: 'Fence', qubits: [] }),
		weight: 1,
	}
)

const block = fc.array(instruction, { maxLength: 12 })

function conflicts(left: readonly Access[], right: readonly Access[]): boolean {
	return left.some((a) =>
		right.some(
			(b) =>
				a.domain === b.domain &&
				(a.write || b.write) &&
				(a.slot === null || b.slot === null || a.slot === b.slot)
		)
	)
}

describe('graph/dependency-graph properties', () => {
	it('every edge points forward', () => {
		fc.assert(
			fc.property(block, (instructions) => {
				const graph = buildDependencyGraph({ instructions, memoryRegions: REGIONS })
				return graph.edges().every(([from, to]) => from < to && to < instructions.length)
			}),
			{ numRuns: 500 }
		)
	})

	it('conflicting instructions are ordered', () => {
		fc.assert(
			fc.property(block, (instructions) => {
				const graph = buildDependencyGraph({ instructions, memoryRegions: REGIONS })
				const accesses = instructions.map((i) => instructionAccesses(i, REGIONS))
				for (let from = 0; from < instructions.length; from++) {
					for (let to = from + 1; to < instructions.length; to++) {
						const a = accesses[from] ?? []
						const b = accesses[to] ?? []
						if (conflicts(a, b) && !graph.reaches(from, to)) return false
					}
				}
				return true
			}),
			{ numRuns: 500 }
		)
	})

	it('transitive reduction keeps reachability and never adds edges', () => {
		fc.assert(
			fc.property(block, (instructions) => {
				const graph = buildDependencyGraph({ instructions, memoryRegions: REGIONS })
				const reduced = graph.transitiveReduction()
				if (reduced.edges().some(([from, to]) => !graph.hasEdge(from, to))) return false
				for (let from = 0; from < instructions.length; from++) {
					for (let to = from + 1; to < instructions.length; to++) {
						if (graph.reaches(from, to) !== reduced.reaches(from, to)) return false
					}
				}
				return true
			}),
			{ numRuns: 300 }
		)
	})

	it('the topological order lists every node once', () => {
		fc.assert(
			fc.property(block, (instructions) => {
				const order = buildDependencyGraph({ instructions }).topologicalOrder()
				return order.length === instructions.length && new Set(order).size === order.length
			}),
			{ numRuns: 300 }
		)
	})
})
