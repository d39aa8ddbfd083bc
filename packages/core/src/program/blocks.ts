import { buildDependencyGraph, type DependencyGraph, type GraphOptions } from '../graph/dependency-graph.ts'
import type { Instruction, Terminator } from './instructions.ts'
import { isTerminator } from './instructions.ts'
import type { MemoryRegion } from './program.ts'

/**
 * A maximal straight-line run of instructions.
 *
 * Entered only at its label (or by falling through from the previous block) and
 * left only through its terminator (or by falling through to the next one).
 */
export class BasicBlock {
	/** Label that starts the block, null for the entry block or code after a jump. */
	readonly label: string | null
	/** Instructions between the label and the terminator, neither included. */
	readonly instructions: readonly Instruction[]
	readonly terminator: Terminator | null
	/** Declared regions, used to resolve aliased memory when building the graph. */
	readonly memoryRegions: ReadonlyMap<string, MemoryRegion>

	constructor(
		label: string | null,
		instructions: readonly Instruction[],
		terminator: Terminator | null = null,
		memoryRegions: ReadonlyMap<string, MemoryRegion> = new Map()
	) {
		this.label = label
		this.instructions = instructions
		this.terminator = terminator
		this.memoryRegions = memoryRegions
	}

	dependencyGraph(options?: GraphOptions): DependencyGraph {
		return buildDependencyGraph(this, options)
	}
}

/**
 * Splits an executable instruction list at labels and control transfers.
 * Empty unlabeled runs (e.g. right after a jump that is followed by a label)
 * produce no block.
 */
export function splitBasicBlocks(
	instructions: readonly Instruction[],
	memoryRegions: ReadonlyMap<string, MemoryRegion> = new Map()
): BasicBlock[] {
	const blocks: BasicBlock[] = []
	let label: string | null = null
	let body: Instruction[] = []

	const close = (terminator: Terminator | null): void => {
		if (label !== null || body.length > 0 || terminator !== null) {
			blocks.push(new BasicBlock(label, body, terminator, memoryRegions))
		}
		label = null
		body = []
	}

	for (const instruction of instructions) {
		if (instruction.kind === 'Label') {
			close(null)
			label = instruction.name
		} else if (isTerminator(instruction)) {
			close(instruction)
		} else {
			body.push(instruction)
		}
	}
	close(null)
	return blocks
}
