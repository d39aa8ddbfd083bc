/**
 * Resource accesses of each instruction, the input to the dependency graph.
 *
 * A resource lives in a domain (`qubit`, `frame`, `memory:<region>`, `waveform`,
 * `global`) and is either a single slot or the whole domain. A whole-domain access
 * conflicts with every slot of that domain.
 *
 * Gate applications and measurements read and write every qubit they name,
 * whatever their modifiers. A placeholder qubit may later be bound to any qubit,
 * so it counts as the whole qubit domain.
 */

import type { Expression, MemoryReference } from '../expression/types.ts'
import { memoryReferences } from '../expression/types.ts'
import type { ClassicalOperand, Frame, Instruction, Qubit } from '../program/instructions.ts'
import { frameKey, type MemoryRegion } from '../program/program.ts'

export interface Access {
	readonly domain: string
	/** Slot within the domain; null for the whole domain. */
	readonly slot: string | null
	readonly write: boolean
}

export const QUBIT_DOMAIN = 'qubit'
export const FRAME_DOMAIN = 'frame'
export const WAVEFORM_DOMAIN = 'waveform'
export const GLOBAL_DOMAIN = 'global'

class AccessList {
	private readonly byResource = new Map<string, Access>()
	private readonly regions: ReadonlyMap<string, MemoryRegion>

	constructor(regions: ReadonlyMap<string, MemoryRegion>) {
		this.regions = regions
	}

	add(domain: string, slot: string | null, write: boolean): void {
		const key = `${domain}\u0000${slot ?? '*'}`
		const existing = this.byResource.get(key)
		// reading and writing the same resource is a write
		this.byResource.set(key, { domain, slot, write: write || (existing?.write ?? false) })
	}

	qubit(qubit: Qubit, write: boolean): void {
		this.add(QUBIT_DOMAIN, qubit.kind === 'Fixed' ? String(qubit.index) : null, write)
	}

	qubits(qubits: readonly Qubit[], write: boolean): void {
		for (const qubit of qubits) this.qubit(qubit, write)
	}

	allQubits(): void {
		this.add(QUBIT_DOMAIN, null, true)
	}

	frame(frame: Frame, write: boolean): void {
		const placeholder = frame.qubits.some((q) => q.kind === 'Variable')
		this.add(FRAME_DOMAIN, placeholder ? null : frameKey(frame), write)
	}

	/** Root region that `name` is stored in, following SHARING aliases. */
	private root(name: string): { root: string; aliased: boolean } {
		let current = name
		const seen = new Set<string>()
		for (;;) {
			const sharing = this.regions.get(current)?.sharing
			if (sharing === undefined || sharing === null || seen.has(current)) break
			seen.add(current)
			current = sharing.name
		}
		return { aliased: current !== name, root: current }
	}

	memory(reference: MemoryReference, write: boolean): void {
		const { aliased, root } = this.root(reference.name)
		// an alias may start at any offset of its root, so it covers the whole root
		this.add(`memory:${root}`, aliased ? null : String(reference.index), write)
	}

	region(name: string, write: boolean): void {
		this.add(`memory:${this.root(name).root}`, null, write)
	}

	operand(operand: ClassicalOperand): void {
		if (operand.kind === 'Memory') this.memory(operand.reference, false)
	}

	expression(expression: Expression): void {
		for (const reference of memoryReferences(expression)) this.memory(reference, false)
	}

	waveform(name: string): void {
		this.add(WAVEFORM_DOMAIN, name, false)
	}

	barrier(): void {
		this.add(GLOBAL_DOMAIN, null, true)
	}

	list(): Access[] {
		return [...this.byResource.values()]
	}
}

function addPulse(accesses: AccessList, blocking: boolean, frame: Frame): void {
	accesses.frame(frame, true)
	accesses.qubits(frame.qubits, blocking)
}

function addInstruction(accesses: AccessList, instruction: Instruction): void {
	switch (instruction.kind) {
		case 'Gate':
			accesses.qubits(instruction.qubits, true)
			for (const parameter of instruction.parameters) accesses.expression(parameter)
			return
		case 'Measurement':
			accesses.qubit(instruction.qubit, true)
			if (instruction.target !== null) accesses.memory(instruction.target, true)
			return
		case 'Reset':
			if (instruction.qubit === null) accesses.allQubits()
			else accesses.qubit(instruction.qubit, true)
			return
		case 'Fence':
			if (instruction.qubits.length === 0) accesses.allQubits()
			else accesses.qubits(instruction.qubits, true)
			return
		case 'Arithmetic':
		case 'BinaryLogic':
		case 'Move':
			accesses.memory(instruction.destination, true)
			accesses.operand(instruction.source)
			return
		case 'Exchange':
			accesses.memory(instruction.left, true)
			accesses.memory(instruction.right, true)
			return
		case 'Convert':
			accesses.memory(instruction.destination, true)
			accesses.memory(instruction.source, false)
			return
		case 'Load':
			accesses.memory(instruction.destination, true)
			accesses.region(instruction.source, false)
			accesses.memory(instruction.offset, false)
			return
		case 'Store':
			accesses.region(instruction.destination, true)
			accesses.memory(instruction.offset, false)
			accesses.operand(instruction.source)
			return
		case 'Comparison':
			accesses.memory(instruction.destination, true)
			accesses.memory(instruction.left, false)
			accesses.operand(instruction.right)
			return
		case 'UnaryLogic':
			accesses.memory(instruction.operand, true)
			return
		case 'Pulse':
			addPulse(accesses, instruction.blocking, instruction.frame)
			accesses.waveform(instruction.waveform.name)
			for (const p of instruction.waveform.parameters) accesses.expression(p.value)
			return
		case 'Capture':
			addPulse(accesses, instruction.blocking, instruction.frame)
			accesses.waveform(instruction.waveform.name)
			for (const p of instruction.waveform.parameters) accesses.expression(p.value)
			accesses.memory(instruction.target, true)
			return
		case 'RawCapture':
			addPulse(accesses, instruction.blocking, instruction.frame)
			accesses.expression(instruction.duration)
			accesses.memory(instruction.target, true)
			return
		case 'Delay':
			if (instruction.frameNames.length === 0) {
				accesses.qubits(instruction.qubits, true)
			} else {
				for (const name of instruction.frameNames) accesses.frame({ name, qubits: instruction.qubits }, true)
				accesses.qubits(instruction.qubits, false)
			}
			accesses.expression(instruction.duration)
			return
		case 'FrameUpdate':
			accesses.frame(instruction.frame, true)
			accesses.qubits(instruction.frame.qubits, false)
			accesses.expression(instruction.value)
			return
		case 'SwapPhases':
			for (const frame of [instruction.left, instruction.right]) {
				accesses.frame(frame, true)
				accesses.qubits(frame.qubits, false)
			}
			return
		case 'Nop':
		case 'Label':
			return
		// Barriers: nothing may move across them.
		case 'CalibrationDefinition':
		case 'CircuitDefinition':
		case 'Declaration':
		case 'FrameDefinition':
		case 'GateDefinition':
		case 'Halt':
		case 'Jump':
		case 'JumpUnless':
		case 'JumpWhen':
		case 'MeasureCalibrationDefinition':
		case 'Pragma':
		case 'Wait':
		case 'WaveformDefinition':
			accesses.barrier()
			return
	}
}

/**
 * Resources an instruction touches. Every instruction except NOP and LABEL at
 * least reads the global domain, so barriers order it.
 */
export function instructionAccesses(
	instruction: Instruction,
	regions: ReadonlyMap<string, MemoryRegion> = new Map()
): Access[] {
	const accesses = new AccessList(regions)
	if (instruction.kind !== 'Nop' && instruction.kind !== 'Label') {
		accesses.add(GLOBAL_DOMAIN, null, false)
	}
	addInstruction(accesses, instruction)
	return accesses.list()
}
