import { toText } from '../serialize/serializer.ts'
import { BasicBlock, splitBasicBlocks } from './blocks.ts'
import type {
	CalibrationDefinition,
	CircuitDefinition,
	Declaration,
	Frame,
	FrameDefinition,
	GateDefinition,
	Instruction,
	MeasureCalibrationDefinition,
	WaveformDefinition,
} from './instructions.ts'
import { isDefinition } from './instructions.ts'
import { type ValidationError, validateProgram } from './validate.ts'

/** A declared classical memory region. */
export type MemoryRegion = Pick<Declaration, 'name' | 'sharing' | 'size'>

/** Lookup key of a frame: its qubits and name as written, e.g. `0 1 "cz"`. */
export function frameKey(frame: Frame): string {
	const qubits = frame.qubits.map((q) => (q.kind === 'Fixed' ? String(q.index) : q.name))
	return `${qubits.join(' ')} ${JSON.stringify(frame.name)}`
}

/**
 * A parsed or hand-built program: ordered top-level items plus symbol tables.
 *
 * - Append-only: items are never removed or reordered
 * - First definition wins: a repeated name keeps the earlier entry in the
 *   symbol table (validate() reports repeated memory regions)
 */
export class Program {
	private readonly itemList: Instruction[] = []
	private readonly memoryRegions = new Map<string, Declaration>()
	private readonly gateDefinitions = new Map<string, GateDefinition>()
	private readonly circuitDefinitions = new Map<string, CircuitDefinition>()
	private readonly calibrationDefinitions: CalibrationDefinition[] = []
	private readonly measureCalibrationDefinitions: MeasureCalibrationDefinition[] = []
	private readonly frameDefinitions = new Map<string, FrameDefinition>()
	private readonly waveformDefinitions = new Map<string, WaveformDefinition>()
	private readonly labelNames = new Set<string>()

	constructor(items: Iterable<Instruction> = []) {
		for (const item of items) this.addInstruction(item)
	}

	addInstruction(instruction: Instruction): void {
		this.itemList.push(instruction)
		switch (instruction.kind) {
			case 'Declaration':
				addFirst(this.memoryRegions, instruction.name, instruction)
				break
			case 'GateDefinition':
				addFirst(this.gateDefinitions, instruction.name, instruction)
				break
			case 'CircuitDefinition':
				addFirst(this.circuitDefinitions, instruction.name, instruction)
				break
			case 'CalibrationDefinition':
				this.calibrationDefinitions.push(instruction)
				break
			case 'MeasureCalibrationDefinition':
				this.measureCalibrationDefinitions.push(instruction)
				break
			case 'FrameDefinition':
				addFirst(this.frameDefinitions, frameKey(instruction.frame), instruction)
				break
			case 'WaveformDefinition':
				addFirst(this.waveformDefinitions, instruction.name, instruction)
				break
			case 'Label':
				this.labelNames.add(instruction.name)
				break
			default:
				break
		}
	}

	/** Every top-level item in source order. */
	items(): readonly Instruction[] {
		return this.itemList
	}

	/** The executable body: every item except definitions and declarations. */
	instructions(): Instruction[] {
		return this.itemList.filter((item) => item.kind !== 'Declaration' && !isDefinition(item))
	}

	memoryRegion(name: string): MemoryRegion | undefined {
		return this.memoryRegions.get(name)
	}

	/** Declared regions by name. */
	memory(): ReadonlyMap<string, MemoryRegion> {
		return this.memoryRegions
	}

	gateDefinition(name: string): GateDefinition | undefined {
		return this.gateDefinitions.get(name)
	}

	circuitDefinition(name: string): CircuitDefinition | undefined {
		return this.circuitDefinitions.get(name)
	}

	/** Calibrations for a gate name, in definition order. */
	calibrations(name: string): CalibrationDefinition[] {
		return this.calibrationDefinitions.filter((c) => c.name === name)
	}

	measureCalibrations(): readonly MeasureCalibrationDefinition[] {
		return this.measureCalibrationDefinitions
	}

	frame(frame: Frame): FrameDefinition | undefined {
		return this.frameDefinitions.get(frameKey(frame))
	}

	waveform(name: string): WaveformDefinition | undefined {
		return this.waveformDefinitions.get(name)
	}

	/** Distinct label names in order of first definition. */
	labels(): string[] {
		return [...this.labelNames]
	}

	basicBlocks(): BasicBlock[] {
		return splitBasicBlocks(this.instructions(), this.memoryRegions)
	}

	validate(): ValidationError[] {
		return validateProgram(this)
	}

	toText(): string {
		return toText(this)
	}
}

function addFirst<T>(table: Map<string, T>, key: string, value: T): void {
	if (!table.has(key)) table.set(key, value)
}
