/**
 * Advisory checks over a built program.
 *
 * Every finding is collected; nothing short-circuits and the program stays usable.
 * Only top-level items are checked: definition bodies refer to formal arguments
 * that are bound when the definition is used.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	getDiagnostic,
	interpolateMessage,
} from '../core/diagnostics.ts'
import type { SourceLocation } from '../core/errors.ts'
import type { MemoryReference } from '../expression/types.ts'
import { memoryReferences } from '../expression/types.ts'
import type {
	ClassicalOperand,
	Gate,
	Instruction,
	WaveformInvocation,
} from './instructions.ts'
import type { Program } from './program.ts'

export type ValidationErrorKind =
	| 'ArityMismatch'
	| 'DuplicateLabel'
	| 'DuplicateMemoryRegion'
	| 'UndeclaredMemoryReference'
	| 'UnresolvedJumpTarget'

const CODES: Readonly<Record<ValidationErrorKind, DiagnosticCode>> = {
	ArityMismatch: 'QTVAL004',
	DuplicateLabel: 'QTVAL001',
	DuplicateMemoryRegion: 'QTVAL005',
	UndeclaredMemoryReference: 'QTVAL003',
	UnresolvedJumpTarget: 'QTVAL002',
}

export interface ValidationError {
	readonly kind: ValidationErrorKind
	readonly code: DiagnosticCode
	readonly message: string
	readonly args: DiagnosticArgs
	/** Where the problem was found; null for instructions built without a location. */
	readonly location: SourceLocation | null
	/** Every location involved; a duplicate label lists the first definition and the duplicate. */
	readonly locations: readonly SourceLocation[]
}

function validationError(
	kind: ValidationErrorKind,
	args: DiagnosticArgs,
	location: SourceLocation | undefined,
	related: readonly (SourceLocation | undefined)[] = [location]
): ValidationError {
	const code = CODES[kind]
	return {
		args,
		code,
		kind,
		location: location ?? null,
		locations: related.filter((l): l is SourceLocation => l !== undefined),
		message: interpolateMessage(getDiagnostic(code).message, args),
	}
}

function lineOf(location: SourceLocation | undefined): string {
	return location === undefined ? '?' : String(location.line)
}

// ============================================================================
// Memory references
// ============================================================================

function operandReferences(operand: ClassicalOperand): MemoryReference[] {
	return operand.kind === 'Memory' ? [operand.reference] : []
}

function waveformReferences(waveform: WaveformInvocation): MemoryReference[] {
	return waveform.parameters.flatMap((p) => memoryReferences(p.value))
}

function region(name: string): MemoryReference {
	return { index: 0, name }
}

/** Memory regions an instruction names, in operand order. */
export function referencedMemory(instruction: Instruction): MemoryReference[] {
	switch (instruction.kind) {
		case 'Gate':
			return instruction.parameters.flatMap((p) => memoryReferences(p))
		case 'Measurement':
			return instruction.target === null ? [] : [instruction.target]
		case 'Arithmetic':
		case 'BinaryLogic':
		case 'Move':
			return [instruction.destination, ...operandReferences(instruction.source)]
		case 'Exchange':
			return [instruction.left, instruction.right]
		case 'Convert':
			return [instruction.destination, instruction.source]
		case 'Load':
			return [instruction.destination, region(instruction.source), instruction.offset]
		case 'Store':
			return [region(instruction.destination), instruction.offset, ...operandReferences(instruction.source)]
		case 'Comparison':
			return [instruction.destination, instruction.left, ...operandReferences(instruction.right)]
		case 'UnaryLogic':
			return [instruction.operand]
		case 'JumpUnless':
		case 'JumpWhen':
			return [instruction.condition]
		case 'Pulse':
			return waveformReferences(instruction.waveform)
		case 'Capture':
			return [...waveformReferences(instruction.waveform), instruction.target]
		case 'RawCapture':
			return [...memoryReferences(instruction.duration), instruction.target]
		case 'Delay':
			return memoryReferences(instruction.duration)
		case 'FrameUpdate':
			return memoryReferences(instruction.value)
		case 'CalibrationDefinition':
		case 'CircuitDefinition':
		case 'Declaration':
		case 'Fence':
		case 'FrameDefinition':
		case 'GateDefinition':
		case 'Halt':
		case 'Jump':
		case 'Label':
		case 'MeasureCalibrationDefinition':
		case 'Nop':
		case 'Pragma':
		case 'Reset':
		case 'SwapPhases':
		case 'Wait':
		case 'WaveformDefinition':
			return []
	}
}

// ============================================================================
// Arity
// ============================================================================

/** Qubit and parameter counts of the definition a gate name resolves to. */
export interface GateSignature {
	readonly qubits: number
	readonly parameters: number
}

function qubitsForDimension(dimension: number): number | null {
	const qubits = Math.log2(dimension)
	return Number.isInteger(qubits) && qubits > 0 ? qubits : null
}

export function gateSignature(program: Program, name: string): GateSignature | null {
	const circuit = program.circuitDefinition(name)
	if (circuit !== undefined) {
		return { parameters: circuit.parameters.length, qubits: circuit.qubits.length }
	}
	const gate = program.gateDefinition(name)
	if (gate === undefined) return null

	const { specification } = gate
	const dimension =
		specification.kind === 'Matrix' ? specification.rows.length : specification.permutation.length
	const qubits = qubitsForDimension(dimension)
	return qubits === null ? null : { parameters: gate.parameters.length, qubits }
}

/** Signature after modifiers: CONTROLLED and FORKED each add a qubit, FORKED doubles the parameters. */
export function modifiedSignature(signature: GateSignature, gate: Gate): GateSignature {
	let { parameters, qubits } = signature
	for (const modifier of gate.modifiers) {
		if (modifier === 'DAGGER') continue
		qubits++
		if (modifier === 'FORKED') parameters *= 2
	}
	return { parameters, qubits }
}

function plural(count: number, noun: string): string {
	return count === 1 ? noun : `${noun}s`
}

function arityErrors(program: Program, gate: Gate): ValidationError[] {
	const base = gateSignature(program, gate.name)
	if (base === null) return []
	const expected = modifiedSignature(base, gate)

	const errors: ValidationError[] = []
	if (gate.qubits.length !== expected.qubits) {
		errors.push(
			validationError(
				'ArityMismatch',
				{
					expected: expected.qubits,
					found: gate.qubits.length,
					gate: gate.name,
					operand: plural(expected.qubits, 'qubit'),
				},
				gate.location
			)
		)
	}
	if (gate.parameters.length !== expected.parameters) {
		errors.push(
			validationError(
				'ArityMismatch',
				{
					expected: expected.parameters,
					found: gate.parameters.length,
					gate: gate.name,
					operand: plural(expected.parameters, 'parameter'),
				},
				gate.location
			)
		)
	}
	return errors
}

// ============================================================================
// Entry point
// ============================================================================

function jumpTarget(instruction: Instruction): string | null {
	switch (instruction.kind) {
		case 'Jump':
		case 'JumpUnless':
		case 'JumpWhen':
			return instruction.target
		default:
			return null
	}
}

export function validateProgram(program: Program): ValidationError[] {
	const errors: ValidationError[] = []
	const labels = new Map<string, SourceLocation | undefined>()
	const regions = new Map<string, SourceLocation | undefined>()

	for (const item of program.items()) {
		if (item.kind === 'Label') {
			if (labels.has(item.name)) {
				const first = labels.get(item.name)
				errors.push(
					validationError('DuplicateLabel', { line: lineOf(first), name: item.name }, item.location, [
						first,
						item.location,
					])
				)
			} else {
				labels.set(item.name, item.location)
			}
		}
		if (item.kind === 'Declaration') {
			if (regions.has(item.name)) {
				const first = regions.get(item.name)
				errors.push(
					validationError('DuplicateMemoryRegion', { line: lineOf(first), name: item.name }, item.location, [
						first,
						item.location,
					])
				)
			} else {
				regions.set(item.name, item.location)
			}
		}
	}

	for (const item of program.items()) {
		const target = jumpTarget(item)
		if (target !== null && !labels.has(target)) {
			errors.push(validationError('UnresolvedJumpTarget', { name: target }, item.location))
		}
		for (const reference of referencedMemory(item)) {
			if (program.memoryRegion(reference.name) === undefined) {
				errors.push(validationError('UndeclaredMemoryReference', { name: reference.name }, item.location))
			}
		}
		if (item.kind === 'Gate') errors.push(...arityErrors(program, item))
	}

	return errors
}
