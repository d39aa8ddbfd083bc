/**
 * Instruction model.
 *
 * A closed union discriminated by `kind`. Every consumer switches over `kind`
 * exhaustively, so adding a variant is a compile error until each one handles it.
 * Instructions own their expressions and references and never point at each other.
 */

import type { SourceLocation } from '../core/errors.ts'
import type { Expression, MemoryReference } from '../expression/types.ts'

// ============================================================================
// Operands
// ============================================================================

/** A physical qubit, or a formal qubit argument pending binding. */
export type Qubit =
	| { readonly kind: 'Fixed'; readonly index: number }
	| { readonly kind: 'Variable'; readonly name: string }

export function fixedQubit(index: number): Qubit {
	return { index, kind: 'Fixed' }
}

export function qubitVariable(name: string): Qubit {
	return { kind: 'Variable', name }
}

export type ScalarType = 'BIT' | 'INTEGER' | 'OCTET' | 'REAL'

export const SCALAR_TYPES: readonly ScalarType[] = ['BIT', 'INTEGER', 'OCTET', 'REAL']

/** Classical source operand: a memory slot or an immediate literal. */
export type ClassicalOperand =
	| { readonly kind: 'Memory'; readonly reference: MemoryReference }
	| { readonly kind: 'Integer'; readonly value: number }
	| { readonly kind: 'Real'; readonly value: number }

/** A pulse frame: the qubits it is attached to and its name, e.g. `0 1 "cz"`. */
export interface Frame {
	readonly qubits: readonly Qubit[]
	readonly name: string
}

export interface WaveformParameter {
	readonly name: string
	readonly value: Expression
}

/** A waveform reference with named arguments, e.g. `flat(duration: 1e-6, iq: 1)`. */
export interface WaveformInvocation {
	readonly name: string
	readonly parameters: readonly WaveformParameter[]
}

export type GateModifier = 'CONTROLLED' | 'DAGGER' | 'FORKED'

interface Located {
	readonly location?: SourceLocation
}

// ============================================================================
// Gate-level
// ============================================================================

export interface Gate extends Located {
	readonly kind: 'Gate'
	readonly name: string
	/** Outermost modifier first, as written. */
	readonly modifiers: readonly GateModifier[]
	readonly parameters: readonly Expression[]
	readonly qubits: readonly Qubit[]
}

export interface Measurement extends Located {
	readonly kind: 'Measurement'
	readonly qubit: Qubit
	readonly target: MemoryReference | null
}

export interface Reset extends Located {
	readonly kind: 'Reset'
	/** null resets every qubit. */
	readonly qubit: Qubit | null
}

// ============================================================================
// Classical memory
// ============================================================================

export interface SharingOffset {
	readonly offset: number
	readonly type: ScalarType
}

export interface Declaration extends Located {
	readonly kind: 'Declaration'
	readonly name: string
	readonly size: { readonly type: ScalarType; readonly length: number }
	readonly sharing: {
		readonly name: string
		readonly offsets: readonly SharingOffset[]
	} | null
}

export type ArithmeticOperator = 'ADD' | 'DIV' | 'MUL' | 'SUB'

export interface Arithmetic extends Located {
	readonly kind: 'Arithmetic'
	readonly operator: ArithmeticOperator
	readonly destination: MemoryReference
	readonly source: ClassicalOperand
}

export interface Move extends Located {
	readonly kind: 'Move'
	readonly destination: MemoryReference
	readonly source: ClassicalOperand
}

export interface Exchange extends Located {
	readonly kind: 'Exchange'
	readonly left: MemoryReference
	readonly right: MemoryReference
}

export interface Convert extends Located {
	readonly kind: 'Convert'
	readonly destination: MemoryReference
	readonly source: MemoryReference
}

/** `LOAD destination region offset`: reads `region[offset]` with a dynamic index. */
export interface Load extends Located {
	readonly kind: 'Load'
	readonly destination: MemoryReference
	readonly source: string
	readonly offset: MemoryReference
}

/** `STORE region offset source`: writes `region[offset]` with a dynamic index. */
export interface Store extends Located {
	readonly kind: 'Store'
	readonly destination: string
	readonly offset: MemoryReference
	readonly source: ClassicalOperand
}

export type ComparisonOperator = 'EQ' | 'GE' | 'GT' | 'LE' | 'LT'

export interface Comparison extends Located {
	readonly kind: 'Comparison'
	readonly operator: ComparisonOperator
	readonly destination: MemoryReference
	readonly left: MemoryReference
	readonly right: ClassicalOperand
}

export type UnaryLogicOperator = 'NEG' | 'NOT'

export interface UnaryLogic extends Located {
	readonly kind: 'UnaryLogic'
	readonly operator: UnaryLogicOperator
	readonly operand: MemoryReference
}

export type BinaryLogicOperator = 'AND' | 'IOR' | 'XOR'

export interface BinaryLogic extends Located {
	readonly kind: 'BinaryLogic'
	readonly operator: BinaryLogicOperator
	readonly destination: MemoryReference
	readonly source: ClassicalOperand
}

// ============================================================================
// Control flow
// ============================================================================

export interface Label extends Located {
	readonly kind: 'Label'
	readonly name: string
}

export interface Jump extends Located {
	readonly kind: 'Jump'
	readonly target: string
}

export interface JumpWhen extends Located {
	readonly kind: 'JumpWhen'
	readonly target: string
	readonly condition: MemoryReference
}

export interface JumpUnless extends Located {
	readonly kind: 'JumpUnless'
	readonly target: string
	readonly condition: MemoryReference
}

export interface Halt extends Located {
	readonly kind: 'Halt'
}

export interface Wait extends Located {
	readonly kind: 'Wait'
}

export interface Nop extends Located {
	readonly kind: 'Nop'
}

export type PragmaArgument =
	| { readonly kind: 'Identifier'; readonly name: string }
	| { readonly kind: 'Integer'; readonly value: number }

export interface Pragma extends Located {
	readonly kind: 'Pragma'
	readonly name: string
	readonly arguments: readonly PragmaArgument[]
	readonly data: string | null
}

// ============================================================================
// Pulse-level
// ============================================================================

export interface Pulse extends Located {
	readonly kind: 'Pulse'
	readonly blocking: boolean
	readonly frame: Frame
	readonly waveform: WaveformInvocation
}

export interface Capture extends Located {
	readonly kind: 'Capture'
	readonly blocking: boolean
	readonly frame: Frame
	readonly waveform: WaveformInvocation
	readonly target: MemoryReference
}

export interface RawCapture extends Located {
	readonly kind: 'RawCapture'
	readonly blocking: boolean
	readonly frame: Frame
	readonly duration: Expression
	readonly target: MemoryReference
}

export interface Delay extends Located {
	readonly kind: 'Delay'
	readonly qubits: readonly Qubit[]
	/** Empty means every frame on `qubits`. */
	readonly frameNames: readonly string[]
	readonly duration: Expression
}

export interface Fence extends Located {
	readonly kind: 'Fence'
	/** Empty fences every qubit. */
	readonly qubits: readonly Qubit[]
}

export type FrameOperation =
	| 'SET-FREQUENCY'
	| 'SET-PHASE'
	| 'SET-SCALE'
	| 'SHIFT-FREQUENCY'
	| 'SHIFT-PHASE'

export const FRAME_OPERATIONS: readonly FrameOperation[] = [
	'SET-FREQUENCY',
	'SET-PHASE',
	'SET-SCALE',
	'SHIFT-FREQUENCY',
	'SHIFT-PHASE',
]

export interface FrameUpdate extends Located {
	readonly kind: 'FrameUpdate'
	readonly operation: FrameOperation
	readonly frame: Frame
	readonly value: Expression
}

export interface SwapPhases extends Located {
	readonly kind: 'SwapPhases'
	readonly left: Frame
	readonly right: Frame
}

// ============================================================================
// Definitions
// ============================================================================

export type GateSpecification =
	| { readonly kind: 'Matrix'; readonly rows: readonly (readonly Expression[])[] }
	| { readonly kind: 'Permutation'; readonly permutation: readonly number[] }

export interface GateDefinition extends Located {
	readonly kind: 'GateDefinition'
	readonly name: string
	/** Formal parameter names without `%`. */
	readonly parameters: readonly string[]
	readonly specification: GateSpecification
}

export interface CircuitDefinition extends Located {
	readonly kind: 'CircuitDefinition'
	readonly name: string
	readonly parameters: readonly string[]
	readonly qubits: readonly string[]
	readonly body: readonly Instruction[]
}

export interface CalibrationDefinition extends Located {
	readonly kind: 'CalibrationDefinition'
	readonly name: string
	readonly modifiers: readonly GateModifier[]
	readonly parameters: readonly Expression[]
	readonly qubits: readonly Qubit[]
	readonly body: readonly Instruction[]
}

export interface MeasureCalibrationDefinition extends Located {
	readonly kind: 'MeasureCalibrationDefinition'
	readonly qubit: Qubit
	/** Name the body uses for the readout destination, null for a discarding measurement. */
	readonly target: string | null
	readonly body: readonly Instruction[]
}

export type FrameAttributeValue =
	| { readonly kind: 'String'; readonly value: string }
	| { readonly kind: 'Expression'; readonly expression: Expression }

export interface FrameAttribute {
	readonly name: string
	readonly value: FrameAttributeValue
}

export interface FrameDefinition extends Located {
	readonly kind: 'FrameDefinition'
	readonly frame: Frame
	readonly attributes: readonly FrameAttribute[]
}

export interface WaveformDefinition extends Located {
	readonly kind: 'WaveformDefinition'
	readonly name: string
	readonly parameters: readonly string[]
	readonly samples: readonly Expression[]
}

// ============================================================================
// Union
// ============================================================================

export type Definition =
	| CalibrationDefinition
	| CircuitDefinition
	| FrameDefinition
	| GateDefinition
	| MeasureCalibrationDefinition
	| WaveformDefinition

export type Instruction =
	| Arithmetic
	| BinaryLogic
	| Capture
	| Comparison
	| Convert
	| Declaration
	| Definition
	| Delay
	| Exchange
	| Fence
	| FrameUpdate
	| Gate
	| Halt
	| Jump
	| JumpUnless
	| JumpWhen
	| Label
	| Load
	| Measurement
	| Move
	| Nop
	| Pragma
	| Pulse
	| RawCapture
	| Reset
	| Store
	| SwapPhases
	| UnaryLogic
	| Wait

export type InstructionKind = Instruction['kind']

/** Instructions that end a basic block. */
export type Terminator = Halt | Jump | JumpUnless | JumpWhen

export function isDefinition(instruction: Instruction): instruction is Definition {
	switch (instruction.kind) {
		case 'CalibrationDefinition':
		case 'CircuitDefinition':
		case 'FrameDefinition':
		case 'GateDefinition':
		case 'MeasureCalibrationDefinition':
		case 'WaveformDefinition':
			return true
		default:
			return false
	}
}

export function isTerminator(instruction: Instruction): instruction is Terminator {
	switch (instruction.kind) {
		case 'Halt':
		case 'Jump':
		case 'JumpUnless':
		case 'JumpWhen':
			return true
		default:
			return false
	}
}
