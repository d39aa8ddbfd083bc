/**
 * Canonical text output.
 *
 * One instruction per line, definition bodies indented by four spaces,
 * expressions with minimal parentheses. Comments and original spacing are not
 * kept. Parsing the output gives back the same items, and printing those again
 * gives the same text.
 */

import { InternalError } from '../core/errors.ts'
import { formatExpression } from '../expression/format.ts'
import type { Expression, MemoryReference } from '../expression/types.ts'
import type {
	ClassicalOperand,
	Frame,
	FrameAttribute,
	GateModifier,
	Instruction,
	PragmaArgument,
	Qubit,
	WaveformInvocation,
} from '../program/instructions.ts'
import type { Program } from '../program/program.ts'

export const INDENT = '    '

/** Region names printed without `[0]`: the target of an enclosing `DEFCAL MEASURE`. */
type BareNames = ReadonlySet<string>

const NO_BARE_NAMES: BareNames = new Set()

/** Integers print exactly; anything else would read back as a real or not at all. */
function formatInteger(value: number): string {
	if (!Number.isSafeInteger(value)) throw new InternalError(`cannot print ${value} as an integer literal`)
	return String(value)
}

function formatIndex(value: number): string {
	if (value < 0) throw new InternalError(`cannot print ${value} as an index`)
	return formatInteger(value)
}

export function formatQubit(qubit: Qubit): string {
	return qubit.kind === 'Fixed' ? formatIndex(qubit.index) : qubit.name
}

export function formatMemoryReference(reference: MemoryReference, bareNames = NO_BARE_NAMES): string {
	if (reference.index === 0 && bareNames.has(reference.name)) return reference.name
	return `${reference.name}[${formatIndex(reference.index)}]`
}

/** Quotes a string so the lexer reads back the same text. */
export function formatString(value: string): string {
	const escaped = value.replace(/[\\"\n\t]/g, (char) => {
		switch (char) {
			case '\n':
				return '\\n'
			case '\t':
				return '\\t'
			default:
				return `\\${char}`
		}
	})
	return `"${escaped}"`
}

/** Real literals always carry a `.` or an exponent so they read back as reals. */
function formatRealLiteral(value: number): string {
	if (!Number.isFinite(value)) throw new InternalError(`cannot print ${value} as a real literal`)
	const text = String(value)
	return /[.e]/.test(text) ? text : `${text}.0`
}

function formatOperand(operand: ClassicalOperand, bareNames: BareNames): string {
	switch (operand.kind) {
		case 'Memory':
			return formatMemoryReference(operand.reference, bareNames)
		case 'Integer':
			return formatInteger(operand.value)
		case 'Real':
			return formatRealLiteral(operand.value)
	}
}

function formatFrame(frame: Frame): string {
	return [...frame.qubits.map(formatQubit), formatString(frame.name)].join(' ')
}

function formatWaveform(waveform: WaveformInvocation): string {
	if (waveform.parameters.length === 0) return waveform.name
	const parameters = waveform.parameters.map((p) => `${p.name}: ${formatExpression(p.value)}`)
	return `${waveform.name}(${parameters.join(', ')})`
}

function formatArguments(expressions: readonly Expression[]): string {
	return expressions.length === 0 ? '' : `(${expressions.map(formatExpression).join(', ')})`
}

function formatFormalParameters(names: readonly string[]): string {
	return names.length === 0 ? '' : `(${names.map((n) => `%${n}`).join(', ')})`
}

function formatPragmaArgument(argument: PragmaArgument): string {
	return argument.kind === 'Identifier' ? argument.name : formatInteger(argument.value)
}

function formatFrameAttribute(attribute: FrameAttribute): string {
	const { value } = attribute
	const text = value.kind === 'String' ? formatString(value.value) : formatExpression(value.expression)
	return `${attribute.name}: ${text}`
}

/** Joins the non-empty parts of an instruction with single spaces. */
function words(...parts: readonly string[]): string {
	return parts.filter((part) => part !== '').join(' ')
}

function gateHead(modifiers: readonly GateModifier[], name: string, parameters: readonly Expression[]): string {
	return words(...modifiers, `${name}${formatArguments(parameters)}`)
}

function block(header: string, lines: readonly string[]): string {
	return [`${header}:`, ...lines.map((line) => `${INDENT}${line}`)].join('\n')
}

function body(instructions: readonly Instruction[], bareNames = NO_BARE_NAMES): string[] {
	return instructions.map((instruction) => formatItem(instruction, bareNames))
}

function nonblocking(blocking: boolean): string {
	return blocking ? '' : 'NONBLOCKING'
}

/**
 * Text of one instruction. Definitions span several lines; everything else is
 * a single line.
 */
export function formatInstruction(instruction: Instruction): string {
	return formatItem(instruction, NO_BARE_NAMES)
}

function formatItem(instruction: Instruction, bareNames: BareNames): string {
	const reference = (target: MemoryReference): string => formatMemoryReference(target, bareNames)
	switch (instruction.kind) {
		case 'Gate':
			return words(
				gateHead(instruction.modifiers, instruction.name, instruction.parameters),
				...instruction.qubits.map(formatQubit)
			)
		case 'Measurement':
			return words(
				'MEASURE',
				formatQubit(instruction.qubit),
				instruction.target === null ? '' : reference(instruction.target)
			)
		case 'Reset':
			return words('RESET', instruction.qubit === null ? '' : formatQubit(instruction.qubit))
		case 'Declaration': {
			const { length, type } = instruction.size
			const sharing =
				instruction.sharing === null
					? ''
					: words(
							'SHARING',
							instruction.sharing.name,
							...instruction.sharing.offsets.map((o) => `OFFSET ${formatIndex(o.offset)} ${o.type}`)
						)
			return words('DECLARE', instruction.name, length === 1 ? type : `${type}[${formatIndex(length)}]`, sharing)
		}
		case 'Arithmetic':
		case 'BinaryLogic':
			return words(
				instruction.operator,
				reference(instruction.destination),
				formatOperand(instruction.source, bareNames)
			)
		case 'Move':
			return words('MOVE', reference(instruction.destination), formatOperand(instruction.source, bareNames))
		case 'Exchange':
			return words('EXCHANGE', reference(instruction.left), reference(instruction.right))
		case 'Convert':
			return words(
				'CONVERT',
				reference(instruction.destination),
				reference(instruction.source)
			)
		case 'Load':
			return words(
				'LOAD',
				reference(instruction.destination),
				instruction.source,
				reference(instruction.offset)
			)
		case 'Store':
			return words(
				'STORE',
				instruction.destination,
				reference(instruction.offset),
				formatOperand(instruction.source, bareNames)
			)
		case 'Comparison':
			return words(
				instruction.operator,
				reference(instruction.destination),
				reference(instruction.left),
				formatOperand(instruction.right, bareNames)
			)
		case 'UnaryLogic':
			return words(instruction.operator, reference(instruction.operand))
		case 'Label':
			return `LABEL @${instruction.name}`
		case 'Jump':
			return `JUMP @${instruction.target}`
		case 'JumpWhen':
			return `JUMP-WHEN @${instruction.target} ${reference(instruction.condition)}`
		case 'JumpUnless':
			return `JUMP-UNLESS @${instruction.target} ${reference(instruction.condition)}`
		case 'Halt':
			return 'HALT'
		case 'Wait':
			return 'WAIT'
		case 'Nop':
			return 'NOP'
		case 'Pragma':
			return words(
				'PRAGMA',
				instruction.name,
				...instruction.arguments.map(formatPragmaArgument),
				instruction.data === null ? '' : formatString(instruction.data)
			)
		case 'Pulse':
			return words(
				nonblocking(instruction.blocking),
				'PULSE',
				formatFrame(instruction.frame),
				formatWaveform(instruction.waveform)
			)
		case 'Capture':
			return words(
				nonblocking(instruction.blocking),
				'CAPTURE',
				formatFrame(instruction.frame),
				formatWaveform(instruction.waveform),
				reference(instruction.target)
			)
		case 'RawCapture':
			return words(
				nonblocking(instruction.blocking),
				'RAW-CAPTURE',
				formatFrame(instruction.frame),
				formatExpression(instruction.duration),
				reference(instruction.target)
			)
		case 'Delay':
			return words(
				'DELAY',
				...instruction.qubits.map(formatQubit),
				...instruction.frameNames.map(formatString),
				formatExpression(instruction.duration)
			)
		case 'Fence':
			return words('FENCE', ...instruction.qubits.map(formatQubit))
		case 'FrameUpdate':
			return words(instruction.operation, formatFrame(instruction.frame), formatExpression(instruction.value))
		case 'SwapPhases':
			return words('SWAP-PHASES', formatFrame(instruction.left), formatFrame(instruction.right))
		case 'GateDefinition': {
			const { specification } = instruction
			const header = `DEFGATE ${instruction.name}${formatFormalParameters(instruction.parameters)}`
			if (specification.kind === 'Permutation') {
				return block(`${header} AS PERMUTATION`, [specification.permutation.map(formatIndex).join(', ')])
			}
			return block(
				header,
				specification.rows.map((row) => row.map(formatExpression).join(', '))
			)
		}
		case 'CircuitDefinition':
			return block(
				words(
					'DEFCIRCUIT',
					`${instruction.name}${formatFormalParameters(instruction.parameters)}`,
					...instruction.qubits
				),
				body(instruction.body)
			)
		case 'CalibrationDefinition':
			return block(
				words(
					'DEFCAL',
					gateHead(instruction.modifiers, instruction.name, instruction.parameters),
					...instruction.qubits.map(formatQubit)
				),
				body(instruction.body)
			)
		case 'MeasureCalibrationDefinition':
			return block(
				words('DEFCAL MEASURE', formatQubit(instruction.qubit), instruction.target ?? ''),
				body(instruction.body, instruction.target === null ? NO_BARE_NAMES : new Set([instruction.target]))
			)
		case 'FrameDefinition': {
			const header = `DEFFRAME ${formatFrame(instruction.frame)}`
			if (instruction.attributes.length === 0) return header
			return block(header, instruction.attributes.map(formatFrameAttribute))
		}
		case 'WaveformDefinition':
			return block(
				`DEFWAVEFORM ${instruction.name}${formatFormalParameters(instruction.parameters)}`,
				[instruction.samples.map(formatExpression).join(', ')]
			)
	}
}

/** Canonical text of a whole program, one item per line with a final newline. */
export function toText(program: Program): string {
	const items = program.items()
	return items.length === 0 ? '' : `${items.map((item) => formatInstruction(item)).join('\n')}\n`
}
