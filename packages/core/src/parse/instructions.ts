/**
 * Single-line instructions: everything except the DEF* blocks.
 */

import type { SourceLocation } from '../core/errors.ts'
import { type Token, TokenKind } from '../core/tokens.ts'
import type {
	ArithmeticOperator,
	BinaryLogicOperator,
	ComparisonOperator,
	Declaration,
	Delay,
	Gate,
	Instruction,
	PragmaArgument,
	Qubit,
	SharingOffset,
	UnaryLogicOperator,
} from '../program/instructions.ts'
import { FRAME_OPERATIONS } from '../program/instructions.ts'
import { parseExpressionList, parseExpressionSpan } from './expressions.ts'
import {
	isQubitToken,
	parseClassicalOperand,
	parseFrame,
	parseIndex,
	parseIntegerOperand,
	parseMemoryReference,
	parseModifiers,
	parseQubit,
	parseQubits,
	parseRegionName,
	parseScalarType,
	parseString,
	parseWaveformInvocation,
	QUBIT,
} from './operands.ts'
import {
	advance,
	atLineEnd,
	check,
	checkKeyword,
	expect,
	expectKeyword,
	expectLineEnd,
	fail,
	isLineEnd,
	matchToken,
	numberValue,
	type ParserState,
	peek,
	peekAt,
	text,
	tokenLocation,
} from './state.ts'

export const INSTRUCTION = 'an instruction'

const ARITHMETIC: readonly ArithmeticOperator[] = ['ADD', 'DIV', 'MUL', 'SUB']
const COMPARISON: readonly ComparisonOperator[] = ['EQ', 'GE', 'GT', 'LE', 'LT']
const UNARY_LOGIC: readonly UnaryLogicOperator[] = ['NEG', 'NOT']
const BINARY_LOGIC: readonly BinaryLogicOperator[] = ['AND', 'IOR', 'XOR']
const NONBLOCKING_COMMANDS = ['CAPTURE', 'PULSE', 'RAW-CAPTURE'] as const

function isOneOf<T extends string>(word: string, options: readonly T[]): word is T {
	return options.some((option) => option === word)
}

function labelName(state: ParserState): string {
	return text(state, expect(state, TokenKind.Label, 'a label'))
}

// ============================================================================
// Gate-level
// ============================================================================

function parseGate(state: ParserState, location: SourceLocation): Gate {
	const modifiers = parseModifiers(state)
	const name = text(state, expect(state, TokenKind.Identifier, 'a gate name'))

	const hasParameters = matchToken(state, TokenKind.LParen)
	const parameters = hasParameters ? parseExpressionList(state) : []
	if (hasParameters) expect(state, TokenKind.RParen, '")"')

	const qubits = parseQubits(state)
	if (qubits.length === 0) fail(state, hasParameters ? [QUBIT] : ['"("', QUBIT])
	return { kind: 'Gate', location, modifiers, name, parameters, qubits }
}

function parseMeasurement(state: ParserState, location: SourceLocation): Instruction {
	const qubit = parseQubit(state)
	const target = atLineEnd(state) ? null : parseMemoryReference(state)
	return { kind: 'Measurement', location, qubit, target }
}

function parseReset(state: ParserState, location: SourceLocation): Instruction {
	const qubit = atLineEnd(state) ? null : parseQubit(state)
	return { kind: 'Reset', location, qubit }
}

// ============================================================================
// Classical memory
// ============================================================================

function parseDeclaration(state: ParserState, location: SourceLocation): Declaration {
	const name = parseRegionName(state)
	const type = parseScalarType(state)
	let length = 1
	if (matchToken(state, TokenKind.LBracket)) {
		length = parseIndex(state)
		expect(state, TokenKind.RBracket, '"]"')
	}

	if (!checkKeyword(state, 'SHARING')) {
		return { kind: 'Declaration', location, name, sharing: null, size: { length, type } }
	}
	advance(state)
	const shared = parseRegionName(state)
	const offsets: SharingOffset[] = []
	while (checkKeyword(state, 'OFFSET')) {
		advance(state)
		const offset = parseIndex(state)
		offsets.push({ offset, type: parseScalarType(state) })
	}
	return {
		kind: 'Declaration',
		location,
		name,
		sharing: { name: shared, offsets },
		size: { length, type },
	}
}

function parseClassical(state: ParserState, keyword: string, location: SourceLocation): Instruction | null {
	if (isOneOf(keyword, ARITHMETIC)) {
		const destination = parseMemoryReference(state)
		return { destination, kind: 'Arithmetic', location, operator: keyword, source: parseClassicalOperand(state) }
	}
	if (isOneOf(keyword, COMPARISON)) {
		const destination = parseMemoryReference(state)
		const left = parseMemoryReference(state)
		return {
			destination,
			kind: 'Comparison',
			left,
			location,
			operator: keyword,
			right: parseClassicalOperand(state),
		}
	}
	if (isOneOf(keyword, UNARY_LOGIC)) {
		return { kind: 'UnaryLogic', location, operand: parseMemoryReference(state), operator: keyword }
	}
	if (isOneOf(keyword, BINARY_LOGIC)) {
		const destination = parseMemoryReference(state)
		return { destination, kind: 'BinaryLogic', location, operator: keyword, source: parseIntegerOperand(state) }
	}

	switch (keyword) {
		case 'MOVE': {
			const destination = parseMemoryReference(state)
			return { destination, kind: 'Move', location, source: parseClassicalOperand(state) }
		}
		case 'EXCHANGE': {
			const left = parseMemoryReference(state)
			return { kind: 'Exchange', left, location, right: parseMemoryReference(state) }
		}
		case 'CONVERT': {
			const destination = parseMemoryReference(state)
			return { destination, kind: 'Convert', location, source: parseMemoryReference(state) }
		}
		case 'LOAD': {
			const destination = parseMemoryReference(state)
			const source = parseRegionName(state)
			return { destination, kind: 'Load', location, offset: parseMemoryReference(state), source }
		}
		case 'STORE': {
			const destination = parseRegionName(state)
			const offset = parseMemoryReference(state)
			return { destination, kind: 'Store', location, offset, source: parseClassicalOperand(state) }
		}
		default:
			return null
	}
}

// ============================================================================
// Control flow
// ============================================================================

function parseControl(state: ParserState, keyword: string, location: SourceLocation): Instruction | null {
	switch (keyword) {
		case 'LABEL':
			return { kind: 'Label', location, name: labelName(state) }
		case 'JUMP':
			return { kind: 'Jump', location, target: labelName(state) }
		case 'JUMP-WHEN': {
			const target = labelName(state)
			return { condition: parseMemoryReference(state), kind: 'JumpWhen', location, target }
		}
		case 'JUMP-UNLESS': {
			const target = labelName(state)
			return { condition: parseMemoryReference(state), kind: 'JumpUnless', location, target }
		}
		case 'HALT':
			return { kind: 'Halt', location }
		case 'WAIT':
			return { kind: 'Wait', location }
		case 'NOP':
			return { kind: 'Nop', location }
		case 'RESET':
			return parseReset(state, location)
		case 'PRAGMA':
			return parsePragma(state, location)
		default:
			return null
	}
}

function parsePragma(state: ParserState, location: SourceLocation): Instruction {
	const head = peek(state)
	if (head.kind !== TokenKind.Identifier && head.kind !== TokenKind.Keyword) {
		fail(state, ['a pragma name'])
	}
	const name = text(state, advance(state))

	const args: PragmaArgument[] = []
	for (;;) {
		const token = peek(state)
		if (token.kind === TokenKind.Identifier || token.kind === TokenKind.Keyword) {
			args.push({ kind: 'Identifier', name: text(state, advance(state)) })
		} else if (token.kind === TokenKind.Integer) {
			args.push({ kind: 'Integer', value: numberValue(state, advance(state)) })
		} else {
			break
		}
	}
	const data = check(state, TokenKind.String) ? parseString(state) : null
	return { arguments: args, data, kind: 'Pragma', location, name }
}

// ============================================================================
// Pulse-level
// ============================================================================

/** Whether `next` continues an expression that begins at `last`. */
function continuesExpression(last: Token, next: Token): boolean {
	switch (next.kind) {
		case TokenKind.Caret:
		case TokenKind.LBracket:
		case TokenKind.Minus:
		case TokenKind.Plus:
		case TokenKind.Slash:
		case TokenKind.Star:
			return true
		case TokenKind.LParen:
			return last.kind === TokenKind.Identifier
		default:
			return isLineEnd(next)
	}
}

/**
 * `DELAY q+ "frame"* duration`. Without frame names the duration may itself look
 * like a qubit (`DELAY 0 1 100`), so the last qubit-like token starts the duration
 * whenever what follows it cannot end the qubit list.
 */
function parseDelay(state: ParserState, location: SourceLocation): Delay {
	let run = 0
	while (isQubitToken(peekAt(state, run))) run++
	const next = peekAt(state, run)
	const last = peekAt(state, run - 1)
	if (next.kind !== TokenKind.String && run >= 2 && continuesExpression(last, next)) run--
	if (run === 0) fail(state, [QUBIT])

	const qubits: Qubit[] = []
	for (let i = 0; i < run; i++) qubits.push(parseQubit(state))
	const frameNames: string[] = []
	while (check(state, TokenKind.String)) frameNames.push(parseString(state))
	return { duration: parseExpressionSpan(state), frameNames, kind: 'Delay', location, qubits }
}

/** Tokens before the trailing memory reference of a RAW-CAPTURE line. */
function durationLength(state: ParserState): number {
	let length = 0
	while (!isLineEnd(peekAt(state, length))) length++
	const indexed = length >= 4 && peekAt(state, length - 1).kind === TokenKind.RBracket
	return length - (indexed ? 4 : 1)
}

function parsePulseLevel(state: ParserState, keyword: string, location: SourceLocation): Instruction | null {
	const blocking = keyword !== 'NONBLOCKING'
	const command = blocking ? keyword : text(state, peek(state))
	if (!blocking) {
		if (!isOneOf(command, NONBLOCKING_COMMANDS)) {
			fail(state, ['"PULSE"', '"CAPTURE"', '"RAW-CAPTURE"'])
		}
		expectKeyword(state, command)
	}

	switch (command) {
		case 'PULSE': {
			const frame = parseFrame(state)
			return { blocking, frame, kind: 'Pulse', location, waveform: parseWaveformInvocation(state) }
		}
		case 'CAPTURE': {
			const frame = parseFrame(state)
			const waveform = parseWaveformInvocation(state)
			return { blocking, frame, kind: 'Capture', location, target: parseMemoryReference(state), waveform }
		}
		case 'RAW-CAPTURE': {
			const frame = parseFrame(state)
			const duration = parseExpressionSpan(state, durationLength(state))
			return { blocking, duration, frame, kind: 'RawCapture', location, target: parseMemoryReference(state) }
		}
		case 'DELAY':
			return parseDelay(state, location)
		case 'FENCE':
			return { kind: 'Fence', location, qubits: parseQubits(state) }
		case 'SWAP-PHASES': {
			const left = parseFrame(state)
			return { kind: 'SwapPhases', left, location, right: parseFrame(state) }
		}
		default:
			break
	}

	if (!isOneOf(command, FRAME_OPERATIONS)) return null
	const frame = parseFrame(state)
	return { frame, kind: 'FrameUpdate', location, operation: command, value: parseExpressionSpan(state) }
}

// ============================================================================
// Dispatch
// ============================================================================

function parseKeywordInstruction(state: ParserState, keyword: string, location: SourceLocation): Instruction | null {
	switch (keyword) {
		case 'CONTROLLED':
		case 'DAGGER':
		case 'FORKED':
			return parseGate(state, location)
		case 'MEASURE':
			advance(state)
			return parseMeasurement(state, location)
		case 'DECLARE':
			advance(state)
			return parseDeclaration(state, location)
		default:
			break
	}

	const start = state.pos
	advance(state)
	const instruction =
		parseClassical(state, keyword, location) ??
		parseControl(state, keyword, location) ??
		parsePulseLevel(state, keyword, location)
	if (instruction === null) state.pos = start
	return instruction
}

/**
 * Parses one instruction at the cursor, up to but not including the `;`,
 * newline or end of input that ends it.
 */
export function parseInstruction(state: ParserState): Instruction {
	const first = peek(state)
	const location = tokenLocation(first)

	let instruction: Instruction | null = null
	if (first.kind === TokenKind.Identifier) {
		instruction = parseGate(state, location)
	} else if (first.kind === TokenKind.Keyword) {
		instruction = parseKeywordInstruction(state, text(state, first), location)
	}
	if (instruction === null) fail(state, [INSTRUCTION], first)

	expectLineEnd(state)
	return instruction
}
