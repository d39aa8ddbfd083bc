import type { Token } from '../core/tokens.ts'
import { TokenKind } from '../core/tokens.ts'
import type { MemoryReference } from '../expression/types.ts'
import type {
	ClassicalOperand,
	Frame,
	GateModifier,
	Qubit,
	ScalarType,
	WaveformInvocation,
	WaveformParameter,
} from '../program/instructions.ts'
import { SCALAR_TYPES } from '../program/instructions.ts'
import { parseExpressionSpan } from './expressions.ts'
import {
	advance,
	check,
	checkKeyword,
	expect,
	fail,
	matchToken,
	numberValue,
	type ParserState,
	peek,
	peekAt,
	text,
} from './state.ts'

export const QUBIT = 'a qubit index'
export const MEMORY_REFERENCE = 'a memory reference'

/** Integer, identifier or `%variable`: anything that can name a qubit. */
export function isQubitToken(token: Token): boolean {
	return (
		token.kind === TokenKind.Integer ||
		token.kind === TokenKind.Identifier ||
		token.kind === TokenKind.Variable
	)
}

export function parseQubit(state: ParserState): Qubit {
	const token = peek(state)
	if (!isQubitToken(token)) fail(state, [QUBIT])
	advance(state)
	if (token.kind === TokenKind.Integer) {
		return { index: numberValue(state, token), kind: 'Fixed' }
	}
	return { kind: 'Variable', name: text(state, token) }
}

/** Zero or more qubits. */
export function parseQubits(state: ParserState): Qubit[] {
	const qubits: Qubit[] = []
	while (isQubitToken(peek(state))) qubits.push(parseQubit(state))
	return qubits
}

export function parseIndex(state: ParserState): number {
	const token = expect(state, TokenKind.Integer, 'an index')
	return numberValue(state, token)
}

/** `name` or `name[index]`; a bare name refers to element 0. */
export function parseMemoryReference(state: ParserState): MemoryReference {
	const name = text(state, expect(state, TokenKind.Identifier, MEMORY_REFERENCE))
	if (!matchToken(state, TokenKind.LBracket)) return { index: 0, name }
	const index = parseIndex(state)
	expect(state, TokenKind.RBracket, '"]"')
	return { index, name }
}

export function parseRegionName(state: ParserState): string {
	return text(state, expect(state, TokenKind.Identifier, 'a memory region'))
}

function parseSignedNumber(state: ParserState, integerOnly: boolean): ClassicalOperand | null {
	const negative = check(state, TokenKind.Minus) ? peekAt(state, 1) : null
	const token = negative ?? peek(state)
	const isInteger = token.kind === TokenKind.Integer
	if (!isInteger && (integerOnly || token.kind !== TokenKind.Float)) return null

	if (negative) advance(state)
	advance(state)
	const magnitude = numberValue(state, token)
	const value = negative && magnitude !== 0 ? -magnitude : magnitude
	return isInteger ? { kind: 'Integer', value } : { kind: 'Real', value }
}

/** A memory reference or a signed literal. */
export function parseClassicalOperand(state: ParserState): ClassicalOperand {
	if (check(state, TokenKind.Identifier)) {
		return { kind: 'Memory', reference: parseMemoryReference(state) }
	}
	const literal = parseSignedNumber(state, false)
	if (literal === null) fail(state, [MEMORY_REFERENCE, 'a number'])
	return literal
}

/** A memory reference or a signed integer, for the bitwise instructions. */
export function parseIntegerOperand(state: ParserState): ClassicalOperand {
	if (check(state, TokenKind.Identifier)) {
		return { kind: 'Memory', reference: parseMemoryReference(state) }
	}
	const literal = parseSignedNumber(state, true)
	if (literal === null) fail(state, [MEMORY_REFERENCE, 'an integer'])
	return literal
}

function isScalarType(word: string): word is ScalarType {
	return SCALAR_TYPES.some((type) => type === word)
}

export function parseScalarType(state: ParserState): ScalarType {
	const token = peek(state)
	const word = text(state, token)
	if (token.kind !== TokenKind.Keyword || !isScalarType(word)) {
		fail(state, ['BIT', 'INTEGER', 'OCTET', 'REAL'])
	}
	advance(state)
	return word
}

export function parseString(state: ParserState, description = 'a string'): string {
	return text(state, expect(state, TokenKind.String, description))
}

/** One or more qubits followed by the frame name, e.g. `0 1 "cz"`. */
export function parseFrame(state: ParserState): Frame {
	if (!isQubitToken(peek(state))) fail(state, [QUBIT])
	const qubits = parseQubits(state)
	const name = parseString(state, 'a frame name')
	return { name, qubits }
}

function parseWaveformParameter(state: ParserState): WaveformParameter {
	const name = text(state, expect(state, TokenKind.Identifier, 'a parameter name'))
	expect(state, TokenKind.Colon, '":"')
	return { name, value: parseExpressionSpan(state) }
}

/** `name` or `name(param: value, ...)`. */
export function parseWaveformInvocation(state: ParserState): WaveformInvocation {
	const name = text(state, expect(state, TokenKind.Identifier, 'a waveform name'))
	const parameters: WaveformParameter[] = []
	if (matchToken(state, TokenKind.LParen)) {
		do {
			parameters.push(parseWaveformParameter(state))
		} while (matchToken(state, TokenKind.Comma))
		expect(state, TokenKind.RParen, '")"')
	}
	return { name, parameters }
}

const MODIFIERS: readonly GateModifier[] = ['CONTROLLED', 'DAGGER', 'FORKED']

/** Leading CONTROLLED / DAGGER / FORKED keywords, outermost first. */
export function parseModifiers(state: ParserState): GateModifier[] {
	const modifiers: GateModifier[] = []
	for (;;) {
		const modifier = MODIFIERS.find((m) => checkKeyword(state, m))
		if (modifier === undefined) return modifiers
		advance(state)
		modifiers.push(modifier)
	}
}

/** `(%a, %b)` formal parameter names, without the `%`. */
export function parseFormalParameters(state: ParserState): string[] {
	const names: string[] = []
	if (!matchToken(state, TokenKind.LParen)) return names
	do {
		names.push(text(state, expect(state, TokenKind.Variable, 'a parameter')))
	} while (matchToken(state, TokenKind.Comma))
	expect(state, TokenKind.RParen, '")"')
	return names
}
