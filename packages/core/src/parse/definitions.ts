/**
 * DEF* blocks: a header ending in `:` followed by indented body lines.
 */

import { getDiagnostic, interpolateMessage } from '../core/diagnostics.ts'
import { ParseError, type SourceLocation } from '../core/errors.ts'
import { TokenKind } from '../core/tokens.ts'
import type { Expression } from '../expression/types.ts'
import type {
	Definition,
	FrameAttribute,
	GateSpecification,
	Instruction,
} from '../program/instructions.ts'
import { parseExpressionList, parseExpressionSpan } from './expressions.ts'
import { INSTRUCTION, parseInstruction } from './instructions.ts'
import {
	parseFormalParameters,
	parseFrame,
	parseIndex,
	parseModifiers,
	parseQubit,
	parseQubits,
	parseString,
	QUBIT,
} from './operands.ts'
import {
	advance,
	atLineEnd,
	check,
	checkKeyword,
	describeToken,
	expect,
	expectLineEnd,
	fail,
	matchToken,
	type ParserState,
	peek,
	peekAt,
	text,
	tokenLocation,
} from './state.ts'

export const DEFINITION_KEYWORDS: ReadonlySet<string> = new Set([
	'DEFCAL',
	'DEFCIRCUIT',
	'DEFFRAME',
	'DEFGATE',
	'DEFWAVEFORM',
])

export function atDefinition(state: ParserState): boolean {
	const token = peek(state)
	return token.kind === TokenKind.Keyword && DEFINITION_KEYWORDS.has(text(state, token))
}

// ============================================================================
// Body lines
// ============================================================================

/** Consumes the `:` that ends a header and requires the line to end there. */
function beginBody(state: ParserState): void {
	expect(state, TokenKind.Colon, '":"')
	if (!check(state, TokenKind.Newline) && !check(state, TokenKind.Eof)) fail(state, ['end of line'])
}

/**
 * Moves onto the next indented line of the current body, skipping blank lines.
 * Returns false, without consuming anything, when the body has ended.
 */
function nextBodyLine(state: ParserState): boolean {
	let ahead = 0
	while (peekAt(state, ahead).kind === TokenKind.Newline) ahead++
	if (peekAt(state, ahead).kind !== TokenKind.Indent) return false
	state.pos += ahead + 1
	return true
}

function nestedDefinition(state: ParserState): never {
	const token = peek(state)
	const keyword = text(state, token)
	const args = { keyword }
	const message = interpolateMessage(getDiagnostic('QTPARSE003').message, args)
	throw new ParseError('QTPARSE003', message, tokenLocation(token), [INSTRUCTION], describeToken(state, token), args)
}

/** Indented instructions; `;` separates several on one line. */
function parseInstructionBody(state: ParserState): Instruction[] {
	const body: Instruction[] = []
	while (nextBodyLine(state)) {
		do {
			if (atLineEnd(state)) break
			if (atDefinition(state)) nestedDefinition(state)
			body.push(parseInstruction(state))
		} while (matchToken(state, TokenKind.Semicolon))
		expectLineEnd(state)
	}
	return body
}

/** Indented lines of comma-separated expressions. */
function parseExpressionRows(state: ParserState): Expression[][] {
	const rows: Expression[][] = []
	while (nextBodyLine(state)) {
		rows.push(parseExpressionList(state))
		expectLineEnd(state)
	}
	if (rows.length === 0) fail(state, ['an indented row'])
	return rows
}

function parsePermutation(state: ParserState): number[] {
	const permutation: number[] = []
	while (nextBodyLine(state)) {
		do {
			permutation.push(parseIndex(state))
		} while (matchToken(state, TokenKind.Comma))
		expectLineEnd(state)
	}
	if (permutation.length === 0) fail(state, ['an indented row'])
	return permutation
}

// ============================================================================
// Definitions
// ============================================================================

function parseGateDefinition(state: ParserState, location: SourceLocation): Definition {
	const name = text(state, expect(state, TokenKind.Identifier, 'a gate name'))
	const parameters = parseFormalParameters(state)

	let kind: GateSpecification['kind'] = 'Matrix'
	if (checkKeyword(state, 'AS')) {
		advance(state)
		if (checkKeyword(state, 'PERMUTATION')) {
			kind = 'Permutation'
		} else if (!checkKeyword(state, 'MATRIX')) {
			fail(state, ['"MATRIX"', '"PERMUTATION"'])
		}
		advance(state)
	}

	beginBody(state)
	const specification: GateSpecification =
		kind === 'Matrix'
			? { kind, rows: parseExpressionRows(state) }
			: { kind, permutation: parsePermutation(state) }
	return { kind: 'GateDefinition', location, name, parameters, specification }
}

function parseCircuitDefinition(state: ParserState, location: SourceLocation): Definition {
	const name = text(state, expect(state, TokenKind.Identifier, 'a circuit name'))
	const parameters = parseFormalParameters(state)
	const qubits: string[] = []
	while (check(state, TokenKind.Identifier)) qubits.push(text(state, advance(state)))

	beginBody(state)
	return {
		body: parseInstructionBody(state),
		kind: 'CircuitDefinition',
		location,
		name,
		parameters,
		qubits,
	}
}

function parseCalibration(state: ParserState, location: SourceLocation): Definition {
	if (checkKeyword(state, 'MEASURE')) {
		advance(state)
		const qubit = parseQubit(state)
		const target = check(state, TokenKind.Identifier) ? text(state, advance(state)) : null
		beginBody(state)
		return {
			body: parseInstructionBody(state),
			kind: 'MeasureCalibrationDefinition',
			location,
			qubit,
			target,
		}
	}

	const modifiers = parseModifiers(state)
	const name = text(state, expect(state, TokenKind.Identifier, 'a gate name'))
	const hasParameters = matchToken(state, TokenKind.LParen)
	const parameters = hasParameters ? parseExpressionList(state) : []
	if (hasParameters) expect(state, TokenKind.RParen, '")"')
	const qubits = parseQubits(state)
	if (qubits.length === 0) fail(state, hasParameters ? [QUBIT] : ['"("', QUBIT])

	beginBody(state)
	return {
		body: parseInstructionBody(state),
		kind: 'CalibrationDefinition',
		location,
		modifiers,
		name,
		parameters,
		qubits,
	}
}

function parseFrameAttribute(state: ParserState): FrameAttribute {
	const head = peek(state)
	if (head.kind !== TokenKind.Identifier && head.kind !== TokenKind.Keyword) {
		fail(state, ['an attribute name'])
	}
	const name = text(state, advance(state))
	expect(state, TokenKind.Colon, '":"')
	const value: FrameAttribute['value'] = check(state, TokenKind.String)
		? { kind: 'String', value: parseString(state) }
		: { expression: parseExpressionSpan(state), kind: 'Expression' }
	expectLineEnd(state)
	return { name, value }
}

function parseFrameDefinition(state: ParserState, location: SourceLocation): Definition {
	const frame = parseFrame(state)
	const attributes: FrameAttribute[] = []
	if (check(state, TokenKind.Colon)) {
		beginBody(state)
		while (nextBodyLine(state)) attributes.push(parseFrameAttribute(state))
	}
	return { attributes, frame, kind: 'FrameDefinition', location }
}

function parseWaveformDefinition(state: ParserState, location: SourceLocation): Definition {
	const name = text(state, expect(state, TokenKind.Identifier, 'a waveform name'))
	const parameters = parseFormalParameters(state)
	beginBody(state)
	return {
		kind: 'WaveformDefinition',
		location,
		name,
		parameters,
		samples: parseExpressionRows(state).flat(),
	}
}

/**
 * Parses the DEF* block at the cursor, leaving the cursor on the line end that
 * follows its last body line.
 */
export function parseDefinition(state: ParserState): Definition {
	const head = advance(state)
	const location = tokenLocation(head)
	switch (text(state, head)) {
		case 'DEFGATE':
			return parseGateDefinition(state, location)
		case 'DEFCIRCUIT':
			return parseCircuitDefinition(state, location)
		case 'DEFCAL':
			return parseCalibration(state, location)
		case 'DEFFRAME':
			return parseFrameDefinition(state, location)
		case 'DEFWAVEFORM':
			return parseWaveformDefinition(state, location)
		default:
			return fail(state, ['a definition'], head)
	}
}
