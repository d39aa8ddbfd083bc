/**
 * Token cursor shared by the parser modules.
 *
 * Parsing is fail-fast: every helper that cannot continue throws a ParseError
 * for the current token, and parseProgram turns the first one into a diagnostic.
 */

import type { SourceContext } from '../core/context.ts'
import { getDiagnostic, interpolateMessage } from '../core/diagnostics.ts'
import { ParseError, type SourceLocation } from '../core/errors.ts'
import { punctuationText, type Token, TokenKind, tokenId } from '../core/tokens.ts'

export interface ParserState {
	readonly context: SourceContext
	/** Index of the next unread token. */
	pos: number
}

export function createParserState(context: SourceContext): ParserState {
	return { context, pos: 0 }
}

export function peekAt(state: ParserState, ahead: number): Token {
	const last = state.context.tokens.count() - 1
	return state.context.tokens.get(tokenId(Math.min(state.pos + ahead, last)))
}

export function peek(state: ParserState): Token {
	return peekAt(state, 0)
}

export function advance(state: ParserState): Token {
	const token = peek(state)
	if (token.kind !== TokenKind.Eof) state.pos++
	return token
}

export function check(state: ParserState, kind: TokenKind): boolean {
	return peek(state).kind === kind
}

export function checkKeyword(state: ParserState, keyword: string): boolean {
	const token = peek(state)
	return token.kind === TokenKind.Keyword && state.context.text(token) === keyword
}

export function matchToken(state: ParserState, kind: TokenKind): boolean {
	if (!check(state, kind)) return false
	advance(state)
	return true
}

/** Newline, `;` and end of input all end an instruction. */
export function isLineEnd(token: Token): boolean {
	return (
		token.kind === TokenKind.Newline ||
		token.kind === TokenKind.Semicolon ||
		token.kind === TokenKind.Eof
	)
}

export function atLineEnd(state: ParserState): boolean {
	return isLineEnd(peek(state))
}

export function tokenLocation(token: Token): SourceLocation {
	return { column: token.column, line: token.line, offset: token.offset }
}

/** How a token is named in "found ..." messages. */
export function describeToken(state: ParserState, token: Token): string {
	switch (token.kind) {
		case TokenKind.Eof:
			return 'end of input'
		case TokenKind.Newline:
			return 'end of line'
		case TokenKind.Indent:
			return 'indentation'
		case TokenKind.String:
			return JSON.stringify(state.context.text(token))
		case TokenKind.Variable:
			return `"%${state.context.text(token)}"`
		case TokenKind.Label:
			return `"@${state.context.text(token)}"`
		default:
			return `"${punctuationText(token.kind) ?? state.context.text(token)}"`
	}
}

export function formatExpected(expected: readonly string[]): string {
	if (expected.length <= 1) return expected[0] ?? 'nothing'
	return `${expected.slice(0, -1).join(', ')} or ${expected[expected.length - 1]}`
}

/** Throws QTPARSE001 at `token`, or at the current token. */
export function fail(state: ParserState, expected: readonly string[], token = peek(state)): never {
	const found = describeToken(state, token)
	const args = { expected: formatExpected(expected), found }
	const message = interpolateMessage(getDiagnostic('QTPARSE001').message, args)
	throw new ParseError('QTPARSE001', message, tokenLocation(token), expected, found, args)
}

export function expect(state: ParserState, kind: TokenKind, description: string): Token {
	if (!check(state, kind)) fail(state, [description])
	return advance(state)
}

export function expectKeyword(state: ParserState, keyword: string): Token {
	if (!checkKeyword(state, keyword)) fail(state, [`"${keyword}"`])
	return advance(state)
}

/** Expects the end of the instruction without consuming it. */
export function expectLineEnd(state: ParserState): void {
	if (!atLineEnd(state)) fail(state, ['end of line'])
}

export function text(state: ParserState, token: Token): string {
	return state.context.text(token)
}

export const NUMBER_IN_RANGE = 'a number in range'

/**
 * Value of an Integer or Float token. Integers must be exact (safe integers)
 * and floats finite, so that printing the value reads back as the same literal.
 */
export function numberValue(state: ParserState, token: Token): number {
	const value = Number(text(state, token))
	const inRange =
		token.kind === TokenKind.Integer ? Number.isSafeInteger(value) : Number.isFinite(value)
	if (!inRange) fail(state, [NUMBER_IN_RANGE], token)
	return value
}
