/**
 * Expression spans.
 *
 * Instructions embed arithmetic between other operands. The parser collects the
 * longest run of expression tokens, prints it back as text and hands that text to
 * the ohm expression grammar. Each token's offset in the printed text is kept so a
 * grammar failure is reported at the token where it happened.
 */

import { getDiagnostic, interpolateMessage } from '../core/diagnostics.ts'
import { ParseError } from '../core/errors.ts'
import { punctuationText, type Token, TokenKind } from '../core/tokens.ts'
import { matchExpression } from '../expression/grammar.ts'
import type { Expression } from '../expression/types.ts'
import { describeToken, fail, type ParserState, peekAt, text, tokenLocation } from './state.ts'

const EXPRESSION_TOKENS: ReadonlySet<number> = new Set<number>([
	TokenKind.Caret,
	TokenKind.Float,
	TokenKind.Identifier,
	TokenKind.Integer,
	TokenKind.LBracket,
	TokenKind.LParen,
	TokenKind.Minus,
	TokenKind.Plus,
	TokenKind.RBracket,
	TokenKind.RParen,
	TokenKind.Slash,
	TokenKind.Star,
	TokenKind.Variable,
])

interface Span {
	readonly tokens: readonly Token[]
	/** Offset of each token within `source`. */
	readonly starts: readonly number[]
	readonly source: string
}

function tokenSource(state: ParserState, token: Token): string {
	if (token.kind === TokenKind.Variable) return `%${text(state, token)}`
	return punctuationText(token.kind) ?? text(state, token)
}

/**
 * Number of tokens, starting at the cursor, that can belong to one expression.
 * Stops at a closing bracket with no matching opener so `RX(theta)` leaves the `)`.
 */
function spanLength(state: ParserState, limit: number): number {
	let depth = 0
	let length = 0
	while (length < limit) {
		const token = peekAt(state, length)
		if (!EXPRESSION_TOKENS.has(token.kind)) break
		if (token.kind === TokenKind.LParen || token.kind === TokenKind.LBracket) depth++
		if (token.kind === TokenKind.RParen || token.kind === TokenKind.RBracket) {
			if (depth === 0) break
			depth--
		}
		length++
	}
	return length
}

function collectSpan(state: ParserState, length: number): Span {
	const tokens: Token[] = []
	const starts: number[] = []
	const parts: string[] = []
	let offset = 0
	for (let i = 0; i < length; i++) {
		const token = peekAt(state, i)
		const source = tokenSource(state, token)
		tokens.push(token)
		starts.push(offset)
		parts.push(source)
		offset += source.length + 1
	}
	return { source: parts.join(' '), starts, tokens }
}

/** The span token at or after `offset`, or the token following the span. */
function tokenAtOffset(state: ParserState, span: Span, offset: number): Token {
	for (let i = 0; i < span.tokens.length; i++) {
		const token = span.tokens[i]
		const start = span.starts[i]
		if (token === undefined || start === undefined) break
		if (offset < start + tokenSource(state, token).length) return token
	}
	return peekAt(state, span.tokens.length)
}

function invalidExpression(state: ParserState, token: Token, expected: string): never {
	const found = describeToken(state, token)
	const args = { expected, found }
	const message = interpolateMessage(getDiagnostic('QTPARSE002').message, args)
	throw new ParseError('QTPARSE002', message, tokenLocation(token), [expected], found, args)
}

/**
 * Parses the expression starting at the cursor, reading at most `limit` tokens.
 */
export function parseExpressionSpan(state: ParserState, limit = Number.POSITIVE_INFINITY): Expression {
	const length = spanLength(state, limit)
	if (length === 0) fail(state, ['an expression'])

	const span = collectSpan(state, length)
	const match = matchExpression(span.source)
	if (!match.succeeded) {
		invalidExpression(state, tokenAtOffset(state, span, match.offset), match.expected)
	}
	state.pos += length
	return match.expression
}

/** Comma-separated expressions up to a closing `)`; the parentheses are not consumed. */
export function parseExpressionList(state: ParserState): Expression[] {
	const expressions = [parseExpressionSpan(state)]
	while (peekAt(state, 0).kind === TokenKind.Comma) {
		state.pos++
		expressions.push(parseExpressionSpan(state))
	}
	return expressions
}
