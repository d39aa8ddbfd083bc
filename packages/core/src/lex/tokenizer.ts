import { Buffer } from 'node:buffer'
import type { SourceContext } from '../core/context.ts'
import { type DiagnosticCode, getDiagnostic, interpolateMessage } from '../core/diagnostics.ts'
import { LexError, type SourceLocation } from '../core/errors.ts'
import { TokenKind } from '../core/tokens.ts'
import { isKeyword } from './keywords.ts'

export interface TokenizeResult {
	succeeded: boolean
	/** The first (and only) lexical error when `succeeded` is false. */
	error?: LexError
}

interface TokenizerState {
	readonly source: string
	pos: number
	line: number
	/** Offset where the current line starts. */
	lineStart: number
	/** Position of the last location taken and its UTF-8 byte offset. */
	byteMark: number
	byteOffset: number
	error: LexError | null
}

const UTF8_BOM = '\uFEFF'

const PUNCTUATION: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
	['(', TokenKind.LParen],
	[')', TokenKind.RParen],
	['*', TokenKind.Star],
	['+', TokenKind.Plus],
	[',', TokenKind.Comma],
	['-', TokenKind.Minus],
	['/', TokenKind.Slash],
	[':', TokenKind.Colon],
	[';', TokenKind.Semicolon],
	['[', TokenKind.LBracket],
	[']', TokenKind.RBracket],
	['^', TokenKind.Caret],
])

const ESCAPES: Readonly<Record<string, string>> = {
	n: '\n',
	t: '\t',
}

function isDigit(char: string | undefined): boolean {
	return char !== undefined && char >= '0' && char <= '9'
}

function isIdentifierStart(char: string | undefined): boolean {
	return char !== undefined && /[A-Za-z_]/.test(char)
}

function isIdentifierPart(char: string | undefined): boolean {
	return char !== undefined && /[A-Za-z0-9_-]/.test(char)
}

function isInlineWhitespace(char: string | undefined): boolean {
	return char === ' ' || char === '\t' || char === '\r'
}

/** Locations are taken in source order, so the byte offset only ever moves forward. */
function location(state: TokenizerState): SourceLocation {
	state.byteOffset += Buffer.byteLength(state.source.slice(state.byteMark, state.pos), 'utf8')
	state.byteMark = state.pos
	return { column: state.pos - state.lineStart + 1, line: state.line, offset: state.byteOffset }
}

function addToken(
	context: SourceContext,
	kind: TokenKind,
	at: SourceLocation,
	text: string
): void {
	context.tokens.add({
		column: at.column,
		kind,
		line: at.line,
		offset: at.offset,
		text: context.strings.intern(text),
	})
}

function fail(
	state: TokenizerState,
	context: SourceContext,
	code: DiagnosticCode,
	at: SourceLocation,
	character: string
): void {
	const args = { character: JSON.stringify(character) }
	const message = interpolateMessage(getDiagnostic(code).message, args)
	context.emit(code, at.line, at.column, args)
	state.error = new LexError(code, message, at, character)
}

/**
 * Leading whitespace followed by content on the same line becomes a single
 * Indent token at column 1. Blank and comment-only lines produce none.
 */
function scanIndent(state: TokenizerState, context: SourceContext): void {
	const { source } = state
	let end = state.pos
	while (source[end] === ' ' || source[end] === '\t') end++
	if (end === state.pos) return

	const next = source[end]
	if (next !== undefined && next !== '\n' && next !== '\r' && next !== '#') {
		addToken(context, TokenKind.Indent, location(state), '')
	}
	state.pos = end
}

/** End of an identifier starting at `start`; identifiers never end in `-`. */
function identifierEnd(source: string, start: number): number {
	let end = start + 1
	while (isIdentifierPart(source[end])) end++
	while (source[end - 1] === '-') end--
	return end
}

function scanWord(state: TokenizerState, context: SourceContext): void {
	const start = location(state)
	const end = identifierEnd(state.source, state.pos)
	const word = state.source.slice(state.pos, end)
	addToken(context, isKeyword(word) ? TokenKind.Keyword : TokenKind.Identifier, start, word)
	state.pos = end
}

function skipDigits(source: string, pos: number): number {
	let end = pos
	while (isDigit(source[end])) end++
	return end
}

/** Integer (`42`), decimal (`1.5`, `1.`, `.5`) or scientific (`2e9`, `1.5E-3`). */
function scanNumber(state: TokenizerState, context: SourceContext): void {
	const { source } = state
	const start = location(state)
	let end = skipDigits(source, state.pos)
	let isFloat = false

	if (source[end] === '.') {
		isFloat = true
		end = skipDigits(source, end + 1)
	}

	if (source[end] === 'e' || source[end] === 'E') {
		let exponent = end + 1
		if (source[exponent] === '+' || source[exponent] === '-') exponent++
		if (isDigit(source[exponent])) {
			isFloat = true
			end = skipDigits(source, exponent)
		}
	}

	addToken(context, isFloat ? TokenKind.Float : TokenKind.Integer, start, source.slice(state.pos, end))
	state.pos = end
}

function scanString(state: TokenizerState, context: SourceContext): void {
	const { source } = state
	const start = location(state)
	let pos = state.pos + 1
	let value = ''

	for (;;) {
		const char = source[pos]
		if (char === undefined || char === '\n') {
			fail(state, context, 'QTLEX002', start, '"')
			return
		}
		if (char === '"') break
		if (char === '\\') {
			const escaped = source[pos + 1]
			if (escaped === undefined || escaped === '\n') {
				fail(state, context, 'QTLEX002', start, '"')
				return
			}
			value += ESCAPES[escaped] ?? escaped
			pos += 2
			continue
		}
		value += char
		pos++
	}

	addToken(context, TokenKind.String, start, value)
	state.pos = pos + 1
}

/** `%name` (parameter) or `@name` (label). */
function scanSigilName(state: TokenizerState, context: SourceContext, sigil: '%' | '@'): void {
	const start = location(state)
	const nameStart = state.pos + 1
	if (!isIdentifierStart(state.source[nameStart])) {
		fail(state, context, 'QTLEX001', start, sigil)
		return
	}
	const end = identifierEnd(state.source, nameStart)
	const kind = sigil === '%' ? TokenKind.Variable : TokenKind.Label
	addToken(context, kind, start, state.source.slice(nameStart, end))
	state.pos = end
}

function scanNewline(state: TokenizerState, context: SourceContext): void {
	addToken(context, TokenKind.Newline, location(state), '')
	state.pos++
	state.line++
	state.lineStart = state.pos
}

function skipComment(state: TokenizerState): void {
	while (state.pos < state.source.length && state.source[state.pos] !== '\n') state.pos++
}

function scanToken(state: TokenizerState, context: SourceContext): void {
	const codePoint = state.source.codePointAt(state.pos)
	const char = codePoint === undefined ? '' : String.fromCodePoint(codePoint)

	if (isInlineWhitespace(char)) {
		state.pos++
		return
	}
	if (char === '\n') return scanNewline(state, context)
	if (char === '#') return skipComment(state)
	if (char === '"') return scanString(state, context)
	if (char === '%' || char === '@') return scanSigilName(state, context, char)
	if (isDigit(char) || (char === '.' && isDigit(state.source[state.pos + 1]))) {
		return scanNumber(state, context)
	}
	if (isIdentifierStart(char)) return scanWord(state, context)

	const kind = PUNCTUATION.get(char)
	if (kind === undefined) {
		fail(state, context, 'QTLEX001', location(state), char)
		return
	}
	addToken(context, kind, location(state), char)
	state.pos++
}

function createTokenizerState(source: string): TokenizerState {
	const start = source.startsWith(UTF8_BOM) ? 1 : 0
	return { byteMark: 0, byteOffset: 0, error: null, line: 1, lineStart: start, pos: start, source }
}

/**
 * Tokenizes the whole source, populating context.tokens.
 * Stops at the first lexical error; the token stream always ends with Eof.
 */
export function tokenize(context: SourceContext): TokenizeResult {
	const state = createTokenizerState(context.source)

	while (state.pos < state.source.length && state.error === null) {
		if (state.pos === state.lineStart) {
			scanIndent(state, context)
			if (state.pos >= state.source.length) break
		}
		scanToken(state, context)
	}

	addToken(context, TokenKind.Eof, location(state), '')
	return state.error === null ? { succeeded: true } : { error: state.error, succeeded: false }
}
