import { Buffer } from 'node:buffer'
import { getDiagnostic, interpolateMessage } from '../core/diagnostics.ts'
import { ParseError, type SourceLocation } from '../core/errors.ts'
import { matchExpression } from './grammar.ts'
import type { Expression } from './types.ts'

function locationAt(source: string, offset: number): SourceLocation {
	let line = 1
	let lineStart = 0
	for (let i = 0; i < offset && i < source.length; i++) {
		if (source[i] === '\n') {
			line++
			lineStart = i + 1
		}
	}
	const bytes = Buffer.byteLength(source.slice(0, offset), 'utf8')
	return { column: offset - lineStart + 1, line, offset: bytes }
}

function describeAt(source: string, offset: number): string {
	const codePoint = source.codePointAt(offset)
	return codePoint === undefined ? 'end of input' : JSON.stringify(String.fromCodePoint(codePoint))
}

/**
 * Parses standalone expression text such as `2*pi*%theta`.
 *
 * @throws {ParseError} QTPARSE002 at the first character no rule could continue from.
 */
export function parseExpression(source: string): Expression {
	const match = matchExpression(source)
	if (match.succeeded) return match.expression

	const found = describeAt(source, match.offset)
	const args = { expected: match.expected, found }
	const message = interpolateMessage(getDiagnostic('QTPARSE002').message, args)
	throw new ParseError('QTPARSE002', message, locationAt(source, match.offset), [match.expected], found, args)
}
