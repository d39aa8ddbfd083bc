/**
 * Error classes thrown across the public API.
 *
 * LexError and ParseError are fatal and carry the location of the first problem.
 * ExpressionError is only raised when evaluating. InternalError marks a defect in
 * this library, never a problem with the input program.
 */

import type { DiagnosticArgs, DiagnosticCode } from './diagnostics.ts'

export interface SourceLocation {
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** UTF-8 byte offset from the start of the source (0-indexed) */
	readonly offset: number
}

export class LexError extends Error {
	readonly code: DiagnosticCode
	readonly location: SourceLocation
	/** The offending character, or `"` for an unterminated string. */
	readonly character: string

	constructor(code: DiagnosticCode, message: string, location: SourceLocation, character: string) {
		super(`${message} at ${location.line}:${location.column}`)
		this.name = 'LexError'
		this.code = code
		this.location = location
		this.character = character
	}

	get line(): number {
		return this.location.line
	}

	get column(): number {
		return this.location.column
	}
}

export class ParseError extends Error {
	readonly code: DiagnosticCode
	readonly location: SourceLocation
	/** Descriptions of what would have been accepted here, e.g. `a qubit index`. */
	readonly expected: readonly string[]
	/** Description of the token that was found instead. */
	readonly found: string
	/** Arguments the message was interpolated from. */
	readonly args: DiagnosticArgs

	constructor(
		code: DiagnosticCode,
		message: string,
		location: SourceLocation,
		expected: readonly string[],
		found: string,
		args: DiagnosticArgs = {}
	) {
		super(`${message} at ${location.line}:${location.column}`)
		this.name = 'ParseError'
		this.code = code
		this.location = location
		this.expected = expected
		this.found = found
		this.args = args
	}

	get line(): number {
		return this.location.line
	}

	get column(): number {
		return this.location.column
	}
}

export type ExpressionErrorKind = 'DivisionByZero' | 'Incomplete'

export class ExpressionError extends Error {
	readonly kind: ExpressionErrorKind
	readonly code: DiagnosticCode

	constructor(kind: ExpressionErrorKind, message: string) {
		super(message)
		this.name = 'ExpressionError'
		this.kind = kind
		this.code = kind === 'DivisionByZero' ? 'QTEXPR001' : 'QTEXPR002'
	}
}

export class InternalError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'InternalError'
	}
}
