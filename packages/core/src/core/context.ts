/**
 * Source context that flows through lexing and parsing.
 * Owns the source text, the string and token stores, and the collected diagnostics.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	severityLabel,
} from './diagnostics.ts'
import { type Token, type TokenId, TokenStore } from './tokens.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed) */
	readonly column: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
	/** Token associated with this diagnostic (if available) */
	readonly tokenId?: TokenId
}

/**
 * Branded type for string IDs.
 * Used for lexemes interned in StringStore.
 */
export type StringId = number & { readonly __brand: 'StringId' }

export function stringId(n: number): StringId {
	return n as StringId
}

/**
 * Dense array storage for interned strings.
 * Same string always returns same ID.
 */
export class StringStore {
	private readonly strings: string[] = []
	private readonly stringToId: Map<string, StringId> = new Map()

	/** Intern a string, returning its ID. Same string always returns same ID. */
	intern(s: string): StringId {
		const existing = this.stringToId.get(s)
		if (existing !== undefined) return existing

		const id = stringId(this.strings.length)
		this.strings.push(s)
		this.stringToId.set(s, id)
		return id
	}

	get(id: StringId): string {
		const s = this.strings[id]
		if (s === undefined) throw new Error(`Invalid StringId: ${id}`)
		return s
	}

	count(): number {
		return this.strings.length
	}

	isValid(id: StringId): boolean {
		return id >= 0 && id < this.strings.length
	}
}

/**
 * The source context.
 *
 * - Append-only: the lexer fills `tokens`, the parser only reads them
 * - Centralized diagnostics: lexer, parser and validation report into one list
 */
export class SourceContext {
	/** Original source code */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	/** Interned lexemes (populated by tokenizer) */
	readonly strings: StringStore

	/** Token storage (populated by tokenizer) */
	readonly tokens: TokenStore

	private readonly diagnostics: Diagnostic[] = []
	private errorCount = 0
	private lines: string[] | null = null

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
		this.strings = new StringStore()
		this.tokens = new TokenStore()
	}

	/** Lexeme of a token, see Token.text. */
	text(token: Token): string {
		return this.strings.get(token.text)
	}

	/**
	 * Emit a diagnostic by code at a specific location.
	 */
	emit(code: DiagnosticCode, line: number, column: number, args?: DiagnosticArgs): void {
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.addDiagnostic({
			column,
			def,
			line,
			message,
			...(args ? { args } : {}),
		})
	}

	/**
	 * Emit a diagnostic by code at a token's location.
	 */
	emitAtToken(code: DiagnosticCode, tokenId: TokenId, args?: DiagnosticArgs): void {
		const token = this.tokens.get(tokenId)
		const def = getDiagnostic(code)
		const message = interpolateMessage(def.message, args)
		this.addDiagnostic({
			column: token.column,
			def,
			line: token.line,
			message,
			tokenId,
			...(args ? { args } : {}),
		})
	}

	private addDiagnostic(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
		if (diagnostic.def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
	}

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getErrors(): Diagnostic[] {
		return this.diagnostics.filter((d) => d.def.severity === DiagnosticSeverity.Error)
	}

	getSourceLine(line: number): string | undefined {
		if (this.lines === null) {
			this.lines = this.source.split('\n').map((l) => (l.endsWith('\r') ? l.slice(0, -1) : l))
		}
		return this.lines[line - 1]
	}

	private buildSourceExcerpt(
		diagnostic: Diagnostic,
		sourceLine: string
	): { emptyPrefix: string; lines: string[] } {
		const lineNumWidth = String(diagnostic.line).length
		const pad = ' '.repeat(lineNumWidth)
		const linePrefix = ` ${diagnostic.line} | `
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(Math.max(0, diagnostic.column - 1))}^`

		return {
			emptyPrefix,
			lines: [emptyPrefix, `${linePrefix}${sourceLine}`, `${emptyPrefix}${pointer}`],
		}
	}

	/**
	 * Format a diagnostic for display with a source excerpt.
	 *
	 * Example:
	 * ```
	 * error[QTPARSE001]: expected "(" or a qubit index, found end of input
	 *   --> bell.quil:1:2
	 *    |
	 *  1 | H
	 *    |  ^
	 *    |
	 *    = help: Check the operands of this instruction.
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${severityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const { emptyPrefix, lines: excerpt } = this.buildSourceExcerpt(diagnostic, sourceLine)
		const lines = [header, location, ...excerpt]

		if (def.suggestion) {
			const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
			lines.push(emptyPrefix, `   = help: ${suggestion}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
