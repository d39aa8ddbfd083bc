/**
 * Quil toolkit public API
 *
 * - Dense token and string stores with integer IDs
 * - One SourceContext flowing through lexing and parsing
 * - Program model with symbol tables, basic blocks and validation
 * - Per-block dependency graphs for scheduling analysis
 */

import { SourceContext } from './core/context.ts'
import { InternalError } from './core/errors.ts'
import type { Token } from './core/tokens.ts'
import { tokenize } from './lex/tokenizer.ts'
import { parseProgram } from './parse/parser.ts'
import type { Program } from './program/program.ts'

export {
	type Diagnostic,
	SourceContext,
	type StringId,
	StringStore,
	stringId,
} from './core/context.ts'
export { type DiagnosticCode, DiagnosticSeverity, getDiagnostic } from './core/diagnostics.ts'
export {
	ExpressionError,
	type ExpressionErrorKind,
	InternalError,
	LexError,
	ParseError,
	type SourceLocation,
} from './core/errors.ts'
export { type Token, type TokenId, TokenKind, TokenStore, tokenId } from './core/tokens.ts'
export * from './expression/index.ts'
export {
	type Access,
	instructionAccesses,
} from './graph/resources.ts'
export {
	buildDependencyGraph,
	DependencyGraph,
	type Edge,
	type GraphOptions,
	type GraphView,
	type InstructionBlock,
} from './graph/dependency-graph.ts'
export { isKeyword, KEYWORDS } from './lex/keywords.ts'
export { type TokenizeResult, tokenize } from './lex/tokenizer.ts'
export { type ParseResult, parseProgram } from './parse/parser.ts'
export { BasicBlock, splitBasicBlocks } from './program/blocks.ts'
export * from './program/instructions.ts'
export { frameKey, type MemoryRegion, Program } from './program/program.ts'
export {
	type GateSignature,
	gateSignature,
	modifiedSignature,
	referencedMemory,
	type ValidationError,
	type ValidationErrorKind,
	validateProgram,
} from './program/validate.ts'
export {
	formatInstruction,
	formatMemoryReference,
	formatQubit,
	formatString,
	toText,
} from './serialize/serializer.ts'

/**
 * Options for parse and lex.
 */
export interface ParseOptions {
	/** Path to the source file (for diagnostics) */
	filename?: string
}

/** A token with its lexeme resolved, see Token.text. */
export interface LexedToken extends Omit<Token, 'text'> {
	readonly text: string
}

/**
 * Tokenize Quil source.
 *
 * @throws {LexError} at the first unexpected character or unterminated string
 */
export function lex(source: string, options: ParseOptions = {}): LexedToken[] {
	const context = new SourceContext(source, options.filename)
	const result = tokenize(context)
	if (result.error) throw result.error
	return [...context.tokens].map(([, token]) => ({ ...token, text: context.text(token) }))
}

/**
 * Parse Quil source into a Program.
 *
 * Runs both phases:
 * 1. Tokenization (source → tokens)
 * 2. Parsing (tokens → Program)
 *
 * @throws {LexError} or {ParseError} for the first problem found
 */
export function parse(source: string, options: ParseOptions = {}): Program {
	const context = new SourceContext(source, options.filename)

	const tokenResult = tokenize(context)
	if (tokenResult.error) throw tokenResult.error

	const parseResult = parseProgram(context)
	if (parseResult.error) throw parseResult.error
	if (parseResult.program === undefined) throw new InternalError('parser returned no program')
	return parseResult.program
}
