import type { SourceContext } from '../core/context.ts'
import { ParseError } from '../core/errors.ts'
import { TokenKind } from '../core/tokens.ts'
import { Program } from '../program/program.ts'
import { atDefinition, parseDefinition } from './definitions.ts'
import { INSTRUCTION, parseInstruction } from './instructions.ts'
import { advance, createParserState, expectLineEnd, fail, type ParserState, peek } from './state.ts'

export interface ParseResult {
	succeeded: boolean
	program?: Program
	/** The first (and only) syntax error when `succeeded` is false. */
	error?: ParseError
}

function parseItems(state: ParserState, program: Program): void {
	for (;;) {
		const token = peek(state)
		switch (token.kind) {
			case TokenKind.Eof:
				return
			case TokenKind.Newline:
			case TokenKind.Semicolon:
				advance(state)
				continue
			case TokenKind.Indent:
				// indented lines only belong to definition bodies
				fail(state, [INSTRUCTION])
		}

		if (atDefinition(state)) {
			program.addInstruction(parseDefinition(state))
			expectLineEnd(state)
		} else {
			program.addInstruction(parseInstruction(state))
		}
	}
}

/**
 * Parses the tokens in `context` into a Program.
 *
 * Expects `tokenize(context)` to have succeeded. Stops at the first syntax
 * error, reports it to the context and returns no program.
 */
export function parseProgram(context: SourceContext): ParseResult {
	const state = createParserState(context)
	const program = new Program()
	try {
		parseItems(state, program)
	} catch (error) {
		if (!(error instanceof ParseError)) throw error
		context.emit(error.code, error.line, error.column, error.args)
		return { error, succeeded: false }
	}
	return { program, succeeded: true }
}
