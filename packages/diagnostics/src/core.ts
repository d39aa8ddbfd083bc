/**
 * Diagnostic definitions for @quilt/core.
 *
 * Error code format: QT<PHASE><NUMBER>
 * - QTLEX: Lexer errors (001-099)
 * - QTPARSE: Parser errors (001-099)
 * - QTVAL: Program validation findings (001-099), reported as warnings
 * - QTEXPR: Expression evaluation errors (001-099)
 */

import { type DiagnosticCatalog, type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// LEXER ERRORS (QTLEX001-099)
// =============================================================================

export const QTLEX001: DiagnosticDef = {
	code: 'QTLEX001',
	description: 'This character is not part of the instruction language.',
	message: 'unexpected character {character}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the character, or put it inside a string or a # comment.',
}

export const QTLEX002: DiagnosticDef = {
	code: 'QTLEX002',
	description: 'A string literal was opened but the line ended before the closing quote.',
	message: 'unterminated string',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Close the string with " on the same line.',
}

// =============================================================================
// PARSER ERRORS (QTPARSE001-099)
// =============================================================================

export const QTPARSE001: DiagnosticDef = {
	code: 'QTPARSE001',
	description: 'The instruction does not match any of the shapes allowed at this point.',
	message: 'expected {expected}, found {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check the operands of this instruction.',
}

export const QTPARSE002: DiagnosticDef = {
	code: 'QTPARSE002',
	description: 'An arithmetic expression could not be read.',
	message: 'invalid expression: expected {expected}, found {found}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Supported functions are sin, cos, sqrt, exp and cis; operators are + - * / ^.',
}

export const QTPARSE003: DiagnosticDef = {
	code: 'QTPARSE003',
	description: 'Definitions and declarations only appear at the top level of a program.',
	message: '{keyword} is not allowed inside a definition body',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Move the {keyword} out of the indented block.',
}

// =============================================================================
// VALIDATION FINDINGS (QTVAL001-099)
// =============================================================================

export const QTVAL001: DiagnosticDef = {
	code: 'QTVAL001',
	description: 'Every label in a program names exactly one position.',
	message: 'label @{name} is already defined on line {line}',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Rename one of the labels.',
}

export const QTVAL002: DiagnosticDef = {
	code: 'QTVAL002',
	description: 'A jump names a label that the program never defines.',
	message: 'jump target @{name} is not defined',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Add `LABEL @{name}` or fix the target name.',
}

export const QTVAL003: DiagnosticDef = {
	code: 'QTVAL003',
	description: 'Memory has to be declared with DECLARE before an instruction can use it.',
	message: 'memory region {name} is not declared',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Add `DECLARE {name} BIT` (or the type you need) before its first use.',
}

export const QTVAL004: DiagnosticDef = {
	code: 'QTVAL004',
	description: 'The gate application does not match the definition of the gate in this program.',
	message: '{gate} expects {expected} {operand}, found {found}',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'CONTROLLED and FORKED each add one qubit; FORKED also doubles the parameters.',
}

export const QTVAL005: DiagnosticDef = {
	code: 'QTVAL005',
	description: 'A memory region can only be declared once.',
	message: 'memory region {name} is already declared on line {line}',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Remove the second declaration or give it another name.',
}

// =============================================================================
// EXPRESSION ERRORS (QTEXPR001-099)
// =============================================================================

export const QTEXPR001: DiagnosticDef = {
	code: 'QTEXPR001',
	description: 'Evaluating the expression divides by zero.',
	message: 'division by zero',
	severity: DiagnosticSeverity.Error,
}

export const QTEXPR002: DiagnosticDef = {
	code: 'QTEXPR002',
	description: 'The expression still refers to a parameter or memory value with no binding.',
	message: 'expression is incomplete: {name} has no value',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Bind {name} before evaluating.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CORE_DIAGNOSTICS = {
	QTEXPR001,
	QTEXPR002,
	QTLEX001,
	QTLEX002,
	QTPARSE001,
	QTPARSE002,
	QTPARSE003,
	QTVAL001,
	QTVAL002,
	QTVAL003,
	QTVAL004,
	QTVAL005,
} as const satisfies DiagnosticCatalog

export type CoreDiagnosticCode = keyof typeof CORE_DIAGNOSTICS
