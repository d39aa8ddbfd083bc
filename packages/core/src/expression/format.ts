import { InternalError } from '../core/errors.ts'
import type { Complex } from './complex.ts'
import type { Expression, InfixOperator } from './types.ts'

// Binding strength; a child that binds looser than its slot allows is parenthesized.
const ADDITIVE = 1
const MULTIPLICATIVE = 2
const POWER = 3
const UNARY = 4
const ATOM = 5

const INFIX_PRECEDENCE: Readonly<Record<InfixOperator, number>> = {
	'*': MULTIPLICATIVE,
	'+': ADDITIVE,
	'-': ADDITIVE,
	'/': MULTIPLICATIVE,
	'^': POWER,
}

/** Only finite values have a literal; `1e21` and up print with an exponent. */
export function formatReal(value: number): string {
	if (!Number.isFinite(value)) throw new InternalError(`cannot print ${value} as a number`)
	return String(value)
}

function formatAddressIndex(index: number): string {
	if (!Number.isSafeInteger(index) || index < 0) throw new InternalError(`cannot print ${index} as an index`)
	return String(index)
}

/**
 * Complex literals have no source syntax, so they print as arithmetic on `i`:
 * `1.5`, `2 * i`, `1 - 0.5 * i`.
 */
export function formatComplex(value: Complex): string {
	if (value.im === 0) return formatReal(value.re)
	const imaginary = `${formatReal(Math.abs(value.im))} * i`
	if (value.re === 0) return value.im < 0 ? `-${imaginary}` : imaginary
	return `${formatReal(value.re)} ${value.im < 0 ? '-' : '+'} ${imaginary}`
}

function numberPrecedence(value: Complex): number {
	if (value.im !== 0) return value.re === 0 ? MULTIPLICATIVE : ADDITIVE
	return value.re < 0 ? UNARY : ATOM
}

function precedence(expression: Expression): number {
	switch (expression.kind) {
		case 'Infix':
			return INFIX_PRECEDENCE[expression.operator]
		case 'Prefix':
			return UNARY
		case 'Number':
			return numberPrecedence(expression.value)
		case 'Address':
		case 'Call':
		case 'Constant':
		case 'Variable':
			return ATOM
	}
}

function formatOperand(expression: Expression, minimum: number): string {
	const text = formatExpression(expression)
	return precedence(expression) < minimum ? `(${text})` : text
}

function formatInfix(left: Expression, operator: InfixOperator, right: Expression): string {
	const own = INFIX_PRECEDENCE[operator]
	// `^` groups to the right, the rest to the left
	const leftMinimum = operator === '^' ? own + 1 : own
	const rightMinimum = operator === '^' ? own : own + 1
	return `${formatOperand(left, leftMinimum)} ${operator} ${formatOperand(right, rightMinimum)}`
}

/**
 * Prints an expression with the fewest parentheses that parse back to the same tree.
 * Binary operators are spaced because identifiers may contain `-`.
 */
export function formatExpression(expression: Expression): string {
	switch (expression.kind) {
		case 'Address':
			return `${expression.reference.name}[${formatAddressIndex(expression.reference.index)}]`
		case 'Call':
			return `${expression.function}(${formatExpression(expression.argument)})`
		case 'Constant':
			return expression.name
		case 'Infix':
			return formatInfix(expression.left, expression.operator, expression.right)
		case 'Number':
			return formatComplex(expression.value)
		case 'Prefix':
			return `${expression.operator}${formatOperand(expression.operand, UNARY)}`
		case 'Variable':
			return `%${expression.name}`
	}
}
