import * as C from './complex.ts'
import { formatExpression } from './format.ts'
import {
	applyInfix,
	CONSTANTS,
	call,
	type Expression,
	FUNCTIONS,
	type InfixExpression,
	infix,
	type NumberExpression,
	prefix,
} from './types.ts'

function numberValue(expression: Expression): C.Complex | null {
	return expression.kind === 'Number' ? expression.value : null
}

function isNumber(expression: Expression, value: C.Complex): boolean {
	const own = numberValue(expression)
	return own !== null && C.equals(own, value)
}

function folded(value: C.Complex | null): NumberExpression | null {
	if (value === null || !C.isFiniteComplex(value)) return null
	return { kind: 'Number', value }
}

function negated(operand: Expression): Expression {
	const value = numberValue(operand)
	if (value !== null) return { kind: 'Number', value: C.negate(value) }
	if (operand.kind === 'Prefix' && operand.operator === '-') return operand.operand
	return prefix('-', operand)
}

/** Neutral-element rules: x+0, 0+x, x-0, 0-x, x*1, 1*x, x/1, x^1. */
function withoutIdentity(expression: InfixExpression): Expression {
	const { left, operator, right } = expression
	switch (operator) {
		case '+':
			if (isNumber(right, C.ZERO)) return left
			if (isNumber(left, C.ZERO)) return right
			return expression
		case '-':
			if (isNumber(right, C.ZERO)) return left
			if (isNumber(left, C.ZERO)) return negated(right)
			return expression
		case '*':
			if (isNumber(right, C.ONE)) return left
			if (isNumber(left, C.ONE)) return right
			return expression
		case '/':
		case '^':
			return isNumber(right, C.ONE) ? left : expression
	}
}

function simplifyInfix(expression: InfixExpression): Expression {
	const left = simplify(expression.left)
	const right = simplify(expression.right)
	const leftValue = numberValue(left)
	const rightValue = numberValue(right)

	if (leftValue !== null && rightValue !== null) {
		// An undefined result (e.g. 1/0) stays symbolic for evaluate() to report.
		const result = folded(applyInfix(leftValue, expression.operator, rightValue))
		if (result !== null) return result
	}
	return withoutIdentity(infix(left, expression.operator, right))
}

/**
 * Constant folding over complex arithmetic. Built-in constants fold to numbers,
 * so `pi / 2` simplifies to `1.5707963267948966`. Never throws.
 */
export function simplify(expression: Expression): Expression {
	switch (expression.kind) {
		case 'Address':
		case 'Number':
		case 'Variable':
			return expression
		case 'Constant':
			return { kind: 'Number', value: CONSTANTS[expression.name] }
		case 'Call': {
			const argument = simplify(expression.argument)
			const value = numberValue(argument)
			const result = value === null ? null : folded(FUNCTIONS[expression.function](value))
			return result ?? call(expression.function, argument)
		}
		case 'Infix':
			return simplifyInfix(expression)
		case 'Prefix': {
			const operand = simplify(expression.operand)
			return expression.operator === '+' ? operand : negated(operand)
		}
	}
}

/**
 * Structural key of the simplified form. Two expressions are equal exactly when
 * their keys are equal.
 */
export function expressionKey(expression: Expression): string {
	return formatExpression(simplify(expression))
}

export function expressionEquals(a: Expression, b: Expression): boolean {
	return expressionKey(a) === expressionKey(b)
}
