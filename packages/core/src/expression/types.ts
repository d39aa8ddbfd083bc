/**
 * Expression trees for parameterized, complex-valued arithmetic.
 * Trees are immutable; simplify and substitute build new ones.
 */

import * as C from './complex.ts'

/** A classical memory slot: region name and element index. */
export interface MemoryReference {
	readonly name: string
	readonly index: number
}

export type InfixOperator = '+' | '-' | '*' | '/' | '^'
export type PrefixOperator = '+' | '-'
export type ExpressionFunction = 'cis' | 'cos' | 'exp' | 'sin' | 'sqrt'
export type ConstantName = 'i' | 'pi'

export interface NumberExpression {
	readonly kind: 'Number'
	readonly value: C.Complex
}

export interface ConstantExpression {
	readonly kind: 'Constant'
	readonly name: ConstantName
}

/** A formal parameter, written `%name`. */
export interface VariableExpression {
	readonly kind: 'Variable'
	readonly name: string
}

export interface AddressExpression {
	readonly kind: 'Address'
	readonly reference: MemoryReference
}

export interface PrefixExpression {
	readonly kind: 'Prefix'
	readonly operator: PrefixOperator
	readonly operand: Expression
}

export interface InfixExpression {
	readonly kind: 'Infix'
	readonly left: Expression
	readonly operator: InfixOperator
	readonly right: Expression
}

export interface CallExpression {
	readonly kind: 'Call'
	readonly function: ExpressionFunction
	readonly argument: Expression
}

export type Expression =
	| AddressExpression
	| CallExpression
	| ConstantExpression
	| InfixExpression
	| NumberExpression
	| PrefixExpression
	| VariableExpression

export const CONSTANTS: Readonly<Record<ConstantName, C.Complex>> = Object.freeze({
	i: C.I,
	pi: C.complex(Math.PI),
})

export const FUNCTIONS: Readonly<Record<ExpressionFunction, (z: C.Complex) => C.Complex>> =
	Object.freeze({
		cis: C.cis,
		cos: C.cos,
		exp: C.exp,
		sin: C.sin,
		sqrt: C.sqrt,
	})

export function isExpressionFunction(name: string): name is ExpressionFunction {
	return Object.hasOwn(FUNCTIONS, name)
}

export function number(re: number, im = 0): NumberExpression {
	return { kind: 'Number', value: C.complex(re, im) }
}

export function constant(name: ConstantName): ConstantExpression {
	return { kind: 'Constant', name }
}

export function variable(name: string): VariableExpression {
	return { kind: 'Variable', name }
}

export function address(name: string, index = 0): AddressExpression {
	return { kind: 'Address', reference: { index, name } }
}

export function prefix(operator: PrefixOperator, operand: Expression): PrefixExpression {
	return { kind: 'Prefix', operand, operator }
}

export function infix(left: Expression, operator: InfixOperator, right: Expression): InfixExpression {
	return { kind: 'Infix', left, operator, right }
}

export function call(fn: ExpressionFunction, argument: Expression): CallExpression {
	return { argument, function: fn, kind: 'Call' }
}

/** Applies a binary operator; null where the result is undefined. */
export function applyInfix(
	left: C.Complex,
	operator: InfixOperator,
	right: C.Complex
): C.Complex | null {
	switch (operator) {
		case '+':
			return C.add(left, right)
		case '-':
			return C.subtract(left, right)
		case '*':
			return C.multiply(left, right)
		case '/':
			return C.divide(left, right)
		case '^':
			return C.power(left, right)
	}
}

/** Memory references read by an expression, in order of appearance. */
export function memoryReferences(expression: Expression): MemoryReference[] {
	switch (expression.kind) {
		case 'Address':
			return [expression.reference]
		case 'Call':
			return memoryReferences(expression.argument)
		case 'Infix':
			return [...memoryReferences(expression.left), ...memoryReferences(expression.right)]
		case 'Prefix':
			return memoryReferences(expression.operand)
		case 'Constant':
		case 'Number':
		case 'Variable':
			return []
	}
}

/** Names of the `%parameters` an expression refers to, without duplicates. */
export function variables(expression: Expression): string[] {
	const names = new Set<string>()
	const visit = (e: Expression): void => {
		switch (e.kind) {
			case 'Variable':
				names.add(e.name)
				return
			case 'Call':
				return visit(e.argument)
			case 'Infix':
				visit(e.left)
				return visit(e.right)
			case 'Prefix':
				return visit(e.operand)
			case 'Address':
			case 'Constant':
			case 'Number':
				return
		}
	}
	visit(expression)
	return [...names]
}
