import { getDiagnostic, interpolateMessage } from '../core/diagnostics.ts'
import { ExpressionError } from '../core/errors.ts'
import * as C from './complex.ts'
import {
	applyInfix,
	CONSTANTS,
	call,
	type Expression,
	FUNCTIONS,
	infix,
	prefix,
} from './types.ts'

/** Values for `%parameters`, keyed by name without the `%`. */
export type Bindings = ReadonlyMap<string, C.Complex>

/** Current contents of classical memory, keyed by region name. */
export type MemoryValues = ReadonlyMap<string, readonly number[]>

/**
 * Replaces every bound `%parameter` with its value. Unbound parameters and
 * memory references are kept.
 */
export function substitute(expression: Expression, bindings: Bindings): Expression {
	switch (expression.kind) {
		case 'Address':
		case 'Constant':
		case 'Number':
			return expression
		case 'Variable': {
			const value = bindings.get(expression.name)
			return value === undefined ? expression : { kind: 'Number', value }
		}
		case 'Call':
			return call(expression.function, substitute(expression.argument, bindings))
		case 'Infix':
			return infix(
				substitute(expression.left, bindings),
				expression.operator,
				substitute(expression.right, bindings)
			)
		case 'Prefix':
			return prefix(expression.operator, substitute(expression.operand, bindings))
	}
}

function incomplete(name: string): ExpressionError {
	return new ExpressionError('Incomplete', interpolateMessage(getDiagnostic('QTEXPR002').message, { name }))
}

function divisionByZero(): ExpressionError {
	return new ExpressionError('DivisionByZero', getDiagnostic('QTEXPR001').message)
}

/**
 * Evaluates a fully bound expression.
 *
 * @throws {ExpressionError} `DivisionByZero` for a zero divisor or zero raised to a
 * non-positive power, `Incomplete` for an unbound parameter or memory value.
 */
export function evaluate(
	expression: Expression,
	bindings: Bindings = new Map(),
	memory?: MemoryValues
): C.Complex {
	switch (expression.kind) {
		case 'Number':
			return expression.value
		case 'Constant':
			return CONSTANTS[expression.name]
		case 'Variable': {
			const value = bindings.get(expression.name)
			if (value === undefined) throw incomplete(`%${expression.name}`)
			return value
		}
		case 'Address': {
			const { name, index } = expression.reference
			const value = memory?.get(name)?.[index]
			if (value === undefined) throw incomplete(`${name}[${index}]`)
			return C.complex(value)
		}
		case 'Call':
			return FUNCTIONS[expression.function](evaluate(expression.argument, bindings, memory))
		case 'Infix': {
			const left = evaluate(expression.left, bindings, memory)
			const right = evaluate(expression.right, bindings, memory)
			const result = applyInfix(left, expression.operator, right)
			if (result === null) throw divisionByZero()
			return result
		}
		case 'Prefix': {
			const operand = evaluate(expression.operand, bindings, memory)
			return expression.operator === '-' ? C.negate(operand) : operand
		}
	}
}
