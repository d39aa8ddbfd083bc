import type { Node } from 'ohm-js'
import * as ohm from 'ohm-js'
import { InternalError } from '../core/errors.ts'
import {
	address,
	call,
	constant,
	type Expression,
	type ExpressionFunction,
	infix,
	isExpressionFunction,
	number,
	prefix,
	variable,
} from './types.ts'

/**
 * Expression grammar.
 *
 * Precedence, loosest first: `+ -` (left), `* /` (left), `^` (right), unary `- +`.
 * Function calls bind tighter than any operator. A bare name is a memory
 * reference to element 0, except `pi` and `i`.
 */
const grammarSource = String.raw`
QuilExpression {
  Expression = AddExpr

  AddExpr = AddExpr "+" MulExpr  -- add
          | AddExpr "-" MulExpr  -- subtract
          | MulExpr

  MulExpr = MulExpr "*" PowExpr  -- multiply
          | MulExpr "/" PowExpr  -- divide
          | PowExpr

  PowExpr = UnaryExpr "^" PowExpr  -- power
          | UnaryExpr

  UnaryExpr = "-" UnaryExpr  -- negate
            | "+" UnaryExpr  -- plus
            | CallExpr

  CallExpr = functionName "(" Expression ")"  -- call
           | PrimaryExpr

  PrimaryExpr = "(" Expression ")"    -- paren
              | name "[" index "]"    -- indexed
              | number
              | variable
              | name

  functionName (a function name) = (caseInsensitive<"sqrt"> | caseInsensitive<"sin"> | caseInsensitive<"cos"> | caseInsensitive<"cis"> | caseInsensitive<"exp">) ~nameRest

  name (an identifier) = nameStart nameRest*
  nameStart = letter | "_"
  nameRest = alnum | "_" | "-"

  variable (a parameter) = "%" name
  index (an index) = digit+

  number (a number) = mantissa exponent?
  mantissa = digit+ "." digit*  -- trailing
           | "." digit+         -- leading
           | digit+             -- whole
  exponent = ("e" | "E") ("+" | "-")? digit+
}
`

export const ExpressionGrammar = ohm.grammar(grammarSource)

function toExpression(node: Node): Expression {
	return node['toExpression']()
}

function functionFromName(source: string): ExpressionFunction {
	const name = source.toLowerCase()
	if (!isExpressionFunction(name)) {
		throw new InternalError(`grammar accepted unknown function ${source}`)
	}
	return name
}

function bareName(name: string): Expression {
	if (name.toLowerCase() === 'pi') return constant('pi')
	if (name === 'i') return constant('i')
	return address(name, 0)
}

/** Raised from a semantic action for a literal no number can hold exactly. */
class NumberOutOfRange extends Error {
	readonly offset: number

	constructor(node: Node) {
		super(`number out of range: ${node.sourceString}`)
		this.name = 'NumberOutOfRange'
		this.offset = node.source.startIdx
	}
}

function finiteNumber(node: Node): number {
	const value = Number(node.sourceString)
	if (!Number.isFinite(value)) throw new NumberOutOfRange(node)
	return value
}

function safeIndex(node: Node): number {
	const value = Number(node.sourceString)
	if (!Number.isSafeInteger(value)) throw new NumberOutOfRange(node)
	return value
}

const semantics = ExpressionGrammar.createSemantics()

semantics.addOperation<Expression>('toExpression', {
	AddExpr_add(left: Node, _op: Node, right: Node) {
		return infix(toExpression(left), '+', toExpression(right))
	},
	AddExpr_subtract(left: Node, _op: Node, right: Node) {
		return infix(toExpression(left), '-', toExpression(right))
	},
	CallExpr_call(fn: Node, _open: Node, argument: Node, _close: Node) {
		return call(functionFromName(fn.sourceString), toExpression(argument))
	},
	MulExpr_divide(left: Node, _op: Node, right: Node) {
		return infix(toExpression(left), '/', toExpression(right))
	},
	MulExpr_multiply(left: Node, _op: Node, right: Node) {
		return infix(toExpression(left), '*', toExpression(right))
	},
	name(_start: Node, _rest: Node) {
		return bareName(this.sourceString)
	},
	number(_mantissa: Node, _exponent: Node) {
		return number(finiteNumber(this))
	},
	PowExpr_power(left: Node, _op: Node, right: Node) {
		return infix(toExpression(left), '^', toExpression(right))
	},
	PrimaryExpr_indexed(name: Node, _open: Node, index: Node, _close: Node) {
		return address(name.sourceString, safeIndex(index))
	},
	PrimaryExpr_paren(_open: Node, inner: Node, _close: Node) {
		return toExpression(inner)
	},
	UnaryExpr_negate(_op: Node, operand: Node) {
		return prefix('-', toExpression(operand))
	},
	UnaryExpr_plus(_op: Node, operand: Node) {
		return prefix('+', toExpression(operand))
	},
	variable(_sigil: Node, name: Node) {
		return variable(name.sourceString)
	},
})

export type ExpressionMatch =
	| { readonly succeeded: true; readonly expression: Expression }
	| {
			readonly succeeded: false
			/** Offset into the matched text where no rule could continue. */
			readonly offset: number
			readonly expected: string
	  }

const FAILURE_MESSAGE = /^Line \d+, col (\d+): expected (.*)$/s

/**
 * Matches a single-line expression. The whole text must be consumed.
 */
export function matchExpression(text: string): ExpressionMatch {
	const matchResult = ExpressionGrammar.match(text)
	if (matchResult.succeeded()) {
		try {
			const expression: Expression = semantics(matchResult)['toExpression']()
			return { expression, succeeded: true }
		} catch (error) {
			if (!(error instanceof NumberOutOfRange)) throw error
			return { expected: 'a number in range', offset: error.offset, succeeded: false }
		}
	}

	const detail = FAILURE_MESSAGE.exec(matchResult.shortMessage ?? '')
	if (detail === null) {
		return { expected: 'an expression', offset: text.length, succeeded: false }
	}
	return {
		expected: detail[2] ?? 'an expression',
		offset: Number(detail[1]) - 1,
		succeeded: false,
	}
}
