export * as complex from './complex.ts'
export type { Complex } from './complex.ts'
export type { Bindings, MemoryValues } from './evaluate.ts'
export { evaluate, substitute } from './evaluate.ts'
export { formatComplex, formatExpression, formatReal } from './format.ts'
export { ExpressionGrammar, type ExpressionMatch, matchExpression } from './grammar.ts'
export { parseExpression } from './parse.ts'
export { expressionEquals, expressionKey, simplify } from './simplify.ts'
export type {
	AddressExpression,
	CallExpression,
	ConstantExpression,
	ConstantName,
	Expression,
	ExpressionFunction,
	InfixExpression,
	InfixOperator,
	MemoryReference,
	NumberExpression,
	PrefixExpression,
	PrefixOperator,
	VariableExpression,
} from './types.ts'
export {
	address,
	applyInfix,
	CONSTANTS,
	call,
	constant,
	FUNCTIONS,
	infix,
	isExpressionFunction,
	memoryReferences,
	number,
	prefix,
	variable,
	variables,
} from './types.ts'
