import assert from 'node:assert'
import { describe, it } from 'node:test'
import * as C from '../../src/expression/complex.ts'
import { formatComplex, formatExpression } from '../../src/expression/format.ts'
import { parseExpression } from '../../src/expression/parse.ts'
import { address, call, infix, number, prefix, variable } from '../../src/expression/types.ts'

function reformat(source: string): string {
	return formatExpression(parseExpression(source))
}

describe('expression/format', () => {
	describe('formatExpression', () => {
		it('should space binary operators', () => {
			assert.strictEqual(reformat('2*pi*%t'), '2 * pi * %t')
		})

		it('should drop redundant parentheses', () => {
			assert.strictEqual(reformat('((1)) + (2 * 3)'), '1 + 2 * 3')
			assert.strictEqual(reformat('(1 - 2) - 3'), '1 - 2 - 3')
		})

		it('should keep parentheses the tree needs', () => {
			assert.strictEqual(reformat('(1 + 2) * 3'), '(1 + 2) * 3')
			assert.strictEqual(reformat('1 - (2 - 3)'), '1 - (2 - 3)')
			assert.strictEqual(reformat('(2 ^ 3) ^ 2'), '(2 ^ 3) ^ 2')
			assert.strictEqual(reformat('2 ^ 3 ^ 2'), '2 ^ 3 ^ 2')
		})

		it('should parenthesize a sum under unary minus', () => {
			assert.strictEqual(formatExpression(prefix('-', infix(variable('a'), '+', number(1)))), '-(%a + 1)')
		})

		it('should print memory references with their index', () => {
			assert.strictEqual(formatExpression(address('ro')), 'ro[0]')
			assert.strictEqual(formatExpression(call('exp', address('theta', 2))), 'exp(theta[2])')
		})
	})

	describe('formatComplex', () => {
		it('should print real values as plain numbers', () => {
			assert.strictEqual(formatComplex(C.complex(1.5)), '1.5')
			assert.strictEqual(formatComplex(C.complex(-2)), '-2')
		})

		it('should print imaginary parts as multiples of i', () => {
			assert.strictEqual(formatComplex(C.complex(0, 2)), '2 * i')
			assert.strictEqual(formatComplex(C.complex(0, -1)), '-1 * i')
			assert.strictEqual(formatComplex(C.complex(1, -0.5)), '1 - 0.5 * i')
		})

		it('should parenthesize complex numbers inside products', () => {
			assert.strictEqual(formatExpression(infix(number(1, 1), '*', variable('z'))), '(1 + 1 * i) * %z')
		})
	})
})
