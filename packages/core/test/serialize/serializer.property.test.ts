import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { InternalError, ParseError } from '../../src/core/errors.ts'
import { constant, type Expression, number, variable } from '../../src/expression/types.ts'
import { parse } from '../../src/index.ts'
import { fixedQubit, type Instruction, type Qubit } from '../../src/program/instructions.ts'
import { Program } from '../../src/program/program.ts'

const NAMES = ['H', 'RX', 'CNOT', 'my-gate', 'U3'] as const
const REGIONS = ['ro', 'theta', 'scratch'] as const

const qubit: fc.Arbitrary<Qubit> = fc.oneof(
	fc.integer({ max: 64, min: 0 }).map(fixedQubit),
	fc.integer({ max: Number.MAX_SAFE_INTEGER, min: 0 }).map(fixedQubit)
)

const parameter: fc.Arbitrary<Expression> = fc.oneof(
	fc.integer({ max: 1000, min: 0 }).map((n) => number(n)),
	fc.constant(constant('pi')),
	fc.constantFrom('t', 'phi').map(variable)
)

const reference = fc.record({
	index: fc.integer({ max: 15, min: 0 }),
	name: fc.constantFrom(...REGIONS),
})

const realValue = fc.double({ max: Number.MAX_VALUE, min: -Number.MAX_VALUE, noNaN: true })

const digits = fc.stringOf(fc.constantFrom('0', '1', '5', '9'), { maxLength: 30, minLength: 1 })

const instruction: fc.Arbitrary<Instruction> = fc.oneof(
	fc
		.record({
			name: fc.constantFrom(...NAMES),
			parameters: fc.array(parameter, { maxLength: 3 }),
			qubits: fc.array(qubit, { maxLength: 3, minLength: 1 }),
		})
		.map(({ name, parameters, qubits }): Instruction => ({ kind: 'Gate', modifiers: [], name, parameters, qubits })),
	fc.tuple(qubit, fc.option(reference)).map(([q, target]): Instruction => ({ kind: 'Measurement', qubit: q, target })),
	fc.tuple(reference, realValue).map(
		([destination, value]): Instruction => ({ destination, kind: 'Move', source: { kind: 'Real', value } })
	),
	fc.tuple(reference, fc.maxSafeInteger()).map(
		([destination, value]): Instruction => ({ destination, kind: 'Move', source: { kind: 'Integer', value } })
	),
	fc.constantFrom('start', 'loop-2', 'end').map((name): Instruction => ({ kind: 'Label', name })),
	fc.constantFrom('start', 'end').map((target): Instruction => ({ kind: 'Jump', target })),
	fc.stringOf(fc.constantFrom('a', 'Z', ' ', '"', '\\', '\n', '\t')).map(
		(data): Instruction => ({ arguments: [], data, kind: 'Pragma', name: 'NOTE' })
	)
)

const program = fc.array(instruction, { maxLength: 20 }).map((items) => new Program(items))

describe('serialize/serializer properties', () => {
	it('printed text parses back to the same text', () => {
		fc.assert(
			fc.property(program, (built) => {
				const text = built.toText()
				assert.strictEqual(parse(text).toText(), text)
			}),
			{ numRuns: 300 }
		)
	})

	it('printing keeps one line per item', () => {
		fc.assert(
			fc.property(program, (built) => {
				const text = built.toText()
				const lines = text === '' ? 0 : text.split('\n').length - 1
				return lines === built.items().length
			}),
			{ numRuns: 300 }
		)
	})

	it('parsing printed text keeps item kinds and order', () => {
		fc.assert(
			fc.property(program, (built) => {
				const reparsed = parse(built.toText())
				assert.deepStrictEqual(
					reparsed.items().map((i) => i.kind),
					built.items().map((i) => i.kind)
				)
			}),
			{ numRuns: 300 }
		)
	})

	it('real operands survive printing', () => {
		fc.assert(
			fc.property(reference, realValue, (destination, value) => {
				const [move] = parse(new Program([{ destination, kind: 'Move', source: { kind: 'Real', value } }]).toText()).items()
				return move?.kind === 'Move' && move.source.kind === 'Real' && move.source.value === value
			}),
			{ numRuns: 300 }
		)
	})

	it('non-finite reals are refused instead of printed', () => {
		fc.assert(
			fc.property(reference, fc.constantFrom(Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY, Number.NaN), (destination, value) => {
				const built = new Program([{ destination, kind: 'Move', source: { kind: 'Real', value } }])
				assert.throws(() => built.toText(), InternalError)
			}),
			{ numRuns: 20 }
		)
	})

	it('integer literals either read back exactly or fail to parse', () => {
		fc.assert(
			fc.property(digits, (literal) => {
				const source = `H ${literal}\nPRAGMA count ${literal}`
				if (!Number.isSafeInteger(Number(literal))) {
					assert.throws(() => parse(source), ParseError)
					return
				}
				const text = parse(source).toText()
				assert.strictEqual(text, `H ${Number(literal)}\nPRAGMA count ${Number(literal)}\n`)
				assert.strictEqual(parse(text).toText(), text)
			}),
			{ numRuns: 300 }
		)
	})
})
