import assert from 'node:assert'
import { describe, it } from 'node:test'
import { parse } from '../../src/index.ts'
import { fixedQubit } from '../../src/program/instructions.ts'
import { Program } from '../../src/program/program.ts'
import { gateSignature, modifiedSignature, referencedMemory } from '../../src/program/validate.ts'

function findings(source: string): Array<{ kind: string; message: string }> {
	return parse(source)
		.validate()
		.map(({ kind, message }) => ({ kind, message }))
}

describe('program/validate', () => {
	it('should accept a clean program', () => {
		const source = [
			'DECLARE ro BIT[2]',
			'DEFGATE G:',
			'    0, 1',
			'    1, 0',
			'LABEL @loop',
			'G 0',
			'MEASURE 0 ro[0]',
			'JUMP-WHEN @loop ro[0]',
		].join('\n')
		assert.deepStrictEqual(parse(source).validate(), [])
	})

	describe('labels', () => {
		it('should report a repeated label with both locations', () => {
			const errors = parse('LABEL @x\nH 0\nLABEL @x').validate()
			assert.strictEqual(errors.length, 1)
			const [error] = errors
			assert.strictEqual(error?.kind, 'DuplicateLabel')
			assert.strictEqual(error?.code, 'QTVAL001')
			assert.strictEqual(error?.message, 'label @x is already defined on line 1')
			assert.deepStrictEqual(
				error?.locations.map((l) => l.line),
				[1, 3]
			)
			assert.deepStrictEqual(error?.location, { column: 1, line: 3, offset: 13 })
		})

		it('should report jumps to undefined labels', () => {
			assert.deepStrictEqual(findings('JUMP @end\nLABEL @start'), [
				{ kind: 'UnresolvedJumpTarget', message: 'jump target @end is not defined' },
			])
		})

		it('should resolve jumps to labels defined later', () => {
			assert.deepStrictEqual(findings('JUMP @end\nLABEL @end'), [])
		})
	})

	describe('memory', () => {
		it('should report undeclared measurement targets', () => {
			assert.deepStrictEqual(findings('MEASURE 0 ro[0]'), [
				{ kind: 'UndeclaredMemoryReference', message: 'memory region ro is not declared' },
			])
		})

		it('should report memory named inside gate parameters', () => {
			assert.deepStrictEqual(findings('RX(theta) 0'), [
				{ kind: 'UndeclaredMemoryReference', message: 'memory region theta is not declared' },
			])
		})

		it('should report each undeclared operand of a classical instruction', () => {
			assert.deepStrictEqual(
				findings('DECLARE a INTEGER\nMOVE a b').map((f) => f.message),
				['memory region b is not declared']
			)
		})

		it('should report repeated declarations', () => {
			assert.deepStrictEqual(findings('DECLARE ro BIT\nDECLARE ro BIT[2]'), [
				{ kind: 'DuplicateMemoryRegion', message: 'memory region ro is already declared on line 1' },
			])
		})
	})

	describe('arity', () => {
		const gate = 'DEFGATE G:\n    0, 1\n    1, 0\n'
		const rotation = 'DEFGATE R(%t):\n    %t, 0\n    0, 1\n'

		it('should report a wrong qubit count', () => {
			assert.deepStrictEqual(findings(`${gate}G 0 1`), [
				{ kind: 'ArityMismatch', message: 'G expects 1 qubit, found 2' },
			])
		})

		it('should count a qubit for each CONTROLLED', () => {
			assert.deepStrictEqual(findings(`${gate}CONTROLLED G 0 1`), [])
			assert.deepStrictEqual(findings(`${gate}CONTROLLED CONTROLLED G 0`), [
				{ kind: 'ArityMismatch', message: 'G expects 3 qubits, found 1' },
			])
		})

		it('should ignore DAGGER', () => {
			assert.deepStrictEqual(findings(`${gate}DAGGER G 0`), [])
		})

		it('should double the parameters under FORKED', () => {
			assert.deepStrictEqual(findings(`${rotation}FORKED R(0.1, 0.2) 0 1`), [])
			assert.deepStrictEqual(findings(`${rotation}FORKED R(0.1) 0 1`), [
				{ kind: 'ArityMismatch', message: 'R expects 2 parameters, found 1' },
			])
		})

		it('should skip gates without a usable definition', () => {
			assert.deepStrictEqual(findings('H 0 1 2'), [])
			assert.deepStrictEqual(findings('DEFGATE T3:\n    1, 0, 0\n    0, 1, 0\n    0, 0, 1\nT3 0'), [])
		})

		it('should use circuit signatures', () => {
			assert.deepStrictEqual(findings('DEFCIRCUIT BELL a b:\n    H a\n    CNOT a b\nBELL 0'), [
				{ kind: 'ArityMismatch', message: 'BELL expects 2 qubits, found 1' },
			])
		})
	})

	it('should not look inside definition bodies', () => {
		assert.deepStrictEqual(findings('DEFCIRCUIT C a:\n    MEASURE a ro\n    JUMP @nowhere'), [])
	})

	it('should report a null location for hand-built instructions', () => {
		const program = new Program([{ kind: 'Jump', target: 'x' }])
		const [error] = program.validate()
		assert.strictEqual(error?.location, null)
		assert.deepStrictEqual(error?.locations, [])
	})

	describe('helpers', () => {
		it('should list memory in operand order', () => {
			const program = parse('STORE out idx[1] val')
			const [store] = program.items()
			assert.ok(store)
			assert.deepStrictEqual(
				referencedMemory(store).map((r) => `${r.name}[${r.index}]`),
				['out[0]', 'idx[1]', 'val[0]']
			)
		})

		it('should derive signatures from matrix and permutation sizes', () => {
			const program = parse('DEFGATE CCX AS PERMUTATION:\n    0, 1, 2, 3, 4, 5, 7, 6')
			assert.deepStrictEqual(gateSignature(program, 'CCX'), { parameters: 0, qubits: 3 })
			assert.strictEqual(gateSignature(program, 'missing'), null)
		})

		it('should apply modifiers outermost first', () => {
			const signature = modifiedSignature(
				{ parameters: 1, qubits: 1 },
				{
					kind: 'Gate',
					modifiers: ['FORKED', 'CONTROLLED'],
					name: 'R',
					parameters: [],
					qubits: [fixedQubit(0)],
				}
			)
			assert.deepStrictEqual(signature, { parameters: 2, qubits: 3 })
		})
	})
})
