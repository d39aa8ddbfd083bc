import assert from 'node:assert'
import { describe, it } from 'node:test'
import { parse } from '../../src/index.ts'
import { type BasicBlock, splitBasicBlocks } from '../../src/program/blocks.ts'
import { formatInstruction } from '../../src/serialize/serializer.ts'

function describeBlocks(blocks: readonly BasicBlock[]): Array<[string | null, string[], string | null]> {
	return blocks.map((block) => [
		block.label,
		block.instructions.map(formatInstruction),
		block.terminator === null ? null : formatInstruction(block.terminator),
	])
}

describe('program/blocks', () => {
	it('should put straight-line code in one block', () => {
		const blocks = parse('H 0\nCNOT 0 1\nMEASURE 0').basicBlocks()
		assert.deepStrictEqual(describeBlocks(blocks), [[null, ['H 0', 'CNOT 0 1', 'MEASURE 0'], null]])
	})

	it('should split at labels and terminators', () => {
		const blocks = parse('H 0\nLABEL @a\nX 0\nJUMP @a\nLABEL @b\nHALT').basicBlocks()
		assert.deepStrictEqual(describeBlocks(blocks), [
			[null, ['H 0'], null],
			['a', ['X 0'], 'JUMP @a'],
			['b', [], 'HALT'],
		])
	})

	it('should start a new block after a conditional jump', () => {
		const source = 'DECLARE c BIT\nLABEL @top\nX 0\nJUMP-UNLESS @top c\nY 0'
		assert.deepStrictEqual(describeBlocks(parse(source).basicBlocks()), [
			['top', ['X 0'], 'JUMP-UNLESS @top c[0]'],
			[null, ['Y 0'], null],
		])
	})

	it('should keep empty blocks that carry a label or a terminator', () => {
		assert.deepStrictEqual(describeBlocks(parse('JUMP @a\nJUMP @a\nLABEL @a').basicBlocks()), [
			[null, [], 'JUMP @a'],
			[null, [], 'JUMP @a'],
			['a', [], null],
		])
	})

	it('should give no blocks for an empty program', () => {
		assert.deepStrictEqual(splitBasicBlocks([]), [])
		assert.deepStrictEqual(parse('DECLARE ro BIT').basicBlocks(), [])
	})

	it('should leave definitions out of the blocks', () => {
		const blocks = parse('DEFCIRCUIT C a:\n    H a\n    HALT\nC 0').basicBlocks()
		assert.deepStrictEqual(describeBlocks(blocks), [[null, ['C 0'], null]])
	})

	it('should hand the declared regions to every block', () => {
		const blocks = parse('DECLARE ro BIT\nHALT\nH 0').basicBlocks()
		assert.strictEqual(blocks.length, 2)
		for (const block of blocks) assert.strictEqual(block.memoryRegions.get('ro')?.size.type, 'BIT')
	})
})
