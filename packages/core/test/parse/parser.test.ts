import assert from 'node:assert'
import { describe, it } from 'node:test'
import { SourceContext } from '../../src/core/context.ts'
import { LexError, ParseError } from '../../src/core/errors.ts'
import { constant, infix, number, variable } from '../../src/expression/types.ts'
import { parse } from '../../src/index.ts'
import { tokenize } from '../../src/lex/tokenizer.ts'
import { parseProgram } from '../../src/parse/parser.ts'
import { fixedQubit, type Instruction, type InstructionKind, qubitVariable } from '../../src/program/instructions.ts'
import { formatInstruction } from '../../src/serialize/serializer.ts'

type Of<K extends InstructionKind> = Extract<Instruction, { kind: K }>

function isKind<K extends InstructionKind>(instruction: Instruction, kind: K): instruction is Of<K> {
	return instruction.kind === kind
}

/** Parses a one-item program and returns the item, checking its kind. */
function single<K extends InstructionKind>(source: string, kind: K): Of<K> {
	const items = parse(source).items()
	assert.strictEqual(items.length, 1)
	const [item] = items
	assert.ok(item !== undefined && isKind(item, kind), `expected ${kind}, got ${item?.kind}`)
	return item
}

function parseFailure(source: string): ParseError {
	try {
		parse(source)
	} catch (error) {
		if (error instanceof ParseError) return error
		throw error
	}
	assert.fail(`expected ${JSON.stringify(source)} to fail`)
}

describe('parse/parser', () => {
	describe('programs', () => {
		it('should parse one item per line', () => {
			const program = parse('H 0\nCNOT 0 1\nMEASURE 0 ro[0]')
			assert.deepStrictEqual(
				program.items().map((i) => i.kind),
				['Gate', 'Gate', 'Measurement']
			)
		})

		it('should accept semicolons between instructions', () => {
			const program = parse('X 0; Y 1;\nZ 2')
			assert.deepStrictEqual(program.items().map(formatInstruction), ['X 0', 'Y 1', 'Z 2'])
		})

		it('should skip blank lines and comments', () => {
			const program = parse('# Bell pair\n\nH 0  # superpose\n\nCNOT 0 1\n')
			assert.strictEqual(program.items().length, 2)
		})

		it('should parse an empty program', () => {
			assert.deepStrictEqual(parse('').items(), [])
		})

		it('should record the location of each instruction', () => {
			const [, second] = parse('H 0\n  \nX 1').items()
			assert.deepStrictEqual(second?.location, { column: 1, line: 3, offset: 7 })
		})
	})

	describe('gate applications', () => {
		it('should parse qubits', () => {
			const gate = single('CNOT 0 1', 'Gate')
			assert.strictEqual(gate.name, 'CNOT')
			assert.deepStrictEqual(gate.qubits, [fixedQubit(0), fixedQubit(1)])
			assert.deepStrictEqual(gate.parameters, [])
			assert.deepStrictEqual(gate.modifiers, [])
		})

		it('should parse parameter expressions', () => {
			const gate = single('RX(pi/2) 0', 'Gate')
			assert.deepStrictEqual(gate.parameters, [infix(constant('pi'), '/', number(2))])
		})

		it('should parse several parameters', () => {
			const gate = single('U(%a, -%b, 0.5) q', 'Gate')
			assert.strictEqual(gate.parameters.length, 3)
			assert.deepStrictEqual(gate.parameters[0], variable('a'))
			assert.deepStrictEqual(gate.qubits, [qubitVariable('q')])
		})

		it('should parse stacked modifiers outermost first', () => {
			const gate = single('CONTROLLED DAGGER FORKED RX(0, pi) 2 1 0', 'Gate')
			assert.deepStrictEqual(gate.modifiers, ['CONTROLLED', 'DAGGER', 'FORKED'])
			assert.strictEqual(gate.name, 'RX')
			assert.strictEqual(gate.qubits.length, 3)
		})

		it('should fail on a gate with no qubit', () => {
			const error = parseFailure('H')
			assert.strictEqual(error.code, 'QTPARSE001')
			assert.strictEqual(error.line, 1)
			assert.strictEqual(error.column, 2)
			assert.deepStrictEqual(error.expected, ['"("', 'a qubit index'])
			assert.strictEqual(error.found, 'end of input')
			assert.strictEqual(error.message, 'expected "(" or a qubit index, found end of input at 1:2')
		})

		it('should only expect qubits after a parameter list', () => {
			const error = parseFailure('RX(pi)\nH 0')
			assert.deepStrictEqual(error.expected, ['a qubit index'])
			assert.strictEqual(error.found, 'end of line')
		})

		it('should report an invalid parameter expression at the offending token', () => {
			const error = parseFailure('RX(1 + ) 0')
			assert.strictEqual(error.code, 'QTPARSE002')
			assert.strictEqual(error.found, '")"')
			assert.strictEqual(error.column, 8)
		})
	})

	describe('measurement and reset', () => {
		it('should parse a measurement into memory', () => {
			const measurement = single('MEASURE 0 ro[1]', 'Measurement')
			assert.deepStrictEqual(measurement.qubit, fixedQubit(0))
			assert.deepStrictEqual(measurement.target, { index: 1, name: 'ro' })
		})

		it('should read a bare region name as element 0', () => {
			assert.deepStrictEqual(single('MEASURE 0 ro', 'Measurement').target, { index: 0, name: 'ro' })
		})

		it('should parse a discarding measurement', () => {
			assert.strictEqual(single('MEASURE 3', 'Measurement').target, null)
		})

		it('should parse global and single-qubit resets', () => {
			assert.strictEqual(single('RESET', 'Reset').qubit, null)
			assert.deepStrictEqual(single('RESET 2', 'Reset').qubit, fixedQubit(2))
		})
	})

	describe('classical memory', () => {
		it('should parse declarations', () => {
			const declaration = single('DECLARE ro BIT[2]', 'Declaration')
			assert.strictEqual(declaration.name, 'ro')
			assert.deepStrictEqual(declaration.size, { length: 2, type: 'BIT' })
			assert.strictEqual(declaration.sharing, null)
		})

		it('should parse sharing with offsets', () => {
			const declaration = single('DECLARE flags BIT[8] SHARING params OFFSET 1 REAL', 'Declaration')
			assert.deepStrictEqual(declaration.sharing, {
				name: 'params',
				offsets: [{ offset: 1, type: 'REAL' }],
			})
		})

		it('should reject an unknown type', () => {
			const error = parseFailure('DECLARE ro FLOAT')
			assert.deepStrictEqual(error.expected, ['BIT', 'INTEGER', 'OCTET', 'REAL'])
			assert.strictEqual(error.found, '"FLOAT"')
		})

		it('should parse moves with signed literals', () => {
			const move = single('MOVE ro[0] -1', 'Move')
			assert.deepStrictEqual(move.source, { kind: 'Integer', value: -1 })
			assert.deepStrictEqual(single('MOVE theta 1.5', 'Move').source, { kind: 'Real', value: 1.5 })
		})

		it('should parse arithmetic and comparison', () => {
			const add = single('ADD theta[1] phase', 'Arithmetic')
			assert.strictEqual(add.operator, 'ADD')
			assert.deepStrictEqual(add.source, { kind: 'Memory', reference: { index: 0, name: 'phase' } })

			const comparison = single('GT flag[0] count[0] 3', 'Comparison')
			assert.strictEqual(comparison.operator, 'GT')
			assert.deepStrictEqual(comparison.right, { kind: 'Integer', value: 3 })
		})

		it('should parse logic, exchange, convert, load and store', () => {
			assert.strictEqual(single('NOT ro[1]', 'UnaryLogic').operator, 'NOT')
			assert.strictEqual(single('XOR ro[0] 1', 'BinaryLogic').operator, 'XOR')
			assert.deepStrictEqual(single('EXCHANGE a[0] b[1]', 'Exchange').right, { index: 1, name: 'b' })
			assert.deepStrictEqual(single('CONVERT r[0] i[0]', 'Convert').source, { index: 0, name: 'i' })
			assert.strictEqual(single('LOAD x[0] table n[0]', 'Load').source, 'table')
			assert.strictEqual(single('STORE table n[0] 2.5', 'Store').destination, 'table')
		})

		it('should require integer operands for bitwise logic', () => {
			const error = parseFailure('AND ro 1.5')
			assert.deepStrictEqual(error.expected, ['a memory reference', 'an integer'])
			assert.strictEqual(error.found, '"1.5"')
		})
	})

	describe('control flow', () => {
		it('should parse labels and jumps', () => {
			const program = parse('LABEL @loop\nJUMP-WHEN @loop ro[0]\nJUMP-UNLESS @end ro\nJUMP @loop\nLABEL @end\nHALT')
			assert.deepStrictEqual(
				program.items().map((i) => i.kind),
				['Label', 'JumpWhen', 'JumpUnless', 'Jump', 'Label', 'Halt']
			)
			assert.deepStrictEqual(program.labels(), ['loop', 'end'])
		})

		it('should require a label after JUMP', () => {
			const error = parseFailure('JUMP loop')
			assert.deepStrictEqual(error.expected, ['a label'])
			assert.strictEqual(error.found, '"loop"')
		})

		it('should parse WAIT and NOP', () => {
			assert.deepStrictEqual(
				parse('WAIT\nNOP').items().map((i) => i.kind),
				['Wait', 'Nop']
			)
		})

		it('should parse pragmas with arguments and data', () => {
			const pragma = single('PRAGMA ADD-KRAUS X 0 "(0.5 0.5)"', 'Pragma')
			assert.strictEqual(pragma.name, 'ADD-KRAUS')
			assert.deepStrictEqual(pragma.arguments, [
				{ kind: 'Identifier', name: 'X' },
				{ kind: 'Integer', value: 0 },
			])
			assert.strictEqual(pragma.data, '(0.5 0.5)')
		})

		it('should reject a keyword that does not start an instruction', () => {
			const error = parseFailure('SHARING ro')
			assert.deepStrictEqual(error.expected, ['an instruction'])
			assert.strictEqual(error.found, '"SHARING"')
			assert.strictEqual(error.column, 1)
		})

		it('should reject trailing operands', () => {
			const error = parseFailure('HALT 0')
			assert.deepStrictEqual(error.expected, ['end of line'])
			assert.strictEqual(error.column, 6)
		})
	})

	describe('pulse-level instructions', () => {
		it('should parse pulses with waveform arguments', () => {
			const pulse = single('PULSE 0 "xy" gaussian(duration: 1e-6, fwhm: 0.5)', 'Pulse')
			assert.strictEqual(pulse.blocking, true)
			assert.deepStrictEqual(pulse.frame, { name: 'xy', qubits: [fixedQubit(0)] })
			assert.deepStrictEqual(pulse.waveform, {
				name: 'gaussian',
				parameters: [
					{ name: 'duration', value: number(1e-6) },
					{ name: 'fwhm', value: number(0.5) },
				],
			})
		})

		it('should parse nonblocking commands', () => {
			assert.strictEqual(single('NONBLOCKING PULSE 0 1 "cz" flat', 'Pulse').blocking, false)
			const error = parseFailure('NONBLOCKING DELAY 0 1')
			assert.deepStrictEqual(error.expected, ['"PULSE"', '"CAPTURE"', '"RAW-CAPTURE"'])
		})

		it('should parse captures', () => {
			const capture = single('CAPTURE 0 "ro_rx" boxcar(duration: 2e-6) iq[0]', 'Capture')
			assert.deepStrictEqual(capture.target, { index: 0, name: 'iq' })
			const raw = single('RAW-CAPTURE 0 "ro_rx" 2e-6 * 2 iq[1]', 'RawCapture')
			assert.deepStrictEqual(raw.duration, infix(number(2e-6), '*', number(2)))
			assert.deepStrictEqual(raw.target, { index: 1, name: 'iq' })
		})

		it('should split DELAY qubits from an integer duration', () => {
			const delay = single('DELAY 0 1 100', 'Delay')
			assert.deepStrictEqual(delay.qubits, [fixedQubit(0), fixedQubit(1)])
			assert.deepStrictEqual(delay.frameNames, [])
			assert.deepStrictEqual(delay.duration, number(100))
		})

		it('should parse DELAY with frame names', () => {
			const delay = single('DELAY 0 "rf" "xy" 1.5e-6', 'Delay')
			assert.deepStrictEqual(delay.qubits, [fixedQubit(0)])
			assert.deepStrictEqual(delay.frameNames, ['rf', 'xy'])
		})

		it('should keep a duration expression after DELAY qubits', () => {
			const delay = single('DELAY q 2 * %t', 'Delay')
			assert.deepStrictEqual(delay.qubits, [qubitVariable('q')])
			assert.deepStrictEqual(delay.duration, infix(number(2), '*', variable('t')))
		})

		it('should parse fences', () => {
			assert.deepStrictEqual(single('FENCE', 'Fence').qubits, [])
			assert.deepStrictEqual(single('FENCE 0 1', 'Fence').qubits, [fixedQubit(0), fixedQubit(1)])
		})

		it('should parse frame updates and phase swaps', () => {
			const update = single('SHIFT-PHASE 0 "rf" -pi/2', 'FrameUpdate')
			assert.strictEqual(update.operation, 'SHIFT-PHASE')
			assert.strictEqual(formatInstruction(update), 'SHIFT-PHASE 0 "rf" -pi / 2')
			const swap = single('SWAP-PHASES 0 "a" 1 "b"', 'SwapPhases')
			assert.deepStrictEqual(swap.right, { name: 'b', qubits: [fixedQubit(1)] })
		})

		it('should require a frame name', () => {
			// `flat` reads as a placeholder qubit, so the name is missing at the end
			const error = parseFailure('PULSE 0 flat')
			assert.deepStrictEqual(error.expected, ['a frame name'])
			assert.strictEqual(error.found, 'end of input')
		})
	})

	describe('definitions', () => {
		it('should parse a gate matrix', () => {
			const definition = single('DEFGATE SQRT-X:\n    0.5+0.5*i, 0.5-0.5*i\n    0.5-0.5*i, 0.5+0.5*i\n', 'GateDefinition')
			assert.strictEqual(definition.name, 'SQRT-X')
			assert.strictEqual(definition.specification.kind, 'Matrix')
			if (definition.specification.kind === 'Matrix') {
				assert.deepStrictEqual(
					definition.specification.rows.map((row) => row.length),
					[2, 2]
				)
			}
		})

		it('should parse a parameterized gate', () => {
			const definition = single(
				'DEFGATE CRX(%theta) AS MATRIX:\n    1, 0, 0, 0\n    0, 1, 0, 0\n    0, 0, cos(%theta/2), -i*sin(%theta/2)\n    0, 0, -i*sin(%theta/2), cos(%theta/2)',
				'GateDefinition'
			)
			assert.deepStrictEqual(definition.parameters, ['theta'])
		})

		it('should parse a permutation gate', () => {
			const definition = single('DEFGATE CCNOT AS PERMUTATION:\n    0, 1, 2, 3, 4, 5, 7, 6', 'GateDefinition')
			assert.deepStrictEqual(definition.specification, {
				kind: 'Permutation',
				permutation: [0, 1, 2, 3, 4, 5, 7, 6],
			})
		})

		it('should parse a circuit with its body', () => {
			const program = parse('DEFCIRCUIT BELL a b:\n    H a\n\n    CNOT a b\nBELL 0 1')
			const [definition, use] = program.items()
			assert.ok(definition !== undefined && isKind(definition, 'CircuitDefinition'))
			assert.deepStrictEqual(definition.qubits, ['a', 'b'])
			assert.deepStrictEqual(definition.body.map(formatInstruction), ['H a', 'CNOT a b'])
			assert.strictEqual(use?.kind, 'Gate')
			assert.strictEqual(program.circuitDefinition('BELL'), definition)
		})

		it('should parse calibrations', () => {
			const calibration = single('DEFCAL RX(pi/2) 0:\n    PULSE 0 "xy" drag(duration: 1e-6)', 'CalibrationDefinition')
			assert.strictEqual(calibration.name, 'RX')
			assert.deepStrictEqual(calibration.qubits, [fixedQubit(0)])
			assert.strictEqual(calibration.body.length, 1)

			const measure = single('DEFCAL MEASURE q addr:\n    CAPTURE q "ro_rx" kernel addr', 'MeasureCalibrationDefinition')
			assert.deepStrictEqual(measure.qubit, qubitVariable('q'))
			assert.strictEqual(measure.target, 'addr')
		})

		it('should parse frames with and without attributes', () => {
			const frame = single('DEFFRAME 0 "xy":\n    SAMPLE-RATE: 1e9\n    DIRECTION: "tx"', 'FrameDefinition')
			assert.deepStrictEqual(frame.attributes, [
				{ name: 'SAMPLE-RATE', value: { expression: number(1e9), kind: 'Expression' } },
				{ name: 'DIRECTION', value: { kind: 'String', value: 'tx' } },
			])
			assert.deepStrictEqual(single('DEFFRAME 1 "rf"', 'FrameDefinition').attributes, [])
		})

		it('should flatten waveform rows into samples', () => {
			const waveform = single('DEFWAVEFORM ramp:\n    0, 0.25\n    0.5, 1*i', 'WaveformDefinition')
			assert.strictEqual(waveform.samples.length, 4)
		})

		it('should reject a definition inside a body', () => {
			const error = parseFailure('DEFCIRCUIT OUTER:\n    DEFGATE X:\n        0, 1')
			assert.strictEqual(error.code, 'QTPARSE003')
			assert.strictEqual(error.line, 2)
			assert.strictEqual(error.column, 5)
			assert.strictEqual(error.message, 'DEFGATE is not allowed inside a definition body at 2:5')
		})

		it('should reject a gate with no rows', () => {
			const error = parseFailure('DEFGATE EMPTY:\nH 0')
			assert.deepStrictEqual(error.expected, ['an indented row'])
		})

		it('should reject indentation outside a definition', () => {
			const error = parseFailure('H 0\n    X 1')
			assert.strictEqual(error.found, 'indentation')
			assert.strictEqual(error.line, 2)
		})
	})

	describe('diagnostics', () => {
		it('should emit the first error to the context and return no program', () => {
			const ctx = new SourceContext('H 0\nMEASURE', 'prog.quil')
			tokenize(ctx)
			const result = parseProgram(ctx)

			assert.strictEqual(result.succeeded, false)
			assert.strictEqual(result.program, undefined)
			const [diagnostic] = ctx.getDiagnostics()
			assert.ok(diagnostic)
			assert.strictEqual(diagnostic.message, 'expected a qubit index, found end of input')
			assert.strictEqual(diagnostic.line, 2)
			assert.strictEqual(diagnostic.column, 8)
		})

		it('should surface lexical errors from parse', () => {
			assert.throws(() => parse('H 0\nX ?'), LexError)
		})
	})
})
