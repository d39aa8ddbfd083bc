import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	analyzeSource,
	formatInvalidFormatError,
	formatReadError,
	isValidFormat,
	renderGraph,
} from '../utils.ts'

export default class GraphCommand extends BaseCommand {
	static override commandName = 'graph'
	static override description = 'Print the instruction dependency graph of each basic block'

	@args.string({ description: 'Input .quil file to analyze' })
	declare input: string

	@flags.string({
		alias: 'f',
		default: 'text',
		description: 'Output format: text or json',
	})
	declare format: string

	@flags.boolean({ description: 'Drop edges already implied by a longer path' })
	declare reduce: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	override async run(): Promise<void> {
		const format = this.format
		if (!isValidFormat(format)) {
			this.logger.error(formatInvalidFormatError(format))
			this.exitCode = 1
			return
		}

		const source = await this.readSourceFile()
		if (source === null) return

		const { context, program } = analyzeSource(source, this.input)
		if (program === null) {
			this.logger.error(context.formatAllDiagnostics())
			this.exitCode = 1
			return
		}

		this.logger.log(renderGraph(program.basicBlocks(), format, { transitiveReduction: this.reduce }))
	}
}
