import { readFile, writeFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { analyzeSource, formatReadError, formatWriteError } from '../utils.ts'

export default class FormatCommand extends BaseCommand {
	static override commandName = 'format'
	static override description = 'Print a Quil source file in canonical form'

	@args.string({ description: 'Input .quil file to format' })
	declare input: string

	@flags.boolean({ alias: 'w', description: 'Rewrite the file in place instead of printing it' })
	declare write: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private async writeOutputFile(text: string): Promise<void> {
		try {
			await writeFile(this.input, text)
			this.logger.success(`Formatted ${this.input}`)
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
		}
	}

	override async run(): Promise<void> {
		const source = await this.readSourceFile()
		if (source === null) return

		const { context, program } = analyzeSource(source, this.input)
		if (program === null) {
			this.logger.error(context.formatAllDiagnostics())
			this.exitCode = 1
			return
		}

		const text = program.toText()
		if (this.write) {
			await this.writeOutputFile(text)
		} else {
			this.logger.log(text.trimEnd())
		}
	}
}
