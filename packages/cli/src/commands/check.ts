import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	analyzeSource,
	formatProcessingError,
	formatReadError,
	formatStrictFailure,
	formatValidationFindings,
} from '../utils.ts'

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Parse and validate a Quil source file'

	@args.string({ description: 'Input .quil file to check' })
	declare input: string

	@flags.boolean({ description: 'Exit with an error when validation reports findings' })
	declare strict: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private checkSource(source: string): void {
		const { context, program } = analyzeSource(source, this.input)
		if (program === null) {
			this.logger.error(context.formatAllDiagnostics())
			this.exitCode = 1
			return
		}

		const findings = program.validate()
		for (const message of formatValidationFindings(context, findings)) {
			this.logger.warning(message)
		}

		if (findings.length === 0) {
			this.logger.success(`${this.input}: ${program.items().length} item(s), no problems found`)
		} else if (this.strict) {
			this.logger.error(formatStrictFailure(findings.length))
			this.exitCode = 1
		}
	}

	override async run(): Promise<void> {
		const source = await this.readSourceFile()
		if (source === null) return

		try {
			this.checkSource(source)
		} catch (error: unknown) {
			this.logger.error(formatProcessingError(error))
			this.exitCode = 1
		}
	}
}
