import { args, BaseCommand, flags } from '@adonisjs/ace'
import { CompileError, type CompileResult, compile } from '@keel/compiler'
import { formatCompileError, formatDiagnosticReport, readSources } from '../utils.ts'

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Compile schema files and report the first error'

	@args.spread({ description: 'Schema files to compile together' })
	declare files: string[]

	@flags.string({ description: 'Package prefix for every declared and referenced type' })
	declare packagePrefix?: string

	override async run(): Promise<void> {
		const read = await readSources(this.files)
		if (!read.ok) {
			this.logger.error(read.message)
			this.exitCode = 1
			return
		}

		let result: CompileResult
		try {
			result = compile(read.files, { packagePrefix: this.packagePrefix })
		} catch (error: unknown) {
			const report =
				error instanceof CompileError
					? formatDiagnosticReport(error.diagnostic, read.files)
					: formatCompileError(error)
			this.logger.error(report)
			this.exitCode = 1
			return
		}

		for (const warning of result.warnings) {
			this.logger.warning(formatDiagnosticReport(warning, read.files))
		}
		const types = result.unit.count()
		this.logger.success(
			`${types} ${types === 1 ? 'type' : 'types'} in ${read.files.length} ${read.files.length === 1 ? 'file' : 'files'}`
		)
	}
}
