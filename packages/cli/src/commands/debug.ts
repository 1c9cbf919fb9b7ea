import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	CompileError,
	formatDiagnosticLine,
	link,
	type ParsedSources,
	parseSources,
	renderFiles,
	renderUnit,
} from '@keel/compiler'
import { formatCompileError, readSources } from '../utils.ts'

export default class DebugCommand extends BaseCommand {
	static override commandName = 'debug'
	static override description = 'Print the parsed structure and hash of every declared type'

	@args.spread({ description: 'Schema files to dump' })
	declare files: string[]

	@flags.string({ description: 'Package prefix for every declared and referenced type' })
	declare packagePrefix?: string

	private fail(error: unknown): void {
		this.logger.error(formatCompileError(error))
		this.exitCode = 1
	}

	/** Resolved dump when the files link, otherwise the dump of the syntax trees without hashes. */
	private render(parsed: ParsedSources): string | undefined {
		try {
			return renderUnit(link(parsed.files))
		} catch (error: unknown) {
			if (!(error instanceof CompileError)) {
				this.fail(error)
				return undefined
			}
			this.logger.warning(`hashes unavailable: ${formatDiagnosticLine(error.diagnostic)}`)
			return renderFiles(parsed.files)
		}
	}

	override async run(): Promise<void> {
		const read = await readSources(this.files)
		if (!read.ok) {
			this.logger.error(read.message)
			this.exitCode = 1
			return
		}

		let parsed: ParsedSources
		try {
			parsed = parseSources(read.files, { packagePrefix: this.packagePrefix })
		} catch (error: unknown) {
			this.fail(error)
			return
		}

		for (const warning of parsed.warnings) {
			this.logger.warning(formatDiagnosticLine(warning))
		}
		const dump = this.render(parsed)
		if (dump !== undefined) this.logger.log(dump)
	}
}
