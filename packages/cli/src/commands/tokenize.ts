import { args, BaseCommand, flags } from '@adonisjs/ace'
import { CompilationContext, formatDiagnosticLine, renderTokens, tokenize } from '@keel/compiler'
import { readSources } from '../utils.ts'

export default class TokenizeCommand extends BaseCommand {
	static override commandName = 'tokenize'
	static override description = 'Print the token stream of each schema file'

	@args.spread({ description: 'Schema files to tokenize' })
	declare files: string[]

	@flags.boolean({ description: 'Add a token kind column' })
	declare kinds: boolean

	@flags.boolean({ description: 'Report every unrecognized character and keep scanning' })
	declare recover: boolean

	private tokenizeFile(filename: string, source: string): boolean {
		const context = new CompilationContext(source, filename)
		tokenize(context, { recover: this.recover })

		const tokens = Array.from(context.tokens, ([, token]) => token)
		this.logger.log(renderTokens(tokens, { kinds: this.kinds }))

		for (const diagnostic of context.getErrors()) {
			this.logger.error(formatDiagnosticLine(diagnostic))
		}
		return !context.hasErrors()
	}

	override async run(): Promise<void> {
		const read = await readSources(this.files)
		if (!read.ok) {
			this.logger.error(read.message)
			this.exitCode = 1
			return
		}

		for (const { filename, source } of read.files) {
			if (!this.tokenizeFile(filename, source)) {
				this.exitCode = 1
				return
			}
		}
	}
}
