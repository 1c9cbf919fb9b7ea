import { type BaseCommand, HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import CheckCommand from './commands/check.ts'
import DebugCommand from './commands/debug.ts'
import TokenizeCommand from './commands/tokenize.ts'

export const version = '0.1.0'

export function createKernel(): Kernel<typeof BaseCommand> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'keelc')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(new ListLoader([CheckCommand, DebugCommand, TokenizeCommand, HelpCommand]))
	return kernel
}
