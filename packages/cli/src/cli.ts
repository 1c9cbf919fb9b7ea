#!/usr/bin/env -S node --import tsx

import { createKernel, version } from './kernel.ts'

async function main(): Promise<void> {
	const kernel = createKernel()

	kernel.on('finding:command', async () => {
		console.log(`keelc v${version}`)
		console.log('')
		console.log('Usage: keelc [command] [options] <files...>')
		console.log('')
		console.log('Run "keelc --help" for available commands and options.')
		return true
	})

	await kernel.handle(process.argv.slice(2))
	process.exitCode = kernel.exitCode ?? 0
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
