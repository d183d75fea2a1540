#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import RenderCommand from './commands/render.ts'
import { formatBanner } from './utils.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'gutter')
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

	kernel.addLoader(new ListLoader([RenderCommand, HelpCommand]))

	kernel.on('finding:command', async () => {
		for (const line of formatBanner(version, RenderCommand.flags)) console.log(line)
		return true
	})

	await kernel.handle(process.argv.slice(2))
	if (kernel.exitCode !== undefined) process.exitCode = kernel.exitCode
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
