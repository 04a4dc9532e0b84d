#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import FormatCommand from './commands/format.ts'

const kernel = Kernel.create()

kernel.info.set('binary', 'indentkit')
kernel.info.set('version', '0.1.0')

kernel.defineFlag('help', {
	alias: 'h',
	description: 'Show help for a command',
	type: 'boolean',
})

kernel.defineFlag('version', {
	alias: 'v',
	description: 'Print the indentkit version',
	type: 'boolean',
})

// `indentkit format --help` renders ace's help page for `format`.
kernel.on('help', async (command, $kernel, parsed) => {
	parsed.args.unshift(command.commandName)
	await new HelpCommand($kernel, parsed, kernel.ui, kernel.prompt).exec()
	return $kernel.shortcircuit()
})

kernel.on('version', async (_command, $kernel) => {
	kernel.ui.logger.log(`indentkit ${String(kernel.info.get('version'))}`)
	return $kernel.shortcircuit()
})

kernel.addLoader(new ListLoader([FormatCommand, HelpCommand]))

try {
	await kernel.handle(process.argv.slice(2))
} catch (error: unknown) {
	kernel.ui.logger.error(error instanceof Error ? error.message : String(error))
	process.exitCode = 1
}
