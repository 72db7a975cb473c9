#!/usr/bin/env node
import { Command } from 'commander'
import pkg from '../package.json' with { type: 'json' }
import { registerConfigCommand } from './commands/config.js'
import { registerDatasetsCommand } from './commands/datasets.js'
import { registerGetCommand } from './commands/get.js'
import { loadConfig } from './core/config.js'
import type { OutputFormat } from './types.js'

const program = new Command()

program
	.name('pds')
	.description('Premium financial datasets from the command line')
	.version(pkg.version)
	.option('--json', 'output as JSON')
	.option('--plain', 'output as tab-separated values')
	.option('-v, --verbose', 'log requests to stderr')
	.option('--sandbox', 'use the sandbox environment')
	.option('--timeout <ms>', 'request timeout in milliseconds')
	.hook('preAction', () => {
		// Normalize format option
		const rawOpts = program.opts()
		let format: OutputFormat = loadConfig().defaultFormat ?? 'markdown'
		if (rawOpts.json) format = 'json'
		else if (rawOpts.plain) format = 'plain'
		// Store normalized format
		program.setOptionValue('format', format)
	})

registerDatasetsCommand(program)
registerGetCommand(program)
registerConfigCommand(program)

program.parseAsync(process.argv).catch((err) => {
	console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
	process.exit(1)
})
