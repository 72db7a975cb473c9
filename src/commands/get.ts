import type { Command } from 'commander'
import type { EndpointDescriptor, ParameterSpec } from '../core/descriptor.js'
import { describeColumns, renderRecords, renderTable } from '../core/formatter.js'
import type { CallOptions, GlobalOptions, ParameterValue } from '../types.js'
import { clientFromOptions } from './client.js'

/**
 * Converts a command-line string to the type its parameter declares. Values that do not
 * convert are passed through as strings so the request builder reports them.
 */
function convert(param: ParameterSpec | undefined, raw: string): ParameterValue {
	switch (param?.type) {
		case 'integer':
		case 'number': {
			const n = Number(raw)
			return raw.trim() !== '' && Number.isFinite(n) ? n : raw
		}
		case 'boolean':
			if (raw === 'true') return true
			if (raw === 'false') return false
			return raw
		default:
			return raw
	}
}

/** Parses `key=value` arguments against a descriptor's parameters. */
export function parseAssignments(
	descriptor: EndpointDescriptor,
	args: readonly string[],
): Record<string, ParameterValue> {
	const params: Record<string, ParameterValue> = {}
	for (const arg of args) {
		const eqIdx = arg.indexOf('=')
		if (eqIdx <= 0) {
			throw new Error(`Expected key=value, got "${arg}"`)
		}
		const key = arg.slice(0, eqIdx)
		const param = descriptor.parameters.find((p) => p.name === key)
		params[key] = convert(param, arg.slice(eqIdx + 1))
	}
	return params
}

interface GetOptions {
	df?: boolean
	paginate?: boolean
	maxPages?: string
}

export function registerGetCommand(program: Command): void {
	program
		.command('get <dataset> [params...]')
		.description('Fetch a dataset, e.g. `pds get kScore symbol=AAPL last=5 --df`')
		.option('--df', 'return the typed table form')
		.option('--paginate', 'follow pagination until the last page')
		.option('--max-pages <n>', 'page limit when paginating')
		.action(async (dataset: string, args: string[], cmdOpts: GetOptions) => {
			const opts = program.opts<GlobalOptions>()
			const client = clientFromOptions(program)
			const params = parseAssignments(client.describe(dataset), args)
			const callOptions: CallOptions = { paginate: cmdOpts.paginate ?? false }
			if (cmdOpts.maxPages !== undefined) {
				const maxPages = Number.parseInt(cmdOpts.maxPages, 10)
				if (!(maxPages > 0)) throw new Error(`Invalid --max-pages: ${cmdOpts.maxPages}`)
				callOptions.maxPages = maxPages
			}

			if (cmdOpts.df) {
				const table = await client.fetchDF(dataset, params, callOptions)
				if (opts.verbose) console.error(`[pds] columns: ${describeColumns(table)}`)
				console.log(renderTable(table, opts.format))
				return
			}

			const records = await client.fetch(dataset, params, callOptions)
			console.log(renderRecords(records, opts.format))
		})
}
