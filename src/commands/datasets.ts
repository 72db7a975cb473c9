import type { Command } from 'commander'
import { premiumDatasets } from '../catalog/loader.js'
import { tableAccessorName } from '../catalog/registry.js'
import { formatKeyValue, formatTable } from '../core/formatter.js'
import { UnknownDatasetError } from '../errors/unknown-dataset.js'
import type { GlobalOptions } from '../types.js'

export function registerDatasetsCommand(program: Command): void {
	program
		.command('datasets')
		.description('List premium datasets and their parameters')
		.option('-p, --provider <provider>', 'only datasets from this provider')
		.action((cmdOpts: { provider?: string }) => {
			const opts = program.opts<GlobalOptions>()
			const wanted = cmdOpts.provider?.toLowerCase()
			const datasets = premiumDatasets().filter(
				(d) => !wanted || d.provider.toLowerCase().includes(wanted),
			)

			const rows = datasets.map((d) => [
				d.name,
				d.provider,
				d.path,
				d.parameters
					.filter((p) => p.required)
					.map((p) => p.name)
					.join(', '),
			])

			console.log(formatTable(['Dataset', 'Provider', 'Path', 'Required params'], rows, opts.format))
		})

	program
		.command('describe <dataset>')
		.description('Show one dataset: parameters, response shape, declared columns')
		.action((name: string) => {
			const opts = program.opts<GlobalOptions>()
			const descriptor = premiumDatasets().find((d) => d.name === name)
			if (!descriptor) throw new UnknownDatasetError(name)

			console.log(
				formatKeyValue(
					{
						Dataset: descriptor.name,
						'Table form': tableAccessorName(descriptor.name),
						Provider: descriptor.provider || undefined,
						Description: descriptor.description || undefined,
						Path: descriptor.path,
						Shape: descriptor.keyField ? `keyed by ${descriptor.keyField}` : descriptor.shape,
						Pagination: descriptor.pagination.mode,
						Columns: descriptor.columns.map((c) => `${c.name} (${c.type})`).join(', ') || undefined,
					},
					opts.format,
				),
			)

			if (descriptor.parameters.length === 0) return
			console.log()
			console.log(
				formatTable(
					['Parameter', 'In', 'Type', 'Required', 'Default'],
					descriptor.parameters.map((p) => [
						p.name,
						p.in,
						p.type === 'enum' ? `enum (${p.values?.join('|') ?? ''})` : p.type,
						p.required ? 'yes' : 'no',
						p.default === undefined ? '' : String(p.default),
					]),
					opts.format,
				),
			)
		})
}
