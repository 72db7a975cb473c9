import { z } from 'zod'
import {
	type ColumnSpec,
	type EndpointDescriptor,
	type ParameterSpec,
	defineEndpoint,
} from '../core/descriptor.js'
import { DescriptorError } from '../errors/descriptor.js'
import premium from './premium.json' with { type: 'json' }

const parameterSchema = z.object({
	name: z.string().min(1),
	in: z.enum(['path', 'query']),
	type: z.enum(['string', 'integer', 'number', 'boolean', 'date', 'list', 'symbols', 'enum']),
	required: z.boolean(),
	default: z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]).optional(),
	values: z.array(z.string()).optional(),
	wireName: z.string().min(1).optional(),
	description: z.string().optional(),
})

const columnSchema = z.object({
	name: z.string().min(1),
	type: z.enum(['number', 'temporal', 'boolean', 'string', 'opaque', 'null']),
})

const paginationSchema = z.discriminatedUnion('mode', [
	z.object({ mode: z.literal('none') }),
	z.object({
		mode: z.literal('offset'),
		offsetParam: z.string().min(1),
		limitParam: z.string().min(1),
		pageSize: z.number().int().positive(),
	}),
	z.object({
		mode: z.literal('cursor'),
		cursorParam: z.string().min(1),
		cursorField: z.string().min(1),
	}),
])

const datasetSchema = z.object({
	name: z.string().min(1),
	provider: z.string().default(''),
	description: z.string().default(''),
	path: z.string(),
	parameterSets: z.array(z.string()).default([]),
	parameters: z.array(parameterSchema).default([]),
	columnSets: z.array(z.string()).default([]),
	columns: z.array(columnSchema).default([]),
	shape: z.enum(['object', 'array', 'keyed']).default('array'),
	keyField: z.string().min(1).optional(),
	pagination: paginationSchema.default({ mode: 'none' }),
})

const catalogSchema = z.object({
	parameterSets: z.record(z.array(parameterSchema)).default({}),
	columnSets: z.record(z.array(columnSchema)).default({}),
	datasets: z.array(datasetSchema),
})

/** Catalog file layout, before shared sets are expanded. */
export type CatalogInput = z.input<typeof catalogSchema>

function expand<T>(
	dataset: string,
	kind: string,
	names: readonly string[],
	sets: Record<string, T[]>,
): T[] {
	return names.flatMap((name) => {
		const set = sets[name]
		if (!set) throw new DescriptorError(dataset, `unknown ${kind} set "${name}"`)
		return set
	})
}

/** Later declarations of a column replace earlier ones, keeping the first position. */
function mergeColumns(columns: readonly ColumnSpec[]): ColumnSpec[] {
	const byName = new Map<string, ColumnSpec>()
	for (const column of columns) byName.set(column.name, column)
	return [...byName.values()]
}

/**
 * Validates catalog data and defines one descriptor per dataset. Shared parameter sets come
 * first, in the order listed, followed by the dataset's own parameters.
 */
export function loadCatalog(input: unknown): EndpointDescriptor[] {
	const parsed = catalogSchema.safeParse(input)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		throw new DescriptorError('catalog', `${issue?.path.join('.')}: ${issue?.message}`, {
			cause: parsed.error,
		})
	}

	const { parameterSets, columnSets, datasets } = parsed.data
	const names = new Set<string>()

	return datasets.map((dataset) => {
		if (names.has(dataset.name)) throw new DescriptorError(dataset.name, 'declared twice')
		names.add(dataset.name)

		const parameters: ParameterSpec[] = [
			...expand(dataset.name, 'parameter', dataset.parameterSets, parameterSets),
			...dataset.parameters,
		]
		const columns = mergeColumns([
			...expand(dataset.name, 'column', dataset.columnSets, columnSets),
			...dataset.columns,
		])

		return defineEndpoint({
			name: dataset.name,
			provider: dataset.provider,
			description: dataset.description,
			path: dataset.path,
			parameters,
			shape: dataset.shape,
			keyField: dataset.keyField,
			pagination: dataset.pagination,
			columns,
		})
	})
}

let premiumCatalog: readonly EndpointDescriptor[] | null = null

/** The bundled premium dataset catalog, loaded once. */
export function premiumDatasets(): readonly EndpointDescriptor[] {
	premiumCatalog ??= Object.freeze(loadCatalog(premium))
	return premiumCatalog
}
