import type { EndpointDescriptor } from '../core/descriptor.js'
import { type Engine, fetchRecords, fetchTable } from '../core/engine.js'
import type { CallOptions, CanonicalRecord, ParameterValues, Table } from '../types.js'

export type RecordAccessor = (params?: ParameterValues, options?: CallOptions) => Promise<CanonicalRecord[]>

export type TableAccessor = (params?: ParameterValues, options?: CallOptions) => Promise<Table>

export interface Accessors {
	/** `records.<name>(params)`: the provider's records. */
	records: Readonly<Record<string, RecordAccessor>>
	/** `tables.<name>DF(params)`: the same records as a typed table. */
	tables: Readonly<Record<string, TableAccessor>>
}

export function tableAccessorName(dataset: string): string {
	return `${dataset}DF`
}

/**
 * Builds the accessor pair for every descriptor. Each accessor is the same engine call
 * bound to its descriptor.
 */
export function buildAccessors(descriptors: readonly EndpointDescriptor[], engine: Engine): Accessors {
	const records: Record<string, RecordAccessor> = {}
	const tables: Record<string, TableAccessor> = {}

	for (const descriptor of descriptors) {
		records[descriptor.name] = (params = {}, options) => fetchRecords(descriptor, params, engine, options)
		tables[tableAccessorName(descriptor.name)] = (params = {}, options) =>
			fetchTable(descriptor, params, engine, options)
	}

	return { records: Object.freeze(records), tables: Object.freeze(tables) }
}
