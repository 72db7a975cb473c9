import { premiumDatasets } from './catalog/loader.js'
import { type RecordAccessor, type TableAccessor, buildAccessors } from './catalog/registry.js'
import { type ConnectionOptions, resolveContext } from './core/context.js'
import type { EndpointDescriptor } from './core/descriptor.js'
import { type Engine, fetchRecords, fetchTable } from './core/engine.js'
import { type Logger, createLogger } from './core/log.js'
import { type FetchFn, FetchTransport, type Transport } from './core/transport.js'
import { UnknownDatasetError } from './errors/unknown-dataset.js'
import type { CallOptions, CanonicalRecord, ParameterValues, Table } from './types.js'

export interface ClientOptions extends ConnectionOptions {
	/** Replacement `fetch` for the default transport (proxies, instrumentation). */
	fetch?: FetchFn
	/** Replaces the default transport entirely, e.g. with a rate-limiting wrapper. */
	transport?: Transport
	verbose?: boolean
	/** Receives verbose diagnostics instead of stderr. Implies `verbose` unless it is false. */
	logger?: Logger
	/** Descriptors to serve instead of the bundled premium catalog. */
	catalog?: readonly EndpointDescriptor[]
}

/**
 * Entry point: one accessor pair per dataset, sharing a transport and calling context.
 *
 * ```ts
 * const client = new PremiumClient({ token: process.env.IEX_TOKEN })
 * const scores = await client.records.kScore({ symbol: 'AAPL', last: 5 })
 * const table = await client.tables.kScoreDF({ symbol: 'AAPL', last: 5 })
 * ```
 */
export class PremiumClient {
	readonly records: Readonly<Record<string, RecordAccessor>>
	readonly tables: Readonly<Record<string, TableAccessor>>
	readonly #descriptors: Map<string, EndpointDescriptor>
	readonly #engine: Engine

	constructor(options: ClientOptions = {}) {
		const context = resolveContext(options)
		const transport =
			options.transport ?? new FetchTransport({ timeoutMs: context.timeoutMs, fetch: options.fetch })
		const verbose = options.verbose ?? options.logger !== undefined
		const catalog = options.catalog ?? premiumDatasets()

		this.#engine = { transport, context, log: createLogger(verbose, options.logger) }
		this.#descriptors = new Map(catalog.map((d) => [d.name, d]))
		const accessors = buildAccessors(catalog, this.#engine)
		this.records = accessors.records
		this.tables = accessors.tables
	}

	datasets(): EndpointDescriptor[] {
		return [...this.#descriptors.values()]
	}

	describe(dataset: string): EndpointDescriptor {
		const descriptor = this.#descriptors.get(dataset)
		if (!descriptor) throw new UnknownDatasetError(dataset)
		return descriptor
	}

	/** Same as `records[dataset]`, for names only known at run time. */
	async fetch(dataset: string, params: ParameterValues = {}, options?: CallOptions): Promise<CanonicalRecord[]> {
		return fetchRecords(this.describe(dataset), params, this.#engine, options)
	}

	/** Same as `tables[dataset + 'DF']`. */
	async fetchDF(dataset: string, params: ParameterValues = {}, options?: CallOptions): Promise<Table> {
		return fetchTable(this.describe(dataset), params, this.#engine, options)
	}
}
