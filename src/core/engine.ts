import { InvalidParameterError } from '../errors/invalid-parameter.js'
import { PaginationLimitError } from '../errors/pagination-limit.js'
import type { CallOptions, CanonicalRecord, ParameterValues, Table } from '../types.js'
import type { RequestContext } from './context.js'
import type { EndpointDescriptor } from './descriptor.js'
import type { Logger } from './log.js'
import { normalize } from './normalizer.js'
import { buildRequest, redactUrl } from './request-builder.js'
import { toTable } from './tabularizer.js'
import type { Transport } from './transport.js'

export const DEFAULT_MAX_PAGES = 50

/** Everything a call needs besides the descriptor and parameters. */
export interface Engine {
	transport: Transport
	context: RequestContext
	log: Logger
}

async function fetchPage(
	descriptor: EndpointDescriptor,
	params: ParameterValues,
	engine: Engine,
	signal: AbortSignal | undefined,
): Promise<CanonicalRecord[]> {
	const spec = buildRequest(descriptor, params, engine.context)

	const started = Date.now()
	engine.log(`GET ${redactUrl(spec.url)}`)
	const response = await engine.transport.execute(spec, signal)
	engine.log(`${descriptor.name}: ${response.status} in ${Date.now() - started}ms`)

	const records = normalize(response, descriptor)
	engine.log(`${descriptor.name}: ${records.length} record(s)`)
	return records
}

async function fetchOffsetPages(
	descriptor: EndpointDescriptor,
	params: ParameterValues,
	engine: Engine,
	options: CallOptions,
	pagination: { offsetParam: string; limitParam: string; pageSize: number },
): Promise<CanonicalRecord[]> {
	const { offsetParam, limitParam, pageSize } = pagination
	const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES
	const givenLimit = params[limitParam]
	const givenOffset = params[offsetParam]
	const limit = typeof givenLimit === 'number' ? givenLimit : pageSize
	let offset = typeof givenOffset === 'number' ? givenOffset : 0
	if (limit < 1) {
		throw new InvalidParameterError(descriptor.name, limitParam, 'must be at least 1 when paginating')
	}

	const all: CanonicalRecord[] = []
	for (let page = 1; page <= maxPages; page++) {
		engine.log(`${descriptor.name}: page ${page} (offset ${offset})`)
		const records = await fetchPage(
			descriptor,
			{ ...params, [offsetParam]: offset, [limitParam]: limit },
			engine,
			options.signal,
		)
		all.push(...records)
		if (records.length < limit) return all
		offset += records.length
	}
	throw new PaginationLimitError(descriptor.name, maxPages)
}

async function fetchCursorPages(
	descriptor: EndpointDescriptor,
	params: ParameterValues,
	engine: Engine,
	options: CallOptions,
	pagination: { cursorParam: string; cursorField: string },
): Promise<CanonicalRecord[]> {
	const { cursorParam, cursorField } = pagination
	const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES
	const given = params[cursorParam]
	let cursor = typeof given === 'string' ? given : undefined
	const used = new Set<string>(cursor === undefined ? [] : [cursor])

	const all: CanonicalRecord[] = []
	for (let page = 1; page <= maxPages; page++) {
		engine.log(`${descriptor.name}: page ${page}${cursor === undefined ? '' : ` (cursor ${cursor})`}`)
		const records = await fetchPage(
			descriptor,
			cursor === undefined ? params : { ...params, [cursorParam]: cursor },
			engine,
			options.signal,
		)
		all.push(...records)

		const next = records.at(-1)?.[cursorField]
		if (records.length === 0 || next == null || next === '') return all
		const nextCursor = String(next)
		// provider echoed a cursor it already served
		if (used.has(nextCursor)) return all
		used.add(nextCursor)
		cursor = nextCursor
	}
	throw new PaginationLimitError(descriptor.name, maxPages)
}

/**
 * build → execute → normalize. With `paginate`, repeats per the descriptor's pagination and
 * concatenates pages in request order.
 */
export async function fetchRecords(
	descriptor: EndpointDescriptor,
	params: ParameterValues,
	engine: Engine,
	options: CallOptions = {},
): Promise<CanonicalRecord[]> {
	const { pagination } = descriptor
	if (!options.paginate || pagination.mode === 'none') {
		return fetchPage(descriptor, params, engine, options.signal)
	}
	if (pagination.mode === 'offset') {
		return fetchOffsetPages(descriptor, params, engine, options, pagination)
	}
	return fetchCursorPages(descriptor, params, engine, options, pagination)
}

export async function fetchTable(
	descriptor: EndpointDescriptor,
	params: ParameterValues,
	engine: Engine,
	options: CallOptions = {},
): Promise<Table> {
	const records = await fetchRecords(descriptor, params, engine, options)
	return toTable(records, descriptor.columns)
}
