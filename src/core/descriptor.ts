import { DescriptorError } from '../errors/descriptor.js'
import type { ColumnType } from '../types.js'

export type ParameterType =
	| 'string'
	| 'integer'
	| 'number'
	| 'boolean'
	| 'date'
	| 'list'
	| 'symbols'
	| 'enum'

export type ParameterLocation = 'path' | 'query'

export type DefaultValue = string | number | boolean | readonly string[]

export interface ParameterSpec {
	readonly name: string
	readonly in: ParameterLocation
	readonly type: ParameterType
	readonly required: boolean
	readonly default?: DefaultValue
	/** Accepted values for `enum` parameters. */
	readonly values?: readonly string[]
	/** Name sent to the provider when it differs from the accessor's parameter name. */
	readonly wireName?: string
	readonly description?: string
}

export type ResponseShape = 'object' | 'array' | 'keyed'

export type Pagination =
	| { readonly mode: 'none' }
	| {
			readonly mode: 'offset'
			readonly offsetParam: string
			readonly limitParam: string
			readonly pageSize: number
	  }
	| { readonly mode: 'cursor'; readonly cursorParam: string; readonly cursorField: string }

export type PaginationMode = Pagination['mode']

export interface ColumnSpec {
	readonly name: string
	readonly type: ColumnType
}

export interface EndpointDescriptor {
	readonly name: string
	readonly provider: string
	readonly description: string
	/** Path relative to the versioned base URL, e.g. `time-series/KSCORE/{symbol}`. */
	readonly path: string
	readonly parameters: readonly ParameterSpec[]
	readonly shape: ResponseShape
	/** Field that receives each key of a `keyed` response. */
	readonly keyField?: string
	readonly pagination: Pagination
	readonly columns: readonly ColumnSpec[]
}

export interface EndpointInput {
	name: string
	path: string
	provider?: string
	description?: string
	parameters?: readonly ParameterSpec[]
	shape?: ResponseShape
	keyField?: string
	pagination?: Pagination
	columns?: readonly ColumnSpec[]
}

/** Token query parameter appended by the request builder. */
export const CREDENTIAL_PARAM = 'token'

const NAME = /^[A-Za-z][A-Za-z0-9]*$/
const SLOT = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g

export function pathSlots(path: string): string[] {
	return [...path.matchAll(SLOT)].map((m) => m[1])
}

export function wireName(param: ParameterSpec): string {
	return param.wireName ?? param.name
}

function checkParameters(name: string, path: string, parameters: readonly ParameterSpec[]): void {
	const fail = (message: string): never => {
		throw new DescriptorError(name, message)
	}

	const seen = new Set<string>()
	const wire = new Set<string>()
	for (const p of parameters) {
		if (seen.has(p.name)) fail(`duplicate parameter "${p.name}"`)
		seen.add(p.name)
		if (p.in === 'query') {
			const w = wireName(p)
			if (w === CREDENTIAL_PARAM) fail(`query parameter "${p.name}" collides with the credential`)
			if (wire.has(w)) fail(`duplicate query parameter "${w}"`)
			wire.add(w)
		}
		if (p.type === 'enum') {
			if (!p.values || p.values.length === 0) fail(`enum parameter "${p.name}" lists no values`)
			if (typeof p.default === 'string' && !p.values?.includes(p.default)) {
				fail(`default of "${p.name}" is not one of its values`)
			}
		}
	}

	const slots = pathSlots(path)
	const pathParams = parameters.filter((p) => p.in === 'path')
	for (const slot of slots) {
		if (!pathParams.some((p) => p.name === slot)) fail(`path slot {${slot}} has no path parameter`)
	}
	if (new Set(slots).size !== slots.length) fail('path repeats a slot')
	for (const p of pathParams) {
		if (!slots.includes(p.name)) fail(`path parameter "${p.name}" has no slot in "${path}"`)
	}

	let optionalSeen = false
	for (const slot of slots) {
		const param = pathParams.find((p) => p.name === slot)
		if (param?.required) {
			if (optionalSeen) fail(`required path slot {${slot}} follows an optional one`)
			continue
		}
		optionalSeen = true
		if (!path.includes(`/{${slot}}`)) fail(`optional path slot {${slot}} must be a whole segment`)
	}
}

function checkPagination(name: string, pagination: Pagination, parameters: readonly ParameterSpec[]): void {
	const queryParam = (param: string) => parameters.some((p) => p.name === param && p.in === 'query')
	const fail = (message: string): never => {
		throw new DescriptorError(name, message)
	}

	switch (pagination.mode) {
		case 'none':
			return
		case 'offset':
			if (!queryParam(pagination.offsetParam)) fail(`offset parameter "${pagination.offsetParam}" is not declared`)
			if (!queryParam(pagination.limitParam)) fail(`limit parameter "${pagination.limitParam}" is not declared`)
			if (!Number.isInteger(pagination.pageSize) || pagination.pageSize < 1) {
				fail('pageSize must be a positive integer')
			}
			return
		case 'cursor':
			if (!queryParam(pagination.cursorParam)) fail(`cursor parameter "${pagination.cursorParam}" is not declared`)
			return
	}
}

/**
 * Validates an endpoint declaration and returns it deep-frozen.
 */
export function defineEndpoint(input: EndpointInput): EndpointDescriptor {
	const { name, path } = input
	if (!NAME.test(name)) throw new DescriptorError(name, 'name must be alphanumeric')
	if (name.endsWith('DF')) throw new DescriptorError(name, 'name must not end in "DF"')
	if (path.startsWith('/')) throw new DescriptorError(name, 'path must be relative')
	if (/[{}]/.test(path.replace(SLOT, ''))) throw new DescriptorError(name, `malformed path "${path}"`)

	const parameters = input.parameters ?? []
	const shape: ResponseShape = input.shape ?? 'array'
	const pagination: Pagination = input.pagination ?? { mode: 'none' }
	const columns = input.columns ?? []

	checkParameters(name, path, parameters)
	checkPagination(name, pagination, parameters)

	if (shape === 'keyed' && !input.keyField) {
		throw new DescriptorError(name, 'keyed responses need a keyField')
	}
	if (shape !== 'keyed' && input.keyField) {
		throw new DescriptorError(name, `keyField only applies to keyed responses, not "${shape}"`)
	}
	if (new Set(columns.map((c) => c.name)).size !== columns.length) {
		throw new DescriptorError(name, 'duplicate column')
	}

	return Object.freeze({
		name,
		provider: input.provider ?? '',
		description: input.description ?? '',
		path,
		parameters: Object.freeze(
			parameters.map((p) =>
				Object.freeze({
					...p,
					...(p.values && { values: Object.freeze([...p.values]) }),
					...(Array.isArray(p.default) && { default: Object.freeze([...p.default]) }),
				}),
			),
		),
		shape,
		...(input.keyField ? { keyField: input.keyField } : {}),
		pagination: Object.freeze({ ...pagination }),
		columns: Object.freeze(columns.map((c) => Object.freeze({ ...c }))),
	})
}
