import { z } from 'zod'
import { InvalidParameterError } from '../errors/invalid-parameter.js'
import { MissingCredentialError } from '../errors/missing-credential.js'
import { MissingParameterError } from '../errors/missing-parameter.js'
import { UnknownParameterError } from '../errors/unknown-parameter.js'
import type { ParameterValues, RequestSpec } from '../types.js'
import type { RequestContext } from './context.js'
import {
	CREDENTIAL_PARAM,
	type EndpointDescriptor,
	type ParameterSpec,
	type ParameterType,
	pathSlots,
	wireName,
} from './descriptor.js'

/** A validated parameter value: one string, or the items of a list. */
type WireValue = string | string[]

const DATE = /^\d{4}-?\d{2}-?\d{2}$/

/** Dates go out as `YYYYMMDD` (UTC). */
export function formatDate(date: Date): string {
	return date.toISOString().slice(0, 10).replaceAll('-', '')
}

const listSchema = z
	.union([z.string(), z.array(z.string())])
	.transform((v) => (typeof v === 'string' ? v.split(',') : v))
	.refine(
		(items) => items.length > 0 && items.every((item) => item.length > 0),
		'must be a non-empty list without blank entries',
	)

const SCHEMAS: Record<Exclude<ParameterType, 'enum'>, z.ZodType<WireValue, z.ZodTypeDef, unknown>> = {
	string: z.string().min(1, 'must not be empty'),
	integer: z.number().int('must be an integer').transform(String),
	number: z.number().finite().transform(String),
	boolean: z.boolean().transform(String),
	date: z
		.union([z.date(), z.string().regex(DATE, 'expected YYYY-MM-DD or YYYYMMDD')])
		.transform((v) => (typeof v === 'string' ? v : formatDate(v))),
	list: listSchema,
	symbols: listSchema,
}

function schemaFor(param: ParameterSpec): z.ZodType<WireValue, z.ZodTypeDef, unknown> {
	if (param.type !== 'enum') return SCHEMAS[param.type]
	const values = param.values ?? []
	return z
		.string()
		.refine((v) => values.includes(v), `expected one of: ${values.join(', ')}`)
}

function parseValue(dataset: string, param: ParameterSpec, value: unknown): WireValue {
	const result = schemaFor(param).safeParse(value)
	if (!result.success) {
		const reason = result.error.issues[0]?.message ?? 'invalid value'
		throw new InvalidParameterError(dataset, param.name, reason)
	}
	return result.data
}

function encodePathValue(dataset: string, slot: string, value: WireValue): string {
	const items = Array.isArray(value) ? value : [value]
	// URL resolution would collapse these, escaped or not
	if (items.length === 1 && (items[0] === '.' || items[0] === '..')) {
		throw new InvalidParameterError(dataset, slot, 'must not be a dot segment')
	}
	return items.map(encodeURIComponent).join(',')
}

function resolvePath(descriptor: EndpointDescriptor, values: Map<string, WireValue>): string {
	let path = descriptor.path
	let absent: string | null = null

	for (const slot of pathSlots(descriptor.path)) {
		const value = values.get(slot)
		if (value === undefined) {
			absent ??= slot
			path = path.replace(`/{${slot}}`, '')
			continue
		}
		if (absent) {
			throw new InvalidParameterError(descriptor.name, slot, `cannot be set without "${absent}"`)
		}
		const encoded = encodePathValue(descriptor.name, slot, value)
		path = path.replace(`{${slot}}`, () => encoded)
	}

	return path
}

/**
 * Resolves a descriptor and caller parameters into a request. Validation runs in a fixed
 * order: unknown names, missing required parameters, value types, credential.
 *
 * The credential is only placed in `url`; `query` lists the dataset parameters alone.
 */
export function buildRequest(
	descriptor: EndpointDescriptor,
	params: ParameterValues,
	context: RequestContext,
): RequestSpec {
	const dataset = descriptor.name
	const declared = new Set(descriptor.parameters.map((p) => p.name))

	const unknown = Object.keys(params).filter((name) => !declared.has(name))
	if (unknown.length > 0) {
		throw new UnknownParameterError(dataset, unknown, [...declared])
	}

	const missing = descriptor.parameters
		.filter((p) => p.required && params[p.name] == null)
		.map((p) => p.name)
	if (missing.length > 0) {
		throw new MissingParameterError(dataset, missing)
	}

	const values = new Map<string, WireValue>()
	for (const param of descriptor.parameters) {
		const value = params[param.name] ?? param.default
		if (value == null) continue
		values.set(param.name, parseValue(dataset, param, value))
	}

	if (!context.token) {
		throw new MissingCredentialError(dataset)
	}

	const path = resolvePath(descriptor, values)
	const query: [string, string][] = []
	for (const param of descriptor.parameters) {
		if (param.in !== 'query') continue
		const value = values.get(param.name)
		if (value === undefined) continue
		query.push([wireName(param), Array.isArray(value) ? value.join(',') : value])
	}

	const url = new URL(path, context.baseUrl)
	for (const [name, value] of query) url.searchParams.append(name, value)
	url.searchParams.append(CREDENTIAL_PARAM, context.token)

	return {
		dataset,
		method: 'GET',
		url: url.toString(),
		query,
		headers: { Accept: 'application/json' },
	}
}

/** Masks the credential so URLs can be logged or attached to errors. */
export function redactUrl(url: string): string {
	return url.replace(new RegExp(`([?&]${CREDENTIAL_PARAM}=)[^&#]*`), '$1***')
}
