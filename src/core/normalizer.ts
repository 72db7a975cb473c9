import { NormalizationError } from '../errors/normalization.js'
import type { CanonicalRecord, RawResponse } from '../types.js'
import type { EndpointDescriptor } from './descriptor.js'
import { topLevelKeys } from './json-keys.js'

export function isJsonObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Short description of a JSON value for error messages. */
export function describeShape(value: unknown): string {
	if (value === null) return 'null'
	if (Array.isArray(value)) return `an array of ${value.length}`
	if (isJsonObject(value)) {
		const keys = Object.keys(value)
		if (keys.length === 0) return 'an empty object'
		const listed = keys.slice(0, 3).join(', ')
		return `an object with keys ${listed}${keys.length > 3 ? ', …' : ''}`
	}
	return `a ${typeof value}`
}

function parseBody(response: RawResponse, dataset: string): unknown {
	if (response.body.trim() === '') {
		throw new NormalizationError(dataset, `empty body (status ${response.status})`)
	}
	try {
		return JSON.parse(response.body)
	} catch (err) {
		const type = response.contentType || 'unknown content type'
		throw new NormalizationError(dataset, `body is not JSON (${type})`, { cause: err })
	}
}

function fromArray(descriptor: EndpointDescriptor, body: unknown[]): CanonicalRecord[] {
	return body.map((element, index) => {
		if (!isJsonObject(element)) {
			throw new NormalizationError(
				descriptor.name,
				`element ${index} is ${describeShape(element)}, expected an object`,
			)
		}
		return { ...element }
	})
}

function fromKeyed(
	descriptor: EndpointDescriptor,
	keyField: string,
	body: Record<string, unknown>,
	text: string,
): CanonicalRecord[] {
	const keys = topLevelKeys(text) ?? Object.keys(body)

	return keys.map((key) => {
		const value = body[key]
		if (!isJsonObject(value)) {
			throw new NormalizationError(
				descriptor.name,
				`value under "${key}" is ${describeShape(value)}, expected an object`,
			)
		}
		if (keyField in value && value[keyField] !== key) {
			throw new NormalizationError(
				descriptor.name,
				`value under "${key}" carries a different "${keyField}" (${String(value[keyField])})`,
			)
		}
		return { [keyField]: key, ...value }
	})
}

/**
 * Turns a provider response into records, following the shape the descriptor declares:
 *
 * - `object`: a single object, one record
 * - `array`: an array of objects, one record per element
 * - `keyed`: an object of objects, one record per key with the key stored under `keyField`
 *
 * Values are passed through untouched; typing is the tabularizer's job. Record order follows
 * the response, keyed responses included; within a record, integer-like field names sort first.
 */
export function normalize(response: RawResponse, descriptor: EndpointDescriptor): CanonicalRecord[] {
	const body = parseBody(response, descriptor.name)

	switch (descriptor.shape) {
		case 'object':
			if (!isJsonObject(body)) {
				throw new NormalizationError(descriptor.name, `expected an object, got ${describeShape(body)}`)
			}
			return [{ ...body }]

		case 'array':
			if (!Array.isArray(body)) {
				throw new NormalizationError(descriptor.name, `expected an array, got ${describeShape(body)}`)
			}
			return fromArray(descriptor, body)

		case 'keyed': {
			if (!isJsonObject(body)) {
				throw new NormalizationError(
					descriptor.name,
					`expected an object keyed by ${descriptor.keyField}, got ${describeShape(body)}`,
				)
			}
			const keyField = descriptor.keyField
			if (!keyField) {
				throw new NormalizationError(descriptor.name, 'keyed descriptor has no keyField')
			}
			return fromKeyed(descriptor, keyField, body, response.body)
		}
	}
}
