import { describe, expect, it } from 'vitest'
import { parseAssignments } from '../src/commands/get.js'
import { defineEndpoint } from '../src/core/descriptor.js'

const descriptor = defineEndpoint({
	name: 'sampleSeries',
	path: 'time-series/SAMPLE/{symbol}',
	parameters: [
		{ name: 'symbol', in: 'path', type: 'string', required: true },
		{ name: 'last', in: 'query', type: 'integer', required: false },
		{ name: 'calendar', in: 'query', type: 'boolean', required: false },
		{ name: 'filter', in: 'query', type: 'list', required: false },
	],
})

describe('get: parameter parsing', () => {
	it('converts values to their declared types', () => {
		expect(parseAssignments(descriptor, ['symbol=AAPL', 'last=5', 'calendar=true', 'filter=a,b'])).toEqual({
			symbol: 'AAPL',
			last: 5,
			calendar: true,
			filter: 'a,b',
		})
	})

	it('keeps unconvertible values as strings for validation to report', () => {
		expect(parseAssignments(descriptor, ['last=five', 'calendar=yes', 'last2='])).toEqual({
			last: 'five',
			calendar: 'yes',
			last2: '',
		})
	})

	it('splits on the first equals sign', () => {
		expect(parseAssignments(descriptor, ['symbol=A=B'])).toEqual({ symbol: 'A=B' })
	})

	it('rejects arguments without a key', () => {
		expect(() => parseAssignments(descriptor, ['AAPL'])).toThrow('Expected key=value, got "AAPL"')
		expect(() => parseAssignments(descriptor, ['=AAPL'])).toThrow('Expected key=value, got "=AAPL"')
	})
})
