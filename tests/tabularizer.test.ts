import { describe, expect, it } from 'vitest'
import { columnValues, inferColumnType, parseTemporal, tableToRecords, toTable } from '../src/core/tabularizer.js'

const day = (y: number, m: number, d: number) => new Date(Date.UTC(y, m - 1, d))

describe('toTable: inference', () => {
	it('types ISO dates as temporal and numeric strings as numbers', () => {
		const table = toTable([
			{ date: '2024-01-02', value: '1.5' },
			{ date: '2024-01-03', value: '2' },
		])
		expect(table.columns).toEqual([
			{ name: 'date', type: 'temporal' },
			{ name: 'value', type: 'number' },
		])
		expect(table.rows).toEqual([
			[day(2024, 1, 2), 1.5],
			[day(2024, 1, 3), 2],
		])
	})

	it('types a column with one non-numeric value as string', () => {
		const table = toTable([
			{ date: '2023-01-01', value: '10' },
			{ date: '2023-01-02', value: 'abc' },
		])
		expect(table.columns).toEqual([
			{ name: 'date', type: 'temporal' },
			{ name: 'value', type: 'string' },
		])
		expect(table.rows).toEqual([
			[day(2023, 1, 1), '10'],
			[day(2023, 1, 2), 'abc'],
		])
	})

	it('keeps numeric strings that do not fit a number as strings', () => {
		const table = toTable([{ id: '9007199254740993', big: '1e400', small: '42' }])
		expect(table.columns).toEqual([
			{ name: 'id', type: 'string' },
			{ name: 'big', type: 'string' },
			{ name: 'small', type: 'number' },
		])
		expect(table.rows).toEqual([['9007199254740993', '1e400', 42]])
	})

	it('still reads fractional strings as numbers', () => {
		expect(toTable([{ ratio: '0.125' }]).rows).toEqual([[0.125]])
	})

	it('falls back to string for mixed scalars', () => {
		const table = toTable([{ a: 1 }, { a: 'x' }])
		expect(table.columns).toEqual([{ name: 'a', type: 'string' }])
		expect(table.rows).toEqual([['1'], ['x']])
	})

	it('unions fields in first-seen order and fills gaps with null', () => {
		const table = toTable([{ a: 1 }, { b: true, a: 2 }])
		expect(table.columns).toEqual([
			{ name: 'a', type: 'number' },
			{ name: 'b', type: 'boolean' },
		])
		expect(table.rows).toEqual([
			[1, null],
			[2, true],
		])
	})

	it('marks all-null columns and keeps nested values opaque', () => {
		const table = toTable([{ gone: null, meta: { x: 1 } }])
		expect(table.columns).toEqual([
			{ name: 'gone', type: 'null' },
			{ name: 'meta', type: 'opaque' },
		])
		expect(table.rows).toEqual([[null, { x: 1 }]])
	})

	it('only infers booleans from JSON booleans', () => {
		expect(inferColumnType(['true', 'false'])).toBe('string')
		expect(inferColumnType([true, null, false])).toBe('boolean')
	})

	it('is deterministic', () => {
		const records = [
			{ id: 'A', updated: 1704153600000 },
			{ id: 'B', updated: 1704240000000 },
		]
		expect(toTable(records)).toEqual(toTable(records))
	})
})

describe('toTable: declared columns', () => {
	it('reads epoch milliseconds in a declared temporal column', () => {
		const table = toTable([{ updated: 1704153600000 }], [{ name: 'updated', type: 'temporal' }])
		expect(table.columns).toEqual([{ name: 'updated', type: 'temporal' }])
		expect(table.rows).toEqual([[day(2024, 1, 2)]])
	})

	it('leaves the same values numeric without a declaration', () => {
		expect(toTable([{ updated: 1704153600000 }]).columns).toEqual([{ name: 'updated', type: 'number' }])
	})

	it('accepts boolean strings in a declared boolean column', () => {
		const table = toTable([{ flag: 'true' }, { flag: false }], [{ name: 'flag', type: 'boolean' }])
		expect(table.rows).toEqual([[true], [false]])
	})

	it('keeps numeric-looking identifiers as strings when declared', () => {
		const table = toTable([{ key: '0000320193' }], [{ name: 'key', type: 'string' }])
		expect(table.columns).toEqual([{ name: 'key', type: 'string' }])
		expect(table.rows).toEqual([['0000320193']])
	})

	it('infers instead when a value does not fit the declared type', () => {
		const table = toTable([{ date: 'soon' }], [{ name: 'date', type: 'temporal' }])
		expect(table.columns).toEqual([{ name: 'date', type: 'string' }])
	})

	it('returns the declared columns for an empty result', () => {
		const declared = [
			{ name: 'date', type: 'temporal' as const },
			{ name: 'id', type: 'string' as const },
		]
		expect(toTable([], declared)).toEqual({ columns: declared, rows: [] })
		expect(toTable([])).toEqual({ columns: [], rows: [] })
	})
})

describe('parseTemporal', () => {
	it('reads dates without an offset as UTC', () => {
		expect(parseTemporal('2024-01-02')).toEqual(day(2024, 1, 2))
		expect(parseTemporal('2024-01-02 10:30')).toEqual(new Date('2024-01-02T10:30:00.000Z'))
	})

	it('applies offsets with or without a colon', () => {
		expect(parseTemporal('2024-01-02T10:30:00+02:00')).toEqual(new Date('2024-01-02T08:30:00.000Z'))
		expect(parseTemporal('2024-01-02T10:30:00+0200')).toEqual(new Date('2024-01-02T08:30:00.000Z'))
	})

	it('rejects impossible dates and other formats', () => {
		expect(parseTemporal('2023-02-30')).toBeNull()
		expect(parseTemporal('20240102')).toBeNull()
		expect(parseTemporal('Jan 2, 2024')).toBeNull()
	})
})

describe('table helpers', () => {
	const table = toTable([
		{ id: 'A', value: 1 },
		{ id: 'B', value: 2 },
	])

	it('reads one column', () => {
		expect(columnValues(table, 'value')).toEqual([1, 2])
		expect(columnValues(table, 'missing')).toBeUndefined()
	})

	it('turns rows back into records', () => {
		expect(tableToRecords(table)).toEqual([
			{ id: 'A', value: 1 },
			{ id: 'B', value: 2 },
		])
	})
})
