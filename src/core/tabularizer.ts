import type { CanonicalRecord, Cell, Column, ColumnType, Table } from '../types.js'
import type { ColumnSpec } from './descriptor.js'

const NUMERIC = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/
const TEMPORAL =
	/^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}:?\d{2})?$/

/**
 * Parses `YYYY-MM-DD`, optionally followed by a time and an offset. Values without an offset
 * are read as UTC. Returns null for anything else, including impossible calendar dates.
 */
export function parseTemporal(value: string): Date | null {
	const match = TEMPORAL.exec(value)
	if (!match) return null
	const [, day, hourMinute = '00:00', seconds = '00', fraction = '', offset = 'Z'] = match

	const millis = fraction.padEnd(3, '0').slice(0, 3)
	const zone = offset === 'Z' || offset.includes(':') ? offset : `${offset.slice(0, 3)}:${offset.slice(3)}`
	const date = new Date(`${day}T${hourMinute}:${seconds}.${millis}${zone}`)
	if (Number.isNaN(date.getTime())) return null

	// Reject dates the Date constructor rolls over (2023-02-30 → March 2)
	const [year, month, dayOfMonth] = day.split('-').map(Number)
	const calendar = new Date(Date.UTC(year, month - 1, dayOfMonth))
	if (calendar.getUTCMonth() !== month - 1 || calendar.getUTCDate() !== dayOfMonth) return null

	return date
}

function toCell(value: unknown): Cell {
	if (value == null) return null
	if (
		typeof value === 'number' ||
		typeof value === 'string' ||
		typeof value === 'boolean' ||
		typeof value === 'object'
	) {
		return value
	}
	return String(value)
}

/** Coercion to a column type; `undefined` means the value does not fit the type. */
type Coerce = (value: unknown) => Cell | undefined

const INFERRED: Record<'boolean' | 'number' | 'temporal' | 'string', Coerce> = {
	boolean: (v) => (typeof v === 'boolean' ? v : undefined),
	number: (v) => {
		if (typeof v === 'number') return Number.isFinite(v) ? v : undefined
		if (typeof v !== 'string' || !NUMERIC.test(v)) return undefined
		const n = Number(v)
		// overflow, or an integer past 2^53 that would lose digits
		if (!Number.isFinite(n) || (Number.isInteger(n) && !Number.isSafeInteger(n))) return undefined
		return n
	},
	temporal: (v) => {
		if (v instanceof Date) return v
		return typeof v === 'string' ? (parseTemporal(v) ?? undefined) : undefined
	},
	string: (v) => {
		if (typeof v === 'string') return v
		return typeof v === 'number' || typeof v === 'boolean' ? String(v) : undefined
	},
}

/** Declared types also accept the encodings providers commonly use for them. */
const DECLARED: Record<Exclude<ColumnType, 'null'>, Coerce> = {
	boolean: (v) => {
		if (v === 'true') return true
		if (v === 'false') return false
		return INFERRED.boolean(v)
	},
	number: INFERRED.number,
	// epoch milliseconds
	temporal: (v) => (typeof v === 'number' && Number.isFinite(v) ? new Date(v) : INFERRED.temporal(v)),
	string: (v) => (typeof v === 'object' && v !== null ? JSON.stringify(v) : INFERRED.string(v)),
	opaque: toCell,
}

const INFERENCE_ORDER = ['boolean', 'number', 'temporal', 'string'] as const

export function inferColumnType(values: readonly unknown[]): ColumnType {
	const present = values.filter((v) => v != null)
	if (present.length === 0) return 'null'
	for (const type of INFERENCE_ORDER) {
		if (present.every((v) => INFERRED[type](v) !== undefined)) return type
	}
	return 'opaque'
}

function resolveType(values: readonly unknown[], declared: ColumnType | undefined): ColumnType {
	if (declared && declared !== 'null') {
		const coerce = DECLARED[declared]
		if (values.every((v) => v == null || coerce(v) !== undefined)) return declared
	}
	return inferColumnType(values)
}

function coerceCell(value: unknown, type: ColumnType): Cell {
	if (value == null || type === 'null') return null
	return DECLARED[type](value) ?? toCell(value)
}

/**
 * Builds a table from records.
 *
 * Columns are the union of record fields in first-seen order; with no records the declared
 * columns are used. A declared column type is kept when every value coerces to it, otherwise
 * the type is inferred from the non-null values. Rows keep record order and missing fields
 * become null.
 */
export function toTable(records: readonly CanonicalRecord[], declared: readonly ColumnSpec[] = []): Table {
	if (records.length === 0) {
		return { columns: declared.map((c) => ({ name: c.name, type: c.type })), rows: [] }
	}

	const names: string[] = []
	const seen = new Set<string>()
	for (const record of records) {
		for (const name of Object.keys(record)) {
			if (seen.has(name)) continue
			seen.add(name)
			names.push(name)
		}
	}

	const declaredTypes = new Map(declared.map((c) => [c.name, c.type]))
	const columns: Column[] = names.map((name) => ({
		name,
		type: resolveType(
			records.map((r) => r[name]),
			declaredTypes.get(name),
		),
	}))

	const rows = records.map((record) => columns.map((c) => coerceCell(record[c.name], c.type)))
	return { columns, rows }
}

export function columnValues(table: Table, name: string): readonly Cell[] | undefined {
	const index = table.columns.findIndex((c) => c.name === name)
	if (index === -1) return undefined
	return table.rows.map((row) => row[index])
}

export function tableToRecords(table: Table): Record<string, Cell>[] {
	return table.rows.map((row) => {
		const record: Record<string, Cell> = {}
		table.columns.forEach((column, i) => {
			record[column.name] = row[i]
		})
		return record
	})
}
