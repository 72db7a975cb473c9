import type { CanonicalRecord, Cell, OutputFormat, Table } from '../types.js'
import { tableToRecords, toTable } from './tabularizer.js'

export function formatTable(
	headers: string[],
	rows: (string | number | undefined | null)[][],
	format: OutputFormat,
): string {
	if (format === 'json') {
		return JSON.stringify(
			rows.map((row) => {
				const obj: Record<string, string | number | null> = {}
				for (let i = 0; i < headers.length; i++) {
					obj[headers[i]] = row[i] ?? null
				}
				return obj
			}),
			null,
			2,
		)
	}

	if (headers.length === 0) return '(no columns)'

	if (format === 'plain') {
		const headerLine = headers.join('\t')
		const dataLines = rows.map((row) => row.map((v) => v ?? '').join('\t'))
		return [headerLine, ...dataLines].join('\n')
	}

	// Markdown table
	const colWidths = headers.map((h, i) => {
		const maxData = rows.reduce((max, row) => Math.max(max, String(row[i] ?? '').length), 0)
		return Math.max(h.length, maxData)
	})

	const headerLine = `| ${headers.map((h, i) => h.padEnd(colWidths[i])).join(' | ')} |`
	const separator = `| ${colWidths.map((w) => '-'.repeat(w)).join(' | ')} |`
	const dataLines = rows.map(
		(row) => `| ${row.map((v, i) => String(v ?? '').padEnd(colWidths[i])).join(' | ')} |`,
	)

	return [headerLine, separator, ...dataLines].join('\n')
}

export function formatKeyValue(
	data: Record<string, string | number | undefined | null>,
	format: OutputFormat,
): string {
	if (format === 'json') {
		return JSON.stringify(data, null, 2)
	}

	if (format === 'plain') {
		return Object.entries(data)
			.filter(([_, v]) => v != null)
			.map(([k, v]) => `${k}\t${v}`)
			.join('\n')
	}

	// Markdown key-value
	const entries = Object.entries(data).filter(([_, v]) => v != null)
	const maxKeyLen = entries.reduce((max, [k]) => Math.max(max, k.length), 0)
	return entries.map(([k, v]) => `**${k.padEnd(maxKeyLen)}**: ${v}`).join('\n')
}

/** Midnight UTC renders as a bare date, anything else as a full ISO timestamp. */
export function formatCell(cell: Cell): string {
	if (cell === null) return ''
	if (cell instanceof Date) {
		const iso = cell.toISOString()
		return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso
	}
	if (typeof cell === 'object') return JSON.stringify(cell)
	return String(cell)
}

export function renderTable(table: Table, format: OutputFormat): string {
	if (format === 'json') {
		return JSON.stringify(tableToRecords(table), null, 2)
	}
	return formatTable(
		table.columns.map((c) => c.name),
		table.rows.map((row) => row.map(formatCell)),
		format,
	)
}

/** Raw records print as JSON verbatim, or as an untyped grid for the text formats. */
export function renderRecords(records: readonly CanonicalRecord[], format: OutputFormat): string {
	if (format === 'json') {
		return JSON.stringify(records, null, 2)
	}
	return renderTable(toTable(records), format)
}

export function describeColumns(table: Table): string {
	return table.columns.map((c) => `${c.name} (${c.type})`).join(', ')
}
