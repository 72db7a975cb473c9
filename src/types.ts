export type OutputFormat = 'markdown' | 'json' | 'plain'

export interface GlobalOptions {
	format: OutputFormat
	verbose: boolean
	sandbox: boolean
	timeout?: string
}

/** Value a caller may pass for a dataset parameter. */
export type ParameterValue = string | number | boolean | Date | readonly string[]

export type ParameterValues = Readonly<Record<string, ParameterValue | undefined>>

/**
 * One entity from a provider response. Field order is the provider's order, except that
 * integer-like field names (`"2019"`) come first in ascending order, as in any object.
 */
export type CanonicalRecord = Record<string, unknown>

export interface RequestSpec {
	dataset: string
	method: 'GET'
	/** Fully qualified URL, query string and credential included. */
	url: string
	query: ReadonlyArray<readonly [string, string]>
	headers: Readonly<Record<string, string>>
}

export interface RawResponse {
	status: number
	contentType: string
	body: string
}

export type ColumnType = 'number' | 'temporal' | 'boolean' | 'string' | 'opaque' | 'null'

export interface Column {
	name: string
	type: ColumnType
}

export type Cell = number | string | boolean | Date | object | null

export interface Table {
	readonly columns: readonly Column[]
	readonly rows: readonly (readonly Cell[])[]
}

export interface CallOptions {
	/** Follow the dataset's pagination until the provider runs out of pages. */
	paginate?: boolean
	/** Upper bound on requests when paginating. Defaults to 50. */
	maxPages?: number
	signal?: AbortSignal
}
