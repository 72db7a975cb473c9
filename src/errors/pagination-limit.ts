import { isErrorType } from './unwrap-error-type.js'

export class PaginationLimitError extends Error {
	static name = 'PaginationLimitError'
	readonly dataset: string
	readonly pages: number

	constructor(dataset: string, pages: number, opts?: ErrorOptions) {
		super(`[${dataset}] more pages remain after ${pages} requests; raise maxPages to continue`, opts)
		this.name = 'PaginationLimitError'
		this.dataset = dataset
		this.pages = pages
	}
}

export function isPaginationLimitError(error: unknown): error is PaginationLimitError {
	return isErrorType(PaginationLimitError, error)
}
