import { isErrorType } from './unwrap-error-type.js'

export class UnknownDatasetError extends Error {
	static name = 'UnknownDatasetError'
	readonly dataset: string

	constructor(dataset: string, opts?: ErrorOptions) {
		super(`Unknown dataset "${dataset}". Run: pds datasets`, opts)
		this.name = 'UnknownDatasetError'
		this.dataset = dataset
	}
}

export function isUnknownDatasetError(error: unknown): error is UnknownDatasetError {
	return isErrorType(UnknownDatasetError, error)
}
