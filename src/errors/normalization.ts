import { isErrorType } from './unwrap-error-type.js'

/**
 * The response body did not have the shape the dataset declares.
 */
export class NormalizationError extends Error {
	static name = 'NormalizationError'
	readonly dataset: string
	readonly diagnostic: string

	constructor(dataset: string, diagnostic: string, opts?: ErrorOptions) {
		super(`[${dataset}] unexpected response: ${diagnostic}`, opts)
		this.name = 'NormalizationError'
		this.dataset = dataset
		this.diagnostic = diagnostic
	}
}

export function isNormalizationError(error: unknown): error is NormalizationError {
	return isErrorType(NormalizationError, error)
}
