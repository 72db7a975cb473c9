import { isErrorType } from './unwrap-error-type.js'

/**
 * Raised before any request is built when required parameters are absent.
 */
export class MissingParameterError extends Error {
	static name = 'MissingParameterError'
	readonly dataset: string
	readonly parameters: readonly string[]

	constructor(dataset: string, parameters: readonly string[], opts?: ErrorOptions) {
		super(`[${dataset}] missing required parameter(s): ${parameters.join(', ')}`, opts)
		this.name = 'MissingParameterError'
		this.dataset = dataset
		this.parameters = parameters
	}
}

export function isMissingParameterError(error: unknown): error is MissingParameterError {
	return isErrorType(MissingParameterError, error)
}
