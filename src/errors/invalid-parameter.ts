import { isErrorType } from './unwrap-error-type.js'

/**
 * Raised when a supplied parameter value does not match its declared type.
 */
export class InvalidParameterError extends Error {
	static name = 'InvalidParameterError'
	readonly dataset: string
	readonly parameter: string
	readonly reason: string

	constructor(dataset: string, parameter: string, reason: string, opts?: ErrorOptions) {
		super(`[${dataset}] invalid value for "${parameter}": ${reason}`, opts)
		this.name = 'InvalidParameterError'
		this.dataset = dataset
		this.parameter = parameter
		this.reason = reason
	}
}

export function isInvalidParameterError(error: unknown): error is InvalidParameterError {
	return isErrorType(InvalidParameterError, error)
}
