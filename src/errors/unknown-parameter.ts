import { isErrorType } from './unwrap-error-type.js'

/**
 * Raised when the caller passes parameter names the dataset does not declare.
 */
export class UnknownParameterError extends Error {
	static name = 'UnknownParameterError'
	readonly dataset: string
	readonly parameters: readonly string[]
	readonly accepted: readonly string[]

	constructor(
		dataset: string,
		parameters: readonly string[],
		accepted: readonly string[],
		opts?: ErrorOptions,
	) {
		const hint = accepted.length > 0 ? ` (accepted: ${accepted.join(', ')})` : ' (takes none)'
		super(`[${dataset}] unknown parameter(s): ${parameters.join(', ')}${hint}`, opts)
		this.name = 'UnknownParameterError'
		this.dataset = dataset
		this.parameters = parameters
		this.accepted = accepted
	}
}

export function isUnknownParameterError(error: unknown): error is UnknownParameterError {
	return isErrorType(UnknownParameterError, error)
}
