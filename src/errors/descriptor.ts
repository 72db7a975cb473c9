import { isErrorType } from './unwrap-error-type.js'

/**
 * A dataset declaration is inconsistent (catalog data bug, raised at load time).
 */
export class DescriptorError extends Error {
	static name = 'DescriptorError'
	readonly dataset: string

	constructor(dataset: string, message: string, opts?: ErrorOptions) {
		super(`[${dataset}] invalid descriptor: ${message}`, opts)
		this.name = 'DescriptorError'
		this.dataset = dataset
	}
}

export function isDescriptorError(error: unknown): error is DescriptorError {
	return isErrorType(DescriptorError, error)
}
