import { isErrorType, unwrapErrorType } from './unwrap-error-type.js'

export type TransportFailure = 'timeout' | 'connection' | 'aborted'

/**
 * Network-level failure: the provider never produced an HTTP status.
 */
export class TransportError extends Error {
	static name = 'TransportError'
	readonly kind: TransportFailure
	readonly dataset: string
	/** Request URL with the credential redacted. */
	readonly url: string

	constructor(
		kind: TransportFailure,
		dataset: string,
		url: string,
		message: string,
		opts?: ErrorOptions,
	) {
		super(`[${dataset}] ${message}`, opts)
		this.name = 'TransportError'
		this.kind = kind
		this.dataset = dataset
		this.url = url
	}
}

export function getTransportError(error: unknown): TransportError | null {
	return unwrapErrorType(TransportError, error)
}

export function isTransportError(error: unknown): error is TransportError {
	return isErrorType(TransportError, error)
}
