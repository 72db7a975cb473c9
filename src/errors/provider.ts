import { isErrorType, unwrapErrorType } from './unwrap-error-type.js'

/**
 * The provider answered with a non-2xx status. 4xx covers bad requests, bad credentials and
 * datasets the account is not entitled to; 5xx is an upstream failure.
 */
export class ProviderError extends Error {
	static name = 'ProviderError'
	readonly status: number
	readonly body: string
	readonly dataset: string
	/** Request URL with the credential redacted. */
	readonly url: string

	constructor(dataset: string, url: string, status: number, body: string, opts?: ErrorOptions) {
		super(`[${dataset}] API error ${status}: ${body}`, opts)
		this.name = 'ProviderError'
		this.status = status
		this.body = body
		this.dataset = dataset
		this.url = url
	}

	get isClientError(): boolean {
		return this.status >= 400 && this.status < 500
	}

	get isServerError(): boolean {
		return this.status >= 500
	}
}

export function getProviderError(error: unknown): ProviderError | null {
	return unwrapErrorType(ProviderError, error)
}

export function isProviderError(error: unknown): error is ProviderError {
	return isErrorType(ProviderError, error)
}
