import { isErrorType } from './unwrap-error-type.js'

export class MissingCredentialError extends Error {
	static name = 'MissingCredentialError'
	readonly dataset: string

	constructor(dataset: string, opts?: ErrorOptions) {
		super(
			`[${dataset}] API token not configured. Set IEX_TOKEN or run: pds config set token <token>`,
			opts,
		)
		this.name = 'MissingCredentialError'
		this.dataset = dataset
	}
}

export function isMissingCredentialError(error: unknown): error is MissingCredentialError {
	return isErrorType(MissingCredentialError, error)
}
