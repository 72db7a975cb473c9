import { ProviderError } from '../errors/provider.js'
import { TransportError } from '../errors/transport.js'
import type { RawResponse, RequestSpec } from '../types.js'
import { DEFAULT_TIMEOUT_MS } from './context.js'
import { redactUrl } from './request-builder.js'
import { createTimeoutSignal, mergeSignals } from './signals.js'

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>

/**
 * Executes one request. Implementations never retry; wrap a transport to add retry or rate
 * limiting.
 */
export interface Transport {
	execute(spec: RequestSpec, signal?: AbortSignal): Promise<RawResponse>
}

export interface FetchTransportOptions {
	timeoutMs?: number
	/** Replacement for the global `fetch`, e.g. one bound to a proxy agent. */
	fetch?: FetchFn
}

/**
 * {@link Transport} over `fetch`.
 *
 * - non-2xx responses reject with {@link ProviderError} carrying status and body,
 * - network failures reject with {@link TransportError} of kind `connection`,
 * - the timeout rejects with kind `timeout`, a caller abort with kind `aborted`.
 */
export class FetchTransport implements Transport {
	readonly #fetch: FetchFn
	readonly #timeoutMs: number

	constructor(opts: FetchTransportOptions = {}) {
		this.#fetch = opts.fetch ?? ((input, init) => fetch(input, init))
		this.#timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
	}

	get timeoutMs(): number {
		return this.#timeoutMs
	}

	async execute(spec: RequestSpec, signal?: AbortSignal): Promise<RawResponse> {
		const url = redactUrl(spec.url)
		const timeout = createTimeoutSignal(this.#timeoutMs)
		const merged = mergeSignals([timeout.signal, signal])

		let response: Response
		let body: string
		try {
			response = await this.#fetch(spec.url, {
				method: spec.method,
				headers: { ...spec.headers },
				signal: merged?.signal,
			})
			body = await response.text()
		} catch (err) {
			throw this.#failure(err, spec.dataset, url, timeout.signal, signal)
		} finally {
			timeout.clear()
			merged?.dispose()
		}

		if (!response.ok) {
			throw new ProviderError(spec.dataset, url, response.status, body)
		}

		return {
			status: response.status,
			contentType: response.headers.get('content-type') ?? '',
			body,
		}
	}

	#failure(
		err: unknown,
		dataset: string,
		url: string,
		timeoutSignal: AbortSignal,
		callerSignal: AbortSignal | undefined,
	): TransportError {
		if (timeoutSignal.aborted) {
			return new TransportError('timeout', dataset, url, `request timed out after ${this.#timeoutMs}ms`, {
				cause: err,
			})
		}
		if (callerSignal?.aborted) {
			return new TransportError('aborted', dataset, url, 'request aborted', { cause: err })
		}
		const reason = err instanceof Error ? err.message : String(err)
		return new TransportError('connection', dataset, url, `request failed: ${reason}`, { cause: err })
	}
}
