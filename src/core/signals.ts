export interface TimeoutSignal {
	signal: AbortSignal
	/** Stops the timer once the guarded work settles. */
	clear(): void
}

/**
 * Creates an {@link AbortSignal} that aborts after `timeoutMs`.
 */
export function createTimeoutSignal(timeoutMs: number): TimeoutSignal {
	const controller = new AbortController()
	const timer = setTimeout(
		() => controller.abort(new Error(`request timed out after ${timeoutMs}ms`)),
		timeoutMs,
	)
	return { signal: controller.signal, clear: () => clearTimeout(timer) }
}

export interface MergedSignal {
	signal: AbortSignal
	/** Detaches from the source signals. Call once the guarded work settles. */
	dispose(): void
}

/**
 * Merges signals into one that aborts when any source aborts, keeping the source's reason.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): MergedSignal | null {
	const active = signals.filter((s): s is AbortSignal => s != null)
	if (active.length === 0) return null
	if (active.length === 1) return { signal: active[0], dispose: () => {} }

	const controller = new AbortController()
	const listeners: Array<() => void> = []
	const dispose = () => {
		for (const remove of listeners.splice(0)) remove()
	}

	controller.signal.addEventListener('abort', dispose, { once: true })

	for (const signal of active) {
		if (signal.aborted) {
			controller.abort(signal.reason)
			break
		}
		const abort = () => controller.abort(signal.reason)
		signal.addEventListener('abort', abort, { once: true })
		listeners.push(() => signal.removeEventListener('abort', abort))
	}

	return { signal: controller.signal, dispose }
}
