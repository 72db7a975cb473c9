type ErrorClass<T extends Error> = new (...args: never[]) => T

/**
 * Walks an error and its `cause` chain and returns the first instance of `errorClass`.
 * Stops after `maxDepth` links so a cyclic cause chain cannot loop forever.
 */
export function unwrapErrorType<T extends Error>(
	errorClass: ErrorClass<T>,
	err: unknown,
	maxDepth = 10,
): T | null {
	let current: unknown = err
	for (let depth = 0; depth <= maxDepth && current != null; depth++) {
		if (current instanceof errorClass) return current
		if (!(current instanceof Error)) return null
		current = current.cause
	}
	return null
}

/** Type guard matching an error class anywhere in the cause chain. */
export function isErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): err is T {
	return unwrapErrorType(errorClass, err) !== null
}
