export type Logger = (message: string) => void

const silent: Logger = () => {}

/** Verbose diagnostics go to stderr so piped output stays clean. */
export function createLogger(verbose: boolean, sink: Logger = (m) => console.error(m)): Logger {
	if (!verbose) return silent
	return (message) => sink(`[pds] ${message}`)
}
