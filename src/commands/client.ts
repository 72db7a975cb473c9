import type { Command } from 'commander'
import { PremiumClient } from '../client.js'
import type { GlobalOptions } from '../types.js'

/** Client configured from the global CLI flags. */
export function clientFromOptions(program: Command): PremiumClient {
	const opts = program.opts<GlobalOptions>()
	const timeoutMs = opts.timeout === undefined ? undefined : Number.parseInt(opts.timeout, 10)
	if (timeoutMs !== undefined && !(timeoutMs > 0)) {
		throw new Error(`Invalid --timeout: ${opts.timeout}. Expected milliseconds, e.g. 10000`)
	}

	return new PremiumClient({
		...(opts.sandbox && { version: 'sandbox' }),
		...(timeoutMs !== undefined && { timeoutMs }),
		verbose: opts.verbose ?? false,
	})
}
