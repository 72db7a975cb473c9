import { type PdsConfig, loadConfig } from './config.js'

export const CLOUD_URL = 'https://cloud.iexapis.com/{version}/'
export const SANDBOX_URL = 'https://sandbox.iexapis.com/{version}/'
export const DEFAULT_VERSION = 'stable'
export const DEFAULT_TIMEOUT_MS = 30_000

export interface ConnectionOptions {
	/** API token; falls back to IEX_TOKEN and the config file. */
	token?: string
	/** API version path segment, or `sandbox` for the sandbox host. */
	version?: string
	/** Named provider environment, e.g. `test` → `https://cloud.test.iexapis.com/`. */
	env?: string
	/** Full base URL override. A `{version}` placeholder is filled in when present. */
	baseUrl?: string
	timeoutMs?: number
}

/** What a single request needs from the calling context. */
export interface RequestContext {
	token?: string
	baseUrl: string
	timeoutMs: number
}

function withTrailingSlash(url: string): string {
	return url.endsWith('/') ? url : `${url}/`
}

export function resolveBaseUrl(options: Pick<ConnectionOptions, 'version' | 'env' | 'baseUrl'>): string {
	const version = options.version ?? DEFAULT_VERSION
	if (options.baseUrl) {
		return withTrailingSlash(options.baseUrl.replace('{version}', version))
	}
	if (options.env) {
		return `https://cloud.${options.env}.iexapis.com/${version}/`
	}
	if (version === 'sandbox') {
		return SANDBOX_URL.replace('{version}', DEFAULT_VERSION)
	}
	return CLOUD_URL.replace('{version}', version)
}

/**
 * Merges explicit options over the loaded configuration (which already merges env vars over
 * the config file).
 */
export function resolveContext(
	options: ConnectionOptions = {},
	config: PdsConfig = loadConfig(),
): RequestContext {
	const pick = <K extends keyof ConnectionOptions & keyof PdsConfig>(key: K) => options[key] ?? config[key]

	return {
		token: pick('token'),
		baseUrl: resolveBaseUrl({
			version: pick('version'),
			env: pick('env'),
			baseUrl: pick('baseUrl'),
		}),
		timeoutMs: pick('timeoutMs') ?? DEFAULT_TIMEOUT_MS,
	}
}
