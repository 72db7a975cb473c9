import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import { z } from 'zod'

// Load .env file if present (minimal dotenv)
function loadEnvFile(): void {
	const envPath = resolve(process.cwd(), '.env')
	if (!existsSync(envPath)) return

	let content: string
	try {
		content = readFileSync(envPath, 'utf-8')
	} catch (err) {
		console.error(`[config] ignoring ${envPath}: ${err instanceof Error ? err.message : String(err)}`)
		return
	}

	for (const line of content.split('\n')) {
		const trimmed = line.trim()
		if (!trimmed || trimmed.startsWith('#')) continue
		const eqIdx = trimmed.indexOf('=')
		if (eqIdx === -1) continue
		const key = trimmed.slice(0, eqIdx).trim()
		let val = trimmed.slice(eqIdx + 1).trim()
		// Strip surrounding quotes (single or double)
		if (
			(val.startsWith('"') && val.endsWith('"')) ||
			(val.startsWith("'") && val.endsWith("'"))
		) {
			val = val.slice(1, -1)
		}
		// Don't override existing env vars
		if (process.env[key] === undefined) {
			process.env[key] = val
		}
	}
}

let envLoaded = false

function ensureEnvLoaded(): void {
	if (envLoaded) return
	envLoaded = true
	loadEnvFile()
}

const configSchema = z.object({
	token: z.string().min(1).optional(),
	version: z.string().min(1).optional(),
	env: z.string().min(1).optional(),
	baseUrl: z.string().url().optional(),
	timeoutMs: z.number().int().positive().optional(),
	defaultFormat: z.enum(['markdown', 'json', 'plain']).optional(),
})

export type PdsConfig = z.infer<typeof configSchema>

export const CONFIG_KEYS = configSchema.keyof().options

let cached: PdsConfig | null = null

export function getConfigDir(): string {
	ensureEnvLoaded()
	return process.env.PDS_CONFIG_DIR ?? join(homedir(), '.pds')
}

export function getConfigPath(): string {
	return join(getConfigDir(), 'config.json')
}

function readConfigFile(): PdsConfig {
	const file = getConfigPath()
	if (!existsSync(file)) return {}

	let raw: unknown
	try {
		raw = JSON.parse(readFileSync(file, 'utf-8'))
	} catch (err) {
		console.error(`[config] ignoring ${file}: ${err instanceof Error ? err.message : String(err)}`)
		return {}
	}

	const parsed = configSchema.safeParse(raw)
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		console.error(`[config] ignoring ${file}: ${issue?.path.join('.')} ${issue?.message}`)
		return {}
	}
	return parsed.data
}

function readEnv(): PdsConfig {
	const timeout = Number.parseInt(process.env.PDS_TIMEOUT_MS ?? '', 10)
	return {
		...(process.env.IEX_TOKEN && { token: process.env.IEX_TOKEN }),
		...(process.env.IEX_API_VERSION && { version: process.env.IEX_API_VERSION }),
		...(process.env.IEX_ENV && { env: process.env.IEX_ENV }),
		...(process.env.IEX_BASE_URL && { baseUrl: process.env.IEX_BASE_URL }),
		...(timeout > 0 && { timeoutMs: timeout }),
	}
}

export function loadConfig(): PdsConfig {
	if (cached) return cached
	ensureEnvLoaded()
	// Env vars override file
	cached = { ...readConfigFile(), ...readEnv() }
	return cached
}

/** Merges `config` into the config file. The result is validated before anything is written. */
export function saveConfig(config: Readonly<Record<string, unknown>>): void {
	const parsed = configSchema.safeParse({ ...readConfigFile(), ...config })
	if (!parsed.success) {
		const issue = parsed.error.issues[0]
		throw new Error(`Invalid config: ${issue?.path.join('.')} ${issue?.message}`, { cause: parsed.error })
	}
	const merged = parsed.data

	const dir = getConfigDir()
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
	writeFileSync(getConfigPath(), JSON.stringify(merged, null, 2), { mode: 0o600 })
	cached = null
}

/** The next load rereads `.env`, the config file and env vars. */
export function resetConfigCache(): void {
	cached = null
	envLoaded = false
}
