import { mkdirSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { getConfigPath, loadConfig, resetConfigCache, saveConfig } from '../src/core/config.js'
import { resolveBaseUrl, resolveContext } from '../src/core/context.js'
import { formatCell, formatKeyValue, formatTable, renderRecords, renderTable } from '../src/core/formatter.js'
import { createLogger } from '../src/core/log.js'
import { toTable } from '../src/core/tabularizer.js'

describe('formatter', () => {
	it('formats markdown tables', () => {
		expect(formatTable(['Name', 'Value'], [['AAPL', '100']], 'markdown')).toBe(
			['| Name | Value |', '| ---- | ----- |', '| AAPL | 100   |'].join('\n'),
		)
	})

	it('formats JSON tables', () => {
		const result = formatTable(['Name', 'Value'], [['AAPL', '100']], 'json')
		expect(JSON.parse(result)).toEqual([{ Name: 'AAPL', Value: '100' }])
	})

	it('formats plain tables', () => {
		expect(formatTable(['Name', 'Value'], [['AAPL', null]], 'plain')).toBe('Name\tValue\nAAPL\t')
	})

	it('formats key-value pairs', () => {
		expect(formatKeyValue({ Dataset: 'kScore', Path: 'x', Skipped: undefined }, 'markdown')).toBe(
			'**Dataset**: kScore\n**Path   **: x',
		)
	})

	it('formats cells', () => {
		expect(formatCell(new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02')
		expect(formatCell(new Date(Date.UTC(2024, 0, 2, 9, 30)))).toBe('2024-01-02T09:30:00.000Z')
		expect(formatCell({ a: [1] })).toBe('{"a":[1]}')
		expect(formatCell(null)).toBe('')
		expect(formatCell(false)).toBe('false')
	})

	it('renders typed tables', () => {
		const table = toTable([{ date: '2024-01-02', value: '1.5' }])
		expect(renderTable(table, 'markdown')).toBe(
			['| date       | value |', '| ---------- | ----- |', '| 2024-01-02 | 1.5   |'].join('\n'),
		)
		expect(renderTable(table, 'plain')).toBe('date\tvalue\n2024-01-02\t1.5')
		expect(JSON.parse(renderTable(table, 'json'))).toEqual([{ date: '2024-01-02T00:00:00.000Z', value: 1.5 }])
	})

	it('prints raw records verbatim as JSON', () => {
		const records = [{ date: '2024-01-02', value: '1.5' }]
		expect(JSON.parse(renderRecords(records, 'json'))).toEqual(records)
	})

	it('handles tables without columns', () => {
		expect(renderTable({ columns: [], rows: [] }, 'markdown')).toBe('(no columns)')
	})
})

describe('log', () => {
	it('prefixes verbose messages', () => {
		const sink = vi.fn<(message: string) => void>()
		createLogger(true, sink)('GET x')
		expect(sink).toHaveBeenCalledWith('[pds] GET x')
	})

	it('drops messages when not verbose', () => {
		const sink = vi.fn<(message: string) => void>()
		createLogger(false, sink)('GET x')
		expect(sink).not.toHaveBeenCalled()
	})
})

describe('config', () => {
	let dir: string

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'pds-config-'))
		vi.stubEnv('PDS_CONFIG_DIR', dir)
		for (const name of ['IEX_TOKEN', 'IEX_API_VERSION', 'IEX_ENV', 'IEX_BASE_URL', 'PDS_TIMEOUT_MS']) {
			vi.stubEnv(name, '')
		}
		resetConfigCache()
	})

	afterEach(() => {
		vi.unstubAllEnvs()
		vi.restoreAllMocks()
		resetConfigCache()
		rmSync(dir, { recursive: true, force: true })
	})

	it('is empty without a file or env vars', () => {
		expect(getConfigPath()).toBe(join(dir, 'config.json'))
		expect(loadConfig()).toEqual({})
	})

	it('saves and reloads values, readable only by the owner', () => {
		saveConfig({ token: 'test-secret', timeoutMs: 5000 })

		expect(JSON.parse(readFileSync(getConfigPath(), 'utf-8'))).toEqual({ token: 'test-secret', timeoutMs: 5000 })
		expect(statSync(getConfigPath()).mode & 0o777).toBe(0o600)
		expect(loadConfig()).toEqual({ token: 'test-secret', timeoutMs: 5000 })
	})

	it('merges saves into the existing file', () => {
		saveConfig({ token: 'test-secret' })
		saveConfig({ version: 'v1' })
		expect(loadConfig()).toEqual({ token: 'test-secret', version: 'v1' })
	})

	it('lets env vars override the file', () => {
		saveConfig({ token: 'file-token', timeoutMs: 5000 })
		vi.stubEnv('IEX_TOKEN', 'env-token')
		vi.stubEnv('PDS_TIMEOUT_MS', '750')
		resetConfigCache()

		expect(loadConfig()).toEqual({ token: 'env-token', timeoutMs: 750 })
	})

	it('reads .env on the first load, without overriding set variables', () => {
		delete process.env.IEX_ENV
		vi.spyOn(process, 'cwd').mockReturnValue(dir)
		writeFileSync(join(dir, '.env'), '# local\nIEX_ENV="dotenv"\nIEX_TOKEN=dotenv-token\n')
		resetConfigCache()

		expect(process.env.IEX_ENV).toBeUndefined()
		expect(loadConfig()).toEqual({ env: 'dotenv' })
		expect(process.env.IEX_ENV).toBe('dotenv')
	})

	it('reports an unreadable .env instead of throwing', () => {
		const warn = vi.spyOn(console, 'error').mockImplementation(() => {})
		vi.spyOn(process, 'cwd').mockReturnValue(dir)
		mkdirSync(join(dir, '.env'))
		resetConfigCache()

		expect(loadConfig()).toEqual({})
		expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^\[config\] ignoring .*\.env: /))
	})

	it('refuses to save invalid values', () => {
		expect(() => saveConfig({ baseUrl: 'not a url' })).toThrow('Invalid config: baseUrl Invalid url')
	})

	it('ignores an invalid file with a warning', () => {
		const warn = vi.spyOn(console, 'error').mockImplementation(() => {})
		writeFileSync(getConfigPath(), JSON.stringify({ timeoutMs: -1 }))

		expect(loadConfig()).toEqual({})
		expect(warn).toHaveBeenCalledWith(`[config] ignoring ${getConfigPath()}: timeoutMs Number must be greater than 0`)
	})
})

describe('context', () => {
	it('resolves base URLs', () => {
		expect(resolveBaseUrl({})).toBe('https://cloud.iexapis.com/stable/')
		expect(resolveBaseUrl({ version: 'v1' })).toBe('https://cloud.iexapis.com/v1/')
		expect(resolveBaseUrl({ version: 'sandbox' })).toBe('https://sandbox.iexapis.com/stable/')
		expect(resolveBaseUrl({ env: 'test' })).toBe('https://cloud.test.iexapis.com/stable/')
		expect(resolveBaseUrl({ baseUrl: 'http://localhost:8080/{version}', version: 'v1', env: 'test' })).toBe(
			'http://localhost:8080/v1/',
		)
	})

	it('prefers explicit options over configuration', () => {
		expect(resolveContext({ timeoutMs: 5 }, { token: 'test-secret', timeoutMs: 10, version: 'v1' })).toEqual({
			token: 'test-secret',
			baseUrl: 'https://cloud.iexapis.com/v1/',
			timeoutMs: 5,
		})
		expect(resolveContext({}, {})).toEqual({
			token: undefined,
			baseUrl: 'https://cloud.iexapis.com/stable/',
			timeoutMs: 30_000,
		})
	})
})
