import type { Command } from 'commander'
import { CONFIG_KEYS, type PdsConfig, getConfigPath, loadConfig, saveConfig } from '../core/config.js'

function isConfigKey(key: string): key is keyof PdsConfig {
	return CONFIG_KEYS.some((k) => k === key)
}

export function registerConfigCommand(program: Command): void {
	const config = program.command('config').description('Manage configuration')

	config
		.command('show')
		.description('Show current configuration')
		.action(() => {
			const cfg = loadConfig()
			console.log(`Config file: ${getConfigPath()}\n`)
			console.log(
				JSON.stringify(
					{
						...cfg,
						token: cfg.token ? '***configured***' : undefined,
					},
					null,
					2,
				),
			)
		})

	config
		.command('set <key> <value>')
		.description('Set a configuration value')
		.action((key: string, value: string) => {
			if (!isConfigKey(key)) {
				console.error(`Invalid key: ${key}. Valid keys: ${CONFIG_KEYS.join(', ')}`)
				process.exit(1)
			}
			saveConfig({ [key]: key === 'timeoutMs' ? Number(value) : value })
			console.log(`Set ${key} = ${key === 'token' ? '***' : value}`)
		})

	config
		.command('path')
		.description('Show config file path')
		.action(() => {
			console.log(getConfigPath())
		})
}
