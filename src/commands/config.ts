/**
 * Config Command
 */

import { Command } from 'commander';
import { getConfigService, isConfigKey, parseConfigValue } from '../services/config.js';
import { resolveFormat } from '../lib/context.js';
import { ConfigValueError } from '../lib/errors.js';
import { CONFIG_KEYS } from '../types/config.js';
import type { ConfigKey } from '../types/config.js';
import { fail, formatJSON, formatKeyValues } from '../utils/output.js';

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new ConfigValueError(`Unknown key '${key}'; valid keys: ${CONFIG_KEYS.join(', ')}`);
  }
  return key;
}

/**
 * Effective values, after environment variables and defaults
 */
function resolvedSettings(): Record<string, string | number> {
  const config = getConfigService();
  return {
    credentialsPath: config.getCredentialsPath(),
    tokenPath: config.getTokenPath(),
    redirectUri: config.getRedirectUri(),
    port: config.getServerPort(),
    format: config.get('format') ?? 'json',
  };
}

export function createConfigCommand(): Command {
  const configCommand = new Command('config')
    .description('Manage settings (file paths, redirect URI, port, output format)');

  configCommand
    .command('list')
    .description('Show stored and effective settings')
    .action((_options, cmd: Command) => {
      try {
        const format = resolveFormat(cmd);
        const config = getConfigService();
        const effective = resolvedSettings();
        if (format === 'json') {
          console.log(formatJSON({ path: config.getConfigPath(), stored: config.getAll(), effective }));
        } else {
          console.log(`Config file: ${config.getConfigPath()}`);
          console.log(formatKeyValues(Object.entries(effective)));
        }
      } catch (error) {
        fail(error);
      }
    });

  configCommand
    .command('get <key>')
    .description('Print the effective value of a setting')
    .action((key: string) => {
      try {
        const value = resolvedSettings()[requireKey(key)];
        console.log(String(value));
      } catch (error) {
        fail(error);
      }
    });

  configCommand
    .command('set <key> <value>')
    .description('Store a setting')
    .action((key: string, value: string) => {
      try {
        const configKey = requireKey(key);
        const config = getConfigService();
        config.set(configKey, parseConfigValue(configKey, value));
        console.log(`${configKey} = ${String(config.get(configKey))}`);
      } catch (error) {
        fail(error);
      }
    });

  configCommand
    .command('unset <key>')
    .description('Remove a stored setting')
    .action((key: string) => {
      try {
        getConfigService().delete(requireKey(key));
      } catch (error) {
        fail(error);
      }
    });

  configCommand
    .command('path')
    .description('Print the config file path')
    .action(() => {
      console.log(getConfigService().getConfigPath());
    });

  return configCommand;
}
