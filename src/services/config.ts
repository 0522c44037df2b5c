/**
 * Config Service
 * Reads and writes the config file; environment variables take precedence over it
 */

import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { z } from 'zod';
import { ConfigValueError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { CONFIG_KEYS } from '../types/config.js';
import type { AppConfig, ConfigKey } from '../types/config.js';

const DEFAULT_CONFIG_DIR = path.join(os.homedir(), '.config', 'gdocs-source');
const DEFAULT_CONFIG_FILE = 'config.json';

export const DEFAULT_CREDENTIALS_FILE = 'credentials.json';
export const DEFAULT_TOKEN_FILE = 'token.json';
export const DEFAULT_REDIRECT_URI = 'http://localhost:7860/api/oauth2callback';
export const DEFAULT_SERVER_PORT = 7860;

export const ENV = {
  CREDENTIALS_PATH: 'GDOCS_CREDENTIALS_PATH',
  TOKEN_PATH: 'GDOCS_TOKEN_PATH',
  REDIRECT_URI: 'GDOCS_REDIRECT_URI',
} as const;

const portSchema = z.number().int().min(1).max(65535);

const configSchema = z.object({
  credentialsPath: z.string().min(1).optional(),
  tokenPath: z.string().min(1).optional(),
  redirectUri: z.string().url().optional(),
  port: portSchema.optional(),
  format: z.enum(['json', 'text']).optional(),
});

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((k) => k === key);
}

/**
 * Parse a value typed on the command line for the given key
 * @throws ConfigValueError
 */
export function parseConfigValue<K extends ConfigKey>(key: K, raw: string): AppConfig[K];
export function parseConfigValue(key: ConfigKey, raw: string): AppConfig[ConfigKey] {
  const value = raw.trim();
  switch (key) {
    case 'port': {
      const parsed = portSchema.safeParse(Number(value));
      if (!/^\d+$/.test(value) || !parsed.success) {
        throw new ConfigValueError(`port must be an integer between 1 and 65535, got '${raw}'`);
      }
      return parsed.data;
    }
    case 'format':
      if (value !== 'json' && value !== 'text') {
        throw new ConfigValueError(`format must be 'json' or 'text', got '${raw}'`);
      }
      return value;
    case 'redirectUri':
      if (!URL.canParse(value)) {
        throw new ConfigValueError(`redirectUri must be an absolute URL, got '${raw}'`);
      }
      return value;
    case 'credentialsPath':
    case 'tokenPath':
      if (value.length === 0) {
        throw new ConfigValueError(`${key} must not be empty`);
      }
      return value;
  }
}

export class ConfigService {
  private configPath: string;
  private config: AppConfig;

  constructor(configPath?: string) {
    this.configPath = configPath || path.join(DEFAULT_CONFIG_DIR, DEFAULT_CONFIG_FILE);
    this.config = this.load();
  }

  private load(): AppConfig {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    try {
      const content = fs.readFileSync(this.configPath, 'utf-8');
      const parsed = configSchema.safeParse(JSON.parse(content));
      if (parsed.success) {
        return parsed.data;
      }
      loggers.config.warn('Ignoring invalid config file', {
        path: this.configPath,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    } catch (error) {
      loggers.config.warn('Ignoring unreadable config file', {
        path: this.configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    return {};
  }

  private save(): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(this.config, null, 2), 'utf-8');
  }

  get<K extends ConfigKey>(key: K): AppConfig[K] {
    return this.config[key];
  }

  set<K extends ConfigKey>(key: K, value: AppConfig[K]): void {
    this.config[key] = value;
    this.save();
  }

  getAll(): AppConfig {
    return { ...this.config };
  }

  delete(key: ConfigKey): void {
    delete this.config[key];
    this.save();
  }

  clear(): void {
    this.config = {};
    this.save();
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Absolute path of credentials.json (env > config > ./credentials.json)
   */
  getCredentialsPath(): string {
    return path.resolve(
      readEnv(ENV.CREDENTIALS_PATH) ?? this.config.credentialsPath ?? DEFAULT_CREDENTIALS_FILE
    );
  }

  /**
   * Absolute path of token.json (env > config > ./token.json)
   */
  getTokenPath(): string {
    return path.resolve(readEnv(ENV.TOKEN_PATH) ?? this.config.tokenPath ?? DEFAULT_TOKEN_FILE);
  }

  getRedirectUri(): string {
    return readEnv(ENV.REDIRECT_URI) ?? this.config.redirectUri ?? DEFAULT_REDIRECT_URI;
  }

  /**
   * Port for the web callback server: config, then the redirect URI's port, then 7860
   */
  getServerPort(): number {
    if (this.config.port !== undefined) {
      return this.config.port;
    }
    const redirectUri = this.getRedirectUri();
    if (URL.canParse(redirectUri)) {
      const { port } = new URL(redirectUri);
      if (port) {
        return Number(port);
      }
    }
    return DEFAULT_SERVER_PORT;
  }
}

function readEnv(name: string): string | undefined {
  const value = process.env[name];
  return value && value.length > 0 ? value : undefined;
}

let defaultInstance: ConfigService | null = null;

/**
 * Shared instance; the first caller's path wins
 */
export function getConfigService(configPath?: string): ConfigService {
  if (!defaultInstance) {
    defaultInstance = new ConfigService(configPath);
  }
  return defaultInstance;
}

export function resetConfigService(): void {
  defaultInstance = null;
}
