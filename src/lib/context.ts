/**
 * Command Context
 * Shared service construction for commands, driven by the config service
 */

import type { Command } from 'commander';
import { getConfigService } from '../services/config.js';
import { GoogleAuthService } from '../services/auth.js';
import { GoogleDocsClient } from '../services/docs.js';
import { TokenStore } from '../services/token-store.js';
import { ConfigValueError } from './errors.js';
import { isOutputFormat } from '../utils/output.js';
import type { OutputFormat } from '../utils/output.js';

let cachedAuth: GoogleAuthService | null = null;

/**
 * Output format: --format, then the config file, then json
 * @throws ConfigValueError for an unknown format
 */
export function resolveFormat(cmd: Command): OutputFormat {
  const { format } = cmd.optsWithGlobals<{ format?: string }>();
  if (format === undefined) {
    return getConfigService().get('format') ?? 'json';
  }
  if (!isOutputFormat(format)) {
    throw new ConfigValueError(`Unknown format '${format}'; use json or text`);
  }
  return format;
}

export function getAuthService(): GoogleAuthService {
  if (!cachedAuth) {
    const config = getConfigService();
    cachedAuth = new GoogleAuthService({
      credentialsPath: config.getCredentialsPath(),
      tokenStore: new TokenStore(config.getTokenPath()),
      redirectUri: config.getRedirectUri(),
    });
  }
  return cachedAuth;
}

export function getDocsClient(): GoogleDocsClient {
  return new GoogleDocsClient({ auth: getAuthService() });
}

/**
 * For tests
 */
export function clearServiceCache(): void {
  cachedAuth = null;
}
