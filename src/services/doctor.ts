/**
 * Doctor Service
 * Checks the setup the OAuth guide walks through: client file, redirect URI,
 * session token, scopes and that both secrets stay out of version control
 */

import fs from 'node:fs';
import path from 'node:path';
import { isIgnored } from '../lib/gitignore.js';
import { loadClientCredentials } from './credentials.js';
import { isExpired, TokenStore } from './token-store.js';
import { DOCS_READONLY_SCOPE } from './auth.js';
import type { ClientCredentials, StoredToken } from '../types/auth.js';

export type CheckStatus = 'ok' | 'warning' | 'error' | 'skipped';
export type ReportStatus = Exclude<CheckStatus, 'skipped'>;
export type CheckName = 'credentials' | 'redirect-uri' | 'token' | 'scopes' | 'gitignore';

export interface SetupCheck {
  name: CheckName;
  status: CheckStatus;
  details: string;
}

export interface SetupReport {
  status: ReportStatus;
  timestamp: string;
  checks: SetupCheck[];
  summary: string;
}

export interface DoctorOptions {
  credentialsPath: string;
  tokenPath: string;
  redirectUri: string;
  requiredScopes?: string[];
  /** Where .gitignore is looked up; defaults to the credentials file's directory */
  projectDir?: string;
}

const STATUS_SEVERITY: Record<CheckStatus, number> = {
  skipped: 0,
  ok: 0,
  warning: 1,
  error: 2,
};

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

export interface RedirectUriProblem {
  status: 'warning' | 'error';
  details: string;
}

/**
 * Shape rules for a redirect URI: http only on loopback hosts, https everywhere else
 */
export function validateRedirectUri(redirectUri: string): RedirectUriProblem | null {
  if (!URL.canParse(redirectUri)) {
    return { status: 'error', details: `Redirect URI '${redirectUri}' is not an absolute URL` };
  }
  const url = new URL(redirectUri);
  if (url.hash) {
    return { status: 'error', details: 'Redirect URI must not contain a fragment' };
  }
  if (url.protocol === 'http:' && !LOOPBACK_HOSTS.has(url.hostname)) {
    return {
      status: 'error',
      details: `Redirect URI '${redirectUri}' must use https outside localhost`,
    };
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return { status: 'error', details: `Redirect URI scheme ${url.protocol} is not supported` };
  }
  return null;
}

export function isLoopbackUri(redirectUri: string): boolean {
  return URL.canParse(redirectUri) && LOOPBACK_HOSTS.has(new URL(redirectUri).hostname);
}

export class DoctorService {
  private options: DoctorOptions;
  private tokenStore: TokenStore;

  constructor(options: DoctorOptions) {
    this.options = options;
    this.tokenStore = new TokenStore(options.tokenPath);
  }

  run(): SetupReport {
    const { check: credentialsCheck, credentials } = this.checkCredentials();
    const { check: tokenCheck, token } = this.checkToken();

    const checks: SetupCheck[] = [
      credentialsCheck,
      this.checkRedirectUri(credentials),
      tokenCheck,
      this.checkScopes(token),
      this.checkGitignore(),
    ];

    return {
      status: overallStatus(checks),
      timestamp: new Date().toISOString(),
      checks,
      summary: summarize(checks),
    };
  }

  private checkCredentials(): { check: SetupCheck; credentials: ClientCredentials | null } {
    try {
      const credentials = loadClientCredentials(this.options.credentialsPath);
      return {
        credentials,
        check: {
          name: 'credentials',
          status: 'ok',
          details: `Found ${credentials.type} client ${credentials.clientId}`,
        },
      };
    } catch (error) {
      return {
        credentials: null,
        check: {
          name: 'credentials',
          status: 'error',
          details: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }

  private checkRedirectUri(credentials: ClientCredentials | null): SetupCheck {
    const { redirectUri } = this.options;
    const problem = validateRedirectUri(redirectUri);
    if (problem) {
      return { name: 'redirect-uri', ...problem };
    }

    if (credentials?.type === 'web' && !credentials.redirectUris.includes(redirectUri)) {
      return {
        name: 'redirect-uri',
        status: 'error',
        details: `${redirectUri} is not an authorized redirect URI of the web client; add it in Google Cloud Console`,
      };
    }

    if (credentials?.type === 'desktop' && !isLoopbackUri(redirectUri)) {
      return {
        name: 'redirect-uri',
        status: 'warning',
        details: 'Desktop clients only redirect to loopback addresses; `gdocs auth login` picks its own',
      };
    }

    return { name: 'redirect-uri', status: 'ok', details: redirectUri };
  }

  private checkToken(): { check: SetupCheck; token: StoredToken | null } {
    let token: StoredToken | null;
    try {
      token = this.tokenStore.load();
    } catch (error) {
      return {
        token: null,
        check: { name: 'token', status: 'error', details: error instanceof Error ? error.message : String(error) },
      };
    }

    if (!token) {
      return {
        token: null,
        check: {
          name: 'token',
          status: 'warning',
          details: `No session token at ${this.tokenStore.getPath()}; run \`gdocs auth login\``,
        },
      };
    }

    if (!isExpired(token)) {
      return { token, check: { name: 'token', status: 'ok', details: 'Session token is valid' } };
    }
    if (token.refresh_token) {
      return {
        token,
        check: { name: 'token', status: 'ok', details: 'Access token expired; refresh token present' },
      };
    }
    return {
      token,
      check: {
        name: 'token',
        status: 'warning',
        details: 'Session token expired and has no refresh token; authorize again',
      },
    };
  }

  private checkScopes(token: StoredToken | null): SetupCheck {
    if (!token) {
      return { name: 'scopes', status: 'skipped', details: 'No session token' };
    }
    const required = this.options.requiredScopes ?? [DOCS_READONLY_SCOPE];
    const missing = required.filter((scope) => !token.scopes.includes(scope));
    if (missing.length > 0) {
      return {
        name: 'scopes',
        status: 'warning',
        details: `Token lacks ${missing.join(', ')}; delete ${path.basename(this.tokenStore.getPath())} and authorize again`,
      };
    }
    return { name: 'scopes', status: 'ok', details: required.join(' ') };
  }

  private checkGitignore(): SetupCheck {
    const projectDir = this.options.projectDir ?? path.dirname(this.options.credentialsPath);
    const gitignorePath = path.join(projectDir, '.gitignore');

    if (!fs.existsSync(gitignorePath)) {
      return {
        name: 'gitignore',
        status: 'warning',
        details: `No .gitignore in ${projectDir}; keep credentials and token files out of version control`,
      };
    }

    const content = fs.readFileSync(gitignorePath, 'utf-8');
    const secrets = [
      path.basename(this.options.credentialsPath),
      path.basename(this.options.tokenPath),
    ];
    const exposed = secrets.filter((name) => !isIgnored(content, name));
    if (exposed.length > 0) {
      return {
        name: 'gitignore',
        status: 'error',
        details: `.gitignore does not exclude ${exposed.join(', ')}`,
      };
    }
    return { name: 'gitignore', status: 'ok', details: `${secrets.join(', ')} are ignored` };
  }
}

export function overallStatus(checks: SetupCheck[]): ReportStatus {
  const worst = Math.max(0, ...checks.map((check) => STATUS_SEVERITY[check.status]));
  return worst === 2 ? 'error' : worst === 1 ? 'warning' : 'ok';
}

function summarize(checks: SetupCheck[]): string {
  const errors = checks.filter((check) => check.status === 'error').length;
  const warnings = checks.filter((check) => check.status === 'warning').length;
  if (errors === 0 && warnings === 0) {
    return 'Google Docs access is set up';
  }
  return `${errors} error(s), ${warnings} warning(s)`;
}
