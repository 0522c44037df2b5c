import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { StoredToken } from '../../src/types/auth.js';

export const TEST_CLIENT_ID = 'test-client-id.apps.googleusercontent.com';
export const TEST_CLIENT_SECRET = 'test-secret';
export const TEST_TOKEN_URI = 'https://oauth2.googleapis.com/token';

export function createTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeCredentials(
  dir: string,
  type: 'installed' | 'web' = 'installed',
  redirectUris?: string[]
): string {
  const file = path.join(dir, 'credentials.json');
  fs.writeFileSync(
    file,
    JSON.stringify({
      [type]: {
        client_id: TEST_CLIENT_ID,
        client_secret: TEST_CLIENT_SECRET,
        auth_uri: 'https://accounts.google.com/o/oauth2/auth',
        token_uri: TEST_TOKEN_URI,
        ...(redirectUris ? { redirect_uris: redirectUris } : {}),
      },
    })
  );
  return file;
}

export function storedToken(overrides: Partial<StoredToken> = {}): StoredToken {
  return {
    token: 'access-1',
    refresh_token: 'refresh-1',
    token_uri: TEST_TOKEN_URI,
    client_id: TEST_CLIENT_ID,
    client_secret: TEST_CLIENT_SECRET,
    scopes: ['https://www.googleapis.com/auth/documents.readonly'],
    expiry: '2999-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function writeToken(dir: string, token: StoredToken): string {
  const file = path.join(dir, 'token.json');
  fs.writeFileSync(file, JSON.stringify(token, null, 2));
  return file;
}

export function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

/**
 * Error carrying an HTTP status, the way ofetch rejects
 */
export function httpError(status: number, data?: unknown): Error {
  return Object.assign(new Error(`Request failed with status ${status}`), { status, data });
}
