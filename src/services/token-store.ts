/**
 * Token Store
 * Persists the session token (token.json) so authorization is not repeated on every run
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { InvalidTokenFileError } from '../lib/errors.js';
import type { StoredToken } from '../types/auth.js';

// Treat tokens as expired a minute early so a request never starts with a token about to lapse
export const TOKEN_EXPIRY_SKEW_MS = 60 * 1000;

const storedTokenSchema = z.object({
  token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  token_uri: z.string().url(),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  scopes: z.array(z.string()).default([]),
  expiry: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), 'expiry must be an ISO-8601 timestamp')
    .optional(),
});

export class TokenStore {
  private tokenPath: string;

  constructor(tokenPath: string) {
    this.tokenPath = tokenPath;
  }

  getPath(): string {
    return this.tokenPath;
  }

  exists(): boolean {
    return fs.existsSync(this.tokenPath);
  }

  /**
   * @returns null when no token has been stored
   * @throws InvalidTokenFileError
   */
  load(): StoredToken | null {
    if (!this.exists()) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.tokenPath, 'utf-8'));
    } catch (error) {
      throw new InvalidTokenFileError(
        this.tokenPath,
        error instanceof Error ? error.message : String(error)
      );
    }

    const parsed = storedTokenSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidTokenFileError(this.tokenPath, `${issue.path.join('.')}: ${issue.message}`);
    }
    return parsed.data;
  }

  save(token: StoredToken): void {
    const dir = path.dirname(this.tokenPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.tokenPath, JSON.stringify(token, null, 2), { encoding: 'utf-8', mode: 0o600 });
    // mode only applies on create
    fs.chmodSync(this.tokenPath, 0o600);
  }

  /**
   * @returns whether a file was removed
   */
  delete(): boolean {
    if (!this.exists()) {
      return false;
    }
    fs.unlinkSync(this.tokenPath);
    return true;
  }
}

/**
 * A token without an expiry is taken to be valid
 */
export function isExpired(
  token: Pick<StoredToken, 'expiry'>,
  now: number = Date.now(),
  skewMs: number = TOKEN_EXPIRY_SKEW_MS
): boolean {
  if (!token.expiry) {
    return false;
  }
  return Date.parse(token.expiry) - skewMs <= now;
}
