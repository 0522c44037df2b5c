/**
 * Credentials
 * Loads the OAuth client secrets file downloaded from Google Cloud Console
 */

import fs from 'node:fs';
import { z } from 'zod';
import { CredentialsNotFoundError, InvalidCredentialsError } from '../lib/errors.js';
import type { ClientCredentials } from '../types/auth.js';

export const DEFAULT_AUTH_URI = 'https://accounts.google.com/o/oauth2/auth';
export const DEFAULT_TOKEN_URI = 'https://oauth2.googleapis.com/token';

const clientSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  auth_uri: z.string().url().optional(),
  token_uri: z.string().url().optional(),
  redirect_uris: z.array(z.string()).optional(),
});

const secretsFileSchema = z
  .object({
    installed: clientSchema.optional(),
    web: clientSchema.optional(),
  })
  .refine((file) => file.installed !== undefined || file.web !== undefined, {
    message: 'expected an "installed" or "web" client',
  });

/**
 * Read and validate credentials.json
 * @throws CredentialsNotFoundError when the file does not exist
 * @throws InvalidCredentialsError when it is not a client secrets file
 */
export function loadClientCredentials(credentialsPath: string): ClientCredentials {
  if (!fs.existsSync(credentialsPath)) {
    throw new CredentialsNotFoundError(credentialsPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(credentialsPath, 'utf-8'));
  } catch (error) {
    throw new InvalidCredentialsError(
      credentialsPath,
      error instanceof Error ? error.message : String(error)
    );
  }

  const parsed = secretsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new InvalidCredentialsError(credentialsPath, `${where}${issue.message}`);
  }

  // A file downloaded for a desktop client has "installed"; web clients have "web"
  const { installed, web } = parsed.data;
  const client = installed ?? web;
  if (!client) {
    throw new InvalidCredentialsError(credentialsPath, 'expected an "installed" or "web" client');
  }

  return {
    type: installed ? 'desktop' : 'web',
    clientId: client.client_id,
    clientSecret: client.client_secret,
    authUri: client.auth_uri ?? DEFAULT_AUTH_URI,
    tokenUri: client.token_uri ?? DEFAULT_TOKEN_URI,
    redirectUris: client.redirect_uris ?? [],
  };
}
