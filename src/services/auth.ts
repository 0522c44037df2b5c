/**
 * Auth Service
 * OAuth2 authorization-code flow against Google's endpoints: authorization URL,
 * code exchange, session token refresh and status
 */

import { randomBytes } from 'node:crypto';
import { ofetch } from 'ofetch';
import { z } from 'zod';
import {
  AuthRequiredError,
  CredentialsNotFoundError,
  EXIT_CODES,
  GdocsError,
  TokenExchangeError,
} from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { loadClientCredentials } from './credentials.js';
import { isExpired, TokenStore } from './token-store.js';
import { statusOf } from './retry.js';
import type {
  AuthorizationRequest,
  AuthStatus,
  ClientCredentials,
  ClientType,
  StoredToken,
  TokenResponse,
} from '../types/auth.js';

export const DOCS_READONLY_SCOPE = 'https://www.googleapis.com/auth/documents.readonly';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  token_type: z.string(),
  id_token: z.string().optional(),
});

const tokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export interface GoogleAuthOptions {
  credentialsPath: string;
  tokenStore: TokenStore;
  /** Used when a call does not pass its own */
  redirectUri: string;
  /** If you change these, delete token.json so the user consents again */
  scopes?: string[];
}

export interface AuthorizationUrlOptions {
  state?: string;
  redirectUri?: string;
}

export class GoogleAuthService {
  private credentialsPath: string;
  private tokenStore: TokenStore;
  private redirectUri: string;
  private scopes: string[];
  private cachedToken: StoredToken | null = null;

  // Single in-flight refresh shared by concurrent callers
  private inFlightRefresh: Promise<string> | null = null;

  constructor(options: GoogleAuthOptions) {
    this.credentialsPath = options.credentialsPath;
    this.tokenStore = options.tokenStore;
    this.redirectUri = options.redirectUri;
    this.scopes = options.scopes ?? [DOCS_READONLY_SCOPE];
  }

  getCredentials(): ClientCredentials {
    return loadClientCredentials(this.credentialsPath);
  }

  getRedirectUri(): string {
    return this.redirectUri;
  }

  getTokenStore(): TokenStore {
    return this.tokenStore;
  }

  /**
   * Build the consent URL the user opens in a browser
   * @throws CredentialsNotFoundError
   */
  createAuthorizationUrl(options: AuthorizationUrlOptions = {}): AuthorizationRequest {
    const credentials = this.getCredentials();
    const redirectUri = options.redirectUri ?? this.redirectUri;
    const state = options.state ?? createState();

    const url = new URL(credentials.authUri);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('client_id', credentials.clientId);
    url.searchParams.set('redirect_uri', redirectUri);
    url.searchParams.set('scope', this.scopes.join(' '));
    url.searchParams.set('access_type', 'offline');
    url.searchParams.set('include_granted_scopes', 'true');
    // Without consent Google omits refresh_token when the user already granted access once
    url.searchParams.set('prompt', 'consent');
    url.searchParams.set('state', state);

    return { url: url.toString(), state, redirectUri };
  }

  /**
   * Exchange an authorization code and store the resulting session token
   */
  async exchangeCode(code: string, redirectUri?: string): Promise<StoredToken> {
    const credentials = this.getCredentials();
    const previous = this.loadPreviousToken();

    const response = await loggers.auth.trackAsync('Authorization code exchange', () =>
      this.requestToken(credentials.tokenUri, {
        grant_type: 'authorization_code',
        code,
        client_id: credentials.clientId,
        client_secret: credentials.clientSecret,
        redirect_uri: redirectUri ?? this.redirectUri,
      })
    );

    const token = toStoredToken(response, {
      tokenUri: credentials.tokenUri,
      clientId: credentials.clientId,
      clientSecret: credentials.clientSecret,
      scopes: this.scopes,
      refreshToken: previous?.refresh_token,
    });

    this.tokenStore.save(token);
    this.cachedToken = token;
    loggers.auth.info('Successfully authenticated with Google Docs API', {
      tokenPath: this.tokenStore.getPath(),
    });
    return token;
  }

  /**
   * Return a usable access token, refreshing it when it has expired
   * @throws CredentialsNotFoundError when there is no token and no client to start a flow with
   * @throws AuthRequiredError when the user has to authorize (again)
   */
  async getAccessToken(): Promise<string> {
    const token = this.currentToken();

    if (token && !isExpired(token)) {
      return token.token;
    }

    if (token?.refresh_token) {
      if (this.inFlightRefresh) {
        return this.inFlightRefresh;
      }

      this.inFlightRefresh = this.refresh(token);
      try {
        return await this.inFlightRefresh;
      } finally {
        this.inFlightRefresh = null;
      }
    }

    // An interactive flow is needed; that needs credentials.json first
    this.getCredentials();
    throw new AuthRequiredError(
      token ? 'Google Docs session expired and cannot be refreshed' : undefined
    );
  }

  /**
   * Drop the in-memory token; the next call reloads token.json
   */
  invalidate(): void {
    this.cachedToken = null;
  }

  /**
   * Force the stored token to be treated as expired (after a 401)
   */
  markExpired(): void {
    const token = this.currentToken();
    if (token) {
      this.cachedToken = { ...token, expiry: new Date(0).toISOString() };
    }
  }

  hasInflightRefresh(): boolean {
    return this.inFlightRefresh !== null;
  }

  /**
   * @returns whether a token file was removed
   */
  logout(): boolean {
    this.cachedToken = null;
    return this.tokenStore.delete();
  }

  getStatus(): AuthStatus {
    const base = {
      credentialsPath: this.credentialsPath,
      tokenPath: this.tokenStore.getPath(),
    };

    let clientType: ClientType | undefined;
    let credentialsProblem: GdocsError | null = null;
    try {
      clientType = this.getCredentials().type;
    } catch (error) {
      credentialsProblem =
        error instanceof GdocsError ? error : new GdocsError(String(error), 'UNKNOWN', EXIT_CODES.GENERAL);
    }

    let token: StoredToken | null;
    try {
      token = this.tokenStore.load();
    } catch (error) {
      return {
        ...base,
        authenticated: false,
        state: 'error',
        clientType,
        detail: error instanceof Error ? error.message : String(error),
      };
    }

    if (token) {
      const details = { clientType, expiry: token.expiry, scopes: token.scopes };
      if (!isExpired(token)) {
        return {
          ...base,
          ...details,
          authenticated: true,
          state: 'authenticated',
          detail: 'Authenticated with Google Docs',
        };
      }
      if (token.refresh_token) {
        return {
          ...base,
          ...details,
          authenticated: true,
          state: 'expired-refreshable',
          detail: 'Access token expired; it will be refreshed on the next request',
        };
      }
    }

    if (credentialsProblem instanceof CredentialsNotFoundError) {
      return {
        ...base,
        authenticated: false,
        state: 'missing-credentials',
        detail: credentialsProblem.message,
      };
    }
    if (credentialsProblem) {
      return { ...base, authenticated: false, state: 'error', detail: credentialsProblem.message };
    }

    return {
      ...base,
      authenticated: false,
      state: 'not-authenticated',
      clientType,
      expiry: token?.expiry,
      detail: token
        ? 'Session token expired and has no refresh token'
        : 'Not authenticated with Google Docs',
    };
  }

  private currentToken(): StoredToken | null {
    if (!this.cachedToken) {
      this.cachedToken = this.tokenStore.load();
    }
    return this.cachedToken;
  }

  private loadPreviousToken(): StoredToken | null {
    try {
      return this.tokenStore.load();
    } catch (error) {
      // The file is overwritten below
      loggers.auth.debug('Discarding unreadable previous token', {
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async refresh(token: StoredToken): Promise<string> {
    const refreshToken = token.refresh_token;
    if (!refreshToken) {
      throw new AuthRequiredError();
    }

    let response: TokenResponse;
    try {
      response = await loggers.auth.trackAsync('Token refresh', () =>
        this.requestToken(token.token_uri, {
          grant_type: 'refresh_token',
          refresh_token: refreshToken,
          client_id: token.client_id,
          client_secret: token.client_secret,
        })
      );
    } catch (error) {
      if (error instanceof TokenExchangeError && error.error === 'invalid_grant') {
        throw new AuthRequiredError('Google Docs session was revoked or has expired');
      }
      throw error;
    }

    const refreshed = toStoredToken(response, {
      tokenUri: token.token_uri,
      clientId: token.client_id,
      clientSecret: token.client_secret,
      scopes: token.scopes,
      refreshToken,
    });
    this.tokenStore.save(refreshed);
    this.cachedToken = refreshed;
    return refreshed.token;
  }

  private async requestToken(tokenUri: string, params: Record<string, string>): Promise<TokenResponse> {
    const body = new URLSearchParams(params).toString();

    let raw: unknown;
    try {
      raw = await ofetch<unknown>(tokenUri, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body,
      });
    } catch (error) {
      throw toTokenExchangeError(error);
    }

    const parsed = tokenResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TokenExchangeError('Token endpoint returned an unexpected response');
    }
    return parsed.data;
  }
}

function toStoredToken(
  response: TokenResponse,
  client: {
    tokenUri: string;
    clientId: string;
    clientSecret: string;
    scopes: string[];
    refreshToken?: string;
  }
): StoredToken {
  return {
    token: response.access_token,
    refresh_token: response.refresh_token ?? client.refreshToken,
    token_uri: client.tokenUri,
    client_id: client.clientId,
    client_secret: client.clientSecret,
    scopes: response.scope ? response.scope.split(' ').filter(Boolean) : client.scopes,
    expiry:
      response.expires_in !== undefined
        ? new Date(Date.now() + response.expires_in * 1000).toISOString()
        : undefined,
  };
}

function toTokenExchangeError(error: unknown): TokenExchangeError {
  const data = error && typeof error === 'object' && 'data' in error ? error.data : undefined;
  const body = tokenErrorSchema.safeParse(data);
  if (body.success) {
    const description = body.data.error_description ? `: ${body.data.error_description}` : '';
    return new TokenExchangeError(
      `Token request failed (${body.data.error}${description})`,
      body.data.error,
      body.data.error_description
    );
  }

  const status = statusOf(error);
  const reason = error instanceof Error ? error.message : String(error);
  return new TokenExchangeError(
    status !== undefined ? `Token request failed with status ${status}` : `Token request failed: ${reason}`
  );
}

export function createState(): string {
  return randomBytes(16).toString('hex');
}
