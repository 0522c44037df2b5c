/**
 * OAuth Types
 */

/** installed = desktop app client, web = web application client */
export type ClientType = 'desktop' | 'web';

/**
 * OAuth client read from credentials.json
 */
export interface ClientCredentials {
  type: ClientType;
  clientId: string;
  clientSecret: string;
  authUri: string;
  tokenUri: string;
  redirectUris: string[];
}

/**
 * Token endpoint response
 */
export interface TokenResponse {
  access_token: string;
  expires_in?: number;
  refresh_token?: string;
  scope?: string;
  token_type: string;
  id_token?: string;
}

/**
 * token.json, in the authorized-user layout Google's client libraries write
 */
export interface StoredToken {
  token: string;
  refresh_token?: string;
  token_uri: string;
  client_id: string;
  client_secret: string;
  scopes: string[];
  /** ISO-8601 */
  expiry?: string;
}

export type AuthState =
  | 'authenticated'
  | 'expired-refreshable'
  | 'not-authenticated'
  | 'missing-credentials'
  | 'error';

export interface AuthStatus {
  authenticated: boolean;
  state: AuthState;
  credentialsPath: string;
  tokenPath: string;
  clientType?: ClientType;
  expiry?: string;
  scopes?: string[];
  detail: string;
}

export interface AuthorizationRequest {
  url: string;
  state: string;
  redirectUri: string;
}
