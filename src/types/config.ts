/**
 * Config file layout
 */
export interface AppConfig {
  /** OAuth client file, default credentials.json */
  credentialsPath?: string;
  /** Session token file, default token.json */
  tokenPath?: string;
  /** Redirect URI registered on the OAuth client */
  redirectUri?: string;
  /** Port for `auth serve` */
  port?: number;
  /** Default output format */
  format?: 'json' | 'text';
}

export type ConfigKey = keyof AppConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  'credentialsPath',
  'tokenPath',
  'redirectUri',
  'port',
  'format',
];
