/**
 * Auth Command
 * Google Docs authorization: status, desktop login, web callback server, manual code exchange
 */

import { Command } from 'commander';
import { getAuthService, resolveFormat } from '../lib/context.js';
import { getConfigService } from '../services/config.js';
import { startLoopbackListener, DEFAULT_LOGIN_TIMEOUT_MS } from '../services/loopback.js';
import { createCallbackApp, startCallbackServer, AUTHORIZE_PATH } from '../services/callback-server.js';
import { createState } from '../services/auth.js';
import { EXIT_CODES, ConfigValueError } from '../lib/errors.js';
import { fail, formatJSON, formatKeyValues, statusEmoji } from '../utils/output.js';
import type { AuthStatus } from '../types/auth.js';

function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new ConfigValueError(`Invalid port '${value}'`);
  }
  return port;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigValueError(`Invalid timeout '${value}'`);
  }
  return seconds;
}

function printStatus(status: AuthStatus, format: string): void {
  if (format === 'json') {
    console.log(formatJSON(status));
    return;
  }
  console.log(`${statusEmoji(status.state)} ${status.detail}`);
  console.log(
    formatKeyValues([
      ['State', status.state],
      ['Client type', status.clientType],
      ['Credentials', status.credentialsPath],
      ['Token', status.tokenPath],
      ['Expiry', status.expiry],
      ['Scopes', status.scopes?.join(' ')],
    ])
  );
}

export function createAuthCommand(): Command {
  const authCommand = new Command('auth')
    .description('Authorize access to Google Docs');

  /**
   * gdocs auth status
   */
  authCommand
    .command('status')
    .description('Show whether a usable session token exists')
    .action((_options, cmd: Command) => {
      let status: AuthStatus;
      try {
        const format = resolveFormat(cmd);
        status = getAuthService().getStatus();
        printStatus(status, format);
      } catch (error) {
        fail(error);
      }
      if (!status.authenticated) {
        process.exit(EXIT_CODES.SETUP);
      }
    });

  /**
   * gdocs auth url
   */
  authCommand
    .command('url')
    .description('Print the Google authorization URL for the configured redirect URI')
    .option('--state <state>', 'state value to embed (random by default)')
    .action((options: { state?: string }, cmd: Command) => {
      try {
        const format = resolveFormat(cmd);
        const request = getAuthService().createAuthorizationUrl({ state: options.state });
        if (format === 'json') {
          console.log(formatJSON(request));
        } else {
          console.log('Open this URL to authorize Google Docs access:\n');
          console.log(request.url);
          console.log(`\nGoogle redirects to ${request.redirectUri} when you approve.`);
        }
      } catch (error) {
        fail(error);
      }
    });

  /**
   * gdocs auth exchange <code>
   */
  authCommand
    .command('exchange <code>')
    .description('Exchange an authorization code for a session token')
    .option('--redirect-uri <uri>', 'redirect URI the code was issued for')
    .action(async (code: string, options: { redirectUri?: string }, cmd: Command) => {
      try {
        const format = resolveFormat(cmd);
        const auth = getAuthService();
        await auth.exchangeCode(code, options.redirectUri);
        printStatus(auth.getStatus(), format);
      } catch (error) {
        fail(error);
      }
    });

  /**
   * gdocs auth login
   * Desktop client flow over a loopback redirect
   */
  authCommand
    .command('login')
    .description('Authorize in the browser and store the session token (desktop client)')
    .option('-p, --port <port>', 'loopback port (0 = any free port)', '0')
    .option('-t, --timeout <seconds>', 'how long to wait for the browser', String(DEFAULT_LOGIN_TIMEOUT_MS / 1000))
    .action(async (options: { port: string; timeout: string }, cmd: Command) => {
      try {
        const format = resolveFormat(cmd);
        const auth = getAuthService();
        // Fails early when credentials.json is missing
        auth.getCredentials();

        const state = createState();
        const listener = await startLoopbackListener({
          expectedState: state,
          port: parsePort(options.port),
          timeoutMs: parseSeconds(options.timeout) * 1000,
        });
        const { url } = auth.createAuthorizationUrl({ state, redirectUri: listener.redirectUri });

        console.error('Open this URL in your browser to authorize Google Docs access:\n');
        console.error(url);
        console.error(`\nWaiting for the redirect on ${listener.redirectUri} ...`);

        const code = await listener.waitForCode();
        await auth.exchangeCode(code, listener.redirectUri);
        printStatus(auth.getStatus(), format);
      } catch (error) {
        fail(error);
      }
    });

  /**
   * gdocs auth serve
   * Web application client flow
   */
  authCommand
    .command('serve')
    .description('Serve the OAuth redirect URI for a web application client')
    .option('-p, --port <port>', 'listen port (default: from the redirect URI, or 7860)')
    .option('--host <host>', 'listen address', '127.0.0.1')
    .option('--allow-external-state', 'accept callbacks started from `gdocs auth url`')
    .action(async (options: { port?: string; host: string; allowExternalState?: boolean }) => {
      try {
        const config = getConfigService();
        const auth = getAuthService();
        auth.getCredentials();

        const redirectUri = new URL(config.getRedirectUri());
        const app = createCallbackApp({
          auth,
          callbackPath: redirectUri.pathname,
          requireState: !options.allowExternalState,
        });
        const server = await startCallbackServer(app, {
          host: options.host,
          port: options.port !== undefined ? parsePort(options.port) : config.getServerPort(),
        });

        console.error(`Callback server listening on ${server.url}`);
        console.error(`Start authorization at ${server.url}${AUTHORIZE_PATH}`);
        console.error(`Google redirects to ${redirectUri.toString()}`);

        const shutdown = (): void => {
          server.close().then(
            () => process.exit(0),
            (error: unknown) => fail(error)
          );
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
      } catch (error) {
        fail(error);
      }
    });

  /**
   * gdocs auth logout
   */
  authCommand
    .command('logout')
    .description('Delete the stored session token')
    .action((_options, cmd: Command) => {
      try {
        const format = resolveFormat(cmd);
        const auth = getAuthService();
        const removed = auth.logout();
        const tokenPath = auth.getTokenStore().getPath();
        if (format === 'json') {
          console.log(formatJSON({ removed, tokenPath }));
        } else {
          console.log(removed ? `Removed ${tokenPath}` : `No session token at ${tokenPath}`);
        }
      } catch (error) {
        fail(error);
      }
    });

  return authCommand;
}
