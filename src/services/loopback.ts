/**
 * Loopback Listener
 * Desktop-client flow: Google redirects the browser to a local port and the code is read off the request
 */

import http from 'node:http';
import { AuthorizationError } from '../lib/errors.js';
import { loggers } from '../lib/logger.js';

export const DEFAULT_LOGIN_TIMEOUT_MS = 5 * 60 * 1000;

export interface LoopbackOptions {
  expectedState: string;
  /** 0 picks a free port */
  port?: number;
  host?: string;
  path?: string;
  timeoutMs?: number;
}

export interface LoopbackListener {
  port: number;
  /** Pass this as redirect_uri in both the authorization URL and the code exchange */
  redirectUri: string;
  waitForCode(): Promise<string>;
  close(): void;
}

type Outcome = { code: string } | { error: AuthorizationError };

export async function startLoopbackListener(options: LoopbackOptions): Promise<LoopbackListener> {
  const host = options.host ?? '127.0.0.1';
  const callbackPath = options.path ?? '/';
  const timeoutMs = options.timeoutMs ?? DEFAULT_LOGIN_TIMEOUT_MS;

  let outcome: Outcome | null = null;
  let deliver: ((result: Outcome) => void) | null = null;
  let timer: NodeJS.Timeout | undefined;

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? '/', `http://${host}`);
    if (url.pathname !== callbackPath) {
      respond(res, 404, 'Not found', 'This address only receives the Google sign-in redirect.');
      return;
    }

    const providerError = url.searchParams.get('error');
    const code = url.searchParams.get('code');
    const state = url.searchParams.get('state');
    loggers.auth.debug('Loopback redirect received', { path: url.pathname, hasCode: Boolean(code) });

    if (providerError) {
      respond(res, 400, 'Authorization failed', `Google returned: ${providerError}`);
      finish({ error: new AuthorizationError(`Authorization was not granted: ${providerError}`) });
      return;
    }
    // prefetches and reloads carry neither code nor error; keep waiting
    if (!code) {
      respond(res, 400, 'Authorization failed', 'No authorization code received');
      return;
    }
    if (state !== options.expectedState) {
      respond(res, 400, 'Authorization failed', 'The sign-in response did not match this login attempt.');
      finish({ error: new AuthorizationError('OAuth state mismatch') });
      return;
    }

    respond(res, 200, 'Authenticated with Google Docs', 'You can close this window and return to the terminal.');
    finish({ code });
  });

  function finish(result: Outcome): void {
    if (outcome) {
      return;
    }
    outcome = result;
    clearTimeout(timer);
    server.close();
    deliver?.(result);
  }

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port ?? 0, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  if (!address || typeof address === 'string') {
    server.close();
    throw new AuthorizationError('Loopback listener did not bind to a TCP port');
  }
  const { port } = address;
  timer = setTimeout(() => {
    finish({ error: new AuthorizationError(`Timed out after ${Math.round(timeoutMs / 1000)}s waiting for authorization`) });
  }, timeoutMs);

  return {
    port,
    redirectUri: `http://${host}:${port}${callbackPath}`,
    waitForCode(): Promise<string> {
      return new Promise<string>((resolve, reject) => {
        const settle = (result: Outcome): void => {
          if ('code' in result) {
            resolve(result.code);
          } else {
            reject(result.error);
          }
        };
        if (outcome) {
          settle(outcome);
        } else {
          deliver = settle;
        }
      });
    },
    close(): void {
      finish({ error: new AuthorizationError('Login cancelled') });
    },
  };
}

function respond(res: http.ServerResponse, status: number, title: string, message: string): void {
  res.writeHead(status, {
    'Content-Type': 'text/html; charset=utf-8',
    Connection: 'close',
  });
  res.end(
    `<!doctype html><html><head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>` +
      `<body style="font-family:system-ui,sans-serif;text-align:center;margin-top:20vh">` +
      `<h2>${escapeHtml(title)}</h2><p>${escapeHtml(message)}</p></body></html>`
  );
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
