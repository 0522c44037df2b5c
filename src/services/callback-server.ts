/**
 * Callback Server
 * Web-application flow: serves the redirect URI registered on the OAuth client
 * (http://localhost:7860/api/oauth2callback by default) and stores the session token
 */

import express from 'express';
import type { Express, Request, Response } from 'express';
import type { Server } from 'node:http';
import { createRequestContext, loggers, withRequestId } from '../lib/logger.js';
import { createState } from './auth.js';
import type { GoogleAuthService } from './auth.js';

export const DEFAULT_CALLBACK_PATH = '/api/oauth2callback';
export const AUTHORIZE_PATH = '/api/oauth2/authorize';
const STATE_TTL_MS = 10 * 60 * 1000;

export const SUCCESS_MESSAGE =
  'Successfully authenticated with Google Docs! You can now close this window and return to the main application.';

export interface CallbackAppOptions {
  auth: GoogleAuthService;
  callbackPath?: string;
  /**
   * Reject callbacks whose state was not issued by this server (default: true).
   * Turn off to accept codes from a URL printed by `gdocs auth url`.
   */
  requireState?: boolean;
  stateTtlMs?: number;
}

/**
 * Issued OAuth states, each usable once until it expires
 */
export class PendingStates {
  private states = new Map<string, number>();

  constructor(private ttlMs: number = STATE_TTL_MS) {}

  issue(now: number = Date.now()): string {
    this.prune(now);
    const state = createState();
    this.states.set(state, now + this.ttlMs);
    return state;
  }

  consume(state: string, now: number = Date.now()): boolean {
    const expiresAt = this.states.get(state);
    this.states.delete(state);
    return expiresAt !== undefined && expiresAt > now;
  }

  size(): number {
    return this.states.size;
  }

  private prune(now: number): void {
    for (const [state, expiresAt] of this.states) {
      if (expiresAt <= now) {
        this.states.delete(state);
      }
    }
  }
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createCallbackApp(options: CallbackAppOptions): Express {
  const { auth } = options;
  const callbackPath = options.callbackPath ?? DEFAULT_CALLBACK_PATH;
  const requireState = options.requireState ?? true;
  const states = new PendingStates(options.stateTtlMs);

  const app = express();
  app.disable('x-powered-by');

  app.use((req, res, next) => {
    const context = createRequestContext(req.method, req.path);
    const startTime = Date.now();
    res.on('finish', () => {
      loggers.server.info('Request handled', {
        ...context,
        statusCode: res.statusCode,
        duration: Date.now() - startTime,
      });
    });
    withRequestId(context.requestId, () => next());
  });

  app.get(AUTHORIZE_PATH, (_req: Request, res: Response) => {
    try {
      const { url } = auth.createAuthorizationUrl({ state: states.issue() });
      res.redirect(302, url);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      res.status(500).json({ error: `Could not create authorization URL: ${message}` });
    }
  });

  app.get(callbackPath, async (req: Request, res: Response) => {
    const providerError = queryString(req, 'error');
    if (providerError) {
      res.status(400).json({ error: providerError });
      return;
    }

    const code = queryString(req, 'code');
    if (!code) {
      res.status(400).json({ error: 'No authorization code received' });
      return;
    }

    const state = queryString(req, 'state');
    if (requireState && (!state || !states.consume(state))) {
      res.status(400).json({ error: 'Invalid OAuth state' });
      return;
    }

    try {
      await auth.exchangeCode(code);
      res.json({ success: true, message: SUCCESS_MESSAGE });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      loggers.server.error('OAuth callback failed', error instanceof Error ? error : null);
      res.status(500).json({ error: `Authentication failed: ${message}` });
    }
  });

  app.get('/api/auth/status', (_req: Request, res: Response) => {
    res.json(auth.getStatus());
  });

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  return app;
}

export interface RunningServer {
  port: number;
  url: string;
  close(): Promise<void>;
}

export function startCallbackServer(
  app: Express,
  options: { host?: string; port: number }
): Promise<RunningServer> {
  const host = options.host ?? '127.0.0.1';

  return new Promise((resolve, reject) => {
    const server: Server = app.listen(options.port, host);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      const address = server.address();
      const port = address && typeof address !== 'string' ? address.port : options.port;
      loggers.server.info('Callback server listening', { host, port });
      resolve({
        port,
        url: `http://${host === '0.0.0.0' ? 'localhost' : host}:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((error) => (error ? fail(error) : done()));
            server.closeAllConnections();
          }),
      });
    });
  });
}
