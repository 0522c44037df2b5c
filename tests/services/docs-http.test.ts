import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import http from 'node:http';
import { GoogleDocsClient } from '../../src/services/docs.js';
import { PermissionDeniedError } from '../../src/lib/errors.js';

const DOCUMENT = {
  documentId: 'doc-1',
  title: 'Notes',
  body: { content: [{ paragraph: { elements: [{ textRun: { content: 'Hello\n' } }] } }] },
};

describe('GoogleDocsClient over HTTP', () => {
  let server: http.Server;
  let baseUrl: string;
  let hits: number;
  let statuses: number[];

  beforeEach(async () => {
    hits = 0;
    statuses = [];
    server = http.createServer((_req, res) => {
      const status = statuses[hits] ?? 503;
      hits++;
      res.writeHead(status, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(status === 200 ? DOCUMENT : { error: { code: status } }));
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('server has no TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}/v1`;
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  function createClient(): GoogleDocsClient {
    return new GoogleDocsClient({
      auth: { getAccessToken: async () => 'access-1', markExpired: () => undefined },
      baseUrl,
      retry: { maxRetries: 3, baseDelayMs: 0 },
    });
  }

  it('sends one request per attempt', async () => {
    await expect(createClient().getDocument('doc-1')).rejects.toMatchObject({
      message: 'Docs API request for document doc-1 failed after 4 attempts',
      status: 503,
    });
    expect(hits).toBe(4);
  });

  it('stops requesting once the server recovers', async () => {
    statuses = [503, 200];

    const document = await createClient().getDocument('doc-1');

    expect(document.title).toBe('Notes');
    expect(hits).toBe(2);
  });

  it('does not repeat a permanent failure', async () => {
    statuses = [403];

    await expect(createClient().getDocument('doc-1')).rejects.toBeInstanceOf(PermissionDeniedError);
    expect(hits).toBe(1);
  });
});
