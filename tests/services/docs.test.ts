import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';

vi.mock('ofetch', () => ({
  ofetch: vi.fn(),
}));

import { ofetch } from 'ofetch';
import { GoogleDocsClient } from '../../src/services/docs.js';
import type { AccessTokenProvider } from '../../src/services/docs.js';
import {
  AuthRequiredError,
  DocsApiError,
  DocumentNotFoundError,
  EmptyDocumentError,
  InvalidDocumentReferenceError,
  PermissionDeniedError,
} from '../../src/lib/errors.js';
import { httpError } from '../helpers/fixtures.js';

const DOCUMENT = {
  documentId: 'doc-1',
  title: 'Notes',
  revisionId: 'rev-1',
  body: {
    content: [
      { sectionBreak: { sectionStyle: {} } },
      { paragraph: { elements: [{ textRun: { content: 'Hello\n' } }] } },
      { paragraph: { elements: [{ textRun: { content: 'World\n' } }] } },
    ],
  },
};

describe('GoogleDocsClient', () => {
  let getAccessToken: Mock<() => Promise<string>>;
  let markExpired: Mock<() => void>;
  let auth: AccessTokenProvider;
  let client: GoogleDocsClient;

  beforeEach(() => {
    getAccessToken = vi.fn<() => Promise<string>>().mockResolvedValue('access-1');
    markExpired = vi.fn<() => void>();
    auth = { getAccessToken, markExpired };
    client = new GoogleDocsClient({ auth, retry: { baseDelayMs: 0 } });
    vi.mocked(ofetch).mockReset();
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getDocument', () => {
    it('requests the document with the access token', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce(DOCUMENT);

      const document = await client.getDocument('doc-1');

      expect(ofetch).toHaveBeenCalledWith('https://docs.googleapis.com/v1/documents/doc-1', {
        headers: { Authorization: 'Bearer access-1' },
        retry: 0,
      });
      expect(document.title).toBe('Notes');
    });

    it('uses a custom base URL', async () => {
      client = new GoogleDocsClient({ auth, baseUrl: 'http://127.0.0.1:9000/v1' });
      vi.mocked(ofetch).mockResolvedValueOnce(DOCUMENT);

      await client.getDocument('doc-1');

      expect(vi.mocked(ofetch).mock.calls[0][0]).toBe('http://127.0.0.1:9000/v1/documents/doc-1');
    });

    it('maps 403 to PermissionDeniedError', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(httpError(403));
      await expect(client.getDocument('doc-1')).rejects.toBeInstanceOf(PermissionDeniedError);
      expect(ofetch).toHaveBeenCalledTimes(1);
    });

    it('maps 404 to DocumentNotFoundError', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(httpError(404));
      await expect(client.getDocument('doc-1')).rejects.toThrow(new DocumentNotFoundError('doc-1'));
    });

    it('refreshes the session once after a 401', async () => {
      getAccessToken.mockResolvedValueOnce('stale').mockResolvedValueOnce('fresh');
      vi.mocked(ofetch).mockRejectedValueOnce(httpError(401)).mockResolvedValueOnce(DOCUMENT);

      await expect(client.getDocument('doc-1')).resolves.toMatchObject({ documentId: 'doc-1' });
      expect(markExpired).toHaveBeenCalledTimes(1);
      expect(vi.mocked(ofetch).mock.calls[1][1]).toEqual({
        headers: { Authorization: 'Bearer fresh' },
        retry: 0,
      });
    });

    it('gives up after a second 401', async () => {
      vi.mocked(ofetch).mockRejectedValue(httpError(401));

      await expect(client.getDocument('doc-1')).rejects.toThrow(
        new AuthRequiredError('Google rejected the session token')
      );
      expect(ofetch).toHaveBeenCalledTimes(2);
    });

    it('retries transient failures', async () => {
      vi.mocked(ofetch).mockRejectedValueOnce(httpError(503)).mockResolvedValueOnce(DOCUMENT);

      await expect(client.getDocument('doc-1')).resolves.toMatchObject({ documentId: 'doc-1' });
      expect(ofetch).toHaveBeenCalledTimes(2);
    });

    it('reports exhausted retries', async () => {
      client = new GoogleDocsClient({ auth, retry: { maxRetries: 1, baseDelayMs: 0 } });
      vi.mocked(ofetch).mockRejectedValue(httpError(500));

      const result = client.getDocument('doc-1');
      await expect(result).rejects.toBeInstanceOf(DocsApiError);
      await expect(result).rejects.toMatchObject({
        message: 'Docs API request for document doc-1 failed after 2 attempts',
        status: 500,
      });
    });

    it('propagates auth errors without a request', async () => {
      getAccessToken.mockRejectedValueOnce(new AuthRequiredError());
      await expect(client.getDocument('doc-1')).rejects.toBeInstanceOf(AuthRequiredError);
      expect(ofetch).not.toHaveBeenCalled();
    });

    it('rejects an unexpected response', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({ kind: 'unexpected' });
      await expect(client.getDocument('doc-1')).rejects.toThrow(
        'Docs API returned an unexpected response for document doc-1'
      );
    });
  });

  describe('getDocumentText', () => {
    it('resolves the URL and returns the text', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce(DOCUMENT);

      const text = await client.getDocumentText('https://docs.google.com/document/d/doc-1/edit');

      expect(text).toBe('Hello\n\n\nWorld\n');
      expect(vi.mocked(ofetch).mock.calls[0][0]).toBe('https://docs.googleapis.com/v1/documents/doc-1');
    });

    it('throws EmptyDocumentError for a document without text', async () => {
      vi.mocked(ofetch).mockResolvedValueOnce({
        documentId: 'doc-1',
        body: { content: [{ paragraph: { elements: [{ textRun: { content: '\n' } }] } }] },
      });

      await expect(client.getDocumentText('doc-1')).rejects.toThrow(
        new EmptyDocumentError('doc-1')
      );
    });

    it('rejects an invalid reference before any request', async () => {
      await expect(client.getDocumentText('not a doc!')).rejects.toBeInstanceOf(
        InvalidDocumentReferenceError
      );
      expect(getAccessToken).not.toHaveBeenCalled();
    });
  });

  it('getDocumentInfo summarises the document', async () => {
    vi.mocked(ofetch).mockResolvedValueOnce(DOCUMENT);

    await expect(client.getDocumentInfo('https://docs.google.com/open?id=doc-1')).resolves.toEqual({
      documentId: 'doc-1',
      title: 'Notes',
      url: 'https://docs.google.com/document/d/doc-1/edit',
      revisionId: 'rev-1',
      characters: 14,
      words: 2,
      paragraphs: 2,
    });
  });
});
