/**
 * Google Docs Client
 * Fetches documents from the Docs v1 REST API and turns them into plain text
 */

import { ofetch } from 'ofetch';
import { z } from 'zod';
import {
  AuthRequiredError,
  DocsApiError,
  DocumentNotFoundError,
  EmptyDocumentError,
  GdocsError,
  PermissionDeniedError,
} from '../lib/errors.js';
import { loggers } from '../lib/logger.js';
import { documentUrl, parseDocumentReference } from '../lib/document-ref.js';
import { collectParagraphs, countWords, extractDocumentText } from '../lib/document-text.js';
import { retry, RetryError, statusOf } from './retry.js';
import type { RetryPolicy } from './retry.js';
import type { DocumentInfo, GoogleDocument, StructuralElement } from '../types/docs.js';

export const DOCS_API_BASE = 'https://docs.googleapis.com/v1';

/**
 * What the client needs from the auth layer
 */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
  markExpired(): void;
}

export interface GoogleDocsClientOptions {
  auth: AccessTokenProvider;
  baseUrl?: string;
  retry?: Partial<RetryPolicy>;
}

const paragraphSchema = z.object({
  elements: z
    .array(
      z.object({
        startIndex: z.number().optional(),
        endIndex: z.number().optional(),
        textRun: z.object({ content: z.string().optional() }).optional(),
      })
    )
    .optional(),
});

const structuralElementSchema: z.ZodType<StructuralElement> = z.lazy(() =>
  z.object({
    startIndex: z.number().optional(),
    endIndex: z.number().optional(),
    paragraph: paragraphSchema.optional(),
    table: z
      .object({
        rows: z.number().optional(),
        columns: z.number().optional(),
        tableRows: z
          .array(
            z.object({
              tableCells: z
                .array(z.object({ content: z.array(structuralElementSchema).optional() }))
                .optional(),
            })
          )
          .optional(),
      })
      .optional(),
    tableOfContents: z.object({ content: z.array(structuralElementSchema).optional() }).optional(),
    sectionBreak: z.record(z.unknown()).optional(),
  })
);

const documentSchema = z.object({
  documentId: z.string(),
  title: z.string().optional(),
  revisionId: z.string().optional(),
  body: z.object({ content: z.array(structuralElementSchema).optional() }).optional(),
});

export class GoogleDocsClient {
  private auth: AccessTokenProvider;
  private baseUrl: string;
  private retryPolicy: Partial<RetryPolicy>;

  constructor(options: GoogleDocsClientOptions) {
    this.auth = options.auth;
    this.baseUrl = options.baseUrl ?? DOCS_API_BASE;
    this.retryPolicy = options.retry ?? {};
  }

  /**
   * documents.get
   * @throws AuthRequiredError, PermissionDeniedError, DocumentNotFoundError, DocsApiError
   */
  async getDocument(documentId: string): Promise<GoogleDocument> {
    return loggers.docs.trackAsync('Fetch document', () => this.fetchDocument(documentId, true), {
      documentId,
    });
  }

  /**
   * Plain text of the document a URL, short URL or bare ID points at
   * @throws EmptyDocumentError when the document has no text
   */
  async getDocumentText(reference: string): Promise<string> {
    const { documentId } = parseDocumentReference(reference);
    const document = await this.getDocument(documentId);
    const text = extractDocumentText(document);
    if (text.trim().length === 0) {
      throw new EmptyDocumentError(documentId);
    }
    return text;
  }

  async getDocumentInfo(reference: string): Promise<DocumentInfo> {
    const { documentId } = parseDocumentReference(reference);
    const document = await this.getDocument(documentId);
    const paragraphs = collectParagraphs(document);
    const text = paragraphs.join('\n\n');

    return {
      documentId: document.documentId,
      title: document.title ?? '',
      url: documentUrl(document.documentId),
      revisionId: document.revisionId,
      characters: text.length,
      words: countWords(text),
      paragraphs: paragraphs.length,
    };
  }

  private async fetchDocument(documentId: string, allowReauth: boolean): Promise<GoogleDocument> {
    const accessToken = await this.auth.getAccessToken();
    const url = `${this.baseUrl}/documents/${encodeURIComponent(documentId)}`;

    let raw: unknown;
    try {
      raw = await retry(
        () =>
          ofetch<unknown>(url, {
            headers: { Authorization: `Bearer ${accessToken}` },
            // backoff lives in retry() alone
            retry: 0,
          }),
        {
          ...this.retryPolicy,
          onRetry: (error, attempt, delayMs) => {
            loggers.retry.warn('Retrying Docs API request', {
              documentId,
              attempt,
              delayMs,
              statusCode: statusOf(error),
            });
          },
        }
      );
    } catch (error) {
      if (statusOf(error) === 401 && allowReauth) {
        // Revoked or clock-skewed token: refresh once, then give up
        this.auth.markExpired();
        return this.fetchDocument(documentId, false);
      }
      throw toDocsError(error, documentId);
    }

    const parsed = documentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DocsApiError(`Docs API returned an unexpected response for document ${documentId}`);
    }
    return parsed.data;
  }
}

function toDocsError(error: unknown, documentId: string): GdocsError {
  if (error instanceof GdocsError) {
    return error;
  }
  if (error instanceof RetryError) {
    return new DocsApiError(
      `Docs API request for document ${documentId} failed after ${error.attempts} attempts`,
      statusOf(error.originalError)
    );
  }

  const status = statusOf(error);
  switch (status) {
    case 401:
      return new AuthRequiredError('Google rejected the session token');
    case 403:
      return new PermissionDeniedError(documentId);
    case 404:
      return new DocumentNotFoundError(documentId);
    default: {
      const reason = error instanceof Error ? error.message : String(error);
      return new DocsApiError(
        status !== undefined
          ? `Docs API request failed with status ${status}`
          : `Docs API request failed: ${reason}`,
        status
      );
    }
  }
}
