/**
 * Document Reference
 * Resolves the document parameter (full URL, short URL or bare ID) to a Google Docs document ID
 */

import { InvalidDocumentReferenceError } from './errors.js';
import type { DocumentReference, DocumentReferenceKind } from '../types/docs.js';

const DOCS_HOST = 'docs.google.com';

// /document/d/<id>, /document/u/0/d/<id>, followed by /edit, /view, ... or nothing
const PATH_PATTERN = /\/document\/(?:u\/\d+\/)?d\/([A-Za-z0-9_-]+)/;
// open?id=<id>, ...&id=<id>
const QUERY_PATTERN = /[?&]id=([A-Za-z0-9_-]+)/;
const BARE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Extract the document ID, or null when the input names no document
 */
export function extractDocumentId(input: string): string | null {
  return matchReference(input.trim())?.documentId ?? null;
}

/**
 * Whether the input is an http(s) URL on docs.google.com
 */
export function isGoogleDocsUrl(input: string): boolean {
  const trimmed = input.trim();
  if (!/^https?:\/\//i.test(trimmed)) {
    return false;
  }
  try {
    return new URL(trimmed).hostname.toLowerCase() === DOCS_HOST;
  } catch {
    return false;
  }
}

/**
 * Resolve a document reference
 * @throws InvalidDocumentReferenceError
 */
export function parseDocumentReference(input: string): DocumentReference {
  const trimmed = input.trim();
  const match = matchReference(trimmed);
  if (!match) {
    throw new InvalidDocumentReferenceError(input);
  }
  return { input: trimmed, ...match };
}

/**
 * Canonical edit URL for a document ID
 */
export function documentUrl(documentId: string): string {
  return `https://${DOCS_HOST}/document/d/${documentId}/edit`;
}

function matchReference(
  input: string
): { documentId: string; kind: DocumentReferenceKind } | null {
  if (input.length === 0) {
    return null;
  }

  const pathMatch = PATH_PATTERN.exec(input);
  if (pathMatch) {
    return { documentId: pathMatch[1], kind: 'url' };
  }

  const queryMatch = QUERY_PATTERN.exec(input);
  if (queryMatch) {
    return { documentId: queryMatch[1], kind: 'short-url' };
  }

  if (BARE_ID_PATTERN.test(input)) {
    return { documentId: input, kind: 'id' };
  }

  return null;
}
