/**
 * Error types
 * Every failure the CLI reports carries a stable code, an exit code and a hint for the operator
 */

export const EXIT_CODES = {
  OK: 0,
  GENERAL: 1,
  API: 2,
  SETUP: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export class GdocsError extends Error {
  public readonly code: string;
  public readonly exitCode: ExitCode;
  public readonly hint?: string;

  constructor(message: string, code: string, exitCode: ExitCode, hint?: string) {
    super(message);
    this.name = 'GdocsError';
    this.code = code;
    this.exitCode = exitCode;
    this.hint = hint;
  }
}

export class CredentialsNotFoundError extends GdocsError {
  public readonly path: string;

  constructor(path: string) {
    super(
      `Credentials file '${path}' not found`,
      'CREDENTIALS_NOT_FOUND',
      EXIT_CODES.SETUP,
      'Download the OAuth client JSON from Google Cloud Console (APIs & Services > Credentials) ' +
        'and save it as credentials.json, or point GDOCS_CREDENTIALS_PATH at it'
    );
    this.name = 'CredentialsNotFoundError';
    this.path = path;
  }
}

export class InvalidCredentialsError extends GdocsError {
  constructor(path: string, reason: string) {
    super(
      `Credentials file '${path}' is not a valid OAuth client file: ${reason}`,
      'INVALID_CREDENTIALS',
      EXIT_CODES.SETUP,
      'Re-download the client JSON; it must contain an "installed" or "web" client'
    );
    this.name = 'InvalidCredentialsError';
  }
}

export class InvalidTokenFileError extends GdocsError {
  constructor(path: string, reason: string) {
    super(
      `Token file '${path}' could not be read: ${reason}`,
      'INVALID_TOKEN_FILE',
      EXIT_CODES.SETUP,
      'Delete the token file and authorize again with `gdocs auth login`'
    );
    this.name = 'InvalidTokenFileError';
  }
}

export class AuthRequiredError extends GdocsError {
  constructor(message = 'Google Docs authentication required') {
    super(
      message,
      'AUTH_REQUIRED',
      EXIT_CODES.SETUP,
      'Run `gdocs auth login` (desktop client) or open the URL from `gdocs auth url` (web client)'
    );
    this.name = 'AuthRequiredError';
  }
}

export class AuthorizationError extends GdocsError {
  constructor(message: string) {
    super(message, 'AUTHORIZATION_FAILED', EXIT_CODES.SETUP);
    this.name = 'AuthorizationError';
  }
}

export class TokenExchangeError extends GdocsError {
  public readonly error?: string;
  public readonly errorDescription?: string;

  constructor(message: string, error?: string, errorDescription?: string) {
    super(
      message,
      'TOKEN_EXCHANGE_FAILED',
      EXIT_CODES.API,
      error === 'redirect_uri_mismatch'
        ? 'Add the redirect URI to the OAuth client in Google Cloud Console, exactly as configured'
        : error === 'invalid_grant'
          ? 'The authorization code or refresh token is no longer valid; authorize again'
          : undefined
    );
    this.name = 'TokenExchangeError';
    this.error = error;
    this.errorDescription = errorDescription;
  }
}

export class InvalidDocumentReferenceError extends GdocsError {
  constructor(input: string) {
    super(
      `Could not extract document ID from: ${input}`,
      'INVALID_DOCUMENT_REFERENCE',
      EXIT_CODES.GENERAL,
      'Pass a Google Docs URL (https://docs.google.com/document/d/<id>/edit), a short URL with ?id=<id>, or the bare ID'
    );
    this.name = 'InvalidDocumentReferenceError';
  }
}

export class PermissionDeniedError extends GdocsError {
  public readonly documentId: string;

  constructor(documentId: string) {
    super(
      `Permission denied for document ${documentId}`,
      'PERMISSION_DENIED',
      EXIT_CODES.API,
      'Share the document with the authorized Google account, or run `gdocs auth logout` and authorize with an account that can open it'
    );
    this.name = 'PermissionDeniedError';
    this.documentId = documentId;
  }
}

export class DocumentNotFoundError extends GdocsError {
  public readonly documentId: string;

  constructor(documentId: string) {
    super(
      `Document ${documentId} not found`,
      'DOCUMENT_NOT_FOUND',
      EXIT_CODES.API,
      'Check the document URL; the ID is the segment after /document/d/'
    );
    this.name = 'DocumentNotFoundError';
    this.documentId = documentId;
  }
}

export class EmptyDocumentError extends GdocsError {
  constructor(documentId: string) {
    super(
      `No text content found in document ${documentId}`,
      'EMPTY_DOCUMENT',
      EXIT_CODES.API,
      'Make sure the document body has text; images and drawings are not extracted'
    );
    this.name = 'EmptyDocumentError';
  }
}

export class DocsApiError extends GdocsError {
  public readonly status?: number;

  constructor(message: string, status?: number) {
    super(message, 'DOCS_API_ERROR', EXIT_CODES.API);
    this.name = 'DocsApiError';
    this.status = status;
  }
}

export class ConfigValueError extends GdocsError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG_VALUE', EXIT_CODES.GENERAL);
    this.name = 'ConfigValueError';
  }
}

/**
 * Exit code for any thrown value
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof GdocsError) {
    return error.exitCode;
  }
  return EXIT_CODES.GENERAL;
}
