/**
 * Output Module
 * JSON to stdout by default, readable text with --format text, errors to stderr
 */

import Table from 'cli-table3';
import { exitCodeFor, GdocsError } from '../lib/errors.js';
import type { ExitCode } from '../lib/errors.js';

export type OutputFormat = 'json' | 'text';

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'text';
}

export function formatJSON<T>(data: T, pretty: boolean = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Two-column table of label/value pairs; undefined values are left out
 */
export function formatKeyValues(rows: Array<[string, string | number | boolean | undefined]>): string {
  const table = new Table({
    style: { head: [], border: [] },
  });
  for (const [label, value] of rows) {
    if (value !== undefined) {
      table.push({ [label]: String(value) });
    }
  }
  return table.toString();
}

/**
 * Status table for checks (doctor)
 */
export function formatChecks(
  rows: Array<{ name: string; status: string; details: string }>
): string {
  const table = new Table({
    head: ['', 'Check', 'Details'],
    style: { head: ['cyan'] },
    wordWrap: true,
    colWidths: [4, 16, 70],
  });
  for (const row of rows) {
    table.push([statusEmoji(row.status), row.name, row.details]);
  }
  return table.toString();
}

export function statusEmoji(status: string): string {
  switch (status) {
    case 'ok':
    case 'authenticated':
    case 'expired-refreshable':
      return '✅';
    case 'warning':
      return '⚠️';
    case 'error':
    case 'not-authenticated':
    case 'missing-credentials':
      return '❌';
    case 'skipped':
      return '➖';
    default:
      return '❓';
  }
}

/**
 * Error line plus the remediation hint, for stderr
 */
export function formatError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const lines = [`❌ ${message}`];
  if (error instanceof GdocsError && error.hint) {
    lines.push(`   ${error.hint}`);
  }
  return lines.join('\n');
}

/**
 * Print the error and exit with its exit code
 */
export function fail(error: unknown): never {
  console.error(formatError(error));
  const code: ExitCode = exitCodeFor(error);
  process.exit(code);
}
