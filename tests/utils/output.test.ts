import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  fail,
  formatChecks,
  formatError,
  formatJSON,
  formatKeyValues,
  isOutputFormat,
  statusEmoji,
} from '../../src/utils/output.js';
import { AuthRequiredError, ConfigValueError, PermissionDeniedError } from '../../src/lib/errors.js';

describe('output', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('formats JSON pretty by default', () => {
    expect(formatJSON({ documentId: 'abc' })).toBe('{\n  "documentId": "abc"\n}');
    expect(formatJSON({ documentId: 'abc' }, false)).toBe('{"documentId":"abc"}');
  });

  it('recognises output formats', () => {
    expect(isOutputFormat('json')).toBe(true);
    expect(isOutputFormat('text')).toBe(true);
    expect(isOutputFormat('yaml')).toBe(false);
    expect(isOutputFormat(undefined)).toBe(false);
  });

  it('maps statuses to emoji', () => {
    expect(statusEmoji('ok')).toBe('✅');
    expect(statusEmoji('expired-refreshable')).toBe('✅');
    expect(statusEmoji('warning')).toBe('⚠️');
    expect(statusEmoji('missing-credentials')).toBe('❌');
    expect(statusEmoji('skipped')).toBe('➖');
    expect(statusEmoji('other')).toBe('❓');
  });

  it('adds the hint below the error message', () => {
    const error = new PermissionDeniedError('doc-1');
    expect(formatError(error)).toBe(`❌ Permission denied for document doc-1\n   ${error.hint}`);
    expect(formatError(new ConfigValueError('bad value'))).toBe('❌ bad value');
    expect(formatError('plain')).toBe('❌ plain');
  });

  it('leaves undefined values out of key/value tables', () => {
    const table = formatKeyValues([
      ['Title', 'Notes'],
      ['Revision', undefined],
      ['Words', 2],
    ]);
    expect(table).toContain('Notes');
    expect(table).toContain('Words');
    expect(table).not.toContain('Revision');
  });

  it('renders one row per check', () => {
    const table = formatChecks([
      { name: 'credentials', status: 'ok', details: 'Found web client' },
      { name: 'gitignore', status: 'error', details: '.gitignore does not exclude token.json' },
    ]);
    expect(table).toContain('credentials');
    expect(table).toContain('.gitignore does not exclude token.json');
  });

  it('fail prints the error and exits with its code', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    const error = new AuthRequiredError();

    expect(() => fail(error)).toThrow('exit 3');
    expect(stderr).toHaveBeenCalledWith(formatError(error));
    expect(exit).toHaveBeenCalledWith(3);
  });
});
