import { describe, it, expect, afterEach } from 'vitest';
import { startLoopbackListener } from '../../src/services/loopback.js';
import type { LoopbackListener } from '../../src/services/loopback.js';
import { AuthorizationError } from '../../src/lib/errors.js';

describe('startLoopbackListener', () => {
  let listener: LoopbackListener | undefined;

  afterEach(() => {
    listener?.close();
    listener = undefined;
  });

  it('binds a free port on 127.0.0.1', async () => {
    listener = await startLoopbackListener({ expectedState: 'state-1' });
    expect(listener.port).toBeGreaterThan(0);
    expect(listener.redirectUri).toBe(`http://127.0.0.1:${listener.port}/`);
  });

  it('resolves with the authorization code', async () => {
    listener = await startLoopbackListener({ expectedState: 'state-1' });
    const code = listener.waitForCode();

    const response = await fetch(`${listener.redirectUri}?code=auth-code&state=state-1`);

    expect(response.status).toBe(200);
    expect(await response.text()).toContain('<h2>Authenticated with Google Docs</h2>');
    await expect(code).resolves.toBe('auth-code');
  });

  it('delivers a code that arrived before waitForCode was called', async () => {
    listener = await startLoopbackListener({ expectedState: 'state-1' });
    await fetch(`${listener.redirectUri}?code=early-code&state=state-1`);

    await expect(listener.waitForCode()).resolves.toBe('early-code');
  });

  it('rejects a response for another login attempt', async () => {
    listener = await startLoopbackListener({ expectedState: 'state-1' });
    const rejected = expect(listener.waitForCode()).rejects.toThrow(
      new AuthorizationError('OAuth state mismatch')
    );

    const response = await fetch(`${listener.redirectUri}?code=auth-code&state=other`);

    expect(response.status).toBe(400);
    await rejected;
  });

  it('rejects when the user denies access', async () => {
    listener = await startLoopbackListener({ expectedState: 'state-1' });
    const rejected = expect(listener.waitForCode()).rejects.toThrow(
      'Authorization was not granted: access_denied'
    );

    const response = await fetch(`${listener.redirectUri}?error=access_denied&state=state-1`);

    expect(response.status).toBe(400);
    await rejected;
  });

  it('keeps waiting after unrelated requests', async () => {
    listener = await startLoopbackListener({ expectedState: 'state-1', path: '/callback' });
    const code = listener.waitForCode();

    const favicon = await fetch(`http://127.0.0.1:${listener.port}/favicon.ico`);
    const missingCode = await fetch(`${listener.redirectUri}?state=state-1`);
    await fetch(`${listener.redirectUri}?code=auth-code&state=state-1`);

    expect(favicon.status).toBe(404);
    expect(missingCode.status).toBe(400);
    await expect(code).resolves.toBe('auth-code');
  });

  it('keeps waiting after a request with no query', async () => {
    listener = await startLoopbackListener({ expectedState: 'state-1' });
    const code = listener.waitForCode();

    const bare = await fetch(listener.redirectUri);
    const redirect = await fetch(`${listener.redirectUri}?code=auth-code&state=state-1`);

    expect(bare.status).toBe(400);
    expect(redirect.status).toBe(200);
    await expect(code).resolves.toBe('auth-code');
  });

  it('escapes the provider error in the page', async () => {
    listener = await startLoopbackListener({ expectedState: 'state-1' });
    const rejected = expect(listener.waitForCode()).rejects.toBeInstanceOf(AuthorizationError);

    const response = await fetch(`${listener.redirectUri}?error=${encodeURIComponent('<b>x</b>')}`);

    expect(await response.text()).toContain('Google returned: &lt;b&gt;x&lt;/b&gt;');
    await rejected;
  });

  it('times out', async () => {
    listener = await startLoopbackListener({ expectedState: 'state-1', timeoutMs: 20 });
    await expect(listener.waitForCode()).rejects.toThrow('Timed out after 0s waiting for authorization');
  });

  it('rejects when closed', async () => {
    listener = await startLoopbackListener({ expectedState: 'state-1' });
    const code = listener.waitForCode();
    listener.close();
    await expect(code).rejects.toThrow('Login cancelled');
  });
});
