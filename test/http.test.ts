import { describe, expect, it } from 'vitest';
import { HttpError, HttpTimeoutError, requestJson } from '../src/http.js';

describe('requestJson', () => {
  it('encodes the query, sends JSON and parses the reply', async () => {
    let seen: { url: string; init?: RequestInit } | undefined;
    const fetcher: typeof fetch = async (url, init) => {
      seen = { url: String(url), init };
      return new Response(JSON.stringify({ ok: 1 }), { status: 200 });
    };

    const res = await requestJson<{ ok: number }>(
      'https://api.test/items',
      { method: 'POST', query: { a: 'x y', n: 3, skip: undefined }, body: { title: 'hi' } },
      fetcher,
    );

    expect(res).toEqual({ ok: 1 });
    expect(seen?.url).toBe('https://api.test/items?a=x+y&n=3');
    expect(seen?.init?.method).toBe('POST');
    expect(seen?.init?.body).toBe('{"title":"hi"}');
    expect(new Headers(seen?.init?.headers).get('content-type')).toBe('application/json');
  });

  it('returns undefined for 204 and empty bodies', async () => {
    const noContent: typeof fetch = async () => new Response(null, { status: 204 });
    const empty: typeof fetch = async () => new Response('', { status: 200 });

    expect(await requestJson('https://api.test/x', {}, noContent)).toBeUndefined();
    expect(await requestJson('https://api.test/x', {}, empty)).toBeUndefined();
  });

  it('throws HttpError on the first non-2xx, without retrying', async () => {
    let calls = 0;
    const fetcher: typeof fetch = async () => {
      calls++;
      return new Response('busy', { status: 503 });
    };

    const err = await requestJson('https://api.test/x', {}, fetcher).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    if (!(err instanceof HttpError)) return;
    expect(err.status).toBe(503);
    expect(err.responseText).toBe('busy');
    expect(err.message).toBe('HTTP 503 for https://api.test/x');
    expect(calls).toBe(1);
  });

  it('turns an elapsed deadline into HttpTimeoutError', async () => {
    const hang: typeof fetch = (_url, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
      });

    const err = await requestJson('https://api.test/slow', { timeoutMs: 20 }, hang).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpTimeoutError);
    expect(err instanceof Error ? err.message : '').toBe('Request to https://api.test/slow timed out after 20ms');
  });
});
