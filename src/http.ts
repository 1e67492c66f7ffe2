export type FetchLike = typeof fetch;

export interface JsonRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  /** Abort the request after this many ms (default: 10000). */
  timeoutMs?: number;
  /** Optional request-per-second cap for this call (best-effort). */
  rps?: number;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string,
    public readonly responseText?: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class HttpTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'HttpTimeoutError';
  }
}

export const DEFAULT_TIMEOUT_MS = 10_000;

function withQuery(url: string, query?: JsonRequestOptions['query']) {
  if (!query) return url;
  const u = new URL(url);
  for (const [k, v] of Object.entries(query)) {
    if (v === undefined) continue;
    u.searchParams.set(k, String(v));
  }
  return u.toString();
}

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

// Simple global limiter keyed by origin.
const lastRequestAt = new Map<string, number>();

function originOf(url: string) {
  try {
    return new URL(url).origin;
  } catch {
    return 'unknown';
  }
}

async function throttle(url: string, rps?: number) {
  if (!rps || rps <= 0) return;
  const minGap = 1000 / rps;
  const key = originOf(url);
  const last = lastRequestAt.get(key) ?? 0;
  const now = Date.now();
  const wait = last + minGap - now;
  if (wait > 0) await sleep(wait);
  lastRequestAt.set(key, Date.now());
}

function isAbort(e: unknown) {
  const name = typeof e === 'object' && e !== null && 'name' in e ? e.name : undefined;
  return name === 'TimeoutError' || name === 'AbortError';
}

/**
 * Single JSON round trip. Non-2xx responses throw {@link HttpError}; a request
 * exceeding `timeoutMs` throws {@link HttpTimeoutError}. No retries: callers
 * own retry policy.
 */
export async function requestJson<T>(
  url: string,
  opts: JsonRequestOptions = {},
  fetcher: FetchLike = fetch,
): Promise<T | undefined> {
  const finalUrl = withQuery(url, opts.query);
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  await throttle(finalUrl, opts.rps);

  let res: Response;
  try {
    res = await fetcher(finalUrl, {
      method: opts.method ?? 'GET',
      headers: {
        accept: 'application/json',
        ...(opts.body !== undefined ? { 'content-type': 'application/json' } : {}),
        ...(opts.headers ?? {}),
      },
      body: opts.body !== undefined ? JSON.stringify(opts.body) : undefined,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (e) {
    if (isAbort(e)) throw new HttpTimeoutError(finalUrl, timeoutMs);
    throw e;
  }

  if (!res.ok) {
    const txt = await res.text().catch(() => undefined);
    throw new HttpError(`HTTP ${res.status} for ${finalUrl}`, res.status, finalUrl, txt);
  }

  // empty body
  if (res.status === 204) return undefined;

  const text = await res.text();
  if (!text) return undefined;
  return JSON.parse(text) as T;
}
