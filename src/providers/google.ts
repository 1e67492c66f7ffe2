import type {
  CalendarProvider,
  ProviderEvent,
  ProviderListQuery,
  ProviderSession,
} from './provider.js';
import { z } from 'zod';
import { HttpError, requestJson, type FetchLike, type JsonRequestOptions } from '../http.js';
import { AuthenticationRequiredError } from '../errors.js';

export interface GoogleCalendarProviderOptions {
  /** OAuth client id */
  clientId: string;
  /** OAuth client secret */
  clientSecret: string;
  /** OAuth refresh token (from `taskcal auth`) */
  refreshToken?: string;
  /** Per-request timeout in ms */
  timeoutMs?: number;
  /** Optional requests-per-second cap */
  rps?: number;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
  refresh_token: z.string().optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
});

export type GoogleTokenResponse = z.infer<typeof TokenResponseSchema>;

interface GoogleListEventsResponse {
  items?: ProviderEvent[];
  nextPageToken?: string;
}

export const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';
export const GOOGLE_CALENDAR_BASE = 'https://www.googleapis.com/calendar/v3';

/**
 * POST a form to the token endpoint. Non-2xx is an {@link HttpError}; a reply
 * without an access token and lifetime is rejected rather than trusted.
 */
export async function requestGoogleToken(
  form: Record<string, string>,
  opts: { fetcher?: FetchLike; timeoutMs?: number } = {},
): Promise<GoogleTokenResponse> {
  const fetcher = opts.fetcher ?? fetch;
  const res = await fetcher(GOOGLE_TOKEN_URL, {
    method: 'POST',
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams(form),
    signal: AbortSignal.timeout(opts.timeoutMs ?? 10_000),
  });

  const text = await res.text().catch(() => '');
  if (!res.ok) {
    throw new HttpError(`HTTP ${res.status} for ${GOOGLE_TOKEN_URL}`, res.status, GOOGLE_TOKEN_URL, text);
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    body = undefined;
  }
  const parsed = TokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join('.') || '(body)');
    throw new Error(`Malformed Google token response: ${fields.join(', ')}`);
  }
  return parsed.data;
}

export class GoogleCalendarProvider implements CalendarProvider {
  readonly name = 'google' as const;

  private fetcher: FetchLike;
  private accessToken?: string;

  constructor(private opts: GoogleCalendarProviderOptions) {
    this.fetcher = opts.fetcher ?? fetch;
  }

  async authenticate(): Promise<ProviderSession> {
    if (!this.opts.refreshToken) {
      throw new AuthenticationRequiredError('google', 'no refresh token configured');
    }

    let token: GoogleTokenResponse;
    try {
      token = await requestGoogleToken(
        {
          client_id: this.opts.clientId,
          client_secret: this.opts.clientSecret,
          refresh_token: this.opts.refreshToken,
          grant_type: 'refresh_token',
        },
        { fetcher: this.fetcher, timeoutMs: this.opts.timeoutMs },
      );
    } catch (e) {
      // invalid_grant / revoked consent: only a new consent flow helps
      if (e instanceof HttpError && (e.status === 400 || e.status === 401)) {
        throw new AuthenticationRequiredError('google', 'refresh token rejected', { cause: e });
      }
      throw e;
    }

    this.accessToken = token.access_token;
    return { expiresAt: Date.now() + token.expires_in * 1000 };
  }

  private async api<T>(path: string, init: JsonRequestOptions = {}): Promise<T | undefined> {
    if (!this.accessToken) {
      throw new AuthenticationRequiredError('google', 'not authenticated');
    }
    return requestJson<T>(
      `${GOOGLE_CALENDAR_BASE}${path}`,
      {
        timeoutMs: this.opts.timeoutMs,
        rps: this.opts.rps,
        ...init,
        headers: { authorization: `Bearer ${this.accessToken}`, ...(init.headers ?? {}) },
      },
      this.fetcher,
    );
  }

  private async event(path: string, init?: JsonRequestOptions): Promise<ProviderEvent> {
    return (await this.api<ProviderEvent>(path, init)) ?? {};
  }

  private eventsPath(calendarId: string, eventId?: string) {
    const base = `/calendars/${encodeURIComponent(calendarId)}/events`;
    return eventId === undefined ? base : `${base}/${encodeURIComponent(eventId)}`;
  }

  async listEvents(calendarId: string, query: ProviderListQuery): Promise<ProviderEvent[]> {
    const out: ProviderEvent[] = [];
    let pageToken: string | undefined;

    do {
      const res = await this.api<GoogleListEventsResponse>(this.eventsPath(calendarId), {
        query: {
          timeMin: query.timeMin,
          timeMax: query.timeMax,
          maxResults: Math.min(query.maxResults - out.length, 2500),
          singleEvents: query.singleEvents,
          orderBy: query.orderBy,
          pageToken,
        },
      });

      out.push(...(res?.items ?? []));
      pageToken = res?.nextPageToken;
    } while (pageToken && out.length < query.maxResults);

    return out.slice(0, query.maxResults);
  }

  async getEvent(calendarId: string, eventId: string): Promise<ProviderEvent> {
    return this.event(this.eventsPath(calendarId, eventId));
  }

  async insertEvent(calendarId: string, event: ProviderEvent): Promise<ProviderEvent> {
    return this.event(this.eventsPath(calendarId), {
      method: 'POST',
      query: { sendUpdates: 'all' },
      body: event,
    });
  }

  async updateEvent(calendarId: string, eventId: string, event: ProviderEvent): Promise<ProviderEvent> {
    return this.event(this.eventsPath(calendarId, eventId), {
      method: 'PUT',
      query: { sendUpdates: 'all' },
      body: event,
    });
  }

  async deleteEvent(calendarId: string, eventId: string): Promise<void> {
    await this.api<void>(this.eventsPath(calendarId, eventId), {
      method: 'DELETE',
      query: { sendUpdates: 'all' },
    });
  }
}
