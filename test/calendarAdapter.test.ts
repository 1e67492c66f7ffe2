import { describe, expect, it } from 'vitest';
import { CalendarAdapter } from '../src/calendar/adapter.js';
import { GoogleCalendarProvider } from '../src/providers/google.js';
import { MockCalendarProvider } from '../src/providers/mock.js';
import {
  AuthenticationRequiredError,
  ProviderOperationFailedError,
  ValidationError,
} from '../src/errors.js';
import { HttpError, HttpTimeoutError } from '../src/http.js';
import type { ProviderSession } from '../src/providers/provider.js';
import { FakeProvider, testClock, type FakeProviderOptions } from './fakes.js';

function setup(opts: FakeProviderOptions = {}) {
  const clock = testClock();
  const provider = new FakeProvider({
    authenticate: async () => ({ expiresAt: clock.now().getTime() + 60 * 60 * 1000 }),
    ...opts,
  });
  const adapter = new CalendarAdapter(provider, { now: clock.now });
  return { clock, provider, adapter };
}

async function failure(p: Promise<unknown>): Promise<unknown> {
  return p.then(
    () => {
      throw new Error('expected a rejection');
    },
    (e: unknown) => e,
  );
}

describe('CalendarAdapter authentication', () => {
  it('authenticates once for concurrent first calls', async () => {
    let release: (s: ProviderSession) => void = () => {};
    const gate = new Promise<ProviderSession>((resolve) => {
      release = resolve;
    });
    const { adapter, provider, clock } = setup({ authenticate: () => gate });

    expect(adapter.getAuthState()).toBe('unauthenticated');
    const first = adapter.listEvents();
    const second = adapter.listEvents();
    expect(adapter.getAuthState()).toBe('authenticating');

    release({ expiresAt: clock.now().getTime() + 60 * 60 * 1000 });
    await Promise.all([first, second]);

    expect(provider.authenticateCalls).toBe(1);
    expect(provider.listCalls).toHaveLength(2);
    expect(adapter.getAuthState()).toBe('authenticated');
  });

  it('reuses a valid session and renews one about to expire', async () => {
    const { adapter, provider, clock } = setup({
      authenticate: async () => ({ expiresAt: clock.now().getTime() + 60_000 }),
    });

    await adapter.listEvents();
    clock.advance(20_000);
    await adapter.listEvents();
    expect(provider.authenticateCalls).toBe(1);

    // inside the 30s renewal margin
    clock.advance(11_000);
    await adapter.listEvents();
    expect(provider.authenticateCalls).toBe(2);
  });

  it('surfaces a consent requirement without calling the provider', async () => {
    const { adapter, provider } = setup({
      authenticate: async () => {
        throw new AuthenticationRequiredError('mock', 'no refresh token configured');
      },
    });

    const err = await failure(adapter.listEvents());
    expect(err).toBeInstanceOf(AuthenticationRequiredError);
    expect(provider.listCalls).toHaveLength(0);
    expect(adapter.getAuthState()).toBe('unauthenticated');
  });

  it('wraps other authentication failures', async () => {
    const { adapter } = setup({
      authenticate: async () => {
        throw new Error('socket hang up');
      },
    });

    const err = await failure(adapter.listEvents());
    expect(err).toBeInstanceOf(ProviderOperationFailedError);
    expect(err instanceof Error ? err.message : '').toBe('Calendar authenticate failed: socket hang up');
    expect(adapter.getAuthState()).toBe('unauthenticated');
  });

  it('reports a malformed token reply as a failed authentication', async () => {
    const fetcher: typeof fetch = async () => new Response(JSON.stringify({ access_token: 'atok' }), { status: 200 });
    const adapter = new CalendarAdapter(
      new GoogleCalendarProvider({ clientId: 'cid', clientSecret: 'test-secret', refreshToken: 'rtok', fetcher }),
    );

    const err = await failure(adapter.listEvents());
    expect(err).toBeInstanceOf(ProviderOperationFailedError);
    expect(err instanceof Error ? err.message : '').toBe(
      'Calendar authenticate failed: Malformed Google token response: expires_in',
    );
    expect(adapter.getAuthState()).toBe('unauthenticated');
  });

  it('forgets the session after a 401 and authenticates again next time', async () => {
    const { adapter, provider } = setup({ failWith: new HttpError('HTTP 401 for x', 401, 'x', '') });

    await expect(adapter.listEvents()).rejects.toBeInstanceOf(ProviderOperationFailedError);
    expect(adapter.getAuthState()).toBe('unauthenticated');

    provider.failWith = undefined;
    await adapter.listEvents();
    expect(provider.authenticateCalls).toBe(2);
  });
});

describe('CalendarAdapter.listEvents', () => {
  it('defaults to the next 30 days of the primary calendar', async () => {
    const { adapter, provider } = setup();
    await adapter.listEvents();

    expect(provider.listCalls).toEqual([
      {
        calendarId: 'primary',
        query: {
          timeMin: '2026-03-01T09:00:00.000Z',
          timeMax: '2026-03-31T09:00:00.000Z',
          maxResults: 100,
          singleEvents: true,
          orderBy: 'startTime',
        },
      },
    ]);
  });

  it('measures the window from a given lower bound', async () => {
    const { adapter, provider } = setup();
    await adapter.listEvents({ timeMin: '2026-06-01T00:00:00Z', calendarId: 'work' });

    expect(provider.listCalls[0]?.calendarId).toBe('work');
    expect(provider.listCalls[0]?.query.timeMin).toBe('2026-06-01T00:00:00.000Z');
    expect(provider.listCalls[0]?.query.timeMax).toBe('2026-07-01T00:00:00.000Z');
  });

  it('rejects an unreadable bound before authenticating', async () => {
    const { adapter, provider } = setup();
    await expect(adapter.listEvents({ timeMin: 'someday' })).rejects.toBeInstanceOf(ValidationError);
    expect(provider.authenticateCalls).toBe(0);
  });

  it('normalizes provider records without nulls and keeps all-day dates', async () => {
    const { adapter } = setup({
      events: [
        {
          id: 'e1',
          summary: 'Standup',
          status: 'confirmed',
          start: { dateTime: '2026-03-02T10:00:00Z' },
          end: { dateTime: '2026-03-02T10:15:00Z' },
          organizer: { email: 'lead@example.com' },
          attendees: [{ email: 'a@example.com' }, { displayName: 'Room 4' }, { email: 'b@example.com' }],
        },
        { id: 'e2', start: { date: '2026-03-03' }, end: { date: '2026-03-04' } },
      ],
    });

    expect(await adapter.listEvents()).toEqual([
      {
        id: 'e1',
        summary: 'Standup',
        description: '',
        start: '2026-03-02T10:00:00Z',
        end: '2026-03-02T10:15:00Z',
        location: '',
        status: 'confirmed',
        organizer: 'lead@example.com',
        attendees: ['a@example.com', 'b@example.com'],
      },
      {
        id: 'e2',
        summary: '',
        description: '',
        start: '2026-03-03',
        end: '2026-03-04',
        location: '',
        status: '',
        organizer: '',
        attendees: [],
      },
    ]);
  });

  it('reports provider errors once, with the provider message', async () => {
    const body = JSON.stringify({ error: { code: 403, message: 'Rate Limit Exceeded' } });
    const { adapter, provider } = setup({ failWith: new HttpError('HTTP 403 for x', 403, 'x', body) });

    const err = await failure(adapter.listEvents());
    expect(err).toBeInstanceOf(ProviderOperationFailedError);
    if (!(err instanceof ProviderOperationFailedError)) return;
    expect(err.providerMessage).toBe('HTTP 403: Rate Limit Exceeded');
    expect(err.status).toBe(403);
    expect(err.message).toBe('Calendar list events failed: HTTP 403: Rate Limit Exceeded');
    expect(provider.listCalls).toHaveLength(1);
    expect(adapter.getAuthState()).toBe('authenticated');
  });

  it('reports timeouts as provider failures', async () => {
    const { adapter } = setup({ failWith: new HttpTimeoutError('https://calendar.test/events', 10) });

    const err = await failure(adapter.listEvents());
    expect(err instanceof ProviderOperationFailedError ? err.providerMessage : '').toBe(
      'Request to https://calendar.test/events timed out after 10ms',
    );
  });
});

describe('CalendarAdapter.createEvent', () => {
  it('sends date-times with the configured time zone and defaults status', async () => {
    const provider = new FakeProvider();
    const adapter = new CalendarAdapter(provider, { timeZone: 'Europe/Berlin' });

    const event = await adapter.createEvent({
      summary: 'Review',
      start: '2026-03-02T10:00:00',
      end: '2026-03-02T11:00:00',
      attendees: ['a@example.com'],
    });

    expect(provider.inserted).toEqual([
      {
        calendarId: 'primary',
        event: {
          summary: 'Review',
          start: { dateTime: '2026-03-02T10:00:00', timeZone: 'Europe/Berlin' },
          end: { dateTime: '2026-03-02T11:00:00', timeZone: 'Europe/Berlin' },
          attendees: [{ email: 'a@example.com' }],
        },
      },
    ]);
    expect(event).toEqual({
      id: 'new-1',
      summary: 'Review',
      description: '',
      start: '2026-03-02T10:00:00',
      end: '2026-03-02T11:00:00',
      location: '',
      status: 'confirmed',
      organizer: 'owner@example.com',
      attendees: ['a@example.com'],
    });
  });

  it('sends bare dates as all-day times', async () => {
    const { adapter, provider } = setup();
    await adapter.createEvent({ summary: 'Offsite', start: '2026-03-10', end: '2026-03-11', description: 'Day 1' });

    expect(provider.inserted[0]?.event).toEqual({
      summary: 'Offsite',
      start: { date: '2026-03-10' },
      end: { date: '2026-03-11' },
      description: 'Day 1',
    });
  });

  it('validates input before any provider call', async () => {
    const { adapter, provider } = setup();

    await expect(
      adapter.createEvent({ summary: 'x', start: 'not a date', end: '2026-03-02T11:00:00Z' }),
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      adapter.createEvent({ summary: '  ', start: '2026-03-02T10:00:00Z', end: '2026-03-02T11:00:00Z' }),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(provider.authenticateCalls).toBe(0);
    expect(provider.inserted).toEqual([]);
  });
});

describe('CalendarAdapter update and delete', () => {
  const seeded = () =>
    new MockCalendarProvider({
      events: [
        {
          id: 'ev1',
          summary: 'Old title',
          description: 'keep me',
          status: 'confirmed',
          start: { dateTime: '2026-03-02T10:00:00Z' },
          end: { dateTime: '2026-03-02T11:00:00Z' },
        },
      ],
    });

  it('overlays only the supplied fields on the current event', async () => {
    const adapter = new CalendarAdapter(seeded());
    const updated = await adapter.updateEvent('ev1', { summary: 'New title', end: '2026-03-02T12:00:00Z' });

    expect(updated.id).toBe('ev1');
    expect(updated.summary).toBe('New title');
    expect(updated.description).toBe('keep me');
    expect(updated.start).toBe('2026-03-02T10:00:00Z');
    expect(updated.end).toBe('2026-03-02T12:00:00Z');
    expect(updated.status).toBe('confirmed');
  });

  it('reports a missing event as a provider failure', async () => {
    const adapter = new CalendarAdapter(seeded());

    const err = await failure(adapter.updateEvent('nope', { summary: 'x' }));
    expect(err).toBeInstanceOf(ProviderOperationFailedError);
    expect(err instanceof Error ? err.message : '').toBe('Calendar update event failed: HTTP 404: Not Found');
  });

  it('deletes and reports success', async () => {
    const provider = seeded();
    const adapter = new CalendarAdapter(provider);

    expect(await adapter.deleteEvent('ev1')).toBe(true);
    await expect(adapter.deleteEvent('ev1')).rejects.toBeInstanceOf(ProviderOperationFailedError);
    expect(provider.authenticateCalls).toBe(1);
  });
});
