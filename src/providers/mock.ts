import { randomUUID } from 'node:crypto';
import type { CalendarProvider, ProviderEvent, ProviderListQuery, ProviderSession } from './provider.js';
import { HttpError } from '../http.js';

/** Start as epoch ms; all-day dates count from UTC midnight. NaN when absent. */
function startMs(e: ProviderEvent): number {
  return Date.parse(e.start?.dateTime ?? e.start?.date ?? '');
}

function notFoundError(eventId: string) {
  return new HttpError(`HTTP 404 for event ${eventId}`, 404, `mock://events/${eventId}`, 'Not Found');
}

/**
 * In-memory calendar for local demos and tests.
 *
 * - Events are keyed by calendar id, then event id.
 * - Listing keeps events starting within [timeMin, timeMax), compared as
 *   instants; events without a start are never listed.
 * - Missing events fail like the real API (HTTP 404).
 */
export class MockCalendarProvider implements CalendarProvider {
  readonly name = 'mock' as const;
  private calendars = new Map<string, Map<string, ProviderEvent>>();
  private organizer: string;
  authenticateCalls = 0;

  constructor(opts?: { events?: Array<ProviderEvent & { calendarId?: string }>; organizer?: string }) {
    this.organizer = opts?.organizer ?? 'me@example.com';
    for (const { calendarId, ...e } of opts?.events ?? []) {
      const id = e.id ?? randomUUID();
      this.calendar(calendarId ?? 'primary').set(id, { ...e, id });
    }
  }

  private calendar(id: string) {
    let cal = this.calendars.get(id);
    if (!cal) {
      cal = new Map();
      this.calendars.set(id, cal);
    }
    return cal;
  }

  async authenticate(): Promise<ProviderSession> {
    this.authenticateCalls++;
    return { expiresAt: Date.now() + 60 * 60 * 1000 };
  }

  async listEvents(calendarId: string, query: ProviderListQuery): Promise<ProviderEvent[]> {
    const min = Date.parse(query.timeMin);
    const max = Date.parse(query.timeMax);
    const all = [...this.calendar(calendarId).values()].filter((e) => {
      const s = startMs(e);
      return s >= min && s < max;
    });
    if (query.orderBy === 'startTime') all.sort((a, b) => startMs(a) - startMs(b));
    return all.slice(0, query.maxResults).map((e) => structuredClone(e));
  }

  async getEvent(calendarId: string, eventId: string): Promise<ProviderEvent> {
    const e = this.calendar(calendarId).get(eventId);
    if (!e) throw notFoundError(eventId);
    return structuredClone(e);
  }

  async insertEvent(calendarId: string, event: ProviderEvent): Promise<ProviderEvent> {
    const id = randomUUID().replace(/-/g, '');
    const stored: ProviderEvent = {
      ...structuredClone(event),
      id,
      organizer: { email: this.organizer },
      updated: new Date().toISOString(),
    };
    this.calendar(calendarId).set(id, stored);
    return structuredClone(stored);
  }

  async updateEvent(calendarId: string, eventId: string, event: ProviderEvent): Promise<ProviderEvent> {
    const cal = this.calendar(calendarId);
    if (!cal.has(eventId)) throw notFoundError(eventId);
    const stored: ProviderEvent = { ...structuredClone(event), id: eventId, updated: new Date().toISOString() };
    cal.set(eventId, stored);
    return structuredClone(stored);
  }

  async deleteEvent(calendarId: string, eventId: string): Promise<void> {
    if (!this.calendar(calendarId).delete(eventId)) throw notFoundError(eventId);
  }
}
