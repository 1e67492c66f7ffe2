import { ValidationError } from '../errors.js';
import type { CalendarEvent } from '../model.js';
import type { ProviderEvent, ProviderEventTime } from '../providers/provider.js';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** The instant if present, else the all-day date, else `''`. Never converts one into the other. */
export function pickTime(t?: ProviderEventTime): string {
  return t?.dateTime ?? t?.date ?? '';
}

export function normalizeEvent(e: ProviderEvent, opts: { defaultStatus?: string } = {}): CalendarEvent {
  return {
    id: e.id ?? '',
    summary: e.summary ?? '',
    description: e.description ?? '',
    start: pickTime(e.start),
    end: pickTime(e.end),
    location: e.location ?? '',
    status: e.status || opts.defaultStatus || '',
    organizer: e.organizer?.email ?? '',
    attendees: (e.attendees ?? []).flatMap((a) => (a.email ? [a.email] : [])),
  };
}

/**
 * Caller time → provider time. `YYYY-MM-DD` becomes an all-day `date`;
 * anything else must parse as an instant and is sent with `timeZone`.
 */
export function toProviderTime(value: string, timeZone: string, field = 'time'): ProviderEventTime {
  if (DATE_ONLY.test(value)) return { date: value };
  if (Number.isNaN(Date.parse(value))) {
    throw new ValidationError(`Invalid event ${field}: ${JSON.stringify(value)}`);
  }
  return { dateTime: value, timeZone };
}

export function toProviderAttendees(emails: string[]): Array<{ email: string }> {
  return emails.map((email) => ({ email }));
}
