import { z } from 'zod';
import {
  AuthenticationRequiredError,
  ProviderOperationFailedError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import { HttpError, HttpTimeoutError } from '../http.js';
import type { Logger } from '../log.js';
import { createLogger } from '../log.js';
import type { CalendarEvent } from '../model.js';
import type { CalendarProvider, ProviderEvent, ProviderSession } from '../providers/provider.js';
import { normalizeEvent, toProviderAttendees, toProviderTime } from './normalize.js';

export type AuthState = 'unauthenticated' | 'authenticating' | 'authenticated';

/** "Upcoming" when the caller gives no upper bound: this many days after `timeMin`. */
export const DEFAULT_EVENT_WINDOW_DAYS = 30;

const DAY_MS = 24 * 60 * 60 * 1000;
const SESSION_SKEW_MS = 30_000;

export interface CalendarAdapterOptions {
  logger?: Logger;
  /** Time zone sent with date-time values (default: UTC). */
  timeZone?: string;
  windowDays?: number;
  now?: () => Date;
}

export interface ListEventsParams {
  calendarId?: string;
  timeMin?: Date | string;
  timeMax?: Date | string;
  maxResults?: number;
  /** Expand recurring events into instances. */
  singleEvents?: boolean;
  orderBy?: 'startTime' | 'updated';
}

export interface CreateEventParams {
  summary: string;
  /** ISO instant or `YYYY-MM-DD`. */
  start: string;
  end: string;
  description?: string;
  location?: string;
  attendees?: string[];
  calendarId?: string;
}

export interface UpdateEventParams {
  calendarId?: string;
  summary?: string;
  description?: string;
  location?: string;
  start?: string;
  end?: string;
  attendees?: string[];
  status?: string;
}

const GoogleErrorBody = z.object({ error: z.object({ message: z.string() }) });

function describeFailure(e: unknown): { message: string; status?: number } {
  if (e instanceof HttpError) {
    let body: unknown;
    try {
      body = e.responseText ? JSON.parse(e.responseText) : undefined;
    } catch {
      body = undefined;
    }
    const parsed = GoogleErrorBody.safeParse(body);
    const detail = parsed.success ? parsed.data.error.message : e.responseText || e.message;
    return { message: `HTTP ${e.status}: ${detail}`, status: e.status };
  }
  if (e instanceof HttpTimeoutError) return { message: e.message };
  return { message: errorMessage(e) };
}

function toDate(value: Date | string, field: string): Date {
  const d = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(d.getTime())) throw new ValidationError(`Invalid ${field}: ${String(value)}`);
  return d;
}

/**
 * Normalized access to one calendar provider.
 *
 * Owns the provider session: every operation first ensures the adapter is
 * authenticated, and concurrent callers share a single in-flight
 * authentication. Failures surface as {@link AuthenticationRequiredError}
 * (consent needed) or {@link ProviderOperationFailedError}; nothing is retried.
 */
export class CalendarAdapter {
  private state: AuthState = 'unauthenticated';
  private session?: ProviderSession;
  private inflight?: Promise<void>;

  private logger: Logger;
  private timeZone: string;
  private windowDays: number;
  private now: () => Date;

  constructor(
    private provider: CalendarProvider,
    opts: CalendarAdapterOptions = {},
  ) {
    this.logger = opts.logger ?? createLogger('silent');
    this.timeZone = opts.timeZone ?? 'UTC';
    this.windowDays = opts.windowDays ?? DEFAULT_EVENT_WINDOW_DAYS;
    this.now = opts.now ?? (() => new Date());
  }

  get providerName() {
    return this.provider.name;
  }

  getAuthState(): AuthState {
    return this.state;
  }

  /** No-op while the current session is valid. */
  async ensureAuthenticated(): Promise<void> {
    const valid =
      this.state === 'authenticated' &&
      this.session !== undefined &&
      this.session.expiresAt - SESSION_SKEW_MS > this.now().getTime();
    if (valid) return;

    if (!this.inflight) {
      this.state = 'authenticating';
      this.inflight = this.authenticate().finally(() => {
        this.inflight = undefined;
      });
    }
    return this.inflight;
  }

  /** Forget the session; the next call authenticates again. */
  reset(): void {
    this.state = 'unauthenticated';
    this.session = undefined;
  }

  private async authenticate(): Promise<void> {
    try {
      this.session = await this.provider.authenticate();
      this.state = 'authenticated';
      this.logger.info(`authenticated with ${this.provider.name}`);
    } catch (e) {
      this.reset();
      if (e instanceof AuthenticationRequiredError) {
        this.logger.warn(e.message);
        throw e;
      }
      const { message, status } = describeFailure(e);
      this.logger.error('authentication failed', { provider: this.provider.name, message });
      throw new ProviderOperationFailedError('authenticate', message, status, { cause: e });
    }
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    await this.ensureAuthenticated();
    try {
      return await fn();
    } catch (e) {
      if (e instanceof AuthenticationRequiredError) {
        this.reset();
        throw e;
      }
      const { message, status } = describeFailure(e);
      if (status === 401) this.reset();
      this.logger.error(`${operation} failed`, { provider: this.provider.name, message });
      throw new ProviderOperationFailedError(operation, message, status, { cause: e });
    }
  }

  async listEvents(params: ListEventsParams = {}): Promise<CalendarEvent[]> {
    const timeMin = params.timeMin === undefined ? this.now() : toDate(params.timeMin, 'timeMin');
    const timeMax =
      params.timeMax === undefined
        ? new Date(timeMin.getTime() + this.windowDays * DAY_MS)
        : toDate(params.timeMax, 'timeMax');
    const calendarId = params.calendarId ?? 'primary';

    const events = await this.call('list events', () =>
      this.provider.listEvents(calendarId, {
        timeMin: timeMin.toISOString(),
        timeMax: timeMax.toISOString(),
        maxResults: params.maxResults ?? 100,
        singleEvents: params.singleEvents ?? true,
        orderBy: params.orderBy ?? 'startTime',
      }),
    );
    this.logger.debug(`listed ${events.length} events`, { calendarId });
    return events.map((e) => normalizeEvent(e));
  }

  async createEvent(params: CreateEventParams): Promise<CalendarEvent> {
    if (!params.summary.trim()) throw new ValidationError('Event summary must not be empty');
    const body: ProviderEvent = {
      summary: params.summary,
      start: toProviderTime(params.start, this.timeZone, 'start'),
      end: toProviderTime(params.end, this.timeZone, 'end'),
    };
    if (params.description) body.description = params.description;
    if (params.location) body.location = params.location;
    if (params.attendees?.length) body.attendees = toProviderAttendees(params.attendees);

    const calendarId = params.calendarId ?? 'primary';
    const created = await this.call('create event', () => this.provider.insertEvent(calendarId, body));
    this.logger.info('event created', { id: created.id, calendarId });
    return normalizeEvent(created, { defaultStatus: 'confirmed' });
  }

  /** Read-modify-write: supplied fields overlay the provider's current event. */
  async updateEvent(eventId: string, params: UpdateEventParams = {}): Promise<CalendarEvent> {
    const start = params.start === undefined ? undefined : toProviderTime(params.start, this.timeZone, 'start');
    const end = params.end === undefined ? undefined : toProviderTime(params.end, this.timeZone, 'end');
    const calendarId = params.calendarId ?? 'primary';

    const updated = await this.call('update event', async () => {
      const event = await this.provider.getEvent(calendarId, eventId);
      if (params.summary !== undefined) event.summary = params.summary;
      if (params.description !== undefined) event.description = params.description;
      if (params.location !== undefined) event.location = params.location;
      if (params.status !== undefined) event.status = params.status;
      if (start) event.start = start;
      if (end) event.end = end;
      if (params.attendees !== undefined) event.attendees = toProviderAttendees(params.attendees);
      return this.provider.updateEvent(calendarId, eventId, event);
    });
    this.logger.info('event updated', { id: eventId, calendarId });
    return normalizeEvent(updated);
  }

  async deleteEvent(eventId: string, calendarId = 'primary'): Promise<boolean> {
    await this.call('delete event', () => this.provider.deleteEvent(calendarId, eventId));
    this.logger.info('event deleted', { id: eventId, calendarId });
    return true;
  }
}
