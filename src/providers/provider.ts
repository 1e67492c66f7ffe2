export type CalendarProviderName = 'google' | 'mock';

/** Either an instant (`dateTime`) or an all-day `date`. */
export interface ProviderEventTime {
  dateTime?: string;
  date?: string;
  timeZone?: string;
}

export interface ProviderAttendee {
  email?: string;
  displayName?: string;
  responseStatus?: string;
}

/** Event record in the provider's own (Google Calendar v3) shape. */
export interface ProviderEvent {
  id?: string;
  status?: string;
  summary?: string;
  description?: string;
  location?: string;
  start?: ProviderEventTime;
  end?: ProviderEventTime;
  organizer?: { email?: string; displayName?: string };
  attendees?: ProviderAttendee[];
  updated?: string;
}

export interface ProviderListQuery {
  timeMin: string;
  timeMax: string;
  maxResults: number;
  singleEvents: boolean;
  orderBy: 'startTime' | 'updated';
}

export interface ProviderSession {
  /** Epoch ms after which the session must be renewed. */
  expiresAt: number;
}

/**
 * Raw calendar capability. Implementations speak the provider's native
 * schema; normalization is the adapter's job.
 */
export interface CalendarProvider {
  readonly name: CalendarProviderName;

  /** Obtain or refresh credentials. Rejects with AuthenticationRequiredError when consent is needed. */
  authenticate(): Promise<ProviderSession>;

  listEvents(calendarId: string, query: ProviderListQuery): Promise<ProviderEvent[]>;
  getEvent(calendarId: string, eventId: string): Promise<ProviderEvent>;
  insertEvent(calendarId: string, event: ProviderEvent): Promise<ProviderEvent>;
  updateEvent(calendarId: string, eventId: string, event: ProviderEvent): Promise<ProviderEvent>;
  deleteEvent(calendarId: string, eventId: string): Promise<void>;
}
