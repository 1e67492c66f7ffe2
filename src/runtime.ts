import path from 'node:path';
import { CalendarAdapter } from './calendar/adapter.js';
import type { EnvConfig } from './config.js';
import type { Logger } from './log.js';
import { GoogleCalendarProvider } from './providers/google.js';
import { MockCalendarProvider } from './providers/mock.js';
import type { CalendarProvider } from './providers/provider.js';
import { ReconciliationService } from './service.js';
import { JsonDatabase } from './store/jsonDatabase.js';
import { TASKS_COLLECTION, TaskDocumentSchema, TaskStore } from './store/taskStore.js';

export function createProvider(env: EnvConfig): CalendarProvider {
  if (env.TASKCAL_CALENDAR_PROVIDER === 'mock') return new MockCalendarProvider();
  return new GoogleCalendarProvider({
    clientId: env.TASKCAL_GOOGLE_CLIENT_ID ?? '',
    clientSecret: env.TASKCAL_GOOGLE_CLIENT_SECRET ?? '',
    refreshToken: env.TASKCAL_GOOGLE_REFRESH_TOKEN,
    timeoutMs: env.TASKCAL_HTTP_TIMEOUT_MS,
    rps: env.TASKCAL_HTTP_RPS,
  });
}

interface Resources {
  db: JsonDatabase;
  adapter: CalendarAdapter;
  service: ReconciliationService;
}

/**
 * Process-wide resources: one store and one calendar session, built on first
 * use and released by {@link Runtime.shutdown}.
 */
export class Runtime {
  private resources?: Promise<Resources>;

  constructor(
    private env: EnvConfig,
    private logger: Logger,
    private makeProvider: (env: EnvConfig) => CalendarProvider = createProvider,
  ) {}

  service(): Promise<ReconciliationService> {
    return this.init().then((r) => r.service);
  }

  adapter(): Promise<CalendarAdapter> {
    return this.init().then((r) => r.adapter);
  }

  private init(): Promise<Resources> {
    if (!this.resources) {
      const pending = this.build();
      this.resources = pending;
      // a failed start may be retried by the next caller
      pending.catch(() => {
        if (this.resources === pending) this.resources = undefined;
      });
    }
    return this.resources;
  }

  private async build(): Promise<Resources> {
    const db = new JsonDatabase({
      dir: path.resolve(this.env.TASKCAL_STATE_DIR ?? '.taskcal'),
      timeoutMs: this.env.TASKCAL_STORE_TIMEOUT_MS,
      logger: this.logger.child('store'),
    });
    await db.open();

    const tasks = new TaskStore(db.collection(TASKS_COLLECTION, TaskDocumentSchema), {
      logger: this.logger.child('tasks'),
    });
    const adapter = new CalendarAdapter(this.makeProvider(this.env), {
      logger: this.logger.child('calendar'),
      timeZone: this.env.TASKCAL_TIMEZONE,
      windowDays: this.env.TASKCAL_EVENT_WINDOW_DAYS,
    });
    const service = new ReconciliationService(tasks, adapter, {
      logger: this.logger.child('service'),
      calendarId: this.env.TASKCAL_GOOGLE_CALENDAR_ID,
    });
    return { db, adapter, service };
  }

  /** Idempotent. */
  async shutdown(): Promise<void> {
    const pending = this.resources;
    this.resources = undefined;
    if (!pending) return;
    const [settled] = await Promise.allSettled([pending]);
    if (settled.status === 'fulfilled') {
      settled.value.adapter.reset();
      await settled.value.db.close();
    }
  }
}
