import { z } from 'zod';

const str = z.string().min(1);

export const CalendarProviderSchema = z.enum(['google', 'mock']);

export const EnvSchema = z.object({
  // behavior
  TASKCAL_LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug']).optional(),
  TASKCAL_STATE_DIR: str.optional(),
  TASKCAL_USER_ID: str.optional(),
  TASKCAL_CALENDAR_PROVIDER: CalendarProviderSchema.default('google'),
  TASKCAL_TIMEZONE: str.default('UTC'),
  TASKCAL_EVENT_WINDOW_DAYS: z.coerce.number().int().positive().default(30),

  // I/O bounds
  TASKCAL_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TASKCAL_HTTP_RPS: z.coerce.number().positive().optional(),
  TASKCAL_STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),

  // Google Calendar
  TASKCAL_GOOGLE_CLIENT_ID: str.optional(),
  TASKCAL_GOOGLE_CLIENT_SECRET: str.optional(),
  TASKCAL_GOOGLE_REFRESH_TOKEN: str.optional(),
  TASKCAL_GOOGLE_CALENDAR_ID: str.default('primary'),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/** Empty values (`KEY=` in .env) count as unset. */
export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  return EnvSchema.parse(present);
}

export interface DoctorReport {
  provider: z.infer<typeof CalendarProviderSchema>;
  stateDir: string;
  missing: string[];
  notes: string[];
}

export function doctorReport(env: EnvConfig = readEnv()): DoctorReport {
  const missing: string[] = [];
  const notes: string[] = [];

  if (!env.TASKCAL_USER_ID) {
    notes.push('TASKCAL_USER_ID not set: pass --user <id> to every command.');
  }

  if (env.TASKCAL_CALENDAR_PROVIDER === 'google') {
    if (!env.TASKCAL_GOOGLE_CLIENT_ID) missing.push('TASKCAL_GOOGLE_CLIENT_ID');
    if (!env.TASKCAL_GOOGLE_CLIENT_SECRET) missing.push('TASKCAL_GOOGLE_CLIENT_SECRET');
    if (!env.TASKCAL_GOOGLE_REFRESH_TOKEN) {
      missing.push('TASKCAL_GOOGLE_REFRESH_TOKEN');
      notes.push('Run `taskcal auth` to obtain a refresh token.');
    }
    notes.push(`Google: calendar "${env.TASKCAL_GOOGLE_CALENDAR_ID}", events sent with time zone ${env.TASKCAL_TIMEZONE}.`);
  } else {
    notes.push('Mock calendar provider: events live in memory for the lifetime of the process.');
  }

  return {
    provider: env.TASKCAL_CALENDAR_PROVIDER,
    stateDir: env.TASKCAL_STATE_DIR ?? '.taskcal',
    missing,
    notes,
  };
}
