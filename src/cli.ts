#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { ZodError } from 'zod';
import { doctorReport, readEnv, type EnvConfig } from './config.js';
import { loadEnvFiles } from './env.js';
import { AuthenticationRequiredError, errorMessage } from './errors.js';
import { createLogger } from './log.js';
import type { CalendarEvent, Outcome, Task, TaskUpdate } from './model.js';
import { Runtime } from './runtime.js';
import { CalendarAdapter } from './calendar/adapter.js';
import { MockCalendarProvider } from './providers/mock.js';
import { awaitConsentCode, consentUrl, exchangeCode } from './providers/googleConsent.js';
import { ReconciliationService } from './service.js';
import { MemoryCollection } from './store/collection.js';
import { TaskStore, type TaskDocument } from './store/taskStore.js';

loadEnvFiles();

class UsageError extends Error {}

const program = new Command();

program
  .name('taskcal')
  .description('Manage tasks and the calendar events that go with them')
  .version('0.1.0')
  .option('--user <id>', 'Acting user id (default: TASKCAL_USER_ID)')
  .option('--format <format>', 'Output format: pretty|json', 'pretty');

function globals() {
  return program.opts<{ user?: string; format: string }>();
}

function intArg(v: string): number {
  const n = Number.parseInt(v, 10);
  if (!Number.isFinite(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}

function json(value: unknown) {
  console.log(JSON.stringify(value, null, 2));
}

function printTask(t: Task) {
  const box = t.completed ? '[x]' : '[ ]';
  const extra = [
    t.dueDate ? `due ${t.dueDate}` : '',
    t.priority !== undefined ? `p${t.priority}` : '',
  ].filter(Boolean);
  console.log(`${box} ${t.id} ${t.title}${extra.length ? ` (${extra.join(', ')})` : ''}`);
  if (t.description) console.log(`    ${t.description}`);
}

function printEvent(e: CalendarEvent) {
  console.log(`- ${e.start} → ${e.end} ${e.summary || '(no title)'} [${e.status}] ${e.id}`);
  if (e.location) console.log(`    @ ${e.location}`);
  if (e.attendees.length) console.log(`    with ${e.attendees.join(', ')}`);
}

function output<T>(value: T, pretty: (v: T) => void) {
  if (globals().format === 'json') json(value);
  else pretty(value);
}

/** The value, or undefined after reporting the refusal. */
function unwrap<T>(outcome: Outcome<T>): T | undefined {
  if (outcome.ok) return outcome.value;
  console.error(outcome.message);
  process.exitCode = 1;
  return undefined;
}

async function withRuntime(fn: (rt: Runtime, userId: string, env: EnvConfig) => Promise<void>) {
  const env = readEnv();
  const userId = globals().user ?? env.TASKCAL_USER_ID;
  if (!userId) throw new UsageError('No user: pass --user <id> or set TASKCAL_USER_ID.');

  const rt = new Runtime(env, createLogger(env.TASKCAL_LOG_LEVEL ?? 'warn'));
  try {
    await fn(rt, userId, env);
  } finally {
    await rt.shutdown();
  }
}

program
  .command('doctor')
  .description('Check environment/config and print what is missing')
  .action(() => {
    const report = doctorReport();
    console.log('taskcal doctor');
    console.log(`provider: ${report.provider}`);
    console.log(`state dir: ${report.stateDir}`);
    if (report.missing.length) {
      console.log('\nMissing env vars:');
      for (const k of report.missing) console.log(`- ${k}`);
      process.exitCode = 2;
    } else {
      console.log('\nNo missing env vars detected for the selected provider.');
    }

    if (report.notes.length) {
      console.log('\nNotes:');
      for (const n of report.notes) console.log(`- ${n}`);
    }
  });

program
  .command('auth')
  .description('Grant calendar access in the browser and print a Google refresh token')
  .option('--port <n>', 'Local callback port', intArg, 53682)
  .action(async (opts: { port: number }) => {
    const env = readEnv();
    const clientId = env.TASKCAL_GOOGLE_CLIENT_ID;
    const clientSecret = env.TASKCAL_GOOGLE_CLIENT_SECRET;
    if (!clientId || !clientSecret) {
      throw new UsageError('Set TASKCAL_GOOGLE_CLIENT_ID and TASKCAL_GOOGLE_CLIENT_SECRET first.');
    }

    const redirectUri = `http://localhost:${opts.port}/callback`;
    console.log(`Open in a browser (redirects to ${redirectUri}):`);
    console.log(consentUrl(clientId, redirectUri));

    const code = await awaitConsentCode(opts.port);
    const refreshToken = await exchangeCode({ clientId, clientSecret, code, redirectUri });
    if (!refreshToken) {
      console.error('Google sent no refresh token. Revoke taskcal under your account\'s third-party access and retry.');
      process.exitCode = 1;
      return;
    }
    console.log(`\nTASKCAL_GOOGLE_REFRESH_TOKEN=${refreshToken}`);
  });

const tasks = program.command('tasks').description('Manage tasks');

tasks
  .command('list')
  .description('List your tasks')
  .option('--completed', 'Only completed tasks')
  .option('--open', 'Only open tasks')
  .option('--skip <n>', 'Skip the first n tasks', intArg, 0)
  .option('--limit <n>', 'Return at most n tasks', intArg, 100)
  .action(async (opts: { completed?: boolean; open?: boolean; skip: number; limit: number }) => {
    await withRuntime(async (rt, userId) => {
      const completed = opts.completed ? true : opts.open ? false : undefined;
      const list = await (await rt.service()).listTasks(userId, { skip: opts.skip, limit: opts.limit, completed });
      output(list, (l) => {
        if (!l.length) console.log('(no tasks)');
        l.forEach(printTask);
      });
    });
  });

tasks
  .command('add <title>')
  .description('Create a task')
  .option('--description <text>', 'Longer description')
  .option('--due <date>', 'Due date (ISO)')
  .option('--priority <n>', 'Integer priority', intArg)
  .option('--done', 'Create already completed')
  .action(async (title: string, opts: { description?: string; due?: string; priority?: number; done?: boolean }) => {
    await withRuntime(async (rt, userId) => {
      const task = await (await rt.service()).createTask(userId, {
        title,
        description: opts.description,
        dueDate: opts.due,
        priority: opts.priority,
        completed: opts.done,
      });
      output(task, printTask);
    });
  });

tasks
  .command('show <id>')
  .description('Show one task')
  .action(async (id: string) => {
    await withRuntime(async (rt, userId) => {
      const task = unwrap(await (await rt.service()).getTask(id, userId));
      if (task) output(task, printTask);
    });
  });

tasks
  .command('update <id>')
  .description('Change the given fields of a task')
  .option('--title <text>')
  .option('--description <text>')
  .option('--due <date>')
  .option('--priority <n>', 'Integer priority', intArg)
  .option('--done', 'Mark completed')
  .option('--undone', 'Mark not completed')
  .action(
    async (
      id: string,
      opts: { title?: string; description?: string; due?: string; priority?: number; done?: boolean; undone?: boolean },
    ) => {
      await withRuntime(async (rt, userId) => {
        const update: TaskUpdate = {
          title: opts.title,
          description: opts.description,
          dueDate: opts.due,
          priority: opts.priority,
          completed: opts.done ? true : opts.undone ? false : undefined,
        };
        const task = unwrap(await (await rt.service()).updateTask(id, userId, update));
        if (task) output(task, printTask);
      });
    },
  );

tasks
  .command('rm <id>')
  .description('Delete a task')
  .action(async (id: string) => {
    await withRuntime(async (rt, userId) => {
      const deleted = await (await rt.service()).deleteTask(id, userId);
      if (!deleted) {
        console.error('Task not found');
        process.exitCode = 1;
        return;
      }
      output({ deleted: id }, () => console.log(`deleted ${id}`));
    });
  });

const events = program.command('events').description('Read and change calendar events');

events
  .command('list')
  .description('List upcoming events')
  .option('--for <userId>', 'User the request is made for (default: the acting user)')
  .option('--target-start <date>', 'Start of the window (default: now)')
  .option('--text <text>', 'Free-text description of what you are looking for', '')
  .action(async (opts: { for?: string; targetStart?: string; text: string }) => {
    await withRuntime(async (rt, userId) => {
      const list = unwrap(
        await (await rt.service()).listEvents(
          { userId: opts.for ?? userId, targetStart: opts.targetStart, eventDetails: { eventText: opts.text } },
          userId,
        ),
      );
      if (!list) return;
      output(list, (l) => {
        if (!l.length) console.log('(no events)');
        l.forEach(printEvent);
      });
    });
  });

events
  .command('add <summary>')
  .description('Create an event')
  .requiredOption('--start <time>', 'ISO date-time, or YYYY-MM-DD for all-day')
  .requiredOption('--end <time>', 'ISO date-time, or YYYY-MM-DD for all-day')
  .option('--description <text>')
  .option('--location <text>')
  .option('--attendee <email...>', 'Attendee emails')
  .action(
    async (
      summary: string,
      opts: { start: string; end: string; description?: string; location?: string; attendee?: string[] },
    ) => {
      await withRuntime(async (rt, _userId, env) => {
        const created = await (await rt.adapter()).createEvent({
          summary,
          start: opts.start,
          end: opts.end,
          description: opts.description,
          location: opts.location,
          attendees: opts.attendee,
          calendarId: env.TASKCAL_GOOGLE_CALENDAR_ID,
        });
        output(created, printEvent);
      });
    },
  );

events
  .command('update <id>')
  .description('Change the given fields of an event')
  .option('--summary <text>')
  .option('--start <time>')
  .option('--end <time>')
  .option('--description <text>')
  .option('--location <text>')
  .option('--status <status>', 'confirmed|tentative|cancelled')
  .option('--attendee <email...>', 'Replace attendees')
  .action(
    async (
      id: string,
      opts: {
        summary?: string;
        start?: string;
        end?: string;
        description?: string;
        location?: string;
        status?: string;
        attendee?: string[];
      },
    ) => {
      await withRuntime(async (rt, _userId, env) => {
        const { attendee, ...rest } = opts;
        const updated = await (await rt.adapter()).updateEvent(id, {
          ...rest,
          attendees: attendee,
          calendarId: env.TASKCAL_GOOGLE_CALENDAR_ID,
        });
        output(updated, printEvent);
      });
    },
  );

events
  .command('rm <id>')
  .description('Delete an event')
  .action(async (id: string) => {
    await withRuntime(async (rt, _userId, env) => {
      await (await rt.adapter()).deleteEvent(id, env.TASKCAL_GOOGLE_CALENDAR_ID);
      output({ deleted: id }, () => console.log(`deleted ${id}`));
    });
  });

program
  .command('mock')
  .description('Run a short in-memory demo (mock calendar, no state written)')
  .action(async () => {
    const logger = createLogger('info');
    const day = 24 * 60 * 60 * 1000;
    const inDays = (n: number) => new Date(Date.now() + n * day).toISOString();

    const provider = new MockCalendarProvider({
      events: [
        {
          id: 'evt-standup',
          summary: 'Standup',
          start: { dateTime: inDays(1) },
          end: { dateTime: inDays(1.02) },
          attendees: [{ email: 'dev1@example.com' }, { email: 'dev2@example.com' }],
        },
        { id: 'evt-offsite', summary: 'Offsite', start: { date: inDays(7).slice(0, 10) }, end: { date: inDays(8).slice(0, 10) } },
      ],
    });
    const store = new TaskStore(new MemoryCollection<TaskDocument>(), { logger: logger.child('tasks') });
    const service = new ReconciliationService(store, new CalendarAdapter(provider, { logger: logger.child('calendar') }), {
      logger: logger.child('service'),
    });

    const task = await service.createTask('demo', { title: 'Prepare offsite agenda', priority: 1 });
    await service.updateTask(task.id, 'demo', { completed: true });
    const listed = await service.listEvents({ userId: 'demo', eventDetails: { eventText: 'upcoming' } }, 'demo');

    output({ tasks: await service.listTasks('demo'), events: listed.ok ? listed.value : [] }, (v) => {
      console.log('tasks:');
      v.tasks.forEach(printTask);
      console.log('\nevents:');
      v.events.forEach(printEvent);
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(errorMessage(err));
  if (err instanceof AuthenticationRequiredError) {
    console.error('Run `taskcal auth` and set TASKCAL_GOOGLE_REFRESH_TOKEN.');
    process.exitCode = 2;
  } else if (err instanceof UsageError || err instanceof ZodError) {
    process.exitCode = 2;
  } else {
    process.exitCode = 1;
  }
});
