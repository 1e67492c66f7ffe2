import { describe, expect, it } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import { mkdtemp } from 'node:fs/promises';
import { readEnv } from '../src/config.js';
import { createLogger } from '../src/log.js';
import { GoogleCalendarProvider } from '../src/providers/google.js';
import { MockCalendarProvider } from '../src/providers/mock.js';
import { Runtime, createProvider } from '../src/runtime.js';
import { FakeProvider } from './fakes.js';

const silent = createLogger('silent');

async function mockEnv() {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'taskcal-rt-'));
  return readEnv({ TASKCAL_STATE_DIR: dir, TASKCAL_CALENDAR_PROVIDER: 'mock' });
}

describe('createProvider', () => {
  it('picks the provider named in the environment', () => {
    expect(createProvider(readEnv({ TASKCAL_CALENDAR_PROVIDER: 'mock' }))).toBeInstanceOf(MockCalendarProvider);
    expect(createProvider(readEnv({}))).toBeInstanceOf(GoogleCalendarProvider);
  });
});

describe('Runtime', () => {
  it('builds resources once and shares them', async () => {
    const rt = new Runtime(await mockEnv(), silent);
    const [a, b] = await Promise.all([rt.service(), rt.service()]);
    expect(a).toBe(b);
    expect((await rt.adapter()).providerName).toBe('mock');
    await rt.shutdown();
  });

  it('persists tasks across shutdown and restart', async () => {
    const env = await mockEnv();

    const first = new Runtime(env, silent);
    const task = await (await first.service()).createTask('u1', { title: 'Survives restart' });
    await first.shutdown();
    await first.shutdown();

    const second = new Runtime(env, silent);
    const read = await (await second.service()).getTask(task.id, 'u1');
    expect(read).toEqual({ ok: true, value: task });
    await second.shutdown();
  });

  it('drops the calendar session on shutdown', async () => {
    const provider = new FakeProvider();
    const rt = new Runtime(await mockEnv(), silent, () => provider);

    await (await rt.service()).listEvents({ eventDetails: { eventText: 'x' }, userId: 'u1' }, 'u1');
    const adapter = await rt.adapter();
    expect(adapter.getAuthState()).toBe('authenticated');

    await rt.shutdown();
    expect(adapter.getAuthState()).toBe('unauthenticated');
  });

  it('releases the store so another runtime can open it', async () => {
    const env = await mockEnv();
    const a = new Runtime(env, silent);
    await a.service();
    await a.shutdown();

    const b = new Runtime({ ...env, TASKCAL_STORE_TIMEOUT_MS: 50 }, silent);
    await expect(b.service()).resolves.toBeDefined();
    await b.shutdown();
  });
});
