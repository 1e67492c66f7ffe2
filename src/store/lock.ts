import { mkdir, readFile, writeFile, unlink } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { StorageUnavailableError } from '../errors.js';

export interface LockHandle {
  path: string;
  release(): Promise<void>;
}

export interface AcquireLockOptions {
  filename?: string;
  /** Give up after waiting this long for a live holder (default: 5000). */
  timeoutMs?: number;
  /** Poll interval while waiting (default: 100). */
  pollMs?: number;
}

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

/** Pid of the live process holding `lockPath`, or undefined when free or stale. */
async function liveHolder(lockPath: string): Promise<number | undefined> {
  let raw: string;
  try {
    raw = await readFile(lockPath, 'utf8');
  } catch {
    return undefined;
  }
  const pid = holderPid(raw);
  if (pid !== undefined && pid !== process.pid && isProcessAlive(pid)) return pid;
  return undefined;
}

const LockFileSchema = z.object({ pid: z.number().int() });

function holderPid(raw: string): number | undefined {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const parsed = LockFileSchema.safeParse(json);
  return parsed.success ? parsed.data.pid : undefined;
}

export async function acquireLock(dir: string, opts: AcquireLockOptions = {}): Promise<LockHandle> {
  const timeoutMs = opts.timeoutMs ?? 5_000;
  const pollMs = opts.pollMs ?? 100;
  await mkdir(dir, { recursive: true });
  const lockPath = path.join(dir, opts.filename ?? 'db.lock');

  const payload = JSON.stringify({ pid: process.pid, at: new Date().toISOString() }) + '\n';
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    // create-or-fail; on failure wait for a live holder or take over a stale one
    const created = await writeFile(lockPath, payload, { flag: 'wx' }).then(
      () => true,
      () => false,
    );
    if (created) break;

    const holder = await liveHolder(lockPath);
    if (holder === undefined) {
      await writeFile(lockPath, payload, { flag: 'w' });
      break;
    }
    if (Date.now() >= deadline) {
      throw new StorageUnavailableError(
        `Store at ${dir} is locked by pid ${holder} (waited ${timeoutMs}ms)`,
      );
    }
    await sleep(pollMs);
  }

  return {
    path: lockPath,
    release: async () => {
      await unlink(lockPath).catch(() => undefined);
    },
  };
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: exists, owned by someone else
    return typeof e === 'object' && e !== null && 'code' in e && e.code === 'EPERM';
  }
}
