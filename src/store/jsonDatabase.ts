import { mkdir, readFile, writeFile, rename, copyFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { StorageError, StorageUnavailableError, errorMessage } from '../errors.js';
import type { Logger } from '../log.js';
import { createLogger } from '../log.js';
import { MemoryCollection, type DocumentBody, type DocumentCollection } from './collection.js';
import { acquireLock, type LockHandle } from './lock.js';

const FileSchema = z.object({
  version: z.literal(1),
  collections: z.record(z.record(z.unknown())),
});

type DatabaseFile = z.infer<typeof FileSchema>;

export interface JsonDatabaseOptions {
  /** Directory holding db.json and db.lock. */
  dir?: string;
  /** Max wait for another process to release the store (default: 5000). */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Single-file document database: every collection lives in `<dir>/db.json`.
 * Open once per process, close once at shutdown.
 */
export class JsonDatabase {
  private readonly dir: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  private lock?: LockHandle;
  private raw: DatabaseFile['collections'] = {};
  private bound = new Set<string>();
  private writing: Promise<void> = Promise.resolve();

  constructor(opts: JsonDatabaseOptions = {}) {
    this.dir = opts.dir ?? path.join(process.cwd(), '.taskcal');
    this.timeoutMs = opts.timeoutMs ?? 5_000;
    this.logger = opts.logger ?? createLogger('silent');
  }

  getDir() {
    return this.dir;
  }

  filePath() {
    return path.join(this.dir, 'db.json');
  }

  isOpen() {
    return this.lock !== undefined;
  }

  async open(): Promise<void> {
    if (this.lock) return;
    this.lock = await acquireLock(this.dir, { timeoutMs: this.timeoutMs });
    try {
      this.raw = await this.readFile();
    } catch (e) {
      await this.lock.release();
      this.lock = undefined;
      throw e;
    }
    this.logger.info(`opened store ${this.filePath()}`);
  }

  async close(): Promise<void> {
    if (!this.lock) return;
    await Promise.allSettled([this.writing]);
    await this.lock.release();
    this.lock = undefined;
    this.bound.clear();
    this.logger.info('closed store');
  }

  /**
   * Typed view over a named collection. Stored documents are validated with
   * `schema` on first access; rows that fail validation are dropped with a warning.
   */
  collection<B extends DocumentBody>(name: string, schema: z.ZodType<B>): DocumentCollection<B> {
    if (!this.lock) throw new StorageUnavailableError('Store is not open');
    if (this.bound.has(name)) {
      throw new StorageError(`Collection ${name} is already bound`);
    }

    const initial: Array<[string, B]> = [];
    for (const [id, row] of Object.entries(this.raw[name] ?? {})) {
      const parsed = schema.safeParse(row);
      if (parsed.success) initial.push([id, parsed.data]);
      else this.logger.warn(`dropping invalid ${name} document ${id}`, parsed.error.issues[0]?.message);
    }

    const coll: MemoryCollection<B> = new MemoryCollection<B>({
      initial,
      onChange: () => this.persist(name, coll),
    });
    this.bound.add(name);
    return coll;
  }

  private persist<B extends DocumentBody>(name: string, coll: MemoryCollection<B>): Promise<void> {
    // snapshot when the write runs, so reverted changes never reach disk
    const write = () => {
      this.raw[name] = Object.fromEntries(coll.entries());
      return this.save();
    };
    const next = this.writing.then(write, write);
    this.writing = next;
    return next;
  }

  private async readFile(): Promise<DatabaseFile['collections']> {
    let text: string;
    try {
      text = await readFile(this.filePath(), 'utf8');
    } catch {
      return {};
    }
    const parsed = FileSchema.safeParse(safeJson(text));
    if (!parsed.success) {
      throw new StorageError(`Corrupt store file ${this.filePath()}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data.collections;
  }

  private async backupFile(): Promise<void> {
    try {
      await stat(this.filePath());
    } catch {
      return;
    }
    await copyFile(this.filePath(), this.filePath() + '.bak');
  }

  private async save(): Promise<void> {
    const file: DatabaseFile = { version: 1, collections: this.raw };
    try {
      await mkdir(this.dir, { recursive: true });
      await this.backupFile();
      const tmp = this.filePath() + '.tmp';
      await writeFile(tmp, JSON.stringify(file, null, 2) + '\n', 'utf8');
      await rename(tmp, this.filePath());
    } catch (e) {
      throw new StorageError(`Failed to write ${this.filePath()}: ${errorMessage(e)}`, { cause: e });
    }
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
