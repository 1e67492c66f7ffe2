import { randomUUID } from 'node:crypto';
import { InvalidDocumentIdError } from '../errors.js';

export type DocumentBody = Record<string, unknown>;

export type WithId<B extends DocumentBody> = B & { _id: string };

/** Equality filter over top-level fields; `undefined` entries are ignored. */
export type Filter<B extends DocumentBody> = Partial<WithId<B>>;

export interface FindOptions {
  skip?: number;
  limit?: number;
}

/**
 * Minimal document collection. Ids are opaque strings; results come back in
 * insertion order.
 */
export interface DocumentCollection<B extends DocumentBody> {
  find(filter: Filter<B>, opts?: FindOptions): Promise<Array<WithId<B>>>;
  findOne(filter: Filter<B>): Promise<WithId<B> | undefined>;
  insertOne(doc: B): Promise<{ insertedId: string }>;
  /** Sets the given fields on the first match. */
  updateOne(filter: Filter<B>, fields: Partial<B>): Promise<{ matchedCount: number }>;
  deleteOne(filter: Filter<B>): Promise<{ deletedCount: number }>;
}

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function newDocumentId(): string {
  return randomUUID();
}

/** Converts a caller-supplied string into a document id. */
export function parseDocumentId(raw: string): string {
  if (!UUID_RE.test(raw)) throw new InvalidDocumentIdError(raw);
  return raw.toLowerCase();
}

function fieldOf(doc: DocumentBody, key: string): unknown {
  return doc[key];
}

function matches<B extends DocumentBody>(doc: WithId<B>, filter: Filter<B>): boolean {
  return Object.entries(filter).every(([k, v]) => v === undefined || fieldOf(doc, k) === v);
}

export interface MemoryCollectionOptions<B extends DocumentBody> {
  /** Initial documents keyed by id. */
  initial?: Iterable<[string, B]>;
  /** Awaited after every write; a rejection fails the write and reverts it. */
  onChange?: () => Promise<void>;
}

/** In-process collection. Also the working set behind {@link JsonDatabase}. */
export class MemoryCollection<B extends DocumentBody> implements DocumentCollection<B> {
  private docs = new Map<string, B>();
  private onChange?: () => Promise<void>;

  constructor(opts: MemoryCollectionOptions<B> = {}) {
    for (const [id, body] of opts.initial ?? []) this.docs.set(id, { ...body });
    this.onChange = opts.onChange;
  }

  /** Snapshot of all documents keyed by id. */
  entries(): Array<[string, B]> {
    return [...this.docs.entries()].map(([id, body]) => [id, { ...body }]);
  }

  private all(): Array<WithId<B>> {
    return [...this.docs.entries()].map(([id, body]) => ({ ...body, _id: id }));
  }

  async find(filter: Filter<B>, opts: FindOptions = {}): Promise<Array<WithId<B>>> {
    const skip = Math.max(0, opts.skip ?? 0);
    const hits = this.all().filter((d) => matches(d, filter));
    return opts.limit === undefined ? hits.slice(skip) : hits.slice(skip, skip + Math.max(0, opts.limit));
  }

  async findOne(filter: Filter<B>): Promise<WithId<B> | undefined> {
    return this.all().find((d) => matches(d, filter));
  }

  async insertOne(doc: B): Promise<{ insertedId: string }> {
    const id = newDocumentId();
    await this.commit(id, { ...doc });
    return { insertedId: id };
  }

  async updateOne(filter: Filter<B>, fields: Partial<B>): Promise<{ matchedCount: number }> {
    const hit = this.all().find((d) => matches(d, filter));
    const body = hit && this.docs.get(hit._id);
    if (!hit || !body) return { matchedCount: 0 };
    await this.commit(hit._id, { ...body, ...fields });
    return { matchedCount: 1 };
  }

  async deleteOne(filter: Filter<B>): Promise<{ deletedCount: number }> {
    const hit = this.all().find((d) => matches(d, filter));
    if (!hit) return { deletedCount: 0 };
    await this.commit(hit._id, undefined);
    return { deletedCount: 1 };
  }

  /**
   * Apply one change (`undefined` deletes), then run `onChange`. When that
   * rejects, the change is reverted unless a later write already replaced it.
   */
  private async commit(id: string, next: B | undefined): Promise<void> {
    const index = [...this.docs.keys()].indexOf(id);
    const prev = this.docs.get(id);
    if (next === undefined) this.docs.delete(id);
    else this.docs.set(id, next);

    try {
      await this.onChange?.();
    } catch (e) {
      if (this.docs.get(id) === next) this.restore(id, prev, index);
      throw e;
    }
  }

  private restore(id: string, prev: B | undefined, index: number) {
    if (prev === undefined) {
      this.docs.delete(id);
      return;
    }
    if (this.docs.has(id)) {
      this.docs.set(id, prev);
      return;
    }
    // put a deleted document back at its old position
    const entries = [...this.docs.entries()];
    entries.splice(index < 0 ? entries.length : index, 0, [id, prev]);
    this.docs = new Map(entries);
  }
}
