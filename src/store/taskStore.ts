import { z } from 'zod';
import { ValidationError, errorMessage } from '../errors.js';
import type { Logger } from '../log.js';
import { createLogger } from '../log.js';
import {
  TaskCreateSchema,
  TaskUpdateSchema,
  found,
  notFound,
  type ListTasksOptions,
  type Outcome,
  type Task,
  type TaskCreate,
  type TaskUpdate,
} from '../model.js';
import { parseDocumentId, type DocumentCollection, type WithId } from './collection.js';

export const TASKS_COLLECTION = 'tasks';

export const TaskDocumentSchema = z.object({
  userId: z.string(),
  title: z.string(),
  description: z.string().optional(),
  dueDate: z.string().optional(),
  completed: z.boolean(),
  priority: z.number().optional(),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
});

export type TaskDocument = z.infer<typeof TaskDocumentSchema>;

/** One field of a partial update: either left alone or set to a value. */
export type FieldUpdate<T> = { kind: 'unset' } | { kind: 'set'; value: T };

export interface TaskPatch {
  title: FieldUpdate<string>;
  description: FieldUpdate<string>;
  dueDate: FieldUpdate<string>;
  completed: FieldUpdate<boolean>;
  priority: FieldUpdate<number>;
}

const UNSET = { kind: 'unset' } as const;

function field<T>(v: T | null | undefined): FieldUpdate<T> {
  return v === undefined || v === null ? UNSET : { kind: 'set', value: v };
}

/**
 * Validate a caller update and turn it into a patch. Omitted and `null`
 * fields are both `unset`: an update cannot clear a field.
 */
export function toTaskPatch(input: TaskUpdate): TaskPatch {
  const parsed = TaskUpdateSchema.safeParse(input);
  if (!parsed.success) throw ValidationError.fromIssues('task update', parsed.error.issues);
  const u = parsed.data;
  return {
    title: field(u.title),
    description: field(u.description),
    dueDate: field(u.dueDate),
    completed: field(u.completed),
    priority: field(u.priority),
  };
}

/** The document fields a patch sets; empty when nothing is set. */
export function patchFields(patch: TaskPatch): Partial<TaskDocument> {
  const out: Partial<TaskDocument> = {};
  if (patch.title.kind === 'set') out.title = patch.title.value;
  if (patch.description.kind === 'set') out.description = patch.description.value;
  if (patch.dueDate.kind === 'set') out.dueDate = patch.dueDate.value;
  if (patch.completed.kind === 'set') out.completed = patch.completed.value;
  if (patch.priority.kind === 'set') out.priority = patch.priority.value;
  return out;
}

function toTask(doc: WithId<TaskDocument>): Task {
  const { _id, ...rest } = doc;
  return { id: _id, ...rest };
}

export interface TaskStoreOptions {
  logger?: Logger;
  now?: () => Date;
}

/**
 * Tasks scoped by owner. Reads and writes always filter on `userId`, so a
 * foreign id looks exactly like a missing one.
 */
export class TaskStore {
  private logger: Logger;
  private now: () => Date;

  constructor(
    private collection: DocumentCollection<TaskDocument>,
    opts: TaskStoreOptions = {},
  ) {
    this.logger = opts.logger ?? createLogger('silent');
    this.now = opts.now ?? (() => new Date());
  }

  async list(userId: string, opts: ListTasksOptions = {}): Promise<Task[]> {
    const docs = await this.collection.find(
      { userId, completed: opts.completed },
      { skip: opts.skip ?? 0, limit: opts.limit ?? 100 },
    );
    return docs.map(toTask);
  }

  async create(userId: string, input: TaskCreate): Promise<Task> {
    const parsed = TaskCreateSchema.safeParse(input);
    if (!parsed.success) throw ValidationError.fromIssues('task', parsed.error.issues);
    const data = parsed.data;

    const now = this.now().toISOString();
    const doc: TaskDocument = {
      userId,
      title: data.title,
      completed: data.completed ?? false,
      createdAt: now,
      updatedAt: now,
    };
    if (data.description) doc.description = data.description;
    if (data.dueDate) doc.dueDate = data.dueDate;
    if (data.priority !== undefined) doc.priority = data.priority;

    const { insertedId } = await this.collection.insertOne(doc);
    this.logger.debug('task created', { id: insertedId, userId });
    return toTask({ ...doc, _id: insertedId });
  }

  async get(taskId: string, userId: string): Promise<Outcome<Task>> {
    if (!taskId || !userId) return notFound();
    try {
      const doc = await this.collection.findOne({ _id: parseDocumentId(taskId), userId });
      return doc ? found(toTask(doc)) : notFound();
    } catch (e) {
      this.logger.debug(`get ${taskId} folded to not-found`, errorMessage(e));
      return notFound();
    }
  }

  async update(taskId: string, userId: string, input: TaskUpdate): Promise<Outcome<Task>> {
    const patch = toTaskPatch(input);
    if (!taskId || !userId) return notFound();

    const fields = patchFields(patch);
    if (Object.keys(fields).length === 0) return this.get(taskId, userId);

    try {
      const { matchedCount } = await this.collection.updateOne(
        { _id: parseDocumentId(taskId), userId },
        { ...fields, updatedAt: this.now().toISOString() },
      );
      if (matchedCount === 0) return notFound();
    } catch (e) {
      this.logger.debug(`update ${taskId} folded to not-found`, errorMessage(e));
      return notFound();
    }
    return this.get(taskId, userId);
  }

  async delete(taskId: string, userId: string): Promise<boolean> {
    if (!taskId || !userId) return false;
    try {
      const { deletedCount } = await this.collection.deleteOne({ _id: parseDocumentId(taskId), userId });
      return deletedCount > 0;
    } catch (e) {
      this.logger.debug(`delete ${taskId} folded to false`, errorMessage(e));
      return false;
    }
  }
}
