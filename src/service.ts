import type { CalendarAdapter, ListEventsParams } from './calendar/adapter.js';
import { ValidationError } from './errors.js';
import type { Logger } from './log.js';
import { createLogger } from './log.js';
import {
  EventRequestSchema,
  found,
  permissionDenied,
  type CalendarEvent,
  type EventResponse,
  type ListTasksOptions,
  type Outcome,
  type Task,
  type TaskCreate,
  type TaskUpdate,
} from './model.js';
import type { TaskStore } from './store/taskStore.js';

export interface ReconciliationServiceOptions {
  logger?: Logger;
  /** Calendar the event operations target (default: primary). */
  calendarId?: string;
}

const RequestOwnerSchema = EventRequestSchema.pick({ userId: true });

function toEventResponse(e: CalendarEvent): EventResponse {
  return { ...e, status: e.status || 'confirmed' };
}

/**
 * Caller-facing façade. Task operations are scoped to the acting user;
 * event requests are refused unless they name that same user.
 */
export class ReconciliationService {
  private logger: Logger;
  private calendarId: string;

  constructor(
    private tasks: TaskStore,
    private calendar: CalendarAdapter,
    opts: ReconciliationServiceOptions = {},
  ) {
    this.logger = opts.logger ?? createLogger('silent');
    this.calendarId = opts.calendarId ?? 'primary';
  }

  listTasks(userId: string, opts: ListTasksOptions = {}): Promise<Task[]> {
    return this.tasks.list(userId, opts);
  }

  createTask(userId: string, input: TaskCreate): Promise<Task> {
    return this.tasks.create(userId, input);
  }

  getTask(taskId: string, userId: string): Promise<Outcome<Task>> {
    return this.tasks.get(taskId, userId);
  }

  updateTask(taskId: string, userId: string, input: TaskUpdate): Promise<Outcome<Task>> {
    return this.tasks.update(taskId, userId, input);
  }

  deleteTask(taskId: string, userId: string): Promise<boolean> {
    return this.tasks.delete(taskId, userId);
  }

  /**
   * Upcoming events for `callerId`. The request's own `userId` is only
   * compared against the caller; a mismatch is refused before the rest of the
   * payload is looked at and before any provider call. `targetStart`, when it
   * parses as a date, becomes the window's lower bound.
   */
  async listEvents(request: unknown, callerId: string): Promise<Outcome<EventResponse[]>> {
    const owner = RequestOwnerSchema.safeParse(request);
    if (!owner.success) throw ValidationError.fromIssues('event request', owner.error.issues);
    if (owner.data.userId !== callerId) {
      this.logger.warn('event request refused: user mismatch', { callerId });
      return permissionDenied();
    }

    const parsed = EventRequestSchema.safeParse(request);
    if (!parsed.success) throw ValidationError.fromIssues('event request', parsed.error.issues);

    const params: ListEventsParams = { calendarId: this.calendarId };
    const target = parsed.data.targetStart;
    if (target && !Number.isNaN(Date.parse(target))) params.timeMin = target;

    const events = await this.calendar.listEvents(params);
    return found(events.map(toEventResponse));
  }
}
