import { z } from 'zod';

export interface Task {
  /** Store-assigned id (opaque). */
  id: string;
  /** Owner. */
  userId: string;
  title: string;
  description?: string;
  /** ISO timestamp. */
  dueDate?: string;
  completed: boolean;
  priority?: number;
  createdAt: string; // ISO
  updatedAt?: string; // ISO
}

const dueDate = z.coerce.date().transform((d) => d.toISOString());

export const TaskCreateSchema = z.object({
  title: z.string().trim().min(1, 'title must not be empty'),
  description: z.string().optional(),
  dueDate: dueDate.optional(),
  completed: z.boolean().optional(),
  priority: z.number().int().optional(),
});

/** `null` on any field means "leave unchanged", same as omitting it. */
export const TaskUpdateSchema = z.object({
  title: z.string().trim().min(1, 'title must not be empty').nullable().optional(),
  description: z.string().nullable().optional(),
  dueDate: dueDate.nullable().optional(),
  completed: z.boolean().nullable().optional(),
  priority: z.number().int().nullable().optional(),
});

export type TaskCreate = z.input<typeof TaskCreateSchema>;
export type TaskUpdate = z.input<typeof TaskUpdateSchema>;

export interface ListTasksOptions {
  skip?: number;
  limit?: number;
  completed?: boolean;
}

/** A normalized calendar occurrence. Absent provider data is `''` or `[]`, never null. */
export interface CalendarEvent {
  /** Provider-assigned id. */
  id: string;
  summary: string;
  description: string;
  /** Instant or bare date, exactly as the provider returned it. */
  start: string;
  end: string;
  location: string;
  status: string;
  /** Organizer email. */
  organizer: string;
  /** Attendee emails in provider order. */
  attendees: string[];
}

/** Caller-facing event: `status` is never empty. */
export type EventResponse = CalendarEvent;

export const EventDetailsSchema = z.object({
  eventText: z.string(),
  date: z.string().optional(),
  time: z.string().optional(),
  location: z.string().optional(),
  attendees: z.array(z.string()).optional(),
  duration: z.string().optional(),
  recurrence: z.string().optional(),
  notes: z.string().optional(),
});

export const EventRequestSchema = z.object({
  eventDetails: EventDetailsSchema,
  targetStart: z.string().optional(),
  userId: z.string().min(1),
});

export type EventDetails = z.infer<typeof EventDetailsSchema>;
export type EventRequest = z.infer<typeof EventRequestSchema>;

export type RefusalReason = 'not-found' | 'permission-denied';

export interface Refusal {
  ok: false;
  reason: RefusalReason;
  message: string;
}

/** Expected, caller-recoverable outcomes are values, not exceptions. */
export type Outcome<T> = { ok: true; value: T } | Refusal;

export const found = <T>(value: T): Outcome<T> => ({ ok: true, value });

export const notFound = (message = 'Task not found'): Refusal => ({ ok: false, reason: 'not-found', message });

export const permissionDenied = (
  message = 'User ID in request does not match authenticated user',
): Refusal => ({ ok: false, reason: 'permission-denied', message });
