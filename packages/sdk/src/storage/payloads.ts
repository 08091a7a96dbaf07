/**
 * Entity payload shapes, one per collection
 * @module storage/payloads
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';

/**
 * Entity collections kept in sync
 */
export const COLLECTIONS = ['tasks', 'events', 'ledger_entries'] as const;

export type CollectionName = (typeof COLLECTIONS)[number];

/**
 * Task statuses, lowest priority first
 */
export const TASK_STATUSES = ['open', 'pendingApproval', 'done'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

const isoDateTime = z.string().datetime({ offset: true });

export const taskPayloadSchema = z
  .object({
    title: z.string().min(1),
    description: z.string().optional(),
    status: z.enum(TASK_STATUSES).default('open'),
    assignees: z.array(z.string().min(1)).default([]),
    points: z.number().int().nonnegative().default(0),
    dueAt: isoDateTime.nullable().optional(),
    category: z.string().optional(),
  })
  .passthrough();

export const eventPayloadSchema = z
  .object({
    title: z.string().min(1),
    description: z.string().optional(),
    start: isoDateTime,
    end: isoDateTime.nullable().optional(),
    allDay: z.boolean().default(false),
    attendees: z.array(z.string().min(1)).default([]),
  })
  .passthrough()
  .superRefine((event, ctx) => {
    if (event.end && Date.parse(event.end) < Date.parse(event.start)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['end'],
        message: 'end must not be before start',
      });
    }
  });

export const ledgerEntryPayloadSchema = z
  .object({
    userId: z.string().min(1),
    delta: z.number().int(),
    reason: z.string().min(1),
    taskId: z.string().nullable().optional(),
  })
  .passthrough();

export type TaskPayload = z.output<typeof taskPayloadSchema>;
export type EventPayload = z.output<typeof eventPayloadSchema>;
export type LedgerEntryPayload = z.output<typeof ledgerEntryPayloadSchema>;

export interface PayloadByCollection {
  tasks: TaskPayload;
  events: EventPayload;
  ledger_entries: LedgerEntryPayload;
}

/**
 * Payload of one collection, tagged with its collection name
 */
export type EntityPayload = {
  [C in CollectionName]: { collection: C; payload: PayloadByCollection[C] };
}[CollectionName];

/**
 * Fields accepted by a write. Missing fields keep their current value.
 */
export type PayloadPatch<C extends CollectionName> = Partial<PayloadByCollection[C]> &
  Record<string, unknown>;

const payloadSchemas: {
  [C in CollectionName]: z.ZodType<PayloadByCollection[C], z.ZodTypeDef, unknown>;
} = {
  tasks: taskPayloadSchema,
  events: eventPayloadSchema,
  ledger_entries: ledgerEntryPayloadSchema,
};

export function isCollectionName(value: string): value is CollectionName {
  return COLLECTIONS.some((collection) => collection === value);
}

/**
 * Parses a payload for the collection, or returns the issues found
 */
export function safeParsePayload<C extends CollectionName>(
  collection: C,
  input: unknown
): { success: true; data: PayloadByCollection[C] } | { success: false; error: ValidationError } {
  const result = payloadSchemas[collection].safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const summary = issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('; ');

  return {
    success: false,
    error: new ValidationError(`Invalid ${collection} payload: ${summary}`, issues),
  };
}

/**
 * Parses a payload for the collection
 *
 * @throws ValidationError when the payload does not match the collection shape
 */
export function parsePayload<C extends CollectionName>(
  collection: C,
  input: unknown
): PayloadByCollection[C] {
  const result = safeParsePayload(collection, input);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
