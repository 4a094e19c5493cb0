/**
 * Issue event schemas: the append-only audit log.
 *
 * Every mutation appends one {@link IssueEvent} to `events.jsonl` after the
 * mutation has been committed. Events are never rewritten or deleted; their
 * order in the file is the only ordering the log guarantees.
 *
 * The `changes` payload is a tagged variant keyed on `event_type`, so each
 * event kind carries a structured delta rather than an untyped map while the
 * on-disk JSON keeps the flat `{ event_type, changes }` shape.
 *
 * @module event-schema
 */
import { z } from 'zod'
import { DepTypeSchema } from './dependency-schema'
import {
  IssueSchema,
  MetadataSchema,
  NormalizedStatusSchema,
  PrioritySchema,
} from './issue-schema'

/**
 * An `{ old, new }` pair recorded for one updated field.
 *
 * @category Events
 */
export type FieldChange<T> = { old: T; new: T }

function fieldChange<T extends z.ZodTypeAny>(schema: T) {
  return z.object({ old: schema, new: schema })
}

/**
 * Delta recorded by an `updated` event: one entry per field the caller
 * supplied, whether or not its value actually changed.
 *
 * @category Events
 * @group Events
 */
export const UpdatedChangesSchema = z.object({
  title: fieldChange(z.string()).optional(),
  description: fieldChange(z.string()).optional(),
  status: fieldChange(NormalizedStatusSchema).optional(),
  priority: fieldChange(PrioritySchema).optional(),
  assignee: fieldChange(z.string().nullable()).optional(),
  blocking_notes: fieldChange(z.string().nullable()).optional(),
  metadata: fieldChange(MetadataSchema).optional(),
})

/** @category Events */
export type UpdatedChanges = z.infer<typeof UpdatedChangesSchema>

const EventBaseSchema = z.object({
  id: z.string().min(1),
  issue_id: z.string().min(1),
  actor: z.string(),
  timestamp: z.string().datetime(),
  /** External session that produced the event, if the manager was given one. */
  session_id: z.string().nullable().default(null),
})

/**
 * A single audit record.
 *
 * | event_type           | changes                          |
 * | -------------------- | -------------------------------- |
 * | `created`            | `{ issue }` full snapshot        |
 * | `updated`            | {@link UpdatedChanges}           |
 * | `closed`             | `{ reason }`                     |
 * | `dependency_added`   | `{ from_id, to_id, dep_type }`   |
 * | `dependency_removed` | `{ from_id, to_id }`             |
 * | `session_ended`      | `{ reason }`                     |
 *
 * @category Events
 * @group Events
 */
export const IssueEventSchema = z.discriminatedUnion('event_type', [
  EventBaseSchema.extend({
    event_type: z.literal('created'),
    changes: z.object({ issue: IssueSchema }),
  }),
  EventBaseSchema.extend({
    event_type: z.literal('updated'),
    changes: UpdatedChangesSchema,
  }),
  EventBaseSchema.extend({
    event_type: z.literal('closed'),
    changes: z.object({ reason: z.string() }),
  }),
  EventBaseSchema.extend({
    event_type: z.literal('dependency_added'),
    changes: z.object({
      from_id: z.string(),
      to_id: z.string(),
      dep_type: DepTypeSchema,
    }),
  }),
  EventBaseSchema.extend({
    event_type: z.literal('dependency_removed'),
    changes: z.object({ from_id: z.string(), to_id: z.string() }),
  }),
  EventBaseSchema.extend({
    event_type: z.literal('session_ended'),
    changes: z.object({ reason: z.string() }),
  }),
])

/**
 * A validated audit record. Derived from {@link IssueEventSchema}.
 *
 * @category Events
 * @group Events
 */
export type IssueEvent = z.infer<typeof IssueEventSchema>

/** @category Events */
export type EventType = IssueEvent['event_type']

type DistributivePick<T, K extends keyof T> = T extends unknown ? Pick<T, K> : never

/**
 * The event-specific part of an {@link IssueEvent}: `event_type` together
 * with its matching `changes` variant.
 *
 * @category Events
 */
export type EventPayload = DistributivePick<IssueEvent, 'event_type' | 'changes'>
