/**
 * Issue model schemas: the core data structure of issuedeck.
 *
 * An issue is a unit of work (task, bug, feature, …) with a priority, a
 * status and an open metadata map. Issues are persisted one JSON record per
 * line in `issues.jsonl`; field names are snake_case both on disk and in the
 * inferred TypeScript types, so one shape is used everywhere.
 *
 * Optional fields are stored as `null` when absent.
 *
 * @module issue-schema
 */
import { z } from 'zod'

/**
 * All valid statuses an issue can occupy.
 *
 * Unlike a state machine, any status may be set from any other. The
 * `blocked` status is a manual marker and is independent of the
 * dependency-derived blocked state reported by `getBlockedIssues`.
 *
 * @category Issue Model
 * @group Issue
 */
export const IssueStatusSchema = z.enum([
  'open',
  'in_progress',
  'blocked',
  'closed',
  'completed',
  'pending_user_input',
])

/**
 * An issue status string literal union. Derived from {@link IssueStatusSchema}.
 *
 * @category Issue Model
 * @group Issue
 */
export type IssueStatus = z.infer<typeof IssueStatusSchema>

/**
 * Legacy status spellings accepted on input and rewritten before storage.
 *
 * @category Issue Model
 * @group Issue
 */
export const STATUS_ALIASES: Readonly<Record<string, IssueStatus>> = {
  done: 'completed',
  waiting: 'pending_user_input',
}

/**
 * Statuses under which an issue no longer blocks its dependents.
 *
 * @category Issue Model
 * @group Issue
 */
export const RESOLVED_STATUSES: ReadonlySet<IssueStatus> = new Set<IssueStatus>([
  'closed',
  'completed',
])

/**
 * Accepts a status or one of its {@link STATUS_ALIASES} and yields the
 * canonical {@link IssueStatus}.
 *
 * @category Issue Model
 * @group Issue
 */
export const NormalizedStatusSchema = z
  .string()
  .transform((s) => STATUS_ALIASES[s] ?? s)
  .pipe(IssueStatusSchema)

/** @category Issue Model */
export const IssueTypeSchema = z.enum(['bug', 'feature', 'task', 'epic', 'chore'])
/** @category Issue Model */
export type IssueType = z.infer<typeof IssueTypeSchema>

/**
 * Issue priority: an integer from 0 (highest) to 4 (lowest).
 *
 * @category Issue Model
 * @group Issue
 */
export const PrioritySchema = z
  .number()
  .int('Priority must be an integer')
  .min(0, 'Priority must be 0-4')
  .max(4, 'Priority must be 0-4')

/** A value that survives `JSON.stringify` and `JSON.parse` unchanged in kind. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

/** @category Issue Model */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
)

/**
 * Open string-keyed map attached to an issue; merged on update. Values must be
 * JSON. Reference cycles are rejected before the recursive check walks them.
 */
export const MetadataSchema = z
  .record(z.string(), z.unknown())
  .superRefine((value, ctx) => {
    if (hasCycle(value, new Set())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Metadata must not contain circular references' })
    }
  })
  .pipe(z.record(z.string(), JsonValueSchema))

function hasCycle(value: unknown, ancestors: Set<object>): boolean {
  if (typeof value !== 'object' || value === null) {
    return false
  }
  if (ancestors.has(value)) {
    return true
  }
  ancestors.add(value)
  const found = Object.values(value).some((child) => hasCycle(child, ancestors))
  ancestors.delete(value)
  return found
}
/** @category Issue Model */
export type Metadata = z.infer<typeof MetadataSchema>

/**
 * A tracked unit of work.
 *
 * Key fields for scheduling:
 * - `status`: only `open` issues can be ready
 * - `priority`: ready issues are ordered by priority, then `created_at`
 *
 * Provenance fields (`parent_id`, `discovered_from`) are informational; the
 * dependency graph lives in `dependencies.jsonl`, not on the issue.
 *
 * @category Issue Model
 * @group Issue
 */
export const IssueSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string().default(''),
  status: NormalizedStatusSchema,
  priority: PrioritySchema,
  issue_type: IssueTypeSchema,
  assignee: z.string().nullable().default(null),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
  closed_at: z.string().datetime().nullable().default(null),
  parent_id: z.string().nullable().default(null),
  discovered_from: z.string().nullable().default(null),
  /** Free text describing what is holding the issue up. */
  blocking_notes: z.string().nullable().default(null),
  metadata: MetadataSchema.default({}),
})

/**
 * A validated issue. Derived from {@link IssueSchema}.
 *
 * @category Issue Model
 * @group Issue
 */
export type Issue = z.infer<typeof IssueSchema>
