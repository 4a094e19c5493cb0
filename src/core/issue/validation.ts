import { err, ok, type Result } from 'neverthrow'
import { z } from 'zod'
import {
  IssueTypeSchema,
  MetadataSchema,
  NormalizedStatusSchema,
  PrioritySchema,
  ValidationError,
} from '@/types'

/**
 * Arguments accepted by `IssueManager.create`.
 *
 * Enum-valued fields are typed as plain strings because callers (tool
 * adapters, the CLI) pass through untyped input; they are checked against
 * their schemas before the lock is taken.
 *
 * @category Issue Model
 */
export interface CreateIssueInput {
  title: string
  description?: string
  /** 0 (highest) to 4. Defaults to 2. */
  priority?: number
  /** bug | feature | task | epic | chore. Defaults to `task`. */
  issue_type?: string
  assignee?: string | null
  parent_id?: string | null
  discovered_from?: string | null
  /** Values must be JSON. */
  metadata?: Record<string, unknown>
}

/**
 * Fields accepted by `IssueManager.update`. A field is "supplied" when its key
 * is present with a value other than `undefined`; `null` clears an optional
 * field.
 *
 * @category Issue Model
 */
export interface UpdateIssueInput {
  title?: string
  description?: string
  /** Any status, or the legacy aliases `done` / `waiting`. */
  status?: string
  priority?: number
  assignee?: string | null
  blocking_notes?: string | null
  /** Merged into the existing metadata, key by key. */
  metadata?: Record<string, unknown>
}

/**
 * Conjunctive filters for `IssueManager.list`; omitted keys match everything.
 *
 * @category Issue Model
 */
export interface ListIssuesFilter {
  status?: string
  priority?: number
  issue_type?: string
  assignee?: string
}

const requiredText = (field: string) =>
  z.string({ required_error: `${field} is required` }).refine((s) => s.trim().length > 0, {
    message: `${field} is required`,
  })

export const CreateIssueInputSchema = z.object({
  title: requiredText('title'),
  description: z.string().default(''),
  priority: PrioritySchema.default(2),
  issue_type: IssueTypeSchema.default('task'),
  assignee: z.string().nullable().default(null),
  parent_id: z.string().nullable().default(null),
  discovered_from: z.string().nullable().default(null),
  metadata: MetadataSchema.default({}),
})

export const UpdateIssueInputSchema = z.object({
  title: requiredText('title').optional(),
  description: z.string().optional(),
  status: NormalizedStatusSchema.optional(),
  priority: PrioritySchema.optional(),
  assignee: z.string().nullable().optional(),
  blocking_notes: z.string().nullable().optional(),
  metadata: MetadataSchema.optional(),
})

export const ListIssuesFilterSchema = z.object({
  status: NormalizedStatusSchema.optional(),
  priority: z.number().int().optional(),
  issue_type: IssueTypeSchema.optional(),
  assignee: z.string().optional(),
})

export const LimitSchema = z.number().int().nonnegative().optional()

/**
 * Checks that an identifier argument is a non-blank string.
 *
 * @param field - Argument name used in the error message (`from_id`, `session_id`, …).
 * @category Validation
 */
export function requireId(field: string, value: string): Result<string, ValidationError> {
  return validate(requiredText(field), value)
}

/**
 * Renders a {@link z.ZodError} as one line: `path: message; path: message`.
 *
 * @category Validation
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/**
 * Parses `input` with `schema`, mapping failure to {@link ValidationError}.
 *
 * @returns `ok(parsed)` on success, `err(ValidationError)` carrying the
 *   formatted issues and the original `ZodError` as `cause`.
 * @category Validation
 */
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
): Result<T, ValidationError> {
  const parsed = schema.safeParse(input)
  return parsed.success
    ? ok(parsed.data)
    : err(new ValidationError(formatZodError(parsed.error), parsed.error))
}
