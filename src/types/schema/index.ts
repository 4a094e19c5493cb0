/**
 * Schema barrel: re-exports all Zod schemas and their inferred types.
 *
 * All Zod schemas live in this directory (`src/types/schema/`) and are
 * re-exported here for convenience.
 *
 * @module Schemas
 */

// ── Issue Model ──────────────────────────────────────────────────────────────
export {
  IssueStatusSchema,
  type IssueStatus,
  STATUS_ALIASES,
  RESOLVED_STATUSES,
  NormalizedStatusSchema,
  IssueTypeSchema,
  type IssueType,
  PrioritySchema,
  JsonValueSchema,
  type JsonValue,
  MetadataSchema,
  type Metadata,
  IssueSchema,
  type Issue,
} from './issue-schema'

// ── Dependencies ─────────────────────────────────────────────────────────────
export {
  DepTypeSchema,
  type DepType,
  DependencySchema,
  type Dependency,
} from './dependency-schema'

// ── Events ───────────────────────────────────────────────────────────────────
export {
  type FieldChange,
  UpdatedChangesSchema,
  type UpdatedChanges,
  IssueEventSchema,
  type IssueEvent,
  type EventType,
  type EventPayload,
} from './event-schema'

// ── Locking ──────────────────────────────────────────────────────────────────
export { LockInfoSchema, type LockInfo } from './lock-schema'

// ── Configuration ────────────────────────────────────────────────────────────
export { ConfigSchema, type Config } from './config-schema'
