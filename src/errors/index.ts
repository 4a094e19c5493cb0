/**
 * Domain error classes: typed failures for issuedeck's core operations.
 *
 * The engine uses neverthrow's `Result`/`ResultAsync` throughout, so these
 * errors appear in `err()` values rather than being thrown. The one exception
 * is the CLI boundary (`src/index.ts`), where they are logged and turned into
 * an exit code.
 *
 * @module Errors
 */

/**
 * Input rejected before any lock is taken: priority out of range, unknown
 * status / issue type / dependency type, or a missing identifier.
 *
 * @category Errors
 */
export class ValidationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'ValidationError'
  }
}

/**
 * An issue id or dependency edge that the freshly loaded index does not
 * contain. Raised before anything is persisted.
 *
 * @category Errors
 */
export class NotFoundError extends Error {
  constructor(
    public readonly resource: 'issue' | 'dependency',
    public readonly key: string,
  ) {
    super(
      resource === 'issue'
        ? `Issue not found: ${key}`
        : `Dependency not found: ${key}`,
    )
    this.name = 'NotFoundError'
  }
}

/**
 * Adding `fromId → toId` would close a cycle in the dependency graph.
 * The graph is left untouched.
 *
 * @category Errors
 */
export class DependencyCycleError extends Error {
  constructor(
    public readonly fromId: string,
    public readonly toId: string,
  ) {
    super(`Dependency would create a cycle: ${fromId} -> ${toId}`)
    this.name = 'DependencyCycleError'
  }
}

/**
 * An edge for the same `(fromId, toId)` pair already exists. Edges are never
 * edited in place; remove the existing one first to change its type.
 *
 * @category Errors
 */
export class DuplicateDependencyError extends Error {
  constructor(
    public readonly fromId: string,
    public readonly toId: string,
  ) {
    super(`Dependency already exists: ${fromId} -> ${toId}`)
    this.name = 'DuplicateDependencyError'
  }
}

/**
 * The data directory lock was not acquired within the configured bound.
 * The caller decides whether to retry.
 *
 * @category Errors
 */
export class LockTimeoutError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number,
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`)
    this.name = 'LockTimeoutError'
  }
}

/**
 * Wraps filesystem failures from reading or writing the data directory.
 *
 * The optional `cause` preserves the original error for debugging while the
 * message says which file and operation failed.
 *
 * @category Errors
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, { cause })
    this.name = 'StorageError'
  }
}

/**
 * A complete persisted line that is not valid JSON or does not match its
 * schema. Corrupt records are never skipped.
 *
 * @category Errors
 */
export class CorruptRecordError extends StorageError {
  constructor(
    path: string,
    public readonly line: number,
    public readonly reason: string,
  ) {
    super(`Corrupt record at ${path}:${line}: ${reason}`, path)
    this.name = 'CorruptRecordError'
  }
}

/**
 * Every failure an issuedeck operation can report.
 *
 * @category Errors
 */
export type IssueError =
  | ValidationError
  | NotFoundError
  | DependencyCycleError
  | DuplicateDependencyError
  | LockTimeoutError
  | StorageError
