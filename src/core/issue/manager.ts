import { randomUUID } from 'crypto'
import { err, ok, okAsync, errAsync, type Result, ResultAsync } from 'neverthrow'
import {
  type Dependency,
  DependencyCycleError,
  DepTypeSchema,
  DuplicateDependencyError,
  type EventPayload,
  type EventType,
  type Issue,
  type IssueError,
  type IssueEvent,
  NotFoundError,
  type StorageError,
  type UpdatedChanges,
} from '@/types'
import {
  type BlockedIssue,
  detectCycle,
  getBlockedIssues,
  getReadyIssues,
} from '@/core/issue/algorithms'
import { IssueIndex } from '@/core/issue/issue-index'
import { DirectoryLock } from '@/core/issue/lock'
import { IssueStorage } from '@/core/issue/storage'
import {
  type CreateIssueInput,
  CreateIssueInputSchema,
  LimitSchema,
  type ListIssuesFilter,
  ListIssuesFilterSchema,
  requireId,
  type UpdateIssueInput,
  UpdateIssueInputSchema,
  validate,
} from '@/core/issue/validation'
import { createLogger } from '@/utils/logger'

const logger = createLogger('manager')

/** @category Issue Manager */
export interface IssueManagerOptions {
  /** Directory holding the JSONL files and the lock. Created on first write. */
  dataDir: string
  /** Recorded as `actor` on every event. Defaults to `'system'`. */
  actor?: string
  /** Recorded as `session_id` on every event. Empty or absent means none. */
  sessionId?: string | null
  lockTimeoutMs?: number
  lockPollMs?: number
  /** Clock used for every timestamp. */
  now?: () => Date
  /** Source of issue and event ids. Defaults to `crypto.randomUUID`. */
  generateId?: () => string
}

/**
 * Which sessions have touched an issue, from its event history.
 *
 * @category Issue Manager
 */
export interface IssueSessions {
  issue_id: string
  /** Distinct session ids, sorted. */
  linked_sessions: string[]
  session_count: number
  /** Event types each session produced, in log order. */
  events_by_session: Record<string, EventType[]>
}

interface PendingEvent {
  issueId: string
  payload: EventPayload
}

/** Outcome of a mutation, persisted before the lock is released. */
interface Commit<T> {
  value: T
  save: 'issues' | 'dependencies'
  events: PendingEvent[]
}

function committed<T>(
  value: T,
  save: Commit<T>['save'],
  ...events: PendingEvent[]
): Result<Commit<T>, never> {
  return ok({ value, save, events })
}

function fromResult<T, E>(result: Result<T, E>): ResultAsync<T, E> {
  return result.isOk() ? okAsync(result.value) : errAsync(result.error)
}

/**
 * Issue tracker over one data directory.
 *
 * Each operation is its own transaction: take the directory lock, load a
 * fresh {@link IssueIndex} from storage, apply, persist the collection that
 * changed, release. Nothing is cached between operations, so several
 * managers (in one process or many) can share a directory. Input is
 * validated before the lock is taken; a failure after loading leaves storage
 * untouched.
 *
 * Events are appended after the lock is released. An append that fails is
 * logged and does not undo the committed mutation.
 *
 * Every operation returns a `ResultAsync`; failures are {@link IssueError}
 * values, never thrown.
 *
 * @example
 * const manager = new IssueManager({ dataDir: '.issuedeck', sessionId: 's1' })
 * const created = await manager.create({ title: 'Write docs', priority: 1 })
 * if (created.isErr()) logger.error({ err: created.error }, 'create failed')
 *
 * @category Issue Manager
 */
export class IssueManager {
  readonly dataDir: string
  readonly actor: string
  readonly sessionId: string | null
  private readonly storage: IssueStorage
  private readonly lock: DirectoryLock
  private readonly now: () => Date
  private readonly generateId: () => string

  constructor(opts: IssueManagerOptions) {
    this.dataDir = opts.dataDir
    this.actor = opts.actor ?? 'system'
    this.sessionId = opts.sessionId ? opts.sessionId : null
    this.storage = new IssueStorage(opts.dataDir)
    this.lock = new DirectoryLock(opts.dataDir, {
      timeoutMs: opts.lockTimeoutMs,
      pollMs: opts.lockPollMs,
    })
    this.now = opts.now ?? (() => new Date())
    this.generateId = opts.generateId ?? randomUUID
  }

  // ── Issues ────────────────────────────────────────────────────────────────

  /** Creates an `open` issue and emits `created` with the full record. */
  create(input: CreateIssueInput): ResultAsync<Issue, IssueError> {
    return validate(CreateIssueInputSchema, input).asyncAndThen((fields) => {
      const timestamp = this.timestamp()
      const issue: Issue = {
        id: this.generateId(),
        title: fields.title,
        description: fields.description,
        status: 'open',
        priority: fields.priority,
        issue_type: fields.issue_type,
        assignee: fields.assignee,
        created_at: timestamp,
        updated_at: timestamp,
        closed_at: null,
        parent_id: fields.parent_id,
        discovered_from: fields.discovered_from,
        blocking_notes: null,
        metadata: fields.metadata,
      }
      return this.transact<Issue>((index) => {
        index.addIssue(issue)
        logger.info({ id: issue.id, title: issue.title }, 'issue created')
        return committed(issue, 'issues', {
          issueId: issue.id,
          payload: { event_type: 'created', changes: { issue } },
        })
      })
    })
  }

  /** @returns the issue, or `null` when no issue has this id. */
  get(id: string): ResultAsync<Issue | null, IssueError> {
    return requireId('issue_id', id).asyncAndThen(() =>
      this.read((index) => ok(index.getIssue(id) ?? null)),
    )
  }

  /**
   * Applies the supplied fields and emits `updated` with an `{ old, new }`
   * pair for each of them. `metadata` is merged key by key; `updated_at` is
   * refreshed even when nothing changed.
   */
  update(id: string, patch: UpdateIssueInput): ResultAsync<Issue, IssueError> {
    return requireId('issue_id', id)
      .andThen(() => validate(UpdateIssueInputSchema, patch))
      .asyncAndThen((fields) =>
        this.transact<Issue>((index) => {
          const current = index.getIssue(id)
          if (!current) {
            return err(new NotFoundError('issue', id))
          }
          const next: Issue = { ...current }
          const changes: UpdatedChanges = {}

          if (fields.title !== undefined) {
            changes.title = { old: current.title, new: fields.title }
            next.title = fields.title
          }
          if (fields.description !== undefined) {
            changes.description = { old: current.description, new: fields.description }
            next.description = fields.description
          }
          if (fields.status !== undefined) {
            changes.status = { old: current.status, new: fields.status }
            next.status = fields.status
          }
          if (fields.priority !== undefined) {
            changes.priority = { old: current.priority, new: fields.priority }
            next.priority = fields.priority
          }
          if (fields.assignee !== undefined) {
            changes.assignee = { old: current.assignee, new: fields.assignee }
            next.assignee = fields.assignee
          }
          if (fields.blocking_notes !== undefined) {
            changes.blocking_notes = { old: current.blocking_notes, new: fields.blocking_notes }
            next.blocking_notes = fields.blocking_notes
          }
          if (fields.metadata !== undefined) {
            const merged = { ...current.metadata, ...fields.metadata }
            changes.metadata = { old: current.metadata, new: merged }
            next.metadata = merged
          }
          next.updated_at = this.timestamp()

          index.addIssue(next)
          logger.info({ id, fields: Object.keys(changes) }, 'issue updated')
          return committed(next, 'issues', {
            issueId: id,
            payload: { event_type: 'updated', changes },
          })
        }),
      )
  }

  /** Sets status `closed` and `closed_at`, and emits `closed` with `reason`. */
  close(id: string, reason = 'Completed'): ResultAsync<Issue, IssueError> {
    return requireId('issue_id', id).asyncAndThen(() =>
      this.transact<Issue>((index) => {
        const current = index.getIssue(id)
        if (!current) {
          return err(new NotFoundError('issue', id))
        }
        const timestamp = this.timestamp()
        const next: Issue = { ...current, status: 'closed', closed_at: timestamp, updated_at: timestamp }
        index.addIssue(next)
        logger.info({ id, reason }, 'issue closed')
        return committed(next, 'issues', {
          issueId: id,
          payload: { event_type: 'closed', changes: { reason } },
        })
      }),
    )
  }

  /** Issues matching every supplied filter, in storage order. */
  list(filter: ListIssuesFilter = {}): ResultAsync<Issue[], IssueError> {
    return validate(ListIssuesFilterSchema, filter).asyncAndThen((f) =>
      this.read((index) => ok(index.listIssues(f))),
    )
  }

  // ── Dependencies ──────────────────────────────────────────────────────────

  /**
   * Records that `fromId` is blocked by `toId`.
   *
   * Fails with {@link NotFoundError} if either issue is missing,
   * {@link DuplicateDependencyError} if the pair already has an edge, and
   * {@link DependencyCycleError} if `toId` already reaches `fromId`.
   */
  addDependency(fromId: string, toId: string, depType = 'blocks'): ResultAsync<Dependency, IssueError> {
    return requireId('from_id', fromId)
      .andThen(() => requireId('to_id', toId))
      .andThen(() => validate(DepTypeSchema, depType))
      .asyncAndThen((type) =>
        this.transact<Dependency>((index) => {
          for (const id of [fromId, toId]) {
            if (!index.getIssue(id)) {
              return err(new NotFoundError('issue', id))
            }
          }
          if (index.hasDependency(fromId, toId)) {
            return err(new DuplicateDependencyError(fromId, toId))
          }
          if (detectCycle(index, fromId, toId)) {
            logger.warn({ fromId, toId }, 'rejected dependency that would form a cycle')
            return err(new DependencyCycleError(fromId, toId))
          }
          const dep: Dependency = {
            from_id: fromId,
            to_id: toId,
            dep_type: type,
            created_at: this.timestamp(),
          }
          index.addDependency(dep)
          logger.info({ fromId, toId, depType: type }, 'dependency added')
          return committed(dep, 'dependencies', {
            issueId: fromId,
            payload: {
              event_type: 'dependency_added',
              changes: { from_id: fromId, to_id: toId, dep_type: type },
            },
          })
        }),
      )
  }

  /** Removes the edge `fromId → toId`; {@link NotFoundError} if there is none. */
  removeDependency(fromId: string, toId: string): ResultAsync<void, IssueError> {
    return requireId('from_id', fromId)
      .andThen(() => requireId('to_id', toId))
      .asyncAndThen(() =>
        this.transact<void>((index) => {
          if (!index.removeDependency(fromId, toId)) {
            return err(new NotFoundError('dependency', `${fromId} -> ${toId}`))
          }
          logger.info({ fromId, toId }, 'dependency removed')
          return committed(undefined, 'dependencies', {
            issueId: fromId,
            payload: { event_type: 'dependency_removed', changes: { from_id: fromId, to_id: toId } },
          })
        }),
      )
  }

  /** Issues that `id` is blocked by. */
  getDependencies(id: string): ResultAsync<Issue[], IssueError> {
    return this.resolveNeighbours(id, (index) => index.getBlockers(id))
  }

  /** Issues blocked by `id`. */
  getDependents(id: string): ResultAsync<Issue[], IssueError> {
    return this.resolveNeighbours(id, (index) => index.getDependents(id))
  }

  // ── Scheduling ────────────────────────────────────────────────────────────

  /** Open issues with no unresolved blocker; see {@link getReadyIssues}. */
  getReadyIssues(limit?: number): ResultAsync<Issue[], IssueError> {
    return validate(LimitSchema, limit).asyncAndThen((n) =>
      this.read((index) => ok(getReadyIssues(index, n))),
    )
  }

  /** Issues with at least one unresolved blocker; see {@link getBlockedIssues}. */
  getBlockedIssues(): ResultAsync<BlockedIssue[], IssueError> {
    return this.read((index) => ok(getBlockedIssues(index)))
  }

  // ── History ───────────────────────────────────────────────────────────────

  /**
   * Events recorded for `id`, in log order. Reads the log without the lock,
   * so an append in flight in another process may be missing.
   */
  getIssueEvents(id: string): ResultAsync<IssueEvent[], IssueError> {
    return fromResult(
      requireId('issue_id', id)
        .andThen(() => this.storage.loadEvents())
        .map((events) => events.filter((e) => e.issue_id === id)),
    )
  }

  /** Groups the issue's events by the session that produced them. */
  getIssueSessions(id: string): ResultAsync<IssueSessions, IssueError> {
    return this.get(id)
      .andThen((issue) => (issue ? okAsync(issue) : errAsync(new NotFoundError('issue', id))))
      .andThen(() => this.getIssueEvents(id))
      .map((events) => {
        const bySession = new Map<string, EventType[]>()
        for (const event of events) {
          if (event.session_id === null) continue
          const types = bySession.get(event.session_id) ?? []
          types.push(event.event_type)
          bySession.set(event.session_id, types)
        }
        const linked = [...bySession.keys()].sort()
        return {
          issue_id: id,
          linked_sessions: linked,
          session_count: linked.length,
          events_by_session: Object.fromEntries(bySession),
        }
      })
  }

  /**
   * Appends `session_ended` for `id`.
   *
   * @returns `ok(true)` when the event was written, `ok(false)` when no issue
   *   has this id (nothing is written).
   */
  emitSessionEnded(id: string, reason = 'session terminated'): ResultAsync<boolean, IssueError> {
    return this.get(id).andThen((issue) => {
      if (!issue) {
        logger.debug({ id }, 'session_ended skipped for unknown issue')
        return okAsync(false)
      }
      return fromResult(this.emit(id, { event_type: 'session_ended', changes: { reason } })).map(() => true)
    })
  }

  /**
   * Emits `session_ended` on every `in_progress` issue that `sessionId` has
   * touched.
   *
   * @returns the ids of the issues marked, in storage order.
   */
  markSessionEnded(sessionId: string, reason = 'session terminated'): ResultAsync<string[], IssueError> {
    return requireId('session_id', sessionId)
      .asyncAndThen(() => this.list({ status: 'in_progress' }))
      .andThen((issues) =>
        issues.reduce<ResultAsync<string[], IssueError>>(
          (acc, issue) =>
            acc.andThen((marked) =>
              this.getIssueEvents(issue.id).andThen((events) =>
                events.some((e) => e.session_id === sessionId)
                  ? this.emitSessionEnded(issue.id, reason).map((wrote) => (wrote ? [...marked, issue.id] : marked))
                  : okAsync(marked),
              ),
            ),
          okAsync([]),
        ),
      )
      .map((marked) => {
        logger.info({ sessionId, issues: marked }, 'session end recorded')
        return marked
      })
  }

  // ── Internals ─────────────────────────────────────────────────────────────

  private timestamp(): string {
    return this.now().toISOString()
  }

  private loadIndex(): Result<IssueIndex, StorageError> {
    const issues = this.storage.loadIssues()
    if (issues.isErr()) {
      return err(issues.error)
    }
    const deps = this.storage.loadDependencies()
    if (deps.isErr()) {
      return err(deps.error)
    }
    return ok(IssueIndex.from(issues.value, deps.value))
  }

  /** Runs `query` against a fresh index while holding the lock. */
  private read<T>(query: (index: IssueIndex) => Result<T, IssueError>): ResultAsync<T, IssueError> {
    return this.lock.withLock((): Result<T, IssueError> => {
      const index = this.loadIndex()
      return index.isErr() ? err(index.error) : query(index.value)
    })
  }

  /** Resolves neighbour ids of an existing issue, dropping ids with no issue behind them. */
  private resolveNeighbours(
    id: string,
    neighbours: (index: IssueIndex) => string[],
  ): ResultAsync<Issue[], IssueError> {
    return requireId('issue_id', id).asyncAndThen(() =>
      this.read((index): Result<Issue[], IssueError> => {
        if (!index.getIssue(id)) {
          return err(new NotFoundError('issue', id))
        }
        const out: Issue[] = []
        for (const other of neighbours(index)) {
          const issue = index.getIssue(other)
          if (issue) {
            out.push(issue)
          }
        }
        return ok(out)
      }),
    )
  }

  /**
   * Runs `apply` against a fresh index while holding the lock, persists the
   * collection it names, then emits its events once the lock is released.
   */
  private transact<T>(apply: (index: IssueIndex) => Result<Commit<T>, IssueError>): ResultAsync<T, IssueError> {
    return this.lock
      .withLock((): Result<Commit<T>, IssueError> => {
        const index = this.loadIndex()
        if (index.isErr()) {
          return err(index.error)
        }
        const commit = apply(index.value)
        if (commit.isErr()) {
          return err(commit.error)
        }
        const saved =
          commit.value.save === 'issues'
            ? this.storage.saveIssues([...index.value.issues.values()])
            : this.storage.saveDependencies(index.value.getAllDependencies())
        return saved.isErr() ? err(saved.error) : ok(commit.value)
      })
      .map((commit) => {
        for (const { issueId, payload } of commit.events) {
          this.emit(issueId, payload)
        }
        return commit.value
      })
  }

  /** Appends one event stamped with this manager's actor and session. */
  private emit(issueId: string, payload: EventPayload): Result<IssueEvent, StorageError> {
    const event: IssueEvent = {
      id: this.generateId(),
      issue_id: issueId,
      actor: this.actor,
      timestamp: this.timestamp(),
      session_id: this.sessionId,
      ...payload,
    }
    return this.storage
      .appendEvent(event)
      .map(() => event)
      .mapErr((e) => {
        logger.error({ err: e, event }, 'failed to append event')
        return e
      })
  }
}
