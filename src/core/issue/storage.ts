import {
  appendFileSync,
  mkdirSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from 'fs'
import { join } from 'path'
import { err, ok, type Result } from 'neverthrow'
import type { z } from 'zod'
import {
  CorruptRecordError,
  type Dependency,
  DependencySchema,
  type Issue,
  type IssueEvent,
  IssueEventSchema,
  IssueSchema,
  StorageError,
} from '@/types'
import { formatZodError } from '@/core/issue/validation'
import { createLogger } from '@/utils/logger'
import { errnoCode, toError } from '@/utils/toError'

const logger = createLogger('storage')

export const ISSUES_FILE = 'issues.jsonl'
export const DEPENDENCIES_FILE = 'dependencies.jsonl'
export const EVENTS_FILE = 'events.jsonl'

/**
 * JSONL persistence for one data directory.
 *
 * - `issues.jsonl`, `dependencies.jsonl`: full snapshots, rewritten wholesale
 *   on every save. Writes go to `<file>.tmp` and are `rename`d over the
 *   target, so a reader never sees half a snapshot.
 * - `events.jsonl`: append-only audit log, one record per line.
 *
 * Holds no state between calls. Serializing writers is the caller's job
 * (see `DirectoryLock`); this class only guarantees that each file is either
 * the old or the new version.
 *
 * @category Storage
 */
export class IssueStorage {
  readonly issuesPath: string
  readonly dependenciesPath: string
  readonly eventsPath: string

  constructor(readonly dataDir: string) {
    this.issuesPath = join(dataDir, ISSUES_FILE)
    this.dependenciesPath = join(dataDir, DEPENDENCIES_FILE)
    this.eventsPath = join(dataDir, EVENTS_FILE)
  }

  loadIssues(): Result<Issue[], StorageError> {
    return this.readRecords(this.issuesPath, IssueSchema, false)
  }

  saveIssues(issues: readonly Issue[]): Result<void, StorageError> {
    return this.writeSnapshot(this.issuesPath, issues)
  }

  loadDependencies(): Result<Dependency[], StorageError> {
    return this.readRecords(this.dependenciesPath, DependencySchema, false)
  }

  saveDependencies(deps: readonly Dependency[]): Result<void, StorageError> {
    return this.writeSnapshot(this.dependenciesPath, deps)
  }

  /**
   * Appends one event as a single line. Never rewrites earlier records.
   */
  appendEvent(event: IssueEvent): Result<void, StorageError> {
    try {
      mkdirSync(this.dataDir, { recursive: true })
      appendFileSync(this.eventsPath, `${JSON.stringify(event)}\n`)
      return ok(undefined)
    } catch (e) {
      return err(
        new StorageError(`Failed to append event to ${this.eventsPath}`, this.eventsPath, toError(e)),
      )
    }
  }

  /**
   * Loads every event in append order.
   *
   * The log is read without the lock, so a final fragment with no trailing
   * newline is another process's append in flight and is left out. Complete
   * lines that fail to parse are fatal.
   */
  loadEvents(): Result<IssueEvent[], StorageError> {
    return this.readRecords(this.eventsPath, IssueEventSchema, true)
  }

  private readText(path: string): Result<string, StorageError> {
    try {
      return ok(readFileSync(path, 'utf8'))
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') {
        return ok('')
      }
      return err(new StorageError(`Failed to read ${path}`, path, toError(e)))
    }
  }

  private readRecords<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    skipPartialTail: boolean,
  ): Result<T[], StorageError> {
    const text = this.readText(path)
    if (text.isErr()) {
      return err(text.error)
    }

    const lines = text.value.split('\n')
    if (skipPartialTail) {
      const tail = lines.pop() ?? ''
      if (tail.trim()) {
        logger.debug({ path, bytes: tail.length }, 'skipping unterminated trailing record')
      }
    }

    const records: T[] = []
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]
      if (!line.trim()) {
        continue
      }
      let raw: unknown
      try {
        raw = JSON.parse(line)
      } catch (e) {
        logger.error({ path, line: i + 1 }, 'unparseable record')
        return err(new CorruptRecordError(path, i + 1, toError(e).message))
      }
      const parsed = schema.safeParse(raw)
      if (!parsed.success) {
        logger.error({ path, line: i + 1 }, 'record failed validation')
        return err(new CorruptRecordError(path, i + 1, formatZodError(parsed.error)))
      }
      records.push(parsed.data)
    }
    return ok(records)
  }

  private writeSnapshot(path: string, records: readonly unknown[]): Result<void, StorageError> {
    const tmp = `${path}.tmp`
    try {
      const body = records.map((r) => `${JSON.stringify(r)}\n`).join('')
      mkdirSync(this.dataDir, { recursive: true })
      writeFileSync(tmp, body)
      renameSync(tmp, path)
      logger.debug({ path, records: records.length }, 'snapshot written')
      return ok(undefined)
    } catch (e) {
      return err(new StorageError(`Failed to write ${path}`, path, toError(e)))
    }
  }
}
