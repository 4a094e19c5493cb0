import { randomUUID } from 'crypto'
import {
  closeSync,
  constants,
  mkdirSync,
  openSync,
  readFileSync,
  rmSync,
  statSync,
  writeSync,
} from 'fs'
import { join } from 'path'
import { setTimeout as sleep } from 'timers/promises'
import { err, errAsync, ok, okAsync, type Result, ResultAsync } from 'neverthrow'
import { type LockInfo, LockInfoSchema, LockTimeoutError, StorageError } from '@/types'
import { createLogger } from '@/utils/logger'
import { errnoCode, toError } from '@/utils/toError'

const logger = createLogger('lock')

export const LOCK_FILE = '.issues.lock'
/** Guard file held while a waiter removes a stale {@link LOCK_FILE}. */
export const REAP_FILE = `${LOCK_FILE}.reap`

/** Failures that {@link DirectoryLock.acquire} can report. */
export type LockError = LockTimeoutError | StorageError

/** @category Locking */
export interface DirectoryLockOptions {
  /** Upper bound on the wait for the lock. Defaults to 10 000 ms. */
  timeoutMs?: number
  /** Delay between acquisition attempts. Defaults to 50 ms. */
  pollMs?: number
  /**
   * An unparseable lock file younger than this is assumed to be mid-write by
   * its creator and is left alone. Defaults to 2 000 ms.
   */
  staleGraceMs?: number
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (e) {
    // EPERM: the process exists but belongs to another user
    return errnoCode(e) === 'EPERM'
  }
}

/**
 * Exclusive cross-process lock on a data directory.
 *
 * **Acquisition:** `O_CREAT | O_EXCL` creation of `<dir>/.issues.lock`, which
 * succeeds for exactly one caller. The file carries the holder's PID and a
 * random token ({@link LockInfo}). Waiters poll until `timeoutMs` elapses and
 * then fail with {@link LockTimeoutError}; they never retry past the bound.
 *
 * **Staleness:** a lock whose PID is no longer alive is removed by the next
 * waiter, so a crashed process cannot wedge the directory. Removal happens
 * under a second exclusive file ({@link REAP_FILE}): the reaper re-reads the
 * lock inside it and deletes it only if the contents are still the stale
 * record it judged, so a lock claimed in the meantime survives.
 *
 * **Release:** only removes the file while it still carries the holder's
 * token.
 *
 * The lock is not re-entrant: a holder that calls {@link withLock} again
 * waits for itself until the timeout.
 *
 * @category Locking
 */
export class DirectoryLock {
  readonly lockPath: string
  readonly reapPath: string
  private readonly timeoutMs: number
  private readonly pollMs: number
  private readonly staleGraceMs: number

  constructor(
    readonly dir: string,
    opts: DirectoryLockOptions = {},
  ) {
    this.lockPath = join(dir, LOCK_FILE)
    this.reapPath = join(dir, REAP_FILE)
    this.timeoutMs = opts.timeoutMs ?? 10_000
    this.pollMs = opts.pollMs ?? 50
    this.staleGraceMs = opts.staleGraceMs ?? 2_000
  }

  /**
   * Runs `fn` while holding the lock and releases it on every exit path,
   * including when `fn` returns `err` or throws.
   */
  withLock<T, E>(fn: () => Result<T, E>): ResultAsync<T, E | LockError> {
    return this.acquire().andThen<T, E>((token) => {
      try {
        return fn()
      } finally {
        this.release(token)
      }
    })
  }

  /**
   * Waits for the lock and returns the token identifying this holder.
   * Pair every successful call with {@link release}.
   */
  acquire(): ResultAsync<string, LockError> {
    const token = randomUUID()
    const startedAt = Date.now()
    const deadline = startedAt + this.timeoutMs

    const attempt = (): ResultAsync<string, LockError> => {
      const claimed = this.tryClaim(token).andThen((won) =>
        won ? ok(true) : this.clearIfStale().andThen((cleared) => (cleared ? this.tryClaim(token) : ok(false))),
      )
      if (claimed.isErr()) {
        return errAsync(claimed.error)
      }
      if (claimed.value) {
        logger.debug({ lockPath: this.lockPath, waitedMs: Date.now() - startedAt }, 'lock acquired')
        return okAsync(token)
      }
      if (Date.now() >= deadline) {
        logger.warn({ lockPath: this.lockPath, timeoutMs: this.timeoutMs }, 'lock wait timed out')
        return errAsync(new LockTimeoutError(this.lockPath, this.timeoutMs))
      }
      return ResultAsync.fromSafePromise(sleep(this.pollMs)).andThen(attempt)
    }

    return attempt()
  }

  /**
   * Removes the lock file if it still belongs to `token`. Never fails: a lock
   * that cannot be released is logged, and the next waiter's stale check
   * recovers it once this process exits.
   */
  release(token: string): void {
    try {
      const current = LockInfoSchema.safeParse(JSON.parse(readFileSync(this.lockPath, 'utf8')))
      if (!current.success || current.data.token !== token) {
        logger.warn({ lockPath: this.lockPath }, 'lock is no longer ours; leaving it in place')
        return
      }
      rmSync(this.lockPath, { force: true })
      logger.debug({ lockPath: this.lockPath }, 'lock released')
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') {
        logger.warn({ lockPath: this.lockPath }, 'lock file vanished before release')
        return
      }
      logger.error({ err: e, lockPath: this.lockPath }, 'failed to release lock')
    }
  }

  /** `ok(true)` when this call created the lock file, `ok(false)` when it already existed. */
  private tryClaim(token: string): Result<boolean, StorageError> {
    const info: LockInfo = {
      pid: process.pid,
      token,
      acquired_at: new Date().toISOString(),
    }
    try {
      mkdirSync(this.dir, { recursive: true })
      // O_CREAT | O_EXCL: atomic, throws EEXIST if another holder has the lock
      const fd = openSync(this.lockPath, constants.O_CREAT | constants.O_EXCL | constants.O_WRONLY)
      try {
        writeSync(fd, JSON.stringify(info))
      } finally {
        closeSync(fd)
      }
      return ok(true)
    } catch (e) {
      if (errnoCode(e) === 'EEXIST') {
        return ok(false)
      }
      return err(new StorageError(`Failed to create lock ${this.lockPath}`, this.lockPath, toError(e)))
    }
  }

  /**
   * Inspects the current lock file and deletes it if its holder is gone.
   * `ok(true)` means the path is free to claim.
   */
  private clearIfStale(): Result<boolean, StorageError> {
    return this.readLock().andThen((seen) => {
      if (seen === null) {
        return ok(true)
      }
      const holder = parseLockInfo(seen.raw)
      if (holder === null) {
        // empty or truncated: creator may still be writing
        if (seen.ageMs < this.staleGraceMs) {
          return ok(false)
        }
        logger.warn({ lockPath: this.lockPath, ageMs: seen.ageMs }, 'removing unreadable lock file')
        return this.reap(seen.raw)
      }
      if (isProcessAlive(holder.pid)) {
        return ok(false)
      }
      logger.warn({ lockPath: this.lockPath, pid: holder.pid }, 'removing stale lock left by dead process')
      return this.reap(seen.raw)
    })
  }

  /** Raw contents and age of the lock file, or `null` when there is none. */
  private readLock(): Result<{ raw: string; ageMs: number } | null, StorageError> {
    try {
      const raw = readFileSync(this.lockPath, 'utf8')
      return ok({ raw, ageMs: Date.now() - statSync(this.lockPath).mtimeMs })
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') {
        return ok(null)
      }
      return err(new StorageError(`Failed to read lock ${this.lockPath}`, this.lockPath, toError(e)))
    }
  }

  /**
   * Deletes the lock file only while it still holds `staleRaw`. Runs under
   * {@link REAP_FILE}; `ok(false)` when another reaper is active or the lock
   * changed hands since it was judged stale.
   */
  private reap(staleRaw: string): Result<boolean, StorageError> {
    return this.claimReap().andThen((held) => {
      if (!held) {
        return ok(false)
      }
      try {
        return this.readLock().andThen((current) => {
          if (current === null) {
            return ok(true)
          }
          if (current.raw !== staleRaw) {
            logger.debug({ lockPath: this.lockPath }, 'lock changed hands before removal')
            return ok(false)
          }
          return this.remove(this.lockPath)
        })
      } finally {
        const released = this.remove(this.reapPath)
        if (released.isErr()) {
          logger.error({ err: released.error, reapPath: this.reapPath }, 'failed to release reap guard')
        }
      }
    })
  }

  /**
   * Creates {@link REAP_FILE} exclusively. A guard older than `staleGraceMs`
   * was left by a reaper that died mid-removal and is cleared for the next
   * attempt.
   */
  private claimReap(): Result<boolean, StorageError> {
    try {
      closeSync(openSync(this.reapPath, constants.O_CREAT | constants.O_EXCL | constants.O_WRONLY))
      return ok(true)
    } catch (e) {
      if (errnoCode(e) !== 'EEXIST') {
        return err(new StorageError(`Failed to create reap guard ${this.reapPath}`, this.reapPath, toError(e)))
      }
    }
    try {
      const ageMs = Date.now() - statSync(this.reapPath).mtimeMs
      if (ageMs < this.staleGraceMs) {
        return ok(false)
      }
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') {
        return ok(false)
      }
      return err(new StorageError(`Failed to read reap guard ${this.reapPath}`, this.reapPath, toError(e)))
    }
    logger.warn({ reapPath: this.reapPath }, 'removing abandoned reap guard')
    return this.remove(this.reapPath).map(() => false)
  }

  private remove(path: string): Result<boolean, StorageError> {
    try {
      rmSync(path, { force: true })
      return ok(true)
    } catch (e) {
      return err(new StorageError(`Failed to remove ${path}`, path, toError(e)))
    }
  }
}

function parseLockInfo(raw: string): LockInfo | null {
  try {
    const parsed = LockInfoSchema.safeParse(JSON.parse(raw))
    return parsed.success ? parsed.data : null
  } catch {
    return null
  }
}
