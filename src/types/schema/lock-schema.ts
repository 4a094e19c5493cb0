/**
 * Lock model schemas: cross-process exclusion on a data directory.
 *
 * Every manager operation holds `<dataDir>/.issues.lock` while it reads and
 * rewrites the snapshots. The lock file contains JSON matching
 * {@link LockInfoSchema}, which enables stale-lock detection (by checking
 * whether the PID is still alive) and safe release (by comparing tokens).
 *
 * @module lock-schema
 */
import { z } from 'zod'

/**
 * Contents of a `.issues.lock` file.
 *
 * Written at acquisition through `O_CREAT | O_EXCL`, so exactly one caller
 * creates the file. A lock whose `pid` is no longer alive is stale and may be
 * removed by the next caller.
 *
 * @category Locking
 * @group Locking
 */
export const LockInfoSchema = z.object({
  /** PID of the process that acquired this lock. Used for stale-lock detection. */
  pid: z.number().int().positive(),
  /** Random per-acquisition token; only the holder with this token may release. */
  token: z.string().min(1),
  /** ISO 8601 timestamp of when the lock was acquired. */
  acquired_at: z.string().datetime(),
})

/**
 * Parsed lock file contents. Derived from {@link LockInfoSchema}.
 *
 * @category Locking
 * @group Locking
 */
export type LockInfo = z.infer<typeof LockInfoSchema>
