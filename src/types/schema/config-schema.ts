/**
 * Configuration schema: runtime settings for an issuedeck data directory.
 *
 * Loaded from `.issuedeckrc` (KEY=VALUE format) via `loadConfig` in
 * `core/config.ts`. Every key has a default, so `ConfigSchema.parse({})`
 * returns a fully-populated config.
 *
 * @module Configuration
 */
import { z } from 'zod'

/**
 * Runtime configuration.
 *
 * Configuration groups:
 * - **Storage**: `dataDir`
 * - **Attribution**: `actor`, `sessionId`
 * - **Locking**: `lockTimeoutMs`, `lockPollMs`
 * - **Logging**: `logFile`, `logLevel`, `logPretty`
 * - **Sentry**: `sentryDsn`, `sentryEnvironment`, `sentryTracesSampleRate`
 *
 * @category Configuration
 * @group Configuration
 */
export const ConfigSchema = z.object({
  /** Directory holding `issues.jsonl`, `dependencies.jsonl`, `events.jsonl` and the lock. */
  dataDir: z.string().default('.issuedeck'),
  /** Actor recorded on every event this process emits. */
  actor: z.string().default('system'),
  /** External session id recorded on events. Empty string means none. */
  sessionId: z.string().default(''),
  /** How long to wait for the data directory lock before failing. */
  lockTimeoutMs: z.number().int().positive().default(10_000),
  /** Delay between lock acquisition attempts. */
  lockPollMs: z.number().int().positive().default(50),
  /** Path to the pino log file. */
  logFile: z.string().default('.issuedeck/issuedeck.jsonl'),
  /** Pino log level (trace, debug, info, warn, error, fatal, silent). */
  logLevel: z.string().default('info'),
  /** Enable pretty-printed log output (for development). */
  logPretty: z.boolean().default(false),
  /** Sentry DSN for error monitoring. Empty means disabled. */
  sentryDsn: z.string().default(''),
  /** Sentry environment tag (e.g. 'production', 'development'). */
  sentryEnvironment: z.string().default('development'),
  /** Sentry traces sample rate (0.0–1.0). */
  sentryTracesSampleRate: z.coerce.number().min(0).max(1).default(0.2),
})

/**
 * Validated runtime configuration. Derived from {@link ConfigSchema}.
 *
 * @category Configuration
 * @group Configuration
 */
export type Config = z.infer<typeof ConfigSchema>
