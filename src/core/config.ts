import { readFileSync } from 'fs'
import { err, ok, type Result } from 'neverthrow'
import { join, resolve } from 'path'
import { z } from 'zod'
import { type Config, ConfigSchema } from '@/types'
import { createLogger } from '@/utils/logger'
import { errnoCode } from '@/utils/toError'

const logger = createLogger('config')

/** Default config file name, looked up in the working directory. */
export const RC_FILE = '.issuedeckrc'

const KEY_MAP: Record<string, keyof Config> = {
  DATA_DIR: 'dataDir',
  ACTOR: 'actor',
  SESSION_ID: 'sessionId',
  LOCK_TIMEOUT_MS: 'lockTimeoutMs',
  LOCK_POLL_MS: 'lockPollMs',
  LOG_FILE: 'logFile',
  LOG_LEVEL: 'logLevel',
  LOG_PRETTY: 'logPretty',
  SENTRY_DSN: 'sentryDsn',
  SENTRY_ENVIRONMENT: 'sentryEnvironment',
  SENTRY_TRACES_SAMPLE_RATE: 'sentryTracesSampleRate',
}

// Zod schema that coerces string values (all .issuedeckrc values are strings)
const RawConfigSchema = ConfigSchema.extend({
  lockTimeoutMs: z.coerce.number().int().positive().default(10_000),
  lockPollMs: z.coerce.number().int().positive().default(50),
  logPretty: z
    .preprocess((v) => v === '1' || v === 'true' || v === true, z.boolean())
    .default(false),
})

/**
 * Parses a `.issuedeckrc` KEY=VALUE string into a validated {@link Config}.
 *
 * Blank lines and `#` comments are skipped; keys outside the known set are
 * ignored.
 *
 * @returns `ok(Config)` on success, `err(ZodError)` if a value fails validation.
 * @category Configuration
 */
export function parseRc(content: string): Result<Config, z.ZodError> {
  const raw: Record<string, string> = {}
  for (const line of content.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) {
      continue
    }
    const eq = trimmed.indexOf('=')
    if (eq === -1) {
      continue
    }
    const key = trimmed.slice(0, eq).trim()
    const val = trimmed.slice(eq + 1).trim()
    const mapped = KEY_MAP[key]
    if (mapped) {
      raw[mapped] = val
    }
  }
  const parsed = RawConfigSchema.safeParse(raw)
  return parsed.success ? ok(parsed.data) : err(parsed.error)
}

/**
 * Loads configuration from a `.issuedeckrc` file.
 *
 * A missing file yields the schema defaults. An unreadable or invalid file
 * also yields the defaults, with a warning in the log. Never throws.
 *
 * @param rcPath - Path to the file. Defaults to `<cwd>/.issuedeckrc`.
 * @category Configuration
 */
export function loadConfig(rcPath?: string): Config {
  const filePath = rcPath ? resolve(rcPath) : join(process.cwd(), RC_FILE)
  let content: string
  try {
    content = readFileSync(filePath, 'utf8')
  } catch (e) {
    if (errnoCode(e) !== 'ENOENT') {
      logger.warn({ err: e, filePath }, 'config unreadable; using defaults')
    }
    return RawConfigSchema.parse({})
  }
  return parseRc(content).match(
    (c) => c,
    (e) => {
      logger.warn({ filePath, issues: e.issues }, 'config invalid; using defaults')
      return RawConfigSchema.parse({})
    },
  )
}
