import pino from 'pino'
import type { Config } from '@/types'

/** Subset of {@link Config} consumed by the logger. */
type LoggerConfig = Pick<Config, 'logFile' | 'logLevel' | 'logPretty'>

let _loggerConfig: LoggerConfig | null = null

/**
 * Injects runtime config into the logger subsystem.
 *
 * Must be called in the CLI `preAction` hook (after `process.chdir()`) so that
 * `logFile` resolves relative to the correct working directory. Priority for
 * each setting: config value → environment variable → built-in default.
 *
 * @param config - Logger-relevant slice of the loaded {@link Config}.
 */
export function setLoggerConfig(config: LoggerConfig): void {
  _loggerConfig = config
}

function buildLogger(name: string): pino.Logger {
  const level = process.env.LOG_LEVEL ?? _loggerConfig?.logLevel ?? 'info'
  const pretty = _loggerConfig?.logPretty ?? process.env.LOG_PRETTY === '1'
  const logFile =
    _loggerConfig?.logFile ?? process.env.ISSUEDECK_LOG_FILE ?? 'issuedeck.log'

  if (level === 'silent') {
    return pino({ name, level, enabled: false })
  }

  if (pretty) {
    try {
      return pino(
        { name, level },
        pino.transport({ target: 'pino-pretty', options: { colorize: true, destination: 2 } })
      )
    } catch (e) {
      // pino-pretty missing: fall through to plain JSON
      process.stderr.write(`pretty logging unavailable: ${e instanceof Error ? e.message : String(e)}\n`)
    }
  }

  const destinations: Parameters<typeof pino.multistream>[0] = [
    { stream: pino.destination({ dest: logFile, mkdir: true }) }
  ]
  if (!process.stderr.isTTY) {
    destinations.unshift({ stream: pino.destination(2) })
  }
  const streams = pino.multistream(destinations)
  return pino({ name, level }, streams)
}

/**
 * Create a named child logger. The underlying pino instance is built lazily
 * on first use so that the log file path resolves after `--cwd` / `process.chdir()`.
 *
 * Environment overrides: `LOG_LEVEL` (wins over config, so a test run can set
 * `silent`), `LOG_PRETTY=1`, `ISSUEDECK_LOG_FILE=/abs/path`.
 *
 * @category Utilities
 */
export function createLogger(name: string): pino.Logger {
  let instance: pino.Logger | null = null
  const get = () => (instance ??= buildLogger(name))
  return new Proxy({} as pino.Logger, {
    get: (_t, prop) => {
      const val = get()[prop as keyof pino.Logger]
      return typeof val === 'function' ? (val as Function).bind(get()) : val
    }
  })
}

/**
 * Root logger for src/index.ts and top-level use.
 *
 * @category Utilities
 */
export const logger = createLogger('issuedeck')
