/** @module CLI Commands */
import chalk from 'chalk'
import type { Result } from 'neverthrow'
import type { IssueError } from '@/types'
import { createLogger } from '@/utils/logger'

const logger = createLogger('cli')

/** Output switches shared by every command. */
export interface OutputOptions {
  /** Print the raw value as JSON instead of the text rendering. */
  json: boolean
}

/**
 * Prints a command's outcome.
 *
 * On success prints either `text(value)` line by line or the value as
 * pretty JSON. On failure logs the error, prints it to stderr and sets exit
 * code 1.
 *
 * @returns whether the command succeeded.
 */
export async function report<T>(
  pending: Result<T, IssueError> | PromiseLike<Result<T, IssueError>>,
  opts: OutputOptions,
  text: (value: T) => string[],
): Promise<boolean> {
  const result = await pending
  if (result.isErr()) {
    logger.error({ err: result.error }, result.error.message)
    console.error(chalk.red(`${result.error.name}: ${result.error.message}`))
    process.exitCode = 1
    return false
  }
  const lines = opts.json ? [JSON.stringify(result.value ?? null, null, 2)] : text(result.value)
  for (const line of lines) {
    console.log(line)
  }
  return true
}
