/** @module CLI Commands */
import chalk from 'chalk'
import type { IssueManager } from '@/core/issue/manager'
import { formatIssueLine } from '@/cli/format'
import { type OutputOptions, report } from '@/cli/commands/output'

/**
 * `ready`: open issues with nothing left blocking them, most urgent first.
 *
 * @param opts - `limit` is passed through as a number; non-integers are
 *   rejected by the manager.
 */
export async function readyCommand(
  manager: IssueManager,
  opts: OutputOptions & { limit?: string },
): Promise<void> {
  const limit = opts.limit === undefined ? undefined : Number(opts.limit)
  await report(manager.getReadyIssues(limit), opts, (issues) =>
    issues.length === 0 ? [chalk.dim('Nothing is ready.')] : issues.map(formatIssueLine),
  )
}

/** `blocked`: each blocked issue followed by its unresolved blockers. */
export async function blockedCommand(manager: IssueManager, opts: OutputOptions): Promise<void> {
  await report(manager.getBlockedIssues(), opts, (entries) => {
    if (entries.length === 0) {
      return [chalk.dim('Nothing is blocked.')]
    }
    return entries.flatMap(({ issue, blocked_by }) => [
      formatIssueLine(issue),
      ...blocked_by.map((blocker) => `  ${chalk.red('blocked by')} ${formatIssueLine(blocker)}`),
    ])
  })
}
