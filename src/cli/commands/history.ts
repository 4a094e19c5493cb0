/** @module CLI Commands */
import chalk from 'chalk'
import type { IssueManager } from '@/core/issue/manager'
import { formatEventLine } from '@/cli/format'
import { type OutputOptions, report } from '@/cli/commands/output'

/** `events <id>`: the issue's audit trail, oldest first. */
export async function eventsCommand(manager: IssueManager, id: string, opts: OutputOptions): Promise<void> {
  await report(manager.getIssueEvents(id), opts, (events) =>
    events.length === 0 ? [chalk.dim(`No events for ${id}.`)] : events.map(formatEventLine),
  )
}

/** `sessions <id>`: the sessions that touched the issue and what each did. */
export async function sessionsCommand(manager: IssueManager, id: string, opts: OutputOptions): Promise<void> {
  await report(manager.getIssueSessions(id), opts, (sessions) => {
    if (sessions.session_count === 0) {
      return [chalk.dim(`No sessions linked to ${id}.`)]
    }
    return [
      `${sessions.session_count} session(s) linked to ${id}`,
      ...sessions.linked_sessions.map(
        (session) => `  ${chalk.bold(session)}: ${(sessions.events_by_session[session] ?? []).join(', ')}`,
      ),
    ]
  })
}

/**
 * `session-end [id]`: with an id, records `session_ended` on that issue;
 * without one, on every in-progress issue the current session touched.
 */
export async function sessionEndCommand(
  manager: IssueManager,
  id: string | undefined,
  opts: OutputOptions & { reason?: string },
): Promise<void> {
  if (id !== undefined) {
    await report(manager.emitSessionEnded(id, opts.reason), opts, (wrote) => [
      wrote ? chalk.green(`Recorded session end on ${id}`) : chalk.dim(`No issue with id ${id}; nothing recorded.`),
    ])
    return
  }
  await report(manager.markSessionEnded(manager.sessionId ?? '', opts.reason), opts, (marked) =>
    marked.length === 0
      ? [chalk.dim('No in-progress issues touched by this session.')]
      : marked.map((issueId) => `${chalk.green('Recorded session end on')} ${issueId}`),
  )
}
