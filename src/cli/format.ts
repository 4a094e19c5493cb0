/** @module CLI Commands */
import chalk from 'chalk'
import { err, ok, type Result } from 'neverthrow'
import {
  type Issue,
  type IssueEvent,
  type IssueStatus,
  type Metadata,
  ValidationError,
} from '@/types'

/**
 * Named priorities accepted wherever the CLI takes a priority.
 *
 * @category CLI
 */
export const PRIORITY_NAMES: Readonly<Record<string, number>> = {
  critical: 0,
  high: 1,
  medium: 2,
  normal: 2,
  low: 3,
  deferred: 4,
}

const PRIORITY_LABELS = ['critical', 'high', 'medium', 'low', 'deferred']

/**
 * Parses a priority argument: an integer or one of {@link PRIORITY_NAMES}
 * (case-insensitive). Range checking is left to the manager.
 *
 * @category CLI
 */
export function parsePriority(value: string): Result<number, ValidationError> {
  const trimmed = value.trim().toLowerCase()
  const named = PRIORITY_NAMES[trimmed]
  if (named !== undefined) {
    return ok(named)
  }
  if (/^-?\d+$/.test(trimmed)) {
    return ok(Number(trimmed))
  }
  return err(
    new ValidationError(
      `Invalid priority "${value}": use 0-4 or one of ${Object.keys(PRIORITY_NAMES).join(', ')}`,
    ),
  )
}

/**
 * Parses repeated `key=value` arguments into a metadata map. Values stay
 * strings; a later key overwrites an earlier one.
 *
 * @category CLI
 */
export function parseMetadata(entries: readonly string[]): Result<Metadata, ValidationError> {
  const out: Metadata = {}
  for (const entry of entries) {
    const eq = entry.indexOf('=')
    if (eq <= 0) {
      return err(new ValidationError(`Invalid metadata "${entry}": expected key=value`))
    }
    out[entry.slice(0, eq).trim()] = entry.slice(eq + 1)
  }
  return ok(out)
}

export function priorityLabel(priority: number): string {
  return `P${priority} ${PRIORITY_LABELS[priority] ?? ''}`.trimEnd()
}

const STATUS_COLORS: Record<IssueStatus, (s: string) => string> = {
  open: chalk.cyan,
  in_progress: chalk.yellow,
  blocked: chalk.red,
  closed: chalk.gray,
  completed: chalk.green,
  pending_user_input: chalk.magenta,
}

/** One-line summary: `<id>  <status>  P<n>  <title>`. */
export function formatIssueLine(issue: Issue): string {
  const status = STATUS_COLORS[issue.status](issue.status.padEnd(18))
  return `${chalk.bold(issue.id)}  ${status}  P${issue.priority}  ${issue.title}`
}

/** Multi-line detail view used by `show`, `create`, `update` and `close`. */
export function formatIssueDetail(issue: Issue): string[] {
  const lines = [
    `${chalk.bold(issue.title)} ${chalk.dim(`(${issue.id})`)}`,
    `  status:    ${STATUS_COLORS[issue.status](issue.status)}`,
    `  priority:  ${priorityLabel(issue.priority)}`,
    `  type:      ${issue.issue_type}`,
    `  created:   ${issue.created_at}`,
    `  updated:   ${issue.updated_at}`,
  ]
  if (issue.assignee) lines.push(`  assignee:  ${issue.assignee}`)
  if (issue.closed_at) lines.push(`  closed:    ${issue.closed_at}`)
  if (issue.parent_id) lines.push(`  parent:    ${issue.parent_id}`)
  if (issue.discovered_from) lines.push(`  found in:  ${issue.discovered_from}`)
  if (issue.blocking_notes) lines.push(`  blocking:  ${issue.blocking_notes}`)
  for (const [key, value] of Object.entries(issue.metadata)) {
    lines.push(`  meta.${key}: ${JSON.stringify(value)}`)
  }
  if (issue.description) {
    lines.push('', ...issue.description.split('\n').map((l) => `  ${l}`))
  }
  return lines
}

/** `<timestamp>  <event_type>  <actor>[  session <id>]`. */
export function formatEventLine(event: IssueEvent): string {
  const session = event.session_id ? chalk.dim(`  session ${event.session_id}`) : ''
  return `${chalk.dim(event.timestamp)}  ${event.event_type.padEnd(18)}  ${event.actor}${session}`
}
