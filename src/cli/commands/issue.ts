/** @module CLI Commands */
import chalk from 'chalk'
import { ok, type Result } from 'neverthrow'
import type { IssueManager } from '@/core/issue/manager'
import type { UpdateIssueInput } from '@/core/issue/validation'
import type { Metadata, ValidationError } from '@/types'
import { formatIssueDetail, formatIssueLine, parseMetadata, parsePriority } from '@/cli/format'
import { type OutputOptions, report } from '@/cli/commands/output'

function optionalPriority(value: string | undefined): Result<number | undefined, ValidationError> {
  return value === undefined ? ok(undefined) : parsePriority(value)
}

function optionalMetadata(entries: string[] | undefined): Result<Metadata | undefined, ValidationError> {
  return entries === undefined || entries.length === 0 ? ok(undefined) : parseMetadata(entries)
}

export interface CreateCommandOptions extends OutputOptions {
  description?: string
  priority?: string
  type?: string
  assignee?: string
  parent?: string
  discoveredFrom?: string
  meta?: string[]
}

/** `create <title>`: files a new open issue and prints it. */
export async function createCommand(
  manager: IssueManager,
  title: string,
  opts: CreateCommandOptions,
): Promise<void> {
  const pending = optionalPriority(opts.priority)
    .andThen((priority) => optionalMetadata(opts.meta).map((metadata) => ({ priority, metadata })))
    .asyncAndThen(({ priority, metadata }) =>
      manager.create({
        title,
        description: opts.description,
        priority,
        issue_type: opts.type,
        assignee: opts.assignee,
        parent_id: opts.parent,
        discovered_from: opts.discoveredFrom,
        metadata,
      }),
    )
  await report(pending, opts, (issue) => [chalk.green('Created'), ...formatIssueDetail(issue)])
}

/** `show <id>`: exits 1 when there is no such issue. */
export async function showCommand(manager: IssueManager, id: string, opts: OutputOptions): Promise<void> {
  const result = await manager.get(id)
  await report(result, opts, (issue) =>
    issue ? formatIssueDetail(issue) : [chalk.yellow(`No issue with id ${id}`)],
  )
  if (result.isOk() && result.value === null) {
    process.exitCode = 1
  }
}

export interface ListCommandOptions extends OutputOptions {
  status?: string
  priority?: string
  type?: string
  assignee?: string
}

/** `list`: issues matching every given filter. */
export async function listCommand(manager: IssueManager, opts: ListCommandOptions): Promise<void> {
  const pending = optionalPriority(opts.priority).asyncAndThen((priority) =>
    manager.list({
      status: opts.status,
      priority,
      issue_type: opts.type,
      assignee: opts.assignee,
    }),
  )
  await report(pending, opts, (issues) =>
    issues.length === 0 ? [chalk.dim('No issues found.')] : issues.map(formatIssueLine),
  )
}

export interface UpdateCommandOptions extends OutputOptions {
  title?: string
  description?: string
  status?: string
  priority?: string
  assignee?: string
  notes?: string
  meta?: string[]
}

/** `update <id>`: applies only the options that were given. */
export async function updateCommand(
  manager: IssueManager,
  id: string,
  opts: UpdateCommandOptions,
): Promise<void> {
  const pending = optionalPriority(opts.priority)
    .andThen((priority) => optionalMetadata(opts.meta).map((metadata) => ({ priority, metadata })))
    .asyncAndThen(({ priority, metadata }) => {
      const patch: UpdateIssueInput = {
        title: opts.title,
        description: opts.description,
        status: opts.status,
        priority,
        assignee: opts.assignee,
        blocking_notes: opts.notes,
        metadata,
      }
      return manager.update(id, patch)
    })
  await report(pending, opts, (issue) => [chalk.green('Updated'), ...formatIssueDetail(issue)])
}

/** `close <id>` */
export async function closeCommand(
  manager: IssueManager,
  id: string,
  opts: OutputOptions & { reason?: string },
): Promise<void> {
  await report(manager.close(id, opts.reason), opts, (issue) => [
    chalk.green('Closed'),
    ...formatIssueDetail(issue),
  ])
}
