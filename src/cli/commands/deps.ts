/** @module CLI Commands */
import chalk from 'chalk'
import type { IssueManager } from '@/core/issue/manager'
import { formatIssueLine } from '@/cli/format'
import { type OutputOptions, report } from '@/cli/commands/output'

/** `dep add <from> <to>`: `from` becomes blocked by `to`. */
export async function depAddCommand(
  manager: IssueManager,
  fromId: string,
  toId: string,
  opts: OutputOptions & { type?: string },
): Promise<void> {
  await report(manager.addDependency(fromId, toId, opts.type), opts, (dep) => [
    `${chalk.green('Added')} ${dep.from_id} ${chalk.dim(`--${dep.dep_type}-->`)} ${dep.to_id}`,
  ])
}

/** `dep rm <from> <to>` */
export async function depRemoveCommand(
  manager: IssueManager,
  fromId: string,
  toId: string,
  opts: OutputOptions,
): Promise<void> {
  await report(manager.removeDependency(fromId, toId), opts, () => [
    `${chalk.green('Removed')} ${fromId} --> ${toId}`,
  ])
}

/** `deps <id>`: what `id` is blocked by. */
export async function depsCommand(manager: IssueManager, id: string, opts: OutputOptions): Promise<void> {
  await report(manager.getDependencies(id), opts, (issues) =>
    issues.length === 0 ? [chalk.dim(`${id} has no dependencies.`)] : issues.map(formatIssueLine),
  )
}

/** `dependents <id>`: what `id` is blocking. */
export async function dependentsCommand(manager: IssueManager, id: string, opts: OutputOptions): Promise<void> {
  await report(manager.getDependents(id), opts, (issues) =>
    issues.length === 0 ? [chalk.dim(`Nothing depends on ${id}.`)] : issues.map(formatIssueLine),
  )
}
