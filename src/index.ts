/** @module CLI Commands */
import { resolve } from 'path'
import { Command } from 'commander'
import { loadConfig } from '@/core/config'
import { createIssueManager } from '@/core/issue/factory'
import type { IssueManager } from '@/core/issue/manager'
import type { Config } from '@/types'
import { logger, setLoggerConfig } from '@/utils/logger'
import {
  addBreadcrumb,
  captureException,
  flushSentry,
  initSentry,
  setTrackerContext,
} from '@/utils/sentry'
import {
  blockedCommand,
  closeCommand,
  createCommand,
  type CreateCommandOptions,
  depAddCommand,
  dependentsCommand,
  depRemoveCommand,
  depsCommand,
  eventsCommand,
  listCommand,
  type ListCommandOptions,
  readyCommand,
  sessionEndCommand,
  sessionsCommand,
  showCommand,
  updateCommand,
  type UpdateCommandOptions,
} from '@/cli/commands'

type GlobalOptions = {
  cwd?: string
  config?: string
  dataDir?: string
  actor?: string
  session?: string
  json?: boolean
}

let config: Config | null = null

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value]
}

/**
 * Config as loaded in the `preAction` hook, with the global flags applied
 * over the `.issuedeckrc` values.
 */
function resolveConfig(opts: GlobalOptions): Config {
  const loaded = loadConfig(opts.config)
  return {
    ...loaded,
    dataDir: opts.dataDir ?? loaded.dataDir,
    actor: opts.actor ?? loaded.actor,
    sessionId: opts.session ?? loaded.sessionId,
  }
}

function getManager(): IssueManager {
  return createIssueManager(config ?? resolveConfig(program.opts<GlobalOptions>()))
}

function output(): { json: boolean } {
  return { json: program.opts<GlobalOptions>().json ?? false }
}

const program = new Command()
program
  .name('issuedeck')
  .description('File-backed issue tracker with dependencies and session history')
  .version('0.1.0')
  .option('--cwd <path>', 'Project directory (default: current directory)')
  .option('--config <path>', 'Path to .issuedeckrc config file (default: <cwd>/.issuedeckrc)')
  .option('--data-dir <path>', 'Data directory (overrides DATA_DIR)')
  .option('--actor <name>', 'Actor recorded on events (overrides ACTOR)')
  .option('--session <id>', 'Session id recorded on events (overrides SESSION_ID)')
  .option('--json', 'Print results as JSON', false)
  .hook('preAction', (_program, action) => {
    const opts = program.opts<GlobalOptions>()
    // Resolve --config to absolute before chdir so it isn't re-interpreted
    // relative to the new working directory
    if (opts.config) {
      program.setOptionValue('config', resolve(opts.config))
    }
    if (opts.cwd) {
      process.chdir(resolve(opts.cwd))
    }
    config = resolveConfig(program.opts<GlobalOptions>())
    setLoggerConfig(config)
    initSentry(config)
    setTrackerContext(config.dataDir, config.actor, config.sessionId)
    addBreadcrumb({ category: 'cli', message: action.name() })
  })

program
  .command('create')
  .description('Create an open issue')
  .argument('<title>', 'Issue title')
  .option('-d, --description <text>', 'Longer description')
  .option('-p, --priority <priority>', '0-4 or critical|high|medium|normal|low|deferred')
  .option('-t, --type <type>', 'bug | feature | task | epic | chore')
  .option('-a, --assignee <name>', 'Assignee')
  .option('--parent <id>', 'Parent issue id')
  .option('--discovered-from <id>', 'Issue this was discovered while working on')
  .option('--meta <key=value>', 'Metadata entry (repeatable)', collect)
  .action(async (title: string, opts: Omit<CreateCommandOptions, 'json'>) => {
    await createCommand(getManager(), title, { ...opts, ...output() })
  })

program
  .command('show')
  .description('Show one issue')
  .argument('<id>', 'Issue id')
  .action(async (id: string) => {
    await showCommand(getManager(), id, output())
  })

program
  .command('list')
  .description('List issues, optionally filtered')
  .option('-s, --status <status>', 'open | in_progress | blocked | closed | completed | pending_user_input')
  .option('-p, --priority <priority>', '0-4 or a priority name')
  .option('-t, --type <type>', 'Issue type')
  .option('-a, --assignee <name>', 'Assignee')
  .action(async (opts: Omit<ListCommandOptions, 'json'>) => {
    await listCommand(getManager(), { ...opts, ...output() })
  })

program
  .command('update')
  .description('Update fields of an issue')
  .argument('<id>', 'Issue id')
  .option('--title <text>', 'New title')
  .option('-d, --description <text>', 'New description')
  .option('-s, --status <status>', 'New status (done and waiting are accepted as aliases)')
  .option('-p, --priority <priority>', '0-4 or a priority name')
  .option('-a, --assignee <name>', 'New assignee')
  .option('--notes <text>', 'Blocking notes')
  .option('--meta <key=value>', 'Metadata entry to merge (repeatable)', collect)
  .action(async (id: string, opts: Omit<UpdateCommandOptions, 'json'>) => {
    await updateCommand(getManager(), id, { ...opts, ...output() })
  })

program
  .command('close')
  .description('Close an issue')
  .argument('<id>', 'Issue id')
  .option('-r, --reason <text>', 'Reason recorded on the closed event')
  .action(async (id: string, opts: { reason?: string }) => {
    await closeCommand(getManager(), id, { ...opts, ...output() })
  })

const dep = program.command('dep').description('Add or remove dependencies')

dep
  .command('add')
  .description('Mark <from> as blocked by <to>')
  .argument('<from>', 'Blocked issue id')
  .argument('<to>', 'Blocking issue id')
  .option('-t, --type <type>', 'blocks | related | parent-child | discovered-from')
  .action(async (fromId: string, toId: string, opts: { type?: string }) => {
    await depAddCommand(getManager(), fromId, toId, { ...opts, ...output() })
  })

dep
  .command('rm')
  .description('Remove the dependency <from> -> <to>')
  .argument('<from>', 'Blocked issue id')
  .argument('<to>', 'Blocking issue id')
  .action(async (fromId: string, toId: string) => {
    await depRemoveCommand(getManager(), fromId, toId, output())
  })

program
  .command('deps')
  .description('Issues that <id> is blocked by')
  .argument('<id>', 'Issue id')
  .action(async (id: string) => {
    await depsCommand(getManager(), id, output())
  })

program
  .command('dependents')
  .description('Issues blocked by <id>')
  .argument('<id>', 'Issue id')
  .action(async (id: string) => {
    await dependentsCommand(getManager(), id, output())
  })

program
  .command('ready')
  .description('Open issues with no unresolved blockers, most urgent first')
  .option('-n, --limit <n>', 'Show at most n issues')
  .action(async (opts: { limit?: string }) => {
    await readyCommand(getManager(), { ...opts, ...output() })
  })

program
  .command('blocked')
  .description('Issues with unresolved blockers')
  .action(async () => {
    await blockedCommand(getManager(), output())
  })

program
  .command('events')
  .description('Audit trail of an issue')
  .argument('<id>', 'Issue id')
  .action(async (id: string) => {
    await eventsCommand(getManager(), id, output())
  })

program
  .command('sessions')
  .description('Sessions that touched an issue')
  .argument('<id>', 'Issue id')
  .action(async (id: string) => {
    await sessionsCommand(getManager(), id, output())
  })

program
  .command('session-end')
  .description('Record that a session ended (one issue, or every in-progress issue it touched)')
  .argument('[id]', 'Issue id; omit to use --session')
  .option('-r, --reason <text>', 'Reason recorded on the event')
  .action(async (id: string | undefined, opts: { reason?: string }) => {
    await sessionEndCommand(getManager(), id, { ...opts, ...output() })
  })

program.parseAsync(process.argv).catch(async (error: unknown) => {
  logger.fatal({ err: error }, 'unhandled CLI error')
  captureException(error)
  await flushSentry()
  process.exit(1)
})
