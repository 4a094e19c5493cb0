import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest'
import chalk from 'chalk'
import { rmSync } from 'fs'
import { join } from 'path'
import {
  blockedCommand,
  createCommand,
  depAddCommand,
  listCommand,
  readyCommand,
  sessionEndCommand,
  sessionsCommand,
  showCommand,
  updateCommand,
} from '@/cli/commands'
import type { IssueManager } from '@/core/issue/manager'
import { IssueSchema } from '@/types'
import { makeManager, makeTempDir } from '@tests/fixtures/issues'

let dir: string
let manager: IssueManager
let printed: string[]
let errors: string[]

beforeAll(() => {
  chalk.level = 0
})

beforeEach(() => {
  dir = makeTempDir()
  manager = makeManager(join(dir, 'data'), { sessionId: 's1' })
  printed = []
  errors = []
  vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
    printed.push(String(line))
  })
  vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
    errors.push(String(line))
  })
})

afterEach(() => {
  vi.restoreAllMocks()
  process.exitCode = undefined
  rmSync(dir, { recursive: true, force: true })
})

const text = { json: false }
const json = { json: true }

describe('createCommand', () => {
  it('accepts a named priority and metadata', async () => {
    await createCommand(manager, 'Ship it', { ...json, priority: 'high', type: 'feature', meta: ['team=core'] })
    const issue = IssueSchema.parse(JSON.parse(printed.join('\n')))
    expect(issue).toMatchObject({ title: 'Ship it', priority: 1, issue_type: 'feature', metadata: { team: 'core' } })
    expect(process.exitCode).toBeUndefined()
  })

  it('reports a bad priority without creating anything', async () => {
    await createCommand(manager, 'Nope', { ...text, priority: 'urgent' })
    expect(process.exitCode).toBe(1)
    expect(errors[0]).toMatch(/^ValidationError: Invalid priority "urgent"/)
    expect((await manager.list())._unsafeUnwrap()).toEqual([])
  })
})

describe('showCommand', () => {
  it('prints the detail view', async () => {
    const { id } = (await manager.create({ title: 'Shown' }))._unsafeUnwrap()
    await showCommand(manager, id, text)
    expect(printed[0]).toBe(`Shown (${id})`)
  })

  it('exits 1 for an unknown id', async () => {
    await showCommand(manager, 'ghost', text)
    expect(printed).toEqual(['No issue with id ghost'])
    expect(process.exitCode).toBe(1)
  })
})

describe('listCommand and updateCommand', () => {
  it('filters by a named priority after an update', async () => {
    const { id } = (await manager.create({ title: 'Later' }))._unsafeUnwrap()
    await updateCommand(manager, id, { ...text, priority: 'deferred', notes: 'waiting on vendor' })
    printed = []

    await listCommand(manager, { ...text, priority: 'deferred' })
    expect(printed).toEqual([`${id}  open                P4  Later`])
  })

  it('says so when nothing matches', async () => {
    await listCommand(manager, { ...text, status: 'closed' })
    expect(printed).toEqual(['No issues found.'])
  })
})

describe('scheduling commands', () => {
  it('lists ready and blocked issues', async () => {
    const a = (await manager.create({ title: 'a' }))._unsafeUnwrap().id
    const b = (await manager.create({ title: 'b' }))._unsafeUnwrap().id
    await depAddCommand(manager, a, b, text)
    expect(printed).toEqual([`Added ${a} --blocks--> ${b}`])
    printed = []

    await readyCommand(manager, { ...text, limit: '5' })
    expect(printed).toEqual([`${b}  open                P2  b`])
    printed = []

    await blockedCommand(manager, text)
    expect(printed).toEqual([
      `${a}  open                P2  a`,
      `  blocked by ${b}  open                P2  b`,
    ])
  })

  it('reports a cycle as a failure', async () => {
    const a = (await manager.create({ title: 'a' }))._unsafeUnwrap().id
    await depAddCommand(manager, a, a, text)
    expect(process.exitCode).toBe(1)
    expect(errors).toEqual([`DependencyCycleError: Dependency would create a cycle: ${a} -> ${a}`])
  })
})

describe('session commands', () => {
  it('summarizes sessions and records a session end', async () => {
    const { id } = (await manager.create({ title: 'x' }))._unsafeUnwrap()
    await manager.update(id, { status: 'in_progress' })

    await sessionsCommand(manager, id, text)
    expect(printed).toEqual([`1 session(s) linked to ${id}`, '  s1: created, updated'])
    printed = []

    await sessionEndCommand(manager, undefined, text)
    expect(printed).toEqual([`Recorded session end on ${id}`])
  })

  it('reports an unknown issue as a no-op', async () => {
    await sessionEndCommand(manager, 'ghost', json)
    expect(printed).toEqual(['false'])
    expect(process.exitCode).toBeUndefined()
  })
})
