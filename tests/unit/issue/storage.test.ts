import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { appendFileSync, existsSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { IssueStorage } from '@/core/issue/storage'
import { CorruptRecordError, type IssueEvent, type JsonValue, StorageError } from '@/types'
import { makeDependency, makeIssue, makeTempDir } from '@tests/fixtures/issues'

const closedEvent = (id: string, issueId: string): IssueEvent => ({
  id,
  issue_id: issueId,
  event_type: 'closed',
  actor: 'tester',
  timestamp: '2024-01-01T00:00:00.000Z',
  session_id: null,
  changes: { reason: 'done' },
})

let dir: string
let storage: IssueStorage

beforeEach(() => {
  dir = makeTempDir()
  storage = new IssueStorage(join(dir, 'data'))
})

afterEach(() => rmSync(dir, { recursive: true, force: true }))

describe('IssueStorage', () => {
  it('loads empty collections when nothing has been written', () => {
    expect(storage.loadIssues()._unsafeUnwrap()).toEqual([])
    expect(storage.loadDependencies()._unsafeUnwrap()).toEqual([])
    expect(storage.loadEvents()._unsafeUnwrap()).toEqual([])
  })

  it('round-trips issues in order, one JSON record per line', () => {
    const issues = [makeIssue({ id: 'a' }), makeIssue({ id: 'b', metadata: { k: 1 } })]
    storage.saveIssues(issues)._unsafeUnwrap()

    expect(storage.loadIssues()._unsafeUnwrap()).toEqual(issues)
    const lines = readFileSync(storage.issuesPath, 'utf8').split('\n')
    expect(lines).toHaveLength(3)
    expect(lines[2]).toBe('')
  })

  it('replaces the whole snapshot on save and leaves no temp file', () => {
    storage.saveIssues([makeIssue({ id: 'a' }), makeIssue({ id: 'b' })])._unsafeUnwrap()
    storage.saveIssues([makeIssue({ id: 'c' })])._unsafeUnwrap()

    expect(storage.loadIssues()._unsafeUnwrap().map((i) => i.id)).toEqual(['c'])
    expect(existsSync(`${storage.issuesPath}.tmp`)).toBe(false)
  })

  it('round-trips dependencies', () => {
    const deps = [makeDependency('a', 'b'), makeDependency('b', 'c', { dep_type: 'related' })]
    storage.saveDependencies(deps)._unsafeUnwrap()
    expect(storage.loadDependencies()._unsafeUnwrap()).toEqual(deps)
  })

  it('appends events without rewriting earlier ones', () => {
    storage.appendEvent(closedEvent('e1', 'a'))._unsafeUnwrap()
    storage.appendEvent(closedEvent('e2', 'b'))._unsafeUnwrap()
    expect(storage.loadEvents()._unsafeUnwrap().map((e) => e.id)).toEqual(['e1', 'e2'])
  })

  it('normalizes legacy status aliases when reading', () => {
    const legacy = new IssueStorage(dir)
    writeFileSync(legacy.issuesPath, `${JSON.stringify({ ...makeIssue({ id: 'a' }), status: 'done' })}\n`)
    expect(legacy.loadIssues()._unsafeUnwrap()[0].status).toBe('completed')
  })

  it('fills defaults for optional fields missing from older records', () => {
    const legacy = new IssueStorage(dir)
    const minimal = {
      id: 'a',
      title: 'Old record',
      status: 'open',
      priority: 1,
      issue_type: 'bug',
      created_at: '2024-01-01T00:00:00.000Z',
      updated_at: '2024-01-01T00:00:00.000Z',
    }
    writeFileSync(legacy.issuesPath, `${JSON.stringify(minimal)}\n`)
    const [issue] = legacy.loadIssues()._unsafeUnwrap()
    expect(issue.description).toBe('')
    expect(issue.metadata).toEqual({})
    expect(issue.assignee).toBeNull()
    expect(issue.blocking_notes).toBeNull()
  })

  it('fails with the 1-based line number on malformed JSON', () => {
    const bad = new IssueStorage(dir)
    writeFileSync(bad.issuesPath, `${JSON.stringify(makeIssue())}\n{not json\n`)
    const error = bad.loadIssues()._unsafeUnwrapErr()
    expect(error).toBeInstanceOf(CorruptRecordError)
    expect(error instanceof CorruptRecordError && error.line).toBe(2)
    expect(error.path).toBe(bad.issuesPath)
  })

  it('fails on a record that does not match the schema', () => {
    const bad = new IssueStorage(dir)
    writeFileSync(bad.dependenciesPath, `${JSON.stringify({ from_id: 'a', to_id: 'b', dep_type: 'owns' })}\n`)
    const error = bad.loadDependencies()._unsafeUnwrapErr()
    expect(error).toBeInstanceOf(CorruptRecordError)
    expect(error.message).toContain(':1:')
  })

  it('skips blank lines', () => {
    const spaced = new IssueStorage(dir)
    writeFileSync(spaced.issuesPath, `\n${JSON.stringify(makeIssue())}\n\n`)
    expect(spaced.loadIssues()._unsafeUnwrap()).toHaveLength(1)
  })

  it('skips an unterminated trailing event but rejects a complete corrupt one', () => {
    storage.appendEvent(closedEvent('e1', 'a'))._unsafeUnwrap()
    appendFileSync(storage.eventsPath, '{"id":"e2","issue_')
    expect(storage.loadEvents()._unsafeUnwrap().map((e) => e.id)).toEqual(['e1'])

    appendFileSync(storage.eventsPath, '\n')
    const error = storage.loadEvents()._unsafeUnwrapErr()
    expect(error).toBeInstanceOf(CorruptRecordError)
    expect(error instanceof CorruptRecordError && error.line).toBe(2)
  })

  it('reports a record that cannot be serialized as a StorageError and leaves the snapshot alone', () => {
    const loop: { [key: string]: JsonValue } = {}
    loop.self = loop

    const error = storage.saveIssues([makeIssue({ id: 'a', metadata: { loop } })])._unsafeUnwrapErr()
    expect(error).toBeInstanceOf(StorageError)
    expect(error.message).toBe(`Failed to write ${storage.issuesPath}`)
    expect(existsSync(storage.issuesPath)).toBe(false)
  })
})
