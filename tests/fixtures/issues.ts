import { mkdtempSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { IssueManager, type IssueManagerOptions } from '@/core/issue/manager'
import type { Config, Dependency, Issue } from '@/types'
import { ConfigSchema } from '@/types'

/** Creates a default Config by parsing an empty object through the schema. */
export const defaultConfig = (): Config => ConfigSchema.parse({})

/** Fresh temporary directory for one test. */
export const makeTempDir = (): string => mkdtempSync(join(tmpdir(), 'issuedeck-test-'))

/** Creates a test Issue with sensible defaults, overrideable per-field. */
export function makeIssue(overrides: Partial<Issue> = {}): Issue {
  return {
    id: 'i-1',
    title: 'Test issue',
    description: '',
    status: 'open',
    priority: 2,
    issue_type: 'task',
    assignee: null,
    created_at: '2024-01-01T00:00:00.000Z',
    updated_at: '2024-01-01T00:00:00.000Z',
    closed_at: null,
    parent_id: null,
    discovered_from: null,
    blocking_notes: null,
    metadata: {},
    ...overrides,
  }
}

export function makeDependency(fromId: string, toId: string, overrides: Partial<Dependency> = {}): Dependency {
  return {
    from_id: fromId,
    to_id: toId,
    dep_type: 'blocks',
    created_at: '2024-01-01T00:00:00.000Z',
    ...overrides,
  }
}

/**
 * Clock that starts at 2024-01-01T00:00:00Z and advances one second per
 * call, so timestamps are distinct and ordered.
 */
export function steppingClock(): () => Date {
  let tick = 0
  return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++))
}

/** Ids `<prefix>-1`, `<prefix>-2`, … in call order. */
export function sequentialIds(prefix = 'id'): () => string {
  let n = 0
  return () => `${prefix}-${++n}`
}

/**
 * Manager on `dataDir` with a deterministic clock and ids. Issue and event
 * ids share one sequence.
 */
export function makeManager(dataDir: string, overrides: Partial<IssueManagerOptions> = {}): IssueManager {
  return new IssueManager({
    dataDir,
    now: steppingClock(),
    generateId: sequentialIds(),
    lockPollMs: 5,
    ...overrides,
  })
}
