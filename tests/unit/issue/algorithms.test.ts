import { describe, expect, it } from 'vitest'
import { detectCycle, getBlockedIssues, getReadyIssues } from '@/core/issue/algorithms'
import { IssueIndex } from '@/core/issue/issue-index'
import { makeDependency, makeIssue } from '@tests/fixtures/issues'

describe('detectCycle', () => {
  const chain = IssueIndex.from(
    [makeIssue({ id: 'a' }), makeIssue({ id: 'b' }), makeIssue({ id: 'c' }), makeIssue({ id: 'd' })],
    [makeDependency('a', 'b'), makeDependency('b', 'c')],
  )

  it('rejects a direct reversal', () => {
    expect(detectCycle(chain, 'b', 'a')).toBe(true)
  })

  it('rejects closing a longer loop', () => {
    expect(detectCycle(chain, 'c', 'a')).toBe(true)
  })

  it('rejects a self edge', () => {
    expect(detectCycle(chain, 'd', 'd')).toBe(true)
  })

  it('accepts edges that keep the graph acyclic', () => {
    expect(detectCycle(chain, 'a', 'c')).toBe(false)
    expect(detectCycle(chain, 'c', 'd')).toBe(false)
    expect(detectCycle(chain, 'd', 'a')).toBe(false)
  })

  it('follows every dependency type', () => {
    const related = IssueIndex.from(
      [makeIssue({ id: 'a' }), makeIssue({ id: 'b' })],
      [makeDependency('a', 'b', { dep_type: 'related' })],
    )
    expect(detectCycle(related, 'b', 'a')).toBe(true)
  })
})

describe('getReadyIssues', () => {
  const index = IssueIndex.from(
    [
      makeIssue({ id: 'late-p1', priority: 1, created_at: '2024-01-03T00:00:00.000Z' }),
      makeIssue({ id: 'early-p1', priority: 1, created_at: '2024-01-02T00:00:00.000Z' }),
      makeIssue({ id: 'p0', priority: 0, created_at: '2024-01-05T00:00:00.000Z' }),
      makeIssue({ id: 'blocked', priority: 0 }),
      makeIssue({ id: 'wip', status: 'in_progress', priority: 0 }),
      makeIssue({ id: 'done-blocker', status: 'completed' }),
      makeIssue({ id: 'unblocked', priority: 4 }),
    ],
    [makeDependency('blocked', 'wip'), makeDependency('unblocked', 'done-blocker')],
  )

  it('returns open issues with no unresolved blocker by priority, then age', () => {
    expect(getReadyIssues(index).map((i) => i.id)).toEqual(['p0', 'early-p1', 'late-p1', 'unblocked'])
  })

  it('truncates to the limit after sorting', () => {
    expect(getReadyIssues(index, 2).map((i) => i.id)).toEqual(['p0', 'early-p1'])
    expect(getReadyIssues(index, 0)).toEqual([])
  })

  it('ignores blockers whose issue no longer exists', () => {
    const dangling = IssueIndex.from([makeIssue({ id: 'a' })], [makeDependency('a', 'gone')])
    expect(getReadyIssues(dangling).map((i) => i.id)).toEqual(['a'])
  })
})

describe('getBlockedIssues', () => {
  it('pairs each issue with every unresolved blocker, whatever its own status', () => {
    const index = IssueIndex.from(
      [
        makeIssue({ id: 'a', status: 'in_progress' }),
        makeIssue({ id: 'b' }),
        makeIssue({ id: 'c', status: 'blocked' }),
        makeIssue({ id: 'd', status: 'closed' }),
      ],
      [makeDependency('a', 'b'), makeDependency('a', 'c'), makeDependency('a', 'd')],
    )
    const blocked = getBlockedIssues(index)
    expect(blocked).toHaveLength(1)
    expect(blocked[0].issue.id).toBe('a')
    expect(blocked[0].blocked_by.map((i) => i.id)).toEqual(['b', 'c'])
  })

  it('drops an issue once all of its blockers are resolved', () => {
    const index = IssueIndex.from(
      [makeIssue({ id: 'a' }), makeIssue({ id: 'b', status: 'closed' }), makeIssue({ id: 'c', status: 'completed' })],
      [makeDependency('a', 'b'), makeDependency('a', 'c')],
    )
    expect(getBlockedIssues(index)).toEqual([])
  })

  it('does not report the manual blocked status on its own', () => {
    const index = IssueIndex.from([makeIssue({ id: 'a', status: 'blocked' })], [])
    expect(getBlockedIssues(index)).toEqual([])
  })
})
