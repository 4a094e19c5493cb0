import { describe, expect, it } from 'vitest'
import { IssueIndex } from '@/core/issue/issue-index'
import { makeDependency, makeIssue } from '@tests/fixtures/issues'

const build = () =>
  IssueIndex.from(
    [
      makeIssue({ id: 'a', status: 'open', priority: 1, assignee: 'ann' }),
      makeIssue({ id: 'b', status: 'in_progress', priority: 1, issue_type: 'bug' }),
      makeIssue({ id: 'c', status: 'open', priority: 3, assignee: 'ann', issue_type: 'bug' }),
    ],
    [makeDependency('a', 'b'), makeDependency('a', 'c'), makeDependency('b', 'c')],
  )

describe('IssueIndex', () => {
  it('looks issues up by id', () => {
    const index = build()
    expect(index.getIssue('b')?.status).toBe('in_progress')
    expect(index.getIssue('zzz')).toBeUndefined()
    expect(index.size).toBe(3)
  })

  it('replaces an issue with the same id', () => {
    const index = build()
    index.addIssue(makeIssue({ id: 'a', title: 'renamed' }))
    expect(index.getIssue('a')?.title).toBe('renamed')
    expect(index.size).toBe(3)
  })

  it('lists everything in insertion order without filters', () => {
    expect(build().listIssues().map((i) => i.id)).toEqual(['a', 'b', 'c'])
  })

  it('applies filters conjunctively', () => {
    const index = build()
    expect(index.listIssues({ status: 'open' }).map((i) => i.id)).toEqual(['a', 'c'])
    expect(index.listIssues({ assignee: 'ann', issue_type: 'bug' }).map((i) => i.id)).toEqual(['c'])
    expect(index.listIssues({ priority: 1, status: 'open' }).map((i) => i.id)).toEqual(['a'])
    expect(index.listIssues({ status: 'closed' })).toEqual([])
  })

  it('exposes blockers and dependents', () => {
    const index = build()
    expect(index.getBlockers('a')).toEqual(['b', 'c'])
    expect(index.getDependents('c')).toEqual(['a', 'b'])
    expect(index.getBlockers('c')).toEqual([])
    expect(index.getDependents('a')).toEqual([])
  })

  it('removes an edge from every view', () => {
    const index = build()
    expect(index.removeDependency('a', 'c')).toBe(true)
    expect(index.hasDependency('a', 'c')).toBe(false)
    expect(index.getBlockers('a')).toEqual(['b'])
    expect(index.getDependents('c')).toEqual(['b'])
    expect(index.getAllDependencies()).toHaveLength(2)
  })

  it('reports false when removing an edge that does not exist', () => {
    const index = build()
    expect(index.removeDependency('c', 'a')).toBe(false)
    expect(index.getAllDependencies()).toHaveLength(3)
  })
})
