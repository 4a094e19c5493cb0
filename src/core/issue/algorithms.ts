import { type Issue, RESOLVED_STATUSES } from '@/types'
import type { IssueIndex } from '@/core/issue/issue-index'

/**
 * An issue with at least one unresolved blocker, and those blockers.
 *
 * @category Scheduling
 */
export interface BlockedIssue {
  issue: Issue
  blocked_by: Issue[]
}

/**
 * Whether adding `fromId → toId` would close a cycle.
 *
 * Breadth-first walk over blockers starting at `toId`: if `fromId` is already
 * reachable from `toId`, the new edge would lead back to where it started.
 * A self edge is always a cycle.
 *
 * @category Scheduling
 */
export function detectCycle(index: IssueIndex, fromId: string, toId: string): boolean {
  if (fromId === toId) {
    return true
  }
  const seen = new Set<string>([toId])
  const queue: string[] = [toId]
  while (queue.length > 0) {
    const current = queue.shift()
    if (current === undefined) break
    for (const next of index.getBlockers(current)) {
      if (next === fromId) {
        return true
      }
      if (!seen.has(next)) {
        seen.add(next)
        queue.push(next)
      }
    }
  }
  return false
}

/** Blockers of `id` that exist and are not yet closed or completed. */
function unresolvedBlockers(index: IssueIndex, id: string): Issue[] {
  const out: Issue[] = []
  for (const blockerId of index.getBlockers(id)) {
    const blocker = index.getIssue(blockerId)
    if (blocker && !RESOLVED_STATUSES.has(blocker.status)) {
      out.push(blocker)
    }
  }
  return out
}

/**
 * Open issues with no unresolved blocker, highest priority first, oldest
 * first within a priority. `limit` truncates the sorted list.
 *
 * @category Scheduling
 */
export function getReadyIssues(index: IssueIndex, limit?: number): Issue[] {
  const ready = index
    .listIssues({ status: 'open' })
    .filter((issue) => unresolvedBlockers(index, issue.id).length === 0)
    .sort((a, b) => a.priority - b.priority || a.created_at.localeCompare(b.created_at))
  return limit === undefined ? ready : ready.slice(0, limit)
}

/**
 * Issues held up by at least one unresolved blocker, whatever their own
 * status. Independent of the manual `blocked` status.
 *
 * @category Scheduling
 */
export function getBlockedIssues(index: IssueIndex): BlockedIssue[] {
  const out: BlockedIssue[] = []
  for (const issue of index.issues.values()) {
    const blockers = unresolvedBlockers(index, issue.id)
    if (blockers.length > 0) {
      out.push({ issue, blocked_by: blockers })
    }
  }
  return out
}
