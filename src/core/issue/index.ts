/**
 * Public entry point: the issue manager, its inputs and results, and the
 * lower layers for callers that compose their own transactions.
 *
 * @module issue
 */
export { createIssueManager } from '@/core/issue/factory'
export {
  IssueManager,
  type IssueManagerOptions,
  type IssueSessions,
} from '@/core/issue/manager'
export {
  type BlockedIssue,
  detectCycle,
  getBlockedIssues,
  getReadyIssues,
} from '@/core/issue/algorithms'
export { IssueIndex, type IndexFilter } from '@/core/issue/issue-index'
export {
  DirectoryLock,
  type DirectoryLockOptions,
  LOCK_FILE,
  type LockError,
} from '@/core/issue/lock'
export {
  DEPENDENCIES_FILE,
  EVENTS_FILE,
  ISSUES_FILE,
  IssueStorage,
} from '@/core/issue/storage'
export {
  type CreateIssueInput,
  formatZodError,
  type ListIssuesFilter,
  type UpdateIssueInput,
  validate,
} from '@/core/issue/validation'
export { loadConfig, parseRc } from '@/core/config'
export * from '@/types'
