import { isAbsolute, resolve } from 'path'
import type { Config } from '@/types'
import { IssueManager, type IssueManagerOptions } from '@/core/issue/manager'

/**
 * Builds an {@link IssueManager} from a loaded {@link Config}.
 *
 * A relative `config.dataDir` resolves against the current working
 * directory, so call this after `--cwd` has been applied.
 *
 * @param overrides - Options that win over the config (tests inject `now`
 *   and `generateId` here).
 * @category Issue Manager
 */
export function createIssueManager(
  config: Config,
  overrides: Partial<IssueManagerOptions> = {},
): IssueManager {
  const dataDir = isAbsolute(config.dataDir) ? config.dataDir : resolve(config.dataDir)
  return new IssueManager({
    dataDir,
    actor: config.actor,
    sessionId: config.sessionId || null,
    lockTimeoutMs: config.lockTimeoutMs,
    lockPollMs: config.lockPollMs,
    ...overrides,
  })
}
