import type {
  Dependency,
  Issue,
  IssueStatus,
  IssueType,
} from '@/types'

/** Typed, already-validated filters for {@link IssueIndex.listIssues}. */
export interface IndexFilter {
  status?: IssueStatus
  priority?: number
  issue_type?: IssueType
  assignee?: string
}

function edgeKey(fromId: string, toId: string): string {
  return `${fromId}\u0000${toId}`
}

function link(map: Map<string, Set<string>>, key: string, value: string): void {
  let set = map.get(key)
  if (!set) {
    set = new Set()
    map.set(key, set)
  }
  set.add(value)
}

function unlink(map: Map<string, Set<string>>, key: string, value: string): void {
  const set = map.get(key)
  if (!set) {
    return
  }
  set.delete(value)
  if (set.size === 0) {
    map.delete(key)
  }
}

/**
 * In-memory graph over one snapshot of the data directory.
 *
 * Built fresh from storage at the start of every manager operation and
 * dropped at the end; it is never shared between operations, so it needs no
 * invalidation. Holds the issue map, the edge set keyed by `(from, to)`, and
 * two adjacency views derived from the edges:
 *
 * - blockers of X: every `to_id` with an edge `X → to_id`
 * - dependents of X: every `from_id` with an edge `from_id → X`
 *
 * Iteration follows insertion order, which is file order when the index is
 * loaded from storage.
 *
 * @category Index
 */
export class IssueIndex {
  readonly issues = new Map<string, Issue>()
  private readonly edges = new Map<string, Dependency>()
  private readonly blockersOf = new Map<string, Set<string>>()
  private readonly dependentsOf = new Map<string, Set<string>>()

  /** Inserts or replaces an issue by id. */
  addIssue(issue: Issue): void {
    this.issues.set(issue.id, issue)
  }

  /** Inserts an edge; an existing edge for the same pair is replaced. */
  addDependency(dep: Dependency): void {
    this.edges.set(edgeKey(dep.from_id, dep.to_id), dep)
    link(this.blockersOf, dep.from_id, dep.to_id)
    link(this.dependentsOf, dep.to_id, dep.from_id)
  }

  /** @returns `true` if an edge was removed. */
  removeDependency(fromId: string, toId: string): boolean {
    if (!this.edges.delete(edgeKey(fromId, toId))) {
      return false
    }
    unlink(this.blockersOf, fromId, toId)
    unlink(this.dependentsOf, toId, fromId)
    return true
  }

  hasDependency(fromId: string, toId: string): boolean {
    return this.edges.has(edgeKey(fromId, toId))
  }

  getIssue(id: string): Issue | undefined {
    return this.issues.get(id)
  }

  /** Issues matching every supplied filter. No ordering beyond insertion order. */
  listIssues(filter: IndexFilter = {}): Issue[] {
    const out: Issue[] = []
    for (const issue of this.issues.values()) {
      if (filter.status !== undefined && issue.status !== filter.status) continue
      if (filter.priority !== undefined && issue.priority !== filter.priority) continue
      if (filter.issue_type !== undefined && issue.issue_type !== filter.issue_type) continue
      if (filter.assignee !== undefined && issue.assignee !== filter.assignee) continue
      out.push(issue)
    }
    return out
  }

  /** Ids of the issues `id` is blocked by. */
  getBlockers(id: string): string[] {
    return [...(this.blockersOf.get(id) ?? [])]
  }

  /** Ids of the issues blocked by `id`. */
  getDependents(id: string): string[] {
    return [...(this.dependentsOf.get(id) ?? [])]
  }

  getAllDependencies(): Dependency[] {
    return [...this.edges.values()]
  }

  get size(): number {
    return this.issues.size
  }

  /**
   * Builds an index from loaded records, issues first so that edges can be
   * resolved against them.
   */
  static from(issues: Iterable<Issue>, deps: Iterable<Dependency>): IssueIndex {
    const index = new IssueIndex()
    for (const issue of issues) {
      index.addIssue(issue)
    }
    for (const dep of deps) {
      index.addDependency(dep)
    }
    return index
  }
}
