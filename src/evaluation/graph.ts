import { CyclicDependencyError } from '../errors.js'
import { logger as defaultLogger, type Logger } from '../logger.js'
import type { FlagValue } from '../types.js'

/**
 * Directed graph of flag-to-flag dependencies, keyed by flag key.
 *
 * An edge `from -> to` means `from` depends on `to`, so `to` is evaluated
 * first. The graph also holds the results of one evaluation pass so that
 * dependents can read them; that cache is never shared between passes.
 */
export class DependencyGraph {
  /** flag key -> keys it depends on */
  readonly dependencies: Map<string, Set<string>> = new Map()
  /** flag key -> keys that depend on it */
  readonly dependents: Map<string, Set<string>> = new Map()
  readonly flags: Set<string> = new Set()
  private readonly evaluationCache: Map<string, FlagValue> = new Map()

  constructor(private readonly log: Logger = defaultLogger) {}

  addFlag(flagKey: string): void {
    this.flags.add(flagKey)
  }

  /** Records that `flagKey` depends on `dependencyKey`. */
  addDependency(flagKey: string, dependencyKey: string): void {
    this.flags.add(flagKey)
    this.flags.add(dependencyKey)
    edges(this.dependencies, flagKey).add(dependencyKey)
    edges(this.dependents, dependencyKey).add(flagKey)
  }

  getDependencies(flagKey: string): ReadonlySet<string> {
    return this.dependencies.get(flagKey) ?? EMPTY
  }

  getDependents(flagKey: string): ReadonlySet<string> {
    return this.dependents.get(flagKey) ?? EMPTY
  }

  /** Removes a flag and every edge touching it. */
  removeFlag(flagKey: string): void {
    if (!this.flags.has(flagKey)) return

    for (const dependency of this.getDependencies(flagKey)) {
      this.dependents.get(dependency)?.delete(flagKey)
    }
    for (const dependent of this.getDependents(flagKey)) {
      this.dependencies.get(dependent)?.delete(flagKey)
    }
    this.dependencies.delete(flagKey)
    this.dependents.delete(flagKey)
    this.flags.delete(flagKey)
  }

  hasCycles(): boolean {
    try {
      this.topologicalSort()
      return false
    } catch (err) {
      if (err instanceof CyclicDependencyError) return true
      throw err
    }
  }

  /**
   * Returns flags in evaluation order, dependencies first (Kahn's algorithm).
   * Throws {@link CyclicDependencyError} naming an unresolved flag if a cycle remains.
   */
  topologicalSort(): string[] {
    const inDegree = new Map<string, number>()
    const queue: string[] = []
    for (const flagKey of this.flags) {
      const degree = this.getDependencies(flagKey).size
      inDegree.set(flagKey, degree)
      if (degree === 0) queue.push(flagKey)
    }

    const result: string[] = []
    for (let head = 0; head < queue.length; head++) {
      const flagKey = queue[head]
      if (flagKey === undefined) break
      result.push(flagKey)
      for (const dependent of this.getDependents(flagKey)) {
        const degree = (inDegree.get(dependent) ?? 0) - 1
        inDegree.set(dependent, degree)
        if (degree === 0) queue.push(dependent)
      }
    }

    if (result.length !== this.flags.size) {
      const resolved = new Set(result)
      for (const flagKey of this.flags) {
        if (!resolved.has(flagKey)) throw new CyclicDependencyError(flagKey)
      }
    }
    return result
  }

  /**
   * Returns every flag that sits on a cycle. Uses an explicit stack so that
   * deep dependency chains cannot exhaust the call stack.
   */
  detectCycles(): string[] {
    const done = new Set<string>()
    const onPath = new Map<string, number>()
    const cycleFlags = new Set<string>()

    for (const root of this.flags) {
      if (done.has(root)) continue

      const path: string[] = [root]
      const pending: Array<Iterator<string>> = [this.getDependencies(root)[Symbol.iterator]()]
      onPath.set(root, 0)

      while (pending.length > 0) {
        const iterator = pending[pending.length - 1]
        const current = path[path.length - 1]
        if (iterator === undefined || current === undefined) break

        const next = iterator.next()
        if (next.done) {
          pending.pop()
          path.pop()
          onPath.delete(current)
          done.add(current)
          continue
        }

        const dependency = next.value
        const position = onPath.get(dependency)
        if (position !== undefined) {
          // Back edge: everything on the path from the dependency onwards is a cycle
          for (const flagKey of path.slice(position)) cycleFlags.add(flagKey)
        } else if (!done.has(dependency) && this.flags.has(dependency)) {
          onPath.set(dependency, path.length)
          path.push(dependency)
          pending.push(this.getDependencies(dependency)[Symbol.iterator]())
        }
      }
    }

    return Array.from(cycleFlags)
  }

  /**
   * Removes cycle participants until the graph is acyclic and returns the
   * removed keys. Removed flags are excluded from evaluation rather than failing it.
   */
  removeCycles(): string[] {
    const removed: string[] = []
    for (let cycleFlags = this.detectCycles(); cycleFlags.length > 0; cycleFlags = this.detectCycles()) {
      for (const flagKey of cycleFlags) {
        this.removeFlag(flagKey)
        this.log.warn({ flagKey }, 'Removed flag due to cyclic dependency')
        removed.push(flagKey)
      }
    }
    return removed
  }

  /** Returns a new graph with `requestedKeys` and everything they transitively depend on. */
  filterByKeys(requestedKeys: Iterable<string>): DependencyGraph {
    const required = new Set<string>()
    const queue: string[] = []
    for (const flagKey of requestedKeys) {
      if (!required.has(flagKey)) {
        required.add(flagKey)
        queue.push(flagKey)
      }
    }

    for (let head = 0; head < queue.length; head++) {
      const flagKey = queue[head]
      if (flagKey === undefined) break
      for (const dependency of this.getDependencies(flagKey)) {
        if (!required.has(dependency)) {
          required.add(dependency)
          queue.push(dependency)
        }
      }
    }

    const filtered = new DependencyGraph(this.log)
    for (const flagKey of this.flags) {
      if (!required.has(flagKey)) continue
      filtered.addFlag(flagKey)
      for (const dependency of this.getDependencies(flagKey)) {
        if (required.has(dependency)) filtered.addDependency(flagKey, dependency)
      }
    }
    return filtered
  }

  /** Returns a structural copy with an empty evaluation cache. */
  copy(): DependencyGraph {
    return this.filterByKeys(this.flags)
  }

  cacheResult(flagKey: string, result: FlagValue): void {
    this.evaluationCache.set(flagKey, result)
  }

  getCachedResult(flagKey: string): FlagValue | undefined {
    return this.evaluationCache.get(flagKey)
  }

  clearCache(): void {
    this.evaluationCache.clear()
  }
}

const EMPTY: ReadonlySet<string> = new Set()

function edges(map: Map<string, Set<string>>, key: string): Set<string> {
  let set = map.get(key)
  if (!set) {
    set = new Set()
    map.set(key, set)
  }
  return set
}
