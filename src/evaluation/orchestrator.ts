import { CyclicDependencyError, InconclusiveMatchError, MissingDependencyError } from '../errors.js'
import { logger as defaultLogger, type Logger } from '../logger.js'
import type { EvaluationInput, FlagDefinition, FlagValue } from '../types.js'
import { computeFlagLocally } from './evaluator.js'
import { DependencyGraph } from './graph.js'

/** A flag set indexed for evaluation. Built once per definition load and never mutated. */
export interface PreparedFlags {
  /** Cycle-free dependency graph over every flag key */
  graph: DependencyGraph
  idToKey: ReadonlyMap<string, string>
  flagsByKey: ReadonlyMap<string, FlagDefinition>
  /** Flags dropped from the graph because they sat on a cycle */
  removedByCycles: readonly string[]
}

/** Ids (stringified) of the flags referenced by `flag` filters in the flag's conditions. */
export function extractFlagDependencies(flag: FlagDefinition): Set<string> {
  const dependencies = new Set<string>()
  for (const condition of flag.filters.groups) {
    for (const filter of condition.properties) {
      if (filter.type === 'flag' && filter.key) dependencies.add(String(filter.key))
    }
  }
  return dependencies
}

/**
 * Builds the dependency graph for a flag set, keyed by flag key. Dependencies
 * on unknown flags are logged and dropped; cycles are removed.
 */
export function buildDependencyGraph(
  flags: readonly FlagDefinition[],
  log: Logger = defaultLogger,
): { graph: DependencyGraph; idToKey: Map<string, string>; removedByCycles: string[] } {
  const graph = new DependencyGraph(log)
  const idToKey = new Map<string, string>()

  for (const flag of flags) {
    graph.addFlag(flag.key)
    idToKey.set(String(flag.id), flag.key)
  }

  for (const flag of flags) {
    for (const dependencyId of extractFlagDependencies(flag)) {
      // Filters normally reference ids; a bare key is accepted too
      const dependencyKey = idToKey.get(dependencyId) ?? (graph.flags.has(dependencyId) ? dependencyId : undefined)
      if (dependencyKey === undefined) {
        const missing = new MissingDependencyError(flag.key, dependencyId)
        log.warn({ flagKey: flag.key, dependencyId }, `${missing.message}. This dependency will be ignored`)
        continue
      }
      graph.addDependency(flag.key, dependencyKey)
    }
  }

  let removedByCycles: string[] = []
  if (graph.hasCycles()) {
    removedByCycles = graph.removeCycles()
    log.warn({ removed: removedByCycles }, 'Removed flags due to cyclic dependencies')
  }

  return { graph, idToKey, removedByCycles }
}

export function prepareFlags(flags: readonly FlagDefinition[], log: Logger = defaultLogger): PreparedFlags {
  const { graph, idToKey, removedByCycles } = buildDependencyGraph(flags, log)
  return {
    graph,
    idToKey,
    flagsByKey: new Map(flags.map((flag) => [flag.key, flag])),
    removedByCycles,
  }
}

/**
 * Evaluates flags in dependency order for one identity.
 *
 * Each result is cached in a graph private to this call before its dependents
 * run. Flags that cannot be decided locally are absent from the returned map;
 * absence means "fall back", not `false`.
 */
export function evaluateFlagsWithDependencies(
  flags: readonly FlagDefinition[] | PreparedFlags,
  input: EvaluationInput,
  requestedKeys?: Iterable<string>,
  log: Logger = defaultLogger,
): Map<string, FlagValue> {
  const prepared = isPrepared(flags) ? flags : prepareFlags(flags, log)
  const graph = requestedKeys ? prepared.graph.filterByKeys(requestedKeys) : prepared.graph.copy()
  const scope = { graph, idToKey: prepared.idToKey }

  let order: string[]
  try {
    order = graph.topologicalSort()
  } catch (err) {
    if (!(err instanceof CyclicDependencyError)) throw err
    log.error({ flagKey: err.flagKey }, 'Unexpected cyclic dependency after cycle removal')
    order = Array.from(graph.flags)
  }

  const results = new Map<string, FlagValue>()
  for (const flagKey of order) {
    const flag = prepared.flagsByKey.get(flagKey)
    if (!flag) continue
    try {
      const result = computeFlagLocally(flag, input, scope, log)
      results.set(flagKey, result)
      graph.cacheResult(flagKey, result)
    } catch (err) {
      if (!(err instanceof InconclusiveMatchError)) throw err
      log.debug({ flagKey, reason: err.message }, 'Flag could not be evaluated locally')
    }
  }
  return results
}

function isPrepared(flags: readonly FlagDefinition[] | PreparedFlags): flags is PreparedFlags {
  return 'flagsByKey' in flags
}
