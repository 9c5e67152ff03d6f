import { InconclusiveMatchError } from '../errors.js'
import { logger as defaultLogger, type Logger } from '../logger.js'
import { parsePayload } from '../schema.js'
import type {
  CohortDefinitions,
  ConditionGroup,
  EvaluationInput,
  FlagDefinition,
  FlagPropertyFilter,
  FlagValue,
  JsonValue,
  Properties,
} from '../types.js'
import type { DependencyGraph } from './graph.js'
import { hash } from './hash.js'
import { matchCohort, matchProperty } from './properties.js'

const FLAG_DEPENDENCY_OPERATOR = 'flag_evaluates_to'

/** Results of flags evaluated earlier in the same pass, and how to find them by id. */
export interface DependencyScope {
  graph: DependencyGraph
  /** flag id (stringified) -> flag key */
  idToKey: ReadonlyMap<string, string>
}

export interface FlagEvaluationOptions {
  cohorts?: CohortDefinitions
  log?: Logger
}

/**
 * Compares a dependency's result with the value a `flag` filter expects:
 * `true` matches any enabled result, `false` only `false`, and a string
 * only that exact variant.
 */
export function matchFlagDependency(filterValue: boolean | string, flagResult: FlagValue): boolean {
  if (filterValue === true) return flagResult !== false
  if (filterValue === false) return flagResult === false
  return flagResult === filterValue
}

/**
 * Resolves a `flag` filter from the pass's cached results, negation included.
 *
 * An unsupported operator or value type never matches, negated or not. Throws
 * {@link InconclusiveMatchError} when the dependency has no result.
 */
export function resolveFlagFilter(filter: FlagPropertyFilter, scope: DependencyScope, log: Logger = defaultLogger): boolean {
  if (filter.operator !== FLAG_DEPENDENCY_OPERATOR) {
    log.warn({ operator: filter.operator, dependency: filter.key }, `Unsupported operator for flag dependency, only '${FLAG_DEPENDENCY_OPERATOR}' is supported`)
    return false
  }
  const expected = filter.value
  if (typeof expected !== 'boolean' && typeof expected !== 'string') {
    log.warn({ valueType: typeof expected, dependency: filter.key }, 'Invalid value type for flag dependency, expected boolean or string')
    return false
  }

  const dependencyKey = scope.idToKey.get(filter.key) ?? (scope.graph.flags.has(filter.key) ? filter.key : undefined)
  if (dependencyKey === undefined) {
    throw new InconclusiveMatchError(`Flag dependency '${filter.key}' is not available locally`)
  }
  const result = scope.graph.getCachedResult(dependencyKey)
  if (result === undefined) {
    throw new InconclusiveMatchError(`Flag dependency '${dependencyKey}' has no result in this evaluation`)
  }
  return matchFlagDependency(expected, result) !== (filter.negation ?? false)
}

export interface VariantRange {
  key: string
  valueMin: number
  valueMax: number
}

/** Half-open ranges over [0, 1) built by summing variant percentages in list order. */
export function variantLookupTable(flag: FlagDefinition): VariantRange[] {
  const table: VariantRange[] = []
  let valueMin = 0
  for (const variant of flag.filters.multivariate?.variants ?? []) {
    const valueMax = valueMin + variant.rolloutPercentage / 100
    table.push({ key: variant.key, valueMin, valueMax })
    valueMin = valueMax
  }
  return table
}

export function getMatchingVariant(flag: FlagDefinition, identity: string): string | undefined {
  const value = hash(flag.key, identity, 'variant')
  return variantLookupTable(flag).find((range) => value >= range.valueMin && value < range.valueMax)?.key
}

/**
 * Evaluates a flag's condition groups for one identity (a distinct id, or a
 * group key for group flags).
 *
 * Groups are tried in order and the first match wins. Throws
 * {@link InconclusiveMatchError} only when no group matched and at least one
 * could not be decided.
 */
export function evaluateFlag(
  flag: FlagDefinition,
  identity: string,
  properties: Properties,
  scope: DependencyScope,
  options: FlagEvaluationOptions = {},
): FlagValue {
  const log = options.log ?? defaultLogger
  const cohorts = options.cohorts ?? {}
  const variantKeys = new Set((flag.filters.multivariate?.variants ?? []).map((v) => v.key))
  let inconclusive = false

  for (const condition of flag.filters.groups) {
    try {
      if (isConditionMatch(flag, identity, condition, properties, scope, cohorts, log)) {
        const override = condition.variant
        const variant = override !== undefined && variantKeys.has(override) ? override : getMatchingVariant(flag, identity)
        return variant ?? true
      }
    } catch (err) {
      if (!(err instanceof InconclusiveMatchError)) throw err
      log.debug({ flagKey: flag.key, err }, 'Condition inconclusive')
      inconclusive = true
    }
  }

  if (inconclusive) {
    throw new InconclusiveMatchError("Can't determine if feature flag is enabled or not with given properties")
  }
  return false
}

function isConditionMatch(
  flag: FlagDefinition,
  identity: string,
  condition: ConditionGroup,
  properties: Properties,
  scope: DependencyScope,
  cohorts: CohortDefinitions,
  log: Logger,
): boolean {
  for (const filter of condition.properties) {
    let matches: boolean
    switch (filter.type) {
      case 'flag':
        matches = resolveFlagFilter(filter, scope, log)
        break
      case 'cohort':
        matches = matchCohort(filter, properties, cohorts, (inner) => resolveFlagFilter(inner, scope, log), log)
        break
      default:
        matches = matchProperty(filter, properties, log)
    }
    if (!matches) return false
  }

  if (condition.rolloutPercentage === null) return true
  return hash(flag.key, identity) <= condition.rolloutPercentage / 100
}

/**
 * Evaluates a flag the way local evaluation dispatches it: inactive flags are
 * `false`, experience-continuity flags need the server, and group flags are
 * evaluated for the caller's group of the flag's aggregation type.
 */
export function computeFlagLocally(
  flag: FlagDefinition,
  input: EvaluationInput,
  scope: DependencyScope,
  log: Logger = defaultLogger,
): FlagValue {
  if (flag.ensureExperienceContinuity) {
    throw new InconclusiveMatchError('Flag has experience continuity enabled')
  }
  if (!flag.active) return false

  const options: FlagEvaluationOptions = { cohorts: input.cohortProperties ?? {}, log }
  const groupTypeIndex = flag.filters.aggregationGroupTypeIndex
  if (groupTypeIndex === undefined) {
    return evaluateFlag(flag, input.distinctId, input.personProperties ?? {}, scope, options)
  }

  const groupName = input.groupTypeMapping?.[String(groupTypeIndex)]
  if (groupName === undefined) {
    log.warn({ flagKey: flag.key, groupTypeIndex }, 'Unknown group type index for group flag')
    return false
  }
  const groupKey = input.groups?.[groupName]
  if (groupKey === undefined) {
    log.debug({ flagKey: flag.key, groupName }, "Group flag evaluated without the caller's group")
    return false
  }
  return evaluateFlag(flag, groupKey, input.groupProperties?.[groupName] ?? {}, scope, options)
}

/** The payload configured for a resolved value, if any. */
export function getFlagPayload(flag: FlagDefinition, value: FlagValue): JsonValue | undefined {
  if (value === false) return undefined
  const raw = flag.filters.payloads?.[String(value)]
  return raw === undefined ? undefined : parsePayload(raw)
}
