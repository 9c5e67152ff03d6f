import { InconclusiveMatchError } from '../errors.js'
import { logger as defaultLogger, type Logger } from '../logger.js'
import type {
  CohortDefinitions,
  CohortPropertyFilter,
  FlagPropertyFilter,
  GroupPropertyFilter,
  PersonPropertyFilter,
  Properties,
  PropertyFilter,
  PropertyGroup,
  PropertyOperator,
} from '../types.js'

/** Resolves a `flag` filter found inside a cohort definition. */
export type FlagFilterResolver = (filter: FlagPropertyFilter) => boolean

const NULL_VALUES_ALLOWED_OPERATORS: readonly PropertyOperator[] = ['is_not']

/**
 * Matches one person or group filter against a property bag.
 *
 * Throws {@link InconclusiveMatchError} when the property is absent (other
 * than for `is_set`), for `is_not_set`, and for unparseable dates.
 */
export function matchProperty(
  filter: PersonPropertyFilter | GroupPropertyFilter,
  properties: Properties,
  log: Logger = defaultLogger,
): boolean {
  const { key, operator, value } = filter

  if (operator === 'is_not_set') {
    throw new InconclusiveMatchError('Operator is_not_set is not supported')
  }
  const present = Object.prototype.hasOwnProperty.call(properties, key)
  if (operator === 'is_set') return present
  if (!present) {
    throw new InconclusiveMatchError(`Property ${key} not found in property values`)
  }

  const override = properties[key]
  if (override == null && !NULL_VALUES_ALLOWED_OPERATORS.includes(operator)) {
    // The value was supplied, so this is a definite non-match
    log.debug({ key, operator }, 'Property value is null')
    return false
  }

  switch (operator) {
    case 'exact':
      return exactMatch(value, override)
    case 'is_not':
      return !exactMatch(value, override)
    case 'icontains':
      return String(override).toLowerCase().includes(String(value).toLowerCase())
    case 'not_icontains':
      return !String(override).toLowerCase().includes(String(value).toLowerCase())
    case 'regex': {
      const pattern = compileRegex(value)
      return pattern !== null && pattern.test(String(override))
    }
    case 'not_regex': {
      // An invalid pattern is a non-match for both regex operators
      const pattern = compileRegex(value)
      return pattern !== null && !pattern.test(String(override))
    }
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      return compare(override, value, operator)
    case 'is_date_before':
    case 'is_date_after': {
      const target = parseFilterDate(value)
      const actual = toDate(override)
      return operator === 'is_date_before' ? actual < target : actual > target
    }
  }
}

function exactMatch(value: unknown, override: unknown): boolean {
  const needle = String(override).toLowerCase()
  if (Array.isArray(value)) {
    return value.some((candidate) => String(candidate).toLowerCase() === needle)
  }
  return String(value).toLowerCase() === needle
}

function compileRegex(value: unknown): RegExp | null {
  try {
    return new RegExp(String(value))
  } catch {
    return null
  }
}

/** Ordering comparison, only between operands of the same runtime type. */
function compare(lhs: unknown, rhs: unknown, operator: 'gt' | 'gte' | 'lt' | 'lte'): boolean {
  if (typeof lhs === 'number' && typeof rhs === 'number') return ordered(lhs, rhs, operator)
  if (typeof lhs === 'string' && typeof rhs === 'string') return ordered(lhs, rhs, operator)
  return false
}

function ordered<T extends number | string>(lhs: T, rhs: T, operator: 'gt' | 'gte' | 'lt' | 'lte'): boolean {
  switch (operator) {
    case 'gt':
      return lhs > rhs
    case 'gte':
      return lhs >= rhs
    case 'lt':
      return lhs < rhs
    case 'lte':
      return lhs <= rhs
  }
}

// -- Dates ------------------------------------------------------------------

const RELATIVE_DATE = /^-?(?<number>[0-9]+)(?<interval>[a-z])$/

/**
 * Parses offsets such as `-7d` or `2w` into a date that far in the past.
 * Returns null for anything else, including offsets of 10000 or more.
 */
export function parseRelativeDate(value: string, now: Date = new Date()): Date | null {
  const match = RELATIVE_DATE.exec(value)
  if (!match?.groups) return null

  const amount = parseInt(match.groups.number ?? '', 10)
  if (!Number.isFinite(amount) || amount >= 10_000) return null

  const date = new Date(now.getTime())
  switch (match.groups.interval) {
    case 'h':
      date.setUTCHours(date.getUTCHours() - amount)
      break
    case 'd':
      date.setUTCDate(date.getUTCDate() - amount)
      break
    case 'w':
      date.setUTCDate(date.getUTCDate() - amount * 7)
      break
    case 'm':
      date.setUTCMonth(date.getUTCMonth() - amount)
      break
    case 'y':
      date.setUTCFullYear(date.getUTCFullYear() - amount)
      break
    default:
      return null
  }
  return date
}

function parseFilterDate(value: unknown): Date {
  if (typeof value === 'boolean') {
    throw new InconclusiveMatchError('Date operations cannot be performed on boolean values')
  }
  const relative = parseRelativeDate(String(value))
  if (relative) return relative
  try {
    return toDate(value)
  } catch {
    throw new InconclusiveMatchError(`The date set on the flag is not a valid format: ${String(value)}`)
  }
}

function toDate(value: unknown): Date {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw new InconclusiveMatchError('Invalid date')
    return value
  }
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value)
    if (!Number.isNaN(date.getTime())) return date
    throw new InconclusiveMatchError(`${value} is in an invalid date format`)
  }
  throw new InconclusiveMatchError('The date provided must be a string, number, or Date')
}

// -- Cohorts ------------------------------------------------------------------

/** Matches a cohort filter using the locally supplied cohort definitions. */
export function matchCohort(
  filter: CohortPropertyFilter,
  properties: Properties,
  cohorts: CohortDefinitions,
  resolveFlag?: FlagFilterResolver,
  log: Logger = defaultLogger,
): boolean {
  const cohortId = String(filter.value)
  const group = cohorts[cohortId]
  if (!group) {
    throw new InconclusiveMatchError(`Cohort ${cohortId} not found in local cohorts`)
  }
  return matchPropertyGroup(group, properties, cohorts, resolveFlag, log)
}

/**
 * Matches an AND/OR property group. Empty groups match. An inconclusive
 * member only matters when no conclusive member decides the group.
 */
export function matchPropertyGroup(
  group: PropertyGroup,
  properties: Properties,
  cohorts: CohortDefinitions,
  resolveFlag?: FlagFilterResolver,
  log: Logger = defaultLogger,
): boolean {
  const isAnd = group.type === 'AND'
  let inconclusive = false

  for (const member of group.values) {
    let matches: boolean
    try {
      matches = 'values' in member
        ? matchPropertyGroup(member, properties, cohorts, resolveFlag, log)
        : matchMemberFilter(member, properties, cohorts, resolveFlag, log)
    } catch (err) {
      if (!(err instanceof InconclusiveMatchError)) throw err
      log.debug({ err }, 'Failed to compute cohort property locally')
      inconclusive = true
      continue
    }
    if (isAnd && !matches) return false
    if (!isAnd && matches) return true
  }

  if (inconclusive) {
    throw new InconclusiveMatchError("Can't match cohort without a given cohort property value")
  }
  // Every member matched for AND, none did for OR
  return isAnd
}

function matchMemberFilter(
  filter: PropertyFilter,
  properties: Properties,
  cohorts: CohortDefinitions,
  resolveFlag: FlagFilterResolver | undefined,
  log: Logger,
): boolean {
  switch (filter.type) {
    case 'cohort':
      return matchCohort(filter, properties, cohorts, resolveFlag, log) !== (filter.negation ?? false)
    case 'flag':
      if (!resolveFlag) {
        throw new InconclusiveMatchError(`Cannot resolve flag dependency '${filter.key}' inside a cohort`)
      }
      // The resolver applies the filter's negation
      return resolveFlag(filter)
    default:
      return matchProperty(filter, properties, log) !== (filter.negation ?? false)
  }
}
