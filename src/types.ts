/**
 * Domain types for local feature flag evaluation.
 */

/** A resolved flag value: `true` or a variant key means enabled, `false` disabled. */
export type FlagValue = boolean | string

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

/** A bag of person or group properties supplied by the caller. */
export type Properties = Record<string, unknown>

export type PropertyOperator =
  | 'exact'
  | 'is_not'
  | 'is_set'
  | 'is_not_set'
  | 'icontains'
  | 'not_icontains'
  | 'regex'
  | 'not_regex'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  | 'is_date_before'
  | 'is_date_after'

interface BaseFilter {
  key: string
  negation?: boolean
}

/** Matches a key in the person property bag. */
export interface PersonPropertyFilter extends BaseFilter {
  type: 'person'
  operator: PropertyOperator
  value: unknown
}

/** Matches a key in the property bag of the flag's aggregation group. */
export interface GroupPropertyFilter extends BaseFilter {
  type: 'group'
  operator: PropertyOperator
  value: unknown
  groupTypeIndex?: number
}

/** Membership in a cohort, resolved from locally supplied cohort definitions. */
export interface CohortPropertyFilter extends BaseFilter {
  type: 'cohort'
  value: string | number
}

/**
 * A dependency on another flag's result. `key` is the dependency's flag id.
 * Operator and value are kept as received; unsupported ones never match.
 */
export interface FlagPropertyFilter extends BaseFilter {
  type: 'flag'
  operator: string
  value: unknown
}

export type PropertyFilter =
  | PersonPropertyFilter
  | GroupPropertyFilter
  | CohortPropertyFilter
  | FlagPropertyFilter

/** A set of filters combined with AND or OR; values are nested groups or filters. */
export interface PropertyGroup {
  type: 'AND' | 'OR'
  values: PropertyGroup[] | PropertyFilter[]
}

export interface ConditionGroup {
  properties: PropertyFilter[]
  /** 0-100, or null to match every identity that passes the properties */
  rolloutPercentage: number | null
  /** Forces this variant when the group matches and the variant exists */
  variant?: string
}

export interface Variant {
  key: string
  rolloutPercentage: number
}

export interface FlagFilters {
  groups: ConditionGroup[]
  multivariate?: { variants: Variant[] }
  aggregationGroupTypeIndex?: number
  /** Stringified flag value ("true" or a variant key) to a JSON string */
  payloads?: Record<string, string>
}

/** A flag definition as fetched for local evaluation. Never mutated once parsed. */
export interface FlagDefinition {
  id: number
  key: string
  active: boolean
  ensureExperienceContinuity: boolean
  filters: FlagFilters
}

/** A resolved value together with its payload, as stored in the result cache. */
export interface FlagResult {
  value: FlagValue
  payload?: JsonValue
}

/** Group type index (stringified) to group type name, e.g. `{ "0": "company" }`. */
export type GroupTypeMapping = Record<string, string>

/** Cohort id (stringified) to its property group. */
export type CohortDefinitions = Record<string, PropertyGroup>

/** The parsed result of a definition fetch. */
export interface FlagDefinitions {
  flags: FlagDefinition[]
  groupTypeMapping: GroupTypeMapping
  cohorts: CohortDefinitions
}

/** Wire-format definitions as exchanged with a definition cache provider. */
export interface FlagDefinitionsPayload {
  flags: unknown[]
  group_type_mapping: Record<string, string>
  cohorts: Record<string, unknown>
}

/** Inputs for evaluating flags for one identity. */
export interface EvaluationInput {
  distinctId: string
  personProperties?: Properties
  cohortProperties?: CohortDefinitions
  /** Group type name to group key */
  groups?: Record<string, string>
  /** Group type name to that group's properties */
  groupProperties?: Record<string, Properties>
  groupTypeMapping?: GroupTypeMapping
}

/** A realtime definition change: an upsert of `key`, or its removal when `deleted`. */
export interface FlagPatch {
  key: string
  deleted?: boolean
  [field: string]: unknown
}

// -- Collaborators -----------------------------------------------------------

export type MaybePromise<T> = T | Promise<T>

export interface FetchDefinitionsRequest {
  etag?: string
  signal?: AbortSignal
}

export type FetchDefinitionsResult =
  | { notModified: true; etag?: string }
  | { notModified: false; etag?: string; data: unknown }

/** Pull-based source of flag definitions. */
export interface DefinitionSource {
  fetchDefinitions(request: FetchDefinitionsRequest): Promise<FetchDefinitionsResult>
}

export interface RemoteEvaluationRequest {
  distinctId: string
  personProperties: Properties
  groups: Record<string, string>
  groupProperties: Record<string, Properties>
}

export interface RemoteFlag {
  key: string
  enabled: boolean
  variant?: string
  payload?: JsonValue
}

export interface RemoteEvaluationResponse {
  flags: Record<string, RemoteFlag>
  errorsWhileComputingFlags: boolean
  requestId?: string
}

/** Server-side evaluation used when local evaluation is not possible. */
export interface RemoteEvaluator {
  remoteEvaluate(request: RemoteEvaluationRequest, signal?: AbortSignal): Promise<RemoteEvaluationResponse>
}

export interface AnalyticsEvent {
  event: string
  distinctId: string
  properties: Record<string, unknown>
  groups?: Record<string, string>
}

/** Fire-and-forget event delivery. */
export interface AnalyticsSink {
  sendEvent(event: AnalyticsEvent): Promise<void>
}

/** Realtime definition change delivery. */
export interface UpdateStream {
  streamFlagUpdates(signal: AbortSignal): AsyncIterable<FlagPatch>
}

/**
 * Shares flag definitions between processes. Any hook may throw; the loader
 * logs and carries on as described on each method.
 */
export interface FlagDefinitionCacheProvider {
  /** Whether this process should fetch from the source. Errors count as `true`. */
  shouldFetchFlagDefinitions(): MaybePromise<boolean>
  /** Definitions cached by another process. Errors fall through to a fetch. */
  getFlagDefinitions(): MaybePromise<FlagDefinitionsPayload | undefined>
  /** Called after a successful fetch. Errors leave the fetched data in memory. */
  onFlagDefinitionsReceived(data: FlagDefinitionsPayload): MaybePromise<void>
  /** Release locks and resources. Errors are logged. */
  shutdown(): MaybePromise<void>
}

/** Per-(identity, flag) cache of resolved values, tagged with the definition version. */
export interface ResultCache {
  getCachedFlag(distinctId: string, flagKey: string, currentVersion: number): MaybePromise<FlagResult | undefined>
  getStaleCachedFlag(distinctId: string, flagKey: string, maxStaleAgeMs?: number): MaybePromise<FlagResult | undefined>
  setCachedFlag(distinctId: string, flagKey: string, result: FlagResult, version: number): MaybePromise<void>
  invalidateVersion(oldVersion: number): MaybePromise<void>
  clear(): MaybePromise<void>
}
