export type {
  FlagValue,
  JsonValue,
  Properties,
  PropertyOperator,
  PropertyFilter,
  PersonPropertyFilter,
  GroupPropertyFilter,
  CohortPropertyFilter,
  FlagPropertyFilter,
  PropertyGroup,
  ConditionGroup,
  Variant,
  FlagFilters,
  FlagDefinition,
  FlagDefinitions,
  FlagDefinitionsPayload,
  FlagResult,
  FlagPatch,
  EvaluationInput,
  DefinitionSource,
  FetchDefinitionsRequest,
  FetchDefinitionsResult,
  RemoteEvaluator,
  RemoteEvaluationRequest,
  RemoteEvaluationResponse,
  RemoteFlag,
  AnalyticsSink,
  AnalyticsEvent,
  UpdateStream,
  FlagDefinitionCacheProvider,
  ResultCache,
} from './types.js'

export { FlagsClient } from './client.js'
export type { FlagCallOptions, FlagsAndPayloads } from './client.js'
export { parseClientOptions } from './config.js'
export type { FlagsClientOptions, FlagsUpdateCallback, ResultCacheOptions } from './config.js'

export { hash } from './evaluation/hash.js'
export { matchProperty, matchCohort, matchPropertyGroup } from './evaluation/properties.js'
export { DependencyGraph } from './evaluation/graph.js'
export { evaluateFlag, computeFlagLocally, getMatchingVariant, getFlagPayload } from './evaluation/evaluator.js'
export { evaluateFlagsWithDependencies, prepareFlags, extractFlagDependencies } from './evaluation/orchestrator.js'
export type { PreparedFlags } from './evaluation/orchestrator.js'

export { LocalResultCache } from './cache/result-cache.js'
export type { LocalResultCacheOptions } from './cache/result-cache.js'
export { SharedResultCache } from './cache/shared-result-cache.js'
export type { KeyValueStore, SharedResultCacheOptions } from './cache/shared-result-cache.js'

export { DefinitionStore } from './definitions/store.js'
export type { DefinitionSnapshot } from './definitions/store.js'
export { DefinitionLoader } from './definitions/loader.js'
export type { LoadOutcome, LoadResult } from './definitions/loader.js'

export { parseFlagDefinitions, parseFlagDefinition } from './schema.js'

export { createHTTPTransport } from './http/client.js'
export type { HTTPTransport, HTTPTransportConfig } from './http/client.js'

export {
  FlagError,
  InconclusiveMatchError,
  CyclicDependencyError,
  MissingDependencyError,
  ConfigurationError,
  DefinitionParseError,
  RemoteError,
  TimeoutError,
  ConnectionError,
  APIError,
  QuotaLimitedError,
  classifyRemoteError,
} from './errors.js'

export { createLogger } from './logger.js'
export type { Logger } from './logger.js'
