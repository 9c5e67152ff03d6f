import { z } from 'zod'
import { ConfigurationError } from './errors.js'
import type { Logger } from './logger.js'
import type {
  AnalyticsSink,
  DefinitionSource,
  FlagDefinitionCacheProvider,
  FlagPatch,
  RemoteEvaluator,
  ResultCache,
  UpdateStream,
} from './types.js'

export const DEFAULT_POLLING_INTERVAL_MS = 30_000
export const DEFAULT_REMOTE_EVALUATION_TIMEOUT_MS = 3_000
export const DEFAULT_DEDUPE_CACHE_SIZE = 50_000

/** Called after a realtime patch is applied; deletions carry `deleted: true`. */
export type FlagsUpdateCallback = (flagKey: string, flagData: FlagPatch) => void | Promise<void>

export interface ResultCacheOptions {
  ttlMs?: number
  maxSize?: number
  staleMaxAgeMs?: number
}

export interface FlagsClientOptions {
  definitionSource: DefinitionSource
  remoteEvaluator: RemoteEvaluator
  analyticsSink: AnalyticsSink
  updateStream?: UpdateStream
  definitionCacheProvider?: FlagDefinitionCacheProvider
  /** Replaces the in-process cache, e.g. with a `SharedResultCache` */
  resultCache?: ResultCache
  logger?: Logger
  onFeatureFlagsUpdate?: FlagsUpdateCallback
  pollingIntervalMs?: number
  remoteEvaluationTimeoutMs?: number
  resultCacheOptions?: ResultCacheOptions
  sendFeatureFlagEvents?: boolean
  dedupeCacheSize?: number
  onlyEvaluateLocally?: boolean
}

function hasMethods<T>(...methods: string[]) {
  return z.custom<T>(
    (value) =>
      typeof value === 'object' &&
      value !== null &&
      methods.every((method) => method in value && typeof Reflect.get(value, method) === 'function'),
    { message: `expected an object implementing ${methods.join(', ')}` },
  )
}

const ClientOptionsSchema = z.object({
  definitionSource: hasMethods<DefinitionSource>('fetchDefinitions'),
  remoteEvaluator: hasMethods<RemoteEvaluator>('remoteEvaluate'),
  analyticsSink: hasMethods<AnalyticsSink>('sendEvent'),
  updateStream: hasMethods<UpdateStream>('streamFlagUpdates').optional(),
  definitionCacheProvider: hasMethods<FlagDefinitionCacheProvider>(
    'shouldFetchFlagDefinitions',
    'getFlagDefinitions',
    'onFlagDefinitionsReceived',
    'shutdown',
  ).optional(),
  resultCache: hasMethods<ResultCache>(
    'getCachedFlag',
    'getStaleCachedFlag',
    'setCachedFlag',
    'invalidateVersion',
    'clear',
  ).optional(),
  logger: hasMethods<Logger>('debug', 'info', 'warn', 'error').optional(),
  onFeatureFlagsUpdate: z.custom<FlagsUpdateCallback>((value) => typeof value === 'function').optional(),
  pollingIntervalMs: z.number().int().min(1000).default(DEFAULT_POLLING_INTERVAL_MS),
  remoteEvaluationTimeoutMs: z.number().int().positive().default(DEFAULT_REMOTE_EVALUATION_TIMEOUT_MS),
  resultCacheOptions: z
    .object({
      ttlMs: z.number().int().positive().optional(),
      maxSize: z.number().int().positive().optional(),
      staleMaxAgeMs: z.number().int().positive().optional(),
    })
    .default({}),
  sendFeatureFlagEvents: z.boolean().default(true),
  dedupeCacheSize: z.number().int().positive().default(DEFAULT_DEDUPE_CACHE_SIZE),
  onlyEvaluateLocally: z.boolean().default(false),
})

export type ResolvedClientOptions = z.output<typeof ClientOptionsSchema>

/** Validates client options and fills in defaults. Throws {@link ConfigurationError}. */
export function parseClientOptions(options: FlagsClientOptions): ResolvedClientOptions {
  const parsed = ClientOptionsSchema.safeParse(options)
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid flags client options',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    )
  }
  return parsed.data
}
