import { LocalResultCache } from './cache/result-cache.js'
import { parseClientOptions, type FlagsClientOptions, type ResolvedClientOptions } from './config.js'
import { DefinitionLoader } from './definitions/loader.js'
import { DefinitionStore, type DefinitionSnapshot, type SnapshotChange } from './definitions/store.js'
import { classifyRemoteError, TimeoutError } from './errors.js'
import { getFlagPayload } from './evaluation/evaluator.js'
import { evaluateFlagsWithDependencies } from './evaluation/orchestrator.js'
import { logger as defaultLogger, type Logger } from './logger.js'
import type {
  EvaluationInput,
  FlagPatch,
  FlagResult,
  FlagValue,
  JsonValue,
  MaybePromise,
  Properties,
  RemoteEvaluationRequest,
  RemoteEvaluationResponse,
  RemoteFlag,
  ResultCache,
} from './types.js'

/** Per-call evaluation options. */
export interface FlagCallOptions {
  personProperties?: Properties
  /** Group type name to group key */
  groups?: Record<string, string>
  /** Group type name to that group's properties */
  groupProperties?: Record<string, Properties>
  onlyEvaluateLocally?: boolean
  sendFeatureFlagEvents?: boolean
}

export interface FlagsAndPayloads {
  featureFlags: Record<string, FlagValue>
  featureFlagPayloads: Record<string, JsonValue>
}

interface Resolution {
  value?: FlagValue
  payload?: JsonValue
  locallyEvaluated: boolean
  errors: string[]
  requestId?: string
}

const FEATURE_FLAG_CALLED = '$feature_flag_called'

/**
 * Evaluates feature flags locally where the loaded definitions allow it and
 * falls back to the remote evaluator, then to stale cached results.
 */
export class FlagsClient {
  private readonly options: ResolvedClientOptions
  private readonly log: Logger
  private readonly store: DefinitionStore
  private readonly loader: DefinitionLoader
  private readonly resultCache: ResultCache
  private readonly reported = new Set<string>()
  private pollTimer: ReturnType<typeof setInterval> | undefined
  private realtime: { controller: AbortController; done: Promise<void> } | undefined

  constructor(options: FlagsClientOptions) {
    this.options = parseClientOptions(options)
    this.log = this.options.logger ?? defaultLogger
    this.store = new DefinitionStore(this.log)
    this.loader = new DefinitionLoader({
      source: this.options.definitionSource,
      store: this.store,
      provider: this.options.definitionCacheProvider,
      log: this.log,
    })
    this.resultCache = this.options.resultCache ?? new LocalResultCache(this.options.resultCacheOptions)
  }

  /** Version of the loaded definition set; 0 before the first load. */
  get definitionVersion(): number {
    return this.store.version
  }

  /** Loads definitions once. Failures are logged and keep the current set. */
  async loadFeatureFlags(): Promise<void> {
    try {
      const result = await this.loader.load()
      if (result.change) await this.onSnapshotChange(result.change)
    } catch (err) {
      this.log.warn({ err }, 'Failed to load feature flag definitions')
    }
  }

  startPolling(): void {
    if (this.pollTimer) return
    this.pollTimer = setInterval(() => {
      void this.loadFeatureFlags()
    }, this.options.pollingIntervalMs)
    this.pollTimer.unref()
  }

  stopPolling(): void {
    if (!this.pollTimer) return
    clearInterval(this.pollTimer)
    this.pollTimer = undefined
  }

  /** Applies patches from the update stream until {@link shutdown}. */
  startRealtime(): void {
    const stream = this.options.updateStream
    if (!stream) {
      this.log.warn('Realtime updates requested without an update stream')
      return
    }
    if (this.realtime) return

    const controller = new AbortController()
    const consume = async (): Promise<void> => {
      try {
        for await (const patch of stream.streamFlagUpdates(controller.signal)) {
          await this.applyFlagPatch(patch)
        }
      } catch (err) {
        if (controller.signal.aborted) return
        this.log.warn({ err }, 'Realtime flag update stream failed')
      }
    }
    this.realtime = { controller, done: consume() }
  }

  /** Upserts or removes one flag definition, then notifies the update callback. */
  async applyFlagPatch(patch: FlagPatch): Promise<void> {
    const change = this.store.applyPatch(patch)
    await this.onSnapshotChange(change)

    const callback = this.options.onFeatureFlagsUpdate
    if (!callback) return
    try {
      await callback(patch.key, patch)
    } catch (err) {
      this.log.error({ err, flagKey: patch.key }, 'Feature flag update callback failed')
    }
  }

  async getFeatureFlag(key: string, distinctId: string, options: FlagCallOptions = {}): Promise<FlagValue | undefined> {
    const resolution = await this.resolveFlag(key, distinctId, options)
    this.reportCalled(key, distinctId, resolution, options)
    return resolution.value
  }

  async isFeatureEnabled(key: string, distinctId: string, options: FlagCallOptions = {}): Promise<boolean | undefined> {
    const value = await this.getFeatureFlag(key, distinctId, options)
    return value === undefined ? undefined : value !== false
  }

  async getFeatureFlagPayload(key: string, distinctId: string, options: FlagCallOptions = {}): Promise<JsonValue | undefined> {
    const resolution = await this.resolveFlag(key, distinctId, options)
    return resolution.payload
  }

  async getAllFlags(distinctId: string, options: FlagCallOptions = {}): Promise<Record<string, FlagValue>> {
    return (await this.getAllFlagsAndPayloads(distinctId, options)).featureFlags
  }

  /**
   * Evaluates every flag locally, then fills the flags that could not be
   * decided with one remote call, or with stale results if that fails.
   */
  async getAllFlagsAndPayloads(distinctId: string, options: FlagCallOptions = {}): Promise<FlagsAndPayloads> {
    const snapshot = this.store.snapshot
    const version = this.store.version
    const featureFlags: Record<string, FlagValue> = {}
    const featureFlagPayloads: Record<string, JsonValue> = {}
    const unresolved = new Set<string>()

    if (snapshot) {
      const values = this.evaluateLocally(snapshot, distinctId, options)
      for (const flag of snapshot.flags) {
        const value = values.get(flag.key)
        if (value === undefined) {
          unresolved.add(flag.key)
          continue
        }
        featureFlags[flag.key] = value
        const payload = getFlagPayload(flag, value)
        if (payload !== undefined) featureFlagPayloads[flag.key] = payload
        await this.cacheResult(distinctId, flag.key, toResult(value, payload), version)
      }
    }

    const localOnly = options.onlyEvaluateLocally ?? this.options.onlyEvaluateLocally
    if (localOnly || (snapshot && unresolved.size === 0)) return { featureFlags, featureFlagPayloads }

    try {
      const response = await this.remoteEvaluate(distinctId, options)
      for (const [key, flag] of Object.entries(response.flags)) {
        if (key in featureFlags) continue
        const value = remoteValue(flag)
        featureFlags[key] = value
        if (flag.payload !== undefined) featureFlagPayloads[key] = flag.payload
        await this.cacheResult(distinctId, key, toResult(value, flag.payload), version)
      }
    } catch (err) {
      this.log.warn({ err: classifyRemoteError(err) }, 'Remote flag evaluation failed, using stale cached results')
      for (const key of unresolved) {
        const stale = await this.cacheCall('getStaleCachedFlag', () => this.resultCache.getStaleCachedFlag(distinctId, key))
        if (!stale) continue
        featureFlags[key] = stale.value
        if (stale.payload !== undefined) featureFlagPayloads[key] = stale.payload
      }
    }
    return { featureFlags, featureFlagPayloads }
  }

  /** Stops polling and realtime updates and shuts the cache provider down. Safe to call more than once. */
  async shutdown(): Promise<void> {
    this.stopPolling()
    const realtime = this.realtime
    this.realtime = undefined
    if (realtime) {
      realtime.controller.abort()
      await realtime.done
    }
    await this.loader.shutdown()
  }

  private async resolveFlag(key: string, distinctId: string, options: FlagCallOptions): Promise<Resolution> {
    const snapshot = this.store.snapshot
    const version = this.store.version

    const flag = snapshot?.prepared.flagsByKey.get(key)
    if (snapshot && flag) {
      const value = this.evaluateLocally(snapshot, distinctId, options, [key]).get(key)
      if (value !== undefined) {
        const payload = getFlagPayload(flag, value)
        await this.cacheResult(distinctId, key, toResult(value, payload), version)
        return withPayload({ value, locallyEvaluated: true, errors: [] }, payload)
      }
    }

    if (options.onlyEvaluateLocally ?? this.options.onlyEvaluateLocally) {
      return { locallyEvaluated: false, errors: [] }
    }

    const fresh = await this.cacheCall('getCachedFlag', () => this.resultCache.getCachedFlag(distinctId, key, version))
    if (fresh) return withPayload({ value: fresh.value, locallyEvaluated: false, errors: [] }, fresh.payload)

    const errors: string[] = []
    try {
      const response = await this.remoteEvaluate(distinctId, options)
      if (response.errorsWhileComputingFlags) errors.push('errors_while_computing_flags')
      const remote = response.flags[key]
      if (!remote) {
        errors.push('flag_missing')
        return withRequestId({ locallyEvaluated: false, errors }, response.requestId)
      }
      const value = remoteValue(remote)
      await this.cacheResult(distinctId, key, toResult(value, remote.payload), version)
      return withRequestId(withPayload({ value, locallyEvaluated: false, errors }, remote.payload), response.requestId)
    } catch (err) {
      const classified = classifyRemoteError(err)
      this.log.warn({ err: classified, flagKey: key }, 'Remote flag evaluation failed')
      errors.push(classified.marker)
    }

    const stale = await this.cacheCall('getStaleCachedFlag', () => this.resultCache.getStaleCachedFlag(distinctId, key))
    if (stale) return withPayload({ value: stale.value, locallyEvaluated: false, errors }, stale.payload)
    return { locallyEvaluated: false, errors }
  }

  private evaluateLocally(
    snapshot: DefinitionSnapshot,
    distinctId: string,
    options: FlagCallOptions,
    requestedKeys?: string[],
  ): Map<string, FlagValue> {
    const input: EvaluationInput = {
      distinctId,
      personProperties: this.personProperties(distinctId, options),
      cohortProperties: snapshot.cohorts,
      groups: options.groups ?? {},
      groupProperties: this.groupProperties(options),
      groupTypeMapping: snapshot.groupTypeMapping,
    }
    try {
      return evaluateFlagsWithDependencies(snapshot.prepared, input, requestedKeys, this.log)
    } catch (err) {
      this.log.error({ err }, 'Local flag evaluation failed')
      return new Map()
    }
  }

  private remoteEvaluate(distinctId: string, options: FlagCallOptions): Promise<RemoteEvaluationResponse> {
    const request: RemoteEvaluationRequest = {
      distinctId,
      personProperties: this.personProperties(distinctId, options),
      groups: options.groups ?? {},
      groupProperties: this.groupProperties(options),
    }
    const timeoutMs = this.options.remoteEvaluationTimeoutMs
    const signal = AbortSignal.timeout(timeoutMs)
    // The deadline holds even for evaluators that ignore the signal
    return new Promise<RemoteEvaluationResponse>((resolve, reject) => {
      const onAbort = () => reject(new TimeoutError(`Remote flag evaluation timed out after ${timeoutMs}ms`))
      signal.addEventListener('abort', onAbort, { once: true })
      void Promise.resolve()
        .then(() => this.options.remoteEvaluator.remoteEvaluate(request, signal))
        .then(resolve, reject)
        .finally(() => signal.removeEventListener('abort', onAbort))
    })
  }

  private personProperties(distinctId: string, options: FlagCallOptions): Properties {
    return { distinct_id: distinctId, ...options.personProperties }
  }

  private groupProperties(options: FlagCallOptions): Record<string, Properties> {
    const merged: Record<string, Properties> = { ...options.groupProperties }
    for (const [groupName, groupKey] of Object.entries(options.groups ?? {})) {
      merged[groupName] = { $group_key: groupKey, ...options.groupProperties?.[groupName] }
    }
    return merged
  }

  private reportCalled(key: string, distinctId: string, resolution: Resolution, options: FlagCallOptions): void {
    if (!(options.sendFeatureFlagEvents ?? this.options.sendFeatureFlagEvents)) return

    const reportKey = `${distinctId}\u0000${key}\u0000${String(resolution.value)}`
    if (this.reported.has(reportKey)) return
    if (this.reported.size >= this.options.dedupeCacheSize) {
      const oldest = this.reported.values().next()
      if (!oldest.done) this.reported.delete(oldest.value)
    }
    this.reported.add(reportKey)

    const properties: Record<string, unknown> = {
      $feature_flag: key,
      $feature_flag_response: resolution.value ?? null,
      locally_evaluated: resolution.locallyEvaluated,
      [`$feature/${key}`]: resolution.value ?? null,
    }
    if (resolution.payload !== undefined) properties.$feature_flag_payload = resolution.payload
    if (resolution.errors.length > 0) properties.$feature_flag_error = resolution.errors.join(',')
    if (resolution.requestId !== undefined) properties.$feature_flag_request_id = resolution.requestId

    const event = { event: FEATURE_FLAG_CALLED, distinctId, properties, ...(options.groups ? { groups: options.groups } : {}) }
    void Promise.resolve()
      .then(() => this.options.analyticsSink.sendEvent(event))
      .catch((err: unknown) => {
        this.log.warn({ err, flagKey: key }, 'Failed to send feature flag event')
      })
  }

  private async onSnapshotChange(change: SnapshotChange): Promise<void> {
    if (change.previousVersion > 0) {
      await this.cacheCall('invalidateVersion', () => this.resultCache.invalidateVersion(change.previousVersion))
    }
  }

  private async cacheResult(distinctId: string, flagKey: string, result: FlagResult, version: number): Promise<void> {
    await this.cacheCall('setCachedFlag', () => this.resultCache.setCachedFlag(distinctId, flagKey, result, version))
  }

  /** Result cache calls fail open: an error reads as a miss. */
  private async cacheCall<T>(operation: string, call: () => MaybePromise<T>): Promise<T | undefined> {
    try {
      return await call()
    } catch (err) {
      this.log.debug({ err, operation }, 'Result cache call failed')
      return undefined
    }
  }
}

function remoteValue(flag: RemoteFlag): FlagValue {
  if (!flag.enabled) return false
  return flag.variant ?? true
}

function toResult(value: FlagValue, payload: JsonValue | undefined): FlagResult {
  return payload === undefined ? { value } : { value, payload }
}

function withPayload(resolution: Resolution, payload: JsonValue | undefined): Resolution {
  if (payload !== undefined) resolution.payload = payload
  return resolution
}

function withRequestId(resolution: Resolution, requestId: string | undefined): Resolution {
  if (requestId !== undefined) resolution.requestId = requestId
  return resolution
}
