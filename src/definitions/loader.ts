import { classifyRemoteError, QuotaLimitedError } from '../errors.js'
import { logger as defaultLogger, type Logger } from '../logger.js'
import type { DefinitionSource, FetchDefinitionsResult, FlagDefinitionCacheProvider } from '../types.js'
import type { DefinitionStore, SnapshotChange } from './store.js'

export type LoadOutcome = 'fetched' | 'cached' | 'not_modified' | 'skipped' | 'quota_limited'

export interface LoadResult {
  outcome: LoadOutcome
  /** Set whenever the store moved to a new snapshot */
  change?: SnapshotChange
}

export interface DefinitionLoaderOptions {
  source: DefinitionSource
  store: DefinitionStore
  provider?: FlagDefinitionCacheProvider
  log?: Logger
}

/**
 * Loads definitions into a {@link DefinitionStore}, either from the source or
 * from a cache provider shared with other processes.
 */
export class DefinitionLoader {
  private readonly source: DefinitionSource
  private readonly store: DefinitionStore
  private readonly provider: FlagDefinitionCacheProvider | undefined
  private readonly log: Logger
  private etag: string | undefined
  private inFlight: Promise<LoadResult> | undefined
  private providerShutdown = false

  constructor(options: DefinitionLoaderOptions) {
    this.source = options.source
    this.store = options.store
    this.provider = options.provider
    this.log = options.log ?? defaultLogger
  }

  /** Concurrent calls share the load already in flight. */
  load(signal?: AbortSignal): Promise<LoadResult> {
    if (!this.inFlight) {
      this.inFlight = this.run(signal).finally(() => {
        this.inFlight = undefined
      })
    }
    return this.inFlight
  }

  /** Shuts the provider down once; later calls do nothing. */
  async shutdown(): Promise<void> {
    if (!this.provider || this.providerShutdown) return
    this.providerShutdown = true
    try {
      await this.provider.shutdown()
    } catch (err) {
      this.log.warn({ err }, 'Flag definition cache provider shutdown failed')
    }
  }

  private async run(signal?: AbortSignal): Promise<LoadResult> {
    if (this.provider && !(await this.shouldFetch(this.provider))) {
      const cached = await this.readCached(this.provider)
      if (cached) return cached
      if (this.store.isLoaded) return { outcome: 'skipped' }
    }
    return this.fetch(signal)
  }

  private async shouldFetch(provider: FlagDefinitionCacheProvider): Promise<boolean> {
    try {
      return await provider.shouldFetchFlagDefinitions()
    } catch (err) {
      this.log.warn({ err }, 'Flag definition cache provider shouldFetch failed, fetching from source')
      return true
    }
  }

  private async readCached(provider: FlagDefinitionCacheProvider): Promise<LoadResult | undefined> {
    try {
      const data = await provider.getFlagDefinitions()
      if (data === undefined) return undefined
      const change = this.store.replace(data)
      this.log.debug({ version: change.snapshot.version }, 'Loaded flag definitions from cache provider')
      return { outcome: 'cached', change }
    } catch (err) {
      this.log.warn({ err }, 'Flag definition cache provider read failed, fetching from source')
      return undefined
    }
  }

  private async fetch(signal?: AbortSignal): Promise<LoadResult> {
    let result: FetchDefinitionsResult
    try {
      result = await this.source.fetchDefinitions({ etag: this.etag, signal })
    } catch (err) {
      const classified = classifyRemoteError(err)
      if (classified instanceof QuotaLimitedError) {
        this.log.warn('Feature flags quota limited, local evaluation disabled until the next successful load')
        this.etag = undefined
        return { outcome: 'quota_limited', change: this.store.replace({ flags: [] }) }
      }
      throw classified
    }

    if (result.etag !== undefined) this.etag = result.etag
    if (result.notModified) {
      this.log.debug('Flag definitions not modified')
      return { outcome: 'not_modified' }
    }

    const change = this.store.replace(result.data)
    this.log.debug({ version: change.snapshot.version, flags: change.snapshot.flags.length }, 'Fetched flag definitions')

    if (this.provider) {
      try {
        await this.provider.onFlagDefinitionsReceived(change.snapshot.payload)
      } catch (err) {
        this.log.warn({ err }, 'Flag definition cache provider failed to store definitions')
      }
    }
    return { outcome: 'fetched', change }
  }
}
