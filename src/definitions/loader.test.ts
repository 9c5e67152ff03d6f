import { describe, it, expect, vi } from 'vitest'
import { ConnectionError, QuotaLimitedError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { DefinitionSource, FetchDefinitionsResult, FlagDefinitionCacheProvider } from '../types.js'
import { DefinitionLoader } from './loader.js'
import { DefinitionStore } from './store.js'

// Helpers

const log = createLogger({ name: 'test', level: 'silent' })

const definitions = { flags: [{ id: 1, key: 'beta-feature' }] }
const normalized = { flags: [{ id: 1, key: 'beta-feature' }], group_type_mapping: {}, cohorts: {} }

function sourceReturning(...results: FetchDefinitionsResult[]) {
  const fetchDefinitions = vi.fn<DefinitionSource['fetchDefinitions']>()
  for (const result of results) fetchDefinitions.mockResolvedValueOnce(result)
  return { fetchDefinitions }
}

function makeProvider(overrides: Partial<FlagDefinitionCacheProvider> = {}) {
  return {
    shouldFetchFlagDefinitions: vi.fn<FlagDefinitionCacheProvider['shouldFetchFlagDefinitions']>().mockReturnValue(true),
    getFlagDefinitions: vi.fn<FlagDefinitionCacheProvider['getFlagDefinitions']>().mockReturnValue(undefined),
    onFlagDefinitionsReceived: vi.fn<FlagDefinitionCacheProvider['onFlagDefinitionsReceived']>(),
    shutdown: vi.fn<FlagDefinitionCacheProvider['shutdown']>(),
    ...overrides,
  }
}

describe('DefinitionLoader', () => {
  describe('without a provider', () => {
    it('fetches and stores definitions', async () => {
      const store = new DefinitionStore(log)
      const source = sourceReturning({ notModified: false, etag: '"v1"', data: definitions })
      const result = await new DefinitionLoader({ source, store, log }).load()
      expect(result.outcome).toBe('fetched')
      expect(result.change?.snapshot.version).toBe(1)
      expect(store.snapshot?.flags.map((flag) => flag.key)).toEqual(['beta-feature'])
    })

    it('sends the last ETag and keeps the snapshot on 304', async () => {
      const store = new DefinitionStore(log)
      const source = sourceReturning({ notModified: false, etag: '"v1"', data: definitions }, { notModified: true, etag: '"v1"' })
      const loader = new DefinitionLoader({ source, store, log })
      await loader.load()
      const snapshot = store.snapshot

      const result = await loader.load()

      expect(result).toEqual({ outcome: 'not_modified' })
      expect(source.fetchDefinitions.mock.calls[1]?.[0]).toMatchObject({ etag: '"v1"' })
      expect(store.snapshot).toBe(snapshot)
    })

    it('shares one fetch between concurrent loads', async () => {
      let resolve: (result: FetchDefinitionsResult) => void = () => undefined
      const fetchDefinitions = vi.fn<DefinitionSource['fetchDefinitions']>().mockReturnValue(
        new Promise((r) => {
          resolve = r
        }),
      )
      const loader = new DefinitionLoader({ source: { fetchDefinitions }, store: new DefinitionStore(log), log })

      const first = loader.load()
      const second = loader.load()
      resolve({ notModified: false, data: definitions })

      expect(await first).toBe(await second)
      expect(fetchDefinitions).toHaveBeenCalledTimes(1)
    })

    it('clears local definitions when quota limited', async () => {
      const store = new DefinitionStore(log)
      store.replace(definitions)
      const fetchDefinitions = vi.fn<DefinitionSource['fetchDefinitions']>().mockRejectedValue(new QuotaLimitedError())
      const result = await new DefinitionLoader({ source: { fetchDefinitions }, store, log }).load()
      expect(result.outcome).toBe('quota_limited')
      expect(store.snapshot?.flags).toEqual([])
      expect(store.version).toBe(2)
    })

    it('rejects with a classified error when the fetch fails', async () => {
      const fetchDefinitions = vi.fn<DefinitionSource['fetchDefinitions']>().mockRejectedValue(new TypeError('fetch failed'))
      const loader = new DefinitionLoader({ source: { fetchDefinitions }, store: new DefinitionStore(log), log })
      await expect(loader.load()).rejects.toBeInstanceOf(ConnectionError)
    })
  })

  describe('with a cache provider', () => {
    it('hands fetched definitions to the provider', async () => {
      const provider = makeProvider()
      const source = sourceReturning({ notModified: false, data: definitions })
      await new DefinitionLoader({ source, store: new DefinitionStore(log), provider, log }).load()
      expect(provider.onFlagDefinitionsReceived).toHaveBeenCalledWith(normalized)
    })

    it('keeps fetched definitions when the provider fails to store them', async () => {
      const provider = makeProvider({
        onFlagDefinitionsReceived: vi.fn<FlagDefinitionCacheProvider['onFlagDefinitionsReceived']>().mockRejectedValue(new Error('lock lost')),
      })
      const store = new DefinitionStore(log)
      const result = await new DefinitionLoader({ source: sourceReturning({ notModified: false, data: definitions }), store, provider, log }).load()
      expect(result.outcome).toBe('fetched')
      expect(store.isLoaded).toBe(true)
    })

    it('does not notify the provider on 304', async () => {
      const provider = makeProvider()
      await new DefinitionLoader({ source: sourceReturning({ notModified: true }), store: new DefinitionStore(log), provider, log }).load()
      expect(provider.onFlagDefinitionsReceived).not.toHaveBeenCalled()
    })

    it('uses cached definitions when told not to fetch', async () => {
      const provider = makeProvider({
        shouldFetchFlagDefinitions: vi.fn<FlagDefinitionCacheProvider['shouldFetchFlagDefinitions']>().mockResolvedValue(false),
        getFlagDefinitions: vi.fn<FlagDefinitionCacheProvider['getFlagDefinitions']>().mockResolvedValue(normalized),
      })
      const source = sourceReturning()
      const store = new DefinitionStore(log)
      const result = await new DefinitionLoader({ source, store, provider, log }).load()
      expect(result.outcome).toBe('cached')
      expect(source.fetchDefinitions).not.toHaveBeenCalled()
      expect(store.snapshot?.flags.map((flag) => flag.key)).toEqual(['beta-feature'])
    })

    it('fetches when told not to but nothing is cached or loaded', async () => {
      const provider = makeProvider({
        shouldFetchFlagDefinitions: vi.fn<FlagDefinitionCacheProvider['shouldFetchFlagDefinitions']>().mockReturnValue(false),
      })
      const source = sourceReturning({ notModified: false, data: definitions })
      const result = await new DefinitionLoader({ source, store: new DefinitionStore(log), provider, log }).load()
      expect(result.outcome).toBe('fetched')
    })

    it('keeps the loaded snapshot when told not to fetch and nothing is cached', async () => {
      const provider = makeProvider({
        shouldFetchFlagDefinitions: vi.fn<FlagDefinitionCacheProvider['shouldFetchFlagDefinitions']>().mockReturnValue(false),
      })
      const store = new DefinitionStore(log)
      store.replace(definitions)
      const source = sourceReturning()
      const result = await new DefinitionLoader({ source, store, provider, log }).load()
      expect(result).toEqual({ outcome: 'skipped' })
      expect(source.fetchDefinitions).not.toHaveBeenCalled()
    })

    it('fetches when shouldFetch or the cached read throws', async () => {
      const throwingCheck = makeProvider({
        shouldFetchFlagDefinitions: vi.fn<FlagDefinitionCacheProvider['shouldFetchFlagDefinitions']>().mockRejectedValue(new Error('redis down')),
      })
      const first = await new DefinitionLoader({
        source: sourceReturning({ notModified: false, data: definitions }),
        store: new DefinitionStore(log),
        provider: throwingCheck,
        log,
      }).load()
      expect(first.outcome).toBe('fetched')

      const throwingRead = makeProvider({
        shouldFetchFlagDefinitions: vi.fn<FlagDefinitionCacheProvider['shouldFetchFlagDefinitions']>().mockReturnValue(false),
        getFlagDefinitions: vi.fn<FlagDefinitionCacheProvider['getFlagDefinitions']>().mockImplementation(() => {
          throw new Error('redis down')
        }),
      })
      const second = await new DefinitionLoader({
        source: sourceReturning({ notModified: false, data: definitions }),
        store: new DefinitionStore(log),
        provider: throwingRead,
        log,
      }).load()
      expect(second.outcome).toBe('fetched')
    })

    it('shuts the provider down once and logs failures', async () => {
      const provider = makeProvider({
        shutdown: vi.fn<FlagDefinitionCacheProvider['shutdown']>().mockRejectedValue(new Error('already closed')),
      })
      const loader = new DefinitionLoader({ source: sourceReturning(), store: new DefinitionStore(log), provider, log })
      await expect(loader.shutdown()).resolves.toBeUndefined()
      await loader.shutdown()
      expect(provider.shutdown).toHaveBeenCalledTimes(1)
    })
  })
})
