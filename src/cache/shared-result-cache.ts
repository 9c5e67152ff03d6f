import { z } from 'zod'
import { logger as defaultLogger, type Logger } from '../logger.js'
import { JsonValueSchema } from '../schema.js'
import type { FlagResult, ResultCache } from '../types.js'
import { DEFAULT_STALE_MAX_AGE_MS, DEFAULT_TTL_MS, isFresh, isStaleUsable, type ResultCacheEntry } from './result-cache.js'

/**
 * The key-value commands the shared cache needs. An ioredis client satisfies
 * this interface as is.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>
  set(key: string, value: string, expiryMode: 'EX', seconds: number): Promise<unknown>
  del(...keys: string[]): Promise<number>
  scan(cursor: string, matchOption: 'MATCH', pattern: string, countOption: 'COUNT', count: number): Promise<[string, string[]]>
}

export interface SharedResultCacheOptions {
  ttlMs?: number
  staleMaxAgeMs?: number
  keyPrefix?: string
  log?: Logger
}

const StoredEntrySchema = z.object({
  flag_result: z.object({
    value: z.union([z.boolean(), z.string()]),
    payload: JsonValueSchema.optional(),
  }),
  flag_version: z.number(),
  timestamp: z.number(),
})

/**
 * Result cache shared between processes through a key-value store.
 *
 * Entries expire in the store after the stale window. Every store error and
 * every malformed entry reads as a miss; nothing is thrown to the caller.
 */
export class SharedResultCache implements ResultCache {
  private readonly ttlMs: number
  private readonly staleMaxAgeMs: number
  private readonly keyPrefix: string
  private readonly log: Logger

  constructor(
    private readonly store: KeyValueStore,
    options: SharedResultCacheOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS
    this.staleMaxAgeMs = options.staleMaxAgeMs ?? DEFAULT_STALE_MAX_AGE_MS
    this.keyPrefix = options.keyPrefix ?? 'flagline:flags:'
    this.log = options.log ?? defaultLogger
  }

  async getCachedFlag(distinctId: string, flagKey: string, currentVersion: number): Promise<FlagResult | undefined> {
    const entry = await this.read(distinctId, flagKey)
    return entry && isFresh(entry, Date.now(), this.ttlMs, currentVersion) ? entry.result : undefined
  }

  async getStaleCachedFlag(distinctId: string, flagKey: string, maxStaleAgeMs: number = this.staleMaxAgeMs): Promise<FlagResult | undefined> {
    const entry = await this.read(distinctId, flagKey)
    return entry && isStaleUsable(entry, Date.now(), maxStaleAgeMs) ? entry.result : undefined
  }

  async setCachedFlag(distinctId: string, flagKey: string, result: FlagResult, version: number): Promise<void> {
    const stored = {
      flag_result: result.payload === undefined ? { value: result.value } : result,
      flag_version: version,
      timestamp: Date.now(),
    }
    try {
      await this.store.set(this.entryKey(distinctId, flagKey), JSON.stringify(stored), 'EX', Math.ceil(this.staleMaxAgeMs / 1000))
    } catch (err) {
      this.log.debug({ err, flagKey }, 'Shared result cache write failed')
    }
  }

  /** Scans the key prefix and deletes entries written under `oldVersion`. */
  async invalidateVersion(oldVersion: number): Promise<void> {
    try {
      await this.forEachKey(async (keys) => {
        const stale: string[] = []
        for (const key of keys) {
          const entry = parseEntry(await this.store.get(key))
          if (entry?.version === oldVersion) stale.push(key)
        }
        if (stale.length > 0) await this.store.del(...stale)
      })
    } catch (err) {
      this.log.debug({ err, oldVersion }, 'Shared result cache invalidation failed')
    }
  }

  async clear(): Promise<void> {
    try {
      await this.forEachKey(async (keys) => {
        if (keys.length > 0) await this.store.del(...keys)
      })
    } catch (err) {
      this.log.debug({ err }, 'Shared result cache clear failed')
    }
  }

  private entryKey(distinctId: string, flagKey: string): string {
    return `${this.keyPrefix}${distinctId}:${flagKey}`
  }

  private async read(distinctId: string, flagKey: string): Promise<ResultCacheEntry | undefined> {
    try {
      return parseEntry(await this.store.get(this.entryKey(distinctId, flagKey)))
    } catch (err) {
      this.log.debug({ err, flagKey }, 'Shared result cache read failed')
      return undefined
    }
  }

  private async forEachKey(visit: (keys: string[]) => Promise<void>): Promise<void> {
    let cursor = '0'
    do {
      const [next, keys] = await this.store.scan(cursor, 'MATCH', `${this.keyPrefix}*`, 'COUNT', 100)
      await visit(keys)
      cursor = next
    } while (cursor !== '0')
  }
}

function parseEntry(data: string | null): ResultCacheEntry | undefined {
  if (data === null) return undefined
  let decoded: unknown
  try {
    decoded = JSON.parse(data)
  } catch {
    return undefined
  }
  const parsed = StoredEntrySchema.safeParse(decoded)
  if (!parsed.success) return undefined
  const { flag_result, flag_version, timestamp } = parsed.data
  const result: FlagResult = { value: flag_result.value }
  if (flag_result.payload !== undefined) result.payload = flag_result.payload
  return { result, version: flag_version, timestamp }
}
