import type { FlagResult, ResultCache } from '../types.js'

export const DEFAULT_TTL_MS = 5 * 60 * 1000
export const DEFAULT_STALE_MAX_AGE_MS = 60 * 60 * 1000
export const DEFAULT_MAX_SIZE = 10_000

export interface ResultCacheEntry {
  result: FlagResult
  version: number
  /** Epoch millis at write */
  timestamp: number
}

/** Fresh while younger than the TTL and written under the current definition version. */
export function isFresh(entry: ResultCacheEntry, now: number, ttlMs: number, currentVersion: number): boolean {
  return now - entry.timestamp < ttlMs && entry.version === currentVersion
}

/** Usable as a fallback while younger than the stale window, whatever its version. */
export function isStaleUsable(entry: ResultCacheEntry, now: number, maxStaleAgeMs: number): boolean {
  return now - entry.timestamp < maxStaleAgeMs
}

export interface LocalResultCacheOptions {
  ttlMs?: number
  /** Maximum number of distinct ids tracked */
  maxSize?: number
  staleMaxAgeMs?: number
}

/**
 * In-process result cache bounded by distinct id.
 *
 * Map insertion order doubles as recency: a hit or write moves the distinct
 * id to the end, and eviction drops about a fifth of the ids from the front.
 */
export class LocalResultCache implements ResultCache {
  private readonly users: Map<string, Map<string, ResultCacheEntry>> = new Map()
  readonly ttlMs: number
  readonly maxSize: number
  readonly staleMaxAgeMs: number

  constructor(options: LocalResultCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS
    this.maxSize = options.maxSize ?? DEFAULT_MAX_SIZE
    this.staleMaxAgeMs = options.staleMaxAgeMs ?? DEFAULT_STALE_MAX_AGE_MS
  }

  getCachedFlag(distinctId: string, flagKey: string, currentVersion: number): FlagResult | undefined {
    const flags = this.users.get(distinctId)
    const entry = flags?.get(flagKey)
    if (!flags || !entry || !isFresh(entry, Date.now(), this.ttlMs, currentVersion)) return undefined
    this.touch(distinctId, flags)
    return entry.result
  }

  getStaleCachedFlag(distinctId: string, flagKey: string, maxStaleAgeMs: number = this.staleMaxAgeMs): FlagResult | undefined {
    const entry = this.users.get(distinctId)?.get(flagKey)
    if (!entry || !isStaleUsable(entry, Date.now(), maxStaleAgeMs)) return undefined
    return entry.result
  }

  setCachedFlag(distinctId: string, flagKey: string, result: FlagResult, version: number): void {
    let flags = this.users.get(distinctId)
    if (!flags) {
      if (this.users.size >= this.maxSize) this.evictLeastRecentlyUsed()
      flags = new Map()
    }
    flags.set(flagKey, { result, version, timestamp: Date.now() })
    this.touch(distinctId, flags)
  }

  /** Drops every entry written under `oldVersion`, and ids left without entries. */
  invalidateVersion(oldVersion: number): void {
    for (const [distinctId, flags] of this.users) {
      for (const [flagKey, entry] of flags) {
        if (entry.version === oldVersion) flags.delete(flagKey)
      }
      if (flags.size === 0) this.users.delete(distinctId)
    }
  }

  clear(): void {
    this.users.clear()
  }

  /** Number of distinct ids currently tracked. */
  get size(): number {
    return this.users.size
  }

  has(distinctId: string): boolean {
    return this.users.has(distinctId)
  }

  private touch(distinctId: string, flags: Map<string, ResultCacheEntry>): void {
    this.users.delete(distinctId)
    this.users.set(distinctId, flags)
  }

  private evictLeastRecentlyUsed(): void {
    let toRemove = Math.max(1, Math.floor(this.users.size / 5))
    for (const distinctId of this.users.keys()) {
      if (toRemove-- <= 0) break
      this.users.delete(distinctId)
    }
  }
}
