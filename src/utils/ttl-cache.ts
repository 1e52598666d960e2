/**
 * Time-to-live cache
 *
 * A small string-keyed cache whose entries expire a fixed time after they
 * were written. Invalidation is purely time based: an entry is never
 * refreshed by reads, only replaced by a later `set`.
 *
 * The clock is injectable so tests can move time forward deterministically.
 *
 * @example
 * ```typescript
 * const cache = new TTLCache<RawTables>({ ttlMs: 60 * 60 * 1000 })
 * cache.set('SALT-NLP/WORKBank', tables)
 * cache.get('SALT-NLP/WORKBank') // tables, until the hour is up
 * ```
 */

/**
 * Entry with its absolute expiry timestamp
 */
interface CacheEntry<V> {
  value: V
  expiresAt: number
}

/**
 * Configuration options for TTLCache
 */
export interface TTLCacheOptions {
  /** Time-to-live in milliseconds (0 = entries expire immediately) */
  ttlMs: number
  /** Clock returning epoch milliseconds (default: Date.now) */
  now?: (() => number) | undefined
}

export class TTLCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>()
  private readonly ttlMs: number
  private readonly now: () => number

  constructor(options: TTLCacheOptions) {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs < 0) {
      throw new RangeError(`ttlMs must be a non-negative number, got ${options.ttlMs}`)
    }
    this.ttlMs = options.ttlMs
    this.now = options.now ?? Date.now
  }

  /**
   * Get a value, or undefined if missing or expired.
   * Expired entries are removed on access.
   */
  get(key: string): V | undefined {
    const entry = this.entries.get(key)

    if (!entry) return undefined

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key)
      return undefined
    }

    return entry.value
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs })
  }

  delete(key: string): boolean {
    return this.entries.delete(key)
  }
}
