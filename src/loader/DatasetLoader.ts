/**
 * DatasetLoader - produces the three raw tables
 *
 * Tries the remote dataset first and substitutes the built-in fallback
 * tables on any failure. The outcome is a tagged result so callers can tell
 * the two paths apart without reading logs:
 *
 * - `{ source: 'remote', tables, cached }`
 * - `{ source: 'fallback', tables, reason, error }`
 *
 * Only remote tables are cached, keyed by the source id and expiring a fixed
 * time after they were fetched. `loadRawTables` never rejects.
 *
 * @example
 * ```typescript
 * const loader = new DatasetLoader({ cacheTtlMs: 60 * 60 * 1000 })
 * const result = await loader.loadRawTables()
 * if (result.source === 'fallback') console.warn(result.reason)
 * const combined = prepareAnalysis(result.tables.worker, result.tables.expert, result.tables.task)
 * ```
 */

import { DEFAULT_CACHE_TTL_MS } from '../constants'
import { wrapError, type WorkbankError } from '../errors'
import { TTLCache } from '../utils/ttl-cache'
import { getLogger, guardLogger, type Logger } from '../utils/logger'
import type { RawTables } from '../types/tables'
import type { WorkbankConfig } from '../config'
import { FALLBACK_TABLES, freezeTables } from './fallback'
import { HuggingFaceSource, type FetchFn, type TableSource } from './remote'

// =============================================================================
// Types
// =============================================================================

/**
 * Tables obtained from the remote dataset
 */
export interface RemoteLoadResult {
  source: 'remote'
  tables: RawTables
  /** True when served from the cache without refetching */
  cached: boolean
}

/**
 * Built-in tables substituted for an unavailable remote dataset
 */
export interface FallbackLoadResult {
  source: 'fallback'
  tables: RawTables
  /** Human-readable reason the remote path was not used */
  reason: string
  /** Underlying failure; undefined when the remote path was skipped */
  error: WorkbankError | undefined
}

export type LoadResult = RemoteLoadResult | FallbackLoadResult

/**
 * Options for creating a DatasetLoader
 */
export interface DatasetLoaderOptions {
  /** Remote table source (default: HuggingFaceSource with default options) */
  source?: TableSource | undefined

  /** Cache for remote tables; takes precedence over cacheTtlMs and now */
  cache?: TTLCache<RawTables> | undefined

  /** Cache window in milliseconds (default: 1 hour) */
  cacheTtlMs?: number | undefined

  /** Clock used by the default cache */
  now?: (() => number) | undefined

  /** Tables substituted when the remote path fails */
  fallback?: RawTables | undefined

  /** Skip the remote source entirely */
  offline?: boolean | undefined

  /** Logger (default: the global logger at call time) */
  logger?: Logger | undefined
}

// =============================================================================
// DatasetLoader Implementation
// =============================================================================

export class DatasetLoader {
  private readonly source: TableSource
  private readonly cache: TTLCache<RawTables>
  private readonly fallback: RawTables
  private readonly offline: boolean
  private readonly explicitLogger: Logger | undefined
  private readonly inflight = new Map<string, Promise<RawTables>>()

  constructor(options: DatasetLoaderOptions = {}) {
    this.source = options.source ?? new HuggingFaceSource()
    this.cache = options.cache ?? new TTLCache<RawTables>({
      ttlMs: options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS,
      now: options.now,
    })
    this.fallback = options.fallback ? freezeTables(options.fallback) : FALLBACK_TABLES
    this.offline = options.offline ?? false
    this.explicitLogger = options.logger
  }

  /**
   * Load the raw tables, remote first, fallback on any failure
   */
  async loadRawTables(): Promise<LoadResult> {
    const log = this.log()

    if (this.offline) {
      return this.useFallback('remote source disabled (offline mode)', undefined)
    }

    const hit = this.cache.get(this.source.id)
    if (hit) {
      log.debug(`[DatasetLoader] Cache hit for ${this.source.id}`)
      return { source: 'remote', tables: hit, cached: true }
    }

    try {
      const tables = await this.fetchShared()
      log.info(
        `[DatasetLoader] Loaded ${this.source.id} from remote: ${describeCounts(tables)}`
      )
      return { source: 'remote', tables, cached: false }
    } catch (err) {
      const error = wrapError(err, { source: this.source.id })
      return this.useFallback(`remote load failed: ${error.message}`, error)
    }
  }

  /**
   * Drop cached remote tables so the next load refetches
   */
  invalidate(): void {
    this.cache.delete(this.source.id)
  }

  /**
   * Fetch through the source, sharing one request among concurrent callers
   * and caching the frozen result
   */
  private fetchShared(): Promise<RawTables> {
    const key = this.source.id
    const pending = this.inflight.get(key)
    if (pending) return pending

    const request = this.source.fetchTables()
      .then(tables => {
        const frozen = freezeTables(tables)
        this.cache.set(key, frozen)
        return frozen
      })
      .finally(() => {
        this.inflight.delete(key)
      })

    this.inflight.set(key, request)
    return request
  }

  private useFallback(reason: string, error: WorkbankError | undefined): FallbackLoadResult {
    const log = this.log()
    log.warn(`[DatasetLoader] Using fallback tables (${reason}): ${describeCounts(this.fallback)}`)
    return { source: 'fallback', tables: this.fallback, reason, error }
  }

  private log(): Logger {
    return guardLogger(this.explicitLogger ?? getLogger())
  }
}

/**
 * e.g. "7 worker responses, 5 expert ratings, 5 tasks"
 */
export function describeCounts(tables: RawTables): string {
  return `${tables.worker.length} worker responses, ${tables.expert.length} expert ratings, ${tables.task.length} tasks`
}

/**
 * Build a loader for the remote dataset described by a configuration
 */
export function createDatasetLoader(
  config: WorkbankConfig,
  options: { fetch?: FetchFn | undefined; logger?: Logger | undefined; now?: (() => number) | undefined } = {}
): DatasetLoader {
  return new DatasetLoader({
    source: new HuggingFaceSource({
      datasetId: config.datasetId,
      baseUrl: config.baseUrl,
      token: config.token,
      timeout: config.fetchTimeoutMs,
      fetch: options.fetch,
    }),
    cacheTtlMs: config.cacheTtlMs,
    offline: config.offline,
    now: options.now,
    logger: options.logger,
  })
}

// =============================================================================
// Default Loader
// =============================================================================

let defaultLoader: DatasetLoader | undefined

/**
 * Load the raw tables through a process-wide default loader.
 * Prefer constructing a DatasetLoader where the cache should be owned
 * explicitly.
 */
export function loadRawTables(): Promise<LoadResult> {
  if (!defaultLoader) {
    defaultLoader = new DatasetLoader()
  }
  return defaultLoader.loadRawTables()
}
