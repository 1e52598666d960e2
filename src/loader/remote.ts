/**
 * HuggingFaceSource - read-only HTTP source for the remote dataset
 *
 * Fetches the three raw CSV resources of a dataset repository and parses
 * them into typed tables. One attempt per resource, no retries: the loader
 * decides what happens on failure.
 *
 * @example
 * ```typescript
 * const source = new HuggingFaceSource({ datasetId: 'SALT-NLP/WORKBank' })
 * const tables = await source.fetchTables()
 * ```
 */

import {
  DEFAULT_BASE_URL,
  DEFAULT_DATASET_ID,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_REVISION,
  RESOURCE_PATHS,
} from '../constants'
import {
  ErrorCode,
  NetworkError,
  SourceError,
  TimeoutError,
  errorFromStatus,
  type WorkbankError,
} from '../errors'
import { parseCsv } from '../utils/csv'
import type { RawTables } from '../types/tables'
import { parseExpertTable, parseTaskTable, parseWorkerTable } from './schema'

// =============================================================================
// Types
// =============================================================================

export type FetchFn = typeof globalThis.fetch

/**
 * Options for creating a HuggingFaceSource
 */
export interface HuggingFaceSourceOptions {
  /** Dataset repository id (default: 'SALT-NLP/WORKBank') */
  datasetId?: string | undefined

  /** Base URL the dataset id is resolved against */
  baseUrl?: string | undefined

  /** Git revision of the resource files (default: 'main') */
  revision?: string | undefined

  /** Access token for gated datasets */
  token?: string | undefined

  /** Timeout per resource request in milliseconds (default: 30000) */
  timeout?: number | undefined

  /** Custom fetch implementation (for testing) */
  fetch?: FetchFn | undefined
}

/**
 * Anything that can produce the three raw tables
 */
export interface TableSource {
  /** Identifier the loader caches results under */
  readonly id: string
  fetchTables(): Promise<RawTables>
}

// =============================================================================
// HuggingFaceSource Implementation
// =============================================================================

export class HuggingFaceSource implements TableSource {
  readonly id: string

  private baseUrl: string
  private revision: string
  private token?: string | undefined
  private timeout: number
  private fetch: FetchFn

  constructor(options: HuggingFaceSourceOptions = {}) {
    this.id = options.datasetId ?? DEFAULT_DATASET_ID
    // Ensure baseUrl doesn't end with slash
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, '')
    this.revision = options.revision ?? DEFAULT_REVISION
    this.token = options.token
    this.timeout = options.timeout ?? DEFAULT_FETCH_TIMEOUT_MS
    this.fetch = options.fetch ?? globalThis.fetch.bind(globalThis)
  }

  /**
   * Fetch and validate all three tables. Rejects on the first failure and
   * cancels the requests still in flight.
   */
  async fetchTables(): Promise<RawTables> {
    const batch = new AbortController()
    const read = (path: string): Promise<string> =>
      this.readText(path, batch.signal).catch((error: unknown) => {
        batch.abort()
        throw error
      })

    const [workerText, expertText, taskText] = await Promise.all([
      read(RESOURCE_PATHS.worker),
      read(RESOURCE_PATHS.expert),
      read(RESOURCE_PATHS.task),
    ])

    return {
      worker: parseWorkerTable(parseCsv(workerText)),
      expert: parseExpertTable(parseCsv(expertText)),
      task: parseTaskTable(parseCsv(taskText)),
    }
  }

  /**
   * Read one resource of the dataset as text. The timeout covers the whole
   * exchange, body included. Aborting `signal` cancels the request.
   */
  async readText(path: string, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController()

    let interrupt: (error: WorkbankError) => void = () => {}
    const interrupted = new Promise<never>((_resolve, reject) => {
      interrupt = error => {
        controller.abort()
        reject(error)
      }
    })

    const timeoutId = setTimeout(() => interrupt(new TimeoutError(`fetch ${path}`, this.timeout)), this.timeout)
    const onAbort = (): void =>
      interrupt(new SourceError(`Request for ${path} cancelled`, ErrorCode.SOURCE_ERROR, { resource: path }))
    if (signal?.aborted) onAbort()
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      return await Promise.race([this.download(this.buildUrl(path), path, controller.signal), interrupted])
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onAbort)
    }
  }

  /**
   * URL of a resource file, e.g.
   * https://huggingface.co/datasets/SALT-NLP/WORKBank/resolve/main/task_data/x.csv
   */
  buildUrl(path: string): string {
    const normalizedPath = path.startsWith('/') ? path.slice(1) : path
    return `${this.baseUrl}/${this.id}/resolve/${this.revision}/${normalizedPath}`
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'text/csv, text/plain;q=0.9, */*;q=0.1' }
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`
    }
    return headers
  }

  /**
   * Make one HTTP request and read its body
   */
  private async download(url: string, path: string, signal: AbortSignal): Promise<string> {
    let response: Response
    try {
      response = await this.fetch(url, {
        headers: this.buildHeaders(),
        signal,
      })
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TimeoutError(`fetch ${path}`, this.timeout, error)
      }
      throw new NetworkError(
        error instanceof Error ? error.message : 'Network error',
        path,
        undefined,
        error instanceof Error ? error : undefined
      )
    }

    if (!response.ok) {
      throw errorFromStatus(response.status, path)
    }

    try {
      return await response.text()
    } catch (error) {
      throw new NetworkError(
        `Failed to read ${path}: ${error instanceof Error ? error.message : String(error)}`,
        path,
        response.status,
        error instanceof Error ? error : undefined
      )
    }
  }
}
