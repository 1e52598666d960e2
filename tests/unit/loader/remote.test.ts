/**
 * HuggingFaceSource Tests
 */

import { describe, it, expect, vi } from 'vitest'
import {
  ErrorCode,
  NetworkError,
  SchemaMismatchError,
  SourceError,
  TimeoutError,
} from '../../../src/errors'
import { HuggingFaceSource, type FetchFn } from '../../../src/loader'
import {
  createFailingFetch,
  createFileFetch,
  createHangingFetch,
  createMockResponse,
  requestUrl,
} from '../../mocks/fetch'
import { REMOTE_TABLES, remoteFiles } from '../../fixtures'

const WORKER_PATH = 'worker_data/domain_worker_desires.csv'

/**
 * A 200 response whose body never finishes
 */
function stalledResponse(): Response {
  return new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 })
}

async function catchRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }
  throw new Error('expected promise to reject')
}

describe('HuggingFaceSource', () => {
  describe('buildUrl', () => {
    it('resolves resources against the default dataset', () => {
      const source = new HuggingFaceSource({ fetch: createFileFetch({}) })

      expect(source.id).toBe('SALT-NLP/WORKBank')
      expect(source.buildUrl(WORKER_PATH)).toBe(
        'https://huggingface.co/datasets/SALT-NLP/WORKBank/resolve/main/worker_data/domain_worker_desires.csv'
      )
    })

    it('honours dataset id, base URL and revision', () => {
      const source = new HuggingFaceSource({
        datasetId: 'acme/tasks',
        baseUrl: 'http://mirror.test/datasets/',
        revision: 'v2',
        fetch: createFileFetch({}),
      })

      expect(source.buildUrl('/a/b.csv')).toBe('http://mirror.test/datasets/acme/tasks/resolve/v2/a/b.csv')
    })
  })

  describe('fetchTables', () => {
    it('fetches and parses all three resources', async () => {
      const fetch = createFileFetch(remoteFiles())
      const source = new HuggingFaceSource({ fetch })

      const tables = await source.fetchTables()

      expect(tables).toEqual(REMOTE_TABLES)
      expect(fetch).toHaveBeenCalledTimes(3)
    })

    it('sends an Accept header, and a bearer token when configured', async () => {
      const fetch = createFileFetch(remoteFiles())
      const source = new HuggingFaceSource({ fetch, token: 'test-secret' })

      await source.fetchTables()

      const [input, init] = fetch.mock.calls[0] ?? []
      expect(input === undefined ? '' : requestUrl(input)).toContain('/resolve/main/')
      expect(init?.headers).toEqual({
        Accept: 'text/csv, text/plain;q=0.9, */*;q=0.1',
        Authorization: 'Bearer test-secret',
      })
    })

    it('maps 404 to a not-found source error', async () => {
      const files = remoteFiles()
      delete files[WORKER_PATH]
      const source = new HuggingFaceSource({ fetch: createFileFetch(files) })

      const error = await catchRejection(source.fetchTables())

      if (!(error instanceof SourceError)) throw error
      expect(error.code).toBe(ErrorCode.SOURCE_NOT_FOUND)
      expect(error.message).toBe(`Resource not found: ${WORKER_PATH}`)
      expect(error.resource).toBe(WORKER_PATH)
    })

    it('maps other HTTP failures to network errors', async () => {
      const source = new HuggingFaceSource({
        fetch: createFileFetch({
          ...remoteFiles(),
          [WORKER_PATH]: createMockResponse('busy', { status: 503 }),
        }),
      })

      const error = await catchRejection(source.fetchTables())

      if (!(error instanceof NetworkError)) throw error
      expect(error.status).toBe(503)
      expect(error.message).toBe(`HTTP 503 while fetching ${WORKER_PATH}`)
    })

    it('wraps transport failures in network errors', async () => {
      const source = new HuggingFaceSource({ fetch: createFailingFetch(new TypeError('fetch failed')) })

      const error = await catchRejection(source.fetchTables())

      if (!(error instanceof NetworkError)) throw error
      expect(error.message).toBe('fetch failed')
      expect(error.cause).toBeInstanceOf(TypeError)
    })

    it('times out hanging requests', async () => {
      const source = new HuggingFaceSource({ fetch: createHangingFetch(), timeout: 10 })

      const error = await catchRejection(source.fetchTables())

      expect(error).toBeInstanceOf(TimeoutError)
      expect(error).toBeInstanceOf(Error)
      if (error instanceof Error) {
        expect(error.message).toMatch(/^Operation "fetch .+\.csv" timed out after 10ms$/)
      }
    })

    it('times out a response body that never finishes', async () => {
      const source = new HuggingFaceSource({
        fetch: createFileFetch({ ...remoteFiles(), [WORKER_PATH]: stalledResponse() }),
        timeout: 50,
      })

      const error = await catchRejection(source.fetchTables())

      if (!(error instanceof TimeoutError)) throw error
      expect(error.message).toBe(`Operation "fetch ${WORKER_PATH}" timed out after 50ms`)
    })

    it('cancels the other requests when one fails', async () => {
      const signals = new Map<string, AbortSignal>()
      const fetch = vi.fn<FetchFn>((input, init) => {
        const url = requestUrl(input)
        if (init?.signal) signals.set(url, init.signal)
        if (url.endsWith(WORKER_PATH)) {
          return Promise.resolve(createMockResponse('Not Found', { status: 404 }))
        }
        return new Promise<Response>(() => {})
      })
      const source = new HuggingFaceSource({ fetch, timeout: 60_000 })

      const error = await catchRejection(source.fetchTables())

      if (!(error instanceof SourceError)) throw error
      expect(error.code).toBe(ErrorCode.SOURCE_NOT_FOUND)
      const siblings = [...signals].filter(([url]) => !url.endsWith(WORKER_PATH))
      expect(siblings).toHaveLength(2)
      expect(siblings.every(([, signal]) => signal.aborted)).toBe(true)
    })

    it('surfaces schema drift as a schema mismatch', async () => {
      const source = new HuggingFaceSource({
        fetch: createFileFetch({
          ...remoteFiles(),
          [WORKER_PATH]: 'Task ID,Task\nA,Task A\n',
        }),
      })

      await expect(source.fetchTables()).rejects.toBeInstanceOf(SchemaMismatchError)
    })
  })
})
