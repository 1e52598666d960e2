/**
 * TTLCache Tests
 */

import { describe, it, expect } from 'vitest'
import { TTLCache } from '../../../src/utils/ttl-cache'

function createCache(ttlMs = 100): { cache: TTLCache<string>; advance: (ms: number) => void } {
  let now = 1_000
  const cache = new TTLCache<string>({ ttlMs, now: () => now })
  return { cache, advance: ms => { now += ms } }
}

describe('TTLCache', () => {
  it('returns values within the TTL', () => {
    const { cache, advance } = createCache()
    cache.set('a', 'one')
    advance(99)

    expect(cache.get('a')).toBe('one')
  })

  it('expires values once the TTL has elapsed', () => {
    const { cache, advance } = createCache()
    cache.set('a', 'one')
    advance(100)

    expect(cache.get('a')).toBeUndefined()
  })

  it('drops expired entries for good', () => {
    const { cache, advance } = createCache()
    cache.set('a', 'one')
    advance(100)
    cache.get('a')
    advance(-100)

    expect(cache.get('a')).toBeUndefined()
  })

  it('restarts the TTL when a key is set again', () => {
    const { cache, advance } = createCache()
    cache.set('a', 'one')
    advance(80)
    cache.set('a', 'two')
    advance(80)

    expect(cache.get('a')).toBe('two')
  })

  it('expires immediately with a zero TTL', () => {
    const { cache } = createCache(0)
    cache.set('a', 'one')

    expect(cache.get('a')).toBeUndefined()
  })

  it('deletes entries', () => {
    const { cache } = createCache()
    cache.set('a', 'one')
    cache.set('b', 'two')

    expect(cache.delete('a')).toBe(true)
    expect(cache.delete('a')).toBe(false)
    expect(cache.get('a')).toBeUndefined()
    expect(cache.get('b')).toBe('two')
  })

  it('rejects invalid TTLs', () => {
    expect(() => new TTLCache({ ttlMs: -1 })).toThrow(RangeError)
    expect(() => new TTLCache({ ttlMs: Number.NaN })).toThrow('ttlMs must be a non-negative number, got NaN')
  })
})
