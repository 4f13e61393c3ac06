import { describe, expect, it } from 'vitest'
import { resolveParams } from '../../src/engine/params'
import { ResultCache, resultsKey } from '../../src/state/cache'

describe('resultsKey', () => {
  const params = resolveParams({ initialWealth: 10, bet: 1, target: 20 })

  it('is stable for equal requests and differs when the seed changes', () => {
    const a = resultsKey(params, { trials: 1000, seed: 1 })
    expect(resultsKey({ ...params }, { trials: 1000, seed: 1 })).toBe(a)
    expect(resultsKey(params, { trials: 1000, seed: 2 })).not.toBe(a)
    expect(a.startsWith('results:')).toBe(true)
  })

  it('treats a missing recordLastPath as false', () => {
    expect(resultsKey(params, { seed: 1 })).toBe(resultsKey(params, { seed: 1, recordLastPath: false }))
  })
})

describe('ResultCache', () => {
  it('evicts the least recently used entry', () => {
    const cache = new ResultCache<number>(2)
    cache.set('a', 1)
    cache.set('b', 2)
    expect(cache.get('a')).toBe(1)
    cache.set('c', 3)
    expect(cache.get('b')).toBeUndefined()
    expect(cache.get('a')).toBe(1)
    expect(cache.get('c')).toBe(3)
    expect(cache.size).toBe(2)
  })

  it('stores nothing with zero capacity', () => {
    const cache = new ResultCache<string>(0)
    cache.set('k', 'v')
    expect(cache.get('k')).toBeUndefined()
  })
})
