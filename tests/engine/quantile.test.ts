import { describe, expect, it } from 'vitest'
import { P2Quantile } from '../../src/engine/quantile'
import { createRandomSource } from '../../src/engine/random'

describe('P2Quantile', () => {
  it('returns NaN before any sample', () => {
    expect(new P2Quantile(0.5).get()).toBeNaN()
  })

  it('reads the exact order statistic for fewer than five samples', () => {
    const q = new P2Quantile(0.5)
    ;[3, 1, 2].forEach((x) => q.add(x))
    expect(q.get()).toBe(2)
    expect(q.count).toBe(3)
  })

  it('ignores non-finite samples', () => {
    const q = new P2Quantile(0.5)
    q.add(Number.NaN)
    q.add(Infinity)
    q.add(4)
    expect(q.count).toBe(1)
    expect(q.get()).toBe(4)
  })

  it('holds a constant stream at its value', () => {
    const q = new P2Quantile(0.9)
    for (let i = 0; i < 50; i++) q.add(7)
    expect(q.get()).toBe(7)
  })

  it('tracks the median and 90th percentile of uniform draws', () => {
    const rng = createRandomSource(12)
    const median = new P2Quantile(0.5)
    const p90 = new P2Quantile(0.9)
    for (let i = 0; i < 20000; i++) {
      const u = rng.random()
      median.add(u)
      p90.add(u)
    }
    expect(Math.abs(median.get() - 0.5)).toBeLessThan(0.03)
    expect(Math.abs(p90.get() - 0.9)).toBeLessThan(0.03)
  })

  it('rejects quantiles outside (0, 1)', () => {
    expect(() => new P2Quantile(1)).toThrow('outside (0, 1)')
  })
})
