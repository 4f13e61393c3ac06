export interface RandomSource {
  random: () => number
}

const WEYL_STEP = 0x6d2b79f5
const UINT32_RANGE = 2 ** 32

// mulberry32: a single 32-bit word advanced by a Weyl step, mixed on every draw.
function mulberry32(seed: number): () => number {
  let state = seed >>> 0
  return function next() {
    state = (state + WEYL_STEP) | 0
    let z = Math.imul(state ^ (state >>> 15), state | 1)
    z ^= z + Math.imul(z ^ (z >>> 7), z | 61)
    return ((z ^ (z >>> 14)) >>> 0) / UINT32_RANGE
  }
}

export function createRandomSource(seed?: number): RandomSource {
  return { random: seed == null ? Math.random : mulberry32(seed) }
}

/**
 * Replays `values` in order, wrapping around at the end. Lets a trial be
 * driven flip by flip without real randomness.
 */
export function sequenceSource(values: readonly number[]): RandomSource {
  if (values.length === 0) throw new Error('sequenceSource needs at least one value')
  for (const v of values) {
    if (!(v >= 0 && v < 1)) throw new Error(`sequenceSource value ${v} is outside [0, 1)`)
  }
  let i = 0
  return {
    random: () => {
      const v = values[i]
      i = (i + 1) % values.length
      return v
    }
  }
}

export function offsetSeed(base: number | undefined, offset: number): number | undefined {
  return base == null ? undefined : (base + offset) >>> 0
}
