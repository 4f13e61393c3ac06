import type { MonteCarloOptions, TrialParams } from '../types/engine'

// djb2 (h * 33 + c), kept in uint32 range at every step
function hashKey(text: string): string {
  let hash = 5381
  for (const ch of text) hash = (Math.imul(hash, 33) + (ch.codePointAt(0) ?? 0)) >>> 0
  return hash.toString(36)
}

// Worker count is left out: a seeded run folds to the same totals however it is split.
export function resultsKey(params: TrialParams, opts: MonteCarloOptions): string {
  const keyObj = {
    p: [params.initialWealth, params.bet, params.target, params.takehome, params.p],
    o: {
      trials: opts.trials,
      seed: opts.seed,
      maxSteps: opts.maxSteps,
      path: opts.recordLastPath ?? false
    }
  }
  return `results:${hashKey(JSON.stringify(keyObj))}`
}

/** Small in-memory LRU keyed by resultsKey. */
export class ResultCache<T> {
  private readonly entries = new Map<string, T>()

  constructor(private readonly capacity: number) {}

  get size(): number {
    return this.entries.size
  }

  get(key: string): T | undefined {
    const hit = this.entries.get(key)
    if (hit === undefined) return undefined
    this.entries.delete(key)
    this.entries.set(key, hit)
    return hit
  }

  set(key: string, value: T): void {
    if (this.capacity <= 0) return
    this.entries.delete(key)
    this.entries.set(key, value)
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
    }
  }
}
