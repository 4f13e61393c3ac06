import type { TrialOutcome, TrialParams, TrialResult } from '../types/engine'
import { flipCoin } from './coin'
import type { RandomSource } from './random'

export interface TrialRunOptions {
  recordPath?: boolean
  maxSteps?: number
}

function clampWealth(wealth: number, target: number): number {
  return Math.min(target, Math.max(0, wealth))
}

export function classifyWealth(wealth: number, target: number): TrialOutcome {
  if (wealth <= 0) return 'busted'
  if (wealth >= target) return 'target-reached'
  return 'active'
}

/**
 * Walks wealth from `initialWealth` until it leaves (0, target). Bounds are
 * checked before each flip, and a bet that overshoots a boundary lands on
 * it, so `finalWealth` always lies in [0, target].
 */
export function runTrial(params: TrialParams, rng: RandomSource, opts: TrialRunOptions = {}): TrialResult {
  const { bet, target, p } = params
  const win = bet * params.takehome
  const maxSteps = opts.maxSteps ?? Infinity

  let wealth = clampWealth(params.initialWealth, target)
  let steps = 0
  const path = opts.recordPath ? [wealth] : null

  while (wealth > 0 && wealth < target && steps < maxSteps) {
    wealth = flipCoin(rng, p) ? wealth + win : wealth - bet
    steps++
    if (path) path.push(clampWealth(wealth, target))
  }

  const finalWealth = clampWealth(wealth, target)
  const result: TrialResult = { steps, finalWealth, outcome: classifyWealth(finalWealth, target) }
  if (path) result.path = path
  return result
}
