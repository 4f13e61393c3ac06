import type { MonteCarloOptions, TrialParams, TrialParamsInput } from '../types/engine'
import { SimulationParameterError } from './errors'

export const DEFAULT_P = 0.5
export const DEFAULT_TAKEHOME = 1
export const DEFAULT_TRIALS = 1000
// Seeds feed a 32-bit generator state
export const MAX_SEED = 0xffffffff

export function resolveParams(input: TrialParamsInput): TrialParams {
  return {
    initialWealth: input.initialWealth,
    bet: input.bet,
    target: input.target,
    takehome: input.takehome ?? DEFAULT_TAKEHOME,
    p: input.p ?? DEFAULT_P
  }
}

function fail(parameter: string, value: unknown, reason: string): never {
  throw new SimulationParameterError(parameter, value, `${parameter} ${reason} (got ${String(value)})`)
}

function isPositiveInteger(v: number): boolean {
  return Number.isInteger(v) && v > 0
}

/**
 * Rejects parameter sets that would make a trial meaningless or let it walk
 * forever, including bets that floating-point rounding would swallow. `initialWealth === target` is accepted and ends every trial
 * before the first flip.
 */
export function validateParams(params: TrialParams, options: MonteCarloOptions = {}): void {
  const { initialWealth, bet, target, takehome, p } = params
  if (!Number.isFinite(p) || p < 0 || p > 1) fail('p', p, 'must be a probability in [0, 1]')
  if (!Number.isFinite(bet) || bet <= 0) fail('bet', bet, 'must be a positive number')
  if (!Number.isFinite(takehome) || takehome <= 0) fail('takehome', takehome, 'must be a positive number')
  if (!Number.isFinite(target) || target <= 0) fail('target', target, 'must be a positive number')
  if (!Number.isFinite(initialWealth) || initialWealth < 0) fail('initialWealth', initialWealth, 'must be a non-negative number')
  if (initialWealth > target) fail('target', target, `must not be below initialWealth ${initialWealth}`)
  // Wealth never exceeds target, so a move that vanishes there vanishes everywhere.
  if (target - bet === target) fail('bet', bet, `is too small to change wealth at target ${target}`)
  if (target - bet * takehome === target) fail('takehome', takehome, `leaves a win too small to change wealth at target ${target}`)
  if (options.trials != null && !isPositiveInteger(options.trials)) fail('trials', options.trials, 'must be a positive integer')
  if (options.maxSteps != null && !isPositiveInteger(options.maxSteps)) fail('maxSteps', options.maxSteps, 'must be a positive integer')
  if (options.seed != null && !(Number.isInteger(options.seed) && options.seed >= 0 && options.seed <= MAX_SEED)) {
    fail('seed', options.seed, `must be an integer in [0, ${MAX_SEED}]`)
  }
}
