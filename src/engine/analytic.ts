import type { TrialParamsInput } from '../types/engine'
import { resolveParams, validateParams } from './params'

export interface AnalyticResult {
  ruinProbability: number
  successProbability: number
  expectedDuration: number
  expectedWealth: number
}

const LATTICE_EPS = 1e-9

function latticeIndex(amount: number, bet: number): number | null {
  const units = amount / bet
  const rounded = Math.round(units)
  return Math.abs(units - rounded) < LATTICE_EPS ? rounded : null
}

/**
 * Closed-form Gambler's Ruin for the classic lattice walk: even-money bets
 * (takehome 1) with initial wealth and target both whole multiples of the
 * bet. Returns null when the walk is off that lattice.
 */
export function analyticRuin(input: TrialParamsInput): AnalyticResult | null {
  const params = resolveParams(input)
  validateParams(params)
  const { bet, target, takehome, p } = params
  if (takehome !== 1) return null
  const i = latticeIndex(params.initialWealth, bet)
  const N = latticeIndex(target, bet)
  if (i == null || N == null) return null

  const q = 1 - p
  let ruin: number
  let duration: number
  if (i <= 0 || i >= N) {
    ruin = i <= 0 ? 1 : 0
    duration = 0
  } else if (p === 0) {
    ruin = 1
    duration = i
  } else if (p === 1) {
    ruin = 0
    duration = N - i
  } else if (p === 0.5) {
    ruin = 1 - i / N
    duration = i * (N - i)
  } else {
    const r = q / p
    // Scale by r^-N when r > 1 so the powers stay finite for long walks.
    let ratio: number
    if (r > 1) {
      const s = p / q
      ruin = (s ** (N - i) - 1) / (s ** N - 1)
      ratio = (s ** N - s ** (N - i)) / (s ** N - 1)
    } else {
      ruin = (r ** i - r ** N) / (1 - r ** N)
      ratio = (1 - r ** i) / (1 - r ** N)
    }
    duration = i / (q - p) - (N / (q - p)) * ratio
  }

  return {
    ruinProbability: ruin,
    successProbability: 1 - ruin,
    expectedDuration: duration,
    expectedWealth: (1 - ruin) * target
  }
}
