import type { TrialResult, TrialTally } from '../types/engine'

export function emptyTally(): TrialTally {
  return { trials: 0, totalSteps: 0, totalWealth: 0, busted: 0, reached: 0, capped: 0 }
}

export function recordTrial(tally: TrialTally, result: TrialResult): void {
  tally.trials++
  tally.totalSteps += result.steps
  tally.totalWealth += result.finalWealth
  if (result.outcome === 'busted') tally.busted++
  else if (result.outcome === 'target-reached') tally.reached++
  else tally.capped++
}

// Order-independent: partial tallies from any batch split fold to the same totals.
export function mergeTallies(a: TrialTally, b: TrialTally): TrialTally {
  return {
    trials: a.trials + b.trials,
    totalSteps: a.totalSteps + b.totalSteps,
    totalWealth: a.totalWealth + b.totalWealth,
    busted: a.busted + b.busted,
    reached: a.reached + b.reached,
    capped: a.capped + b.capped
  }
}
