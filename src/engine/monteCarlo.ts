import type { BatchRequest, BatchResult, MonteCarloOptions, MonteSummary, TrialParamsInput } from '../types/engine'
import { DEFAULT_TRIALS, resolveParams, validateParams } from './params'
import { P2Quantile } from './quantile'
import { createRandomSource, offsetSeed, type RandomSource } from './random'
import { emptyTally, mergeTallies, recordTrial } from './tally'
import { runTrial } from './trial'

export interface SequentialOptions extends MonteCarloOptions {
  // Shared by every trial in the run; overrides per-trial seeding.
  rng?: RandomSource
}

export const PROGRESS_INTERVAL = 1000

/**
 * Runs trials `start .. start + count - 1`. Trial `i` draws from its own
 * stream seeded with `offsetSeed(seed, i)`, so the totals of a seeded run do
 * not depend on how the trial range is split into batches.
 */
export function runBatch(req: BatchRequest, onProgress?: (completed: number) => void, rng?: RandomSource): BatchResult {
  const tally = emptyTally()
  const median = new P2Quantile(0.5)
  const p90 = new P2Quantile(0.9)
  let lastPath: number[] | undefined

  for (let k = 0; k < req.count; k++) {
    const isLast = k === req.count - 1
    const source = rng ?? createRandomSource(offsetSeed(req.seed, req.start + k))
    const res = runTrial(req.params, source, { maxSteps: req.maxSteps, recordPath: isLast && req.recordLastPath })
    recordTrial(tally, res)
    median.add(res.steps)
    p90.add(res.steps)
    if (res.path) lastPath = res.path
    if (onProgress && (k + 1) % PROGRESS_INTERVAL === 0) onProgress(k + 1)
  }
  if (onProgress && req.count % PROGRESS_INTERVAL !== 0) onProgress(req.count)

  const result: BatchResult = { start: req.start, tally, medianSteps: median.get(), p90Steps: p90.get() }
  if (lastPath) result.lastPath = lastPath
  return result
}

/**
 * Folds batch results into expected values. Sums are exact; step quantiles
 * are a trial-weighted mean of the per-batch estimates.
 */
export function combineBatches(batches: BatchResult[]): MonteSummary {
  if (batches.length === 0) throw new Error('combineBatches needs at least one batch')
  const ordered = [...batches].sort((a, b) => a.start - b.start)
  const tally = ordered.map((b) => b.tally).reduce(mergeTallies)
  const n = tally.trials
  const weighted = (pick: (b: BatchResult) => number) => ordered.reduce((s, b) => s + pick(b) * b.tally.trials, 0) / n

  const summary: MonteSummary = {
    trials: n,
    expectedWealth: tally.totalWealth / n,
    expectedSteps: tally.totalSteps / n,
    ruinProbability: tally.busted / n,
    successProbability: tally.reached / n,
    cappedTrials: tally.capped,
    medianSteps: weighted((b) => b.medianSteps),
    p90Steps: weighted((b) => b.p90Steps)
  }
  const lastPath = ordered[ordered.length - 1].lastPath
  if (lastPath) summary.lastPath = lastPath
  return summary
}

export function runMonteCarlo(input: TrialParamsInput, opts: SequentialOptions = {}): MonteSummary {
  const params = resolveParams(input)
  const trials = opts.trials ?? DEFAULT_TRIALS
  validateParams(params, { ...opts, trials })
  const batch = runBatch(
    { params, start: 0, count: trials, seed: opts.seed, maxSteps: opts.maxSteps, recordLastPath: opts.recordLastPath },
    undefined,
    opts.rng
  )
  return combineBatches([batch])
}
