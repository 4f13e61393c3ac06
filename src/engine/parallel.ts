import { Worker } from 'node:worker_threads'
import type { BatchRequest, BatchResult, MonteCarloOptions, MonteSummary, TrialParamsInput, WorkerMessage } from '../types/engine'
import { createLogger } from '../logger'
import { combineBatches, runBatch } from './monteCarlo'
import { DEFAULT_TRIALS, resolveParams, validateParams } from './params'

const log = createLogger('parallel')

// Below this many trials per worker the thread start-up outweighs the work.
export const MIN_TRIALS_PER_WORKER = 5000

const WORKER_URL = new URL('../workers/trialWorker.ts', import.meta.url)
// The entry is TypeScript: each worker registers tsx itself, then pulls the
// entry in through import() so Worker never sees the .ts filename.
const WORKER_BOOTSTRAP = `import(${JSON.stringify(WORKER_URL.href)})`
const WORKER_EXEC_ARGV = ['--import', 'tsx']

/** The slice of a worker thread the pool talks to. */
export interface BatchWorker {
  on(event: 'message', listener: (msg: WorkerMessage) => void): unknown
  once(event: 'error', listener: (err: Error) => void): unknown
  once(event: 'exit', listener: (code: number) => void): unknown
  postMessage(req: BatchRequest): void
  terminate(): Promise<number>
}

export function spawnTrialWorker(): BatchWorker {
  return new Worker(WORKER_BOOTSTRAP, { eval: true, execArgv: WORKER_EXEC_ARGV })
}

export interface ParallelOptions extends MonteCarloOptions {
  workers?: number
  onProgress?: (completed: number, total: number) => void
}

export interface BatchPlan {
  start: number
  count: number
}

/** Splits `trials` into at most `workers` contiguous, near-equal ranges. */
export function planBatches(trials: number, workers: number): BatchPlan[] {
  const n = Math.max(1, Math.min(Math.floor(workers), Math.ceil(trials / MIN_TRIALS_PER_WORKER)))
  const base = Math.floor(trials / n)
  const extra = trials % n
  const plan: BatchPlan[] = []
  let start = 0
  for (let i = 0; i < n; i++) {
    const count = base + (i < extra ? 1 : 0)
    plan.push({ start, count })
    start += count
  }
  return plan
}

function runBatchInWorker(worker: BatchWorker, req: BatchRequest, onProgress: (completed: number) => void): Promise<BatchResult> {
  return new Promise((resolve, reject) => {
    let settled = false
    worker.on('message', (msg) => {
      if (msg.type === 'progress') {
        onProgress(msg.completed)
      } else if (msg.type === 'done') {
        settled = true
        resolve(msg.result)
      } else {
        settled = true
        reject(new Error(`Trial worker failed: ${msg.error}`))
      }
    })
    worker.once('error', (err) => {
      settled = true
      reject(err)
    })
    worker.once('exit', (code) => {
      if (!settled) reject(new Error(`Trial worker exited with code ${code} before finishing`))
    })
    worker.postMessage(req)
  })
}

/**
 * Runs one request per worker. When any batch fails the remaining workers
 * are terminated before the error is rethrown.
 */
export async function runBatchesInWorkers(
  requests: BatchRequest[],
  onProgress: (completed: number) => void,
  spawn: () => BatchWorker = spawnTrialWorker
): Promise<BatchResult[]> {
  const completed = new Array<number>(requests.length).fill(0)
  const workers = requests.map(() => spawn())
  try {
    return await Promise.all(
      requests.map((req, i) =>
        runBatchInWorker(workers[i], req, (done) => {
          completed[i] = done
          onProgress(completed.reduce((s, v) => s + v, 0))
        })
      )
    )
  } catch (err) {
    await Promise.all(workers.map((w) => w.terminate()))
    throw err
  }
}

/**
 * Same result as runMonteCarlo, with the trial range spread over worker
 * threads and the partial tallies folded back together.
 */
export async function runMonteCarloParallel(input: TrialParamsInput, opts: ParallelOptions = {}): Promise<MonteSummary> {
  const params = resolveParams(input)
  const trials = opts.trials ?? DEFAULT_TRIALS
  validateParams(params, { ...opts, trials })

  const plan = planBatches(trials, opts.workers ?? 1)
  const last = plan.length - 1
  const requests: BatchRequest[] = plan.map((b, i) => ({
    params,
    start: b.start,
    count: b.count,
    seed: opts.seed,
    maxSteps: opts.maxSteps,
    recordLastPath: i === last && opts.recordLastPath
  }))

  if (requests.length === 1) {
    return combineBatches([runBatch(requests[0], (done) => opts.onProgress?.(done, trials))])
  }

  log.debug(`running ${trials} trials on ${requests.length} workers`)
  const batches = await runBatchesInWorkers(requests, (done) => opts.onProgress?.(done, trials))
  return combineBatches(batches)
}
