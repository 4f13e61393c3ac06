export interface TrialParams {
  initialWealth: number
  bet: number
  target: number
  takehome: number // fraction of the bet credited on a win
  p: number // win probability
}

export type TrialParamsInput = Pick<TrialParams, 'initialWealth' | 'bet' | 'target'> & Partial<Pick<TrialParams, 'takehome' | 'p'>>

// 'active' only survives as a final outcome when a step cap cut the walk short
export type TrialOutcome = 'active' | 'busted' | 'target-reached'

export interface TrialResult {
  steps: number
  finalWealth: number
  outcome: TrialOutcome
  path?: number[]
}

export interface MonteCarloOptions {
  trials?: number
  seed?: number
  maxSteps?: number
  recordLastPath?: boolean
}

export interface TrialTally {
  trials: number
  totalSteps: number
  totalWealth: number
  busted: number
  reached: number
  capped: number
}

export interface BatchRequest {
  params: TrialParams
  start: number
  count: number
  seed?: number
  maxSteps?: number
  recordLastPath?: boolean
}

export interface BatchResult {
  start: number
  tally: TrialTally
  medianSteps: number
  p90Steps: number
  lastPath?: number[]
}

export interface MonteSummary {
  trials: number
  expectedWealth: number
  expectedSteps: number
  ruinProbability: number
  successProbability: number
  cappedTrials: number
  medianSteps: number
  p90Steps: number
  lastPath?: number[]
}

export type WorkerMessage =
  | { type: 'progress'; completed: number }
  | { type: 'done'; result: BatchResult }
  | { type: 'error'; error: string }
