import { SimulationParameterError } from '@engine/errors'
import type { ParallelOptions } from '@engine/parallel'
import type { TrialParamsInput } from '../src/types/engine'

export interface RequestLimits {
  defaultTrials: number
  maxTrials: number
  defaultWorkers: number
  maxSteps: number
}

type Fields = Record<string, unknown>

function asFields(body: unknown): Fields {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new SimulationParameterError('body', body, 'body must be a JSON object')
  }
  return Object.fromEntries(Object.entries(body))
}

// Accepts JSON numbers and, for query strings, numeric text.
function readNumber(fields: Fields, key: string): number | undefined {
  const raw = fields[key]
  if (raw === undefined || raw === null || raw === '') return undefined
  const value = typeof raw === 'string' ? Number(raw) : raw
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new SimulationParameterError(key, raw, `${key} must be a number (got ${JSON.stringify(raw)})`)
  }
  return value
}

function requireNumber(fields: Fields, key: string): number {
  const value = readNumber(fields, key)
  if (value === undefined) throw new SimulationParameterError(key, undefined, `${key} is required`)
  return value
}

function readMaxSteps(fields: Fields, limit: number): number {
  const maxSteps = readNumber(fields, 'maxSteps') ?? limit
  if (maxSteps > limit) {
    throw new SimulationParameterError('maxSteps', maxSteps, `maxSteps must be at most ${limit}`)
  }
  return maxSteps
}

function readBoolean(fields: Fields, key: string): boolean | undefined {
  const raw = fields[key]
  if (raw === undefined) return undefined
  if (typeof raw === 'boolean') return raw
  if (raw === 'true' || raw === 'false') return raw === 'true'
  throw new SimulationParameterError(key, raw, `${key} must be a boolean`)
}

export function parseTrialParams(body: unknown): TrialParamsInput {
  const fields = asFields(body)
  return {
    initialWealth: requireNumber(fields, 'initialWealth'),
    bet: requireNumber(fields, 'bet'),
    target: requireNumber(fields, 'target'),
    takehome: readNumber(fields, 'takehome'),
    p: readNumber(fields, 'p')
  }
}

export function parseSimulateRequest(body: unknown, limits: RequestLimits): { params: TrialParamsInput; options: ParallelOptions } {
  const fields = asFields(body)
  const trials = readNumber(fields, 'trials') ?? limits.defaultTrials
  if (trials > limits.maxTrials) {
    throw new SimulationParameterError('trials', trials, `trials must be at most ${limits.maxTrials}`)
  }
  const workers = readNumber(fields, 'workers') ?? limits.defaultWorkers
  if (!Number.isInteger(workers) || workers < 1) {
    throw new SimulationParameterError('workers', workers, 'workers must be a positive integer')
  }
  return {
    params: parseTrialParams(fields),
    options: {
      trials,
      workers,
      seed: readNumber(fields, 'seed'),
      maxSteps: readMaxSteps(fields, limits.maxSteps),
      recordLastPath: readBoolean(fields, 'recordLastPath')
    }
  }
}

export function parseTrialRequest(body: unknown, limits: Pick<RequestLimits, 'maxSteps'>): { params: TrialParamsInput; seed?: number; maxSteps: number } {
  const fields = asFields(body)
  return { params: parseTrialParams(fields), seed: readNumber(fields, 'seed'), maxSteps: readMaxSteps(fields, limits.maxSteps) }
}
