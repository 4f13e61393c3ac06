import os from 'node:os'
import dotenv from 'dotenv'

dotenv.config()

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name]
  if (!raw) return fallback
  const parsed = Number.parseInt(raw, 10)
  return Number.isFinite(parsed) ? parsed : fallback
}

export const NODE_ENV = process.env.NODE_ENV ?? 'development'
export const PORT = intFromEnv('PORT', 3333)
export const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info'

export const DEFAULT_TRIALS = intFromEnv('DEFAULT_TRIALS', 1000)
// Upper bound on trials a single API request may ask for
export const MAX_TRIALS = intFromEnv('MAX_TRIALS', 1_000_000)
// Step cap applied to every API trial, and the most a request may ask for
export const MAX_STEPS = intFromEnv('MAX_STEPS', 1_000_000)
export const DEFAULT_WORKERS = Math.max(1, intFromEnv('DEFAULT_WORKERS', os.cpus().length))
export const CACHE_SIZE = intFromEnv('CACHE_SIZE', 100)
