import express from 'express'
import cors from 'cors'
import type { Response } from 'express'
import { analyticRuin } from '@engine/analytic'
import { SimulationParameterError } from '@engine/errors'
import { runMonteCarloParallel } from '@engine/parallel'
import { resolveParams, validateParams } from '@engine/params'
import { createRandomSource } from '@engine/random'
import { runTrial } from '@engine/trial'
import { ResultCache, resultsKey } from '@state/cache'
import type { MonteSummary } from '../src/types/engine'
import type { Logger } from '../src/logger'
import { parseSimulateRequest, parseTrialParams, parseTrialRequest, type RequestLimits } from './request'

export interface AppDeps {
  limits: RequestLimits
  cacheSize: number
  log: Logger
}

export function createApp({ limits, cacheSize, log }: AppDeps) {
  const app = express()
  const cache = new ResultCache<MonteSummary>(cacheSize)

  app.use(cors())
  app.use(express.json())

  function sendError(res: Response, error: unknown) {
    if (error instanceof SimulationParameterError) {
      return res.status(400).json({ error: error.message, parameter: error.parameter })
    }
    log.error(error)
    return res.status(500).json({ error: 'An error occurred while running the simulation.' })
  }

  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() })
  })

  app.post('/api/simulate', async (req, res) => {
    try {
      const { params: input, options } = parseSimulateRequest(req.body, limits)
      const params = resolveParams(input)
      validateParams(params, options)

      const key = options.seed != null ? resultsKey(params, options) : null
      const cached = key ? cache.get(key) : undefined
      if (cached) {
        log.debug('cache hit', key)
        return res.json({ ...cached, cached: true })
      }

      const started = Date.now()
      const summary = await runMonteCarloParallel(params, {
        ...options,
        onProgress: (done, total) => log.debug(`progress ${done}/${total}`)
      })
      log.info(`simulated ${summary.trials} trials in ${Date.now() - started}ms`)
      if (key) cache.set(key, summary)
      return res.json({ ...summary, cached: false })
    } catch (error) {
      return sendError(res, error)
    }
  })

  app.post('/api/trial', (req, res) => {
    try {
      const { params: input, seed, maxSteps } = parseTrialRequest(req.body, limits)
      const params = resolveParams(input)
      validateParams(params, { maxSteps, seed })
      res.json(runTrial(params, createRandomSource(seed), { recordPath: true, maxSteps }))
    } catch (error) {
      sendError(res, error)
    }
  })

  app.get('/api/analytic', (req, res) => {
    try {
      const result = analyticRuin(parseTrialParams(req.query))
      if (!result) {
        return res.status(422).json({ error: 'No closed form for these parameters: needs takehome 1 and wealth/target on the bet lattice.' })
      }
      return res.json(result)
    } catch (error) {
      return sendError(res, error)
    }
  })

  return app
}
