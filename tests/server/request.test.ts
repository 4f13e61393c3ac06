import { describe, expect, it } from 'vitest'
import { parseSimulateRequest, parseTrialParams, parseTrialRequest } from '../../server/request'

const limits = { defaultTrials: 1000, maxTrials: 50000, defaultWorkers: 2, maxSteps: 100000 }

describe('parseSimulateRequest', () => {
  it('fills defaults for trials and workers', () => {
    const req = parseSimulateRequest({ initialWealth: 20, bet: 1, target: 40, seed: 3 }, limits)
    expect(req.params).toEqual({ initialWealth: 20, bet: 1, target: 40, takehome: undefined, p: undefined })
    expect(req.options).toEqual({ trials: 1000, workers: 2, seed: 3, maxSteps: 100000, recordLastPath: undefined })
  })

  it('passes explicit options through', () => {
    const req = parseSimulateRequest({ initialWealth: 5, bet: 1, target: 10, p: 0.4, takehome: 0.9, trials: 200, workers: 1, maxSteps: 500, recordLastPath: true }, limits)
    expect(req.params).toEqual({ initialWealth: 5, bet: 1, target: 10, takehome: 0.9, p: 0.4 })
    expect(req.options).toMatchObject({ trials: 200, workers: 1, maxSteps: 500, recordLastPath: true })
  })

  it('rejects oversized runs and bad worker counts', () => {
    expect(() => parseSimulateRequest({ initialWealth: 5, bet: 1, target: 10, maxSteps: 100001 }, limits)).toThrow('maxSteps must be at most 100000')
    expect(() => parseSimulateRequest({ initialWealth: 5, bet: 1, target: 10, trials: 50001 }, limits)).toThrow('trials must be at most 50000')
    expect(() => parseSimulateRequest({ initialWealth: 5, bet: 1, target: 10, workers: 0 }, limits)).toThrow('workers must be a positive integer')
  })

  it('rejects non-object bodies and non-numeric fields', () => {
    expect(() => parseSimulateRequest([1, 2], limits)).toThrow('body must be a JSON object')
    expect(() => parseSimulateRequest({ initialWealth: 'lots', bet: 1, target: 10 }, limits)).toThrow('initialWealth must be a number (got "lots")')
    expect(() => parseSimulateRequest({ bet: 1, target: 10 }, limits)).toThrow('initialWealth is required')
    expect(() => parseSimulateRequest({ initialWealth: 5, bet: 1, target: 10, recordLastPath: 'yes' }, limits)).toThrow('recordLastPath must be a boolean')
  })
})

describe('parseTrialParams', () => {
  it('reads numeric query-string values', () => {
    expect(parseTrialParams({ initialWealth: '3', bet: '1', target: '6', p: '0.45' })).toEqual({ initialWealth: 3, bet: 1, target: 6, takehome: undefined, p: 0.45 })
  })
})

describe('parseTrialRequest', () => {
  it('picks up the seed and step cap', () => {
    expect(parseTrialRequest({ initialWealth: 3, bet: 1, target: 6, seed: 42, maxSteps: 100 }, limits)).toEqual({
      params: { initialWealth: 3, bet: 1, target: 6, takehome: undefined, p: undefined },
      seed: 42,
      maxSteps: 100
    })
  })
})

describe('parseTrialRequest step cap', () => {
  it('falls back to the configured cap', () => {
    expect(parseTrialRequest({ initialWealth: 3, bet: 1, target: 6 }, limits).maxSteps).toBe(100000)
  })
})
