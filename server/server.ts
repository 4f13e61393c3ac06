import { CACHE_SIZE, DEFAULT_TRIALS, DEFAULT_WORKERS, MAX_STEPS, MAX_TRIALS, PORT } from '../src/config'
import { createLogger } from '../src/logger'
import { createApp } from './app'

const log = createLogger('server')

const app = createApp({
  limits: { defaultTrials: DEFAULT_TRIALS, maxTrials: MAX_TRIALS, defaultWorkers: DEFAULT_WORKERS, maxSteps: MAX_STEPS },
  cacheSize: CACHE_SIZE,
  log
})

app.listen(PORT, () => {
  log.info(`Server is running on port ${PORT}`)
})
