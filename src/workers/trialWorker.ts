import { parentPort } from 'node:worker_threads'
import type { BatchRequest, WorkerMessage } from '../types/engine'
import { runBatch } from '../engine/monteCarlo'

if (!parentPort) throw new Error('trialWorker must be started as a worker thread')
const port = parentPort

const post = (msg: WorkerMessage) => port.postMessage(msg)

port.once('message', (req: BatchRequest) => {
  try {
    const result = runBatch(req, (completed) => post({ type: 'progress', completed }))
    post({ type: 'done', result })
  } catch (err) {
    post({ type: 'error', error: err instanceof Error ? err.message : String(err) })
  }
})
