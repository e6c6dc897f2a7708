export { runWithConcurrency } from './promise-pool.js'
export { PauseGate } from './pause-gate.js'
