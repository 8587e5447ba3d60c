/**
 * Worker Pool Module
 *
 * Manages worker threads for parallel page rendering
 */

export { WorkerPool, getWorkerCount } from './pool.js'
export { processTask, type RenderOutput } from './render-worker.js'
