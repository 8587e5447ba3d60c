/**
 * Worker Pool for parallel source page rendering
 *
 * Manages a pool of worker threads that render annotated source pages.
 * Workers are reused across multiple tasks.
 *
 * Set TRACECOV_WORKERS=0 to disable worker threads and render on the main
 * thread. The pool also stays on the main thread when the compiled worker
 * file cannot be found (e.g. when running from sources under vitest).
 */
import { Worker } from 'node:worker_threads'
import { cpus } from 'node:os'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { existsSync } from 'node:fs'
import type { SourcePageInput } from '@/report/source-page.js'
import { MAX_AUTO_WORKERS, WORKERS_ENV } from '@/utils/constants.js'
import { error as logError, log } from '@/utils/logger.js'
import type { RenderOutput } from './render-worker.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)

const WORKER_FILE = 'render-worker.js'

/**
 * Determine the number of workers to use.
 * - TRACECOV_WORKERS env var overrides auto-detection (0 = single-threaded)
 * - Otherwise use half of CPUs, min 2, max 8
 */
export function getWorkerCount(): number {
  const envWorkers = process.env[WORKERS_ENV]
  if (envWorkers !== undefined) {
    const count = parseInt(envWorkers, 10)
    if (!isNaN(count) && count >= 0) {
      return count
    }
  }

  const coreCount = cpus().length
  return Math.min(MAX_AUTO_WORKERS, Math.max(2, Math.floor(coreCount / 2)))
}

/**
 * Find the compiled worker file.
 * From dist/ the bundle sits beside dist/worker/; under vitest this module
 * is src/worker/pool.ts and only a previous build provides the file.
 */
function findWorkerPath(): string | null {
  const candidates = [
    join(__dirname, 'worker', WORKER_FILE),
    join(__dirname, WORKER_FILE),
    join(__dirname, '..', '..', 'dist', 'worker', WORKER_FILE),
  ]
  return candidates.find(candidate => existsSync(candidate)) ?? null
}

interface QueuedTask {
  task: SourcePageInput
  resolve: (result: RenderOutput) => void
  reject: (error: Error) => void
}

export class WorkerPool {
  private workers: Worker[] = []
  private availableWorkers: Worker[] = []
  private taskQueue: QueuedTask[] = []
  private workerPath: string | null
  private maxWorkers: number
  private isTerminated = false
  private _isSingleThreaded: boolean

  /**
   * @param maxWorkers - Worker count (default: getWorkerCount())
   * @param workerPath - Compiled worker file (default: located next to the bundle)
   */
  constructor(maxWorkers?: number, workerPath?: string) {
    this.workerPath = workerPath ?? findWorkerPath()
    this.maxWorkers = this.workerPath === null ? 0 : (maxWorkers ?? getWorkerCount())
    this._isSingleThreaded = this.maxWorkers === 0
    if (this.workerPath === null && maxWorkers !== 0) {
      log('  Worker file not found, rendering on the main thread')
    }
  }

  private removeWorker(worker: Worker): void {
    const idx = this.workers.indexOf(worker)
    if (idx !== -1) {
      this.workers.splice(idx, 1)
    }
    const availIdx = this.availableWorkers.indexOf(worker)
    if (availIdx !== -1) {
      this.availableWorkers.splice(availIdx, 1)
    }
  }

  private createWorker(workerPath: string): Worker {
    const worker = new Worker(workerPath)

    worker.on('error', (err) => {
      logError('[WorkerPool] Worker error:', err)
      this.removeWorker(worker)
    })

    worker.on('exit', (code) => {
      if (code !== 0 && !this.isTerminated) {
        logError(`[WorkerPool] Worker exited with code ${code}`)
      }
      this.removeWorker(worker)
    })

    this.workers.push(worker)
    return worker
  }

  private getWorker(): Worker | undefined {
    // Return an available worker or create a new one if under limit
    const available = this.availableWorkers.pop()
    if (available) {
      return available
    }
    if (this.workerPath !== null && this.workers.length < this.maxWorkers) {
      return this.createWorker(this.workerPath)
    }
    return undefined
  }

  private processNextTask(): void {
    if (this.taskQueue.length === 0) return

    const worker = this.getWorker()
    if (!worker) return

    const queued = this.taskQueue.shift()
    if (!queued) return
    const { task, resolve, reject } = queued

    const handleMessage = (result: RenderOutput) => {
      worker.off('message', handleMessage)
      worker.off('error', handleError)

      // Return worker to available pool
      if (!this.isTerminated) {
        this.availableWorkers.push(worker)
        this.processNextTask()
      }

      resolve(result)
    }

    const handleError = (err: Error) => {
      worker.off('message', handleMessage)
      worker.off('error', handleError)

      reject(err)
    }

    worker.on('message', handleMessage)
    worker.on('error', handleError)

    worker.postMessage(task)
  }

  async runTask(task: SourcePageInput): Promise<RenderOutput> {
    if (this.isTerminated) {
      throw new Error('WorkerPool has been terminated')
    }

    // Single-threaded mode: run directly in main thread
    if (this._isSingleThreaded) {
      return this.runTaskDirect(task)
    }

    return new Promise((resolve, reject) => {
      this.taskQueue.push({ task, resolve, reject })
      this.processNextTask()
    })
  }

  /**
   * Run task directly in main thread (single-threaded mode).
   */
  private async runTaskDirect(task: SourcePageInput): Promise<RenderOutput> {
    const { processTask } = await import('./render-worker.js')
    return processTask(task)
  }

  async terminate(): Promise<void> {
    this.isTerminated = true
    await Promise.all(
      this.workers.map((worker) => worker.terminate())
    )
    this.workers = []
    this.availableWorkers = []
    this.taskQueue = []
  }

  get poolSize(): number {
    return this.maxWorkers
  }

  get activeWorkers(): number {
    return this.workers.length - this.availableWorkers.length
  }

  get queuedTasks(): number {
    return this.taskQueue.length
  }

  /** Returns true if running in single-threaded mode (no worker threads) */
  get isSingleThreaded(): boolean {
    return this._isSingleThreaded
  }
}
