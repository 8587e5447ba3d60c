/**
 * Worker thread for annotated source page rendering
 *
 * Reading a source file and laying out its lines is independent per file,
 * so large reports spread this work over several threads.
 */
import { parentPort } from 'node:worker_threads'
import { renderSourcePage, type RenderedPage, type SourcePageInput } from '@/report/source-page.js'
import { formatError } from '@/utils/logger.js'

export interface RenderOutput {
  success: boolean
  page?: RenderedPage
  error?: string
  timings?: {
    total: number
  }
}

// Exported for testing and for the single-threaded path
export async function processTask(input: SourcePageInput): Promise<RenderOutput> {
  const start = performance.now()
  try {
    const page = await renderSourcePage(input)
    return { success: true, page, timings: { total: performance.now() - start } }
  } catch (err) {
    return {
      success: false,
      error: formatError(err),
      timings: { total: performance.now() - start },
    }
  }
}

// Handle messages from main thread
const port = parentPort
if (port) {
  port.on('message', (input: SourcePageInput) => {
    void processTask(input).then(result => port.postMessage(result))
  })
}
