/**
 * Core Processing Modules
 *
 * Main pipeline components for report generation
 */

export {
  ReportProcessor,
  processTracefiles,
  type ProcessorOptions,
  type ProcessResult,
  type LoadResult,
} from './processor.js'
