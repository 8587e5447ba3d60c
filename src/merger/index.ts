/**
 * Merger Module
 *
 * Combines coverage from several tracefiles into one model
 */

// Core merger class and functions
export {
  TracefileMerger,
  createMerger,
  mergeTracefiles,
  mergeFileCoverage,
  mergeAll,
  findChecksumConflicts,
  DEFAULT_MERGER_CONFIG,
  type MergeOptions,
  type MergeResult,
  type FileMergeResult,
  type MergerConfig,
} from './core.js'

// Printer functions
export {
  formatSummaryLine,
  formatSummaryTable,
  printCoverageSummary,
} from './printer.js'
