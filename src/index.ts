/**
 * tracecov - Tracefile merging and HTML coverage reports
 *
 * Public API for tracecov. Most users run the CLI:
 *   npx tracecov genhtml coverage/run1.info coverage/run2.info -o coverage/html
 *
 * This module exports the tracefile model, merge engine, summarizer and
 * report generator for programmatic use.
 */

// ============================================================================
// Configuration
// ============================================================================
export {
  type TracecovConfig,
  type ResolvedTracecovConfig,
  resolveTracecovConfig,
  loadTracecovConfig,
  clearConfigCache,
  toReportConfig,
  DEFAULT_TRACECOV_CONFIG,
  DEFAULT_THRESHOLDS,
} from './utils/config.js'

// ============================================================================
// Tracefiles
// ============================================================================
export {
  createTracefile,
  createFileCoverage,
  cloneTracefile,
  addLine,
  addFunction,
  addBranch,
  parseTracefile,
  serializeTracefile,
  readTracefile,
  writeTracefile,
  resolveTracefileInputs,
  filterTracefile,
  type ParseOptions,
  type ParseResult,
  type FilterOptions,
  type FilterResult,
} from './tracefile/index.js'

// ============================================================================
// Merging
// ============================================================================
export {
  TracefileMerger,
  createMerger,
  mergeTracefiles,
  mergeFileCoverage,
  mergeAll,
  formatSummaryTable,
  printCoverageSummary,
  type MergeOptions,
  type MergeResult,
  type FileMergeResult,
} from './merger/index.js'

// ============================================================================
// Summaries
// ============================================================================
export {
  buildSummaryTree,
  summarizeFile,
  summarizeModel,
  coverageRate,
  classifyRate,
  formatRate,
  walkDirectories,
  walkFiles,
  type SummaryOptions,
} from './summary/index.js'

// ============================================================================
// HTML Report
// ============================================================================
export {
  HtmlReportGenerator,
  generateHtmlReport,
  type HtmlReportOptions,
  type HtmlReportResult,
} from './report/index.js'

// ============================================================================
// Rendering Workers
// ============================================================================
export { WorkerPool, getWorkerCount } from './worker/index.js'

// ============================================================================
// Pipeline
// ============================================================================
export {
  ReportProcessor,
  processTracefiles,
  type ProcessorOptions,
  type ProcessResult,
} from './core/index.js'

// ============================================================================
// Errors and Diagnostics
// ============================================================================
export { StructuralError, ConfigError } from './errors.js'
export { DiagnosticCollector, formatDiagnostic } from './utils/diagnostics.js'

// ============================================================================
// Common Types
// ============================================================================
export type {
  LineRecord,
  FunctionRecord,
  BranchRecord,
  SourceFileCoverage,
  TracefileModel,
  CoverageCounts,
  CoverageSummary,
  Classification,
  Thresholds,
  FileNode,
  DirectoryNode,
  SummaryTree,
  ReportConfig,
  Diagnostic,
  DiagnosticKind,
  DiagnosticSeverity,
} from './types.js'
