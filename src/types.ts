/**
 * Shared types for tracecov
 */

// ============================================================================
// Tracefile Model
// ============================================================================

/**
 * Execution data for one instrumented source line
 */
export interface LineRecord {
  /** 1-based line number */
  line: number
  /** Number of times the line was executed */
  hits: number
  /** Opaque fingerprint of the line's source text */
  checksum?: string
}

/**
 * Execution data for one function
 */
export interface FunctionRecord {
  name: string
  /** Line the function starts on */
  line: number
  /** Number of times the function was called */
  hits: number
}

/**
 * Execution data for one branch direction.
 * `taken` is null when the enclosing block was never reached,
 * which is distinct from a reached branch that was taken 0 times.
 */
export interface BranchRecord {
  line: number
  block: number
  branch: number
  taken: number | null
}

/**
 * Coverage of a single source file.
 * Owned by exactly one TracefileModel.
 */
export interface SourceFileCoverage {
  path: string
  /** Names of the tests (TN records) that contributed to this file */
  testNames: Set<string>
  lines: Map<number, LineRecord>
  functions: Map<string, FunctionRecord>
  /** Keyed by `line,block,branch` (see branchKey) */
  branches: Map<string, BranchRecord>
}

/**
 * Coverage data for a set of source files, keyed by path
 */
export type TracefileModel = Map<string, SourceFileCoverage>

// ============================================================================
// Summaries
// ============================================================================

export interface CoverageCounts {
  hit: number
  total: number
}

export interface CoverageSummary {
  lines: CoverageCounts
  functions: CoverageCounts
  branches: CoverageCounts
}

export type CoverageKind = keyof CoverageSummary

export type Classification = 'high' | 'medium' | 'low'

export type ClassificationSet = Record<CoverageKind, Classification>

export interface Thresholds {
  /** Rates at or above this percentage are classified high */
  high: number
  /** Rates at or above this percentage (and below high) are classified medium */
  medium: number
}

export interface FileNode {
  kind: 'file'
  /** Base name of the file */
  name: string
  /** Report-relative POSIX path, e.g. `src/util/x.c` */
  path: string
  /** Key of the file in the TracefileModel */
  sourcePath: string
  /** Further model keys that name the same file; their counts are summed in */
  aliases: string[]
  /** Absolute location of the source file on disk */
  filePath: string
  summary: CoverageSummary
  classification: ClassificationSet
}

export interface DirectoryNode {
  kind: 'directory'
  /** Last path segment ('' for the project root) */
  name: string
  /** Report-relative POSIX path ('' for the project root) */
  path: string
  directories: DirectoryNode[]
  files: FileNode[]
  summary: CoverageSummary
  classification: ClassificationSet
}

export interface SummaryTree {
  /** Absolute source root that report paths are relative to */
  sourceRoot: string
  root: DirectoryNode
  /** Model keys that named the same report file */
  diagnostics: Diagnostic[]
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Configuration consumed by the summarizer and report generator.
 * Passed explicitly, never read from global state.
 */
export interface ReportConfig {
  readonly highThreshold: number
  readonly mediumThreshold: number
  readonly showBranches: boolean
  readonly showFunctions: boolean
  readonly strictChecksum: boolean
  /** Also write index pages sorted by coverage rate */
  readonly sort: boolean
  /** Explain the color coding at the top of every page */
  readonly legend: boolean
}

// ============================================================================
// Diagnostics
// ============================================================================

export type DiagnosticKind =
  | 'parse-warning'
  | 'checksum-mismatch'
  | 'function-mismatch'
  | 'missing-source'
  | 'duplicate-source'

export type DiagnosticSeverity = 'warning' | 'error'

/**
 * A recoverable problem tied to a single record or file
 */
export interface Diagnostic {
  kind: DiagnosticKind
  severity: DiagnosticSeverity
  message: string
  /** Source file the problem concerns */
  file?: string
  /** Where it was found, e.g. `run1.info:12` */
  location?: string
}
