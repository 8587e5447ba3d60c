/**
 * Internal constants for tracecov.
 *
 * For user-configurable options, see config.ts.
 */

// =============================================================================
// Tracefile Format
// =============================================================================

/** Marker closing a tracefile section */
export const END_OF_RECORD = 'end_of_record'

/** Tracefile notation for a branch whose block was never reached */
export const BRANCH_NOT_REACHED = '-'

/** Extension of tracefiles picked up when an input is a directory */
export const TRACEFILE_EXTENSION = '.info'

/** Counts are summed up to this value and never wrap */
export const MAX_COUNT = Number.MAX_SAFE_INTEGER

// =============================================================================
// HTML Report Layout
// =============================================================================

/** Name of every directory index page */
export const INDEX_PAGE = 'index.html'

/** Directory index pages sorted by ascending coverage rate */
export const SORTED_INDEX_PAGES = {
  lines: 'index-sort-l.html',
  functions: 'index-sort-f.html',
  branches: 'index-sort-b.html',
} as const

/** Suffix of annotated source pages */
export const SOURCE_PAGE_SUFFIX = '.gcov.html'

/** Suffix of per-file function pages */
export const FUNCTION_PAGE_SUFFIX = '.func.html'

/** Shared stylesheet written at the report root */
export const STYLESHEET = 'report.css'

/** Width of the hit count column in the source view */
export const COUNT_FIELD_WIDTH = 10

/** Width of the line number column in the source view */
export const LINE_NUMBER_WIDTH = 8

/** Hit count column text for lines that carry no coverage data */
export const NOT_INSTRUMENTED_MARKER = '-'

/** Decimal places shown for coverage rates */
export const RATE_PRECISION = 1

// =============================================================================
// Worker Pool
// =============================================================================

/** Environment variable overriding the worker count (0 = main thread only) */
export const WORKERS_ENV = 'TRACECOV_WORKERS'

/** Upper bound on automatically sized worker pools */
export const MAX_AUTO_WORKERS = 8
