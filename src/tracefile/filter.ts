/**
 * Tracefile path filters
 *
 * Keep or drop source files by glob pattern, matched against the path as it
 * appears in the tracefile.
 */

import { minimatch } from 'minimatch'
import type { TracefileModel } from '@/types.js'
import { log } from '@/utils/logger.js'
import { cloneFileCoverage, createTracefile } from './model.js'

export interface FilterOptions {
  /** Keep only files matching at least one pattern (all files when empty) */
  extract?: readonly string[]
  /** Then drop files matching any pattern */
  remove?: readonly string[]
}

export interface FilterResult {
  model: TracefileModel
  /** Paths that were dropped, in model order */
  removed: string[]
}

function matchesAny(path: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => minimatch(path, pattern, { dot: true }))
}

export function filterTracefile(model: TracefileModel, options: FilterOptions): FilterResult {
  const extract = options.extract ?? []
  const remove = options.remove ?? []
  const result = createTracefile()
  const removed: string[] = []

  for (const [path, file] of model) {
    const keep = (extract.length === 0 || matchesAny(path, extract)) && !matchesAny(path, remove)
    if (keep) {
      result.set(path, cloneFileCoverage(file))
    } else {
      removed.push(path)
    }
  }

  if (removed.length > 0) {
    log(`Filtered out ${removed.length} source file(s)`)
  }
  return { model: result, removed }
}
