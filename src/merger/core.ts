/**
 * Merge Engine
 *
 * Combines tracefile models by summing line, function and branch counts per
 * key. Inputs are never aliased: every file in a result is a fresh copy.
 */

import type { Diagnostic, SourceFileCoverage, TracefileModel } from '@/types.js'
import {
  addBranch,
  addFunction,
  addLine,
  cloneFileCoverage,
  compareStrings,
  createTracefile,
} from '@/tracefile/model.js'
import { log } from '@/utils/logger.js'

export interface MergeOptions {
  /**
   * Leave a file out of the result when both sides carry different checksums
   * for one of its lines. When false, counts are summed and the disputed
   * checksum is dropped.
   */
  strictChecksum?: boolean
  /** Where the right-hand side came from, used in diagnostics */
  location?: string
}

export interface FileMergeResult {
  /** Merged coverage, or null when the merge failed for this file */
  file: SourceFileCoverage | null
  diagnostics: Diagnostic[]
}

export interface MergeResult {
  model: TracefileModel
  diagnostics: Diagnostic[]
  /** Paths left out of the result because of a checksum mismatch */
  failedFiles: string[]
}

export interface MergerConfig {
  strictChecksum: boolean
}

export const DEFAULT_MERGER_CONFIG: MergerConfig = {
  strictChecksum: true,
}

/**
 * Lines whose checksums are present on both sides and differ.
 * An absent checksum makes no claim about the line.
 */
export function findChecksumConflicts(a: SourceFileCoverage, b: SourceFileCoverage): number[] {
  const conflicts: number[] = []
  for (const [line, record] of b.lines) {
    const other = a.lines.get(line)
    if (
      other?.checksum !== undefined &&
      record.checksum !== undefined &&
      other.checksum !== record.checksum
    ) {
      conflicts.push(line)
    }
  }
  return conflicts.sort((x, y) => x - y)
}

function formatLineList(lines: number[]): string {
  return `${lines.length === 1 ? 'line' : 'lines'} ${lines.join(', ')}`
}

/**
 * Merge the coverage of one source file from two inputs
 */
export function mergeFileCoverage(
  a: SourceFileCoverage,
  b: SourceFileCoverage,
  options: MergeOptions = {}
): FileMergeResult {
  const strict = options.strictChecksum ?? DEFAULT_MERGER_CONFIG.strictChecksum
  const diagnostics: Diagnostic[] = []
  const conflicts = findChecksumConflicts(a, b)

  if (conflicts.length > 0 && strict) {
    diagnostics.push({
      kind: 'checksum-mismatch',
      severity: 'error',
      file: a.path,
      location: options.location,
      message: `inputs disagree on the source of ${formatLineList(conflicts)}; file left out of the merge`,
    })
    return { file: null, diagnostics }
  }

  const merged = cloneFileCoverage(a)

  for (const name of b.testNames) {
    merged.testNames.add(name)
  }

  for (const record of b.lines.values()) {
    addLine(merged, record)
  }
  for (const line of conflicts) {
    const record = merged.lines.get(line)
    if (record) {
      delete record.checksum
    }
  }
  if (conflicts.length > 0) {
    diagnostics.push({
      kind: 'checksum-mismatch',
      severity: 'warning',
      file: a.path,
      location: options.location,
      message: `inputs disagree on the source of ${formatLineList(conflicts)}; counts summed, checksums dropped`,
    })
  }

  for (const record of b.functions.values()) {
    const existing = merged.functions.get(record.name)
    if (existing && existing.line !== record.line) {
      diagnostics.push({
        kind: 'function-mismatch',
        severity: 'warning',
        file: a.path,
        location: options.location,
        message: `function ${record.name} starts on line ${existing.line} and line ${record.line}; keeping line ${Math.min(existing.line, record.line)}`,
      })
    }
    addFunction(merged, record)
  }

  for (const record of b.branches.values()) {
    addBranch(merged, record)
  }

  return { file: merged, diagnostics }
}

/**
 * Merge two tracefile models into a new one.
 * Files present on one side only are copied; files on both sides are merged
 * with mergeFileCoverage. A checksum mismatch fails that file only.
 */
export function mergeTracefiles(
  a: TracefileModel,
  b: TracefileModel,
  options: MergeOptions = {}
): MergeResult {
  const paths = [...new Set([...a.keys(), ...b.keys()])].sort(compareStrings)
  const result = createTracefile()
  const diagnostics: Diagnostic[] = []
  const failedFiles: string[] = []

  for (const path of paths) {
    const left = a.get(path)
    const right = b.get(path)

    if (left && right) {
      const merged = mergeFileCoverage(left, right, options)
      diagnostics.push(...merged.diagnostics)
      if (merged.file) {
        result.set(path, merged.file)
      } else {
        failedFiles.push(path)
      }
    } else if (left) {
      result.set(path, cloneFileCoverage(left))
    } else if (right) {
      result.set(path, cloneFileCoverage(right))
    }
  }

  return { model: result, diagnostics, failedFiles }
}

/**
 * Folds any number of tracefile models into one.
 * A file that failed to merge stays out of the result even if later inputs
 * cover it again.
 */
export class TracefileMerger {
  private config: MergerConfig

  constructor(config?: Partial<MergerConfig>) {
    this.config = {
      strictChecksum: config?.strictChecksum ?? DEFAULT_MERGER_CONFIG.strictChecksum,
    }
  }

  /**
   * Merge models in order; `locations` names each input for diagnostics.
   * Paths in `initiallyFailed` (files that already failed while one input was
   * read) are kept out of the result and reported with the fold's failures.
   */
  merge(
    models: TracefileModel[],
    locations: string[] = [],
    initiallyFailed: Iterable<string> = []
  ): MergeResult {
    let accumulated = createTracefile()
    const diagnostics: Diagnostic[] = []
    const failed = new Set<string>(initiallyFailed)

    models.forEach((model, index) => {
      const input = failed.size > 0 ? withoutPaths(model, failed) : model
      const step = mergeTracefiles(accumulated, input, {
        strictChecksum: this.config.strictChecksum,
        location: locations[index],
      })
      accumulated = step.model
      diagnostics.push(...step.diagnostics)
      for (const path of step.failedFiles) {
        failed.add(path)
      }
    })

    log(`Merged ${models.length} tracefile(s) into ${accumulated.size} source file(s)`)
    return { model: accumulated, diagnostics, failedFiles: [...failed].sort(compareStrings) }
  }
}

function withoutPaths(model: TracefileModel, paths: Set<string>): TracefileModel {
  return createTracefile([...model.values()].filter(file => !paths.has(file.path)))
}

/**
 * Factory function to create a merger
 */
export function createMerger(config?: Partial<MergerConfig>): TracefileMerger {
  return new TracefileMerger(config)
}

/**
 * Convenience function to merge any number of models
 */
export function mergeAll(models: TracefileModel[], options: MergeOptions = {}): MergeResult {
  return createMerger({ strictChecksum: options.strictChecksum }).merge(models)
}
