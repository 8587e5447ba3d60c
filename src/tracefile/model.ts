/**
 * Tracefile Model helpers
 *
 * Construction, copying and counting for SourceFileCoverage and TracefileModel.
 */

import type {
  BranchRecord,
  CoverageSummary,
  FunctionRecord,
  LineRecord,
  SourceFileCoverage,
  TracefileModel,
} from '../types.js'
import { MAX_COUNT } from '../utils/constants.js'

export function createTracefile(files: Iterable<SourceFileCoverage> = []): TracefileModel {
  const model: TracefileModel = new Map()
  for (const file of files) {
    model.set(file.path, file)
  }
  return model
}

export function createFileCoverage(path: string): SourceFileCoverage {
  return {
    path,
    testNames: new Set(),
    lines: new Map(),
    functions: new Map(),
    branches: new Map(),
  }
}

/**
 * Identity key of a branch within a file
 */
export function branchKey(line: number, block: number, branch: number): string {
  return `${line},${block},${branch}`
}

/**
 * Sum two counts, saturating instead of overflowing
 */
export function addCounts(a: number, b: number): number {
  return Math.min(a + b, MAX_COUNT)
}

/**
 * Sum two branch taken counts. A branch that was never reached on one side
 * takes the other side's value.
 */
export function addTaken(a: number | null, b: number | null): number | null {
  if (a === null) return b
  if (b === null) return a
  return addCounts(a, b)
}

/**
 * Deep copy of a file's coverage, so the copy can be owned by another model
 */
export function cloneFileCoverage(file: SourceFileCoverage): SourceFileCoverage {
  const copy = createFileCoverage(file.path)
  for (const name of file.testNames) {
    copy.testNames.add(name)
  }
  for (const [line, record] of file.lines) {
    copy.lines.set(line, { ...record })
  }
  for (const [name, record] of file.functions) {
    copy.functions.set(name, { ...record })
  }
  for (const [key, record] of file.branches) {
    copy.branches.set(key, { ...record })
  }
  return copy
}

export function cloneTracefile(model: TracefileModel): TracefileModel {
  return createTracefile([...model.values()].map(cloneFileCoverage))
}

/**
 * Add a line hit to a file, summing with an existing record for the same line.
 * The existing checksum wins; callers check for conflicts first.
 */
export function addLine(file: SourceFileCoverage, record: LineRecord): void {
  const existing = file.lines.get(record.line)
  if (!existing) {
    file.lines.set(record.line, { ...record })
    return
  }
  existing.hits = addCounts(existing.hits, record.hits)
  if (existing.checksum === undefined && record.checksum !== undefined) {
    existing.checksum = record.checksum
  }
}

/**
 * Add a function to a file, summing call counts by name.
 * When both sides name different start lines, the lower line is kept.
 */
export function addFunction(file: SourceFileCoverage, record: FunctionRecord): void {
  const existing = file.functions.get(record.name)
  if (!existing) {
    file.functions.set(record.name, { ...record })
    return
  }
  existing.hits = addCounts(existing.hits, record.hits)
  existing.line = Math.min(existing.line, record.line)
}

/**
 * Add a branch to a file, summing taken counts by (line, block, branch)
 */
export function addBranch(file: SourceFileCoverage, record: BranchRecord): void {
  const key = branchKey(record.line, record.block, record.branch)
  const existing = file.branches.get(key)
  if (!existing) {
    file.branches.set(key, { ...record })
    return
  }
  existing.taken = addTaken(existing.taken, record.taken)
}

export function sortedLines(file: SourceFileCoverage): LineRecord[] {
  return [...file.lines.values()].sort((a, b) => a.line - b.line)
}

export function sortedFunctions(file: SourceFileCoverage): FunctionRecord[] {
  return [...file.functions.values()].sort(
    (a, b) => a.line - b.line || compareStrings(a.name, b.name)
  )
}

export function sortedBranches(file: SourceFileCoverage): BranchRecord[] {
  return [...file.branches.values()].sort(
    (a, b) => a.line - b.line || a.block - b.block || a.branch - b.branch
  )
}

/**
 * Locale-independent string ordering, so output does not depend on the host
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

/**
 * Hit/total counts of a single file
 */
export function countFileCoverage(file: SourceFileCoverage): CoverageSummary {
  let linesHit = 0
  for (const record of file.lines.values()) {
    if (record.hits > 0) linesHit++
  }
  let functionsHit = 0
  for (const record of file.functions.values()) {
    if (record.hits > 0) functionsHit++
  }
  let branchesHit = 0
  for (const record of file.branches.values()) {
    if (record.taken !== null && record.taken > 0) branchesHit++
  }
  return {
    lines: { hit: linesHit, total: file.lines.size },
    functions: { hit: functionsHit, total: file.functions.size },
    branches: { hit: branchesHit, total: file.branches.size },
  }
}
