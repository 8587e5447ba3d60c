/**
 * Tracefile Serializer
 *
 * Writes a TracefileModel in the format read by parser.ts. Output is fully
 * determined by the model: files are ordered by path and records by line, so
 * parsing the output and serializing again reproduces it byte for byte.
 */

import type { SourceFileCoverage, TracefileModel } from '@/types.js'
import { BRANCH_NOT_REACHED, END_OF_RECORD } from '@/utils/constants.js'
import { writeFileAtomic } from '@/utils/fs.js'
import { log } from '@/utils/logger.js'
import {
  compareStrings,
  countFileCoverage,
  sortedBranches,
  sortedFunctions,
  sortedLines,
} from './model.js'

/**
 * Serialize one file section, including the trailing end_of_record
 */
export function serializeFileSection(file: SourceFileCoverage): string[] {
  const testNames = [...file.testNames].sort(compareStrings)
  const out: string[] = testNames.length > 0 ? testNames.map(name => `TN:${name}`) : ['TN:']
  out.push(`SF:${file.path}`)
  const counts = countFileCoverage(file)

  const functions = sortedFunctions(file)
  for (const fn of functions) {
    out.push(`FN:${fn.line},${fn.name}`)
  }
  for (const fn of functions) {
    out.push(`FNDA:${fn.hits},${fn.name}`)
  }
  out.push(`FNF:${counts.functions.total}`)
  out.push(`FNH:${counts.functions.hit}`)

  const branches = sortedBranches(file)
  for (const br of branches) {
    const taken = br.taken === null ? BRANCH_NOT_REACHED : String(br.taken)
    out.push(`BRDA:${br.line},${br.block},${br.branch},${taken}`)
  }
  if (branches.length > 0) {
    out.push(`BRF:${counts.branches.total}`)
    out.push(`BRH:${counts.branches.hit}`)
  }

  for (const record of sortedLines(file)) {
    out.push(
      record.checksum === undefined
        ? `DA:${record.line},${record.hits}`
        : `DA:${record.line},${record.hits},${record.checksum}`
    )
  }
  out.push(`LF:${counts.lines.total}`)
  out.push(`LH:${counts.lines.hit}`)
  out.push(END_OF_RECORD)

  return out
}

/**
 * Serialize a model to tracefile text
 */
export function serializeTracefile(model: TracefileModel): string {
  const paths = [...model.keys()].sort(compareStrings)
  const out: string[] = []
  for (const path of paths) {
    const file = model.get(path)
    if (file) {
      out.push(...serializeFileSection(file))
    }
  }
  return out.length > 0 ? out.join('\n') + '\n' : ''
}

/**
 * Write a model to disk atomically
 */
export async function writeTracefile(path: string, model: TracefileModel): Promise<void> {
  await writeFileAtomic(path, serializeTracefile(model))
  log(`Wrote ${model.size} source file(s) to ${path}`)
}
