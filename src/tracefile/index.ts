/**
 * Tracefile Module
 *
 * In-memory model of tracefile data, plus reading, writing and filtering
 */

export {
  createTracefile,
  createFileCoverage,
  cloneFileCoverage,
  cloneTracefile,
  branchKey,
  addLine,
  addFunction,
  addBranch,
  addCounts,
  addTaken,
  countFileCoverage,
} from './model.js'

export { parseTracefile, type ParseOptions, type ParseResult } from './parser.js'
export { serializeTracefile, serializeFileSection, writeTracefile } from './serializer.js'
export { readTracefile, resolveTracefileInputs, type ResolvedInputs } from './reader.js'
export { filterTracefile, type FilterOptions, type FilterResult } from './filter.js'
