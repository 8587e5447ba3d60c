/**
 * Summary Module
 *
 * Coverage rates, classification and the hierarchical summary tree
 */

export {
  coverageRate,
  classifyRate,
  classifySummary,
  formatRate,
  addSummaries,
  emptySummary,
} from './rate.js'

export {
  buildSummaryTree,
  summarizeFile,
  summarizeModel,
  findCommonDirectory,
  nodeCoverage,
  toReportPath,
  walkDirectories,
  walkFiles,
  EXTERNAL_DIR,
  type SummaryOptions,
} from './summarizer.js'
