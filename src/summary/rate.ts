/**
 * Coverage rate arithmetic and classification
 */

import type { Classification, ClassificationSet, CoverageCounts, CoverageSummary, Thresholds } from '@/types.js'
import { RATE_PRECISION } from '@/utils/constants.js'

/**
 * Coverage rate in percent. An empty metric (total 0) has rate 0.
 */
export function coverageRate(counts: CoverageCounts): number {
  if (counts.total === 0) return 0
  return (counts.hit * 100) / counts.total
}

/**
 * Bucket a rate using the configured cut points
 */
export function classifyRate(rate: number, thresholds: Thresholds): Classification {
  if (rate >= thresholds.high) return 'high'
  if (rate >= thresholds.medium) return 'medium'
  return 'low'
}

export function classifySummary(summary: CoverageSummary, thresholds: Thresholds): ClassificationSet {
  return {
    lines: classifyRate(coverageRate(summary.lines), thresholds),
    functions: classifyRate(coverageRate(summary.functions), thresholds),
    branches: classifyRate(coverageRate(summary.branches), thresholds),
  }
}

/**
 * Format a rate with fixed precision for display.
 *
 * The text never reads 0 when something was hit, nor 100 when something was
 * missed: those cases show the nearest value one unit of precision away.
 * An empty metric is shown as '-'.
 */
export function formatRate(counts: CoverageCounts, precision: number = RATE_PRECISION): string {
  if (counts.total === 0) return '-'

  const unit = 1 / 10 ** precision
  const rounded = Number(coverageRate(counts).toFixed(precision))
  if (rounded === 0 && counts.hit > 0) {
    return unit.toFixed(precision)
  }
  if (rounded === 100 && counts.hit !== counts.total) {
    return (100 - unit).toFixed(precision)
  }
  return rounded.toFixed(precision)
}

export function emptySummary(): CoverageSummary {
  return {
    lines: { hit: 0, total: 0 },
    functions: { hit: 0, total: 0 },
    branches: { hit: 0, total: 0 },
  }
}

/**
 * Element-wise sum of summaries
 */
export function addSummaries(...summaries: CoverageSummary[]): CoverageSummary {
  const result = emptySummary()
  for (const summary of summaries) {
    result.lines.hit += summary.lines.hit
    result.lines.total += summary.lines.total
    result.functions.hit += summary.functions.hit
    result.functions.total += summary.functions.total
    result.branches.hit += summary.branches.hit
    result.branches.total += summary.branches.total
  }
  return result
}
