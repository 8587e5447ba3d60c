/**
 * Coverage Printer Functions
 *
 * Console output formatting for coverage summaries
 */

import type { CoverageCounts, CoverageSummary, Thresholds } from '@/types.js'
import { classifyRate, coverageRate, formatRate } from '@/summary/rate.js'
import { DEFAULT_THRESHOLDS } from '@/utils/config.js'
import { log } from '@/utils/logger.js'

const STATUS_LABELS = {
  high: '✓ high',
  medium: '◐ medium',
  low: '✗ low',
} as const

/**
 * Format one summary row: label, rate, hit/total and status
 */
export function formatSummaryLine(label: string, counts: CoverageCounts, thresholds: Thresholds): string {
  const rate = formatRate(counts)
  const covered = `${counts.hit}/${counts.total}`
  const status = counts.total === 0 ? '' : STATUS_LABELS[classifyRate(coverageRate(counts), thresholds)]
  const pct = rate === '-' ? rate : `${rate}%`
  return `${label.padEnd(15)} | ${pct.padStart(7)} | ${covered.padStart(12)} | ${status}`.trimEnd()
}

/**
 * Format a coverage summary table
 */
export function formatSummaryTable(
  summary: CoverageSummary,
  thresholds: Thresholds = DEFAULT_THRESHOLDS,
  title: string = 'Coverage Summary'
): string[] {
  return [
    '='.repeat(60),
    title,
    '='.repeat(60),
    formatSummaryLine('Lines', summary.lines, thresholds),
    formatSummaryLine('Functions', summary.functions, thresholds),
    formatSummaryLine('Branches', summary.branches, thresholds),
    '='.repeat(60),
  ]
}

/**
 * Print coverage summary table to the log
 */
export function printCoverageSummary(
  summary: CoverageSummary,
  thresholds: Thresholds = DEFAULT_THRESHOLDS,
  title?: string
): void {
  for (const line of formatSummaryTable(summary, thresholds, title)) {
    log(line)
  }
}
