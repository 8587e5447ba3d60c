/**
 * Console output for CLI commands
 */

import chalk from 'chalk'
import type { CoverageSummary, Diagnostic, Thresholds } from '@/types.js'
import { formatSummaryLine } from '@/merger/printer.js'
import { classifyRate, coverageRate } from '@/summary/rate.js'
import { formatDiagnostic, summarizeCounts } from '@/utils/diagnostics.js'

/**
 * Print diagnostics (errors red, warnings yellow) and the end-of-run count
 */
export function printDiagnostics(diagnostics: readonly Diagnostic[]): void {
  for (const diagnostic of diagnostics) {
    const line = formatDiagnostic(diagnostic)
    console.error(diagnostic.severity === 'error' ? chalk.red(line) : chalk.yellow(line))
  }
  const warnings = diagnostics.filter(d => d.severity === 'warning').length
  const errors = diagnostics.length - warnings
  console.error(chalk.dim(summarizeCounts(warnings, errors)))
}

const COLORS = {
  high: chalk.green,
  medium: chalk.yellow,
  low: chalk.red,
} as const

/**
 * Print the Lines/Functions/Branches table, each row colored by classification
 */
export function printSummary(
  summary: CoverageSummary,
  thresholds: Thresholds,
  title: string = 'Coverage Summary'
): void {
  console.log(chalk.bold(title))
  console.log(chalk.gray('═'.repeat(60)))
  const rows = [
    ['Lines', summary.lines],
    ['Functions', summary.functions],
    ['Branches', summary.branches],
  ] as const
  for (const [label, counts] of rows) {
    const line = formatSummaryLine(label, counts, thresholds)
    if (counts.total === 0) {
      console.log(chalk.dim(line))
    } else {
      console.log(COLORS[classifyRate(coverageRate(counts), thresholds)](line))
    }
  }
  console.log(chalk.gray('═'.repeat(60)))
}
