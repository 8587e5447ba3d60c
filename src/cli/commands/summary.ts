/**
 * tracecov summary command
 *
 * Prints project-wide line, function and branch coverage.
 */

import chalk from 'chalk'
import { ReportProcessor } from '@/core/processor.js'
import { ConfigError, StructuralError } from '@/errors.js'
import type { CoverageSummary } from '@/types.js'
import { getThresholds, resolveTracecovConfig, type TracecovConfig } from '@/utils/config.js'
import { formatError } from '@/utils/logger.js'
import { flagValue, parsePercentage } from '../args.js'
import { printDiagnostics, printSummary } from '../reporter.js'

export const SUMMARY_HELP = `
Usage: tracecov summary <tracefiles...> [options]

Print line, function and branch coverage of the merged tracefiles.

Options:
  --high <n>      High coverage threshold in percent (default: 90)
  --medium <n>    Medium coverage threshold in percent (default: 75)
  --help          Show this help message

Examples:
  tracecov summary coverage/all.info
  tracecov summary coverage/ --high 80 --medium 50
`

export interface SummaryOptions {
  inputs: string[]
  highThreshold?: number
  mediumThreshold?: number
}

export interface ParseResult {
  options?: SummaryOptions
  error?: string
  showHelp?: boolean
}

export function parseSummaryArgs(args: string[]): ParseResult {
  if (args.includes('--help') || args.includes('-h')) {
    return { showHelp: true }
  }

  const options: SummaryOptions = { inputs: [] }

  let i = 0
  while (i < args.length) {
    const arg = args[i]

    if (arg === '--high' || arg === '--medium') {
      const value = flagValue(args, i)
      if (value === undefined) {
        return { error: `Missing value for ${arg}` }
      }
      const threshold = parsePercentage(arg, value)
      if (typeof threshold === 'string') return { error: threshold }
      if (arg === '--high') options.highThreshold = threshold
      else options.mediumThreshold = threshold
      i += 2
    } else if (!arg.startsWith('-')) {
      options.inputs.push(arg)
      i++
    } else {
      return { error: `Unknown option: ${arg}`, showHelp: true }
    }
  }

  if (options.inputs.length === 0) {
    return { error: 'No tracefiles specified', showHelp: true }
  }

  return { options }
}

export interface SummaryResult {
  success: boolean
  error?: string
  summary?: CoverageSummary
}

/**
 * Execute the summary command - exported for testing
 */
export async function executeSummary(options: SummaryOptions, cwd: string = process.cwd()): Promise<SummaryResult> {
  try {
    const overrides: TracecovConfig = {
      highThreshold: options.highThreshold,
      mediumThreshold: options.mediumThreshold,
    }
    const config = resolveTracecovConfig(overrides)
    const processor = new ReportProcessor(config, { cwd, html: false })
    const result = await processor.process(options.inputs)

    printDiagnostics(result.diagnostics)
    if (!result.summary) {
      return { success: false, error: result.error ?? 'no coverage data' }
    }
    printSummary(result.summary, getThresholds(config))
    return { success: true, summary: result.summary }
  } catch (err) {
    if (err instanceof ConfigError || err instanceof StructuralError) {
      return { success: false, error: formatError(err) }
    }
    throw err
  }
}

/**
 * Run the summary command
 */
export async function runSummary(args: string[]): Promise<number> {
  const result = parseSummaryArgs(args)

  if (result.showHelp) {
    console.log(SUMMARY_HELP)
    if (result.error) {
      console.error(result.error)
      return 1
    }
    return 0
  }

  if (!result.options) {
    console.error(result.error ?? 'Invalid arguments')
    return 1
  }

  const summaryResult = await executeSummary(result.options)
  if (!summaryResult.success) {
    console.error(chalk.red(`✗ ${summaryResult.error}`))
    return 1
  }
  return 0
}
