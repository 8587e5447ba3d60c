/**
 * tracecov genhtml command
 *
 * Merges tracefiles and writes the HTML report.
 */

import { resolve } from 'node:path'
import chalk from 'chalk'
import { ReportProcessor, type ProcessResult } from '@/core/processor.js'
import { ConfigError } from '@/errors.js'
import {
  getThresholds,
  loadTracecovConfig,
  resolveTracecovConfig,
  type ResolvedTracecovConfig,
  type TracecovConfig,
} from '@/utils/config.js'
import { configureLogging, formatError } from '@/utils/logger.js'
import { flagValue, parseCount, parsePercentage } from '../args.js'
import { printDiagnostics, printSummary } from '../reporter.js'

export const GENHTML_HELP = `
Usage: tracecov genhtml <tracefiles...> [options]

Merge tracefiles and generate an HTML coverage report.

Arguments:
  tracefiles               Tracefiles, directories (every *.info below) or glob patterns

Options:
  -o, --output <dir>       Output directory (default: coverage/html)
  --title <text>           Report title (default: "Coverage report")
  --source-root <dir>      Directory report paths are relative to (default: common directory)
  --high <n>               High coverage threshold in percent (default: 90)
  --medium <n>             Medium coverage threshold in percent (default: 75)
  --no-branches            Hide branch coverage
  --no-functions           Hide function coverage
  --no-strict              Merge files whose line checksums disagree
  --no-sort                Only list files by name (no pages sorted by coverage rate)
  --legend                 Explain the color coding on every page
  --output-tracefile <f>   Also write the merged tracefile
  --workers <n>            Rendering threads (0 = main thread only)
  --config <file>          Config file (default: tracecov.config.js in cwd)
  --log                    Verbose logging
  --timing                 Print timings
  --help                   Show this help message

Examples:
  tracecov genhtml coverage/run1.info coverage/run2.info
  tracecov genhtml coverage/ -o report --title "Nightly"
`

export interface GenhtmlOptions {
  inputs: string[]
  /** Values given on the command line; they override the config file */
  overrides: TracecovConfig
  configPath?: string
}

export interface ParseResult {
  options?: GenhtmlOptions
  error?: string
  showHelp?: boolean
}

export function parseGenhtmlArgs(args: string[]): ParseResult {
  if (args.includes('--help') || args.includes('-h')) {
    return { showHelp: true }
  }

  const inputs: string[] = []
  const overrides: TracecovConfig = {}
  let configPath: string | undefined

  let i = 0
  while (i < args.length) {
    const arg = args[i]

    if (arg === '-o' || arg === '--output' || arg === '--title' || arg === '--source-root' ||
        arg === '--output-tracefile' || arg === '--config' || arg === '--high' ||
        arg === '--medium' || arg === '--workers') {
      const value = flagValue(args, i)
      if (value === undefined) {
        return { error: `Missing value for ${arg}` }
      }
      if (arg === '-o' || arg === '--output') {
        overrides.outputDir = value
      } else if (arg === '--title') {
        overrides.title = value
      } else if (arg === '--source-root') {
        overrides.sourceRoot = value
      } else if (arg === '--output-tracefile') {
        overrides.outputTracefile = value
      } else if (arg === '--config') {
        configPath = value
      } else if (arg === '--workers') {
        const workers = parseCount(arg, value)
        if (typeof workers === 'string') return { error: workers }
        overrides.workers = workers
      } else {
        const threshold = parsePercentage(arg, value)
        if (typeof threshold === 'string') return { error: threshold }
        if (arg === '--high') overrides.highThreshold = threshold
        else overrides.mediumThreshold = threshold
      }
      i += 2
    } else if (arg === '--no-branches') {
      overrides.showBranches = false
      i++
    } else if (arg === '--no-functions') {
      overrides.showFunctions = false
      i++
    } else if (arg === '--no-strict') {
      overrides.strictChecksum = false
      i++
    } else if (arg === '--no-sort') {
      overrides.sort = false
      i++
    } else if (arg === '--legend') {
      overrides.legend = true
      i++
    } else if (arg === '--log') {
      overrides.log = true
      i++
    } else if (arg === '--timing') {
      overrides.timing = true
      i++
    } else if (!arg.startsWith('-')) {
      inputs.push(arg)
      i++
    } else {
      return { error: `Unknown option: ${arg}`, showHelp: true }
    }
  }

  if (inputs.length === 0) {
    return { error: 'No tracefiles specified', showHelp: true }
  }

  return { options: { inputs, overrides, configPath } }
}

/**
 * Execute the genhtml command - exported for testing
 */
export async function executeGenhtml(
  options: GenhtmlOptions,
  cwd: string = process.cwd(),
  generatedAt?: string
): Promise<ProcessResult> {
  let config: ResolvedTracecovConfig
  try {
    const fileConfig = await loadTracecovConfig(options.configPath && resolve(cwd, options.configPath))
    config = resolveTracecovConfig({ ...fileConfig, ...options.overrides })
  } catch (err) {
    if (err instanceof ConfigError) {
      return { exitCode: 1, diagnostics: [], failedFiles: [], error: formatError(err) }
    }
    throw err
  }

  configureLogging(config)

  console.log(chalk.bold('tracecov genhtml'))
  console.log(`   Inputs: ${options.inputs.join(', ')}`)
  console.log(`   Output: ${config.outputDir}`)

  const processor = new ReportProcessor(config, { cwd, generatedAt })
  const result = await processor.process(options.inputs)

  printDiagnostics(result.diagnostics)
  if (result.summary) {
    printSummary(result.summary, getThresholds(config))
  }
  if (result.exitCode === 0) {
    console.log(chalk.green(`\n✓ HTML report written to ${resolve(cwd, config.outputDir)}`))
  }
  return result
}

/**
 * Run the genhtml command
 */
export async function runGenhtml(args: string[]): Promise<number> {
  const result = parseGenhtmlArgs(args)

  if (result.showHelp) {
    console.log(GENHTML_HELP)
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

  const processResult = await executeGenhtml(result.options)
  if (processResult.error) {
    console.error(chalk.red(`✗ ${processResult.error}`))
  }
  return processResult.exitCode
}
