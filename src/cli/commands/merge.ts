/**
 * tracecov merge command
 *
 * Merges tracefiles into a single tracefile.
 */

import chalk from 'chalk'
import { ReportProcessor } from '@/core/processor.js'
import { StructuralError } from '@/errors.js'
import { summarizeModel } from '@/summary/summarizer.js'
import type { Diagnostic } from '@/types.js'
import { getThresholds, resolveTracecovConfig } from '@/utils/config.js'
import { formatError } from '@/utils/logger.js'
import { flagValue } from '../args.js'
import { printDiagnostics, printSummary } from '../reporter.js'

export const MERGE_HELP = `
Usage: tracecov merge <tracefiles...> -o <file> [options]

Merge tracefiles into a single tracefile.

Counts for the same line, function or branch are summed. A source file whose
line checksums disagree between inputs is left out unless --no-strict is given.

Arguments:
  tracefiles              Tracefiles, directories (every *.info below) or glob patterns

Options:
  -o, --output <file>     Merged tracefile to write (required)
  --extract <glob>        Keep only source files matching the pattern (repeatable)
  --remove <glob>         Drop source files matching the pattern (repeatable)
  --no-strict             Sum counts even when line checksums disagree
  --help                  Show this help message

Examples:
  tracecov merge unit.info e2e.info -o all.info
  tracecov merge 'coverage/**/*.info' -o all.info --remove '/usr/include/**'
`

export interface MergeOptions {
  inputs: string[]
  output: string
  extract: string[]
  remove: string[]
  strict: boolean
}

export interface ParseResult {
  options?: MergeOptions
  error?: string
  showHelp?: boolean
}

export function parseMergeArgs(args: string[]): ParseResult {
  if (args.includes('--help') || args.includes('-h')) {
    return { showHelp: true }
  }

  const inputs: string[] = []
  const extract: string[] = []
  const remove: string[] = []
  let output: string | undefined
  let strict = true

  let i = 0
  while (i < args.length) {
    const arg = args[i]

    if (arg === '-o' || arg === '--output' || arg === '--extract' || arg === '--remove') {
      const value = flagValue(args, i)
      if (value === undefined) {
        return { error: `Missing value for ${arg}` }
      }
      if (arg === '--extract') extract.push(value)
      else if (arg === '--remove') remove.push(value)
      else output = value
      i += 2
    } else if (arg === '--no-strict') {
      strict = false
      i++
    } else if (!arg.startsWith('-')) {
      // Positional argument - treat as input tracefile
      inputs.push(arg)
      i++
    } else {
      return { error: `Unknown option: ${arg}`, showHelp: true }
    }
  }

  if (inputs.length === 0) {
    return { error: 'No tracefiles specified', showHelp: true }
  }
  if (output === undefined) {
    return { error: 'Missing output file (-o <file>)', showHelp: true }
  }

  return { options: { inputs, output, extract, remove, strict } }
}

export interface MergeResult {
  success: boolean
  error?: string
  /** Absolute path of the merged tracefile */
  outputFile?: string
  diagnostics: Diagnostic[]
  failedFiles: string[]
}

/**
 * Execute the merge command - exported for testing
 */
export async function executeMerge(options: MergeOptions, cwd: string = process.cwd()): Promise<MergeResult> {
  const config = resolveTracecovConfig({
    strictChecksum: options.strict,
    extract: options.extract,
    remove: options.remove,
  })
  const processor = new ReportProcessor(config, { cwd, html: false })

  console.log(chalk.bold('tracecov merge'))
  console.log(`   Inputs: ${options.inputs.join(', ')}`)
  console.log(`   Output: ${options.output}`)

  try {
    const loaded = await processor.load(options.inputs)
    const outputFile = await processor.writeMerged(loaded.model, options.output)
    const diagnostics = [...processor.collected.all]

    printDiagnostics(diagnostics)
    printSummary(summarizeModel(loaded.model), getThresholds(config))
    console.log(chalk.green(`\n✓ Merged ${loaded.tracefiles.length} tracefile(s) into ${outputFile}`))

    return { success: true, outputFile, diagnostics, failedFiles: loaded.failedFiles }
  } catch (err) {
    if (err instanceof StructuralError) {
      const diagnostics = [...processor.collected.all]
      printDiagnostics(diagnostics)
      return { success: false, error: formatError(err), diagnostics, failedFiles: [] }
    }
    throw err
  }
}

/**
 * Run the merge command
 */
export async function runMerge(args: string[]): Promise<number> {
  const result = parseMergeArgs(args)

  if (result.showHelp) {
    console.log(MERGE_HELP)
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

  const mergeResult = await executeMerge(result.options)

  if (!mergeResult.success) {
    console.error(chalk.red(`✗ ${mergeResult.error}`))
    return 1
  }

  return 0
}
