/**
 * tracecov CLI
 *
 * Commands:
 *   genhtml - Merge tracefiles and write an HTML report
 *   merge   - Merge tracefiles into one tracefile
 *   summary - Print coverage totals
 */

import { fileURLToPath } from 'node:url'

const HELP = `
tracecov - Tracefile merging and HTML coverage reports

Usage:
  tracecov <command> [options]

Commands:
  genhtml     Merge tracefiles and generate an HTML report
  merge       Merge tracefiles into a single tracefile
  summary     Print line, function and branch coverage

Options:
  --help      Show this help message

Examples:
  tracecov genhtml coverage/run1.info coverage/run2.info -o coverage/html
  tracecov merge coverage/run1.info coverage/run2.info -o coverage/all.info
  tracecov summary coverage/all.info
`

export async function main(): Promise<number> {
  const args = process.argv.slice(2)

  if (args.length === 0 || (args[0] === '--help' || args[0] === '-h')) {
    console.log(HELP)
    return 0
  }

  const command = args[0]

  if (command === 'genhtml') {
    return await runGenhtml(args.slice(1))
  } else if (command === 'merge') {
    return await runMerge(args.slice(1))
  } else if (command === 'summary') {
    return await runSummary(args.slice(1))
  } else {
    console.error(`Unknown command: ${command}`)
    console.log(HELP)
    return 1
  }
}

async function runGenhtml(args: string[]): Promise<number> {
  // Dynamic import to avoid loading report dependencies until needed
  const { runGenhtml: executeRunGenhtml } = await import('./commands/genhtml.js')
  return await executeRunGenhtml(args)
}

async function runMerge(args: string[]): Promise<number> {
  const { runMerge: executeRunMerge } = await import('./commands/merge.js')
  return await executeRunMerge(args)
}

async function runSummary(args: string[]): Promise<number> {
  const { runSummary: executeRunSummary } = await import('./commands/summary.js')
  return await executeRunSummary(args)
}

// Only run main() when executed directly, not when imported for testing
const currentFile = fileURLToPath(import.meta.url)
const executedFile = process.argv[1]

// Normalize paths for comparison (handles Windows backslashes)
const normalizedCurrent = currentFile.replace(/\\/g, '/')
const normalizedExecuted = executedFile?.replace(/\\/g, '/')

const isMainModule = normalizedCurrent === normalizedExecuted
  || normalizedExecuted?.endsWith('/cli.js')
  || normalizedExecuted?.endsWith('/tracecov')  // npm bin symlink name
  || normalizedExecuted?.endsWith('/cli/index.js')
  || normalizedExecuted?.endsWith('/cli/index.ts')

// Use process.exitCode instead of process.exit() so pending output is flushed
if (isMainModule) {
  main()
    .then((code) => {
      process.exitCode = code
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error)
      process.exitCode = 1
    })
}
