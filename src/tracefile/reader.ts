/**
 * Tracefile Reader
 *
 * Locates tracefiles on disk and parses them.
 */

import { existsSync, promises as fs, statSync } from 'node:fs'
import { isAbsolute, relative, resolve } from 'node:path'
import { promisify } from 'node:util'
import { gunzip } from 'node:zlib'
import { glob } from 'glob'
import { StructuralError } from '@/errors.js'
import { TRACEFILE_EXTENSION } from '@/utils/constants.js'
import { normalizePath } from '@/utils/config.js'
import { formatError, log } from '@/utils/logger.js'
import { parseTracefile, type ParseOptions, type ParseResult } from './parser.js'

const gunzipAsync = promisify(gunzip)

/**
 * Read and parse a tracefile. `.gz` files are decompressed first.
 * An unreadable file is fatal.
 */
export async function readTracefile(path: string, options: ParseOptions = {}): Promise<ParseResult> {
  let content: string
  try {
    const data = await fs.readFile(path)
    content = path.endsWith('.gz')
      ? (await gunzipAsync(data)).toString('utf-8')
      : data.toString('utf-8')
  } catch (error) {
    throw new StructuralError(`cannot read tracefile ${path}: ${formatError(error)}`, path, { cause: error })
  }

  const result = parseTracefile(content, { source: path, ...options })
  log(`Read ${result.model.size} source file(s) from ${path}`)
  return result
}

export interface ResolvedInputs {
  /** Absolute tracefile paths, sorted and de-duplicated */
  files: string[]
  /** Inputs that matched nothing */
  unmatched: string[]
}

function isGlobPattern(input: string): boolean {
  return /[*?[\]{}]/.test(input)
}

/**
 * Expand tracefile inputs. Each input is a file, a directory (every
 * tracefile below it), or a glob pattern.
 */
export async function resolveTracefileInputs(inputs: string[], cwd: string = process.cwd()): Promise<ResolvedInputs> {
  const found = new Set<string>()
  const unmatched: string[] = []

  for (const input of inputs) {
    const absolute = resolve(cwd, input)
    let matches: string[]

    if (existsSync(absolute) && statSync(absolute).isDirectory()) {
      matches = await glob(`**/*${TRACEFILE_EXTENSION}`, { cwd: absolute, absolute: true, nodir: true })
    } else if (existsSync(absolute)) {
      matches = [absolute]
    } else if (isGlobPattern(input)) {
      const pattern = isAbsolute(input) ? normalizePath(relative(cwd, input)) : normalizePath(input)
      matches = await glob(pattern, { cwd, absolute: true, nodir: true })
    } else {
      matches = []
    }

    if (matches.length === 0) {
      unmatched.push(input)
    }
    for (const match of matches) {
      found.add(resolve(match))
    }
  }

  return { files: [...found].sort(), unmatched }
}
