/**
 * File output helpers
 */

import { promises as fs } from 'node:fs'
import { basename, dirname, join } from 'node:path'
import { StructuralError } from '../errors.js'
import { formatError } from './logger.js'

let tempCounter = 0

/**
 * Create a directory (and its parents).
 * Failure is fatal for the run.
 */
export async function ensureDir(dir: string): Promise<void> {
  try {
    await fs.mkdir(dir, { recursive: true })
  } catch (error) {
    throw new StructuralError(`cannot create directory ${dir}: ${formatError(error)}`, dir, { cause: error })
  }
}

/**
 * Write a file so that readers never observe partial content:
 * the data goes to a temporary file in the same directory, which is then
 * renamed over the target.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const dir = dirname(path)
  await ensureDir(dir)

  tempCounter += 1
  const tempPath = join(dir, `.${basename(path)}.${process.pid}.${tempCounter}.tmp`)
  try {
    await fs.writeFile(tempPath, content, 'utf-8')
    await fs.rename(tempPath, path)
  } catch (error) {
    await fs.rm(tempPath, { force: true })
    throw new StructuralError(`cannot write ${path}: ${formatError(error)}`, path, { cause: error })
  }
}
