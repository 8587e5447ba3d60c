/**
 * Coverage Summarizer
 *
 * Builds the project -> directory -> file summary tree. File summaries are
 * computed from the records; every directory summary is the sum of its
 * children, computed once in a post-order pass.
 */

import { dirname, isAbsolute, relative, resolve, sep } from 'node:path'
import type {
  CoverageSummary,
  Diagnostic,
  DirectoryNode,
  FileNode,
  ReportConfig,
  SourceFileCoverage,
  SummaryTree,
  TracefileModel,
} from '@/types.js'
import { mergeFileCoverage } from '@/merger/core.js'
import { compareStrings, countFileCoverage } from '@/tracefile/model.js'
import { getThresholds, normalizePath } from '@/utils/config.js'
import { addSummaries, classifySummary } from './rate.js'

/** Top-level report directory for files outside the source root */
export const EXTERNAL_DIR = '_external'

export interface SummaryOptions {
  /**
   * Directory report paths are relative to (default: common directory of all
   * files). Relative tracefile paths are resolved against it.
   */
  sourceRoot?: string
  /** Relative tracefile paths are resolved against this without a source root (default: process.cwd()) */
  cwd?: string
  config: ReportConfig
}

/**
 * Hit/total counts of one file: a record counts as hit when its count is above 0
 */
export function summarizeFile(file: SourceFileCoverage): CoverageSummary {
  return countFileCoverage(file)
}

/**
 * Project totals without building a tree
 */
export function summarizeModel(model: TracefileModel): CoverageSummary {
  return addSummaries(...[...model.values()].map(summarizeFile))
}

/**
 * Longest directory shared by all paths (resolved against the working directory)
 */
export function findCommonDirectory(paths: string[]): string {
  if (paths.length === 0) return process.cwd()

  const split = paths.map(p => dirname(resolve(p)).split(sep))
  const common: string[] = [...split[0]]
  for (const segments of split.slice(1)) {
    let i = 0
    while (i < common.length && i < segments.length && common[i] === segments[i]) i++
    common.length = i
  }
  // Only the filesystem root is shared
  if (common.length <= 1) return resolve(sep)
  return common.join(sep)
}

/**
 * Report-relative POSIX path of a source file; a relative path is taken
 * relative to the source root
 */
export function toReportPath(sourcePath: string, sourceRoot: string): string {
  const absolute = resolve(sourceRoot, sourcePath)
  const rel = relative(sourceRoot, absolute)
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    const stripped = normalizePath(absolute).replace(/^[A-Za-z]:/, '').replace(/^\/+/, '')
    return `${EXTERNAL_DIR}/${stripped}`
  }
  return normalizePath(rel)
}

interface DirectoryBuilder {
  name: string
  path: string
  directories: Map<string, DirectoryBuilder>
  files: Array<Omit<FileNode, 'classification'>>
}

function createBuilder(name: string, path: string): DirectoryBuilder {
  return { name, path, directories: new Map(), files: [] }
}

/**
 * Coverage of a file node: the model entry, with any aliases summed in
 */
export function nodeCoverage(model: TracefileModel, node: FileNode): SourceFileCoverage | undefined {
  return combineCoverage(model, [node.sourcePath, ...node.aliases]).file
}

function combineCoverage(
  model: TracefileModel,
  keys: string[]
): { file: SourceFileCoverage | undefined; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = []
  let combined: SourceFileCoverage | undefined
  for (const key of keys) {
    const file = model.get(key)
    if (!file) return { file: undefined, diagnostics }
    if (!combined) {
      combined = file
      continue
    }
    const merged = mergeFileCoverage(combined, file, { strictChecksum: false, location: key })
    diagnostics.push(...merged.diagnostics)
    combined = merged.file ?? combined
  }
  return { file: combined, diagnostics }
}

interface ReportFile {
  filePath: string
  keys: string[]
}

/**
 * Build the summary tree for a model
 */
export function buildSummaryTree(model: TracefileModel, options: SummaryOptions): SummaryTree {
  const base = resolve(options.cwd ?? process.cwd(), options.sourceRoot ?? '')
  const filePaths = new Map([...model.keys()].map(key => [key, resolve(base, key)]))
  const sourceRoot =
    options.sourceRoot !== undefined || filePaths.size === 0 ? base : findCommonDirectory([...filePaths.values()])
  const thresholds = getThresholds(options.config)
  const diagnostics: Diagnostic[] = []

  // Keys like `src/x.c` and `/abs/src/x.c` can name the same report file
  const reportFiles = new Map<string, ReportFile>()
  for (const [key, filePath] of [...filePaths].sort((a, b) => compareStrings(a[0], b[0]))) {
    const path = toReportPath(filePath, sourceRoot)
    const existing = reportFiles.get(path)
    if (existing) {
      existing.keys.push(key)
      diagnostics.push({
        kind: 'duplicate-source',
        severity: 'warning',
        file: key,
        message: `names the same file as ${existing.keys[0]}; counts summed`,
      })
    } else {
      reportFiles.set(path, { filePath, keys: [key] })
    }
  }

  const root = createBuilder('', '')

  // File summaries first; directory aggregation waits for all of them
  for (const [path, { filePath, keys }] of reportFiles) {
    const combined = combineCoverage(model, keys)
    diagnostics.push(...combined.diagnostics)
    if (!combined.file) continue
    const [sourcePath, ...aliases] = keys

    const segments = path.split('/')
    const name = segments.pop() ?? path

    let dir = root
    for (const segment of segments) {
      let child = dir.directories.get(segment)
      if (!child) {
        child = createBuilder(segment, dir.path === '' ? segment : `${dir.path}/${segment}`)
        dir.directories.set(segment, child)
      }
      dir = child
    }
    dir.files.push({
      kind: 'file',
      name,
      path,
      sourcePath,
      aliases,
      filePath,
      summary: summarizeFile(combined.file),
    })
  }

  const finish = (builder: DirectoryBuilder): DirectoryNode => {
    const directories = [...builder.directories.values()]
      .sort((a, b) => compareStrings(a.name, b.name))
      .map(finish)
    const files: FileNode[] = builder.files
      .sort((a, b) => compareStrings(a.name, b.name))
      .map(file => ({ ...file, classification: classifySummary(file.summary, thresholds) }))
    const summary = addSummaries(
      ...directories.map(d => d.summary),
      ...files.map(f => f.summary)
    )
    return {
      kind: 'directory',
      name: builder.name,
      path: builder.path,
      directories,
      files,
      summary,
      classification: classifySummary(summary, thresholds),
    }
  }

  return { sourceRoot, root: finish(root), diagnostics }
}

/**
 * All directories of a tree, parents before children
 */
export function* walkDirectories(directory: DirectoryNode): Generator<DirectoryNode> {
  yield directory
  for (const child of directory.directories) {
    yield* walkDirectories(child)
  }
}

/**
 * All files of a tree, in directory order
 */
export function* walkFiles(directory: DirectoryNode): Generator<FileNode> {
  for (const dir of walkDirectories(directory)) {
    yield* dir.files
  }
}
