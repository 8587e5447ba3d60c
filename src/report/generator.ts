/**
 * HTML Report Generator
 *
 * Writes the whole report for a summary tree: the stylesheet, one index page
 * per directory, and an annotated source page (plus a function page) per
 * file. Source pages are rendered through the worker pool.
 */

import { dirname, join, resolve } from 'node:path'
import type { Diagnostic, FileNode, ReportConfig, SummaryTree, TracefileModel } from '@/types.js'
import { StructuralError } from '@/errors.js'
import { nodeCoverage, walkDirectories, walkFiles } from '@/summary/summarizer.js'
import { DEFAULT_TITLE } from '@/utils/config.js'
import { ensureDir, writeFileAtomic } from '@/utils/fs.js'
import { createTimer, log } from '@/utils/logger.js'
import { WorkerPool } from '@/worker/pool.js'
import { renderFunctionPage } from './function-page.js'
import { renderIndexPage } from './index-page.js'
import { directoryPagePath, functionPagePath, indexViews, sourcePagePath, stylesheetPath } from './layout.js'
import type { SourcePageInput } from './source-page.js'
import { REPORT_CSS } from './styles.js'

export interface HtmlReportOptions {
  outputDir: string
  config: ReportConfig
  /** Report title (default: 'Coverage report') */
  title?: string
  /** Footer timestamp; fix it to make the output reproducible */
  generatedAt?: string
  /** Pool for source page rendering; a private pool is created when omitted */
  pool?: WorkerPool
}

export interface HtmlReportResult {
  /** Report-relative paths of the files written, sorted */
  pages: string[]
  diagnostics: Diagnostic[]
}

/**
 * Timestamp shown in page footers, e.g. `2024-05-01 12:30:00`
 */
export function formatTimestamp(date: Date = new Date()): string {
  return date.toISOString().replace('T', ' ').slice(0, 19)
}

export class HtmlReportGenerator {
  private outputDir: string
  private config: ReportConfig
  private title: string
  private generatedAt: string
  private pool: WorkerPool | undefined

  constructor(options: HtmlReportOptions) {
    this.outputDir = resolve(options.outputDir)
    this.config = options.config
    this.title = options.title ?? DEFAULT_TITLE
    this.generatedAt = options.generatedAt ?? formatTimestamp()
    this.pool = options.pool
  }

  private async writePage(pagePath: string, html: string): Promise<void> {
    const target = join(this.outputDir, ...pagePath.split('/'))
    await ensureDir(dirname(target))
    await writeFileAtomic(target, html)
  }

  async generate(tree: SummaryTree, model: TracefileModel): Promise<HtmlReportResult> {
    const endTimer = createTimer('HTML report')
    const pages: string[] = []
    const diagnostics: Diagnostic[] = []
    const ownsPool = this.pool === undefined
    const pool = this.pool ?? new WorkerPool()

    try {
      await ensureDir(this.outputDir)
      await this.writePage(stylesheetPath(), REPORT_CSS)
      pages.push(stylesheetPath())

      const pageOptions = { title: this.title, generatedAt: this.generatedAt, config: this.config }

      const views = indexViews(this.config)
      for (const directory of walkDirectories(tree.root)) {
        for (const view of views) {
          const pagePath = directoryPagePath(directory.path, view)
          await this.writePage(pagePath, renderIndexPage(directory, { ...pageOptions, view }))
          pages.push(pagePath)
        }
      }

      const files = [...walkFiles(tree.root)]
      const written = await Promise.all(files.map(node => this.writeFilePages(node, model, pool)))
      for (const result of written) {
        pages.push(...result.pages)
        diagnostics.push(...result.diagnostics)
      }
    } finally {
      if (ownsPool) {
        await pool.terminate()
      }
    }

    pages.sort()
    log(`  Wrote ${pages.length} report files to ${this.outputDir}`)
    endTimer()
    return { pages, diagnostics }
  }

  private async writeFilePages(node: FileNode, model: TracefileModel, pool: WorkerPool): Promise<HtmlReportResult> {
    const file = nodeCoverage(model, node)
    if (!file) {
      throw new StructuralError(`summary tree refers to ${node.sourcePath}, which is not in the coverage data`)
    }

    const input: SourcePageInput = {
      file,
      node,
      sourcePath: node.filePath,
      title: this.title,
      generatedAt: this.generatedAt,
      config: this.config,
    }
    const output = await pool.runTask(input)
    if (!output.success || !output.page) {
      throw new StructuralError(`cannot render ${node.path}: ${output.error ?? 'unknown error'}`, node.sourcePath)
    }

    const pages: string[] = []
    const diagnostics: Diagnostic[] = []

    const sourcePage = sourcePagePath(node.path)
    await this.writePage(sourcePage, output.page.html)
    pages.push(sourcePage)
    if (output.page.missingSource) {
      diagnostics.push({
        kind: 'missing-source',
        severity: 'warning',
        file: node.sourcePath,
        message: 'source file not found; page shows coverage data only',
      })
    }

    if (this.config.showFunctions) {
      const functionPage = functionPagePath(node.path)
      const options = { title: this.title, generatedAt: this.generatedAt, config: this.config }
      await this.writePage(functionPage, renderFunctionPage(file, node, options))
      pages.push(functionPage)
    }

    return { pages, diagnostics }
  }
}

/**
 * Generate a report with a one-off generator
 */
export async function generateHtmlReport(
  tree: SummaryTree,
  model: TracefileModel,
  options: HtmlReportOptions
): Promise<HtmlReportResult> {
  return new HtmlReportGenerator(options).generate(tree, model)
}
