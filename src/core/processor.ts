/**
 * Report Processor
 *
 * The end-to-end pipeline: read tracefiles, merge them, filter, optionally
 * write the merged tracefile, summarize, and render the HTML report.
 * Per-file problems are collected as diagnostics; structural problems stop
 * the run with exit status 1.
 */

import { relative, resolve } from 'node:path'
import type { CoverageSummary, Diagnostic, SummaryTree, TracefileModel } from '@/types.js'
import { ConfigError, StructuralError } from '@/errors.js'
import { TracefileMerger } from '@/merger/core.js'
import { HtmlReportGenerator } from '@/report/generator.js'
import { buildSummaryTree } from '@/summary/summarizer.js'
import { filterTracefile } from '@/tracefile/filter.js'
import { readTracefile, resolveTracefileInputs } from '@/tracefile/reader.js'
import { writeTracefile } from '@/tracefile/serializer.js'
import { toReportConfig, type ResolvedTracecovConfig } from '@/utils/config.js'
import { DiagnosticCollector } from '@/utils/diagnostics.js'
import { createTimer, formatError, log } from '@/utils/logger.js'
import { WorkerPool } from '@/worker/pool.js'

export interface LoadResult {
  model: TracefileModel
  /** Tracefiles that were read, absolute */
  tracefiles: string[]
  /** Source files left out because their inputs disagreed */
  failedFiles: string[]
}

export interface ProcessorOptions {
  /** Base for relative inputs and output paths (default: process.cwd()) */
  cwd?: string
  /** Footer timestamp for the HTML pages */
  generatedAt?: string
  /** Skip HTML rendering (merge and summary commands) */
  html?: boolean
}

export interface ProcessResult {
  /** 0 on success, 1 when the run was aborted */
  exitCode: number
  diagnostics: readonly Diagnostic[]
  failedFiles: string[]
  model?: TracefileModel
  tree?: SummaryTree
  summary?: CoverageSummary
  /** Report-relative paths of the HTML files written */
  pages?: string[]
  /** Set when the run was aborted */
  error?: string
}

export class ReportProcessor {
  private config: ResolvedTracecovConfig
  private cwd: string
  private diagnostics = new DiagnosticCollector()

  constructor(config: ResolvedTracecovConfig, private options: ProcessorOptions = {}) {
    this.config = config
    this.cwd = options.cwd ?? process.cwd()
  }

  get collected(): DiagnosticCollector {
    return this.diagnostics
  }

  /**
   * Read every tracefile named by the inputs and fold them into one model
   */
  async load(inputs: string[]): Promise<LoadResult> {
    const endTimer = createTimer('Read and merge tracefiles')
    if (inputs.length === 0) {
      throw new StructuralError('no tracefiles given')
    }

    const { files, unmatched } = await resolveTracefileInputs(inputs, this.cwd)
    if (unmatched.length > 0) {
      throw new StructuralError(`no tracefile found for ${unmatched.map(u => `'${u}'`).join(', ')}`)
    }

    const names = files.map(file => relative(this.cwd, file) || file)
    const parsed = await Promise.all(
      files.map((file, i) => readTracefile(file, { source: names[i], strictChecksum: this.config.strictChecksum }))
    )
    for (const result of parsed) {
      this.diagnostics.add(...result.diagnostics)
    }

    const merger = new TracefileMerger({ strictChecksum: this.config.strictChecksum })
    const merged = merger.merge(
      parsed.map(result => result.model),
      names,
      parsed.flatMap(result => result.failedFiles)
    )
    this.diagnostics.add(...merged.diagnostics)

    const filtered = filterTracefile(merged.model, { extract: this.config.extract, remove: this.config.remove })
    endTimer()
    return { model: filtered.model, tracefiles: files, failedFiles: merged.failedFiles }
  }

  /**
   * Write the merged model as a tracefile
   */
  async writeMerged(model: TracefileModel, output: string): Promise<string> {
    const target = resolve(this.cwd, output)
    await writeTracefile(target, model)
    return target
  }

  summarize(model: TracefileModel): SummaryTree {
    const sourceRoot = this.config.sourceRoot === undefined ? undefined : resolve(this.cwd, this.config.sourceRoot)
    const tree = buildSummaryTree(model, { sourceRoot, cwd: this.cwd, config: toReportConfig(this.config) })
    this.diagnostics.add(...tree.diagnostics)
    return tree
  }

  async render(tree: SummaryTree, model: TracefileModel): Promise<string[]> {
    const pool = new WorkerPool(this.config.workers)
    try {
      const generator = new HtmlReportGenerator({
        outputDir: resolve(this.cwd, this.config.outputDir),
        config: toReportConfig(this.config),
        title: this.config.title,
        generatedAt: this.options.generatedAt,
        pool,
      })
      const result = await generator.generate(tree, model)
      this.diagnostics.add(...result.diagnostics)
      return result.pages
    } finally {
      await pool.terminate()
    }
  }

  /**
   * Run the whole pipeline. Never throws for structural or configuration
   * problems; they come back as exit status 1 with `error` set.
   */
  async process(inputs: string[]): Promise<ProcessResult> {
    const endTimer = createTimer('Total')
    let failedFiles: string[] = []

    try {
      const loaded = await this.load(inputs)
      failedFiles = loaded.failedFiles
      const { model } = loaded

      if (this.config.outputTracefile !== undefined) {
        await this.writeMerged(model, this.config.outputTracefile)
      }

      const tree = this.summarize(model)
      let pages: string[] | undefined
      if (this.options.html !== false) {
        pages = await this.render(tree, model)
      }

      log(`Processed ${loaded.tracefiles.length} tracefile(s), ${model.size} source file(s)`)
      endTimer()
      return {
        exitCode: 0,
        diagnostics: this.diagnostics.all,
        failedFiles,
        model,
        tree,
        summary: tree.root.summary,
        pages,
      }
    } catch (err) {
      if (err instanceof StructuralError || err instanceof ConfigError) {
        return {
          exitCode: 1,
          diagnostics: this.diagnostics.all,
          failedFiles,
          error: formatError(err),
        }
      }
      throw err
    }
  }
}

/**
 * Run the pipeline with a one-off processor
 */
export async function processTracefiles(
  inputs: string[],
  config: ResolvedTracecovConfig,
  options: ProcessorOptions = {}
): Promise<ProcessResult> {
  return new ReportProcessor(config, options).process(inputs)
}
