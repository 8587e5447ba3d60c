/**
 * Annotated source pages
 *
 * Every line of the source file is shown with its line number, branch
 * markers and hit count. When the source cannot be read, a placeholder page
 * lists the instrumented lines instead.
 */

import { readFile } from 'node:fs/promises'
import type { BranchRecord, FileNode, ReportConfig, SourceFileCoverage } from '@/types.js'
import { sortedBranches } from '@/tracefile/model.js'
import { COUNT_FIELD_WIDTH, LINE_NUMBER_WIDTH, NOT_INSTRUMENTED_MARKER } from '@/utils/constants.js'
import { formatError, log } from '@/utils/logger.js'
import { crumbsFor, escapeHtml, pageShell, sourceLegend, summaryTable } from './html.js'
import { directoryPagePath, functionPagePath, linkBetween, sourcePagePath } from './layout.js'

/**
 * Everything needed to render one source page. Structured-cloneable so it
 * can be posted to a worker thread.
 */
export interface SourcePageInput {
  file: SourceFileCoverage
  node: FileNode
  /** Location of the source text on disk */
  sourcePath: string
  title: string
  generatedAt: string
  config: ReportConfig
}

export interface RenderedPage {
  html: string
  /** True when the source text could not be read */
  missingSource: boolean
}

/**
 * Right-align a count in a fixed-width field. Counts too wide for the field
 * are shown as a lower bound, e.g. `>1234*10^7`.
 */
export function formatCount(count: number, width: number = COUNT_FIELD_WIDTH): string {
  let text = String(count)
  let mantissa = count
  let exponent = 0
  while (text.length > width && mantissa >= 10) {
    mantissa = Math.floor(mantissa / 10)
    exponent++
    text = `>${mantissa}*10^${exponent}`
  }
  return text.padStart(width)
}

function branchMarker(branch: BranchRecord): string {
  if (branch.taken === null) {
    return `<span class="branchNoExec" title="Branch ${branch.branch} was not executed">#</span>`
  }
  if (branch.taken === 0) {
    return `<span class="branchNoCov" title="Branch ${branch.branch} was not taken">-</span>`
  }
  const times = branch.taken === 1 ? 'time' : 'times'
  return `<span class="branchCov" title="Branch ${branch.branch} was taken ${branch.taken} ${times}">+</span>`
}

/** Visible width of a `[ + - # ]` group */
function markerWidth(count: number): number {
  return count === 0 ? 0 : 2 * count + 3
}

function groupBranches(file: SourceFileCoverage): Map<number, BranchRecord[]> {
  const byLine = new Map<number, BranchRecord[]>()
  for (const branch of sortedBranches(file)) {
    const group = byLine.get(branch.line)
    if (group) group.push(branch)
    else byLine.set(branch.line, [branch])
  }
  return byLine
}

/**
 * Split source text into lines, without a phantom line after the final newline
 */
export function splitSourceLines(text: string): string[] {
  const lines = text.split(/\r?\n/)
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop()
  return lines
}

function renderSourceLines(file: SourceFileCoverage, sourceLines: string[], config: ReportConfig): string[] {
  const branches = config.showBranches ? groupBranches(file) : new Map<number, BranchRecord[]>()
  let branchColumn = 0
  for (const group of branches.values()) {
    branchColumn = Math.max(branchColumn, markerWidth(group.length))
  }

  let lastLine = sourceLines.length
  for (const line of file.lines.keys()) lastLine = Math.max(lastLine, line)
  for (const line of branches.keys()) lastLine = Math.max(lastLine, line)

  const out: string[] = []
  for (let n = 1; n <= lastLine; n++) {
    const text = escapeHtml(sourceLines[n - 1] ?? '')
    let row = `<span class="lineNum" id="L${n}">${String(n).padStart(LINE_NUMBER_WIDTH)} </span>`

    if (branchColumn > 0) {
      const group = branches.get(n) ?? []
      const markers = group.length === 0 ? '' : `[${group.map(b => ` ${branchMarker(b)}`).join('')} ]`
      row += markers + ' '.repeat(branchColumn - markerWidth(group.length)) + ' '
    }

    const record = file.lines.get(n)
    if (record === undefined) {
      row += `${NOT_INSTRUMENTED_MARKER.padStart(COUNT_FIELD_WIDTH)} : ${text}`
    } else {
      const cls = record.hits > 0 ? 'lineCov' : 'lineNoCov'
      row += `<span class="${cls}">${formatCount(record.hits)} : ${text}</span>`
    }
    out.push(row)
  }
  return out
}

/**
 * Build the page HTML. `sourceLines` is null when the source is unavailable.
 */
export function formatSourcePage(input: SourcePageInput, sourceLines: string[] | null): string {
  const { file, node, config } = input
  const pagePath = sourcePagePath(node.path)

  const parts: string[] = []
  if (config.showFunctions) {
    parts.push(`<p class="pageLinks"><a href="${linkBetween(pagePath, functionPagePath(node.path))}">functions</a></p>`)
  }
  if (sourceLines === null) {
    parts.push(
      `<p class="missingSource">Source file ${escapeHtml(file.path)} is not available; ` +
        'only the recorded coverage data is shown.</p>'
    )
  }
  parts.push('<pre class="source">')
  parts.push(...renderSourceLines(file, sourceLines ?? [], config))
  parts.push('</pre>')

  const header = summaryTable(node.summary, node.classification, config)

  return pageShell({
    pagePath,
    title: input.title,
    subtitle: node.path,
    crumbs: crumbsFor(node.path, directoryPagePath),
    header: config.legend ? `${header}\n${sourceLegend(config)}` : header,
    body: parts.join('\n'),
    generatedAt: input.generatedAt,
  })
}

/**
 * Read the source text and render the page
 */
export async function renderSourcePage(input: SourcePageInput): Promise<RenderedPage> {
  let sourceLines: string[] | null
  try {
    sourceLines = splitSourceLines(await readFile(input.sourcePath, 'utf-8'))
  } catch (err) {
    log(`  Source not readable: ${input.sourcePath}: ${formatError(err)}`)
    sourceLines = null
  }
  return {
    html: formatSourcePage(input, sourceLines),
    missingSource: sourceLines === null,
  }
}
