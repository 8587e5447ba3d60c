/**
 * Project and directory index pages
 *
 * Every directory gets a listing by name and, unless sorting is off, one
 * listing per shown metric ordered by ascending rate.
 */

import type { ClassificationSet, CoverageSummary, DirectoryNode, ReportConfig } from '@/types.js'
import { coverageRate } from '@/summary/rate.js'
import { compareStrings } from '@/tracefile/model.js'
import { countCell, crumbsFor, escapeHtml, pageShell, rateBar, rateCell, rateLegend, summaryTable } from './html.js'
import { directoryPagePath, indexViews, linkBetween, sourcePagePath, type IndexView } from './layout.js'

export interface IndexPageOptions {
  title: string
  generatedAt: string
  config: ReportConfig
  /** Listing order (default: by name) */
  view?: IndexView
}

interface ListingEntry {
  label: string
  href: string
  cellClass: 'coverDirectory' | 'coverFile'
  summary: CoverageSummary
  classification: ClassificationSet
}

const SORT_TITLES: Record<IndexView, string> = {
  name: 'Sort by name',
  lines: 'Sort by line coverage',
  functions: 'Sort by function coverage',
  branches: 'Sort by branch coverage',
}

function listingRow(entry: ListingEntry, config: ReportConfig): string {
  const { summary, classification } = entry
  const cells = [
    `<td class="${entry.cellClass}"><a href="${entry.href}">${escapeHtml(entry.label)}</a></td>`,
    rateBar(summary.lines, classification.lines),
    rateCell(summary.lines, classification.lines),
    countCell(summary.lines, classification.lines),
  ]
  if (config.showFunctions) {
    cells.push(rateCell(summary.functions, classification.functions))
    cells.push(countCell(summary.functions, classification.functions))
  }
  if (config.showBranches) {
    cells.push(rateCell(summary.branches, classification.branches))
    cells.push(countCell(summary.branches, classification.branches))
  }
  return `<tr>${cells.join('')}</tr>`
}

/**
 * Rate views list the least covered entries first; empty metrics rank as 0 %
 */
function orderEntries(entries: ListingEntry[], view: IndexView): ListingEntry[] {
  if (view === 'name') return entries
  return [...entries].sort(
    (a, b) =>
      coverageRate(a.summary[view]) - coverageRate(b.summary[view]) || compareStrings(a.label, b.label)
  )
}

/**
 * Render the index page of a directory (the project root when its path is '')
 */
export function renderIndexPage(directory: DirectoryNode, options: IndexPageOptions): string {
  const { config } = options
  const view = options.view ?? 'name'
  const views = indexViews(config)
  const pagePath = directoryPagePath(directory.path, view)

  const entries: ListingEntry[] = [
    ...directory.directories.map(dir => ({
      label: `${dir.name}/`,
      href: linkBetween(pagePath, directoryPagePath(dir.path, view)),
      cellClass: 'coverDirectory' as const,
      summary: dir.summary,
      classification: dir.classification,
    })),
    ...directory.files.map(file => ({
      label: file.name,
      href: linkBetween(pagePath, sourcePagePath(file.path)),
      cellClass: 'coverFile' as const,
      summary: file.summary,
      classification: file.classification,
    })),
  ]

  const head = (label: string, colspan: number, target: IndexView): string => {
    const span = colspan > 1 ? ` colspan="${colspan}"` : ''
    if (target === view || !views.includes(target)) {
      return `<th${span}>${label}</th>`
    }
    const href = linkBetween(pagePath, directoryPagePath(directory.path, target))
    return `<th${span}><a href="${href}" title="${SORT_TITLES[target]}">${label}</a></th>`
  }

  const heads = [head('Name', 1, 'name'), head('Line Coverage', 3, 'lines')]
  if (config.showFunctions) heads.push(head('Functions', 2, 'functions'))
  if (config.showBranches) heads.push(head('Branches', 2, 'branches'))

  const body = [
    '<table class="fileList">',
    `<tr>${heads.join('')}</tr>`,
    ...orderEntries(entries, view).map(entry => listingRow(entry, config)),
    '</table>',
  ].join('\n')

  const header = summaryTable(directory.summary, directory.classification, config)

  return pageShell({
    pagePath,
    title: options.title,
    subtitle: directory.path,
    crumbs: crumbsFor(directory.path, directoryPagePath),
    header: config.legend ? `${header}\n${rateLegend(config)}` : header,
    body,
    generatedAt: options.generatedAt,
  })
}
