/**
 * HTML building blocks shared by the report pages
 */

import type { Classification, CoverageCounts, CoverageSummary, ReportConfig } from '@/types.js'
import { formatRate } from '@/summary/rate.js'
import { getThresholds } from '@/utils/config.js'
import { linkBetween, rootPrefix, stylesheetPath } from './layout.js'

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch)
}

const CLASS_SUFFIX: Record<Classification, string> = {
  high: 'Hi',
  medium: 'Med',
  low: 'Lo',
}

export function classSuffix(classification: Classification): string {
  return CLASS_SUFFIX[classification]
}

/**
 * Rate cell: colored by classification, neutral '-' for an empty metric
 */
export function rateCell(counts: CoverageCounts, classification: Classification): string {
  if (counts.total === 0) {
    return '<td class="coverNone">-</td>'
  }
  return `<td class="coverPer${classSuffix(classification)}">${formatRate(counts)}&nbsp;%</td>`
}

export function countCell(counts: CoverageCounts, classification: Classification): string {
  const cls = counts.total === 0 ? 'coverNone' : `coverNum${classSuffix(classification)}`
  return `<td class="${cls}">${counts.hit} / ${counts.total}</td>`
}

export function rateBar(counts: CoverageCounts, classification: Classification): string {
  const width = counts.total === 0 ? '0' : formatRate(counts, 0)
  return (
    '<td class="coverBar"><div class="bar">' +
    `<div class="barFill coverBar${classSuffix(classification)}" style="width: ${width}%"></div>` +
    '</div></td>'
  )
}

/** One link in the breadcrumb trail; the last crumb carries no page */
export interface Crumb {
  label: string
  page?: string
}

export function breadcrumb(fromPage: string, crumbs: Crumb[]): string {
  return crumbs
    .map(crumb =>
      crumb.page === undefined
        ? escapeHtml(crumb.label)
        : `<a href="${linkBetween(fromPage, crumb.page)}">${escapeHtml(crumb.label)}</a>`
    )
    .join(' - ')
}

/**
 * Hit/total/rate table shown at the top of every page
 */
export function summaryTable(
  summary: CoverageSummary,
  classification: Record<keyof CoverageSummary, Classification>,
  config: ReportConfig
): string {
  const rows: string[] = ['<table class="summary">', '<tr><th></th><th>Hit</th><th>Total</th><th>Coverage</th></tr>']
  const row = (label: string, kind: keyof CoverageSummary): string =>
    `<tr><td class="summaryLabel">${label}:</td>` +
    `<td>${summary[kind].hit}</td><td>${summary[kind].total}</td>` +
    `${rateCell(summary[kind], classification[kind])}</tr>`

  rows.push(row('Lines', 'lines'))
  if (config.showFunctions) rows.push(row('Functions', 'functions'))
  if (config.showBranches) rows.push(row('Branches', 'branches'))
  rows.push('</table>')
  return rows.join('\n')
}

/**
 * Color key of the rate classes, shown on directory pages
 */
export function rateLegend(config: ReportConfig): string {
  const { high, medium } = getThresholds(config)
  return (
    '<div class="legend">Rating: ' +
    `<span class="coverLegendCovLo" title="Coverage rates below ${medium} % are classified as low">low: &lt; ${medium} %</span> ` +
    `<span class="coverLegendCovMed" title="Coverage rates between ${medium} % and ${high} % are classified as medium">medium: &gt;= ${medium} %</span> ` +
    `<span class="coverLegendCovHi" title="Coverage rates of ${high} % and more are classified as high">high: &gt;= ${high} %</span>` +
    '</div>'
  )
}

/**
 * Color key of the line and branch markers, shown on source pages
 */
export function sourceLegend(config: ReportConfig): string {
  const parts = ['Lines: <span class="coverLegendCov">hit</span> <span class="coverLegendNoCov">not hit</span>']
  if (config.showBranches) {
    parts.push(
      'Branches: <span class="branchCov">+</span> taken <span class="branchNoCov">-</span> not taken ' +
        '<span class="branchNoExec">#</span> not executed'
    )
  }
  return `<div class="legend">${parts.join(' | ')}</div>`
}

export interface PageShellOptions {
  /** Report-relative path of the page being rendered */
  pagePath: string
  title: string
  /** Heading suffix, e.g. the directory or file shown */
  subtitle: string
  crumbs: Crumb[]
  header: string
  body: string
  generatedAt: string
}

export function pageShell(options: PageShellOptions): string {
  const { pagePath, title, subtitle, crumbs, header, body, generatedAt } = options
  const heading = subtitle === '' ? escapeHtml(title) : `${escapeHtml(title)} - ${escapeHtml(subtitle)}`
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${heading}</title>`,
    `<link rel="stylesheet" type="text/css" href="${rootPrefix(pagePath)}${stylesheetPath()}">`,
    '</head>',
    '<body>',
    `<h1 class="title">${heading}</h1>`,
    `<div class="location">${breadcrumb(pagePath, crumbs)}</div>`,
    header,
    body,
    `<div class="footer">Generated by tracecov at ${escapeHtml(generatedAt)}</div>`,
    '</body>',
    '</html>',
    '',
  ].join('\n')
}

/**
 * Crumbs from the project root down to a report path
 */
export function crumbsFor(
  reportPath: string,
  pageOf: (dirPath: string) => string
): Crumb[] {
  const crumbs: Crumb[] = [{ label: 'top level', page: pageOf('') }]
  if (reportPath === '') {
    crumbs[0] = { label: 'top level' }
    return crumbs
  }
  const segments = reportPath.split('/')
  segments.forEach((segment, i) => {
    const isLast = i === segments.length - 1
    const dirPath = segments.slice(0, i + 1).join('/')
    crumbs.push(isLast ? { label: segment } : { label: segment, page: pageOf(dirPath) })
  })
  return crumbs
}
