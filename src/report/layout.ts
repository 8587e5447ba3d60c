/**
 * Report page layout
 *
 * Output paths are a function of report-relative source paths only, so
 * concurrent page writers never target the same file.
 */

import type { CoverageKind, ReportConfig } from '@/types.js'
import {
  FUNCTION_PAGE_SUFFIX,
  INDEX_PAGE,
  SORTED_INDEX_PAGES,
  SOURCE_PAGE_SUFFIX,
  STYLESHEET,
} from '@/utils/constants.js'

/** Order of a directory listing: by name, or by ascending rate of one metric */
export type IndexView = 'name' | CoverageKind

export function directoryPagePath(dirPath: string, view: IndexView = 'name'): string {
  const page = view === 'name' ? INDEX_PAGE : SORTED_INDEX_PAGES[view]
  return dirPath === '' ? page : `${dirPath}/${page}`
}

/**
 * Listings written for every directory; rate views only for metrics on show
 */
export function indexViews(config: ReportConfig): IndexView[] {
  const views: IndexView[] = ['name']
  if (!config.sort) return views
  views.push('lines')
  if (config.showFunctions) views.push('functions')
  if (config.showBranches) views.push('branches')
  return views
}

export function sourcePagePath(filePath: string): string {
  return `${filePath}${SOURCE_PAGE_SUFFIX}`
}

export function functionPagePath(filePath: string): string {
  return `${filePath}${FUNCTION_PAGE_SUFFIX}`
}

export function stylesheetPath(): string {
  return STYLESHEET
}

function segmentsOf(pagePath: string): string[] {
  return pagePath.split('/')
}

/**
 * Prefix leading from a page back to the report root, e.g. '../../'
 */
export function rootPrefix(pagePath: string): string {
  return '../'.repeat(segmentsOf(pagePath).length - 1)
}

/**
 * Relative, URL-encoded link from one report page to another
 */
export function linkBetween(fromPage: string, toPage: string): string {
  const from = segmentsOf(fromPage).slice(0, -1)
  const to = segmentsOf(toPage)

  let common = 0
  while (common < from.length && common < to.length - 1 && from[common] === to[common]) {
    common++
  }

  const up = '../'.repeat(from.length - common)
  const down = to.slice(common).map(encodeURIComponent).join('/')
  return up + down
}
