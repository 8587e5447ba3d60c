/**
 * Per-file function pages: every function with its start line and call count
 */

import type { FileNode, ReportConfig, SourceFileCoverage } from '@/types.js'
import { compareStrings } from '@/tracefile/model.js'
import { escapeHtml, pageShell, summaryTable, crumbsFor } from './html.js'
import { directoryPagePath, functionPagePath, linkBetween, sourcePagePath } from './layout.js'

export interface FunctionPageOptions {
  title: string
  generatedAt: string
  config: ReportConfig
}

export function renderFunctionPage(
  file: SourceFileCoverage,
  node: FileNode,
  options: FunctionPageOptions
): string {
  const pagePath = functionPagePath(node.path)
  const sourceLink = linkBetween(pagePath, sourcePagePath(node.path))

  const functions = [...file.functions.values()].sort(
    (a, b) => compareStrings(a.name, b.name) || a.line - b.line
  )

  const rows = functions.map(fn => {
    const cls = fn.hits > 0 ? 'coverFnHi' : 'coverFnLo'
    return (
      `<tr><td class="coverFn"><a href="${sourceLink}#L${fn.line}">${escapeHtml(fn.name)}</a></td>` +
      `<td>${fn.line}</td><td class="${cls}">${fn.hits}</td></tr>`
    )
  })

  const body = [
    '<table class="functionList">',
    '<tr><th>Function</th><th>Line</th><th>Calls</th></tr>',
    ...rows,
    '</table>',
  ].join('\n')

  // The file crumb links back to the annotated source
  const crumbs = crumbsFor(node.path, directoryPagePath)
  crumbs[crumbs.length - 1] = { label: node.name, page: sourcePagePath(node.path) }
  crumbs.push({ label: 'functions' })

  return pageShell({
    pagePath,
    title: options.title,
    subtitle: node.path,
    crumbs,
    header: summaryTable(node.summary, node.classification, options.config),
    body,
    generatedAt: options.generatedAt,
  })
}
