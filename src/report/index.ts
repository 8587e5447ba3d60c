/**
 * Report Module
 *
 * Static HTML coverage report
 */

export {
  HtmlReportGenerator,
  generateHtmlReport,
  formatTimestamp,
  type HtmlReportOptions,
  type HtmlReportResult,
} from './generator.js'

export {
  renderSourcePage,
  formatSourcePage,
  formatCount,
  splitSourceLines,
  type SourcePageInput,
  type RenderedPage,
} from './source-page.js'

export { renderIndexPage, type IndexPageOptions } from './index-page.js'
export { renderFunctionPage, type FunctionPageOptions } from './function-page.js'
export { escapeHtml } from './html.js'
export {
  directoryPagePath,
  sourcePagePath,
  functionPagePath,
  linkBetween,
  indexViews,
  type IndexView,
} from './layout.js'
export { REPORT_CSS } from './styles.js'
