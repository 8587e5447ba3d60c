import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { parseTracefile } from '@/tracefile/parser.js'
import { buildSummaryTree } from '@/summary/summarizer.js'
import { resolveTracecovConfig, toReportConfig } from '@/utils/config.js'
import { WorkerPool } from '@/worker/pool.js'
import { HtmlReportGenerator, formatTimestamp } from '../generator.js'
import { REPORT_CSS } from '../styles.js'

const GENERATED_AT = '2024-01-02 03:04:05'

describe('HtmlReportGenerator', () => {
  let dir: string
  let pool: WorkerPool

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tracecov-report-'))
    mkdirSync(join(dir, 'src'))
    writeFileSync(join(dir, 'src', 'main.c'), 'int main() {\n  return 0;\n}\n')
    pool = new WorkerPool(0)
  })

  afterEach(async () => {
    await pool.terminate()
    rmSync(dir, { recursive: true, force: true })
  })

  function fixture() {
    const content = [
      `SF:${join(dir, 'src', 'main.c')}`, 'FN:1,main', 'FNDA:1,main', 'DA:1,1', 'DA:2,1', 'end_of_record',
      `SF:${join(dir, 'src', 'lib', 'x.c')}`, 'DA:1,1', 'DA:2,0', 'end_of_record',
    ].join('\n')
    const model = parseTracefile(content).model
    const config = toReportConfig(resolveTracecovConfig())
    const tree = buildSummaryTree(model, { config })
    return { model, config, tree }
  }

  it('should write every page of the layout', async () => {
    const { model, config, tree } = fixture()
    const outputDir = join(dir, 'html')

    const generator = new HtmlReportGenerator({ outputDir, config, generatedAt: GENERATED_AT, pool })
    const { pages } = await generator.generate(tree, model)

    expect(pages).toEqual([
      'index-sort-b.html',
      'index-sort-f.html',
      'index-sort-l.html',
      'index.html',
      'lib/index-sort-b.html',
      'lib/index-sort-f.html',
      'lib/index-sort-l.html',
      'lib/index.html',
      'lib/x.c.func.html',
      'lib/x.c.gcov.html',
      'main.c.func.html',
      'main.c.gcov.html',
      'report.css',
    ])
    expect(readFileSync(join(outputDir, 'report.css'), 'utf-8')).toBe(REPORT_CSS)

    const index = readFileSync(join(outputDir, 'index.html'), 'utf-8')
    expect(index).toContain('<td class="coverDirectory"><a href="lib/index.html">lib/</a></td>')
    expect(index).toContain('<td class="coverFile"><a href="main.c.gcov.html">main.c</a></td>')

    const source = readFileSync(join(outputDir, 'main.c.gcov.html'), 'utf-8')
    expect(source).toContain('<span class="lineCov">         1 :   return 0;</span>')
  })

  it('should render a placeholder and warn when a source file is missing', async () => {
    const { model, config, tree } = fixture()
    const outputDir = join(dir, 'html')

    const { diagnostics } = await new HtmlReportGenerator({ outputDir, config, generatedAt: GENERATED_AT, pool })
      .generate(tree, model)

    expect(diagnostics).toEqual([
      {
        kind: 'missing-source',
        severity: 'warning',
        file: join(dir, 'src', 'lib', 'x.c'),
        message: 'source file not found; page shows coverage data only',
      },
    ])
    const page = readFileSync(join(outputDir, 'lib', 'x.c.gcov.html'), 'utf-8')
    expect(page).toContain('class="missingSource"')
    expect(page).toContain('<span class="lineNoCov">         0 : </span>')

    const libIndex = readFileSync(join(outputDir, 'lib', 'index.html'), 'utf-8')
    expect(libIndex).toContain('<td class="coverNumLo">1 / 2</td>')
  })

  it('should skip function pages when functions are hidden', async () => {
    const { model, tree } = fixture()
    const config = toReportConfig(resolveTracecovConfig({ showFunctions: false }))

    const { pages } = await new HtmlReportGenerator({ outputDir: join(dir, 'html'), config, pool })
      .generate(tree, model)

    expect(pages.filter(page => page.endsWith('.func.html'))).toEqual([])
  })

  it('should write only the listings by name when sorting is off', async () => {
    const { model, tree } = fixture()
    const config = toReportConfig(resolveTracecovConfig({ sort: false }))

    const { pages } = await new HtmlReportGenerator({ outputDir: join(dir, 'html'), config, pool })
      .generate(tree, model)

    expect(pages.filter(page => page.includes('index'))).toEqual(['index.html', 'lib/index.html'])
  })

  it('should link sorted listings to each other', async () => {
    const { model, config, tree } = fixture()
    const outputDir = join(dir, 'html')

    await new HtmlReportGenerator({ outputDir, config, generatedAt: GENERATED_AT, pool }).generate(tree, model)

    const sorted = readFileSync(join(outputDir, 'lib', 'index-sort-l.html'), 'utf-8')
    expect(sorted).toContain('<th><a href="index.html" title="Sort by name">Name</a></th>')
    expect(sorted).toContain('<td class="coverFile"><a href="x.c.gcov.html">x.c</a></td>')
  })

  it('should produce byte-identical output for identical input', async () => {
    const { model, config, tree } = fixture()
    const first = join(dir, 'first')
    const second = join(dir, 'second')

    const { pages } = await new HtmlReportGenerator({ outputDir: first, config, generatedAt: GENERATED_AT, pool })
      .generate(tree, model)
    await new HtmlReportGenerator({ outputDir: second, config, generatedAt: GENERATED_AT, pool })
      .generate(tree, model)

    for (const page of pages) {
      expect(readFileSync(join(second, page), 'utf-8')).toBe(readFileSync(join(first, page), 'utf-8'))
    }
  })

  it('should use the title in every page', async () => {
    const { model, config, tree } = fixture()
    const outputDir = join(dir, 'html')

    await new HtmlReportGenerator({ outputDir, config, title: 'Nightly', generatedAt: GENERATED_AT, pool })
      .generate(tree, model)

    expect(readFileSync(join(outputDir, 'index.html'), 'utf-8')).toContain('<title>Nightly</title>')
    expect(readFileSync(join(outputDir, 'lib', 'index.html'), 'utf-8')).toContain('<title>Nightly - lib</title>')
  })
})

describe('formatTimestamp', () => {
  it('should format as UTC date and time', () => {
    expect(formatTimestamp(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe('2024-01-02 03:04:05')
  })
})
