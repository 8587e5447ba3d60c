import { describe, it, expect, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, readdirSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { parseTracefile } from '../parser.js'
import { serializeFileSection, serializeTracefile, writeTracefile } from '../serializer.js'
import { addLine, createFileCoverage, createTracefile } from '../model.js'

const CANONICAL = [
  'TN:',
  'SF:/project/src/a.c',
  'FN:3,main',
  'FN:9,helper',
  'FNDA:2,main',
  'FNDA:0,helper',
  'FNF:2',
  'FNH:1',
  'BRDA:4,0,0,1',
  'BRDA:4,0,1,-',
  'BRDA:4,1,0,0',
  'BRF:3',
  'BRH:1',
  'DA:3,2',
  'DA:4,2,abc123',
  'DA:5,0',
  'LF:3',
  'LH:2',
  'end_of_record',
  'TN:',
  'SF:/project/src/b.c',
  'FNF:0',
  'FNH:0',
  'DA:1,1',
  'LF:1',
  'LH:1',
  'end_of_record',
  '',
].join('\n')

describe('serializeTracefile', () => {
  it('should reproduce canonical text byte for byte', () => {
    const { model } = parseTracefile(CANONICAL)
    expect(serializeTracefile(model)).toBe(CANONICAL)
  })

  it('should be stable across repeated round trips', () => {
    const once = serializeTracefile(parseTracefile(CANONICAL).model)
    const twice = serializeTracefile(parseTracefile(once).model)
    expect(twice).toBe(once)
  })

  it('should order files by path and records by line', () => {
    const input = [
      'SF:/z.c', 'DA:9,1', 'DA:2,0', 'end_of_record',
      'SF:/a.c', 'DA:1,1', 'end_of_record',
    ].join('\n')

    expect(serializeTracefile(parseTracefile(input).model)).toBe(
      [
        'TN:', 'SF:/a.c', 'FNF:0', 'FNH:0', 'DA:1,1', 'LF:1', 'LH:1', 'end_of_record',
        'TN:', 'SF:/z.c', 'FNF:0', 'FNH:0', 'DA:2,0', 'DA:9,1', 'LF:2', 'LH:1', 'end_of_record',
        '',
      ].join('\n')
    )
  })

  it('should recompute summary records instead of copying them', () => {
    const input = 'SF:/a.c\nDA:1,0\nLF:10\nLH:10\nend_of_record\n'
    expect(serializeTracefile(parseTracefile(input).model)).toContain('LF:1\nLH:0\n')
  })

  it('should write saturated counts in a form it reads back', () => {
    const { model } = parseTracefile('SF:/a.c\nDA:1,1000000000000000000000\nend_of_record\n')
    const text = serializeTracefile(model)

    expect(text).toBe('TN:\nSF:/a.c\nFNF:0\nFNH:0\nDA:1,9007199254740991\nLF:1\nLH:1\nend_of_record\n')
    const reparsed = parseTracefile(text)
    expect(reparsed.diagnostics).toEqual([])
    expect(reparsed.model).toEqual(model)
  })

  it('should write one TN record per test name', () => {
    const input = 'TN:unit\nTN:e2e\nSF:/a.c\nDA:1,1\nend_of_record\nTN:\nSF:/b.c\nDA:1,0\nend_of_record\n'
    const text = serializeTracefile(parseTracefile(input).model)

    expect(text).toBe(
      [
        'TN:e2e', 'TN:unit', 'SF:/a.c', 'FNF:0', 'FNH:0', 'DA:1,1', 'LF:1', 'LH:1', 'end_of_record',
        'TN:', 'SF:/b.c', 'FNF:0', 'FNH:0', 'DA:1,0', 'LF:1', 'LH:0', 'end_of_record',
        '',
      ].join('\n')
    )
    expect(serializeTracefile(parseTracefile(text).model)).toBe(text)
  })

  it('should serialize an empty model as an empty string', () => {
    expect(serializeTracefile(createTracefile())).toBe('')
  })
})

describe('serializeFileSection', () => {
  it('should list function declarations before their call counts', () => {
    const file = parseTracefile('SF:/a.c\nFN:5,b\nFN:5,a\nFNDA:1,b\nend_of_record\n').model.get('/a.c')
    expect(file).toBeDefined()
    if (!file) return

    expect(serializeFileSection(file)).toEqual([
      'TN:',
      'SF:/a.c',
      'FN:5,a',
      'FN:5,b',
      'FNDA:0,a',
      'FNDA:1,b',
      'FNF:2',
      'FNH:1',
      'LF:0',
      'LH:0',
      'end_of_record',
    ])
  })
})

describe('writeTracefile', () => {
  let dir: string | undefined

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true })
    dir = undefined
  })

  it('should write the serialized model without leaving temp files', async () => {
    dir = mkdtempSync(join(tmpdir(), 'tracecov-serializer-'))
    const file = createFileCoverage('/src/a.c')
    addLine(file, { line: 1, hits: 3 })
    const target = join(dir, 'out', 'merged.info')

    await writeTracefile(target, createTracefile([file]))

    expect(readFileSync(target, 'utf-8')).toBe(
      'TN:\nSF:/src/a.c\nFNF:0\nFNH:0\nDA:1,3\nLF:1\nLH:1\nend_of_record\n'
    )
    expect(readdirSync(join(dir, 'out'))).toEqual(['merged.info'])
  })
})
