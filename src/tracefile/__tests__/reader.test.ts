import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { gzipSync } from 'node:zlib'
import { readTracefile, resolveTracefileInputs } from '../reader.js'
import { filterTracefile } from '../filter.js'
import { parseTracefile } from '../parser.js'
import { StructuralError } from '@/errors.js'

const SECTION = 'SF:/src/a.c\nDA:1,1\nend_of_record\n'

describe('readTracefile', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tracecov-reader-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should parse a plain tracefile and name it in diagnostics', async () => {
    const path = join(dir, 'run.info')
    writeFileSync(path, `${SECTION}BAD\n`)

    const { model, diagnostics } = await readTracefile(path, { source: 'run.info' })

    expect(model.get('/src/a.c')?.lines.get(1)?.hits).toBe(1)
    expect(diagnostics.map(d => d.location)).toEqual(['run.info:4'])
  })

  it('should decompress gzipped tracefiles', async () => {
    const path = join(dir, 'run.info.gz')
    writeFileSync(path, gzipSync(SECTION))

    const { model } = await readTracefile(path)

    expect(model.get('/src/a.c')?.lines.get(1)?.hits).toBe(1)
  })

  it('should fail with a StructuralError when the file cannot be read', async () => {
    await expect(readTracefile(join(dir, 'missing.info'))).rejects.toBeInstanceOf(StructuralError)
  })
})

describe('resolveTracefileInputs', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tracecov-inputs-'))
    mkdirSync(join(dir, 'sub'))
    writeFileSync(join(dir, 'a.info'), SECTION)
    writeFileSync(join(dir, 'sub', 'b.info'), SECTION)
    writeFileSync(join(dir, 'notes.txt'), 'not a tracefile')
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should expand a directory to every tracefile below it', async () => {
    const { files, unmatched } = await resolveTracefileInputs(['.'], dir)
    expect(files).toEqual([join(dir, 'a.info'), join(dir, 'sub', 'b.info')])
    expect(unmatched).toEqual([])
  })

  it('should take existing files as they are', async () => {
    const { files } = await resolveTracefileInputs(['notes.txt'], dir)
    expect(files).toEqual([join(dir, 'notes.txt')])
  })

  it('should expand glob patterns', async () => {
    const { files } = await resolveTracefileInputs(['sub/*.info'], dir)
    expect(files).toEqual([join(dir, 'sub', 'b.info')])
  })

  it('should de-duplicate files named more than once', async () => {
    const { files } = await resolveTracefileInputs(['a.info', '*.info', '.'], dir)
    expect(files).toEqual([join(dir, 'a.info'), join(dir, 'sub', 'b.info')])
  })

  it('should report inputs that match nothing', async () => {
    const { files, unmatched } = await resolveTracefileInputs(['missing.info', 'none/*.info'], dir)
    expect(files).toEqual([])
    expect(unmatched).toEqual(['missing.info', 'none/*.info'])
  })
})

describe('filterTracefile', () => {
  const content = ['/src/a.c', '/src/lib/b.c', '/usr/include/stdio.h']
    .map(path => `SF:${path}\nDA:1,1\nend_of_record`)
    .join('\n')

  it('should keep only files matching an extract pattern', () => {
    const { model, removed } = filterTracefile(parseTracefile(content).model, { extract: ['/src/**'] })
    expect([...model.keys()]).toEqual(['/src/a.c', '/src/lib/b.c'])
    expect(removed).toEqual(['/usr/include/stdio.h'])
  })

  it('should drop files matching a remove pattern', () => {
    const { model } = filterTracefile(parseTracefile(content).model, { remove: ['/usr/**', '/src/lib/**'] })
    expect([...model.keys()]).toEqual(['/src/a.c'])
  })

  it('should apply remove after extract', () => {
    const { model } = filterTracefile(parseTracefile(content).model, {
      extract: ['/src/**'],
      remove: ['/src/lib/*.c'],
    })
    expect([...model.keys()]).toEqual(['/src/a.c'])
  })

  it('should keep everything without patterns and copy the files', () => {
    const source = parseTracefile(content).model
    const { model, removed } = filterTracefile(source, {})
    expect(model.size).toBe(3)
    expect(removed).toEqual([])
    expect(model.get('/src/a.c')).not.toBe(source.get('/src/a.c'))
    expect(model.get('/src/a.c')).toEqual(source.get('/src/a.c'))
  })
})
