import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { executeSummary, parseSummaryArgs } from '../summary.js'

describe('summary command', () => {
  describe('parseSummaryArgs', () => {
    it('should collect inputs and thresholds', () => {
      expect(parseSummaryArgs(['a.info', 'b.info', '--high', '80', '--medium', '40'])).toEqual({
        options: { inputs: ['a.info', 'b.info'], highThreshold: 80, mediumThreshold: 40 },
      })
    })

    it('should show help', () => {
      expect(parseSummaryArgs(['--help'])).toEqual({ showHelp: true })
    })

    it('should reject a missing threshold value', () => {
      expect(parseSummaryArgs(['a.info', '--high'])).toEqual({ error: 'Missing value for --high' })
    })

    it('should reject unknown options', () => {
      expect(parseSummaryArgs(['a.info', '--verbose'])).toEqual({ error: 'Unknown option: --verbose', showHelp: true })
    })

    it('should require at least one tracefile', () => {
      expect(parseSummaryArgs([])).toEqual({ error: 'No tracefiles specified', showHelp: true })
    })
  })

  describe('executeSummary', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'tracecov-summary-'))
      vi.spyOn(console, 'log').mockImplementation(() => {})
      vi.spyOn(console, 'error').mockImplementation(() => {})
    })

    afterEach(() => {
      vi.restoreAllMocks()
      rmSync(dir, { recursive: true, force: true })
    })

    it('should print totals of the merged tracefiles', async () => {
      writeFileSync(join(dir, 'a.info'), 'SF:/p/x.c\nDA:1,1\nDA:2,0\nend_of_record\n')
      writeFileSync(join(dir, 'b.info'), 'SF:/p/x.c\nDA:2,0\nend_of_record\n')

      const result = await executeSummary({ inputs: ['a.info', 'b.info'] }, dir)

      expect(result.success).toBe(true)
      expect(result.summary?.lines).toEqual({ hit: 1, total: 2 })
      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('|   50.0% |          1/2 | ✗ low'))
    })

    it('should classify with the given thresholds', async () => {
      writeFileSync(join(dir, 'a.info'), 'SF:/p/x.c\nDA:1,1\nDA:2,0\nend_of_record\n')

      await executeSummary({ inputs: ['a.info'], highThreshold: 60, mediumThreshold: 40 }, dir)

      expect(console.log).toHaveBeenCalledWith(expect.stringContaining('|   50.0% |          1/2 | ◐ medium'))
    })

    it('should fail on inverted thresholds', async () => {
      const result = await executeSummary({ inputs: ['a.info'], highThreshold: 40, mediumThreshold: 60 }, dir)

      expect(result).toEqual({ success: false, error: 'mediumThreshold (60) must not exceed highThreshold (40)' })
    })

    it('should fail when an input matches nothing', async () => {
      const result = await executeSummary({ inputs: ['missing.info'] }, dir)

      expect(result).toEqual({ success: false, error: "no tracefile found for 'missing.info'" })
    })
  })
})
