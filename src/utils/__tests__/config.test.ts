import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ConfigError } from '@/errors.js'
import {
  DEFAULT_OUTPUT_DIR,
  DEFAULT_THRESHOLDS,
  DEFAULT_TRACECOV_CONFIG,
  clearConfigCache,
  getThresholds,
  loadTracecovConfig,
  normalizePath,
  parseTracecovConfig,
  resolveTracecovConfig,
  toReportConfig,
  validateThresholds,
} from '../config.js'

describe('config', () => {
  describe('DEFAULT_THRESHOLDS', () => {
    it('should classify at 90 and 75 percent', () => {
      expect(DEFAULT_THRESHOLDS).toEqual({ high: 90, medium: 75 })
    })
  })

  describe('resolveTracecovConfig', () => {
    it('should return defaults when no config provided', () => {
      const config = resolveTracecovConfig()

      expect(config).toEqual(DEFAULT_TRACECOV_CONFIG)
      expect(config.outputDir).toBe(DEFAULT_OUTPUT_DIR)
      expect(config.strictChecksum).toBe(true)
      expect(config.showBranches).toBe(true)
      expect(config.showFunctions).toBe(true)
    })

    it('should keep provided values', () => {
      const config = resolveTracecovConfig({
        highThreshold: 80,
        mediumThreshold: 60,
        showBranches: false,
        extract: ['/src/**'],
        workers: 0,
      })

      expect(config.highThreshold).toBe(80)
      expect(config.mediumThreshold).toBe(60)
      expect(config.showBranches).toBe(false)
      expect(config.extract).toEqual(['/src/**'])
      expect(config.workers).toBe(0)
      expect(config.title).toBe('Coverage report')
    })

    it('should return a frozen config', () => {
      const config = resolveTracecovConfig({ remove: ['a'] })
      expect(Object.isFrozen(config)).toBe(true)
      expect(Object.isFrozen(config.remove)).toBe(true)
    })

    it('should not share pattern lists with the input', () => {
      const extract = ['a']
      const config = resolveTracecovConfig({ extract })
      extract.push('b')
      expect(config.extract).toEqual(['a'])
    })

    it('should reject a negative or fractional worker count', () => {
      expect(() => resolveTracecovConfig({ workers: -1 })).toThrow('workers must be a non-negative integer, got -1')
      expect(() => resolveTracecovConfig({ workers: 1.5 })).toThrow(ConfigError)
    })
  })

  describe('validateThresholds', () => {
    it('should accept equal thresholds and the bounds', () => {
      expect(() => validateThresholds(50, 50)).not.toThrow()
      expect(() => validateThresholds(100, 0)).not.toThrow()
    })

    it('should reject thresholds outside 0-100', () => {
      expect(() => validateThresholds(101, 50)).toThrow('highThreshold must be a percentage between 0 and 100, got 101')
      expect(() => validateThresholds(90, -1)).toThrow('mediumThreshold must be a percentage between 0 and 100, got -1')
      expect(() => validateThresholds(Number.NaN, 50)).toThrow(ConfigError)
    })

    it('should reject a medium threshold above the high one', () => {
      expect(() => validateThresholds(60, 70)).toThrow('mediumThreshold (70) must not exceed highThreshold (60)')
    })
  })

  describe('parseTracecovConfig', () => {
    it('should pass through valid values', () => {
      expect(parseTracecovConfig({ title: 'T', highThreshold: 95, remove: ['x'], log: true })).toMatchObject({
        title: 'T',
        highThreshold: 95,
        remove: ['x'],
        log: true,
      })
    })

    it.each([
      [{ highThreshold: '90' }, 'highThreshold must be a number'],
      [{ showBranches: 'no' }, 'showBranches must be a boolean'],
      [{ outputDir: 1 }, 'outputDir must be a string'],
      [{ extract: 'src/**' }, 'extract must be a list of strings'],
      [{ remove: ['a', 2] }, 'remove must be a list of strings'],
    ])('should reject %o', (source, message) => {
      expect(() => parseTracecovConfig(source)).toThrow(message)
    })
  })

  describe('toReportConfig', () => {
    it('should keep only the report settings', () => {
      const report = toReportConfig(resolveTracecovConfig({ title: 'ignored', mediumThreshold: 10 }))

      expect(report).toEqual({
        highThreshold: 90,
        mediumThreshold: 10,
        showBranches: true,
        showFunctions: true,
        strictChecksum: true,
        sort: true,
        legend: false,
      })
      expect(getThresholds(report)).toEqual({ high: 90, medium: 10 })
    })
  })

  describe('loadTracecovConfig', () => {
    let dir: string

    beforeEach(() => {
      clearConfigCache()
      dir = mkdtempSync(join(tmpdir(), 'tracecov-config-'))
    })

    afterEach(() => {
      clearConfigCache()
      rmSync(dir, { recursive: true, force: true })
    })

    it('should return defaults when config file does not exist', async () => {
      const config = await loadTracecovConfig('/non/existent/tracecov.config.js')
      expect(config).toEqual(DEFAULT_TRACECOV_CONFIG)
    })

    it('should cache config for the same path', async () => {
      const config1 = await loadTracecovConfig('/non/existent/tracecov.config.js')
      const config2 = await loadTracecovConfig('/non/existent/tracecov.config.js')
      expect(config1).toBe(config2)
    })

    it('should reload for a different path', async () => {
      const config1 = await loadTracecovConfig('/path/one.js')
      const config2 = await loadTracecovConfig('/path/two.js')
      expect(config1).not.toBe(config2)
      expect(config1).toEqual(config2)
    })

    it('should read a named tracecov export', async () => {
      const path = join(dir, 'named.config.mjs')
      writeFileSync(path, "export const tracecov = { title: 'Named', showBranches: false }\n")

      const config = await loadTracecovConfig(path)

      expect(config.title).toBe('Named')
      expect(config.showBranches).toBe(false)
      expect(config.highThreshold).toBe(90)
    })
  })

  describe('normalizePath', () => {
    it('should convert backslashes to forward slashes', () => {
      expect(normalizePath('src\\util\\x.c')).toBe('src/util/x.c')
      expect(normalizePath('/already/posix')).toBe('/already/posix')
    })
  })
})
