/**
 * Tracecov Configuration
 *
 * Central configuration for the tracecov library and CLI.
 * Config can be defined in tracecov.config.js (or .mjs) as the default
 * export or as a named `tracecov` export. CLI flags override it.
 */

import { join, resolve } from 'node:path'
import { existsSync } from 'node:fs'
import { pathToFileURL } from 'node:url'
import { ConfigError } from '../errors.js'
import type { ReportConfig, Thresholds } from '../types.js'

/**
 * Default thresholds for coverage classification
 */
export const DEFAULT_THRESHOLDS: Thresholds = {
  high: 90,
  medium: 75,
}

/**
 * Default output directory for the HTML report
 */
export const DEFAULT_OUTPUT_DIR = 'coverage/html'

/**
 * Default report title
 */
export const DEFAULT_TITLE = 'Coverage report'

/**
 * Config file names searched in the working directory, in order
 */
export const CONFIG_FILE_NAMES = ['tracecov.config.js', 'tracecov.config.mjs']

/**
 * Tracecov configuration options
 */
export interface TracecovConfig {
  /** Rates at or above this percentage are shown as high coverage (default: 90) */
  highThreshold?: number

  /** Rates at or above this percentage are shown as medium coverage (default: 75) */
  mediumThreshold?: number

  /** Show branch coverage columns and markers (default: true) */
  showBranches?: boolean

  /** Show function coverage columns and function pages (default: true) */
  showFunctions?: boolean

  /**
   * Leave a file out of the merge result when two inputs carry different
   * checksums for one of its lines (default: true).
   * When false, counts are summed anyway and the disputed checksum is dropped.
   */
  strictChecksum?: boolean

  /** Also write directory listings sorted by line, function and branch rate (default: true) */
  sort?: boolean

  /** Explain the color coding at the top of every page (default: false) */
  legend?: boolean

  /** Output directory for the HTML report (default: 'coverage/html') */
  outputDir?: string

  /** Report title (default: 'Coverage report') */
  title?: string

  /**
   * Directory that report paths are relative to.
   * When omitted, the longest common directory of all source files is used.
   */
  sourceRoot?: string

  /** Also write the merged tracefile to this path */
  outputTracefile?: string

  /** Only keep source files matching one of these glob patterns */
  extract?: readonly string[]

  /** Drop source files matching one of these glob patterns */
  remove?: readonly string[]

  /**
   * Worker threads used to render source pages.
   * 0 renders on the main thread (default: from TRACECOV_WORKERS or half the CPUs)
   */
  workers?: number

  /** Enable logging (default: false) */
  log?: boolean

  /** Enable timing logs (default: false) */
  timing?: boolean
}

/**
 * Resolved configuration with all defaults applied
 */
export interface ResolvedTracecovConfig extends ReportConfig {
  readonly outputDir: string
  readonly title: string
  readonly sourceRoot: string | undefined
  readonly outputTracefile: string | undefined
  readonly extract: readonly string[]
  readonly remove: readonly string[]
  readonly workers: number | undefined
  readonly log: boolean
  readonly timing: boolean
}

/**
 * Default configuration values
 */
export const DEFAULT_TRACECOV_CONFIG: ResolvedTracecovConfig = Object.freeze({
  highThreshold: DEFAULT_THRESHOLDS.high,
  mediumThreshold: DEFAULT_THRESHOLDS.medium,
  showBranches: true,
  showFunctions: true,
  strictChecksum: true,
  sort: true,
  legend: false,
  outputDir: DEFAULT_OUTPUT_DIR,
  title: DEFAULT_TITLE,
  sourceRoot: undefined,
  outputTracefile: undefined,
  extract: [],
  remove: [],
  workers: undefined,
  log: false,
  timing: false,
})

function assertPercentage(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    throw new ConfigError(`${name} must be a percentage between 0 and 100, got ${value}`)
  }
}

/**
 * Validate classification thresholds
 */
export function validateThresholds(high: number, medium: number): void {
  assertPercentage('highThreshold', high)
  assertPercentage('mediumThreshold', medium)
  if (medium > high) {
    throw new ConfigError(`mediumThreshold (${medium}) must not exceed highThreshold (${high})`)
  }
}

/**
 * Resolve tracecov config with defaults
 * @param config - Tracecov config options
 */
export function resolveTracecovConfig(config?: TracecovConfig): ResolvedTracecovConfig {
  const highThreshold = config?.highThreshold ?? DEFAULT_TRACECOV_CONFIG.highThreshold
  const mediumThreshold = config?.mediumThreshold ?? DEFAULT_TRACECOV_CONFIG.mediumThreshold
  validateThresholds(highThreshold, mediumThreshold)

  const workers = config?.workers ?? DEFAULT_TRACECOV_CONFIG.workers
  if (workers !== undefined && (!Number.isInteger(workers) || workers < 0)) {
    throw new ConfigError(`workers must be a non-negative integer, got ${workers}`)
  }

  return Object.freeze({
    highThreshold,
    mediumThreshold,
    showBranches: config?.showBranches ?? DEFAULT_TRACECOV_CONFIG.showBranches,
    showFunctions: config?.showFunctions ?? DEFAULT_TRACECOV_CONFIG.showFunctions,
    strictChecksum: config?.strictChecksum ?? DEFAULT_TRACECOV_CONFIG.strictChecksum,
    sort: config?.sort ?? DEFAULT_TRACECOV_CONFIG.sort,
    legend: config?.legend ?? DEFAULT_TRACECOV_CONFIG.legend,
    outputDir: config?.outputDir ?? DEFAULT_TRACECOV_CONFIG.outputDir,
    title: config?.title ?? DEFAULT_TRACECOV_CONFIG.title,
    sourceRoot: config?.sourceRoot ?? DEFAULT_TRACECOV_CONFIG.sourceRoot,
    outputTracefile: config?.outputTracefile ?? DEFAULT_TRACECOV_CONFIG.outputTracefile,
    extract: Object.freeze([...(config?.extract ?? DEFAULT_TRACECOV_CONFIG.extract)]),
    remove: Object.freeze([...(config?.remove ?? DEFAULT_TRACECOV_CONFIG.remove)]),
    workers,
    log: config?.log ?? DEFAULT_TRACECOV_CONFIG.log,
    timing: config?.timing ?? DEFAULT_TRACECOV_CONFIG.timing,
  })
}

/**
 * Extract the immutable slice of configuration the core consumes
 */
export function toReportConfig(config: ReportConfig): ReportConfig {
  return Object.freeze({
    highThreshold: config.highThreshold,
    mediumThreshold: config.mediumThreshold,
    showBranches: config.showBranches,
    showFunctions: config.showFunctions,
    strictChecksum: config.strictChecksum,
    sort: config.sort,
    legend: config.legend,
  })
}

/**
 * Classification cut points of a report config
 */
export function getThresholds(config: ReportConfig): Thresholds {
  return { high: config.highThreshold, medium: config.mediumThreshold }
}

// Cache for loaded config
let cachedConfig: ResolvedTracecovConfig | null = null
let cachedConfigPath: string | null = null

/**
 * Find the config file in the working directory (.js, then .mjs)
 */
function findConfigFile(): string {
  const cwd = process.cwd()
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name)
    if (existsSync(candidate)) return candidate
  }
  // Default to .js if neither exists
  return join(cwd, CONFIG_FILE_NAMES[0])
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readNumber(source: Record<string, unknown>, key: keyof TracecovConfig): number | undefined {
  const value = source[key]
  if (value === undefined) return undefined
  if (typeof value !== 'number') {
    throw new ConfigError(`${key} must be a number`)
  }
  return value
}

function readBoolean(source: Record<string, unknown>, key: keyof TracecovConfig): boolean | undefined {
  const value = source[key]
  if (value === undefined) return undefined
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${key} must be a boolean`)
  }
  return value
}

function readString(source: Record<string, unknown>, key: keyof TracecovConfig): string | undefined {
  const value = source[key]
  if (value === undefined) return undefined
  if (typeof value !== 'string') {
    throw new ConfigError(`${key} must be a string`)
  }
  return value
}

function readStringList(source: Record<string, unknown>, key: keyof TracecovConfig): string[] | undefined {
  const value = source[key]
  if (value === undefined) return undefined
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`${key} must be a list of strings`)
  }
  return value
}

/**
 * Validate an untyped config object loaded from a config file
 */
export function parseTracecovConfig(source: Record<string, unknown>): TracecovConfig {
  return {
    highThreshold: readNumber(source, 'highThreshold'),
    mediumThreshold: readNumber(source, 'mediumThreshold'),
    showBranches: readBoolean(source, 'showBranches'),
    showFunctions: readBoolean(source, 'showFunctions'),
    strictChecksum: readBoolean(source, 'strictChecksum'),
    sort: readBoolean(source, 'sort'),
    legend: readBoolean(source, 'legend'),
    outputDir: readString(source, 'outputDir'),
    title: readString(source, 'title'),
    sourceRoot: readString(source, 'sourceRoot'),
    outputTracefile: readString(source, 'outputTracefile'),
    extract: readStringList(source, 'extract'),
    remove: readStringList(source, 'remove'),
    workers: readNumber(source, 'workers'),
    log: readBoolean(source, 'log'),
    timing: readBoolean(source, 'timing'),
  }
}

/**
 * Pick the tracecov options out of a loaded config module.
 * Handles named exports, default exports and CJS modules wrapped in default.
 */
function pickConfig(module: unknown): TracecovConfig | undefined {
  if (!isRecord(module)) return undefined
  if (isRecord(module.tracecov)) return parseTracecovConfig(module.tracecov)
  const defaultExport = module.default
  if (!isRecord(defaultExport)) return undefined
  if (isRecord(defaultExport.tracecov)) return parseTracecovConfig(defaultExport.tracecov)
  return parseTracecovConfig(defaultExport)
}

/**
 * Load tracecov config from tracecov.config.js or tracecov.config.mjs
 *
 * @param configPath - Path to the config file (optional, searched in cwd)
 */
export async function loadTracecovConfig(configPath?: string): Promise<ResolvedTracecovConfig> {
  const searchPath = resolve(configPath || findConfigFile())

  if (cachedConfig && cachedConfigPath === searchPath) {
    return cachedConfig
  }

  if (!existsSync(searchPath)) {
    // No config file is expected in most projects - use defaults
    cachedConfig = resolveTracecovConfig()
    cachedConfigPath = searchPath
    return cachedConfig
  }

  const module: unknown = await import(pathToFileURL(searchPath).href)
  cachedConfig = resolveTracecovConfig(pickConfig(module))
  cachedConfigPath = searchPath
  return cachedConfig
}

/**
 * Clear cached configuration (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null
  cachedConfigPath = null
}

/**
 * Normalize path separators for cross-platform compatibility
 */
export function normalizePath(filepath: string): string {
  return filepath.replace(/\\/g, '/')
}
