/**
 * Tracefile Parser
 *
 * Reads the line-oriented tracefile format into a TracefileModel:
 *
 *   TN:<test name>
 *   SF:<source file>
 *   FN:<line>,<function name>
 *   FNDA:<call count>,<function name>
 *   BRDA:<line>,<block>,<branch>,<taken count or ->
 *   DA:<line>,<hit count>[,<checksum>]
 *   end_of_record
 *
 * A run of consecutive TN records names the tests of every following section,
 * up to the next TN record. Summary records (FNF, FNH, BRF, BRH, LF, LH) are
 * recognized and recomputed from the data instead of trusted. A malformed or unknown record is reported
 * and skipped; only an ambiguous section structure is fatal.
 */

import type { Diagnostic, SourceFileCoverage, TracefileModel } from '@/types.js'
import { StructuralError } from '@/errors.js'
import { mergeFileCoverage } from '@/merger/core.js'
import { BRANCH_NOT_REACHED, END_OF_RECORD, MAX_COUNT } from '@/utils/constants.js'
import { log } from '@/utils/logger.js'
import {
  addBranch,
  addCounts,
  addLine,
  compareStrings,
  createFileCoverage,
  createTracefile,
} from './model.js'

export interface ParseOptions {
  /** Name of the input, used in diagnostics (default: '<tracefile>') */
  source?: string
  /** Applied when several sections describe the same file (default: true) */
  strictChecksum?: boolean
}

export interface ParseResult {
  model: TracefileModel
  diagnostics: Diagnostic[]
  /** Paths dropped because their repeated sections disagree on checksums */
  failedFiles: string[]
}

/** Records that carry totals recomputed from the data */
const SUMMARY_TAGS = new Set(['FNF', 'FNH', 'BRF', 'BRH', 'LF', 'LH'])

const UNSIGNED_PATTERN = /^\d+$/
const SIGNED_PATTERN = /^-?\d+$/
const CHECKSUM_PATTERN = /^[^\s,]+$/

interface Section {
  file: SourceFileCoverage
  /** Function name -> start line, from FN records */
  functionLines: Map<string, number>
  /** Function name -> call count, from FNDA records */
  functionHits: Map<string, number>
  /** Function name -> tracefile line of its first FNDA, for diagnostics */
  functionHitLocations: Map<string, string>
  /** Tracefile location of the SF record */
  location: string
}

class RecordError extends Error {}

function parseUnsigned(text: string | undefined, what: string): number {
  if (text === undefined || !UNSIGNED_PATTERN.test(text)) {
    throw new RecordError(`invalid ${what} '${text ?? ''}'`)
  }
  const value = Number(text)
  if (value > Number.MAX_SAFE_INTEGER) {
    throw new RecordError(`${what} ${text} out of range`)
  }
  return value
}

function parseLineNumber(text: string | undefined): number {
  const line = parseUnsigned(text, 'line number')
  if (line < 1) {
    throw new RecordError(`line number ${line} out of range`)
  }
  return line
}

/**
 * Split `<first>,<rest>` where rest may itself contain commas
 */
function splitFirst(text: string): [string, string] | null {
  const index = text.indexOf(',')
  if (index === -1) return null
  return [text.slice(0, index), text.slice(index + 1)]
}

class TracefileParser {
  private readonly source: string
  private readonly strictChecksum: boolean
  private readonly model = createTracefile()
  private readonly diagnostics: Diagnostic[] = []
  private readonly failedFiles = new Set<string>()
  private section: Section | null = null
  private location = ''
  private testNames: string[] = []
  private previousTag = ''

  constructor(options: ParseOptions) {
    this.source = options.source ?? '<tracefile>'
    this.strictChecksum = options.strictChecksum ?? true
  }

  parse(content: string): ParseResult {
    const lines = content.split(/\r?\n/)

    lines.forEach((raw, index) => {
      this.location = `${this.source}:${index + 1}`
      const line = raw.trim()
      if (line === '') return

      try {
        this.parseRecord(line)
      } catch (error) {
        if (error instanceof RecordError) {
          this.warn(`${error.message} in '${line}'`)
        } else {
          throw error
        }
      }
    })

    if (this.section) {
      log(`${this.source}: final section for ${this.section.file.path} has no ${END_OF_RECORD}`)
      this.closeSection()
    }

    return {
      model: this.model,
      diagnostics: this.diagnostics,
      failedFiles: [...this.failedFiles].sort(compareStrings),
    }
  }

  private warn(message: string): void {
    this.diagnostics.push({
      kind: 'parse-warning',
      severity: 'warning',
      message,
      file: this.section?.file.path,
      location: this.location,
    })
  }

  private parseRecord(line: string): void {
    if (line === END_OF_RECORD) {
      this.previousTag = END_OF_RECORD
      if (!this.section) {
        throw new RecordError(`${END_OF_RECORD} without an open section`)
      }
      this.closeSection()
      return
    }

    const colon = line.indexOf(':')
    if (colon === -1) {
      this.previousTag = ''
      throw new RecordError('unknown record')
    }
    const tag = line.slice(0, colon)
    const value = line.slice(colon + 1)
    const previousTag = this.previousTag
    this.previousTag = tag

    switch (tag) {
      case 'TN':
        this.parseTestName(value, previousTag === 'TN')
        return
      case 'SF':
        this.openSection(value)
        return
    }

    if (!SUMMARY_TAGS.has(tag) && !['DA', 'FN', 'FNDA', 'BRDA'].includes(tag)) {
      throw new RecordError(`unknown record tag '${tag}'`)
    }

    const section = this.section
    if (!section) {
      throw new RecordError('record outside of a file section')
    }

    switch (tag) {
      case 'DA':
        this.parseLineRecord(section, value)
        return
      case 'FN':
        this.parseFunctionRecord(section, value)
        return
      case 'FNDA':
        this.parseFunctionHitRecord(section, value)
        return
      case 'BRDA':
        this.parseBranchRecord(section, value)
        return
      default:
        // Summary records are recomputed on output
        return
    }
  }

  private parseTestName(name: string, continuesGroup: boolean): void {
    if (!continuesGroup) {
      this.testNames = []
    }
    if (name !== '') {
      this.testNames.push(name)
      this.section?.file.testNames.add(name)
    }
  }

  private openSection(path: string): void {
    if (path === '') {
      throw new RecordError('missing source file path')
    }
    if (this.section) {
      throw new StructuralError(
        `${this.location}: section for ${this.section.file.path} is not terminated before the section for ${path}`,
        this.source
      )
    }
    const file = createFileCoverage(path)
    for (const name of this.testNames) {
      file.testNames.add(name)
    }
    this.section = {
      file,
      functionLines: new Map(),
      functionHits: new Map(),
      functionHitLocations: new Map(),
      location: this.location,
    }
  }

  private parseCount(text: string | undefined): number {
    if (text === undefined || !SIGNED_PATTERN.test(text)) {
      throw new RecordError(`invalid count '${text ?? ''}'`)
    }
    const count = Number(text)
    if (count < 0) {
      this.warn(`negative count ${count} treated as 0`)
      return 0
    }
    if (count > MAX_COUNT) {
      this.warn(`count ${text} exceeds ${MAX_COUNT}; saturated`)
      return MAX_COUNT
    }
    return count
  }

  private parseLineRecord(section: Section, value: string): void {
    const fields = value.split(',')
    if (fields.length < 2 || fields.length > 3) {
      throw new RecordError('expected DA:<line>,<count>[,<checksum>]')
    }
    const line = parseLineNumber(fields[0])
    const checksum = fields[2]
    if (checksum !== undefined && !CHECKSUM_PATTERN.test(checksum)) {
      throw new RecordError(`invalid checksum '${checksum}'`)
    }
    const existing = section.file.lines.get(line)
    if (existing?.checksum !== undefined && checksum !== undefined && existing.checksum !== checksum) {
      throw new RecordError(`conflicting checksum for line ${line}`)
    }
    const hits = this.parseCount(fields[1])
    addLine(section.file, checksum === undefined ? { line, hits } : { line, hits, checksum })
  }

  private parseFunctionRecord(section: Section, value: string): void {
    const parts = splitFirst(value)
    if (!parts) {
      throw new RecordError('expected FN:<line>,<name>')
    }
    const line = parseLineNumber(parts[0])
    let name = parts[1]

    // FN:<start line>,<end line>,<name>
    const withEndLine = /^(\d+),(.+)$/.exec(name)
    if (withEndLine) {
      name = withEndLine[2]
    }
    if (name === '') {
      throw new RecordError('missing function name')
    }

    const existing = section.functionLines.get(name)
    section.functionLines.set(name, existing === undefined ? line : Math.min(existing, line))
  }

  private parseFunctionHitRecord(section: Section, value: string): void {
    const parts = splitFirst(value)
    if (!parts || parts[1] === '') {
      throw new RecordError('expected FNDA:<count>,<name>')
    }
    const [countText, name] = parts
    const hits = this.parseCount(countText)
    section.functionHits.set(name, addCounts(section.functionHits.get(name) ?? 0, hits))
    if (!section.functionHitLocations.has(name)) {
      section.functionHitLocations.set(name, this.location)
    }
  }

  private parseBranchRecord(section: Section, value: string): void {
    const fields = value.split(',')
    if (fields.length !== 4) {
      throw new RecordError('expected BRDA:<line>,<block>,<branch>,<taken>')
    }
    const line = parseLineNumber(fields[0])
    const block = parseUnsigned(fields[1], 'block id')
    const branch = parseUnsigned(fields[2], 'branch id')
    const taken = fields[3] === BRANCH_NOT_REACHED ? null : this.parseCount(fields[3])
    addBranch(section.file, { line, block, branch, taken })
  }

  /**
   * Resolve function records and fold the section into the model
   */
  private closeSection(): void {
    const section = this.section
    if (!section) return
    this.section = null

    const { file } = section
    for (const [name, line] of section.functionLines) {
      file.functions.set(name, { name, line, hits: section.functionHits.get(name) ?? 0 })
    }
    for (const [name, location] of section.functionHitLocations) {
      if (!section.functionLines.has(name)) {
        this.diagnostics.push({
          kind: 'parse-warning',
          severity: 'warning',
          message: `call count for undeclared function ${name} ignored`,
          file: file.path,
          location,
        })
      }
    }

    if (this.failedFiles.has(file.path)) return

    const existing = this.model.get(file.path)
    if (!existing) {
      this.model.set(file.path, file)
      return
    }

    const merged = mergeFileCoverage(existing, file, {
      strictChecksum: this.strictChecksum,
      location: section.location,
    })
    this.diagnostics.push(...merged.diagnostics)
    if (merged.file) {
      this.model.set(file.path, merged.file)
    } else {
      this.model.delete(file.path)
      this.failedFiles.add(file.path)
    }
  }
}

/**
 * Parse tracefile content into a model.
 * Throws StructuralError when a section is opened before the previous one ends.
 */
export function parseTracefile(content: string, options: ParseOptions = {}): ParseResult {
  return new TracefileParser(options).parse(content)
}
