/**
 * Diagnostics
 *
 * Per-file problems are collected during a run and reported together at the
 * end, so a single bad input never stops the rest of a batch.
 */

import type { Diagnostic, DiagnosticKind } from '../types.js'

const KIND_LABELS: Record<DiagnosticKind, string> = {
  'parse-warning': 'parse warning',
  'checksum-mismatch': 'checksum mismatch',
  'function-mismatch': 'function mismatch',
  'missing-source': 'missing source',
  'duplicate-source': 'duplicate source',
}

/**
 * Format one diagnostic as a single log line
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const prefix = diagnostic.severity === 'error' ? 'ERROR' : 'WARNING'
  const where = diagnostic.location ?? diagnostic.file
  const label = KIND_LABELS[diagnostic.kind]
  return where
    ? `${prefix}: ${label}: ${where}: ${diagnostic.message}`
    : `${prefix}: ${label}: ${diagnostic.message}`
}

export class DiagnosticCollector {
  private items: Diagnostic[] = []

  add(...diagnostics: Diagnostic[]): void {
    this.items.push(...diagnostics)
  }

  get all(): readonly Diagnostic[] {
    return this.items
  }

  get size(): number {
    return this.items.length
  }

  get warningCount(): number {
    return this.items.filter(d => d.severity === 'warning').length
  }

  get errorCount(): number {
    return this.items.filter(d => d.severity === 'error').length
  }

  ofKind(kind: DiagnosticKind): Diagnostic[] {
    return this.items.filter(d => d.kind === kind)
  }
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}

/**
 * The end-of-run count line, e.g. "2 warnings, 1 error"
 */
export function summarizeCounts(warnings: number, errors: number): string {
  return `${plural(warnings, 'warning')}, ${plural(errors, 'error')}`
}
