/**
 * Fatal error types
 *
 * Recoverable problems are reported as diagnostics (see utils/diagnostics.ts);
 * these errors abort the run.
 */

/**
 * The input or output is in a state the run cannot continue from:
 * an ambiguous tracefile section, an unreadable tracefile, or an output
 * directory or page that cannot be written.
 */
export class StructuralError extends Error {
  readonly path?: string

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StructuralError'
    this.path = path
  }
}

/**
 * Invalid configuration values
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}
