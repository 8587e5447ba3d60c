/**
 * Logger for tracecov
 *
 * Progress logs are off unless `log: true` is configured (or --log given);
 * `timing: true` shows only the phase timers. Warnings and errors are always
 * printed, and go to stderr so that report output on stdout stays clean.
 */

export interface LoggingOptions {
  log?: boolean
  timing?: boolean
}

const state = {
  logging: false,
  timing: false,
}

/**
 * Apply the logging switches of a resolved config
 */
export function configureLogging(options: LoggingOptions): void {
  if (options.log !== undefined) state.logging = options.log
  if (options.timing !== undefined) state.timing = options.timing
}

export function setLogging(enabled: boolean): void {
  state.logging = enabled
}

export function setTiming(enabled: boolean): void {
  state.timing = enabled
}

export function isLoggingEnabled(): boolean {
  return state.logging
}

export function isTimingEnabled(): boolean {
  return state.timing
}

/**
 * Log a progress message (only if logging is enabled)
 */
export function log(...args: unknown[]): void {
  if (state.logging) {
    console.log(...args)
  }
}

/**
 * Log a warning (always shown, stderr)
 */
export function warn(...args: unknown[]): void {
  console.error(...args)
}

/**
 * Log an error (always shown, stderr)
 */
export function error(...args: unknown[]): void {
  console.error(...args)
}

/**
 * Start a phase timer. The returned function prints the elapsed time when
 * logging or timing is on, and returns it in milliseconds (0 when both are off).
 */
export function createTimer(label: string): () => number {
  if (!state.logging && !state.timing) {
    return () => 0
  }
  const start = performance.now()
  return () => {
    const duration = performance.now() - start
    console.log(`  ⏱ ${label}: ${duration.toFixed(0)}ms`)
    return duration
  }
}

/**
 * Message of an error, followed by the messages of its causes
 */
export function formatError(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err)
  }
  const messages = [err.message]
  let cause: unknown = err.cause
  while (cause instanceof Error && messages.length < 5) {
    const { message } = cause
    if (!messages.some(seen => seen.includes(message))) {
      messages.push(message)
    }
    cause = cause.cause
  }
  return messages.join(': caused by: ')
}
