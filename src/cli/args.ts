/**
 * Helpers shared by the command argument parsers
 */

/**
 * Value following a flag, or undefined when the flag ends the argument list
 * or is followed by another flag
 */
export function flagValue(args: string[], index: number): string | undefined {
  const value = args[index + 1]
  if (value === undefined || (value.startsWith('-') && value !== '-')) {
    return undefined
  }
  return value
}

/**
 * Parse a percentage flag value; returns an error message on failure
 */
export function parsePercentage(flag: string, value: string): number | string {
  const n = Number(value)
  if (value.trim() === '' || !Number.isFinite(n) || n < 0 || n > 100) {
    return `${flag} expects a percentage between 0 and 100, got '${value}'`
  }
  return n
}

/**
 * Parse a non-negative integer flag value; returns an error message on failure
 */
export function parseCount(flag: string, value: string): number | string {
  if (!/^\d+$/.test(value)) {
    return `${flag} expects a non-negative integer, got '${value}'`
  }
  return parseInt(value, 10)
}
