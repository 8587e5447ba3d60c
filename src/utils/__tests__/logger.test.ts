import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest'
import {
  configureLogging,
  createTimer,
  error,
  formatError,
  isLoggingEnabled,
  isTimingEnabled,
  log,
  setLogging,
  setTiming,
  warn,
} from '../logger.js'

describe('logger', () => {
  let consoleLogSpy: MockInstance<typeof console.log>
  let consoleErrorSpy: MockInstance<typeof console.error>

  beforeEach(() => {
    setLogging(false)
    setTiming(false)
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    setLogging(false)
    setTiming(false)
    consoleLogSpy.mockRestore()
    consoleErrorSpy.mockRestore()
  })

  describe('configureLogging', () => {
    it('should apply both switches', () => {
      configureLogging({ log: true, timing: true })
      expect(isLoggingEnabled()).toBe(true)
      expect(isTimingEnabled()).toBe(true)
    })

    it('should leave unset switches alone', () => {
      setTiming(true)
      configureLogging({ log: true })
      expect(isTimingEnabled()).toBe(true)
    })
  })

  describe('log', () => {
    it('should not log when logging is disabled', () => {
      log('test message')
      expect(consoleLogSpy).not.toHaveBeenCalled()
    })

    it('should log when logging is enabled', () => {
      setLogging(true)
      log('message', 123, { key: 'value' })
      expect(consoleLogSpy).toHaveBeenCalledWith('message', 123, { key: 'value' })
    })
  })

  describe('warn', () => {
    it('should always print warnings to stderr', () => {
      warn('warning message')
      expect(consoleErrorSpy).toHaveBeenCalledWith('warning message')
      expect(consoleLogSpy).not.toHaveBeenCalled()
    })
  })

  describe('error', () => {
    it('should always log errors even when logging is disabled', () => {
      error('error', new Error('test'))
      expect(consoleErrorSpy).toHaveBeenCalledWith('error', expect.any(Error))
    })
  })

  describe('createTimer', () => {
    it('should stay silent when both logging and timing are disabled', () => {
      const endTimer = createTimer('test')
      expect(endTimer()).toBe(0)
      expect(consoleLogSpy).not.toHaveBeenCalled()
    })

    it('should log when timing is enabled but logging is disabled', () => {
      setTiming(true)
      const endTimer = createTimer('test operation')
      endTimer()
      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringContaining('⏱ test operation:'))
    })

    it('should include duration in ms', () => {
      setLogging(true)
      const endTimer = createTimer('test')
      const duration = endTimer()
      expect(duration).toBeGreaterThanOrEqual(0)
      expect(consoleLogSpy).toHaveBeenCalledWith(expect.stringMatching(/⏱ test: \d+ms/))
    })
  })

  describe('formatError', () => {
    it('should return the message of an error', () => {
      expect(formatError(new Error('boom'))).toBe('boom')
    })

    it('should convert other values to strings', () => {
      expect(formatError('plain')).toBe('plain')
      expect(formatError(42)).toBe('42')
    })

    it('should append causes not already in the message', () => {
      const cause = new Error('EACCES: permission denied')
      expect(formatError(new Error('cannot write page', { cause }))).toBe(
        'cannot write page: caused by: EACCES: permission denied'
      )
      expect(formatError(new Error('cannot write page: EACCES: permission denied', { cause }))).toBe(
        'cannot write page: EACCES: permission denied'
      )
    })
  })
})
