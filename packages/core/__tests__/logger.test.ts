import { afterEach, describe, expect, it, vi } from 'vitest'
import { LoggerProvider } from '../src/logger'

describe('LoggerProvider', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should fall back to the console before init', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const provider = new LoggerProvider('info')

    provider.warn('register write rejected', { index: 40 })

    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn.mock.calls[0]?.[0]).toMatch(
      /^\[.+\] \[WARN\] register write rejected$/,
    )
    expect(warn.mock.calls[0]?.[1]).toEqual({ index: 40 })
  })

  it('should drop messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const provider = new LoggerProvider('warn')

    provider.debug('hidden')
    provider.info('hidden')

    expect(debug).not.toHaveBeenCalled()
    expect(log).not.toHaveBeenCalled()
  })

  it('should report enabled levels', () => {
    const provider = new LoggerProvider('warn')
    expect(provider.level).toBe('warn')
    expect(provider.isLevelEnabled('error')).toBe(true)
    expect(provider.isLevelEnabled('warn')).toBe(true)
    expect(provider.isLevelEnabled('info')).toBe(false)
  })

  it('should change level at runtime', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const provider = new LoggerProvider('warn')

    provider.setLevel('debug')
    provider.debug('now visible')

    expect(provider.level).toBe('debug')
    expect(provider.isLevelEnabled('debug')).toBe(true)
    expect(debug).toHaveBeenCalledTimes(1)
  })

  it('should default to info', () => {
    expect(new LoggerProvider().level).toBe('info')
  })

  it('should switch to pino after init', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const provider = new LoggerProvider('fatal')

    expect(provider.hasBeenInitializedValue).toBe(false)
    provider.init()
    expect(provider.hasBeenInitializedValue).toBe(true)

    provider.error('not routed to the console', new Error('test'))
    expect(error).not.toHaveBeenCalled()
  })
})
