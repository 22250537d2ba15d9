import { describe, it, expect, afterEach } from '@jest/globals'
import { logDestination, logger, setLogLevel } from './logger'

describe('logger', () => {
  afterEach(() => {
    setLogLevel('silent')
  })

  it('should write to stderr', () => {
    const fd: unknown = Reflect.get(logDestination, 'fd')

    expect(fd).toBe(2)
  })

  it('should change level at run time', () => {
    setLogLevel('debug')

    expect(logger.level).toBe('debug')
    expect(logger.isLevelEnabled('debug')).toBe(true)
  })
})
