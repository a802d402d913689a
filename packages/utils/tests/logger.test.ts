import { createLogger, logger, LogLevels, setLogLevel } from '@stratasplit/utils'
import { afterEach, describe, expect, it } from 'vitest'

describe('logger', () => {
  afterEach(() => {
    setLogLevel(LogLevels.info)
  })

  it('should start children at the root level', () => {
    const log = createLogger('test-start')
    expect(log.level).toBe(logger.level)
  })

  it('should apply setLogLevel to the root and existing children', () => {
    const first = createLogger('test-first')
    const second = createLogger('test-second')

    setLogLevel(LogLevels.debug)

    expect(logger.level).toBe(LogLevels.debug)
    expect(first.level).toBe(LogLevels.debug)
    expect(second.level).toBe(LogLevels.debug)
  })

  it('should give children created after a level change the new level', () => {
    setLogLevel(LogLevels.silent)
    const log = createLogger('test-late')
    expect(log.level).toBe(LogLevels.silent)
  })
})
