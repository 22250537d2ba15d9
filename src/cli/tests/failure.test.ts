import { describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import { ConfigLoadError } from '../../core/config'
import { UploadError } from '../../server'
import { reportFailure } from '../failure'
import { captureOutput } from './capture'

describe('reportFailure', () => {
  let output: ReturnType<typeof captureOutput>

  beforeEach(() => {
    output = captureOutput()
  })

  afterEach(() => {
    output.restore()
    process.exitCode = undefined
  })

  it('should print unexpected errors with the failure marker', () => {
    reportFailure(new Error('boom'))

    expect(output.getErrors()).toBe('❌ Unexpected error: Error: boom')
    expect(process.exitCode).toBe(1)
  })

  it('should print upload errors by message', () => {
    reportFailure(new UploadError('no_file', 'no file uploaded'))

    expect(output.getErrors()).toBe('❌ no file uploaded')
  })

  it('should print config load errors on two lines', () => {
    reportFailure(new ConfigLoadError('Failed to load config file: nope'))

    expect(output.getErrors()).toBe('❌ Failed to load configuration:\nFailed to load config file: nope')
    expect(process.exitCode).toBe(1)
  })
})
