/* eslint-disable no-console */

import { ConfigLoadError, ConfigValidationError } from '../core/config'
import { UploadError } from '../server'
import { setLogLevel } from '../logger'
import type { AppConfig } from '../core/types'
import type { BaseArgs } from './types'

/**
 * Prints a command failure and marks the process as failed
 */
export function reportFailure(error: unknown): void {
  if (error instanceof ConfigLoadError) {
    console.error('❌ Failed to load configuration:')
    console.error(error.message)
  } else if (error instanceof ConfigValidationError) {
    console.error('❌ Configuration validation failed:')
    console.error(error.getErrorSummary())
  } else if (error instanceof UploadError) {
    console.error(`❌ ${error.message}`)
  } else {
    console.error('❌ Unexpected error:', error)
  }
  process.exitCode = 1
}

export function applyLogLevel(argv: BaseArgs, config: AppConfig): void {
  if (argv.verbose) {
    setLogLevel('debug')
  } else if (argv.quiet) {
    setLogLevel('warn')
  } else {
    setLogLevel(config.logLevel)
  }
}
