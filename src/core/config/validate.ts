import { ZodError } from 'zod'
import { AppConfig, AppConfigSchema } from '../types'
import { ConfigValidationError } from './errors'

/**
 * Validates a configuration object against the schema and fills in defaults
 * @throws ConfigValidationError if validation fails
 */
export default function validateConfig(config: unknown): AppConfig {
  try {
    return AppConfigSchema.parse(config)
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError('Configuration validation failed', error.issues)
    }
    throw error
  }
}
