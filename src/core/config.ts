export { loadConfig, createDefaultConfig, type LoadConfigOptions } from './config/load'
export { default as validateConfig } from './config/validate'
export { ConfigLoadError, ConfigValidationError } from './config/errors'
