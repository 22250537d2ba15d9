import { AppConfig } from '../types'
import { readFile, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import validateConfig from './validate'
import { ConfigLoadError } from './errors'

export const CONFIG_FILENAMES = ['playmap.config.json', 'playmap.config.js', 'playmap.config.cjs'] as const

export function createDefaultConfig(): AppConfig {
  return validateConfig({})
}

export interface LoadConfigOptions {
  cwd?: string
  configPath?: string
  envPrefix?: string
  env?: NodeJS.ProcessEnv
  cliArgs?: Record<string, unknown>
}

/**
 * Loads configuration from multiple sources with proper precedence:
 * 1. Schema defaults (lowest priority)
 * 2. Config file (playmap.config.{json,js,cjs})
 * 3. Environment variables
 * 4. CLI arguments (highest priority)
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const { cwd = process.cwd(), configPath, envPrefix = 'PLAYMAP_', env = process.env, cliArgs = {} } = options

  let config: Record<string, unknown> = {}

  try {
    const fileConfig = await loadConfigFile(cwd, configPath)
    if (fileConfig) {
      config = mergeConfig(config, fileConfig)
    }
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to load config file: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined,
    )
  }

  const envConfig = loadConfigFromEnv(envPrefix, env)
  if (Object.keys(envConfig).length > 0) {
    config = mergeConfig(config, envConfig)
  }

  if (Object.keys(cliArgs).length > 0) {
    config = mergeConfig(config, cliArgs)
  }

  return validateConfig(config)
}

async function loadConfigFile(cwd: string, configPath?: string): Promise<Record<string, unknown> | null> {
  let targetPath: string | null = null

  if (configPath) {
    targetPath = resolve(cwd, configPath)
  } else {
    for (const filename of CONFIG_FILENAMES) {
      const filePath = join(cwd, filename)
      try {
        await access(filePath)
        targetPath = filePath
        break
      } catch {
        // not there, try the next name
      }
    }
  }

  if (!targetPath) {
    return null
  }

  let loaded: unknown
  try {
    if (targetPath.endsWith('.json')) {
      const content = await readFile(targetPath, 'utf-8')
      loaded = JSON.parse(content)
    } else {
      const configModule: unknown = await import(targetPath)
      loaded = isRecord(configModule) && 'default' in configModule ? configModule.default : configModule
    }
  } catch (error) {
    throw new Error(
      `Failed to load config file ${targetPath}: ${error instanceof Error ? error.message : String(error)}`,
    )
  }

  if (!isRecord(loaded)) {
    throw new Error(`Config file ${targetPath} must export an object`)
  }
  return loaded
}

function loadConfigFromEnv(prefix: string, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {}

  const envMappings = {
    [`${prefix}HOST`]: 'server.host',
    [`${prefix}PORT`]: 'server.port',
    [`${prefix}MAX_UPLOAD_BYTES`]: 'upload.maxBytes',
    [`${prefix}ALLOWED_EXTENSIONS`]: 'upload.allowedExtensions',
    [`${prefix}TOP_N`]: 'analysis.topN',
    [`${prefix}LOG_LEVEL`]: 'logLevel',
  }

  Object.entries(envMappings).forEach(([envVar, configPath]) => {
    const value = env[envVar]
    if (value !== undefined && value !== '') {
      setNestedValue(config, configPath, parseEnvValue(value))
    }
  })

  return config
}

/**
 * Parses environment variable values to appropriate types
 */
function parseEnvValue(value: string): unknown {
  if (/^\d+$/.test(value)) {
    return parseInt(value, 10)
  }

  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false
  if (value.startsWith('[') || value.startsWith('{')) {
    try {
      return JSON.parse(value)
    } catch {
      // Fall through to string
    }
  }

  return value
}

/**
 * Sets a nested value in an object using dot notation
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.')
  let current = obj

  for (let i = 0; i < keys.length - 1; i++) {
    const key = keys[i]
    if (!key) continue

    const next = current[key]
    if (isRecord(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[key] = created
      current = created
    }
  }

  const finalKey = keys[keys.length - 1]
  if (finalKey) {
    current[finalKey] = value
  }
}

/**
 * Deep merges two configuration objects, with the second taking precedence
 */
function mergeConfig(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base }

  Object.entries(override).forEach(([key, value]) => {
    if (value === undefined) return

    const existing = result[key]
    if (isRecord(existing) && isRecord(value)) {
      result[key] = mergeConfig(existing, value)
    } else {
      result[key] = value
    }
  })

  return result
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
