import { readFile, access } from 'node:fs/promises'
import { join, resolve } from 'node:path'
import { AuditConfig, CONFIG_FIELDS, DEFAULT_ENV_PREFIX } from '../types'
import validateConfig from './validate'
import { ConfigLoadError, errorMessage } from '../errors'

export const CONFIG_FILENAMES = ['imgaudit.config.json', 'imgaudit.config.js', 'imgaudit.config.cjs']

export interface LoadConfigOptions {
  cwd?: string
  configPath?: string
  envPrefix?: string
  cliArgs?: Record<string, unknown>
}

type RawConfig = Record<string, unknown>

/**
 * Loads configuration from multiple sources with proper precedence:
 * 1. Schema defaults (lowest priority)
 * 2. Config file (imgaudit.config.{json,js,cjs})
 * 3. Environment variables
 * 4. CLI arguments (highest priority)
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AuditConfig> {
  const { cwd = process.cwd(), configPath, envPrefix = DEFAULT_ENV_PREFIX, cliArgs = {} } = options

  let config: RawConfig = {}

  try {
    const fileConfig = await loadConfigFile(cwd, configPath)
    if (fileConfig) {
      config = mergeConfig(config, fileConfig)
    }
  } catch (error) {
    throw new ConfigLoadError(`Failed to load config file: ${errorMessage(error)}`, error)
  }

  config = mergeConfig(config, loadConfigFromEnv(envPrefix))
  config = mergeConfig(config, cliArgs)

  return validateConfig(config)
}

/**
 * Loads configuration from a file, supporting JSON and CommonJS modules
 */
async function loadConfigFile(cwd: string, configPath?: string): Promise<RawConfig | null> {
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
        // Not there, try the next name
      }
    }
  }

  if (!targetPath) {
    return null
  }

  let loaded: unknown
  try {
    if (targetPath.endsWith('.json')) {
      loaded = JSON.parse(await readFile(targetPath, 'utf-8'))
    } else {
      const configModule: unknown = await import(targetPath)
      loaded = isRecord(configModule) && 'default' in configModule ? configModule.default : configModule
    }
  } catch (error) {
    throw new Error(`Failed to load config file ${targetPath}: ${errorMessage(error)}`)
  }

  if (!isRecord(loaded)) {
    throw new Error(`Config file ${targetPath} must export an object`)
  }
  return loaded
}

function loadConfigFromEnv(prefix: string): RawConfig {
  const config: RawConfig = {}

  Object.entries(CONFIG_FIELDS).forEach(([key, field]) => {
    const value = process.env[`${prefix}${field.env}`]
    if (value !== undefined && value !== '') {
      // Text settings stay text even when they look like numbers
      config[key] = field.numeric ? parseNumericEnv(value) : value
    }
  })

  return config
}

/**
 * Turns a numeric-looking value into a number; anything else is left for validation to reject
 */
export function parseNumericEnv(value: string): number | string {
  return /^\d+(\.\d+)?$/.test(value.trim()) ? Number(value) : value
}

/**
 * Shallow merge where undefined values in the override are ignored
 */
function mergeConfig(base: RawConfig, override: RawConfig): RawConfig {
  const result = { ...base }

  Object.entries(override).forEach(([key, value]) => {
    if (value !== undefined) {
      result[key] = value
    }
  })

  return result
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
