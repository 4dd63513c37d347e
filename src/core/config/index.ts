export { loadConfig, parseNumericEnv, CONFIG_FILENAMES, type LoadConfigOptions } from './load'
export { default as validateConfig } from './validate'
export { ConfigLoadError, ConfigValidationError } from '../errors'
