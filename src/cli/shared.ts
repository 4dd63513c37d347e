import { ConfigLoadError, ConfigValidationError, MissingColumnError, TableReadError } from '../core/errors'
import { logger, setLogLevel } from '../logger'
import type { BaseArgs } from './types'

export function configureLogging(args: BaseArgs): void {
  if (args.verbose) {
    setLogLevel('debug')
  } else if (args.quiet) {
    setLogLevel('warn')
  }
}

/**
 * Logs a fatal error and marks the process as failed
 */
export function reportFailure(error: unknown): void {
  if (error instanceof ConfigLoadError) {
    logger.error(`Failed to load configuration: ${error.message}`)
  } else if (error instanceof ConfigValidationError) {
    logger.error(`Configuration validation failed:\n${error.getErrorSummary()}`)
  } else if (error instanceof MissingColumnError || error instanceof TableReadError) {
    logger.error(error.message)
  } else {
    logger.error('Unexpected error:', error)
  }
  process.exitCode = 1
}
