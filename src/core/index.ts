/**
 * Core module - outcome types, configuration, classification and the dispatch pool
 */

export * from './types'
export * from './config'
export { AuditSetupError } from './errors'
export * from './classify'
export * from './dispatcher'
export * from './runner'
