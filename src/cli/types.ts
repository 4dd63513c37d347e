/**
 * CLI command definitions and interfaces
 */

export interface BaseArgs {
  config?: string
  verbose?: boolean
  quiet?: boolean
}

export interface CheckArgs extends BaseArgs {
  input?: string
  output?: string
  column?: string
  workers?: number
  timeout?: number
  retries?: number
  json?: boolean
}

export type PrintConfigArgs = BaseArgs
