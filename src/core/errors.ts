import type { ZodIssue } from 'zod'
import { CONFIG_FIELDS, DEFAULT_ENV_PREFIX } from './types/audit-config'

/**
 * A problem with the audit's inputs, found before any URL is probed
 */
export class AuditSetupError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = new.target.name
  }
}

export class ConfigLoadError extends AuditSetupError {}

export class ConfigValidationError extends AuditSetupError {
  constructor(public readonly issues: readonly ZodIssue[]) {
    super(`Configuration validation failed with ${issues.length} issue(s)`)
  }

  /**
   * One line per issue, naming the flag and environment variable behind the setting
   */
  getErrorSummary(): string {
    return this.issues.map((issue) => `${settingLabel(issue.path)}${issue.message}`).join('\n')
  }
}

export class TableReadError extends AuditSetupError {}

export class MissingColumnError extends AuditSetupError {
  constructor(
    public readonly column: string,
    public readonly availableColumns: readonly string[],
  ) {
    super(`Column '${column}' not found. Columns: [${availableColumns.join(', ')}]`)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function settingLabel(path: ZodIssue['path']): string {
  const [key] = path
  if (key === undefined) {
    return ''
  }

  const name = path.map(String).join('.')
  if (typeof key !== 'string' || !isConfigKey(key)) {
    return `${name}: `
  }

  const field = CONFIG_FIELDS[key]
  const sources = [field.flag, `${DEFAULT_ENV_PREFIX}${field.env}`].filter(
    (source): source is string => source !== undefined,
  )
  return `${name} (${sources.join(', ')}): `
}

function isConfigKey(key: string): key is keyof typeof CONFIG_FIELDS {
  return Object.hasOwn(CONFIG_FIELDS, key)
}
