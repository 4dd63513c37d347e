import { z } from 'zod'

export const DEFAULT_COLUMN = 'IMAGE_URLS'
export const STATUS_COLUMN = 'IMAGE_STATUS'

export const AuditConfigSchema = z.object({
  input: z.string({ required_error: 'An input CSV path is required' }).min(1),
  output: z.string({ required_error: 'An output CSV path is required' }).min(1),
  column: z.string().min(1).default(DEFAULT_COLUMN),
  workers: z.number().int().positive().default(24),
  timeout: z.number().positive().default(10), // seconds, per request
  retries: z.number().int().nonnegative().default(2),
  backoffMs: z.number().int().nonnegative().default(500),
  maxRedirects: z.number().int().nonnegative().default(30),
  userAgent: z.string().min(1).optional(),
})

export type AuditConfig = z.infer<typeof AuditConfigSchema>

export interface ConfigField {
  /** Environment variable name without the prefix */
  env: string
  flag?: string
  numeric?: boolean
}

/**
 * Where each setting can come from besides a config file
 */
export const CONFIG_FIELDS: Readonly<Record<keyof AuditConfig, ConfigField>> = {
  input: { env: 'INPUT', flag: '--input' },
  output: { env: 'OUTPUT', flag: '--output' },
  column: { env: 'COLUMN', flag: '--column' },
  workers: { env: 'WORKERS', flag: '--workers', numeric: true },
  timeout: { env: 'TIMEOUT', flag: '--timeout', numeric: true },
  retries: { env: 'RETRIES', flag: '--retries', numeric: true },
  backoffMs: { env: 'BACKOFF_MS', numeric: true },
  maxRedirects: { env: 'MAX_REDIRECTS', numeric: true },
  userAgent: { env: 'USER_AGENT' },
}

export const DEFAULT_ENV_PREFIX = 'IMGAUDIT_'
