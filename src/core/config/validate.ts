import { AuditConfig, AuditConfigSchema } from '../types'
import { ConfigValidationError } from '../errors'

/**
 * Applies defaults and checks every setting, reporting all problems at once
 */
export default function validateConfig(config: unknown): AuditConfig {
  const result = AuditConfigSchema.safeParse(config)
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues)
  }
  return result.data
}
