import { Outcome } from './types/outcome'

export type StatusCategory = 'ok' | 'redirect' | 'client-error' | 'server-error' | 'empty' | 'error'

export const STATUS_CATEGORIES: readonly StatusCategory[] = [
  'ok',
  'redirect',
  'client-error',
  'server-error',
  'empty',
  'error',
]

/**
 * A row is broken when its image answered 4xx/5xx, its URL is blank,
 * or every attempt to reach it failed.
 */
export function isBroken(outcome: Outcome): boolean {
  switch (outcome.kind) {
    case 'status':
      return outcome.code >= 400
    case 'empty':
    case 'error':
      return true
  }
}

/**
 * Label written to the status column: the numeric status, `empty`, or `error: <kind>`
 */
export function formatOutcome(outcome: Outcome): number | string {
  switch (outcome.kind) {
    case 'status':
      return outcome.code
    case 'empty':
      return 'empty'
    case 'error':
      return `error: ${outcome.reason}`
  }
}

export function statusCategory(outcome: Outcome): StatusCategory {
  switch (outcome.kind) {
    case 'empty':
      return 'empty'
    case 'error':
      return 'error'
    case 'status':
      if (outcome.code >= 500) return 'server-error'
      if (outcome.code >= 400) return 'client-error'
      if (outcome.code >= 300) return 'redirect'
      return 'ok'
  }
}
