// Outcome of a single URL probe: an HTTP status or a sentinel
export type Outcome = StatusOutcome | EmptyOutcome | ErrorOutcome

export interface StatusOutcome {
  readonly kind: 'status'
  readonly code: number
}

export interface EmptyOutcome {
  readonly kind: 'empty'
}

export interface ErrorOutcome {
  readonly kind: 'error'
  readonly reason: string
}

// Outcomes keyed by the row index they were produced for
export type ResultSet = Map<number, Outcome>

export function statusOutcome(code: number): StatusOutcome {
  return Object.freeze({ kind: 'status', code })
}

export function errorOutcome(reason: string): ErrorOutcome {
  return Object.freeze({ kind: 'error', reason })
}

export const EMPTY_OUTCOME: EmptyOutcome = Object.freeze({ kind: 'empty' })

export const MISSING_OUTCOME: ErrorOutcome = errorOutcome('missing')
