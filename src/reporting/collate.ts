import { Outcome, ResultSet, MISSING_OUTCOME } from '../core/types/outcome'
import { STATUS_COLUMN } from '../core/types/audit-config'
import { StatusBreakdown } from '../core/types/reporting'
import { isBroken, formatOutcome, statusCategory } from '../core/classify'
import type { Row, Table } from '../table/csv'

export interface CollationResult {
  /** Input columns with the status column appended */
  columns: string[]
  /** Broken rows in input order, each carrying its status label */
  rows: Row[]
  /** Outcome of every input row, in input order */
  outcomes: Outcome[]
  checked: number
  breakdown: StatusBreakdown
}

/**
 * Joins probe outcomes back onto the rows they came from and keeps the broken ones.
 * An index missing from the result set counts as `error: missing`.
 */
export function collateRows(table: Table, results: ResultSet, statusColumn: string = STATUS_COLUMN): CollationResult {
  const columns = table.columns.includes(statusColumn) ? [...table.columns] : [...table.columns, statusColumn]
  const outcomes = table.rows.map((_, index) => results.get(index) ?? MISSING_OUTCOME)

  const rows = table.rows.flatMap((row, index) => {
    const outcome = outcomes[index] ?? MISSING_OUTCOME
    return isBroken(outcome) ? [{ ...row, [statusColumn]: String(formatOutcome(outcome)) }] : []
  })

  return {
    columns,
    rows,
    outcomes,
    checked: table.rows.length,
    breakdown: summarizeOutcomes(outcomes),
  }
}

export function summarizeOutcomes(outcomes: readonly Outcome[]): StatusBreakdown {
  const breakdown: StatusBreakdown = {
    ok: 0,
    redirect: 0,
    'client-error': 0,
    'server-error': 0,
    empty: 0,
    error: 0,
  }
  for (const outcome of outcomes) {
    breakdown[statusCategory(outcome)]++
  }
  return breakdown
}
