import { readFile, writeFile, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import { z } from 'zod'
import { TableReadError, MissingColumnError, errorMessage } from '../core/errors'

export type Row = Record<string, string>

export interface Table {
  columns: string[]
  rows: Row[]
}

const RecordsSchema = z.array(z.array(z.string()))

/**
 * Reads a CSV file with a header row. Short rows are padded with empty cells.
 */
export async function readTable(path: string): Promise<Table> {
  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (error) {
    throw new TableReadError(`Failed to read input file ${path}: ${errorMessage(error)}`, error)
  }

  let records: string[][]
  try {
    records = RecordsSchema.parse(
      parse(content, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      }),
    )
  } catch (error) {
    throw new TableReadError(`Failed to parse input file ${path}: ${errorMessage(error)}`, error)
  }

  const [header, ...body] = records
  if (!header) {
    return { columns: [], rows: [] }
  }

  const columns = uniqueColumnNames(header)
  const rows = body.map(
    (record): Row => Object.fromEntries(columns.map((column, i): [string, string] => [column, record[i] ?? ''])),
  )

  return { columns, rows }
}

/**
 * Renames repeated header cells to `NAME.1`, `NAME.2`, ... so every column
 * keeps its own values. A generated name that is itself taken gets suffixed again.
 */
export function uniqueColumnNames(header: readonly string[]): string[] {
  const seen = new Map<string, number>()

  return header.map((name) => {
    let column = name
    let count = seen.get(column) ?? 0
    while (count > 0) {
      seen.set(column, count + 1)
      column = `${column}.${count}`
      count = seen.get(column) ?? 0
    }
    seen.set(column, 1)
    return column
  })
}

/**
 * Throws a MissingColumnError listing what the table does have
 */
export function requireColumn(table: Pick<Table, 'columns'>, column: string): void {
  if (!table.columns.includes(column)) {
    throw new MissingColumnError(column, table.columns)
  }
}

/**
 * Writes rows as CSV under the given header, creating the parent directory.
 * The header is written even when there are no rows.
 */
export async function writeTable(path: string, columns: readonly string[], rows: readonly Row[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true })

  const records = [columns, ...rows.map((row) => columns.map((column) => row[column] ?? ''))]
  await writeFile(path, stringify(records), 'utf-8')
}
