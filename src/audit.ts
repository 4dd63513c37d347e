import { AuditConfig } from './core/types/audit-config'
import { AuditSummary } from './core/types/reporting'
import { Task, TaskResult, UrlProbe } from './core/types/execution'
import { createRunner } from './core/runner'
import { collateRows } from './reporting/collate'
import { readTable, writeTable, requireColumn } from './table/csv'
import { logger } from './logger'

export interface AuditOptions {
  /** Replaces the HTTP probe */
  probe?: UrlProbe

  /** Progress callbacks */
  onStart?: (rowCount: number) => void
  onTaskComplete?: (result: TaskResult) => void
  onTaskFailed?: (task: Task, error: Error) => void
}

/**
 * Reads the input table, probes every URL in the configured column and writes
 * the broken rows with their status to the output table.
 *
 * Column and input problems are raised before any request is made and leave
 * no output behind.
 */
export async function runAudit(config: AuditConfig, options: AuditOptions = {}): Promise<AuditSummary> {
  const startTime = new Date()

  const table = await readTable(config.input)
  requireColumn(table, config.column)

  const urls = table.rows.map((row) => row[config.column])
  logger.info(`Checking ${urls.length} row(s) from ${config.input} with ${config.workers} worker(s)`)

  const runner = createRunner(
    {
      workers: config.workers,
      timeoutMs: Math.round(config.timeout * 1000),
      retries: config.retries,
      backoffMs: config.backoffMs,
      maxRedirects: config.maxRedirects,
      userAgent: config.userAgent,
    },
    { probe: options.probe },
  )

  if (options.onStart) runner.on('runStart', options.onStart)
  if (options.onTaskComplete) runner.on('taskComplete', options.onTaskComplete)
  if (options.onTaskFailed) runner.on('taskFailed', options.onTaskFailed)

  const results = await runner.run(urls)

  const collated = collateRows(table, results)
  await writeTable(config.output, collated.columns, collated.rows)
  logger.debug(`Wrote ${collated.rows.length} broken row(s) to ${config.output}`)

  const endTime = new Date()

  return {
    startTime,
    endTime,
    duration: endTime.getTime() - startTime.getTime(),
    checked: collated.checked,
    broken: collated.rows.length,
    column: config.column,
    inputPath: config.input,
    outputPath: config.output,
    breakdown: collated.breakdown,
  }
}
