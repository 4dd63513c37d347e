/**
 * Programmatic usage:
 * ```ts
 * import { runAudit, loadConfig } from 'imgaudit'
 *
 * const config = await loadConfig({ cliArgs: { input: 'products.csv', output: 'broken.csv' } })
 * const summary = await runAudit(config)
 * console.log(`${summary.broken} of ${summary.checked} rows have broken images`)
 * ```
 *
 * Or probe a plain list of URLs:
 * ```ts
 * import { dispatch, isBroken } from 'imgaudit'
 *
 * const results = await dispatch(['https://example.com/a.png'], 8, 5000)
 * ```
 */

export { runAudit, type AuditOptions } from './audit'
export * from './core'
export { Probe, createProbe, createHttpClient, type ProbeConfig, type ProbeOptions, type HttpClient } from './probe'
export { collateRows, summarizeOutcomes, type CollationResult, CLIReporter, JSONReporter } from './reporting'
export { readTable, writeTable, requireColumn, MissingColumnError, TableReadError, type Row, type Table } from './table'
export { logger, setLogLevel, type LogLevel } from './logger'
