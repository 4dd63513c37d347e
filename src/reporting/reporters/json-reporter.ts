import { AuditSummary, StatusBreakdown } from '../../core/types/reporting'

export interface JSONReporterOptions {
  prettyPrint?: boolean
}

/**
 * Machine-readable summary of an audit run
 */
export interface JSONReport {
  run: {
    startTime: string // ISO string
    endTime: string // ISO string
    duration: number // milliseconds
  }
  input: {
    path: string
    column: string
  }
  output: {
    path: string
  }
  checked: number
  broken: number
  breakdown: StatusBreakdown
}

export class JSONReporter {
  private options: Required<JSONReporterOptions>

  constructor(options: JSONReporterOptions = {}) {
    this.options = {
      prettyPrint: options.prettyPrint ?? true,
    }
  }

  generate(summary: AuditSummary): JSONReport {
    return {
      run: {
        startTime: summary.startTime.toISOString(),
        endTime: summary.endTime.toISOString(),
        duration: summary.duration,
      },
      input: {
        path: summary.inputPath,
        column: summary.column,
      },
      output: {
        path: summary.outputPath,
      },
      checked: summary.checked,
      broken: summary.broken,
      breakdown: { ...summary.breakdown },
    }
  }

  stringify(summary: AuditSummary): string {
    return JSON.stringify(this.generate(summary), null, this.options.prettyPrint ? 2 : undefined)
  }

  print(summary: AuditSummary): void {
    // eslint-disable-next-line no-console
    console.log(this.stringify(summary))
  }
}
