import pc from 'picocolors'
import { AuditSummary } from '../../core/types/reporting'
import { StatusCategory, STATUS_CATEGORIES } from '../../core/classify'

export interface CLIReporterOptions {
  showColors?: boolean
  showBreakdown?: boolean
}

const CATEGORY_LABELS: Record<StatusCategory, string> = {
  ok: 'OK (2xx)',
  redirect: 'Redirect (3xx)',
  'client-error': 'Client error (4xx)',
  'server-error': 'Server error (5xx)',
  empty: 'Empty URL',
  error: 'Network error',
}

/**
 * CLI Reporter that prints the run summary in plain text
 */
export class CLIReporter {
  private options: Required<CLIReporterOptions>

  constructor(options: CLIReporterOptions = {}) {
    this.options = {
      showColors: options.showColors ?? true,
      showBreakdown: options.showBreakdown ?? true,
    }
  }

  generate(summary: AuditSummary): string {
    const lines: string[] = [
      `Checked ${summary.checked} rows.`,
      `Broken rows: ${summary.broken}`,
      `Wrote: ${summary.outputPath}`,
    ]

    if (this.options.showBreakdown) {
      lines.push('')
      lines.push(...this.formatBreakdown(summary))
      lines.push('')
      lines.push(this.formatFooter(summary))
    }

    return lines.join('\n')
  }

  print(summary: AuditSummary): void {
    // eslint-disable-next-line no-console
    console.log(this.generate(summary))
  }

  private formatBreakdown(summary: AuditSummary): string[] {
    const categories = STATUS_CATEGORIES.filter((category) => summary.breakdown[category] > 0)
    if (categories.length === 0) {
      return ['No rows to check']
    }

    const width = Math.max(...categories.map((category) => CATEGORY_LABELS[category].length))

    return [
      'Status breakdown:',
      ...categories.map((category) => {
        const label = CATEGORY_LABELS[category].padEnd(width)
        return `  ${this.colorize(label, colorFor(category))}  ${summary.breakdown[category]}`
      }),
    ]
  }

  private formatFooter(summary: AuditSummary): string {
    const duration = `${(summary.duration / 1000).toFixed(1)}s`
    const status =
      summary.broken === 0
        ? this.colorize('✓ No broken images', 'green')
        : this.colorize(`✗ ${summary.broken} broken image(s)`, 'red')

    return `${status} in column ${summary.column} (${duration})`
  }

  private colorize(text: string, color: 'green' | 'yellow' | 'red'): string {
    if (!this.options.showColors) {
      return text
    }

    switch (color) {
      case 'green':
        return pc.green(text)
      case 'yellow':
        return pc.yellow(text)
      case 'red':
        return pc.red(text)
    }
  }
}

function colorFor(category: StatusCategory): 'green' | 'yellow' | 'red' {
  switch (category) {
    case 'ok':
      return 'green'
    case 'redirect':
      return 'yellow'
    default:
      return 'red'
  }
}
