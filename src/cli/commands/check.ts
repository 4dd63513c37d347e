import type { CommandModule } from 'yargs'
import { loadConfig } from '../../core/config'
import { runAudit } from '../../audit'
import { formatOutcome } from '../../core/classify'
import { CLIReporter, JSONReporter } from '../../reporting'
import { logger } from '../../logger'
import type { Task, TaskResult } from '../../core/types'
import type { BaseArgs, CheckArgs } from '../types'
import { configureLogging, reportFailure } from '../shared'

const PROGRESS_INTERVAL = 100

export const checkCommand: CommandModule<BaseArgs, CheckArgs> = {
  command: ['check', '$0'],
  describe: 'Probe every image URL in a CSV column and write the broken rows',
  builder: (yargs) => {
    return yargs
      .option('input', {
        alias: 'i',
        type: 'string',
        describe: 'Path to the input CSV',
      })
      .option('output', {
        alias: 'o',
        type: 'string',
        describe: 'Path to write the broken rows to',
      })
      .option('column', {
        type: 'string',
        describe: 'Column holding the image URL (default: IMAGE_URLS)',
      })
      .option('workers', {
        alias: 'w',
        type: 'number',
        describe: 'Concurrent requests (default: 24)',
      })
      .option('timeout', {
        alias: 't',
        type: 'number',
        describe: 'Per-request timeout in seconds (default: 10)',
      })
      .option('retries', {
        type: 'number',
        describe: 'Retries after a network failure (default: 2)',
      })
      .option('json', {
        type: 'boolean',
        describe: 'Print the summary as JSON',
      })
      .example('$0 -i input/products.csv -o output/broken.csv', 'Check the IMAGE_URLS column')
      .example('$0 -i products.csv -o broken.csv --column PHOTO -w 8', 'Check another column with 8 workers')
  },
  handler: async (argv) => {
    configureLogging(argv)
    try {
      await runCheck(argv)
    } catch (error) {
      reportFailure(error)
    }
  },
}

async function runCheck(args: CheckArgs): Promise<void> {
  const config = await loadConfig({
    configPath: args.config,
    cliArgs: {
      input: args.input,
      output: args.output,
      column: args.column,
      workers: args.workers,
      timeout: args.timeout,
      retries: args.retries,
    },
  })

  let total = 0
  let completed = 0

  const summary = await runAudit(config, {
    onStart: (rowCount) => {
      total = rowCount
    },
    onTaskComplete: (result: TaskResult) => {
      completed++
      logger.debug(`Row ${result.task.index}: ${result.task.url ?? ''} -> ${formatOutcome(result.outcome)}`)
      if (completed % PROGRESS_INTERVAL === 0 && completed < total) {
        logger.info(`Checked ${completed}/${total} rows...`)
      }
    },
    onTaskFailed: (task: Task, error: Error) => {
      logger.debug(`Row ${task.index} raised ${error.name}: ${error.message}`)
    },
  })

  if (args.json) {
    new JSONReporter().print(summary)
  } else {
    new CLIReporter({ showBreakdown: !args.quiet }).print(summary)
  }
}
