import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { checkCommand } from './commands/check'
import { printConfigCommand } from './commands/print-config'

export function createCli() {
  return yargs(hideBin(process.argv))
    .scriptName('imgaudit')
    .usage('$0 [check] --input <file.csv> --output <file.csv> [options]')
    .option('config', {
      alias: 'c',
      type: 'string',
      describe: 'Path to configuration file',
      global: true,
    })
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      describe: 'Enable verbose logging',
      global: true,
    })
    .option('quiet', {
      alias: 'q',
      type: 'boolean',
      describe: 'Suppress non-essential output',
      global: true,
    })
    .command(checkCommand)
    .command(printConfigCommand)
    .help()
    .alias('help', 'h')
    .version()
    .alias('version', 'V')
    .strict()
}

export async function runCli(argv?: string[]) {
  const cli = createCli()

  if (argv) {
    return cli.parse(argv)
  }

  return cli.argv
}
