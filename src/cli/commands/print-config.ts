/* eslint-disable no-console */
import type { CommandModule } from 'yargs'
import { loadConfig } from '../../core/config'
import type { BaseArgs, PrintConfigArgs } from '../types'
import { configureLogging, reportFailure } from '../shared'

export const printConfigCommand: CommandModule<BaseArgs, PrintConfigArgs> = {
  command: 'print-config',
  describe: 'Show the resolved and validated configuration',
  handler: async (argv) => {
    configureLogging(argv)
    try {
      const config = await loadConfig({
        cwd: process.cwd(),
        configPath: argv.config,
      })

      console.log(JSON.stringify(config, null, 2))

      if (!argv.quiet) {
        console.error('✅ Configuration is valid')
      }
    } catch (error) {
      reportFailure(error)
    }
  },
}
