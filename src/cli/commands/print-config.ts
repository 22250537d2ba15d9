/* eslint-disable no-console */

import type { CommandModule } from 'yargs'
import { loadConfig } from '../../core'
import { reportFailure } from '../failure'
import type { BaseArgs, PrintConfigArgs } from '../types'

export const printConfigCommand: CommandModule<BaseArgs, PrintConfigArgs> = {
  command: 'print-config',
  describe: 'Show the resolved and validated configuration',
  builder: (yargs) => {
    return yargs.option('format', {
      alias: 'f',
      type: 'string',
      choices: ['json'] as const,
      default: 'json',
      describe: 'Output format for the configuration',
    })
  },
  handler: async (argv) => {
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
