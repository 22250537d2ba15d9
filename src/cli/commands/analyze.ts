/* eslint-disable no-console */

import { readFile } from 'fs/promises'
import { basename } from 'path'
import type { CommandModule } from 'yargs'
import { loadConfig } from '../../core'
import type { MindmapReport } from '../../core/types'
import { logger } from '../../logger'
import { CLIReporter, JSONReporter } from '../../reporting'
import { analyzeUpload, UploadError, type UploadedFile } from '../../server'
import { applyLogLevel, reportFailure } from '../failure'
import type { AnalyzeArgs, BaseArgs, OutputFormat } from '../types'

export const analyzeCommand: CommandModule<BaseArgs, AnalyzeArgs> = {
  command: 'analyze <file>',
  describe: 'Analyze a saved playbook run and print the result',
  builder: (yargs) => {
    return yargs
      .positional('file', {
        type: 'string',
        demandOption: true,
        describe: 'JSON callback output or text log of ansible-playbook',
      })
      .option('format', {
        alias: 'f',
        choices: ['cli', 'json', 'markdown'] as const,
        default: 'cli' as const,
        describe: 'How to print the analysis',
      })
      .option('input', {
        alias: 'i',
        choices: ['auto', 'json', 'text'] as const,
        default: 'auto' as const,
        describe: 'Format of the input file',
      })
      .option('top', {
        alias: 't',
        type: 'number',
        describe: 'Number of slowest tasks to rank',
      })
      .example('$0 analyze run.json', 'Summarize a json callback dump')
      .example('$0 analyze deploy.txt --format markdown', 'Print the outline of a text log')
      .example('$0 analyze run.json --format json --top 5', 'Print the full report with the 5 slowest tasks')
  },
  handler: async (argv) => {
    try {
      await analyzeFile(argv)
    } catch (error) {
      reportFailure(error)
    }
  },
}

async function analyzeFile(args: AnalyzeArgs): Promise<void> {
  const config = await loadConfig({
    configPath: args.config,
    cliArgs: args.top === undefined ? {} : { analysis: { topN: args.top } },
  })
  applyLogLevel(args, config)

  const file = await readLocalFile(args.file, args.input)
  const report = analyzeUpload(file, config)

  logger.info(
    { filename: file.filename, format: report.format, plays: report.stats.plays, tasks: report.stats.tasks },
    'Analyzed playbook output',
  )
  if (report.warnings.length > 0) {
    logger.debug({ warnings: report.warnings }, 'Analysis produced warnings')
  }

  console.log(render(report, args.format))
}

async function readLocalFile(path: string, input: AnalyzeArgs['input']): Promise<UploadedFile> {
  try {
    const data = await readFile(path)
    return { filename: basename(path), data, fields: { format: input } }
  } catch (error) {
    throw new UploadError(
      'unreadable_file',
      `failed to read file: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined,
    )
  }
}

function render(report: MindmapReport, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return new JSONReporter({ prettyPrint: true }).generate(report)
    case 'markdown':
      return report.markdown
    case 'cli':
      return new CLIReporter().generate(report)
  }
}
