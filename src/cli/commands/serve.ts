import type { CommandModule } from 'yargs'
import { loadConfig } from '../../core'
import { logger } from '../../logger'
import { startServer } from '../../server'
import { applyLogLevel, reportFailure } from '../failure'
import type { BaseArgs, ServeArgs } from '../types'

export const serveCommand: CommandModule<BaseArgs, ServeArgs> = {
  command: 'serve',
  describe: 'Start the upload service and the viewer',
  builder: (yargs) => {
    return yargs
      .option('port', {
        alias: 'p',
        type: 'number',
        describe: 'Port to listen on (default: 5000)',
      })
      .option('host', {
        type: 'string',
        describe: 'Interface to bind (default: 127.0.0.1)',
      })
      .example('$0 serve', 'Listen on 127.0.0.1:5000')
      .example('$0 serve --host 0.0.0.0 --port 8080', 'Listen on every interface')
  },
  handler: async (argv) => {
    try {
      await serve(argv)
    } catch (error) {
      logger.error({ err: error }, 'Server failed to start')
      reportFailure(error)
    }
  },
}

async function serve(args: ServeArgs): Promise<void> {
  const server: Record<string, unknown> = {}
  if (args.port !== undefined) server.port = args.port
  if (args.host !== undefined) server.host = args.host

  const config = await loadConfig({
    configPath: args.config,
    cliArgs: Object.keys(server).length > 0 ? { server } : {},
  })
  applyLogLevel(args, config)

  const running = await startServer(config)
  if (!args.quiet) {
    // eslint-disable-next-line no-console
    console.error(`Serving on ${running.url}`)
  }

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down')
    void running.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Failed to close server')
        process.exit(1)
      },
    )
  }

  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}
