import { createServer, type Server } from 'node:http'
import type { AppConfig } from '../core/types'
import { logger } from '../logger'
import { createRequestHandler, type RequestHandlerOptions } from './handler'

export interface RunningServer {
  server: Server
  url: string
  close(): Promise<void>
}

export async function startServer(config: AppConfig, options: RequestHandlerOptions = {}): Promise<RunningServer> {
  const handler = createRequestHandler(config, options)

  const server = createServer((req, res) => {
    handler(req, res).catch((error: unknown) => {
      logger.error({ err: error }, 'Unhandled request error')
      res.destroy()
    })
  })

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(config.server.port, config.server.host, () => {
      server.off('error', reject)
      resolve()
    })
  })

  const address = server.address()
  const port = typeof address === 'object' && address !== null ? address.port : config.server.port
  const url = `http://${config.server.host}:${port}`
  logger.info({ url, maxUploadBytes: config.upload.maxBytes }, 'Server listening')

  return {
    server,
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()))
      }),
  }
}
