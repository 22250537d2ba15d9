import type { IncomingMessage, ServerResponse } from 'node:http'
import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { AppConfig, MindmapReport } from '../core/types'
import { analyzePlaybook } from '../mindmap'
import { logger } from '../logger'
import { UploadError } from './errors'
import {
  assertAllowedExtension,
  decodeUpload,
  parseDeclaredFormat,
  readMultipartUpload,
  type UploadedFile,
} from './upload'

export const UPLOAD_ROUTES = new Set(['/upload', '/top_tasks_analysis'])

export interface RequestHandlerOptions {
  /** Directory holding index.html for the viewer */
  publicDir?: string
}

/**
 * Validates an uploaded file and runs the analysis on it
 * @throws UploadError when the file is refused
 */
export function analyzeUpload(file: UploadedFile, config: AppConfig): MindmapReport {
  assertAllowedExtension(file.filename, config.upload.allowedExtensions)
  const content = decodeUpload(file.data)
  const format = parseDeclaredFormat(file.fields.format)

  return analyzePlaybook(
    { content, filename: file.filename, format },
    { topN: config.analysis.topN, patterns: config.patterns },
  )
}

// src/server in the sources, dist/src/server once built
export function resolvePublicDir(): string {
  const candidates = [join(__dirname, '..', '..', 'public'), join(__dirname, '..', '..', '..', 'public')]
  return candidates.find((dir) => existsSync(join(dir, 'index.html'))) ?? candidates[0] ?? 'public'
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  const payload = JSON.stringify(body)
  res.statusCode = statusCode
  res.setHeader('Content-Type', 'application/json; charset=utf-8')
  res.setHeader('Content-Length', Buffer.byteLength(payload))
  res.end(payload)
}

function methodNotAllowed(res: ServerResponse, allow: string): void {
  res.setHeader('Allow', allow)
  sendJson(res, 405, { error: 'method_not_allowed', message: `Use ${allow}` })
}

export function createRequestHandler(config: AppConfig, options: RequestHandlerOptions = {}) {
  const publicDir = options.publicDir ?? resolvePublicDir()

  return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const method = req.method ?? 'GET'
    const { pathname } = new URL(req.url ?? '/', 'http://localhost')

    try {
      if (pathname === '/' || pathname === '/index.html') {
        if (method !== 'GET') return methodNotAllowed(res, 'GET')
        const html = await readFile(join(publicDir, 'index.html'))
        res.statusCode = 200
        res.setHeader('Content-Type', 'text/html; charset=utf-8')
        res.end(html)
        return
      }

      if (pathname === '/health') {
        if (method !== 'GET') return methodNotAllowed(res, 'GET')
        return sendJson(res, 200, { status: 'ok' })
      }

      if (UPLOAD_ROUTES.has(pathname)) {
        if (method !== 'POST') return methodNotAllowed(res, 'POST')

        const file = await readMultipartUpload(req.headers, req, { maxBytes: config.upload.maxBytes })
        const report = analyzeUpload(file, config)
        logger.info(
          {
            filename: file.filename,
            bytes: file.data.length,
            format: report.format,
            ...report.stats,
            warnings: report.warnings.length,
          },
          'Analyzed upload',
        )
        return sendJson(res, 200, report)
      }

      sendJson(res, 404, { error: 'not_found', message: `No route for ${method} ${pathname}` })
    } catch (error) {
      if (error instanceof UploadError) {
        logger.warn({ code: error.code, path: pathname }, error.message)
        return sendJson(res, error.statusCode, error.toJSON())
      }

      logger.error({ err: error, path: pathname }, 'Request failed')
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'internal_error', message: 'Unexpected server error' })
      } else {
        res.end()
      }
    }
  }
}
