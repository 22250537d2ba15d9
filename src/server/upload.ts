import type { IncomingHttpHeaders } from 'node:http'
import { extname } from 'node:path'
import type { Readable } from 'node:stream'
import busboy from 'busboy'
import { z } from 'zod'
import type { DeclaredFormat } from '../core/types'
import { UploadError } from './errors'

export const FILE_FIELD = 'file'

export interface UploadedFile {
  filename: string
  data: Buffer
  /** Plain form fields sent alongside the file */
  fields: Record<string, string>
}

export interface UploadLimits {
  maxBytes: number
}

/**
 * Collects the `file` part (and any plain fields) of a multipart/form-data body
 */
export function readMultipartUpload(
  headers: IncomingHttpHeaders,
  body: Readable,
  limits: UploadLimits,
): Promise<UploadedFile> {
  return new Promise((resolve, reject) => {
    const contentType = headers['content-type']
    if (!contentType || !contentType.toLowerCase().startsWith('multipart/form-data')) {
      body.resume()
      reject(new UploadError('invalid_request', 'Expected a multipart/form-data body with a "file" field'))
      return
    }

    let parser: busboy.Busboy
    try {
      parser = busboy({ headers: { ...headers, 'content-type': contentType }, limits: { fileSize: limits.maxBytes } })
    } catch (error) {
      body.resume()
      reject(
        new UploadError(
          'invalid_request',
          `Malformed multipart request: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined,
        ),
      )
      return
    }

    const fields: Record<string, string> = {}
    let upload: { filename: string; chunks: Buffer[] } | undefined
    let truncated = false

    parser.on('file', (name, stream, info) => {
      stream.on('error', (error: Error) => {
        reject(new UploadError('invalid_request', `Malformed multipart request: ${error.message}`, error))
      })
      // a form submitted with no file chosen still sends an empty `file` part
      if (name !== FILE_FIELD || upload || !info.filename) {
        stream.resume()
        return
      }
      const chunks: Buffer[] = []
      upload = { filename: info.filename, chunks }
      stream.on('data', (chunk: Buffer) => chunks.push(chunk))
      stream.on('limit', () => {
        truncated = true
      })
    })

    parser.on('field', (name, value) => {
      fields[name] = value
    })

    parser.on('error', (error: unknown) => {
      reject(
        new UploadError(
          'invalid_request',
          `Malformed multipart request: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined,
        ),
      )
    })

    parser.on('close', () => {
      if (truncated) {
        reject(new UploadError('file_too_large', `File exceeds the ${limits.maxBytes} byte upload limit`))
        return
      }
      if (!upload) {
        reject(new UploadError('no_file', 'no file uploaded'))
        return
      }
      resolve({ filename: upload.filename, data: Buffer.concat(upload.chunks), fields })
    })

    // A client that disconnects mid-body never ends the stream, so busboy would never close
    const abort = (error?: Error) => {
      if (body.readableEnded) return
      body.unpipe(parser)
      parser.destroy()
      reject(new UploadError('invalid_request', 'Upload aborted', error))
    }
    body.once('error', abort)
    body.once('close', () => abort())

    body.pipe(parser)
  })
}

export function assertAllowedExtension(filename: string, allowedExtensions: readonly string[]): void {
  const extension = extname(filename).toLowerCase()
  const allowed = allowedExtensions.map((entry) => entry.toLowerCase())
  if (!extension || !allowed.includes(extension)) {
    throw new UploadError(
      'unsupported_file_type',
      `Unsupported file type "${extension || filename}"; expected one of ${allowed.join(', ')}`,
    )
  }
}

/**
 * Decodes the upload as UTF-8 text, refusing binary content
 */
export function decodeUpload(data: Buffer): string {
  if (data.includes(0)) {
    throw new UploadError('unreadable_file', 'failed to read file: binary content is not supported')
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(data)
  } catch (error) {
    throw new UploadError(
      'unreadable_file',
      'failed to read file: content is not valid UTF-8',
      error instanceof Error ? error : undefined,
    )
  }
}

const DeclaredFormatSchema = z.enum(['auto', 'json', 'text'])

export function parseDeclaredFormat(value: string | undefined): DeclaredFormat {
  if (value === undefined || value === '') return 'auto'
  const result = DeclaredFormatSchema.safeParse(value.toLowerCase())
  if (!result.success) {
    throw new UploadError('invalid_request', `Unknown format "${value}"; expected auto, json or text`)
  }
  return result.data
}
