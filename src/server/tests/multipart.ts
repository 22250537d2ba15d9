import { IncomingMessage, ServerResponse } from 'node:http'
import { Socket } from 'node:net'

export const BOUNDARY = 'playmap-test-boundary'

export const MULTIPART_HEADERS = { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` }

export interface FormPart {
  name: string
  filename?: string
  content: string | Buffer
}

export function multipartBody(parts: FormPart[]): Buffer {
  const chunks: Buffer[] = []
  for (const part of parts) {
    const disposition =
      part.filename === undefined
        ? `Content-Disposition: form-data; name="${part.name}"\r\n`
        : `Content-Disposition: form-data; name="${part.name}"; filename="${part.filename}"\r\nContent-Type: application/octet-stream\r\n`
    chunks.push(Buffer.from(`--${BOUNDARY}\r\n${disposition}\r\n`))
    chunks.push(typeof part.content === 'string' ? Buffer.from(part.content) : part.content)
    chunks.push(Buffer.from('\r\n'))
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`))
  return Buffer.concat(chunks)
}

/**
 * An IncomingMessage fed from memory; no socket is ever connected
 */
export function createRequest(
  method: string,
  url: string,
  headers: Record<string, string> = {},
  body?: Buffer,
): IncomingMessage {
  const req = new IncomingMessage(new Socket())
  req.method = method
  req.url = url
  req.headers = headers
  if (body) req.push(body)
  req.push(null)
  return req
}

// Keeps what the handler writes instead of sending it anywhere
export class CapturedResponse extends ServerResponse {
  body = ''

  override end(chunk?: unknown): this {
    if (typeof chunk === 'string' || Buffer.isBuffer(chunk)) {
      this.body += chunk.toString()
    }
    return this
  }

  json<T = unknown>(): T {
    return JSON.parse(this.body)
  }
}

export function createResponse(req: IncomingMessage): CapturedResponse {
  return new CapturedResponse(req)
}
