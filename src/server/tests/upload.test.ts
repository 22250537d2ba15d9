import { describe, it, expect } from '@jest/globals'
import { PassThrough, Readable } from 'node:stream'
import { createDefaultConfig } from '../../core/config'
import { UploadError } from '../errors'
import { analyzeUpload } from '../handler'
import { assertAllowedExtension, decodeUpload, parseDeclaredFormat, readMultipartUpload } from '../upload'
import { MULTIPART_HEADERS, multipartBody } from './multipart'

const TEXT_LOG = 'PLAY [site] ***\nTASK [compile] (12.345s) ***\nok: [h1]\n'

const expectUploadError = async (promise: Promise<unknown>, code: string): Promise<void> => {
  await expect(promise).rejects.toBeInstanceOf(UploadError)
  await expect(promise).rejects.toMatchObject({ code })
}

describe('readMultipartUpload', () => {
  it('should collect the file part and plain fields', async () => {
    const body = multipartBody([
      { name: 'format', content: 'text' },
      { name: 'file', filename: 'run.txt', content: TEXT_LOG },
    ])

    const upload = await readMultipartUpload(MULTIPART_HEADERS, Readable.from([body]), { maxBytes: 1024 })

    expect(upload.filename).toBe('run.txt')
    expect(upload.data.toString('utf-8')).toBe(TEXT_LOG)
    expect(upload.fields).toEqual({ format: 'text' })
  })

  it('should reject a body without a file part', async () => {
    const body = multipartBody([{ name: 'format', content: 'json' }])

    await expectUploadError(readMultipartUpload(MULTIPART_HEADERS, Readable.from([body]), { maxBytes: 1024 }), 'no_file')
  })

  it('should ignore files sent under another field name', async () => {
    const body = multipartBody([{ name: 'attachment', filename: 'run.txt', content: TEXT_LOG }])

    await expectUploadError(readMultipartUpload(MULTIPART_HEADERS, Readable.from([body]), { maxBytes: 1024 }), 'no_file')
  })

  it('should reject files over the size limit', async () => {
    const body = multipartBody([{ name: 'file', filename: 'run.txt', content: 'x'.repeat(64) }])

    await expectUploadError(
      readMultipartUpload(MULTIPART_HEADERS, Readable.from([body]), { maxBytes: 16 }),
      'file_too_large',
    )
  })

  it('should treat a file part without a filename as no upload', async () => {
    const body = multipartBody([{ name: 'file', filename: '', content: '' }])

    await expect(
      readMultipartUpload(MULTIPART_HEADERS, Readable.from([body]), { maxBytes: 1024 }),
    ).rejects.toMatchObject({ code: 'no_file', message: 'no file uploaded' })
  })

  it('should reject when the client disconnects mid-upload', async () => {
    const body = new PassThrough()
    const upload = readMultipartUpload(MULTIPART_HEADERS, body, { maxBytes: 1024 })
    const partial = multipartBody([{ name: 'file', filename: 'run.txt', content: TEXT_LOG }])

    body.write(partial.subarray(0, Math.floor(partial.length / 2)))
    body.destroy()

    await expect(upload).rejects.toMatchObject({ code: 'invalid_request', message: 'Upload aborted' })
  })

  it('should reject with the stream error as cause', async () => {
    const body = new PassThrough()
    const upload = readMultipartUpload(MULTIPART_HEADERS, body, { maxBytes: 1024 })
    const failure = new Error('socket hang up')

    body.destroy(failure)

    await expect(upload).rejects.toMatchObject({ code: 'invalid_request', cause: failure })
  })

  it('should reject non-multipart requests', async () => {
    await expectUploadError(
      readMultipartUpload({ 'content-type': 'application/json' }, Readable.from([Buffer.from('{}')]), { maxBytes: 16 }),
      'invalid_request',
    )
  })
})

describe('assertAllowedExtension', () => {
  it('should accept configured extensions case-insensitively', () => {
    expect(() => assertAllowedExtension('RUN.JSON', ['.json', '.txt'])).not.toThrow()
    expect(() => assertAllowedExtension('site.txt', ['.json', '.txt'])).not.toThrow()
  })

  it('should refuse other extensions', () => {
    expect(() => assertAllowedExtension('report.csv', ['.json', '.txt'])).toThrow(
      'Unsupported file type ".csv"; expected one of .json, .txt',
    )
    expect(() => assertAllowedExtension('Makefile', ['.json', '.txt'])).toThrow(UploadError)
  })
})

describe('decodeUpload', () => {
  it('should decode UTF-8 and drop a byte order mark', () => {
    expect(decodeUpload(Buffer.from('\uFEFFPLAY [é] ***', 'utf-8'))).toBe('PLAY [é] ***')
  })

  it('should refuse invalid UTF-8', () => {
    expect(() => decodeUpload(Buffer.from([0x50, 0xc3, 0x28]))).toThrow('failed to read file: content is not valid UTF-8')
  })

  it('should refuse binary content', () => {
    expect(() => decodeUpload(Buffer.from([0x50, 0x00, 0x4c]))).toThrow(UploadError)
  })
})

describe('parseDeclaredFormat', () => {
  it('should default to auto', () => {
    expect(parseDeclaredFormat(undefined)).toBe('auto')
    expect(parseDeclaredFormat('')).toBe('auto')
  })

  it('should accept known formats in any case', () => {
    expect(parseDeclaredFormat('JSON')).toBe('json')
    expect(parseDeclaredFormat('text')).toBe('text')
  })

  it('should refuse unknown formats', () => {
    expect(() => parseDeclaredFormat('yaml')).toThrow('Unknown format "yaml"; expected auto, json or text')
  })
})

describe('analyzeUpload', () => {
  const config = createDefaultConfig()

  it('should analyze an accepted text upload', () => {
    const report = analyzeUpload({ filename: 'run.txt', data: Buffer.from(TEXT_LOG), fields: {} }, config)

    expect(report.top_tasks).toEqual([{ task: 'compile', play: 'site', duration_seconds: 12.345 }])
    expect(report.nodes).toHaveLength(3)
  })

  it('should refuse a .csv upload without producing nodes', () => {
    let report: unknown
    let failure: unknown
    try {
      report = analyzeUpload({ filename: 'hosts.csv', data: Buffer.from('a,b\n1,2'), fields: {} }, config)
    } catch (error) {
      failure = error
    }

    expect(report).toBeUndefined()
    expect(failure).toBeInstanceOf(UploadError)
    expect(failure).toMatchObject({ code: 'unsupported_file_type', statusCode: 400 })
  })

  it('should respect the configured ranking length', () => {
    const log = ['PLAY [p] ***', 'TASK [a] (1s) ***', 'TASK [b] (2s) ***', 'TASK [c] (3s) ***'].join('\n')
    const report = analyzeUpload(
      { filename: 'run.txt', data: Buffer.from(log), fields: {} },
      { ...config, analysis: { topN: 1 } },
    )

    expect(report.top_tasks).toEqual([{ task: 'c', play: 'p', duration_seconds: 3 }])
  })

  it('should use the declared format field', () => {
    const report = analyzeUpload(
      { filename: 'run.txt', data: Buffer.from('{"plays": [{"name": "p"}]}'), fields: { format: 'text' } },
      config,
    )

    expect(report.format).toBe('text')
    expect(report.nodes).toEqual([])
  })
})
