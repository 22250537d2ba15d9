export type UploadErrorCode = 'no_file' | 'unsupported_file_type' | 'unreadable_file' | 'file_too_large' | 'invalid_request'

const STATUS_CODES: Record<UploadErrorCode, number> = {
  no_file: 400,
  unsupported_file_type: 400,
  unreadable_file: 400,
  file_too_large: 413,
  invalid_request: 400,
}

/**
 * An upload the service refuses to analyze. Problems inside an accepted file
 * are reported as warnings on the report instead.
 */
export class UploadError extends Error {
  public readonly statusCode: number

  constructor(
    public readonly code: UploadErrorCode,
    message: string,
    public readonly cause?: Error,
  ) {
    super(message)
    this.name = 'UploadError'
    this.statusCode = STATUS_CODES[code]
  }

  toJSON(): { error: UploadErrorCode; message: string } {
    return { error: this.code, message: this.message }
  }
}
