export { startServer, type RunningServer } from './server'
export { createRequestHandler, analyzeUpload, UPLOAD_ROUTES, type RequestHandlerOptions } from './handler'
export { readMultipartUpload, decodeUpload, assertAllowedExtension, parseDeclaredFormat, type UploadedFile } from './upload'
export { UploadError, type UploadErrorCode } from './errors'
