/**
 * Basic usage:
 * ```ts
 * import { analyzePlaybook } from 'playmap'
 *
 * const report = analyzePlaybook({ content: logText, filename: 'deploy.txt' })
 * console.log(report.markdown)
 * ```
 */

export * from './core'
export {
  normalize,
  detectFormat,
  normalizeJson,
  parseText,
  compilePatterns,
  DEFAULT_PATTERNS,
  type NormalizeInput,
  type CompiledPatterns,
} from './ingest'
export {
  analyzePlaybook,
  buildReport,
  buildGraph,
  buildNested,
  renderMarkdown,
  rankTasksByDuration,
  STATUS_MEANINGS,
  DEFAULT_TOP_N,
  type AnalyzeOptions,
} from './mindmap'
export { startServer, createRequestHandler, UploadError, type RunningServer, type UploadErrorCode } from './server'
export { CLIReporter, JSONReporter, type CLIReporterOptions, type JSONReporterOptions } from './reporting'
export { logger, type Logger } from './logger'
