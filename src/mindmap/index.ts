export { analyzePlaybook, buildReport, summarize, type AnalyzeOptions } from './analyze'
export { buildGraph } from './graph-builder'
export { buildNested } from './nested-builder'
export { renderMarkdown } from './markdown'
export { rankTasksByDuration, DEFAULT_TOP_N } from './duration-ranking'
export { STATUS_MEANINGS } from './status-meanings'
export { outline, formatSeconds, type OutlineEntry } from './outline'
