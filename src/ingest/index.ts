export { normalize, type NormalizeInput } from './normalize'
export { detectFormat } from './detect-format'
export { normalizeJson, readDuration } from './json-normalizer'
export { parseText } from './text-parser'
export { compilePatterns, DEFAULT_PATTERNS, type CompiledPatterns } from './patterns'
export { cleanLabel } from './clean-label'
