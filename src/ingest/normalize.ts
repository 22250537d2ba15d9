import type { DeclaredFormat, PatternSet, PlaybookRun } from '../core/types'
import { detectFormat } from './detect-format'
import { normalizeJson } from './json-normalizer'
import { compilePatterns } from './patterns'
import { parseText } from './text-parser'

export interface NormalizeInput {
  content: string
  filename?: string
  format?: DeclaredFormat
}

/**
 * Turns raw playbook output into a PlaybookRun. Content problems end up in
 * `warnings`; this never throws for bad input.
 */
export function normalize(input: NormalizeInput, patterns?: Partial<PatternSet>): PlaybookRun {
  const format = detectFormat(input.content, input.filename, input.format)

  if (!input.content.trim()) {
    return { format, plays: [], recap: [], warnings: ['Input is empty'], skippedLines: 0 }
  }

  if (format === 'json') {
    let document: unknown
    try {
      document = JSON.parse(input.content)
    } catch (error) {
      const text = parseText(input.content, compilePatterns(patterns))
      const reason = error instanceof Error ? error.message : String(error)
      return { ...text, warnings: [`Input is not valid JSON (${reason}); parsed as text`, ...text.warnings] }
    }
    return normalizeJson(document)
  }

  return parseText(input.content, compilePatterns(patterns))
}
