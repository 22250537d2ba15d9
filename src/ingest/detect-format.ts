import { extname } from 'node:path'
import type { DeclaredFormat, InputFormat } from '../core/types'

/**
 * Picks the parser for an upload. A declared format wins, then the `.json`
 * extension, then a sniff for a JSON object body.
 */
export function detectFormat(content: string, filename?: string, declared: DeclaredFormat = 'auto'): InputFormat {
  if (declared !== 'auto') return declared

  if (filename && extname(filename).toLowerCase() === '.json') {
    return 'json'
  }

  return looksLikeJsonObject(content) ? 'json' : 'text'
}

function looksLikeJsonObject(content: string): boolean {
  const trimmed = content.trim()
  if (!trimmed.startsWith('{')) return false
  try {
    const parsed: unknown = JSON.parse(trimmed)
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
  } catch {
    return false
  }
}
