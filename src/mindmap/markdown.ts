import type { PlaybookRun } from '../core/types'
import { outline } from './outline'

const INDENT = '  '

export function renderMarkdown(run: PlaybookRun): string {
  const lines: string[] = []
  for (const entry of outline(run)) {
    lines.push(`${INDENT.repeat(entry.depth)}- ${entry.label}`)
  }
  return lines.join('\n')
}
