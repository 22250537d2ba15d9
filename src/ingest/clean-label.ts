/**
 * Strips the `*`, `[` and `]` decoration ansible puts around names and
 * collapses runs of whitespace.
 */
export function cleanLabel(label: unknown): string {
  if (label === undefined || label === null || label === '' || label === false) {
    return ''
  }
  return String(label)
    .replace(/[*[\]]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
}
