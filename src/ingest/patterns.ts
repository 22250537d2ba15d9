import { PatternSetSchema, type PatternSet } from '../core/types'

export interface CompiledPatterns {
  play: RegExp
  task: RegExp
  hostResult: RegExp
  duration: RegExp
  ignoring: RegExp
  recap: RegExp
  recapLine: RegExp
}

export const DEFAULT_PATTERNS: PatternSet = PatternSetSchema.parse({})

export function compilePatterns(patterns: Partial<PatternSet> = {}): CompiledPatterns {
  const merged: PatternSet = { ...DEFAULT_PATTERNS, ...patterns }
  return {
    play: new RegExp(merged.play),
    task: new RegExp(merged.task),
    hostResult: new RegExp(merged.hostResult),
    duration: new RegExp(merged.duration),
    ignoring: new RegExp(merged.ignoring),
    recap: new RegExp(merged.recap),
    recapLine: new RegExp(merged.recapLine),
  }
}

/**
 * Reads a duration from a `duration` pattern match: either `(12.345s)` seconds
 * in group 1 or a `(h:mm:ss.fff)` stamp in groups 2-4.
 */
export function durationFromMatch(match: RegExpExecArray): number | undefined {
  const [, seconds, hours, minutes, rest] = match
  if (seconds !== undefined) {
    const value = Number.parseFloat(seconds)
    return Number.isFinite(value) ? value : undefined
  }
  if (hours !== undefined && minutes !== undefined && rest !== undefined) {
    const value = Number.parseInt(hours, 10) * 3600 + Number.parseInt(minutes, 10) * 60 + Number.parseFloat(rest)
    return Number.isFinite(value) ? value : undefined
  }
  return undefined
}
