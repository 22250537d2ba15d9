import type { PlaybookRun, RankedTask } from '../core/types'

export const DEFAULT_TOP_N = 20

/**
 * Slowest tasks first. Tasks without a duration are left out; equal durations
 * keep the order they were encountered in.
 */
export function rankTasksByDuration(run: PlaybookRun, topN: number = DEFAULT_TOP_N): RankedTask[] {
  const timed: RankedTask[] = []
  for (const play of run.plays) {
    for (const task of play.tasks) {
      if (task.durationSeconds === undefined) continue
      timed.push({ task: task.name, play: play.name, duration_seconds: task.durationSeconds })
    }
  }

  // Array.prototype.sort is stable
  return timed.sort((a, b) => b.duration_seconds - a.duration_seconds).slice(0, Math.max(0, topN))
}
