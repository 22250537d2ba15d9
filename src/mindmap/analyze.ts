import type { MindmapReport, PatternSet, PlaybookRun, ReportStats } from '../core/types'
import { normalize, type NormalizeInput } from '../ingest'
import { rankTasksByDuration, DEFAULT_TOP_N } from './duration-ranking'
import { buildGraph } from './graph-builder'
import { renderMarkdown } from './markdown'
import { buildNested } from './nested-builder'
import { STATUS_MEANINGS } from './status-meanings'

export interface AnalyzeOptions {
  /** Length of the slowest-task ranking (default: 20) */
  topN?: number
  /** Overrides for the text-log line grammar */
  patterns?: Partial<PatternSet>
}

export function summarize(run: PlaybookRun): ReportStats {
  let tasks = 0
  let hosts = 0
  let timedTasks = 0
  for (const play of run.plays) {
    tasks += play.tasks.length
    for (const task of play.tasks) {
      hosts += task.hosts.length
      if (task.durationSeconds !== undefined) timedTasks++
    }
  }
  return { plays: run.plays.length, tasks, hosts, timedTasks, skippedLines: run.skippedLines }
}

/**
 * Builds every view of an already normalized run
 */
export function buildReport(run: PlaybookRun, topN: number = DEFAULT_TOP_N): MindmapReport {
  const { nodes, edges } = buildGraph(run)
  return {
    nodes,
    edges,
    nested_json: buildNested(run),
    markdown: renderMarkdown(run),
    top_tasks: rankTasksByDuration(run, topN),
    status_meanings: { ...STATUS_MEANINGS },
    recap: run.recap.map((entry) => ({ host: entry.host, counters: { ...entry.counters } })),
    format: run.format,
    warnings: [...run.warnings],
    stats: summarize(run),
  }
}

/**
 * Upload-to-response transform: normalize the raw output, then build the graph,
 * nested, markdown and ranking views from the same run.
 */
export function analyzePlaybook(input: NormalizeInput, options: AnalyzeOptions = {}): MindmapReport {
  const run = normalize(input, options.patterns)
  return buildReport(run, options.topN)
}
