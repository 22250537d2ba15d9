import type { HostRecap, HostResult, HostStatus, Play, PlaybookRun, Task } from '../core/types'
import { cleanLabel } from './clean-label'
import { type CompiledPatterns, compilePatterns, durationFromMatch } from './patterns'
import { carriesError, mostSevere, statusFromKeyword } from './status'

interface HostDraft {
  host: string
  status: HostStatus
  error?: string
}

interface TaskDraft {
  name: string
  durationSeconds?: number
  hosts: HostDraft[]
  hostIndex: Map<string, number>
  lastHost?: HostDraft
}

interface PlayDraft {
  name: string
  tasks: TaskDraft[]
}

/**
 * Line-oriented parser for the default stdout callback of ansible-playbook.
 * Lines that match none of the patterns are counted and skipped.
 */
export function parseText(content: string, patterns: CompiledPatterns = compilePatterns()): PlaybookRun {
  const plays: PlayDraft[] = []
  const recap: HostRecap[] = []
  const warnings: string[] = []
  let skippedLines = 0
  let currentPlay: PlayDraft | undefined
  let currentTask: TaskDraft | undefined
  let inRecap = false

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim()
    if (!line) continue

    if (inRecap) {
      const recapMatch = patterns.recapLine.exec(line)
      if (recapMatch) {
        const entry = parseRecapLine(recapMatch)
        if (entry) {
          recap.push(entry)
          continue
        }
      }
      inRecap = false
    }

    if (patterns.recap.test(line)) {
      inRecap = true
      currentTask = undefined
      continue
    }

    const playMatch = patterns.play.exec(line)
    if (playMatch) {
      currentPlay = { name: cleanLabel(playMatch[1]) || `Play ${plays.length + 1}`, tasks: [] }
      plays.push(currentPlay)
      currentTask = undefined
      continue
    }

    const taskMatch = patterns.task.exec(line)
    if (taskMatch) {
      if (!currentPlay) {
        skippedLines++
        continue
      }
      currentTask = {
        name: cleanLabel(taskMatch[1]) || `Task ${currentPlay.tasks.length + 1}`,
        hosts: [],
        hostIndex: new Map(),
      }
      const durationMatch = patterns.duration.exec(line.slice(taskMatch.index + taskMatch[0].length))
      const durationSeconds = durationMatch ? durationFromMatch(durationMatch) : undefined
      if (durationSeconds !== undefined) {
        currentTask.durationSeconds = durationSeconds
      }
      currentPlay.tasks.push(currentTask)
      continue
    }

    const hostMatch = patterns.hostResult.exec(line)
    if (hostMatch && currentTask) {
      if (!recordHostLine(currentTask, hostMatch)) {
        skippedLines++
      }
      continue
    }

    if (patterns.ignoring.test(line) && currentTask?.lastHost?.status === 'failed') {
      currentTask.lastHost.status = 'ignored'
      continue
    }

    skippedLines++
  }

  if (plays.length === 0) {
    warnings.push('No plays found in text input')
  }

  return {
    format: 'text',
    plays: plays.map(finishPlay),
    recap,
    warnings,
    skippedLines,
  }
}

function recordHostLine(task: TaskDraft, match: RegExpExecArray): boolean {
  const [, keyword = '', rawHost = '', trailing = ''] = match
  let status = statusFromKeyword(keyword)
  const host = cleanLabel(rawHost.split(' -> ')[0])
  if (!status || !host) return false

  if (status === 'failed' && trailing.includes('UNREACHABLE!')) {
    status = 'unreachable'
  }
  const error = carriesError(status) ? errorFromTrailing(trailing) : undefined

  const existingIndex = task.hostIndex.get(host)
  const existing = existingIndex === undefined ? undefined : task.hosts[existingIndex]
  if (!existing) {
    const draft: HostDraft = error === undefined ? { host, status } : { host, status, error }
    task.hostIndex.set(host, task.hosts.length)
    task.hosts.push(draft)
    task.lastHost = draft
    return true
  }

  const merged = mostSevere(existing.status, status)
  if (merged !== existing.status) {
    existing.status = merged
    if (error !== undefined) existing.error = error
  }
  task.lastHost = existing
  return true
}

/**
 * `fatal: [web1]: FAILED! => {"msg": "..."}` carries the result after `=>`.
 */
function errorFromTrailing(trailing: string): string | undefined {
  const arrow = trailing.indexOf('=>')
  if (arrow === -1) return undefined

  const payload = trailing.slice(arrow + 2).trim()
  if (!payload) return undefined

  try {
    const parsed: unknown = JSON.parse(payload)
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      for (const key of ['msg', 'stderr', 'reason']) {
        const value: unknown = Reflect.get(parsed, key)
        if (typeof value === 'string' && value.trim()) return value
      }
    }
  } catch {
    // not JSON; the raw text is the best message there is
  }
  return payload
}

function parseRecapLine(match: RegExpExecArray): HostRecap | undefined {
  const [, host, pairs] = match
  if (!host || !pairs) return undefined

  const counters: Record<string, number> = {}
  for (const pair of pairs.split(/\s+/)) {
    const separator = pair.indexOf('=')
    if (separator <= 0) continue
    const value = Number(pair.slice(separator + 1))
    if (Number.isFinite(value)) {
      counters[pair.slice(0, separator)] = value
    }
  }

  return Object.keys(counters).length > 0 ? { host, counters } : undefined
}

function finishPlay(play: PlayDraft): Play {
  return { name: play.name, tasks: play.tasks.map(finishTask) }
}

function finishTask(task: TaskDraft): Task {
  const hosts: HostResult[] = task.hosts.map(({ host, status, error }) =>
    error === undefined ? { host, status } : { host, status, error },
  )
  return task.durationSeconds === undefined
    ? { name: task.name, hosts }
    : { name: task.name, durationSeconds: task.durationSeconds, hosts }
}
