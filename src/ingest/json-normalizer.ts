import type { HostRecap, HostResult, HostStatus, Play, PlaybookRun, ScalarValue, Task } from '../core/types'
import { cleanLabel } from './clean-label'
import { carriesError, statusFromKeyword } from './status'

type JsonObject = Record<string, unknown>

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function objectAt(source: JsonObject, key: string): JsonObject | undefined {
  const value = source[key]
  return isObject(value) ? value : undefined
}

function firstArray(source: JsonObject, keys: readonly string[]): unknown[] | undefined {
  for (const key of keys) {
    const value = source[key]
    if (Array.isArray(value)) return value
  }
  return undefined
}

function firstLabel(...candidates: unknown[]): string {
  for (const candidate of candidates) {
    const label = cleanLabel(candidate)
    if (label) return label
  }
  return ''
}

/**
 * Maps structured playbook output onto the normalized model. Accepts the
 * `json` stdout callback layout (`plays[].play`, `plays[].tasks[].task`,
 * `plays[].tasks[].hosts`, `stats`) and the flatter variants other exporters
 * write (`name`, `tasks_results`, `duration_seconds`, `playbook_recap`).
 */
export function normalizeJson(document: unknown): PlaybookRun {
  const warnings: string[] = []

  if (!isObject(document)) {
    warnings.push('JSON input must be an object with a "plays" array')
    return { format: 'json', plays: [], recap: [], warnings, skippedLines: 0 }
  }

  const rawPlays = document.plays
  const plays: Play[] = []
  if (Array.isArray(rawPlays)) {
    rawPlays.forEach((rawPlay, index) => {
      const play = normalizePlay(rawPlay, index, warnings)
      if (play) plays.push(play)
    })
  } else {
    warnings.push('JSON input has no "plays" array')
  }

  return {
    format: 'json',
    plays,
    recap: normalizeRecap(objectAt(document, 'stats') ?? objectAt(document, 'playbook_recap'), warnings),
    warnings,
    skippedLines: 0,
  }
}

function normalizePlay(rawPlay: unknown, index: number, warnings: string[]): Play | undefined {
  if (!isObject(rawPlay)) {
    warnings.push(`plays[${index}] is not an object; skipped`)
    return undefined
  }

  const name = firstLabel(rawPlay.name, objectAt(rawPlay, 'play')?.name) || `Play ${index + 1}`
  const rawTasks = firstArray(rawPlay, ['tasks', 'tasks_results', 'tasks_list']) ?? []

  const tasks: Task[] = []
  rawTasks.forEach((rawTask, taskIndex) => {
    const task = normalizeTask(rawTask, taskIndex, `plays[${index}].tasks[${taskIndex}]`, warnings)
    if (task) tasks.push(task)
  })

  return { name, tasks }
}

function normalizeTask(rawTask: unknown, index: number, path: string, warnings: string[]): Task | undefined {
  if (typeof rawTask === 'string') {
    return { name: cleanLabel(rawTask) || `Task ${index + 1}`, hosts: [] }
  }
  if (!isObject(rawTask)) {
    warnings.push(`${path} is not an object; skipped`)
    return undefined
  }

  const inner = objectAt(rawTask, 'task')
  const name = firstLabel(rawTask.name, inner?.name, rawTask.action, inner?.action) || `Task ${index + 1}`
  const hosts = normalizeHosts(objectAt(rawTask, 'hosts'))
  const durationSeconds = readDuration(rawTask) ?? (inner ? readDuration(inner) : undefined)

  return durationSeconds === undefined ? { name, hosts } : { name, durationSeconds, hosts }
}

/**
 * First match wins: `duration` seconds, `duration_seconds`, `duration.elapsed`,
 * then `duration.start`/`duration.end` timestamps.
 */
export function readDuration(source: JsonObject): number | undefined {
  const duration = source.duration
  if (typeof duration === 'number') {
    return validDuration(duration)
  }

  const seconds = source.duration_seconds
  if (typeof seconds === 'number' || (typeof seconds === 'string' && seconds.trim() !== '')) {
    return validDuration(Number(seconds))
  }

  if (isObject(duration)) {
    const elapsed = duration.elapsed
    if (typeof elapsed === 'number' || typeof elapsed === 'string') {
      return validDuration(Number(elapsed))
    }
    if (typeof duration.start === 'string' && typeof duration.end === 'string') {
      const start = Date.parse(duration.start)
      const end = Date.parse(duration.end)
      return validDuration((end - start) / 1000)
    }
  }

  return undefined
}

function validDuration(value: number): number | undefined {
  return Number.isFinite(value) && value >= 0 ? value : undefined
}

function normalizeHosts(rawHosts: JsonObject | undefined): HostResult[] {
  if (!rawHosts) return []

  const hosts: HostResult[] = []
  for (const [host, result] of Object.entries(rawHosts)) {
    const name = cleanLabel(host)
    if (!name) continue

    if (!isObject(result)) {
      const status = typeof result === 'string' ? statusFromKeyword(result) : undefined
      hosts.push({ host: name, status: status ?? 'ok' })
      continue
    }

    const status = deriveStatus(result)
    const error = carriesError(status) ? readError(result) : undefined
    const details = scalarDetails(result)
    hosts.push({
      host: name,
      status,
      ...(error !== undefined ? { error } : {}),
      ...(Object.keys(details).length > 0 ? { details } : {}),
    })
  }
  return hosts
}

function deriveStatus(result: JsonObject): HostStatus {
  if (typeof result.status === 'string') {
    const explicit = statusFromKeyword(result.status)
    if (explicit) return explicit
  }

  if (result.unreachable === true) return 'unreachable'
  if (result.failed === true) {
    return result.ignore_errors === true || result.failed_when_result === false ? 'ignored' : 'failed'
  }
  if (result.skipped === true) return 'skipped'
  if (result.rescued === true) return 'rescued'
  if (result.changed === true) return 'changed'
  return 'ok'
}

function readError(result: JsonObject): string | undefined {
  for (const key of ['msg', 'stderr', 'reason']) {
    const value = result[key]
    if (typeof value === 'string') {
      if (value.trim()) return value
    } else if (value !== undefined && value !== null) {
      return JSON.stringify(value)
    }
  }
  return undefined
}

function scalarDetails(result: JsonObject): Record<string, ScalarValue> {
  const details: Record<string, ScalarValue> = {}
  for (const [key, value] of Object.entries(result)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      details[key] = value
    }
  }
  return details
}

function normalizeRecap(rawRecap: JsonObject | undefined, warnings: string[]): HostRecap[] {
  if (!rawRecap) return []

  const recap: HostRecap[] = []
  for (const [host, rawCounters] of Object.entries(rawRecap)) {
    if (!isObject(rawCounters)) {
      warnings.push(`stats.${host} is not an object; skipped`)
      continue
    }
    const counters: Record<string, number> = {}
    for (const [key, value] of Object.entries(rawCounters)) {
      const count = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : Number.NaN
      if (Number.isFinite(count)) counters[key] = count
    }
    recap.push({ host, counters })
  }
  return recap
}
