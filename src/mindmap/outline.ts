import type { HostResult, NodeGroup, Play, PlaybookRun, Task } from '../core/types'
import { STATUS_MEANINGS } from './status-meanings'

interface OutlineBase {
  id: string
  parentId?: string
  label: string
  title: string
  group: NodeGroup
}

export type OutlineEntry =
  | (OutlineBase & { kind: 'play'; depth: 0; play: Play })
  | (OutlineBase & { kind: 'task'; depth: 1; task: Task; play: Play })
  | (OutlineBase & { kind: 'host'; depth: 2; host: HostResult; task: Task })

// Ids come from the position in the tree so the same input always yields the same graph
export const playId = (playIndex: number) => `p${playIndex}`
export const taskId = (playIndex: number, taskIndex: number) => `${playId(playIndex)}.t${taskIndex}`
export const hostId = (playIndex: number, taskIndex: number, hostIndex: number) =>
  `${taskId(playIndex, taskIndex)}.h${hostIndex}`

export function taskLabel(task: Task, taskIndex: number): string {
  return `${String(taskIndex + 1).padStart(2, '0')}. ${task.name}`
}

export function hostLabel(host: HostResult): string {
  return `${host.host}: ${host.status}`
}

export function formatSeconds(seconds: number): string {
  const rounded = Math.round(seconds * 1000) / 1000
  if (rounded < 60) return `${rounded}s`

  const minutes = Math.floor(rounded / 60)
  const rest = Math.round((rounded - minutes * 60) * 1000) / 1000
  if (minutes < 60) return `${minutes}m ${rest}s`

  return `${Math.floor(minutes / 60)}h ${minutes % 60}m ${rest}s`
}

function playTitle(play: Play): string {
  const count = play.tasks.length
  return `Play: ${play.name} (${count} ${count === 1 ? 'task' : 'tasks'})`
}

function taskTitle(task: Task): string {
  const parts = [`Task: ${task.name}`]
  if (task.durationSeconds !== undefined) {
    parts.push(`duration: ${formatSeconds(task.durationSeconds)}`)
  }
  return parts.join(' | ')
}

function hostTitle(host: HostResult): string {
  const parts = [`Host: ${host.host}`, `${host.status}: ${STATUS_MEANINGS[host.status]}`]
  if (host.error) {
    parts.push(`error: ${host.error}`)
  }
  for (const [key, value] of Object.entries(host.details ?? {})) {
    parts.push(`${key}: ${String(value)}`)
  }
  return parts.join(' | ')
}

/**
 * Depth-first walk of a run: each play, then each of its tasks followed by
 * that task's hosts. Every view that lists the tree uses this order.
 */
export function* outline(run: PlaybookRun): Generator<OutlineEntry> {
  for (const [playIndex, play] of run.plays.entries()) {
    const pid = playId(playIndex)
    yield { kind: 'play', depth: 0, id: pid, label: play.name, title: playTitle(play), group: 'play', play }

    for (const [taskIndex, task] of play.tasks.entries()) {
      const tid = taskId(playIndex, taskIndex)
      yield {
        kind: 'task',
        depth: 1,
        id: tid,
        parentId: pid,
        label: taskLabel(task, taskIndex),
        title: taskTitle(task),
        group: 'task',
        task,
        play,
      }

      for (const [hostIndex, host] of task.hosts.entries()) {
        yield {
          kind: 'host',
          depth: 2,
          id: hostId(playIndex, taskIndex, hostIndex),
          parentId: tid,
          label: hostLabel(host),
          title: hostTitle(host),
          group: `host-${host.status}`,
          host,
          task,
        }
      }
    }
  }
}
