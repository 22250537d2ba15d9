import type { NestedHost, NestedPlaybook, NestedTask, PlaybookRun } from '../core/types'
import { hostId, hostLabel, playId, taskId, taskLabel } from './outline'

/**
 * Same hierarchy as the graph as plain nested objects, with the graph's ids
 * and labels so the two can be cross-referenced.
 */
export function buildNested(run: PlaybookRun): NestedPlaybook {
  return {
    plays: run.plays.map((play, playIndex) => ({
      id: playId(playIndex),
      label: play.name,
      name: play.name,
      tasks: play.tasks.map((task, taskIndex): NestedTask => {
        const hosts = task.hosts.map(
          (host, hostIndex): NestedHost => ({
            id: hostId(playIndex, taskIndex, hostIndex),
            label: hostLabel(host),
            host: host.host,
            status: host.status,
            ...(host.error !== undefined ? { error: host.error } : {}),
            ...(host.details !== undefined ? { details: { ...host.details } } : {}),
          }),
        )
        return {
          id: taskId(playIndex, taskIndex),
          label: taskLabel(task, taskIndex),
          name: task.name,
          ...(task.durationSeconds !== undefined ? { duration_seconds: task.durationSeconds } : {}),
          hosts,
        }
      }),
    })),
  }
}
