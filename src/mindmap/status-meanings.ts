import type { HostStatus } from '../core/types'

/**
 * Explanations shown next to host results in the viewer legend
 */
export const STATUS_MEANINGS = {
  ok: 'Task succeeded (no error)',
  changed: 'Task made changes on target host',
  failed: 'Task failed',
  fatal: 'Task failed',
  skipped: 'Task was skipped',
  unreachable: 'Host was unreachable',
  rescued: "Task failed but rescued by 'rescue' block",
  ignored: "Failure ignored via 'ignore_errors'",
} as const satisfies Record<HostStatus | 'fatal', string>
