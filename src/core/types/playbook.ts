// Normalized shape of one ansible-playbook run, independent of the input format

export const HOST_STATUSES = ['ok', 'changed', 'failed', 'skipped', 'unreachable', 'rescued', 'ignored'] as const

export type HostStatus = (typeof HOST_STATUSES)[number]

export type ScalarValue = string | number | boolean

export interface HostResult {
  readonly host: string
  readonly status: HostStatus
  readonly error?: string
  /** Scalar fields copied from a structured (JSON) result */
  readonly details?: Readonly<Record<string, ScalarValue>>
}

export interface Task {
  readonly name: string
  /** Seconds; absent when the input carries no timing for the task */
  readonly durationSeconds?: number
  readonly hosts: readonly HostResult[]
}

export interface Play {
  readonly name: string
  readonly tasks: readonly Task[]
}

// One line of the PLAY RECAP block (or the `stats` object of the json callback)
export interface HostRecap {
  readonly host: string
  readonly counters: Readonly<Record<string, number>>
}

export type InputFormat = 'json' | 'text'

export type DeclaredFormat = InputFormat | 'auto'

export interface PlaybookRun {
  readonly format: InputFormat
  readonly plays: readonly Play[]
  readonly recap: readonly HostRecap[]
  /** Recoverable problems met while normalizing; never fatal */
  readonly warnings: readonly string[]
  /** Text lines that matched none of the recognized patterns */
  readonly skippedLines: number
}
