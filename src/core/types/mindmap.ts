import type { HostRecap, HostStatus, InputFormat, ScalarValue } from './playbook'

export type NodeGroup = 'play' | 'task' | `host-${HostStatus}`

// vis-network node; `level` drives the hierarchical layout
export interface GraphNode {
  id: string
  label: string
  title: string
  group: NodeGroup
  level: 0 | 1 | 2
}

export interface GraphEdge {
  from: string
  to: string
}

export interface Graph {
  nodes: GraphNode[]
  edges: GraphEdge[]
}

export interface NestedHost {
  id: string
  label: string
  host: string
  status: HostStatus
  error?: string
  /** Scalar fields of the raw host result, JSON input only */
  details?: Record<string, ScalarValue>
}

export interface NestedTask {
  id: string
  label: string
  name: string
  duration_seconds?: number
  hosts: NestedHost[]
}

export interface NestedPlay {
  id: string
  label: string
  name: string
  tasks: NestedTask[]
}

export interface NestedPlaybook {
  plays: NestedPlay[]
}

export interface RankedTask {
  task: string
  play: string
  duration_seconds: number
}

export interface ReportStats {
  plays: number
  tasks: number
  hosts: number
  timedTasks: number
  skippedLines: number
}

/**
 * Response payload of the upload endpoint and the `analyze --format json` command
 */
export interface MindmapReport extends Graph {
  nested_json: NestedPlaybook
  markdown: string
  top_tasks: RankedTask[]
  status_meanings: Record<string, string>
  recap: HostRecap[]
  format: InputFormat
  warnings: string[]
  stats: ReportStats
}
