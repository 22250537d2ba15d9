import type { Graph, GraphEdge, GraphNode, PlaybookRun } from '../core/types'
import { outline } from './outline'

/**
 * One node per play, task and host result, with play→task and task→host edges
 */
export function buildGraph(run: PlaybookRun): Graph {
  const nodes: GraphNode[] = []
  const edges: GraphEdge[] = []

  for (const entry of outline(run)) {
    nodes.push({ id: entry.id, label: entry.label, title: entry.title, group: entry.group, level: entry.depth })
    if (entry.parentId) {
      edges.push({ from: entry.parentId, to: entry.id })
    }
  }

  return { nodes, edges }
}
