import { describe, it, expect } from '@jest/globals'
import type { PlaybookRun, Task } from '../core/types'
import { rankTasksByDuration } from './duration-ranking'

const createRun = (plays: Array<{ name: string; tasks: Task[] }>): PlaybookRun => ({
  format: 'text',
  plays,
  recap: [],
  warnings: [],
  skippedLines: 0,
})

const timedTask = (name: string, durationSeconds?: number): Task =>
  durationSeconds === undefined ? { name, hosts: [] } : { name, durationSeconds, hosts: [] }

describe('rankTasksByDuration', () => {
  it('should sort slowest first and name the owning play', () => {
    const run = createRun([
      { name: 'web', tasks: [timedTask('fast', 1.5), timedTask('slow', 12.345)] },
      { name: 'db', tasks: [timedTask('medium', 5)] },
    ])

    expect(rankTasksByDuration(run)).toEqual([
      { task: 'slow', play: 'web', duration_seconds: 12.345 },
      { task: 'medium', play: 'db', duration_seconds: 5 },
      { task: 'fast', play: 'web', duration_seconds: 1.5 },
    ])
  })

  it('should leave out tasks without a duration instead of treating them as zero', () => {
    const run = createRun([{ name: 'p', tasks: [timedTask('untimed'), timedTask('zero', 0)] }])

    expect(rankTasksByDuration(run)).toEqual([{ task: 'zero', play: 'p', duration_seconds: 0 }])
  })

  it('should keep encounter order for ties', () => {
    const run = createRun([
      { name: 'p1', tasks: [timedTask('a', 2), timedTask('b', 3), timedTask('c', 2)] },
      { name: 'p2', tasks: [timedTask('d', 2)] },
    ])

    expect(rankTasksByDuration(run).map((entry) => entry.task)).toEqual(['b', 'a', 'c', 'd'])
  })

  it('should return at most 20 entries by default', () => {
    const tasks = Array.from({ length: 30 }, (_, i) => timedTask(`t${i}`, i))
    const ranking = rankTasksByDuration(createRun([{ name: 'p', tasks }]))

    expect(ranking).toHaveLength(20)
    expect(ranking[0]).toEqual({ task: 't29', play: 'p', duration_seconds: 29 })
    expect(ranking[19]).toEqual({ task: 't10', play: 'p', duration_seconds: 10 })
    const durations = ranking.map((entry) => entry.duration_seconds)
    expect(durations).toEqual([...durations].sort((a, b) => b - a))
  })

  it('should honour a custom limit', () => {
    const tasks = [timedTask('a', 1), timedTask('b', 2), timedTask('c', 3)]

    expect(rankTasksByDuration(createRun([{ name: 'p', tasks }]), 2).map((e) => e.task)).toEqual(['c', 'b'])
  })

  it('should return an empty ranking for an empty run', () => {
    expect(rankTasksByDuration(createRun([]))).toEqual([])
  })
})
