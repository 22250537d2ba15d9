import pc from 'picocolors'
import { HOST_STATUSES, type HostStatus, type MindmapReport, type RankedTask } from '../../core/types'
import { formatSeconds } from '../../mindmap'

export interface CLIReporterOptions {
  showColors?: boolean
  maxNameLength?: number
}

const FAILURE_STATUSES: ReadonlySet<HostStatus> = new Set(['failed', 'unreachable'])

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}

/**
 * Human-readable summary of an analyzed playbook run: header, slowest-task
 * table, host status totals and any warnings.
 */
export class CLIReporter {
  private options: Required<CLIReporterOptions>

  constructor(options: CLIReporterOptions = {}) {
    this.options = {
      showColors: options.showColors ?? true,
      maxNameLength: options.maxNameLength ?? 60,
    }
  }

  generate(report: MindmapReport): string {
    const lines: string[] = []

    lines.push(this.formatHeader(report))
    lines.push('')

    if (report.top_tasks.length > 0) {
      lines.push(this.colorize('Slowest tasks:', 'blue'))
      lines.push(this.formatTable(report.top_tasks))
    } else {
      lines.push('No task durations found')
    }
    lines.push('')

    lines.push(this.formatSummary(report))

    return lines.join('\n')
  }

  print(report: MindmapReport): void {
    // eslint-disable-next-line no-console
    console.log(this.generate(report))
  }

  private formatHeader(report: MindmapReport): string {
    const counts = this.countStatuses(report)
    const failures = [...FAILURE_STATUSES].reduce((sum, status) => sum + counts[status], 0)
    const status = failures > 0 ? this.colorize('✗ FAILURES', 'red') : this.colorize('✓ OK', 'green')
    const { plays, tasks, hosts } = report.stats

    return `${status} ${plural(plays, 'play')}, ${plural(tasks, 'task')}, ${plural(hosts, 'host result')} (${report.format})`
  }

  private formatTable(rows: RankedTask[]): string {
    const headers = ['#', 'Task', 'Play', 'Duration']
    const cells = rows.map((row, index) => [
      String(index + 1),
      this.truncate(row.task),
      this.truncate(row.play),
      formatSeconds(row.duration_seconds),
    ])

    const widths = headers.map((header, column) =>
      Math.max(6, header.length, ...cells.map((cell) => (cell[column] ?? '').length)),
    )

    const lines = [this.formatRow(headers, widths), this.formatSeparator(widths)]
    for (const row of cells) {
      lines.push(this.formatRow(row, widths))
    }
    return lines.join('\n')
  }

  private formatRow(cells: string[], widths: number[]): string {
    return cells.map((cell, index) => cell + ' '.repeat(Math.max(0, (widths[index] ?? 0) - cell.length))).join(' | ')
  }

  private formatSeparator(widths: number[]): string {
    return widths.map((width) => '-'.repeat(width)).join('-+-')
  }

  private formatSummary(report: MindmapReport): string {
    const lines: string[] = []
    const counts = this.countStatuses(report)
    const totals = HOST_STATUSES.filter((status) => counts[status] > 0).map((status) =>
      this.colorStatus(status, `${status}=${counts[status]}`),
    )

    lines.push(`Host results: ${totals.length > 0 ? totals.join(' ') : 'none'}`)

    if (report.stats.skippedLines > 0) {
      lines.push(`Unrecognized lines skipped: ${report.stats.skippedLines}`)
    }

    if (report.warnings.length > 0) {
      lines.push('')
      lines.push(this.colorize('Warnings:', 'yellow'))
      for (const warning of report.warnings) {
        lines.push(`  • ${warning}`)
      }
    }

    return lines.join('\n')
  }

  private countStatuses(report: MindmapReport): Record<HostStatus, number> {
    const counts: Record<HostStatus, number> = {
      ok: 0,
      changed: 0,
      failed: 0,
      skipped: 0,
      unreachable: 0,
      rescued: 0,
      ignored: 0,
    }
    for (const play of report.nested_json.plays) {
      for (const task of play.tasks) {
        for (const host of task.hosts) {
          counts[host.status]++
        }
      }
    }
    return counts
  }

  private colorStatus(status: HostStatus, text: string): string {
    switch (status) {
      case 'ok':
        return this.colorize(text, 'green')
      case 'changed':
      case 'ignored':
      case 'rescued':
        return this.colorize(text, 'yellow')
      case 'failed':
      case 'unreachable':
        return this.colorize(text, 'red')
      default:
        return text
    }
  }

  private truncate(text: string): string {
    if (text.length <= this.options.maxNameLength) {
      return text
    }
    return text.slice(0, this.options.maxNameLength - 3) + '...'
  }

  private colorize(text: string, color: 'green' | 'red' | 'yellow' | 'blue'): string {
    if (!this.options.showColors) {
      return text
    }

    switch (color) {
      case 'green':
        return pc.green(text)
      case 'red':
        return pc.red(text)
      case 'yellow':
        return pc.yellow(text)
      case 'blue':
        return pc.blue(text)
    }
  }
}
