import type { MindmapReport } from '../../core/types'

export interface JSONReporterOptions {
  prettyPrint?: boolean
}

/**
 * Emits the report exactly as the upload endpoint returns it
 */
export class JSONReporter {
  private options: Required<JSONReporterOptions>

  constructor(options: JSONReporterOptions = {}) {
    this.options = {
      prettyPrint: options.prettyPrint ?? false,
    }
  }

  generate(report: MindmapReport): string {
    if (this.options.prettyPrint) {
      return JSON.stringify(report, null, 2)
    }

    return JSON.stringify(report)
  }
}
