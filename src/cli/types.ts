/**
 * CLI command definitions and interfaces
 */

export interface BaseArgs {
  config?: string
  verbose?: boolean
  quiet?: boolean
}

export type OutputFormat = 'cli' | 'json' | 'markdown'

export interface AnalyzeArgs extends BaseArgs {
  file: string
  format: OutputFormat
  input: 'auto' | 'json' | 'text'
  top?: number
}

export interface ServeArgs extends BaseArgs {
  port?: number
  host?: string
}

export interface PrintConfigArgs extends BaseArgs {
  format?: string
}
