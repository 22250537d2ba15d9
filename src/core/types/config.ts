import { z } from 'zod'

const regexSource = (fallback: string) =>
  z
    .string()
    .min(1)
    .default(fallback)
    .refine(
      (source) => {
        try {
          new RegExp(source)
          return true
        } catch {
          return false
        }
      },
      { message: 'Must be a valid regular expression' },
    )

// Line grammar of the text parser. Capture groups are documented per entry.
export const PatternSetSchema = z.object({
  /** group 1: play name */
  play: regexSource('^PLAY \\[(.*)\\]'),
  /** group 1: task name (TASK or RUNNING HANDLER headers) */
  task: regexSource('^(?:TASK|RUNNING HANDLER) \\[(.*)\\]'),
  /** group 1: status keyword, group 2: host, group 3: trailing text */
  hostResult: regexSource(
    '^(ok|changed|skipping|skipped|fatal|failed|unreachable|rescued|ignored): \\[([^\\]]+)\\](.*)$',
  ),
  /** group 1: seconds, or groups 2-4: h, mm, ss.fff */
  duration: regexSource('\\((\\d+(?:\\.\\d+)?)s\\)|\\((\\d+):(\\d{2}):(\\d{2}(?:\\.\\d+)?)\\)'),
  ignoring: regexSource('^\\.\\.\\.ignoring$'),
  recap: regexSource('^PLAY RECAP'),
  /** group 1: host, group 2: the `key=value` pairs */
  recapLine: regexSource('^(\\S+)\\s*:\\s*(\\S+=\\S+(?:\\s+\\S+=\\S+)*)\\s*$'),
})

export type PatternSet = z.infer<typeof PatternSetSchema>

export const ServerConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(5000),
})

export const UploadConfigSchema = z.object({
  maxBytes: z
    .number()
    .int()
    .positive()
    .default(10 * 1024 * 1024),
  allowedExtensions: z
    .array(z.string().regex(/^\.[a-z0-9]+$/i, 'Extensions must look like ".json"'))
    .min(1, 'At least one extension is required')
    .default(['.json', '.txt']),
})

export const AnalysisConfigSchema = z.object({
  topN: z.number().int().positive().default(20),
})

export const AppConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  upload: UploadConfigSchema.default({}),
  analysis: AnalysisConfigSchema.default({}),
  patterns: PatternSetSchema.default({}),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
})

export type AppConfig = z.infer<typeof AppConfigSchema>
export type UploadConfig = z.infer<typeof UploadConfigSchema>
export type ServerConfig = z.infer<typeof ServerConfigSchema>
