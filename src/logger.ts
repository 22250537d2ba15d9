import pino from 'pino'

function defaultLevel(): string {
  if (process.env.PLAYMAP_LOG_LEVEL) return process.env.PLAYMAP_LOG_LEVEL
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info'
}

// stderr, so stdout carries only command output such as `analyze --format json`
export const logDestination = pino.destination(2)

export const logger = pino(
  {
    name: 'playmap',
    level: defaultLevel(),
  },
  logDestination,
)

export type Logger = typeof logger

export function setLogLevel(level: string): void {
  logger.level = level
}
