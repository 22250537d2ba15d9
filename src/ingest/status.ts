import type { HostStatus } from '../core/types'

// Keywords ansible prints (or stores) for a host result, mapped to the normalized status
const STATUS_KEYWORDS = new Map<string, HostStatus>([
  ['ok', 'ok'],
  ['changed', 'changed'],
  ['skipping', 'skipped'],
  ['skipped', 'skipped'],
  ['fatal', 'failed'],
  ['failed', 'failed'],
  ['unreachable', 'unreachable'],
  ['rescued', 'rescued'],
  ['ignored', 'ignored'],
])

const SEVERITY: Record<HostStatus, number> = {
  skipped: 0,
  ok: 1,
  changed: 2,
  rescued: 3,
  ignored: 4,
  unreachable: 5,
  failed: 6,
}

export function statusFromKeyword(keyword: string): HostStatus | undefined {
  return STATUS_KEYWORDS.get(keyword.toLowerCase())
}

/** Returns whichever of the two statuses should win when one host reports twice in a task */
export function mostSevere(current: HostStatus, incoming: HostStatus): HostStatus {
  return SEVERITY[incoming] > SEVERITY[current] ? incoming : current
}

export function carriesError(status: HostStatus): boolean {
  return status === 'failed' || status === 'unreachable' || status === 'ignored'
}
