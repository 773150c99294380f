export type VersionCheck = 'ok' | 'below_min' | 'above_max'

export interface VersionRange {
  minimum: string
  // Inclusive; omitted means no upper bound.
  maximum?: string
}

export interface VersionSpec extends VersionRange {
  probe: () => Promise<string>
}

export const NOT_INSTALLED = '0.0.0'

/** Probe output -> comparable version; empty or non-numeric output counts as not installed. */
export function normalizeVersion(raw: string): string {
  const trimmed = raw.trim().replace(/^v/i, '')
  return /^\d/.test(trimmed) ? trimmed : NOT_INSTALLED
}

function segments(version: string): number[] {
  return normalizeVersion(version)
    .split('.')
    .map((part) => {
      const n = parseInt(part, 10)
      return Number.isNaN(n) ? 0 : n
    })
}

export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const left = segments(a)
  const right = segments(b)
  const len = Math.max(left.length, right.length)
  for (let i = 0; i < len; i++) {
    const l = left[i] ?? 0
    const r = right[i] ?? 0
    if (l < r) return -1
    if (l > r) return 1
  }
  return 0
}

export function checkVersion(installed: string, range: VersionRange): VersionCheck {
  if (compareVersions(installed, range.minimum) < 0) return 'below_min'
  if (range.maximum !== undefined && compareVersions(installed, range.maximum) > 0) return 'above_max'
  return 'ok'
}

export function describeRange(range: VersionRange): string {
  return range.maximum === undefined ? `>= ${range.minimum}` : `${range.minimum} - ${range.maximum}`
}
