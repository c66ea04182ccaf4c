/**
 * Crate version ordering
 */

export interface ParsedVersion {
  /** Numeric segments, most significant first */
  segments: number[]
  prerelease: boolean
  raw: string
}

/**
 * Split a version into numeric segments and a prerelease flag.
 * - `0.4.2` → `[0, 4, 2]`, stable
 * - `0.10.0-rc0` → `[0, 10, 0]`, prerelease
 *
 * A dot-segment without a leading digit counts as `0` and flags the version
 * as prerelease, so `1.0.beta` ranks below `1.0.0`.
 */
export function parseVersion(version: string): ParsedVersion {
  const raw = version.trim()
  const dash = raw.indexOf('-')
  const main = dash === -1 ? raw : raw.slice(0, dash)
  let prerelease = dash !== -1 && raw.length > dash + 1

  const segments = main.split('.').map((seg) => {
    const digits = seg.match(/^\d+/)?.[0]
    if (digits === undefined) {
      prerelease = true
      return 0
    }
    return Number(digits)
  })

  return { segments, prerelease, raw }
}

/**
 * Order two versions: negative when `a` ranks below `b`, positive when above,
 * `0` when equal-ranked (same numbers, same prerelease flag).
 */
export function compareVersions(a: string, b: string): number {
  const pa = parseVersion(a)
  const pb = parseVersion(b)
  const len = Math.max(pa.segments.length, pb.segments.length)
  for (let i = 0; i < len; i++) {
    const diff = (pa.segments[i] ?? 0) - (pb.segments[i] ?? 0)
    if (diff !== 0)
      return diff > 0 ? 1 : -1
  }
  if (pa.prerelease !== pb.prerelease)
    return pa.prerelease ? -1 : 1
  return 0
}

export function isVersionGreater(a: string, b: string): boolean {
  return compareVersions(a, b) > 0
}

export interface VersionCandidate {
  num: string
  yanked: boolean
}

/** Highest non-yanked candidate; the first of equal-ranked candidates wins */
export function pickBestVersion(candidates: Iterable<VersionCandidate>): string | null {
  let best: string | null = null
  for (const { num, yanked } of candidates) {
    if (yanked)
      continue
    if (best === null || isVersionGreater(num, best))
      best = num
  }
  return best
}
