/**
 * Argument helpers for the CLI entry
 */

import { hasTTY, isCI } from 'std-env'
import { parseCount } from './core/config.ts'
import { version } from './version.ts'

/** Check if the current environment supports the interactive summary */
export function isInteractive(): boolean {
  return hasTTY && !isCI
}

/** Crate names from positional args, space or comma-separated, deduplicated in order */
export function parseCrateNames(inputs: Array<string | undefined>): string[] {
  return [...new Set(
    inputs
      .flatMap(s => (s ?? '').split(/[,\s]+/))
      .map(s => s.trim())
      .filter(Boolean),
  )]
}

/**
 * Parse a numeric flag; exits on invalid input
 */
export function parseCountFlag(value: string | undefined, flag: string, min = 0): number | undefined {
  if (value === undefined || value === '')
    return undefined
  const n = parseCount(value, min)
  if (n === undefined) {
    console.error(`Error: ${flag} expects an integer >= ${min}, got "${value}"`)
    process.exit(1)
  }
  return n
}

export function introLine(crateCount: number): string {
  const name = '\x1B[1m\x1B[35mcrate-scout\x1B[0m'
  const ver = `\x1B[90mv${version}\x1B[0m`
  return `${name} ${ver} \x1B[90m· ${crateCount} crate${crateCount === 1 ? '' : 's'}\x1B[0m`
}
