/**
 * Shared HTTP and URL utilities for the crate sources
 */

import { ofetch } from 'ofetch'
import { version } from '../version.ts'

const USER_AGENT = `crate-scout/${version}`

/** Timeout for crates.io and docs.rs requests */
export const REGISTRY_TIMEOUT = 12_000
/** Timeout for the supplementary crate root lookup */
export const BACKFILL_TIMEOUT = 10_000
/** Timeout for github.com pages and raw content */
export const GITHUB_TIMEOUT = 10_000
/** Timeout for default-branch README probes */
export const PROBE_TIMEOUT = 8_000

export const $fetch = ofetch.create({
  retry: 0,
  timeout: REGISTRY_TIMEOUT,
  headers: { 'User-Agent': USER_AGENT },
})

/**
 * Fetch text content from URL, `null` on any failure
 */
export async function fetchText(url: string, timeout = REGISTRY_TIMEOUT): Promise<string | null> {
  return $fetch(url, { responseType: 'text', timeout }).catch(() => null)
}

/**
 * Human-readable cause of a failed ofetch call
 */
export function describeFetchError(error: unknown): string {
  if (!(error instanceof Error))
    return String(error)
  const cause = error.cause instanceof Error ? error.cause : undefined
  if (error.name === 'TimeoutError' || cause?.name === 'TimeoutError' || cause?.name === 'AbortError')
    return 'timeout'
  if ('statusCode' in error && typeof error.statusCode === 'number')
    return `HTTP ${error.statusCode}`
  return `network error: ${error.message}`
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Read a string field, ignoring empty strings */
export function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key]
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

/** Collapse runs of whitespace into single spaces */
export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ')
}

/**
 * Normalize git repo URL to https
 */
export function normalizeRepoUrl(url: string): string {
  return url
    .trim()
    .replace(/^git\+/, '')
    .replace(/#.*$/, '')
    .replace(/\.git$/, '')
    .replace(/^git:\/\//, 'https://')
    .replace(/^ssh:\/\/git@github\.com/, 'https://github.com')
}
