import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'pathe'
import { DEFAULT_REGISTRY_URL } from '../sources/crates.ts'
import { DEFAULT_DOCS_HOST, DEFAULT_DOCS_MIRROR_HOST, DEFAULT_MAX_DOC_PAGES } from '../sources/docs-rs.ts'
import { DEFAULT_MAX_EXAMPLE_FILES } from '../sources/github.ts'

export interface ScoutConfig {
  maxDocPages: number
  maxExampleFiles: number
  /** Crates processed at once; unbounded by default */
  concurrency: number
  registryUrl: string
  docsHost: string
  docsMirrorHost: string
}

export const defaultConfig: ScoutConfig = {
  maxDocPages: DEFAULT_MAX_DOC_PAGES,
  maxExampleFiles: DEFAULT_MAX_EXAMPLE_FILES,
  concurrency: Number.POSITIVE_INFINITY,
  registryUrl: DEFAULT_REGISTRY_URL,
  docsHost: DEFAULT_DOCS_HOST,
  docsMirrorHost: DEFAULT_DOCS_MIRROR_HOST,
}

const CONFIG_DIR = join(homedir(), '.crate-scout')
export const CONFIG_PATH = join(CONFIG_DIR, 'config.yaml')

type NumericKey = 'maxDocPages' | 'maxExampleFiles' | 'concurrency'
type StringKey = 'registryUrl' | 'docsHost' | 'docsMirrorHost'

const NUMERIC_KEYS: readonly NumericKey[] = ['maxDocPages', 'maxExampleFiles', 'concurrency']
const STRING_KEYS: readonly StringKey[] = ['registryUrl', 'docsHost', 'docsMirrorHost']

function isNumericKey(key: string): key is NumericKey {
  return NUMERIC_KEYS.some(k => k === key)
}

function isStringKey(key: string): key is StringKey {
  return STRING_KEYS.some(k => k === key)
}

function unquote(raw: string): string {
  const value = raw.trim()
  if (value.length >= 2 && (value[0] === '"' || value[0] === '\'') && value.at(-1) === value[0])
    return value.slice(1, -1)
  return value
}

/** Parse a non-negative count; `concurrency` must also be at least 1 */
export function parseCount(raw: string, min = 0): number | undefined {
  if (!/^\d+$/.test(raw.trim()))
    return undefined
  const n = Number(raw)
  return n >= min ? n : undefined
}

/**
 * Parse flat `key: value` lines. Comments, unknown keys and invalid numbers are skipped.
 */
export function parseConfig(content: string): Partial<ScoutConfig> {
  const config: Partial<ScoutConfig> = {}
  for (const line of content.split('\n')) {
    const trimmed = line.replace(/\s+#.*$/, '').trim()
    if (!trimmed || trimmed.startsWith('#'))
      continue
    const colon = trimmed.indexOf(':')
    if (colon === -1)
      continue
    const key = trimmed.slice(0, colon).trim()
    const value = unquote(trimmed.slice(colon + 1))
    if (isNumericKey(key)) {
      const n = parseCount(value, key === 'concurrency' ? 1 : 0)
      if (n !== undefined)
        config[key] = n
    }
    else if (isStringKey(key) && value) {
      config[key] = value
    }
  }
  return config
}

export function readConfig(path = process.env.CRATE_SCOUT_CONFIG || CONFIG_PATH): Partial<ScoutConfig> {
  if (!existsSync(path))
    return {}
  return parseConfig(readFileSync(path, 'utf-8'))
}

/** Defaults < config file < explicit overrides */
export function resolveConfig(overrides: Partial<ScoutConfig> = {}, path?: string): ScoutConfig {
  const config: ScoutConfig = { ...defaultConfig, ...readConfig(path) }
  for (const key of NUMERIC_KEYS) {
    const value = overrides[key]
    if (value !== undefined)
      config[key] = value
  }
  for (const key of STRING_KEYS) {
    const value = overrides[key]
    if (value !== undefined)
      config[key] = value
  }
  return config
}
