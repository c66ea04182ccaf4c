/**
 * crates.io registry lookup
 */

import type { CratesIoCrateResponse, CratesIoVersionsResponse, ResolvedCrate, ResolveResult } from './types.ts'
import type { VersionCandidate } from './versions.ts'
import { $fetch, BACKFILL_TIMEOUT, describeFetchError, isRecord, REGISTRY_TIMEOUT, stringField } from './utils.ts'
import { pickBestVersion } from './versions.ts'

export const DEFAULT_REGISTRY_URL = 'https://crates.io/api/v1'

export interface ResolveCrateOptions {
  /** crates.io API base, defaults to {@link DEFAULT_REGISTRY_URL} */
  registryUrl?: string
}

interface CrateFields {
  description?: string
  repository?: string
  documentation?: string
}

/** Cargo.toml dependency line for a crate */
export function dependencyLine(name: string, version: string): string {
  return `${name} = "${version}"`
}

function toResolved(name: string, version: string, fields: CrateFields): ResolvedCrate {
  return {
    name,
    version,
    description: fields.description,
    repository: fields.repository ?? fields.documentation,
    documentation: fields.documentation,
    dependencyLine: dependencyLine(name, version),
  }
}

function readCrateFields(record: Record<string, unknown>): CrateFields {
  return {
    description: stringField(record, 'description'),
    repository: stringField(record, 'repository'),
    documentation: stringField(record, 'documentation'),
  }
}

/**
 * Fetch the crate root record (`GET /crates/{name}`), returning its `crate` object
 */
async function fetchCrateRecord(name: string, registry: string, timeout: number): Promise<Record<string, unknown> | null> {
  const data = await $fetch<CratesIoCrateResponse>(`${registry}/crates/${name}`, { timeout })
  return isRecord(data) && isRecord(data.crate) ? data.crate : null
}

/**
 * Pick the highest non-yanked version from the full version list,
 * then backfill metadata from the crate root record.
 */
async function resolveFromVersionList(name: string, registry: string): Promise<ResolvedCrate | null> {
  const data = await $fetch<CratesIoVersionsResponse>(`${registry}/crates/${name}/versions`, { timeout: REGISTRY_TIMEOUT })
    .catch(() => null)
  if (!isRecord(data) || !Array.isArray(data.versions))
    return null

  const candidates: VersionCandidate[] = []
  const fields: CrateFields = {}
  for (const entry of data.versions) {
    if (!isRecord(entry))
      continue
    const num = stringField(entry, 'num')
    if (!num)
      continue
    const yanked = entry.yanked === true
    candidates.push({ num, yanked })
    if (yanked)
      continue
    fields.description ??= stringField(entry, 'description')
    if (!fields.repository && isRecord(entry.links))
      fields.repository = stringField(entry.links, 'repository')
  }

  const best = pickBestVersion(candidates)
  if (!best)
    return null

  const root = await fetchCrateRecord(name, registry, BACKFILL_TIMEOUT).catch(() => null)
  if (root) {
    const rootFields = readCrateFields(root)
    fields.description ??= rootFields.description
    fields.repository ??= rootFields.repository
    fields.documentation = rootFields.documentation
  }

  return toResolved(name, best, fields)
}

/**
 * Read `max_version` (or `newest_version`) straight from the crate root record
 */
async function resolveFromCrateRoot(name: string, registry: string): Promise<ResolveResult> {
  let record: Record<string, unknown> | null
  try {
    record = await fetchCrateRecord(name, registry, REGISTRY_TIMEOUT)
  }
  catch (error) {
    return { ok: false, error: `crates.io lookup for '${name}' failed: ${describeFetchError(error)}` }
  }

  if (!record)
    return { ok: false, error: `unexpected crates.io response shape for '${name}'` }

  const version = stringField(record, 'max_version') ?? stringField(record, 'newest_version')
  if (!version)
    return { ok: false, error: `could not determine latest version for '${name}'` }

  return { ok: true, crate: toResolved(name, version, readCrateFields(record)) }
}

/**
 * Resolve the newest usable version of a crate with its description and repository.
 * The version list is authoritative; the root record is the fallback when the
 * list is unavailable or holds no usable entry.
 */
export async function resolveCrate(name: string, options: ResolveCrateOptions = {}): Promise<ResolveResult> {
  const registry = (options.registryUrl ?? DEFAULT_REGISTRY_URL).replace(/\/+$/, '')

  const fromList = await resolveFromVersionList(name, registry)
  if (fromList)
    return { ok: true, crate: fromList }

  return resolveFromCrateRoot(name, registry)
}
