/**
 * Crate source types
 */

/** `GET /crates/{name}/versions` */
export interface CratesIoVersionsResponse {
  versions?: unknown
}

/** `GET /crates/{name}` */
export interface CratesIoCrateResponse {
  crate?: unknown
}

export interface ResolvedCrate {
  name: string
  version: string
  description?: string
  /** Repository URL, or the documentation URL when no repository is listed */
  repository?: string
  /** Documentation URL as listed on the registry */
  documentation?: string
  /** Cargo.toml dependency line, e.g. `serde = "1.0.210"` */
  dependencyLine: string
}

export type ResolveResult =
  | { ok: true, crate: ResolvedCrate }
  | { ok: false, error: string }

export interface AggregatedDocs {
  anchorItems: string[]
  codeSnippets: string[]
  textAggregate?: string
}

export interface ExampleFile {
  /** Path relative to the repository root */
  path: string
  content: string
}

export interface GitHubRepoRef {
  owner: string
  repo: string
}

export interface RepositoryExtras extends GitHubRepoRef {
  branch: string
  readme?: string
  examples: ExampleFile[]
  errors: string[]
}
