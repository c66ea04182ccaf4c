import type { ExampleFile } from './sources/types.ts'

export interface AggregateRequest {
  /** Crate names to look up, e.g. `['tokio', 'serde']` */
  crates: string[]
  /** Free-text context, echoed back untouched */
  context?: string
  /** Docs pages to fetch per crate */
  maxDocPages?: number
  /** Example files to fetch per crate */
  maxExampleFiles?: number
}

export interface FailedCrateReport {
  resolved: false
  name: string
  errors: string[]
}

export interface CrateReport {
  resolved: true
  name: string
  version: string
  dependencyLine: string
  description?: string
  /** Repository URL, or the documentation URL when no repository is listed */
  repository?: string
  documentation?: string
  /** Set when at least one docs page was fetched */
  docsRoot?: string
  docsPagesCount: number
  anchorItems: string[]
  textAggregate?: string
  codeSnippets: string[]
  readme?: string
  examples: ExampleFile[]
  errors: string[]
}

export type PackageReport = CrateReport | FailedCrateReport

export interface BatchReport {
  contextEcho?: string
  usageHint: string
  reports: PackageReport[]
  /** Every report error, prefixed with `<name>: ` */
  warnings: string[]
}

export interface EmptyRequestGuidance {
  error: string
  message: string
}

export type AggregatePhase = 'resolve' | 'docs' | 'repository' | 'done'

export interface AggregateProgress {
  name: string
  phase: AggregatePhase
}
