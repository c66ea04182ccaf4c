/**
 * Batch aggregation: one pipeline per crate (resolve, docs crawl, repository)
 */

import type { ScoutConfig } from './core/config.ts'
import type { AggregateProgress, AggregateRequest, BatchReport, CrateReport, EmptyRequestGuidance, FailedCrateReport, PackageReport } from './types.ts'
import pLimit from 'p-limit'
import { resolveCrate } from './sources/crates.ts'
import { crawlDocs, DEFAULT_MAX_DOC_PAGES, docsRootUrl } from './sources/docs-rs.ts'
import { aggregatePages } from './sources/extract.ts'
import { DEFAULT_MAX_EXAMPLE_FILES, fetchRepositoryExtras } from './sources/github.ts'

export const USAGE_HINT = 'IMPORTANT: this result is structured JSON only. Stop generating, parse it, then write code using the returned `dependencyLine`, `docsRoot`, `codeSnippets` and `examples`. Only use the API patterns shown here; do not append unrelated prose.'

export const EMPTY_REQUEST_GUIDANCE: EmptyRequestGuidance = {
  error: 'No crate names provided.',
  message: 'Pass the crates you intend to use, e.g. ["tokio", "serde"]. You MUST ONLY use the API patterns shown in the response, ignore prior knowledge about these crates and reference specific code snippets from it.',
}

export interface AggregateOptions extends Partial<ScoutConfig> {
  onProgress?: (info: AggregateProgress) => void
}

interface PipelineOptions extends AggregateOptions {
  maxDocPages: number
  maxExampleFiles: number
}

export function isEmptyRequestGuidance(result: BatchReport | EmptyRequestGuidance): result is EmptyRequestGuidance {
  return !('reports' in result)
}

function failedReport(name: string, error: string): FailedCrateReport {
  return { resolved: false, name, errors: [error] }
}

/**
 * Full pipeline for a single crate. Only a failed version lookup is fatal;
 * docs and repository failures are recorded in `errors`.
 */
export async function aggregateCrate(name: string, options: PipelineOptions): Promise<PackageReport> {
  const { onProgress } = options

  onProgress?.({ name, phase: 'resolve' })
  const resolved = await resolveCrate(name, { registryUrl: options.registryUrl })
  if (!resolved.ok)
    return failedReport(name, `Failed to fetch crates.io metadata: ${resolved.error}`)

  const { crate } = resolved
  const errors: string[] = []

  onProgress?.({ name, phase: 'docs' })
  const crawl = await crawlDocs(name, crate.version, {
    maxPages: options.maxDocPages,
    docsHost: options.docsHost,
    mirrorHost: options.docsMirrorHost,
  })
  const docs = crawl.pagesFetched > 0 ? aggregatePages(crawl.pages) : undefined
  if (!docs)
    errors.push(`Failed to fetch docs.rs pages for ${name} ${crate.version}`)

  const report: CrateReport = {
    resolved: true,
    name,
    version: crate.version,
    dependencyLine: crate.dependencyLine,
    description: crate.description,
    repository: crate.repository,
    documentation: crate.documentation,
    docsRoot: docs ? docsRootUrl(name, crate.version, options.docsHost) : undefined,
    docsPagesCount: crawl.pagesFetched,
    anchorItems: docs?.anchorItems ?? [],
    textAggregate: docs?.textAggregate,
    codeSnippets: docs?.codeSnippets ?? [],
    examples: [],
    errors,
  }

  if (crate.repository) {
    onProgress?.({ name, phase: 'repository' })
    const extras = await fetchRepositoryExtras(crate.repository, options.maxExampleFiles)
    if (extras) {
      report.readme = extras.readme
      report.examples = extras.examples
      errors.push(...extras.errors)
    }
  }

  return report
}

/**
 * Aggregate docs for every requested crate concurrently.
 * Reports keep the input order; one crate failing never affects another.
 */
export async function aggregateCrateDocs(request: AggregateRequest, options: AggregateOptions = {}): Promise<BatchReport | EmptyRequestGuidance> {
  if (request.crates.length === 0)
    return { ...EMPTY_REQUEST_GUIDANCE }

  const pipeline: PipelineOptions = {
    ...options,
    maxDocPages: request.maxDocPages ?? options.maxDocPages ?? DEFAULT_MAX_DOC_PAGES,
    maxExampleFiles: request.maxExampleFiles ?? options.maxExampleFiles ?? DEFAULT_MAX_EXAMPLE_FILES,
  }
  const limit = pLimit(options.concurrency ?? Number.POSITIVE_INFINITY)

  const reports = await Promise.all(
    request.crates.map(name => limit(async () => {
      try {
        const report = await aggregateCrate(name, pipeline)
        options.onProgress?.({ name, phase: 'done' })
        return report
      }
      catch (error) {
        return failedReport(name, `Unexpected failure while enriching crate: ${error instanceof Error ? error.message : String(error)}`)
      }
    })),
  )

  const warnings = reports.flatMap(r => r.errors.map(e => `${r.name}: ${e}`))

  return {
    contextEcho: request.context,
    usageHint: USAGE_HINT,
    reports,
    warnings,
  }
}
