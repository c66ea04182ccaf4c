/**
 * Crate sources - crates.io, docs.rs and GitHub
 */

// crates.io
export type { ResolveCrateOptions } from './crates.ts'
export { DEFAULT_REGISTRY_URL, dependencyLine, resolveCrate } from './crates.ts'

// docs.rs
export type { CrawlDocsOptions, CrawlResult } from './docs-rs.ts'
export {
  crawlDocs,
  DEFAULT_DOCS_HOST,
  DEFAULT_DOCS_MIRROR_HOST,
  DEFAULT_MAX_DOC_PAGES,
  docsPageCandidates,
  docsRootUrl,
  normalizeDocsHref,
} from './docs-rs.ts'

// Extraction
export type { AggregateLimits } from './extract.ts'
export {
  aggregatePages,
  cleanCodeSnippet,
  extractAnchorItems,
  extractCodeBlocks,
  extractMainText,
} from './extract.ts'

// GitHub
export {
  COMMON_EXAMPLE_FILES,
  DEFAULT_MAX_EXAMPLE_FILES,
  discoverDefaultBranch,
  discoverExamples,
  fetchExampleFiles,
  fetchReadme,
  fetchRepositoryExtras,
  parseGitHubRepo,
  rawFileUrl,
} from './github.ts'

// Heuristics
export { crateModuleName, isRelevantDocPath, looksLikeSourceCode } from './heuristics.ts'

// Types
export type {
  AggregatedDocs,
  ExampleFile,
  GitHubRepoRef,
  RepositoryExtras,
  ResolvedCrate,
  ResolveResult,
} from './types.ts'

// Utils
export { $fetch, describeFetchError, fetchText, normalizeRepoUrl } from './utils.ts'

// Versions
export type { ParsedVersion, VersionCandidate } from './versions.ts'
export { compareVersions, isVersionGreater, parseVersion, pickBestVersion } from './versions.ts'
