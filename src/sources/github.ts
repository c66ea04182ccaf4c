/**
 * GitHub README + examples resolution (web UI and raw content, no API key)
 */

import type { ExampleFile, GitHubRepoRef, RepositoryExtras } from './types.ts'
import * as cheerio from 'cheerio'
import { fetchText, GITHUB_TIMEOUT, normalizeRepoUrl, PROBE_TIMEOUT } from './utils.ts'

const GITHUB_MARKER = 'github.com/'
const RAW_HOST = 'https://raw.githubusercontent.com'

/** Branches probed when the landing page does not name the default branch */
export const BRANCH_CANDIDATES = ['main', 'master']
export const FALLBACK_BRANCH = 'main'
export const README_NAMES = ['README.md', 'readme.md']

/** Tried when the examples listing yields nothing */
export const COMMON_EXAMPLE_FILES = [
  'examples/main.rs',
  'examples/simple.rs',
  'examples/basic.rs',
  'examples/hello.rs',
]

export const DEFAULT_MAX_EXAMPLE_FILES = 20

/**
 * Parse owner/repo from a GitHub URL; extra path segments are ignored
 */
export function parseGitHubRepo(url: string): GitHubRepoRef | null {
  const normalized = normalizeRepoUrl(url)
  const idx = normalized.indexOf(GITHUB_MARKER)
  if (idx === -1)
    return null
  const tail = normalized
    .slice(idx + GITHUB_MARKER.length)
    .replace(/\/+$/, '')
    .replace(/\.git$/, '')
  const [owner, repo] = tail.split('/')
  if (!owner || !repo)
    return null
  return { owner, repo }
}

export function rawFileUrl({ owner, repo }: GitHubRepoRef, branch: string, path: string): string {
  return `${RAW_HOST}/${owner}/${repo}/${branch}/${path.replace(/^\/+/, '')}`
}

/**
 * Read the default branch from the repository landing page, else probe
 * {@link BRANCH_CANDIDATES} for a README. `null` when nothing answers.
 */
export async function discoverDefaultBranch(ref: GitHubRepoRef): Promise<string | null> {
  const page = await fetchText(`https://github.com/${ref.owner}/${ref.repo}`, GITHUB_TIMEOUT)
  const branch = page?.match(/data-default-branch="([^"]+)"/)?.[1]
  if (branch)
    return branch

  for (const candidate of BRANCH_CANDIDATES) {
    if (await fetchText(rawFileUrl(ref, candidate, 'README.md'), PROBE_TIMEOUT) !== null)
      return candidate
  }
  return null
}

export async function fetchReadme(ref: GitHubRepoRef, branch: string): Promise<string | null> {
  for (const name of README_NAMES) {
    const content = await fetchText(rawFileUrl(ref, branch, name), GITHUB_TIMEOUT)
    if (content !== null)
      return content
  }
  return null
}

/**
 * Example file paths linked from the `examples/` tree page, in document order
 */
export async function discoverExamples(ref: GitHubRepoRef, branch: string): Promise<string[]> {
  const html = await fetchText(`https://github.com/${ref.owner}/${ref.repo}/tree/${branch}/examples`, GITHUB_TIMEOUT)
  if (!html)
    return []

  const $ = cheerio.load(html)
  // Owner and repo names are case-insensitive on GitHub
  const examplesMarker = `/${ref.owner}/${ref.repo}/blob/${branch}/examples/`.toLowerCase()
  const blobMarker = `/blob/${branch}/`.toLowerCase()
  const paths: string[] = []

  for (const el of $('a[href]').toArray()) {
    const href = $(el).attr('href') ?? ''
    const lower = href.toLowerCase()
    if (!lower.includes(examplesMarker))
      continue
    const path = href.slice(lower.indexOf(blobMarker) + blobMarker.length)
    if (path && !paths.includes(path))
      paths.push(path)
  }
  return paths
}

/**
 * Fetch up to `maxFiles` example files; files that fail to load are skipped
 */
export async function fetchExampleFiles(ref: GitHubRepoRef, branch: string, maxFiles = DEFAULT_MAX_EXAMPLE_FILES): Promise<ExampleFile[]> {
  if (maxFiles <= 0)
    return []

  const discovered = await discoverExamples(ref, branch)
  const toFetch = discovered.length > 0 ? discovered : COMMON_EXAMPLE_FILES

  const examples: ExampleFile[] = []
  for (const path of toFetch) {
    if (examples.length >= maxFiles)
      break
    const content = await fetchText(rawFileUrl(ref, branch, path), GITHUB_TIMEOUT)
    if (content !== null)
      examples.push({ path, content })
  }
  return examples
}

/**
 * README and examples for a repository URL.
 * `null` when the URL is not a GitHub repository (enrichment is skipped).
 */
export async function fetchRepositoryExtras(url: string, maxFiles = DEFAULT_MAX_EXAMPLE_FILES): Promise<RepositoryExtras | null> {
  const ref = parseGitHubRepo(url)
  if (!ref)
    return null

  const branch = await discoverDefaultBranch(ref) ?? FALLBACK_BRANCH
  const errors: string[] = []

  const readme = await fetchReadme(ref, branch)
  if (readme === null)
    errors.push(`Could not fetch README from GitHub for ${ref.owner}/${ref.repo} on branch '${branch}'`)

  const examples = await fetchExampleFiles(ref, branch, maxFiles)

  return {
    ...ref,
    branch,
    readme: readme ?? undefined,
    examples,
    errors,
  }
}
