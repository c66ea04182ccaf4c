/**
 * docs.rs crawl, a bounded breadth-first walk over one crate version's docs
 */

import * as cheerio from 'cheerio'
import { crateModuleName, isRelevantDocPath } from './heuristics.ts'
import { fetchText, REGISTRY_TIMEOUT } from './utils.ts'

export const DEFAULT_DOCS_HOST = 'https://docs.rs'
export const DEFAULT_DOCS_MIRROR_HOST = 'https://docs.rs/crate'
export const DEFAULT_MAX_DOC_PAGES = 200

export interface CrawlDocsOptions {
  /** Stop after this many successfully fetched pages */
  maxPages?: number
  docsHost?: string
  /** Tried for each path after {@link CrawlDocsOptions.docsHost} */
  mirrorHost?: string
}

export interface CrawlResult {
  /** Page bodies in fetch order */
  pages: string[]
  pagesFetched: number
  /** Every path popped from the queue, fetched or failed */
  visited: Set<string>
}

/** Root URL of a crate version's docs */
export function docsRootUrl(crateName: string, version: string, docsHost = DEFAULT_DOCS_HOST): string {
  return `${trimSlash(docsHost)}/${crateName}/${version}/`
}

function trimSlash(host: string): string {
  return host.replace(/\/+$/, '')
}

/**
 * Reduce an href to a path relative to the version root:
 * `../serde/trait.Serialize.html#impl` → `serde/trait.Serialize.html`
 */
export function normalizeDocsHref(href: string): string {
  let s = href.trim()
  while (s.startsWith('../') || s.startsWith('./'))
    s = s.startsWith('../') ? s.slice(3) : s.slice(2)
  const hash = s.indexOf('#')
  if (hash !== -1)
    s = s.slice(0, hash)
  return s.replace(/^\/+/, '')
}

/** Absolute and protocol-relative links leave the version root */
function isExternalHref(href: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(href) || href.startsWith('//')
}

/** Candidate URLs for one docs path, primary host first */
export function docsPageCandidates(crateName: string, version: string, path: string, options: CrawlDocsOptions = {}): string[] {
  const hosts = [options.docsHost ?? DEFAULT_DOCS_HOST, options.mirrorHost ?? DEFAULT_DOCS_MIRROR_HOST]
  const p = path.trim()
  return hosts.map(host => `${trimSlash(host)}/${crateName}/${version}/${p}`)
}

async function fetchDocsPage(crateName: string, version: string, path: string, options: CrawlDocsOptions): Promise<string | null> {
  for (const url of docsPageCandidates(crateName, version, path, options)) {
    const html = await fetchText(url, REGISTRY_TIMEOUT)
    if (html !== null)
      return html
  }
  return null
}

function extractLinks(html: string): string[] {
  const $ = cheerio.load(html)
  return $('a[href]').toArray()
    .map(el => $(el).attr('href') ?? '')
    .filter(href => href && !isExternalHref(href))
    .map(normalizeDocsHref)
}

/**
 * Crawl a crate's docs breadth-first from the version root.
 * Each path is fetched at most once; failed paths are not retried.
 */
export async function crawlDocs(crateName: string, version: string, options: CrawlDocsOptions = {}): Promise<CrawlResult> {
  const maxPages = options.maxPages ?? DEFAULT_MAX_DOC_PAGES
  const pages: string[] = []
  const visited = new Set<string>()
  const queue: string[] = ['', `${crateModuleName(crateName)}/`]
  const queued = new Set(queue)

  while (queue.length > 0 && pages.length < maxPages) {
    const path = queue.shift() ?? ''
    queued.delete(path)
    if (visited.has(path))
      continue
    visited.add(path)

    const html = await fetchDocsPage(crateName, version, path, options)
    if (html === null)
      continue
    pages.push(html)

    for (const link of extractLinks(html)) {
      if (!link || visited.has(link) || queued.has(link))
        continue
      if (!isRelevantDocPath(link, crateName))
        continue
      queue.push(link)
      queued.add(link)
    }
  }

  return { pages, pagesFetched: pages.length, visited }
}
