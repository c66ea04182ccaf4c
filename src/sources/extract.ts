/**
 * HTML → anchor text, code snippets and plain text
 */

import type { AggregatedDocs } from './types.ts'
import * as cheerio from 'cheerio'
import { looksLikeSourceCode } from './heuristics.ts'
import { collapseWhitespace } from './utils.ts'

const ANCHOR_SELECTOR = 'a, span, h1, h2, h3, h4'
const CODE_SELECTOR = 'pre, code, div.example, div.rust'
const MAIN_TEXT_SELECTORS = ['main', 'div.content', 'div#main', 'article', 'body']

export const DEFAULT_MAX_ANCHORS = 200
export const DEFAULT_MAX_SNIPPETS = 80

function isNumericOnly(text: string): boolean {
  return /^\d+$/.test(text)
}

function isAnchorNoise(text: string): boolean {
  // Code points, so a single astral letter counts as one character
  const length = [...text].length
  if (length < 2 || isNumericOnly(text))
    return true
  // Two-character tokens are mostly punctuation or navigation arrows
  return length === 2 && !/\p{L}/u.test(text)
}

/**
 * Link, heading and label text in document order, whitespace-collapsed and deduplicated
 */
export function extractAnchorItems(html: string, max = DEFAULT_MAX_ANCHORS): string[] {
  const $ = cheerio.load(html)
  const items: string[] = []
  const seen = new Set<string>()

  for (const el of $(ANCHOR_SELECTOR).toArray()) {
    if (items.length >= max)
      break
    const text = collapseWhitespace($(el).text())
    if (isAnchorNoise(text) || seen.has(text))
      continue
    seen.add(text)
    items.push(text)
  }
  return items
}

/**
 * Drop leading blank lines and short line-number headers (`1`, `12 |`),
 * stopping at the first line that is neither. `null` when nothing is left.
 */
export function cleanCodeSnippet(snippet: string): string | null {
  const lines = snippet.split('\n')
  while (lines.length > 0) {
    const first = (lines[0] ?? '').trim()
    const firstWord = first.split(/\s+/)[0] ?? ''
    if (first === '' || (isNumericOnly(firstWord) && first.length < 8)) {
      lines.shift()
      continue
    }
    break
  }
  const out = lines.join('\n').trim()
  return out || null
}

/**
 * Text of preformatted/code elements that looks like source code, cleaned
 */
export function extractCodeBlocks(html: string, max = DEFAULT_MAX_SNIPPETS): string[] {
  const $ = cheerio.load(html)
  const blocks: string[] = []

  for (const el of $(CODE_SELECTOR).toArray()) {
    if (blocks.length >= max)
      break
    const text = $(el).text().trim()
    if (!text || !looksLikeSourceCode(text))
      continue
    const clean = cleanCodeSnippet(text)
    if (clean)
      blocks.push(clean)
  }
  return blocks
}

/**
 * Whitespace-collapsed text of the main content container
 */
export function extractMainText(html: string): string {
  const $ = cheerio.load(html)
  $('script, style, noscript').remove()
  // Separate adjacent elements so `<h1>A</h1><p>B</p>` reads "A B"
  $('*').append(' ')

  for (const selector of MAIN_TEXT_SELECTORS) {
    const node = $(selector).first()
    if (node.length === 0)
      continue
    const text = collapseWhitespace(node.text())
    if (text)
      return text
  }
  return collapseWhitespace($.root().text())
}

export interface AggregateLimits {
  maxAnchors?: number
  maxSnippets?: number
}

/**
 * Run every extractor over the fetched pages, in crawl order.
 * Anchors are deduplicated across pages; identical snippets are kept once.
 */
export function aggregatePages(pages: string[], limits: AggregateLimits = {}): AggregatedDocs {
  const maxAnchors = limits.maxAnchors ?? DEFAULT_MAX_ANCHORS
  const maxSnippets = limits.maxSnippets ?? DEFAULT_MAX_SNIPPETS

  const anchorItems: string[] = []
  const seenAnchors = new Set<string>()
  const codeSnippets: string[] = []
  const seenSnippets = new Set<string>()
  const texts: string[] = []

  for (const html of pages) {
    for (const item of extractAnchorItems(html, maxAnchors)) {
      if (anchorItems.length >= maxAnchors)
        break
      if (seenAnchors.has(item))
        continue
      seenAnchors.add(item)
      anchorItems.push(item)
    }

    for (const snippet of extractCodeBlocks(html, maxSnippets)) {
      if (codeSnippets.length >= maxSnippets)
        break
      if (seenSnippets.has(snippet))
        continue
      seenSnippets.add(snippet)
      codeSnippets.push(snippet)
    }

    const text = extractMainText(html)
    if (text)
      texts.push(text)
  }

  return {
    anchorItems,
    codeSnippets,
    textAggregate: texts.length > 0 ? texts.join('\n\n') : undefined,
  }
}
