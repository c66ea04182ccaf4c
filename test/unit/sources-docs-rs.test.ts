import { beforeEach, describe, expect, it, vi } from 'vitest'
import { requestedUrls, resetRoutes, routes, text } from './mock-fetch'

vi.mock('ofetch', async () => {
  const { createMockFetch } = await import('./mock-fetch')
  return { ofetch: { create: () => createMockFetch() } }
})

// Must import after vi.mock
const { crawlDocs, docsPageCandidates, docsRootUrl, normalizeDocsHref } = await import('../../src/sources/docs-rs')

describe('sources/docs-rs', () => {
  beforeEach(() => {
    resetRoutes()
  })

  describe('normalizeDocsHref', () => {
    it('strips relative markers and fragments', () => {
      expect(normalizeDocsHref('../serde/trait.Serialize.html#impl')).toBe('serde/trait.Serialize.html')
      expect(normalizeDocsHref('./../a/b.html')).toBe('a/b.html')
      expect(normalizeDocsHref('/foo/index.html')).toBe('foo/index.html')
      expect(normalizeDocsHref('#section')).toBe('')
    })
  })

  describe('docsPageCandidates', () => {
    it('lists the primary host before the mirror', () => {
      expect(docsPageCandidates('alpha', '1.0.0', '')).toEqual([
        'https://docs.rs/alpha/1.0.0/',
        'https://docs.rs/crate/alpha/1.0.0/',
      ])
      expect(docsPageCandidates('alpha', '1.0.0', 'struct.A.html')).toEqual([
        'https://docs.rs/alpha/1.0.0/struct.A.html',
        'https://docs.rs/crate/alpha/1.0.0/struct.A.html',
      ])
    })

    it('uses configured hosts', () => {
      expect(docsPageCandidates('alpha', '1.0.0', 'x', { docsHost: 'https://mirror.test/', mirrorHost: 'https://backup.test' })).toEqual([
        'https://mirror.test/alpha/1.0.0/x',
        'https://backup.test/alpha/1.0.0/x',
      ])
    })
  })

  it('builds the docs root URL', () => {
    expect(docsRootUrl('alpha', '1.0.0')).toBe('https://docs.rs/alpha/1.0.0/')
  })

  describe('crawlDocs', () => {
    it('fetches each path at most once', async () => {
      routes.set('https://docs.rs/alpha/1.0.0/', text([
        '<a href="alpha/index.html">Index</a>',
        '<a href="alpha/index.html#x">Again</a>',
        '<a href="struct.Foo.html">Foo</a>',
        '<a href="https://github.com/o/alpha">Repo</a>',
        '<a href="settings">Settings</a>',
      ].join('')))
      routes.set('https://docs.rs/alpha/1.0.0/alpha/index.html', text('<a href="../struct.Foo.html">Foo</a><a href="../alpha/index.html">Self</a>'))
      routes.set('https://docs.rs/alpha/1.0.0/struct.Foo.html', text('<a href="alpha/index.html">Back</a>'))

      const result = await crawlDocs('alpha', '1.0.0')

      expect(result.pagesFetched).toBe(3)
      expect(result.visited).toEqual(new Set(['', 'alpha/', 'alpha/index.html', 'struct.Foo.html']))
      expect(requestedUrls()).toEqual([
        'https://docs.rs/alpha/1.0.0/',
        'https://docs.rs/alpha/1.0.0/alpha/',
        'https://docs.rs/crate/alpha/1.0.0/alpha/',
        'https://docs.rs/alpha/1.0.0/alpha/index.html',
        'https://docs.rs/alpha/1.0.0/struct.Foo.html',
      ])
    })

    it('falls back to the mirror host', async () => {
      routes.set('https://docs.rs/crate/beta/2.0.0/', text('<p>mirror</p>'))

      const result = await crawlDocs('beta', '2.0.0', { maxPages: 1 })

      expect(result.pages).toEqual(['<p>mirror</p>'])
      expect(result.pagesFetched).toBe(1)
    })

    it('fetches exactly the page budget', async () => {
      const links = [1, 2, 3, 4, 5].map(n => `<a href="struct.S${n}.html">S${n}</a>`).join('')
      routes.set('https://docs.rs/alpha/1.0.0/', text(links))
      for (const n of [1, 2, 3, 4, 5])
        routes.set(`https://docs.rs/alpha/1.0.0/struct.S${n}.html`, text(`<h1>S${n}</h1>`))

      const result = await crawlDocs('alpha', '1.0.0', { maxPages: 2 })

      expect(result.pagesFetched).toBe(2)
      expect(result.pages).toEqual([links, '<h1>S1</h1>'])
      expect(requestedUrls()).not.toContain('https://docs.rs/alpha/1.0.0/struct.S2.html')
    })

    it('fetches nothing with a zero budget', async () => {
      const result = await crawlDocs('alpha', '1.0.0', { maxPages: 0 })

      expect(result.pagesFetched).toBe(0)
      expect(requestedUrls()).toEqual([])
    })
  })
})
