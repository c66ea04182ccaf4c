import { beforeEach, describe, expect, it, vi } from 'vitest'
import { json, requestedUrls, resetRoutes, routes } from './mock-fetch'

vi.mock('ofetch', async () => {
  const { createMockFetch } = await import('./mock-fetch')
  return { ofetch: { create: () => createMockFetch() } }
})

// Must import after vi.mock
const { dependencyLine, resolveCrate } = await import('../../src/sources/crates')

const API = 'https://crates.io/api/v1/crates'

describe('sources/crates', () => {
  beforeEach(() => {
    resetRoutes()
  })

  it('formats a Cargo.toml dependency line', () => {
    expect(dependencyLine('serde', '1.0.210')).toBe('serde = "1.0.210"')
  })

  describe('resolveCrate', () => {
    it('picks the highest non-yanked version and backfills metadata', async () => {
      routes.set(`${API}/alpha/versions`, json({
        versions: [
          { num: '0.4.2', yanked: false },
          { num: '0.10.0', yanked: false },
          { num: '0.11.0', yanked: true, links: { repository: 'https://github.com/o/yanked' } },
          { num: '0.10.0-rc1', yanked: false, links: { repository: 'https://github.com/o/alpha' } },
        ],
      }))
      routes.set(`${API}/alpha`, json({
        crate: {
          description: 'Alpha crate',
          repository: 'https://github.com/o/other',
          documentation: 'https://docs.rs/alpha',
        },
      }))

      const result = await resolveCrate('alpha')

      expect(result).toEqual({
        ok: true,
        crate: {
          name: 'alpha',
          version: '0.10.0',
          description: 'Alpha crate',
          repository: 'https://github.com/o/alpha',
          documentation: 'https://docs.rs/alpha',
          dependencyLine: 'alpha = "0.10.0"',
        },
      })
    })

    it('keeps the list result when the backfill lookup fails', async () => {
      routes.set(`${API}/alpha/versions`, json({ versions: [{ num: '1.0.0' }] }))

      const result = await resolveCrate('alpha')

      expect(result).toEqual({
        ok: true,
        crate: { name: 'alpha', version: '1.0.0', dependencyLine: 'alpha = "1.0.0"' },
      })
    })

    it('uses the documentation URL when no repository is listed', async () => {
      routes.set(`${API}/alpha/versions`, json({ versions: [{ num: '1.0.0' }] }))
      routes.set(`${API}/alpha`, json({ crate: { documentation: 'https://alpha.example.com/docs' } }))

      const result = await resolveCrate('alpha')

      expect(result.ok && result.crate.repository).toBe('https://alpha.example.com/docs')
    })

    it('falls back to max_version when every version is yanked', async () => {
      routes.set(`${API}/alpha/versions`, json({ versions: [{ num: '1.0.0', yanked: true }] }))
      routes.set(`${API}/alpha`, json({
        crate: { max_version: '0.9.0', newest_version: '1.0.0', description: 'd', repository: 'https://github.com/o/alpha' },
      }))

      const result = await resolveCrate('alpha')

      expect(result).toEqual({
        ok: true,
        crate: {
          name: 'alpha',
          version: '0.9.0',
          description: 'd',
          repository: 'https://github.com/o/alpha',
          dependencyLine: 'alpha = "0.9.0"',
        },
      })
    })

    it('falls back to newest_version when the version list is unavailable', async () => {
      routes.set(`${API}/alpha`, json({ crate: { newest_version: '2.1.0' } }))

      const result = await resolveCrate('alpha')

      expect(result.ok && result.crate.version).toBe('2.1.0')
      expect(requestedUrls()).toEqual([`${API}/alpha/versions`, `${API}/alpha`])
    })

    it('reports transport failures', async () => {
      const result = await resolveCrate('ghost')

      expect(result).toEqual({ ok: false, error: 'crates.io lookup for \'ghost\' failed: network error: fetch failed' })
    })

    it('reports an unexpected response shape', async () => {
      routes.set(`${API}/alpha`, json({ unexpected: true }))

      const result = await resolveCrate('alpha')

      expect(result).toEqual({ ok: false, error: 'unexpected crates.io response shape for \'alpha\'' })
    })

    it('reports a record without a version', async () => {
      routes.set(`${API}/alpha`, json({ crate: { description: 'd' } }))

      const result = await resolveCrate('alpha')

      expect(result).toEqual({ ok: false, error: 'could not determine latest version for \'alpha\'' })
    })

    it('uses a configured registry', async () => {
      routes.set('https://registry.test/api/v1/crates/alpha/versions', json({ versions: [{ num: '3.0.0' }] }))

      const result = await resolveCrate('alpha', { registryUrl: 'https://registry.test/api/v1/' })

      expect(result.ok && result.crate.version).toBe('3.0.0')
      expect(requestedUrls()[0]).toBe('https://registry.test/api/v1/crates/alpha/versions')
    })
  })
})
