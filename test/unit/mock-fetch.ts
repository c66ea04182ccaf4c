import { vi } from 'vitest'

// Simulates ofetch on top of a URL → response route table

export interface MockResponse {
  ok: boolean
  text?: () => Promise<string>
  json?: () => Promise<unknown>
}

interface MockFetchOptions {
  responseType?: string
  timeout?: number
}

export const mockFetch = vi.fn<(url: string, opts?: MockFetchOptions) => Promise<MockResponse | undefined>>()

export const routes = new Map<string, MockResponse>()

export function text(body: string): MockResponse {
  return { ok: true, text: () => Promise.resolve(body) }
}

export function json(data: unknown): MockResponse {
  return { ok: true, json: () => Promise.resolve(data) }
}

export function createMockFetch() {
  return async (url: string, opts?: MockFetchOptions): Promise<unknown> => {
    const res = await mockFetch(url, opts)
    if (!res?.ok)
      throw new Error('fetch failed')
    if (opts?.responseType === 'text')
      return res.text?.()
    return res.json?.()
  }
}

/** Reset the route table; unrouted URLs fail like a network error */
export function resetRoutes(): void {
  routes.clear()
  mockFetch.mockReset()
  mockFetch.mockImplementation(async url => routes.get(url))
}

export function requestedUrls(): string[] {
  return mockFetch.mock.calls.map(([url]) => url)
}
