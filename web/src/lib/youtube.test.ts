import { beforeEach, describe, expect, it } from 'vitest'

import { jsonResponse, silenceConsole, stubFetch } from '../test/http'
import { createYoutubeClient, toTrailer, trailerQuery } from './youtube'

describe('youtube trailer lookup', () => {
  beforeEach(() => {
    silenceConsole()
  })

  it('searches for the official trailer', async () => {
    const { calls } = stubFetch(() =>
      jsonResponse({ items: [{ id: { kind: 'youtube#video', videoId: 'vid123' } }] }),
    )

    const trailer = await createYoutubeClient('test-key').fetchTrailer('The Matrix')

    const url = new URL(calls[0].url)
    expect(url.origin + url.pathname).toBe('https://www.googleapis.com/youtube/v3/search')
    expect(url.searchParams.get('q')).toBe('The Matrix official trailer')
    expect(url.searchParams.get('part')).toBe('id')
    expect(url.searchParams.get('type')).toBe('video')
    expect(url.searchParams.get('key')).toBe('test-key')
    expect(trailer).toEqual({
      videoId: 'vid123',
      watchUrl: 'https://www.youtube.com/watch?v=vid123',
      embedUrl: 'https://www.youtube.com/embed/vid123',
    })
  })

  it('returns null when the search has no video', async () => {
    stubFetch(() => jsonResponse({ items: [{ id: { kind: 'youtube#channel' } }] }))

    await expect(createYoutubeClient('test-key').fetchTrailer('Unknown')).resolves.toBeNull()
  })

  it('returns null for an empty result set', async () => {
    stubFetch(() => jsonResponse({}))

    await expect(createYoutubeClient('test-key').fetchTrailer('Unknown')).resolves.toBeNull()
  })

  it('rejects on a quota error', async () => {
    stubFetch(() => jsonResponse({ error: { code: 403 } }, 403))

    await expect(createYoutubeClient('test-key').fetchTrailer('Heat')).rejects.toMatchObject({
      service: 'YouTube',
      status: 403,
    })
  })

  it('rejects without an api key', async () => {
    await expect(createYoutubeClient(null).fetchTrailer('Heat')).rejects.toThrow(
      'YouTube credentials missing. Configure VITE_YOUTUBE_API_KEY.',
    )
  })

  it('builds query and urls', () => {
    expect(trailerQuery('Up')).toBe('Up official trailer')
    expect(toTrailer('a b').embedUrl).toBe('https://www.youtube.com/embed/a%20b')
  })
})
