import { describe, expect, it } from 'vitest'

import { readConfig } from './config'

describe('readConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(readConfig({})).toEqual({
      tmdbApiKey: null,
      tmdbAccessToken: null,
      omdbApiKey: null,
      youtubeApiKey: null,
      mailRelayUrl: '/api/mail',
      mailSender: 'no-reply@reelpick.local',
      teamRecipient: 'support@reelpick.local',
      catalogUrl: '/data/catalog.json',
      similarityUrl: '/data/similarity.json',
    })
  })

  it('reads every variable', () => {
    const config = readConfig({
      BASE_URL: '/reelpick/',
      VITE_TMDB_API_KEY: 'test-key',
      VITE_TMDB_ACCESS_TOKEN: 'test-token',
      VITE_OMDB_API_KEY: 'omdb-key',
      VITE_YOUTUBE_API_KEY: 'youtube-key',
      VITE_MAIL_RELAY_URL: 'https://relay.example.com/send',
      VITE_MAIL_SENDER: 'bot@example.com',
      VITE_BUG_REPORT_RECIPIENT: 'bugs@example.com',
      VITE_SIMILARITY_URL: 'https://blobs.example.com/similarity.json',
    })

    expect(config).toEqual({
      tmdbApiKey: 'test-key',
      tmdbAccessToken: 'test-token',
      omdbApiKey: 'omdb-key',
      youtubeApiKey: 'youtube-key',
      mailRelayUrl: 'https://relay.example.com/send',
      mailSender: 'bot@example.com',
      teamRecipient: 'bugs@example.com',
      catalogUrl: '/reelpick/data/catalog.json',
      similarityUrl: 'https://blobs.example.com/similarity.json',
    })
  })

  it('treats blank values as unset', () => {
    const config = readConfig({ VITE_TMDB_API_KEY: '   ', VITE_MAIL_RELAY_URL: '', BASE_URL: '/app' })

    expect(config.tmdbApiKey).toBeNull()
    expect(config.mailRelayUrl).toBe('/api/mail')
    expect(config.catalogUrl).toBe('/app/data/catalog.json')
  })

  it('ignores non-string values', () => {
    expect(readConfig({ VITE_OMDB_API_KEY: true }).omdbApiKey).toBeNull()
  })
})
