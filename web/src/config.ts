export type AppConfig = {
  tmdbApiKey: string | null
  tmdbAccessToken: string | null
  omdbApiKey: string | null
  youtubeApiKey: string | null
  mailRelayUrl: string
  mailSender: string
  teamRecipient: string
  catalogUrl: string
  similarityUrl: string
}

export type EnvSource = Record<string, string | boolean | undefined>

const DEFAULT_MAIL_RELAY_URL = '/api/mail'
const DEFAULT_MAIL_SENDER = 'no-reply@reelpick.local'
const DEFAULT_TEAM_RECIPIENT = 'support@reelpick.local'

function readString(env: EnvSource, key: string): string | null {
  const value = env[key]
  if (typeof value !== 'string') {
    return null
  }
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : null
}

function withTrailingSlash(path: string): string {
  return path.endsWith('/') ? path : `${path}/`
}

export function readConfig(env: EnvSource): AppConfig {
  const baseUrl = withTrailingSlash(readString(env, 'BASE_URL') ?? '/')

  return {
    tmdbApiKey: readString(env, 'VITE_TMDB_API_KEY'),
    tmdbAccessToken: readString(env, 'VITE_TMDB_ACCESS_TOKEN'),
    omdbApiKey: readString(env, 'VITE_OMDB_API_KEY'),
    youtubeApiKey: readString(env, 'VITE_YOUTUBE_API_KEY'),
    mailRelayUrl: readString(env, 'VITE_MAIL_RELAY_URL') ?? DEFAULT_MAIL_RELAY_URL,
    mailSender: readString(env, 'VITE_MAIL_SENDER') ?? DEFAULT_MAIL_SENDER,
    teamRecipient: readString(env, 'VITE_BUG_REPORT_RECIPIENT') ?? DEFAULT_TEAM_RECIPIENT,
    catalogUrl: readString(env, 'VITE_CATALOG_URL') ?? `${baseUrl}data/catalog.json`,
    similarityUrl: readString(env, 'VITE_SIMILARITY_URL') ?? `${baseUrl}data/similarity.json`,
  }
}
