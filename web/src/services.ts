import type { AppConfig } from './config'
import { createRelayMailer, type Mailer } from './lib/mail'
import { createOmdbClient, type OmdbClient } from './lib/omdb'
import { createTmdbClient, type TmdbClient } from './lib/tmdb'
import { createYoutubeClient, type YoutubeClient } from './lib/youtube'

export type Services = {
  config: AppConfig
  tmdb: TmdbClient
  omdb: OmdbClient
  youtube: YoutubeClient
  mailer: Mailer
}

export function createServices(config: AppConfig): Services {
  return {
    config,
    tmdb: createTmdbClient(config),
    omdb: createOmdbClient(config.omdbApiKey),
    youtube: createYoutubeClient(config.youtubeApiKey),
    mailer: createRelayMailer(config.mailRelayUrl),
  }
}
