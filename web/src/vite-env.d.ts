/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_TMDB_API_KEY?: string
  readonly VITE_TMDB_ACCESS_TOKEN?: string
  readonly VITE_OMDB_API_KEY?: string
  readonly VITE_YOUTUBE_API_KEY?: string
  readonly VITE_MAIL_RELAY_URL?: string
  readonly VITE_MAIL_SENDER?: string
  readonly VITE_BUG_REPORT_RECIPIENT?: string
  readonly VITE_CATALOG_URL?: string
  readonly VITE_SIMILARITY_URL?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
