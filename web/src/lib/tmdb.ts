import type { AppConfig } from '../config'
import { ApiError } from './errors'

const TMDB_BASE_URL = 'https://api.themoviedb.org/3'
const TMDB_IMAGE_BASE = 'https://image.tmdb.org/t/p/w500'

export const PLACEHOLDER_POSTER_URL = 'https://placehold.co/600x900/15212e/f4f4ef?text=No+Poster'

export type TmdbCredentials = Pick<AppConfig, 'tmdbApiKey' | 'tmdbAccessToken'>

type TmdbMovie = {
  id: number
  title?: string
  poster_path?: string | null
}

export type TmdbClient = {
  isConfigured(): boolean
  getHealth(): Promise<{ status: string; service: string }>
  fetchPosterUrl(externalId: number): Promise<string>
  fetchPosterUrls(externalIds: readonly number[]): Promise<Map<number, string>>
}

export function getPosterUrl(posterPath: string | null | undefined): string {
  if (!posterPath) {
    return PLACEHOLDER_POSTER_URL
  }
  return `${TMDB_IMAGE_BASE}${posterPath.startsWith('/') ? posterPath : `/${posterPath}`}`
}

export function createTmdbClient(credentials: TmdbCredentials): TmdbClient {
  const { tmdbApiKey, tmdbAccessToken } = credentials

  function isConfigured(): boolean {
    return Boolean(tmdbAccessToken || tmdbApiKey)
  }

  function createTmdbUrl(path: string, params?: Record<string, string>): string {
    const url = new URL(`${TMDB_BASE_URL}${path}`)
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        url.searchParams.set(key, value)
      }
    }

    if (!tmdbAccessToken && tmdbApiKey) {
      url.searchParams.set('api_key', tmdbApiKey)
    }

    return url.toString()
  }

  async function tmdbJson<T>(path: string, params?: Record<string, string>): Promise<T> {
    if (!isConfigured()) {
      throw new ApiError('TMDB', 'TMDB credentials missing. Configure VITE_TMDB_API_KEY or VITE_TMDB_ACCESS_TOKEN.')
    }

    const headers: Record<string, string> = {
      accept: 'application/json',
    }
    if (tmdbAccessToken) {
      headers.Authorization = `Bearer ${tmdbAccessToken}`
    }

    const response = await fetch(createTmdbUrl(path, params), { headers })

    if (!response.ok) {
      console.error(`[TMDB] ${response.status} on ${path}`)
      if (response.status === 404) {
        throw new ApiError('TMDB', 'Movie not found', 404)
      }
      if (response.status === 401 || response.status === 403) {
        throw new ApiError('TMDB', 'TMDB credentials are invalid', response.status)
      }
      throw new ApiError('TMDB', `TMDB request failed (${response.status})`, response.status)
    }

    return (await response.json()) as T
  }

  async function getHealth(): Promise<{ status: string; service: string }> {
    await tmdbJson('/configuration')
    return {
      status: 'ok',
      service: 'tmdb',
    }
  }

  // Never rejects: a missing poster degrades to the placeholder image.
  async function fetchPosterUrl(externalId: number): Promise<string> {
    try {
      const movie = await tmdbJson<TmdbMovie>(`/movie/${externalId}`, { language: 'en-US' })
      if (!movie.poster_path) {
        console.warn(`[TMDB] no poster for movie ${externalId}`)
      }
      return getPosterUrl(movie.poster_path)
    } catch (error) {
      console.warn(`[TMDB] poster lookup failed for movie ${externalId}`, error)
      return PLACEHOLDER_POSTER_URL
    }
  }

  async function fetchPosterUrls(externalIds: readonly number[]): Promise<Map<number, string>> {
    const unique = [...new Set(externalIds)]
    const urls = await Promise.all(unique.map((externalId) => fetchPosterUrl(externalId)))
    return new Map(unique.map((externalId, position) => [externalId, urls[position]]))
  }

  return {
    isConfigured,
    getHealth,
    fetchPosterUrl,
    fetchPosterUrls,
  }
}
