import { ApiError } from './errors'

const OMDB_BASE_URL = 'https://www.omdbapi.com/'

export type MovieInfo = {
  title: string
  year: string | null
  rated: string | null
  runtime: string | null
  genre: string | null
  plot: string | null
  awards: string | null
  language: string | null
  director: string | null
  writer: string | null
  actors: string | null
  metascore: string | null
  boxOffice: string | null
  imdbRating: string | null
  posterUrl: string | null
}

type OmdbResponse = {
  Response?: 'True' | 'False'
  Error?: string
  Title?: string
  Year?: string
  Rated?: string
  Runtime?: string
  Genre?: string
  Plot?: string
  Awards?: string
  Language?: string
  Director?: string
  Writer?: string
  Actors?: string
  Metascore?: string
  BoxOffice?: string
  imdbRating?: string
  Poster?: string
}

export type OmdbClient = {
  fetchMovieInfo(title: string): Promise<MovieInfo>
}

// OMDb reports absent fields as the literal "N/A".
function present(value: string | undefined): string | null {
  if (!value || value === 'N/A') {
    return null
  }
  return value
}

export function mapMovieInfo(title: string, payload: OmdbResponse): MovieInfo {
  return {
    title: present(payload.Title) ?? title,
    year: present(payload.Year),
    rated: present(payload.Rated),
    runtime: present(payload.Runtime),
    genre: present(payload.Genre),
    plot: present(payload.Plot),
    awards: present(payload.Awards),
    language: present(payload.Language),
    director: present(payload.Director),
    writer: present(payload.Writer),
    actors: present(payload.Actors),
    metascore: present(payload.Metascore),
    boxOffice: present(payload.BoxOffice),
    imdbRating: present(payload.imdbRating),
    posterUrl: present(payload.Poster),
  }
}

export function createOmdbClient(apiKey: string | null): OmdbClient {
  async function fetchMovieInfo(title: string): Promise<MovieInfo> {
    if (!apiKey) {
      throw new ApiError('OMDb', 'OMDb credentials missing. Configure VITE_OMDB_API_KEY.')
    }

    const url = new URL(OMDB_BASE_URL)
    url.searchParams.set('apikey', apiKey)
    url.searchParams.set('t', title)

    const response = await fetch(url.toString(), { headers: { accept: 'application/json' } })
    if (!response.ok) {
      console.error(`[OMDb] ${response.status} for "${title}"`)
      if (response.status === 401 || response.status === 403) {
        throw new ApiError('OMDb', 'OMDb credentials are invalid', response.status)
      }
      throw new ApiError('OMDb', `OMDb request failed (${response.status})`, response.status)
    }

    const payload = (await response.json()) as OmdbResponse
    if (payload.Response === 'False') {
      throw new ApiError('OMDb', payload.Error ?? 'Movie not found', 404)
    }

    return mapMovieInfo(title, payload)
  }

  return { fetchMovieInfo }
}
