import { ApiError } from './errors'

const YOUTUBE_SEARCH_URL = 'https://www.googleapis.com/youtube/v3/search'

export type Trailer = {
  videoId: string
  watchUrl: string
  embedUrl: string
}

type YoutubeSearchResponse = {
  items?: Array<{
    id?: {
      kind?: string
      videoId?: string
    }
  }>
}

export type YoutubeClient = {
  fetchTrailer(title: string): Promise<Trailer | null>
}

export function trailerQuery(title: string): string {
  return `${title} official trailer`
}

export function toTrailer(videoId: string): Trailer {
  return {
    videoId,
    watchUrl: `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`,
    embedUrl: `https://www.youtube.com/embed/${encodeURIComponent(videoId)}`,
  }
}

export function createYoutubeClient(apiKey: string | null): YoutubeClient {
  async function fetchTrailer(title: string): Promise<Trailer | null> {
    if (!apiKey) {
      throw new ApiError('YouTube', 'YouTube credentials missing. Configure VITE_YOUTUBE_API_KEY.')
    }

    const url = new URL(YOUTUBE_SEARCH_URL)
    url.searchParams.set('part', 'id')
    url.searchParams.set('q', trailerQuery(title))
    url.searchParams.set('type', 'video')
    url.searchParams.set('maxResults', '1')
    url.searchParams.set('key', apiKey)

    const response = await fetch(url.toString(), { headers: { accept: 'application/json' } })
    if (!response.ok) {
      console.error(`[YouTube] ${response.status} for "${title}"`)
      throw new ApiError('YouTube', `YouTube search failed (${response.status})`, response.status)
    }

    const payload = (await response.json()) as YoutubeSearchResponse
    const videoId = payload.items?.find((item) => item.id?.videoId)?.id?.videoId
    if (!videoId) {
      console.warn(`[YouTube] no trailer found for "${title}"`)
      return null
    }

    return toTrailer(videoId)
  }

  return { fetchTrailer }
}
