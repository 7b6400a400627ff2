import { errorMessage } from './errors'
import type { MovieInfo, OmdbClient } from './omdb'
import type { Trailer, YoutubeClient } from './youtube'

export const TRAILER_UNAVAILABLE_MESSAGE = 'Video is unavailable at the moment'
export const POSTER_UNAVAILABLE_MESSAGE = 'Poster is unavailable at the moment'

export type MovieDetails = {
  info: MovieInfo | null
  infoError: string | null
  trailer: Trailer | null
}

/**
 * Looks up OMDb details and a YouTube trailer side by side. Neither lookup
 * failing stops the other; a missing trailer leaves `trailer` null so the
 * page shows the unavailable notice.
 */
export async function loadMovieDetails(
  omdb: OmdbClient,
  youtube: YoutubeClient,
  title: string,
): Promise<MovieDetails> {
  const [infoResult, trailerResult] = await Promise.allSettled([
    omdb.fetchMovieInfo(title),
    youtube.fetchTrailer(title),
  ])

  if (trailerResult.status === 'rejected') {
    console.warn('[YouTube] trailer lookup failed', trailerResult.reason)
  }

  return {
    info: infoResult.status === 'fulfilled' ? infoResult.value : null,
    infoError: infoResult.status === 'rejected' ? errorMessage(infoResult.reason, 'Movie details are unavailable') : null,
    trailer: trailerResult.status === 'fulfilled' ? trailerResult.value : null,
  }
}
