import { useEffect, useMemo, useState } from 'react'
import type { FormEvent } from 'react'

import { DetailsRibbon } from '../components/DetailsRibbon'
import { Loader } from '../components/Loader'
import { MovieCard } from '../components/MovieCard'
import { errorMessage } from '../lib/errors'
import { composeRecommendationsMail } from '../lib/mail'
import {
  POSTER_UNAVAILABLE_MESSAGE,
  TRAILER_UNAVAILABLE_MESSAGE,
  loadMovieDetails,
  type MovieDetails,
} from '../lib/movieDetails'
import type { RecommendationIndex } from '../lib/recommendationIndex'
import { useTransientMessage } from '../lib/useTransientMessage'
import type { Services } from '../services'

type HomePageProps = {
  index: RecommendationIndex
  services: Services
}

type DetailsState = MovieDetails & {
  loading: boolean
}

const EMPTY_DETAILS: DetailsState = {
  loading: true,
  info: null,
  infoError: null,
  trailer: null,
}

export function HomePage({ index, services }: HomePageProps) {
  const titles = useMemo(() => index.titles(), [index])
  const [selectedTitle, setSelectedTitle] = useState(() => titles[0] ?? '')
  const [details, setDetails] = useState<DetailsState>(EMPTY_DETAILS)
  const [posters, setPosters] = useState<Map<number, string>>(() => new Map())

  const [recipient, setRecipient] = useState('')
  const [sendingMail, setSendingMail] = useState(false)
  const [mailError, setMailError] = useState<string | null>(null)
  const [mailNotice, showMailNotice] = useTransientMessage()

  const lookup = useMemo(() => (selectedTitle ? index.recommend(selectedTitle) : null), [index, selectedTitle])
  const recommendations = useMemo(() => (lookup?.ok ? lookup.results : []), [lookup])

  useEffect(() => {
    if (!selectedTitle) {
      return
    }

    let cancelled = false

    async function loadDetails() {
      setDetails(EMPTY_DETAILS)

      const loaded = await loadMovieDetails(services.omdb, services.youtube, selectedTitle)
      if (!cancelled) {
        setDetails({ loading: false, ...loaded })
      }
    }

    void loadDetails()
    return () => {
      cancelled = true
    }
  }, [selectedTitle, services])

  useEffect(() => {
    let cancelled = false
    setPosters(new Map())

    async function loadPosters() {
      const urls = await services.tmdb.fetchPosterUrls(recommendations.map((item) => item.external_id))
      if (!cancelled) {
        setPosters(urls)
      }
    }

    if (recommendations.length > 0) {
      void loadPosters()
    }
    return () => {
      cancelled = true
    }
  }, [recommendations, services])

  async function handleSendMail(event: FormEvent<HTMLFormElement>) {
    event.preventDefault()
    setMailError(null)
    setSendingMail(true)

    try {
      const mail = composeRecommendationsMail(
        recipient,
        recommendations.map((item) => item.title),
        services.config.mailSender,
      )
      await services.mailer.send(mail)
      setRecipient('')
      showMailNotice('Mail sent successfully!')
    } catch (sendError) {
      setMailError(errorMessage(sendError, 'Mail could not be sent'))
    } finally {
      setSendingMail(false)
    }
  }

  if (titles.length === 0) {
    return (
      <main className="section-block">
        <p className="error-banner">The movie catalog is empty.</p>
      </main>
    )
  }

  const { info, infoError, trailer } = details

  return (
    <main>
      <section className="hero">
        <label className="picker">
          <span>Select a movie to explore</span>
          <select value={selectedTitle} onChange={(event) => setSelectedTitle(event.target.value)}>
            {titles.map((title, position) => (
              <option key={`${position}-${title}`} value={title}>
                {title}
              </option>
            ))}
          </select>
        </label>

        <div className="title-row">
          <h1>{selectedTitle}</h1>
          {!details.loading && (
            <p className="rating">{info?.imdbRating ? `⭐ IMDb rating: ${info.imdbRating}/10` : 'Rating not found'}</p>
          )}
        </div>

        {info && (
          <div className="ribbon-row">
            <DetailsRibbon
              entries={[
                { label: 'Released', value: info.year },
                { label: 'Rated', value: info.rated },
                { label: 'Runtime', value: info.runtime },
              ]}
            />
            <DetailsRibbon align="right" entries={[{ label: 'Genre', value: info.genre }]} />
          </div>
        )}
      </section>

      {details.loading ? (
        <Loader label="Loading movie details…" />
      ) : (
        <section className="section-block">
          {infoError && <p className="error-banner">{infoError}</p>}

          <div className="media-row">
            <div className="media-poster">
              {info?.posterUrl ? (
                <img src={info.posterUrl} alt={`${selectedTitle} poster`} />
              ) : (
                <p className="warning-banner">{POSTER_UNAVAILABLE_MESSAGE}</p>
              )}
            </div>
            <div className="media-trailer">
              {trailer ? (
                <iframe
                  src={trailer.embedUrl}
                  title={`${selectedTitle} trailer`}
                  allow="encrypted-media; picture-in-picture"
                  allowFullScreen
                />
              ) : (
                <p className="warning-banner">{TRAILER_UNAVAILABLE_MESSAGE}</p>
              )}
            </div>
          </div>

          {info?.plot && <p className="plot">{info.plot}</p>}
          {info && (
            <DetailsRibbon
              entries={[
                { label: 'Awards', value: info.awards },
                { label: 'Language', value: info.language },
              ]}
            />
          )}
        </section>
      )}

      <section className="section-block info-columns">
        <div>
          <h2>More information</h2>
          <details className="expander">
            <summary>Full cast and crew</summary>
            <p>
              <strong>Director:</strong> {info?.director ?? 'Unknown'}
            </p>
            <p>
              <strong>Writer:</strong> {info?.writer ?? 'Unknown'}
            </p>
            <p>
              <strong>Cast:</strong> {info?.actors ?? 'Unknown'}
            </p>
          </details>
          <details className="expander">
            <summary>Production and box office</summary>
            <p>
              <strong>Metascore:</strong> {info?.metascore ?? 'N/A'}
            </p>
            <p>
              <strong>Box office collection:</strong> {info?.boxOffice ?? 'N/A'}
            </p>
          </details>
        </div>

        <form className="mail-form" onSubmit={handleSendMail}>
          <label htmlFor="recommendations-recipient">Send the recommendations to your mail</label>
          <input
            id="recommendations-recipient"
            type="email"
            value={recipient}
            onChange={(event) => setRecipient(event.target.value)}
            placeholder="Enter your email id"
          />
          <button
            type="submit"
            className="button button-primary"
            disabled={sendingMail || recommendations.length === 0}
          >
            {sendingMail ? 'Sending…' : 'Send to email'}
          </button>
          {mailError && <p className="error-banner">{mailError}</p>}
          {mailNotice && <p className="success-banner">{mailNotice}</p>}
        </form>
      </section>

      <section className="section-block">
        <div className="section-heading">
          <h2>More flicks like this</h2>
        </div>
        {lookup && !lookup.ok ? (
          <p className="error-banner">{lookup.error.message}</p>
        ) : recommendations.length > 0 && posters.size === 0 ? (
          <Loader compact label="Fetching posters…" />
        ) : (
          <div className="movie-grid">
            {recommendations.map((movie, position) => (
              <MovieCard
                key={movie.index}
                title={movie.title}
                posterUrl={posters.get(movie.external_id) ?? null}
                rank={position + 1}
                similarityScore={movie.score}
              />
            ))}
          </div>
        )}
      </section>
    </main>
  )
}
