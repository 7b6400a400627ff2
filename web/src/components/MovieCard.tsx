type MovieCardProps = {
  title: string
  posterUrl: string | null
  rank?: number
  similarityScore?: number
}

function formatScore(score: number): string {
  return `${Math.round(score * 100)}% similar`
}

export function MovieCard({ title, posterUrl, rank, similarityScore }: MovieCardProps) {
  return (
    <article className="movie-card">
      <div className="movie-card-poster-wrap">
        {posterUrl ? (
          <img className="movie-card-poster" src={posterUrl} alt={`${title} poster`} loading="lazy" />
        ) : (
          <div className="movie-card-poster movie-card-poster-pending" aria-hidden />
        )}
        {typeof rank === 'number' && <span className="rank-badge">#{rank}</span>}
      </div>

      <div className="movie-card-content">
        <h3>{title}</h3>
        {typeof similarityScore === 'number' && <p className="movie-meta">{formatScore(similarityScore)}</p>}
      </div>
    </article>
  )
}
