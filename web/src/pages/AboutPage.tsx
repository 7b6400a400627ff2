import { useState } from 'react'
import type { FormEvent } from 'react'

import { errorMessage } from '../lib/errors'
import { composeSubscriptionMail } from '../lib/mail'
import { useTransientMessage } from '../lib/useTransientMessage'
import type { Services } from '../services'

export function AboutPage({ services }: { services: Services }) {
  const [email, setEmail] = useState('')
  const [submitting, setSubmitting] = useState(false)
  const [error, setError] = useState<string | null>(null)
  const [notice, showNotice] = useTransientMessage()

  async function handleSubscribe(event: FormEvent<HTMLFormElement>) {
    event.preventDefault()
    setError(null)
    setSubmitting(true)

    try {
      const { mailSender, teamRecipient } = services.config
      await services.mailer.send(composeSubscriptionMail(email, teamRecipient, mailSender))
      setEmail('')
      showNotice('You have subscribed to the newsletter')
    } catch (subscribeError) {
      setError(errorMessage(subscribeError, 'Subscription failed'))
    } finally {
      setSubmitting(false)
    }
  }

  return (
    <main className="section-block about">
      <div className="section-heading">
        <h1>About Reelpick</h1>
      </div>

      <p className="hero-copy">
        Reelpick helps you browse a catalogue of movies, from classic to contemporary, with details about each one.
        Pick a title to watch its trailer, read the plot and get five recommendations drawn from a precomputed
        similarity matrix over the whole catalogue.
      </p>
      <p className="hero-copy">
        Posters come from the TMDB v3 API, plot and ratings from the OMDb API and trailers from the YouTube Data API.
        You can send the recommendations to your inbox from the home page.
      </p>

      <form className="mail-form" onSubmit={handleSubscribe}>
        <label htmlFor="newsletter-email">Join our mailing list</label>
        <input
          id="newsletter-email"
          type="email"
          value={email}
          onChange={(event) => setEmail(event.target.value)}
          placeholder="Enter your email id"
        />
        <button type="submit" className="button button-primary" disabled={submitting}>
          Subscribe to our newsletter
        </button>
        {error && <p className="error-banner">{error}</p>}
        {notice && <p className="success-banner">{notice}</p>}
      </form>
    </main>
  )
}
