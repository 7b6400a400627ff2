import { useEffect, useState } from 'react'
import { NavLink, Route, Routes } from 'react-router-dom'

import { Loader } from './components/Loader'
import { loadRecommendationIndex } from './lib/catalogLoader'
import { errorMessage } from './lib/errors'
import type { RecommendationIndex } from './lib/recommendationIndex'
import { AboutPage } from './pages/AboutPage'
import { BugReportPage } from './pages/BugReportPage'
import { HomePage } from './pages/HomePage'
import type { Services } from './services'
import './App.css'

type CatalogState =
  | { status: 'loading' }
  | { status: 'ready'; index: RecommendationIndex }
  | { status: 'failed'; message: string }

function App({ services }: { services: Services }) {
  const [serviceStatus, setServiceStatus] = useState<'checking' | 'online' | 'offline'>('checking')
  const [catalog, setCatalog] = useState<CatalogState>({ status: 'loading' })

  useEffect(() => {
    let cancelled = false

    async function checkHealth() {
      try {
        await services.tmdb.getHealth()
        if (!cancelled) {
          setServiceStatus('online')
        }
      } catch (error) {
        console.warn('TMDB health check failed', error)
        if (!cancelled) {
          setServiceStatus('offline')
        }
      }
    }

    void checkHealth()
    return () => {
      cancelled = true
    }
  }, [services])

  useEffect(() => {
    let cancelled = false

    async function loadCatalog() {
      try {
        const index = await loadRecommendationIndex(services.config)
        if (!cancelled) {
          setCatalog({ status: 'ready', index })
        }
      } catch (error) {
        console.error('Catalog failed to load', error)
        if (!cancelled) {
          setCatalog({ status: 'failed', message: errorMessage(error, 'Catalog failed to load') })
        }
      }
    }

    void loadCatalog()
    return () => {
      cancelled = true
    }
  }, [services])

  return (
    <div className="app-shell">
      <header className="topbar">
        <div className="brand-wrap">
          <p className="eyebrow">Reelpick</p>
          <p className="tagline">Movies like the ones you love</p>
        </div>

        <nav className="nav-links">
          <NavLink to="/" end>
            Home
          </NavLink>
          <NavLink to="/about">About</NavLink>
          <NavLink to="/report">Report a bug</NavLink>
        </nav>

        <p className={`service-pill service-${serviceStatus}`}>
          TMDB {serviceStatus === 'checking' ? 'checking' : serviceStatus}
        </p>
      </header>

      <Routes>
        <Route
          path="/"
          element={
            catalog.status === 'ready' ? (
              <HomePage index={catalog.index} services={services} />
            ) : catalog.status === 'failed' ? (
              <main className="section-block">
                <p className="error-banner">The web app is down: {catalog.message}</p>
              </main>
            ) : (
              <Loader label="Loading the movie catalog…" />
            )
          }
        />
        <Route path="/about" element={<AboutPage services={services} />} />
        <Route path="/report" element={<BugReportPage services={services} />} />
      </Routes>

      <footer className="footer">Reelpick • Poster and details courtesy of TMDB, OMDb and YouTube</footer>
    </div>
  )
}

export default App
