import { beforeEach, describe, expect, it } from 'vitest'

import { jsonResponse, silenceConsole, stubFetch } from '../test/http'
import { loadRecommendationIndex, parseCatalog, parseSimilarity } from './catalogLoader'
import { CatalogLoadError, DimensionMismatchError } from './errors'

const SOURCE = {
  catalogUrl: '/data/catalog.json',
  similarityUrl: '/data/similarity.json',
}

const CATALOG = [
  { external_id: 27205, title: 'Inception' },
  { external_id: 603, title: 'The Matrix' },
  { external_id: 157336, title: 'Interstellar' },
]

const SIMILARITY = [
  [1, 0.4, 0.7],
  [0.4, 1, 0.2],
  [0.7, 0.2, 1],
]

describe('parseCatalog', () => {
  it('reads a record array', () => {
    expect(parseCatalog(CATALOG)).toEqual(CATALOG)
  })

  it('accepts movie_id as the external id', () => {
    expect(parseCatalog([{ movie_id: 603, title: 'The Matrix' }])).toEqual([
      { external_id: 603, title: 'The Matrix' },
    ])
  })

  it('reads a column dump in row-number order and ignores extra columns', () => {
    const dump = {
      movie_id: { '0': 27205, '2': 157336, '10': 11, '1': 603 },
      title: { '10': 'Star Wars', '1': 'The Matrix', '0': 'Inception', '2': 'Interstellar' },
      tags: { '0': 'dream heist', '1': 'simulation', '2': 'space', '10': 'space opera' },
    }

    expect(parseCatalog(dump)).toEqual([
      { external_id: 27205, title: 'Inception' },
      { external_id: 603, title: 'The Matrix' },
      { external_id: 157336, title: 'Interstellar' },
      { external_id: 11, title: 'Star Wars' },
    ])
  })

  it('rejects a column dump with a missing id', () => {
    const dump = {
      movie_id: { '0': 27205 },
      title: { '0': 'Inception', '1': 'The Matrix' },
    }

    expect(() => parseCatalog(dump, 'catalog.json')).toThrow(CatalogLoadError)
    expect(() => parseCatalog(dump, 'catalog.json')).toThrow('movie_id is missing for row 1')
  })

  it('rejects a column dump whose row keys are not row numbers', () => {
    const dump = {
      movie_id: { '0': 27205, x: 603, '1': 157336 },
      title: { x: 'The Matrix', '0': 'Inception', '1': 'Interstellar' },
    }

    expect(() => parseCatalog(dump, 'catalog.json')).toThrow(CatalogLoadError)
    expect(() => parseCatalog(dump, 'catalog.json')).toThrow('row key "x" is not a row number')
  })

  it('rejects records without an id or title', () => {
    expect(() => parseCatalog([{ title: 'No id' }])).toThrow(CatalogLoadError)
    expect(() => parseCatalog([{ external_id: 1 }])).toThrow(CatalogLoadError)
    expect(() => parseCatalog('not a catalog')).toThrow(CatalogLoadError)
  })
})

describe('parseSimilarity', () => {
  it('reads a numeric matrix', () => {
    expect(parseSimilarity(SIMILARITY)).toEqual(SIMILARITY)
  })

  it('names the offending cell', () => {
    expect(() => parseSimilarity([[1, 'x']], 'similarity.json')).toThrow(
      'Could not load similarity.json: 0.1: Expected number, received string',
    )
  })

  it('rejects non-finite scores', () => {
    expect(() => parseSimilarity([[Number.NaN]])).toThrow(CatalogLoadError)
    expect(() => parseSimilarity([[Number.POSITIVE_INFINITY]])).toThrow(CatalogLoadError)
  })
})

describe('loadRecommendationIndex', () => {
  beforeEach(() => {
    silenceConsole()
  })

  it('builds an index from both dumps', async () => {
    const { calls } = stubFetch((url) => jsonResponse(url === SOURCE.catalogUrl ? CATALOG : SIMILARITY))

    const index = await loadRecommendationIndex(SOURCE)

    expect(calls.map((call) => call.url).sort()).toEqual(['/data/catalog.json', '/data/similarity.json'])
    expect(index.size).toBe(3)
    const result = index.recommend('Inception')
    expect(result.ok && result.results.map((item) => item.title)).toEqual(['Interstellar', 'The Matrix'])
  })

  it('fails with DimensionMismatchError when the dumps disagree', async () => {
    stubFetch((url) => jsonResponse(url === SOURCE.catalogUrl ? CATALOG : SIMILARITY.slice(0, 2)))

    await expect(loadRecommendationIndex(SOURCE)).rejects.toBeInstanceOf(DimensionMismatchError)
  })

  it('fails with CatalogLoadError on a bad status', async () => {
    stubFetch((url) => (url === SOURCE.catalogUrl ? jsonResponse({}, 404) : jsonResponse(SIMILARITY)))

    await expect(loadRecommendationIndex(SOURCE)).rejects.toThrow(
      'Could not load /data/catalog.json: request failed (404)',
    )
  })

  it('fails with CatalogLoadError when the request cannot be made', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed')
    })

    await expect(loadRecommendationIndex(SOURCE)).rejects.toBeInstanceOf(CatalogLoadError)
  })

  it('fails with CatalogLoadError on a body that is not JSON', async () => {
    stubFetch((url) => (url === SOURCE.catalogUrl ? new Response('<html>') : jsonResponse(SIMILARITY)))

    await expect(loadRecommendationIndex(SOURCE)).rejects.toThrow(
      'Could not load /data/catalog.json: response is not valid JSON',
    )
  })
})
