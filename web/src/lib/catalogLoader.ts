import { z } from 'zod'

import { CatalogLoadError } from './errors'
import { RecommendationIndex, type CatalogRecord } from './recommendationIndex'

const ROW_KEY_PATTERN = /^\d+$/

const externalIdSchema = z.number().int().nonnegative()

const recordSchema = z
  .object({
    external_id: externalIdSchema.optional(),
    movie_id: externalIdSchema.optional(),
    title: z.string(),
  })
  .transform((record, context) => {
    const externalId = record.external_id ?? record.movie_id
    if (externalId === undefined) {
      context.addIssue({ code: z.ZodIssueCode.custom, message: 'external_id is required' })
      return z.NEVER
    }
    return { external_id: externalId, title: record.title }
  })

// Column-oriented dump keyed by row number: { title: { "0": ... }, movie_id: { "0": ... } }
const columnDumpSchema = z
  .object({
    movie_id: z.record(z.string(), externalIdSchema),
    title: z.record(z.string(), z.string()),
  })
  .passthrough()
  .transform((dump, context) => {
    const rowKeys = Object.keys(dump.title)
    const badKey = rowKeys.find((key) => !ROW_KEY_PATTERN.test(key))
    if (badKey !== undefined) {
      context.addIssue({ code: z.ZodIssueCode.custom, message: `row key "${badKey}" is not a row number` })
      return z.NEVER
    }
    rowKeys.sort((left, right) => Number(left) - Number(right))
    const rows: CatalogRecord[] = []

    for (const key of rowKeys) {
      const externalId = dump.movie_id[key]
      if (externalId === undefined) {
        context.addIssue({ code: z.ZodIssueCode.custom, message: `movie_id is missing for row ${key}` })
        return z.NEVER
      }
      rows.push({ external_id: externalId, title: dump.title[key] })
    }

    return rows
  })

const catalogSchema = z.union([z.array(recordSchema), columnDumpSchema])

const similaritySchema = z.array(z.array(z.number().finite()))

export type CatalogSource = {
  catalogUrl: string
  similarityUrl: string
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

export function parseCatalog(payload: unknown, url = 'catalog'): CatalogRecord[] {
  const parsed = catalogSchema.safeParse(payload)
  if (!parsed.success) {
    throw new CatalogLoadError(url, describeIssues(parsed.error))
  }
  return parsed.data
}

export function parseSimilarity(payload: unknown, url = 'similarity matrix'): number[][] {
  const parsed = similaritySchema.safeParse(payload)
  if (!parsed.success) {
    throw new CatalogLoadError(url, describeIssues(parsed.error))
  }
  return parsed.data
}

async function fetchDump(url: string): Promise<unknown> {
  let response: Response
  try {
    response = await fetch(url, { headers: { accept: 'application/json' } })
  } catch (error) {
    throw new CatalogLoadError(url, error instanceof Error ? error.message : 'network error')
  }

  if (!response.ok) {
    console.error(`[Catalog] ${response.status} on ${url}`)
    throw new CatalogLoadError(url, `request failed (${response.status})`)
  }

  try {
    return await response.json()
  } catch {
    throw new CatalogLoadError(url, 'response is not valid JSON')
  }
}

/**
 * Fetches the catalog and similarity dumps and builds the lookup index.
 * Throws `CatalogLoadError` for transport or shape problems and
 * `DimensionMismatchError` when the two dumps disagree on size.
 */
export async function loadRecommendationIndex(source: CatalogSource): Promise<RecommendationIndex> {
  const [catalogPayload, similarityPayload] = await Promise.all([
    fetchDump(source.catalogUrl),
    fetchDump(source.similarityUrl),
  ])

  const catalog = parseCatalog(catalogPayload, source.catalogUrl)
  const similarity = parseSimilarity(similarityPayload, source.similarityUrl)

  return new RecommendationIndex(catalog, similarity)
}
