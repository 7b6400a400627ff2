export class NotFoundError extends Error {
  readonly title: string

  constructor(title: string) {
    super(`Could not find movie "${title}"`)
    this.name = 'NotFoundError'
    this.title = title
  }
}

/**
 * The similarity matrix does not line up with the catalog. `row` is set when
 * the matrix has the right number of rows but one of them has the wrong width.
 */
export class DimensionMismatchError extends Error {
  readonly catalogSize: number
  readonly actualSize: number
  readonly row: number | null

  constructor(catalogSize: number, actualSize: number, row: number | null = null) {
    super(
      row === null
        ? `Similarity matrix has ${actualSize} rows but the catalog has ${catalogSize} items`
        : `Similarity matrix row ${row} has ${actualSize} entries but the catalog has ${catalogSize} items`,
    )
    this.name = 'DimensionMismatchError'
    this.catalogSize = catalogSize
    this.actualSize = actualSize
    this.row = row
  }
}

export class InvalidScoreError extends Error {
  readonly row: number
  readonly column: number

  constructor(row: number, column: number, score: number) {
    super(`Similarity matrix cell [${row}][${column}] is ${score}; scores must be finite numbers`)
    this.name = 'InvalidScoreError'
    this.row = row
    this.column = column
  }
}

export class CatalogLoadError extends Error {
  readonly url: string

  constructor(url: string, message: string) {
    super(`Could not load ${url}: ${message}`)
    this.name = 'CatalogLoadError'
    this.url = url
  }
}

type ApiService = 'TMDB' | 'OMDb' | 'YouTube'

export class ApiError extends Error {
  readonly service: ApiService
  readonly status: number | null

  constructor(service: ApiService, message: string, status: number | null = null) {
    super(message)
    this.name = 'ApiError'
    this.service = service
    this.status = status
  }
}

export class MailError extends Error {
  readonly status: number | null

  constructor(message: string, status: number | null = null) {
    super(message)
    this.name = 'MailError'
    this.status = status
  }
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback
}
