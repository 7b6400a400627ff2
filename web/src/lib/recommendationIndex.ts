import { DimensionMismatchError, InvalidScoreError, NotFoundError } from './errors'

export type CatalogRecord = {
  external_id: number
  title: string
}

export type CatalogItem = CatalogRecord & {
  index: number
}

export type Recommendation = CatalogItem & {
  score: number
}

export type SimilarityMatrix = ReadonlyArray<ReadonlyArray<number>>

export type RecommendResult =
  | { ok: true; query: CatalogItem; results: Recommendation[] }
  | { ok: false; error: NotFoundError }

export const DEFAULT_RECOMMENDATION_COUNT = 5

type ScoredNeighbor = {
  index: number
  score: number
}

function assertValidMatrix(size: number, similarity: SimilarityMatrix): void {
  if (similarity.length !== size) {
    throw new DimensionMismatchError(size, similarity.length)
  }

  for (let row = 0; row < similarity.length; row += 1) {
    const scores = similarity[row]
    if (scores.length !== size) {
      throw new DimensionMismatchError(size, scores.length, row)
    }
    // NaN would make the ranking comparator inconsistent.
    const column = scores.findIndex((score) => !Number.isFinite(score))
    if (column >= 0) {
      throw new InvalidScoreError(row, column, scores[column])
    }
  }
}

/**
 * Read-only view over a catalog and its precomputed item-item similarity
 * matrix. Built once at startup and shared by every lookup.
 */
export class RecommendationIndex {
  private readonly items: readonly CatalogItem[]
  private readonly similarity: SimilarityMatrix
  private readonly positionsByTitle: ReadonlyMap<string, number>

  constructor(records: readonly CatalogRecord[], similarity: SimilarityMatrix) {
    assertValidMatrix(records.length, similarity)

    this.items = Object.freeze(
      records.map((record, index) =>
        Object.freeze({ index, external_id: record.external_id, title: record.title }),
      ),
    )
    this.similarity = Object.freeze(similarity.map((row) => Object.freeze([...row])))

    const positions = new Map<string, number>()
    for (const item of this.items) {
      // Duplicate titles resolve to their first occurrence.
      if (!positions.has(item.title)) {
        positions.set(item.title, item.index)
      }
    }
    this.positionsByTitle = positions
  }

  get size(): number {
    return this.items.length
  }

  titles(): string[] {
    return this.items.map((item) => item.title)
  }

  itemAt(index: number): CatalogItem | null {
    return this.items[index] ?? null
  }

  findByTitle(title: string): CatalogItem | null {
    const index = this.positionsByTitle.get(title)
    return index === undefined ? null : this.items[index]
  }

  recommend(title: string, count: number = DEFAULT_RECOMMENDATION_COUNT): RecommendResult {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`count must be a non-negative integer, got ${count}`)
    }

    const query = this.findByTitle(title)
    if (!query) {
      return { ok: false, error: new NotFoundError(title) }
    }

    const neighbors: ScoredNeighbor[] = []
    this.similarity[query.index].forEach((score, index) => {
      if (index !== query.index) {
        neighbors.push({ index, score })
      }
    })

    // Array#sort is stable, so equal scores stay in catalog order.
    neighbors.sort((left, right) => right.score - left.score)

    const results = neighbors.slice(0, count).map((neighbor) => ({
      ...this.items[neighbor.index],
      score: neighbor.score,
    }))

    return { ok: true, query, results }
  }
}
