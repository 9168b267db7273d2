import { EmbeddingDimensionError, MissingEmbeddingError } from './errors'

export interface Neighbor {
  id: string
  score: number
}

/** Cosine similarity clamped to [0,1]; zero vectors score 0. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) throw new EmbeddingDimensionError(a.length, b.length)
  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }
  if (normA === 0 || normB === 0) return 0
  const cos = dot / (Math.sqrt(normA) * Math.sqrt(normB))
  return Math.max(0, Math.min(1, cos))
}

export function meanVector(vectors: ReadonlyArray<readonly number[]>): number[] | undefined {
  if (vectors.length === 0) return undefined
  const dim = vectors[0].length
  const sum = new Array<number>(dim).fill(0)
  for (const v of vectors) {
    if (v.length !== dim) throw new EmbeddingDimensionError(dim, v.length)
    for (let i = 0; i < dim; i++) sum[i] += v[i]
  }
  return sum.map((x) => x / vectors.length)
}

function byScoreThenId(a: Neighbor, b: Neighbor) {
  return b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
}

/**
 * Read-mostly store of document embeddings. The index never computes vectors;
 * callers hand over what the embedding oracle produced.
 */
export class SimilarityIndex {
  private readonly vectors = new Map<string, number[]>()
  private dimension: number | undefined

  /** Throws `EmbeddingDimensionError` when `vector` could not be stored under `id`; writes nothing. */
  check(id: string, vector: readonly number[]) {
    // a lone vector may be replaced by one of any length
    const dimension = this.vectors.size === 1 && this.vectors.has(id) ? undefined : this.dimension
    if (vector.length === 0) throw new EmbeddingDimensionError(dimension ?? 0, 0, id)
    if (dimension !== undefined && vector.length !== dimension) {
      throw new EmbeddingDimensionError(dimension, vector.length, id)
    }
  }

  set(id: string, vector: readonly number[]) {
    this.check(id, vector)
    this.dimension = vector.length
    this.vectors.set(id, Array.from(vector))
  }

  has(id: string) {
    return this.vectors.has(id)
  }

  get(id: string): number[] {
    const v = this.vectors.get(id)
    if (!v) throw new MissingEmbeddingError(id)
    return v
  }

  delete(id: string) {
    const removed = this.vectors.delete(id)
    if (this.vectors.size === 0) this.dimension = undefined
    return removed
  }

  ids(): string[] {
    return Array.from(this.vectors.keys()).sort()
  }

  get size() {
    return this.vectors.size
  }

  similarity(idA: string, idB: string): number {
    return cosineSimilarity(this.get(idA), this.get(idB))
  }

  /** At most `k` neighbours, best first, ties broken by id. The query id itself is excluded. */
  kNearest(query: string | readonly number[], k: number): Neighbor[] {
    if (k <= 0) return []
    const queryId = typeof query === 'string' ? query : undefined
    const vector = typeof query === 'string' ? this.get(query) : query
    const neighbors: Neighbor[] = []
    for (const [id, v] of this.vectors) {
      if (id === queryId) continue
      neighbors.push({ id, score: cosineSimilarity(vector, v) })
    }
    return neighbors.sort(byScoreThenId).slice(0, k)
  }
}
