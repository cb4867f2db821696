/**
 * Exact cosine top-K over an in-memory id → vector map.
 */

export interface VectorMatch {
  id: string
  score: number
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector dimensions differ: ${a.length} vs ${b.length}`)
  }

  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }

  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

export class VectorIndex {
  private readonly vectors = new Map<string, readonly number[]>()

  constructor(readonly dimensions: number) {}

  get size(): number {
    return this.vectors.size
  }

  add(id: string, vector: readonly number[]): void {
    if (vector.length !== this.dimensions) {
      throw new RangeError(`Expected a ${this.dimensions}-dimension vector for ${id}, got ${vector.length}`)
    }
    this.vectors.set(id, vector)
  }

  has(id: string): boolean {
    return this.vectors.has(id)
  }

  /**
   * The k most similar vectors, best first; equal scores order by id.
   */
  search(query: readonly number[], k: number): VectorMatch[] {
    if (k <= 0) return []

    const matches: VectorMatch[] = []
    for (const [id, vector] of this.vectors) {
      matches.push({ id, score: cosineSimilarity(query, vector) })
    }

    return matches.sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)).slice(0, k)
  }
}
