/**
 * Text embedders
 *
 * The engine only needs `embed(text) → number[]` with a fixed dimension.
 * HashingEmbedder is the local default: feature hashing over title tokens and
 * adjacent token pairs, L2-normalized, so cosine similarity is a dot product.
 * A model-backed embedder can replace it behind the same interface.
 */

import { tokenizeTitle } from '../normalizer/title.js'

export interface Embedder {
  readonly dimensions: number
  embed(text: string): Promise<number[]>
}

export const DEFAULT_EMBEDDING_DIMENSIONS = 1024

const FNV_OFFSET = 2166136261
const FNV_PRIME = 16777619
const BIGRAM_WEIGHT = 0.5

/** 32-bit FNV-1a over UTF-16 code units */
export function fnv1a(text: string): number {
  let hash = FNV_OFFSET
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i)
    hash = Math.imul(hash, FNV_PRIME) >>> 0
  }
  return hash
}

export function l2Normalize(vector: number[]): number[] {
  let sumSquares = 0
  for (const value of vector) sumSquares += value * value
  if (sumSquares === 0) return vector
  const norm = Math.sqrt(sumSquares)
  return vector.map((value) => value / norm)
}

export class HashingEmbedder implements Embedder {
  constructor(readonly dimensions: number = DEFAULT_EMBEDDING_DIMENSIONS) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new RangeError(`dimensions must be a positive integer, got ${dimensions}`)
    }
  }

  async embed(text: string): Promise<number[]> {
    return this.embedSync(text)
  }

  embedSync(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0)
    const tokens = tokenizeTitle(text)

    const add = (feature: string, weight: number) => {
      const hash = fnv1a(feature)
      // Bit 16 picks the sign so colliding features tend to cancel
      const sign = (hash >>> 16) & 1 ? -1 : 1
      vector[hash % this.dimensions] += sign * weight
    }

    for (let i = 0; i < tokens.length; i++) {
      add(tokens[i], 1)
      if (i + 1 < tokens.length) add(`${tokens[i]} ${tokens[i + 1]}`, BIGRAM_WEIGHT)
    }

    return l2Normalize(vector)
  }
}
