/**
 * Text Similarity Module
 *
 * Compares normalized listing titles.
 *
 * Design notes:
 * - Dice overlap on token sets carries most of the weight (order-insensitive)
 * - Levenshtein over the sorted tokens catches near-identical spellings
 * - A differing variant token (pro, max, ultra...) marks a different product
 * - Differing specs of the same shape (128gb vs 256gb, 15 vs 16) mark a different product
 */

export interface SimilarityWeights {
  tokenWeight: number
  editWeight: number
  variantPenalty: number
  conflictPenalty: number
}

/**
 * Split a normalized name into tokens
 */
export function tokenize(normalizedName: string): string[] {
  return normalizedName.split(' ').filter((token) => token.length > 0)
}

/**
 * Dice coefficient on token sets
 *
 * Dice(A, B) = 2|A ∩ B| / (|A| + |B|)
 */
export function diceSimilarity(tokens1: ReadonlySet<string>, tokens2: ReadonlySet<string>): number {
  if (tokens1.size === 0 || tokens2.size === 0) return 0

  let intersection = 0
  for (const token of tokens1) {
    if (tokens2.has(token)) intersection++
  }

  return (2 * intersection) / (tokens1.size + tokens2.size)
}

/**
 * Compute normalized Levenshtein similarity between two texts
 *
 * Returns 1 - (editDistance / maxLength), clamped to [0, 1]
 */
export function levenshteinSimilarity(text1: string, text2: string): number {
  if (!text1 || !text2) return 0
  if (text1 === text2) return 1

  const m = text1.length
  const n = text2.length

  // Two-row dynamic programming
  let previous = Array.from({ length: n + 1 }, (_, j) => j)
  let current = new Array<number>(n + 1).fill(0)

  for (let i = 1; i <= m; i++) {
    current[0] = i
    for (let j = 1; j <= n; j++) {
      const cost = text1[i - 1] === text2[j - 1] ? 0 : 1
      current[j] = Math.min(
        previous[j] + 1, // deletion
        current[j - 1] + 1, // insertion
        previous[j - 1] + cost // substitution
      )
    }
    ;[previous, current] = [current, previous]
  }

  const distance = previous[n]
  return Math.max(0, 1 - distance / Math.max(m, n))
}

/**
 * Shape of a spec-like token: "num" for bare numbers, "unit:gb" for 128gb.
 * Tokens without digits have no shape.
 */
function specShape(token: string): string | undefined {
  if (/^\d+$/.test(token)) return 'num'
  const unit = token.match(/^\d+(?:\.\d+)?([a-z]+)$/)
  return unit ? `unit:${unit[1]}` : undefined
}

function hasConflictingSpec(only1: string[], only2: string[]): boolean {
  const shapes = new Set<string>()
  for (const token of only1) {
    const shape = specShape(token)
    if (shape) shapes.add(shape)
  }
  return only2.some((token) => {
    const shape = specShape(token)
    return shape !== undefined && shapes.has(shape)
  })
}

/**
 * Similarity of two normalized names in [0, 1]
 */
export function titleSimilarity(
  name1: string,
  name2: string,
  weights: SimilarityWeights,
  variantTokens: ReadonlySet<string>
): number {
  const set1 = new Set(tokenize(name1))
  const set2 = new Set(tokenize(name2))
  if (set1.size === 0 || set2.size === 0) return 0

  const dice = diceSimilarity(set1, set2)
  const edit = levenshteinSimilarity([...set1].sort().join(' '), [...set2].sort().join(' '))
  let score = weights.tokenWeight * dice + weights.editWeight * edit

  const only1 = [...set1].filter((token) => !set2.has(token))
  const only2 = [...set2].filter((token) => !set1.has(token))

  if ([...only1, ...only2].some((token) => variantTokens.has(token))) {
    score -= weights.variantPenalty
  }
  if (hasConflictingSpec(only1, only2)) {
    score -= weights.conflictPenalty
  }

  return Math.min(1, Math.max(0, score))
}
