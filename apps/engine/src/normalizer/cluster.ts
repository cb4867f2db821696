import { createHash } from 'node:crypto'

/**
 * Disjoint-set forest with path halving and union by size.
 */
export class UnionFind {
  private readonly parent: number[]
  private readonly size: number[]

  constructor(count: number) {
    this.parent = Array.from({ length: count }, (_, i) => i)
    this.size = new Array<number>(count).fill(1)
  }

  find(index: number): number {
    let node = index
    while (this.parent[node] !== node) {
      this.parent[node] = this.parent[this.parent[node]]
      node = this.parent[node]
    }
    return node
  }

  union(a: number, b: number): void {
    let rootA = this.find(a)
    let rootB = this.find(b)
    if (rootA === rootB) return
    if (this.size[rootA] < this.size[rootB]) {
      ;[rootA, rootB] = [rootB, rootA]
    }
    this.parent[rootB] = rootA
    this.size[rootA] += this.size[rootB]
  }

  /** Members grouped by root, each group in ascending index order. */
  groups(): number[][] {
    const byRoot = new Map<number, number[]>()
    for (let i = 0; i < this.parent.length; i++) {
      const root = this.find(i)
      const group = byRoot.get(root)
      if (group) {
        group.push(i)
      } else {
        byRoot.set(root, [i])
      }
    }
    return [...byRoot.values()]
  }
}

/**
 * Group items whose pairwise similarity exceeds the threshold. Grouping is
 * transitive: A~B and B~C puts A, B and C together.
 */
export function clusterBySimilarity<T>(
  items: readonly T[],
  similarity: (a: T, b: T) => number,
  threshold: number
): T[][] {
  const sets = new UnionFind(items.length)
  for (let i = 0; i < items.length; i++) {
    for (let j = i + 1; j < items.length; j++) {
      if (sets.find(i) === sets.find(j)) continue
      if (similarity(items[i], items[j]) > threshold) {
        sets.union(i, j)
      }
    }
  }
  return sets.groups().map((group) => group.map((index) => items[index]))
}

/**
 * Stable cluster id from member keys, independent of member order.
 */
export function clusterId(memberKeys: readonly string[]): string {
  const digest = createHash('sha256').update([...memberKeys].sort().join('\n')).digest('hex')
  return `cl_${digest.slice(0, 12)}`
}
