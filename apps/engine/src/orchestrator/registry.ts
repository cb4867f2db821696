/**
 * Adapter Registry
 *
 * Adapters are registered explicitly at startup; there is no auto-discovery
 * and no process-wide instance.
 */

import { ConfigurationError } from '../lib/errors.js'
import type { SourceAdapter } from '../types.js'

function parseIdList(value: string | undefined): Set<string> | undefined {
  if (value === undefined) return undefined
  const ids = value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0)
  return ids.length > 0 ? new Set(ids) : undefined
}

export interface RejectedAdapter {
  adapterId: string
  error: unknown
}

export interface AdapterSelection {
  adapters: SourceAdapter[]
  rejected: RejectedAdapter[]
}

export class AdapterRegistry {
  private readonly adapters = new Map<string, SourceAdapter>()

  constructor(adapters: readonly SourceAdapter[] = []) {
    for (const adapter of adapters) {
      this.register(adapter)
    }
  }

  /**
   * Register an adapter.
   * @throws ConfigurationError if an adapter with the same id is already registered
   */
  register(adapter: SourceAdapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new ConfigurationError(`Adapter with ID '${adapter.id}' is already registered`)
    }
    this.adapters.set(adapter.id, adapter)
  }

  get(adapterId: string): SourceAdapter | undefined {
    return this.adapters.get(adapterId)
  }

  list(): string[] {
    return Array.from(this.adapters.keys())
  }

  size(): number {
    return this.adapters.size
  }

  /**
   * Adapters that serve `region`, narrowed by the `sources` / `excludeSources`
   * filters and ordered by priority (highest first), then id.
   */
  applicable(region: string, filters: Readonly<Record<string, string>> = {}): SourceAdapter[] {
    return this.select(region, filters).adapters
  }

  /**
   * As `applicable`, but an adapter whose `supports` or `priority` throws is
   * returned under `rejected` instead of failing the whole selection.
   */
  select(region: string, filters: Readonly<Record<string, string>> = {}): AdapterSelection {
    const include = parseIdList(filters.sources)
    const exclude = parseIdList(filters.excludeSources)
    const ranked: Array<{ adapter: SourceAdapter; priority: number }> = []
    const rejected: RejectedAdapter[] = []

    for (const adapter of this.adapters.values()) {
      if (include && !include.has(adapter.id)) continue
      if (exclude && exclude.has(adapter.id)) continue
      try {
        if (!adapter.supports(region)) continue
        ranked.push({ adapter, priority: adapter.priority?.(region) ?? 0 })
      } catch (error) {
        rejected.push({ adapterId: adapter.id, error })
      }
    }

    return {
      adapters: ranked
        .sort((a, b) => b.priority - a.priority || (a.adapter.id < b.adapter.id ? -1 : 1))
        .map(({ adapter }) => adapter),
      rejected: rejected.sort((a, b) => (a.adapterId < b.adapterId ? -1 : 1)),
    }
  }
}
