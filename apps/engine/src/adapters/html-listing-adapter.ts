/**
 * Selector-driven HTML listing adapter
 *
 * One class serves every search-results page that can be described by a
 * SiteManifest: a search URL per region, CSS selectors for the result
 * containers and their fields, and optional JSON-LD product data.
 *
 * Adapters stay stateless. They never retry or sleep; pacing belongs to the
 * governor and the deadline to the orchestrator.
 */

import * as cheerio from 'cheerio'
import type { AdapterContext, RawListing, SourceAdapter } from '../types.js'
import { SourceError } from '../lib/errors.js'
import { HttpFetcher } from './http-fetcher.js'
import { extractJsonLdListings } from './json-ld.js'

export interface SiteRegion {
  /** Search URL with a `{query}` placeholder */
  searchUrl: string
  currency: string
}

export interface SiteSelectors {
  /** One element per search result */
  item: string
  title: string
  price: string
  link: string
  rating?: string
  seller?: string
  availability?: string
}

export interface SiteManifest {
  id: string
  regions: Readonly<Record<string, SiteRegion>>
  selectors: SiteSelectors
  /** Higher runs first. A number applies to every region. */
  priority?: number | Readonly<Record<string, number>>
  /** Result titles matching any of these are ads or placeholders */
  skipTitles?: readonly RegExp[]
  maxItems?: number
  /** Also read schema.org Product data from JSON-LD blocks */
  jsonLd?: boolean
}

export interface HtmlListingAdapterOptions {
  fetcher?: HttpFetcher
}

const DEFAULT_MAX_ITEMS = 15

function text(value: string | undefined): string | undefined {
  const trimmed = value?.replace(/\s+/g, ' ').trim()
  return trimmed ? trimmed : undefined
}

export class HtmlListingAdapter implements SourceAdapter {
  readonly id: string
  private readonly fetcher: HttpFetcher

  constructor(
    readonly manifest: SiteManifest,
    options: HtmlListingAdapterOptions = {}
  ) {
    this.id = manifest.id
    this.fetcher = options.fetcher ?? new HttpFetcher(manifest.id)
  }

  supports(region: string): boolean {
    return Object.hasOwn(this.manifest.regions, region.toUpperCase())
  }

  priority(region: string): number {
    const { priority } = this.manifest
    if (typeof priority === 'number') return priority
    return priority?.[region.toUpperCase()] ?? 0
  }

  buildSearchUrl(query: string, region: string): string {
    const site = this.siteFor(region)
    return site.searchUrl.replace('{query}', encodeURIComponent(query.trim()).replace(/%20/g, '+'))
  }

  async search(query: string, region: string, ctx: AdapterContext): Promise<RawListing[]> {
    const url = this.buildSearchUrl(query, region)
    ctx.logger.debug('Fetching search page', { sourceId: this.id, url })

    const html = await this.fetcher.fetchHtml(url, { signal: ctx.signal })
    const listings = this.parse(html, region, url)

    ctx.logger.debug('Search page parsed', { sourceId: this.id, listings: listings.length })
    return listings
  }

  /**
   * Extract raw listings from a results page. Throws a parse_failure when the
   * page has result containers but none of them could be read, which usually
   * means the layout changed.
   */
  parse(html: string, region: string, pageUrl: string): RawListing[] {
    const site = this.siteFor(region)
    const { selectors } = this.manifest
    const maxItems = this.manifest.maxItems ?? DEFAULT_MAX_ITEMS
    const $ = cheerio.load(html)

    const listings: RawListing[] = []
    const seen = new Set<string>()
    const push = (listing: RawListing) => {
      if (seen.has(listing.url) || listings.length >= maxItems) return
      seen.add(listing.url)
      listings.push(listing)
    }

    const containers = $(selectors.item)
    containers.each((_, element) => {
      const item = $(element)
      const title = text(item.find(selectors.title).first().text())
      if (!title || this.isSkipped(title)) return

      const priceText = text(item.find(selectors.price).first().text())
      const href = item.find(selectors.link).first().attr('href')
      const url = this.resolveUrl(href, pageUrl)
      if (!priceText || !url) return

      const rating = selectors.rating ? text(item.find(selectors.rating).first().text()) : undefined
      const seller = selectors.seller ? text(item.find(selectors.seller).first().text()) : undefined
      const availability = selectors.availability
        ? text(item.find(selectors.availability).first().text())
        : undefined

      push({
        sourceId: this.id,
        title,
        priceText,
        url,
        rawAttributes: {
          currency: site.currency,
          ...(rating ? { rating } : {}),
          ...(seller ? { seller } : {}),
          ...(availability ? { availability } : {}),
        },
      })
    })

    if (this.manifest.jsonLd) {
      for (const product of extractJsonLdListings($)) {
        const url = this.resolveUrl(product.url, pageUrl)
        if (!url || this.isSkipped(product.title)) continue
        push({
          sourceId: this.id,
          title: product.title,
          priceText: product.priceText,
          url,
          rawAttributes: {
            currency: product.currency ?? site.currency,
            ...(product.rating ? { rating: product.rating } : {}),
            ...(product.seller ? { seller: product.seller } : {}),
            ...(product.availability ? { availability: product.availability } : {}),
          },
        })
      }
    }

    if (listings.length === 0 && containers.length > 0) {
      throw new SourceError(this.id, 'parse_failure', `${containers.length} result containers found but none could be read`)
    }

    return listings
  }

  private siteFor(region: string): SiteRegion {
    const site = this.manifest.regions[region.toUpperCase()]
    if (!site) {
      throw new SourceError(this.id, 'unavailable', `Region ${region} is not served by ${this.id}`)
    }
    return site
  }

  private isSkipped(title: string): boolean {
    return (this.manifest.skipTitles ?? []).some((pattern) => pattern.test(title))
  }

  private resolveUrl(href: string | undefined, base: string): string | undefined {
    if (!href) return undefined
    try {
      const url = new URL(href, base)
      return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : undefined
    } catch {
      return undefined
    }
  }
}
