/**
 * Bundled source adapters
 *
 * Register them explicitly:
 *   new AdapterRegistry(createSiteAdapters())
 */

import type { SourceAdapter } from '../types.js'
import { HtmlListingAdapter } from './html-listing-adapter.js'
import { HttpFetcher, type HttpFetcherOptions } from './http-fetcher.js'
import { BESTBUY_MANIFEST } from './sites/bestbuy.js'
import { EBAY_MANIFEST } from './sites/ebay.js'

export const SITE_MANIFESTS = [EBAY_MANIFEST, BESTBUY_MANIFEST] as const

export function createSiteAdapters(fetcherOptions: HttpFetcherOptions = {}): SourceAdapter[] {
  return SITE_MANIFESTS.map(
    (manifest) => new HtmlListingAdapter(manifest, { fetcher: new HttpFetcher(manifest.id, fetcherOptions) })
  )
}

export { HtmlListingAdapter, type SiteManifest, type SiteRegion, type SiteSelectors } from './html-listing-adapter.js'
export { HttpFetcher, DEFAULT_FETCH_HEADERS, type HttpFetcherOptions } from './http-fetcher.js'
export { BESTBUY_MANIFEST } from './sites/bestbuy.js'
export { EBAY_MANIFEST } from './sites/ebay.js'
