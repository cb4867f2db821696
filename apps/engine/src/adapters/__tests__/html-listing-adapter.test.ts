import { describe, it, expect, vi } from 'vitest'
import { silentLogger } from '@pricelens/logger'
import { HtmlListingAdapter, type SiteManifest } from '../html-listing-adapter.js'
import { HttpFetcher } from '../http-fetcher.js'
import { BESTBUY_MANIFEST } from '../sites/bestbuy.js'
import { EBAY_MANIFEST } from '../sites/ebay.js'
import { SourceError } from '../../lib/errors.js'

const EBAY_PAGE = 'https://www.ebay.com/sch/i.html?_nkw=iphone+16+pro&_sacat=0&LH_BIN=1&_sop=15&rt=nc'
const BESTBUY_PAGE = 'https://www.bestbuy.com/site/searchpage.jsp?st=sony'

const EBAY_HTML = `
<ul class="srp-results">
  <li class="s-item">
    <a class="s-item__link" href="https://www.ebay.com/itm/1"><div class="s-item__title">Shop on eBay</div></a>
    <span class="s-item__price">$20.00</span>
  </li>
  <li class="s-item">
    <a class="s-item__link" href="/itm/2"><div class="s-item__title">Apple iPhone 16 Pro
      128GB</div></a>
    <span class="s-item__price">$999.00</span>
    <span class="s-item__seller-info-text">phonehub (1,204) 99.8%</span>
  </li>
  <li class="s-item">
    <a class="s-item__link" href="https://www.ebay.com/itm/3"><div class="s-item__title">iPhone 16 Pro case</div></a>
  </li>
  <li class="s-item">
    <a class="s-item__link" href="javascript:void(0)"><div class="s-item__title">Bad link</div></a>
    <span class="s-item__price">$5.00</span>
  </li>
</ul>`

const PRODUCT_JSON_LD = JSON.stringify({
  '@context': 'https://schema.org',
  '@type': 'ItemList',
  itemListElement: [
    {
      '@type': 'ListItem',
      position: 1,
      item: {
        '@type': 'Product',
        name: 'Sony WH-1000XM5 Wireless Headphones',
        url: '/site/sony-wh1000xm5/6505727.p',
        offers: {
          '@type': 'Offer',
          price: '329.99',
          priceCurrency: 'USD',
          availability: 'https://schema.org/InStock',
          seller: { '@type': 'Organization', name: 'Best Buy' },
        },
        aggregateRating: { '@type': 'AggregateRating', ratingValue: 4.7 },
      },
    },
    { '@type': 'ListItem', position: 2, item: { '@type': 'Product', name: 'Gift card' } },
  ],
})

function manifest(overrides: Partial<SiteManifest> = {}): SiteManifest {
  return {
    id: 'shop',
    regions: { US: { searchUrl: 'https://shop.example/search?q={query}', currency: 'USD' } },
    selectors: { item: '.result', title: '.name', price: '.price', link: 'a' },
    ...overrides,
  }
}

function resultItems(count: number): string {
  return Array.from(
    { length: count },
    (_, i) => `<div class="result"><a href="/p/${i + 1}"><span class="name">Item ${i + 1}</span></a><b class="price">$${i + 10}</b></div>`
  ).join('')
}

describe('HtmlListingAdapter', () => {
  describe('regions', () => {
    const ebay = new HtmlListingAdapter(EBAY_MANIFEST)
    const bestbuy = new HtmlListingAdapter(BESTBUY_MANIFEST)

    it('supports regions case-insensitively', () => {
      expect(ebay.supports('us')).toBe(true)
      expect(ebay.supports('GB')).toBe(true)
      expect(ebay.supports('BR')).toBe(false)
      expect(bestbuy.supports('GB')).toBe(false)
    })

    it('reads per-region and flat priorities', () => {
      expect(ebay.priority('DE')).toBe(1)
      expect(bestbuy.priority('us')).toBe(2)
      expect(bestbuy.priority('CA')).toBe(0)
    })

    it('builds search URLs with encoded queries', () => {
      expect(ebay.buildSearchUrl(' iphone 16 pro ', 'US')).toBe(EBAY_PAGE)
      expect(ebay.buildSearchUrl('pixel & case', 'gb')).toBe(
        'https://www.ebay.co.uk/sch/i.html?_nkw=pixel+%26+case&_sacat=0&LH_BIN=1&_sop=15&rt=nc'
      )
    })

    it('reports an unserved region as unavailable', () => {
      expect(() => bestbuy.buildSearchUrl('tv', 'GB')).toThrow(SourceError)
      try {
        bestbuy.buildSearchUrl('tv', 'GB')
      } catch (error) {
        expect(error).toMatchObject({ kind: 'unavailable', sourceId: 'bestbuy' })
      }
    })
  })

  describe('parse', () => {
    it('reads result containers and skips placeholders and unusable rows', () => {
      const adapter = new HtmlListingAdapter(EBAY_MANIFEST)

      const listings = adapter.parse(EBAY_HTML, 'US', EBAY_PAGE)

      expect(listings).toEqual([
        {
          sourceId: 'ebay',
          title: 'Apple iPhone 16 Pro 128GB',
          priceText: '$999.00',
          url: 'https://www.ebay.com/itm/2',
          rawAttributes: { currency: 'USD', seller: 'phonehub (1,204) 99.8%' },
        },
      ])
    })

    it('uses the region currency', () => {
      const adapter = new HtmlListingAdapter(EBAY_MANIFEST)

      const [listing] = adapter.parse(EBAY_HTML, 'DE', 'https://www.ebay.de/sch/i.html')

      expect(listing.rawAttributes.currency).toBe('EUR')
      expect(listing.url).toBe('https://www.ebay.de/itm/2')
    })

    it('returns nothing for a page without result containers', () => {
      const adapter = new HtmlListingAdapter(EBAY_MANIFEST)

      expect(adapter.parse('<html><body><p>No exact matches found</p></body></html>', 'US', EBAY_PAGE)).toEqual([])
    })

    it('throws parse_failure when containers exist but none can be read', () => {
      const adapter = new HtmlListingAdapter(manifest())
      const html = '<div class="result"><span class="name">One</span></div><div class="result"><b class="price">$1</b></div>'

      let thrown: unknown
      try {
        adapter.parse(html, 'US', 'https://shop.example/search?q=x')
      } catch (error) {
        thrown = error
      }

      expect(thrown).toBeInstanceOf(SourceError)
      expect(thrown).toMatchObject({
        kind: 'parse_failure',
        sourceId: 'shop',
        message: '2 result containers found but none could be read',
      })
    })

    it('caps listings at maxItems', () => {
      const adapter = new HtmlListingAdapter(manifest({ maxItems: 2 }))

      const listings = adapter.parse(resultItems(3), 'US', 'https://shop.example/search?q=x')

      expect(listings.map((l) => l.url)).toEqual(['https://shop.example/p/1', 'https://shop.example/p/2'])
      expect(listings.map((l) => l.priceText)).toEqual(['$10', '$11'])
    })

    it('keeps the first copy of a repeated URL', () => {
      const adapter = new HtmlListingAdapter(manifest())
      const html =
        '<div class="result"><a href="/p/1"><span class="name">First</span></a><b class="price">$10</b></div>' +
        '<div class="result"><a href="/p/1"><span class="name">Second</span></a><b class="price">$12</b></div>'

      const listings = adapter.parse(html, 'US', 'https://shop.example/search?q=x')

      expect(listings.map((l) => l.title)).toEqual(['First'])
    })

    it('reads JSON-LD products when enabled', () => {
      const adapter = new HtmlListingAdapter(BESTBUY_MANIFEST)
      const html = `
        <script type="application/ld+json">{ not json</script>
        <script type="application/ld+json">${PRODUCT_JSON_LD}</script>`

      const listings = adapter.parse(html, 'US', BESTBUY_PAGE)

      expect(listings).toEqual([
        {
          sourceId: 'bestbuy',
          title: 'Sony WH-1000XM5 Wireless Headphones',
          priceText: '329.99',
          url: 'https://www.bestbuy.com/site/sony-wh1000xm5/6505727.p',
          rawAttributes: { currency: 'USD', rating: '4.7', seller: 'Best Buy', availability: 'InStock' },
        },
      ])
    })

    it('ignores JSON-LD when the manifest does not enable it', () => {
      const adapter = new HtmlListingAdapter(manifest())
      const html = `<script type="application/ld+json">${PRODUCT_JSON_LD}</script>`

      expect(adapter.parse(html, 'US', 'https://shop.example/search?q=x')).toEqual([])
    })

    it('prefers the DOM row over a JSON-LD product with the same URL', () => {
      const adapter = new HtmlListingAdapter(BESTBUY_MANIFEST)
      const html = `
        <ol>
          <li class="sku-item">
            <h4 class="sku-title"><a href="/site/sony-wh1000xm5/6505727.p">Sony - WH-1000XM5 Headphones</a></h4>
            <div class="priceView-customer-price"><span>$329.99</span><span>Was $399.99</span></div>
            <div class="c-ratings-reviews"><p class="visually-hidden">Rating 4.7 out of 5 stars with 8,120 reviews</p></div>
          </li>
        </ol>
        <script type="application/ld+json">${PRODUCT_JSON_LD}</script>`

      const listings = adapter.parse(html, 'US', BESTBUY_PAGE)

      expect(listings).toEqual([
        {
          sourceId: 'bestbuy',
          title: 'Sony - WH-1000XM5 Headphones',
          priceText: '$329.99',
          url: 'https://www.bestbuy.com/site/sony-wh1000xm5/6505727.p',
          rawAttributes: { currency: 'USD', rating: 'Rating 4.7 out of 5 stars with 8,120 reviews' },
        },
      ])
    })
  })

  describe('search', () => {
    it('fetches the search page and parses it', async () => {
      const fetchSpy = vi.fn().mockResolvedValue(new Response(EBAY_HTML, { status: 200 }))
      const adapter = new HtmlListingAdapter(EBAY_MANIFEST, {
        fetcher: new HttpFetcher('ebay', { fetch: fetchSpy }),
      })

      const listings = await adapter.search('iphone 16 pro', 'US', {
        signal: new AbortController().signal,
        logger: silentLogger,
      })

      expect(fetchSpy).toHaveBeenCalledTimes(1)
      expect(fetchSpy.mock.calls[0][0]).toBe(EBAY_PAGE)
      expect(listings.map((l) => l.url)).toEqual(['https://www.ebay.com/itm/2'])
    })

    it('propagates fetch failures as source errors', async () => {
      const fetchSpy = vi.fn().mockResolvedValue(new Response('denied', { status: 403 }))
      const adapter = new HtmlListingAdapter(EBAY_MANIFEST, {
        fetcher: new HttpFetcher('ebay', { fetch: fetchSpy }),
      })

      await expect(
        adapter.search('iphone', 'US', { signal: new AbortController().signal, logger: silentLogger })
      ).rejects.toMatchObject({ kind: 'blocked', sourceId: 'ebay' })
    })
  })
})
