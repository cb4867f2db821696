import type { SiteManifest } from '../html-listing-adapter.js'

export const BESTBUY_MANIFEST: SiteManifest = {
  id: 'bestbuy',
  regions: {
    US: { searchUrl: 'https://www.bestbuy.com/site/searchpage.jsp?st={query}', currency: 'USD' },
  },
  priority: { US: 2 },
  selectors: {
    item: 'li.sku-item',
    title: '.sku-title a',
    price: '.priceView-customer-price > span:first-child',
    link: '.sku-title a',
    rating: '.c-ratings-reviews .visually-hidden',
    availability: '.fulfillment-add-to-cart-button button',
  },
  maxItems: 15,
  jsonLd: true,
}
