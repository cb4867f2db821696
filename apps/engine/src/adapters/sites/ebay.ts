import type { SiteManifest, SiteRegion } from '../html-listing-adapter.js'

const EBAY_DOMAINS: Record<string, [domain: string, currency: string]> = {
  US: ['ebay.com', 'USD'],
  CA: ['ebay.ca', 'CAD'],
  GB: ['ebay.co.uk', 'GBP'],
  UK: ['ebay.co.uk', 'GBP'],
  DE: ['ebay.de', 'EUR'],
  FR: ['ebay.fr', 'EUR'],
  IT: ['ebay.it', 'EUR'],
  ES: ['ebay.es', 'EUR'],
  AU: ['ebay.com.au', 'AUD'],
  IN: ['ebay.in', 'INR'],
  SG: ['ebay.com.sg', 'SGD'],
  MY: ['ebay.com.my', 'MYR'],
  PH: ['ebay.ph', 'PHP'],
}

function regions(): Record<string, SiteRegion> {
  const output: Record<string, SiteRegion> = {}
  for (const [region, [domain, currency]] of Object.entries(EBAY_DOMAINS)) {
    // Buy It Now only, sorted by price plus shipping
    output[region] = {
      searchUrl: `https://www.${domain}/sch/i.html?_nkw={query}&_sacat=0&LH_BIN=1&_sop=15&rt=nc`,
      currency,
    }
  }
  return output
}

export const EBAY_MANIFEST: SiteManifest = {
  id: 'ebay',
  regions: regions(),
  priority: 1,
  selectors: {
    item: 'li.s-item, .s-item',
    title: '.s-item__title',
    price: '.s-item__price',
    link: 'a.s-item__link',
    seller: '.s-item__seller-info-text',
  },
  skipTitles: [/^shop on ebay$/i],
  maxItems: 15,
}
