/**
 * schema.org Product offers from JSON-LD blocks.
 *
 * Nodes are flattened through arrays, `@graph` and ItemList `itemListElement`
 * wrappers; every Product with a priced offer yields one listing.
 */

import type { CheerioAPI } from 'cheerio'
import { z } from 'zod'

const typeField = z.union([z.string(), z.array(z.string())]).optional()
const priceField = z.union([z.string(), z.number()]).optional()

const offerSchema = z.object({
  '@type': typeField,
  price: priceField,
  lowPrice: priceField,
  priceCurrency: z.string().optional(),
  availability: z.string().optional(),
  url: z.string().optional(),
  seller: z.object({ name: z.string().optional() }).passthrough().optional(),
})

const productSchema = z.object({
  '@type': typeField,
  name: z.string(),
  url: z.string().optional(),
  offers: z.union([offerSchema, z.array(offerSchema)]).optional(),
  aggregateRating: z.object({ ratingValue: priceField }).passthrough().optional(),
})

export interface JsonLdListing {
  title: string
  priceText: string
  url?: string
  currency?: string
  availability?: string
  seller?: string
  rating?: string
}

function hasType(value: z.infer<typeof typeField>, target: string): boolean {
  if (!value) return false
  const types = Array.isArray(value) ? value : [value]
  return types.some((type) => type.toLowerCase() === target.toLowerCase())
}

function children(node: object): unknown[] {
  const output: unknown[] = []
  for (const key of ['@graph', 'itemListElement', 'item']) {
    const value: unknown = Reflect.get(node, key)
    if (value === undefined) continue
    if (Array.isArray(value)) output.push(...value)
    else output.push(value)
  }
  return output
}

/** Every object node reachable from `root` */
export function flattenJsonLd(root: unknown): object[] {
  const output: object[] = []
  const queue: unknown[] = [root]

  while (queue.length > 0) {
    const current = queue.shift()
    if (!current || typeof current !== 'object') continue
    if (Array.isArray(current)) {
      queue.push(...current)
      continue
    }
    output.push(current)
    queue.push(...children(current))
  }

  return output
}

/** Trailing path segment of a schema.org enum URL ("https://schema.org/InStock" → "InStock") */
function schemaValue(value: string | undefined): string | undefined {
  if (!value) return undefined
  return value.split('/').pop() || undefined
}

export function extractJsonLdListings($: CheerioAPI): JsonLdListing[] {
  const listings: JsonLdListing[] = []

  $('script[type="application/ld+json"]').each((_, element) => {
    const raw = $(element).text().trim()
    if (!raw) return

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      // Broken blocks are common; the DOM selectors still apply
      return
    }

    for (const node of flattenJsonLd(parsed)) {
      const product = productSchema.safeParse(node)
      if (!product.success || !hasType(product.data['@type'], 'Product')) continue

      const offers = product.data.offers
      const offer = Array.isArray(offers) ? offers[0] : offers
      const price = offer?.price ?? offer?.lowPrice
      if (price === undefined) continue

      const rating = product.data.aggregateRating?.ratingValue
      listings.push({
        title: product.data.name,
        priceText: String(price),
        url: offer?.url ?? product.data.url,
        currency: offer?.priceCurrency,
        availability: schemaValue(offer?.availability),
        seller: offer?.seller?.name,
        rating: rating === undefined ? undefined : String(rating),
      })
    }
  })

  return listings
}
