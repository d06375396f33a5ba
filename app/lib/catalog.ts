import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { CandidateItem, CatalogProduct, ProductCatalog, ProductDisplay, RankedList } from './types';
import { normalizeCandidate, validateCandidate } from './utils/normalizer';

const catalogProductSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  price: z.number().nonnegative(),
  description: z.string(),
  image: z.string(),
});

export const catalogSchema = z
  .record(z.array(catalogProductSchema))
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    for (const [category, products] of Object.entries(catalog)) {
      products.forEach((product, index) => {
        if (seen.has(product.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [category, index, 'id'],
            message: `duplicate product id "${product.id}"`,
          });
        }
        seen.add(product.id);
      });
    }
  });

export const DEFAULT_CATALOG_PATH = path.join(process.cwd(), 'data', 'catalog.json');

/**
 * Read and validate a catalog file (category → products).
 * Throws when the file is missing, is not JSON, or fails the schema.
 */
export function loadCatalog(filePath: string = DEFAULT_CATALOG_PATH): ProductCatalog {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Catalog not found at ${filePath}.`);
  }
  const raw = fs.readFileSync(filePath, 'utf-8');
  return catalogSchema.parse(JSON.parse(raw));
}

/**
 * Flatten a catalog into the engine's candidate list. Category order and
 * product order within a category are kept, so the list is stable per file.
 */
export function toCandidates(catalog: ProductCatalog): CandidateItem[] {
  const candidates: CandidateItem[] = [];
  for (const [category, products] of Object.entries(catalog)) {
    for (const product of products) {
      const item = normalizeCandidate({
        id: product.id,
        name: product.name,
        description: product.description,
        tags: { category, price: product.price },
      });
      validateCandidate(item);
      candidates.push(item);
    }
  }
  return candidates;
}

interface IndexedProduct {
  category: string;
  product: CatalogProduct;
}

function indexCatalog(catalog: ProductCatalog): Map<string, IndexedProduct> {
  const index = new Map<string, IndexedProduct>();
  for (const [category, products] of Object.entries(catalog)) {
    for (const product of products) index.set(product.id, { category, product });
  }
  return index;
}

/**
 * Join a ranked list back to catalog products for display. The reason combines
 * the model's rationale with the product description; confidence is the score.
 * Recommendations whose id is not in the catalog are skipped with a warning.
 */
export function toProductDisplays(list: RankedList, catalog: ProductCatalog): ProductDisplay[] {
  const index = indexCatalog(catalog);
  const displays: ProductDisplay[] = [];

  for (const rec of list) {
    const hit = index.get(rec.itemId);
    if (!hit) {
      console.warn(`[catalog] Recommendation "${rec.itemId}" has no catalog product; skipping.`);
      continue;
    }
    const { category, product } = hit;
    displays.push({
      rank: rec.rank,
      category,
      product: product.name,
      price: product.price,
      reason: rec.rationale ? `${rec.rationale} - ${product.description}` : product.description,
      confidence: rec.score,
      image: product.image,
    });
  }
  return displays;
}
