import type { ExtractedProduct } from './types.js';

function sortValue(product: ExtractedProduct): number {
  switch (product.price.kind) {
    case 'known':
      return product.price.value;
    case 'unavailable':
      return Infinity;
  }
}

/** Cheapest first; equal values (including two Infinity) keep their order. */
export function compareByPrice(a: ExtractedProduct, b: ExtractedProduct): number {
  const av = sortValue(a);
  const bv = sortValue(b);
  if (av === bv) return 0;
  return av < bv ? -1 : 1;
}

/** Drop anything without a price and sort ascending. */
export function finalizeProducts(products: ExtractedProduct[]): ExtractedProduct[] {
  return products.filter((p) => p.price.kind === 'known').sort(compareByPrice);
}
