/**
 * Display prices and their comparable numeric value.
 *
 * A display price keeps the formatting the page used ("From $999",
 * "$999-$1,299", "$9.99/month"); the numeric value is only used for sorting.
 */

export type Price =
  | { kind: 'known'; display: string; value: number }
  | { kind: 'unavailable' };

export const UNAVAILABLE: Price = { kind: 'unavailable' };

export const PRICE_NOT_AVAILABLE = 'Price not available';

const UNAVAILABLE_TEXT = new Set(['', 'none', 'null', 'n/a', 'price not available', 'not available']);

/** True when the text is empty or one of the "price not available" family. */
export function isUnavailableText(text: string | null | undefined): boolean {
  if (text == null) return true;
  return UNAVAILABLE_TEXT.has(text.trim().toLowerCase());
}

/**
 * Reduce a display price to a number for sorting.
 * Ranges resolve to their lower bound because the first number wins.
 * Anything without a number sorts last (Infinity).
 */
export function parsePriceToNumber(priceText: string | null | undefined): number {
  if (!priceText) return Infinity;
  const lowered = priceText.trim().toLowerCase();
  if (lowered === '' || lowered === 'none' || lowered === 'price not available') {
    return Infinity;
  }

  const cleaned = priceText.replace(/\$/g, '').replace(/,/g, '').trim();
  const match = cleaned.match(/(\d+\.?\d*)/);
  if (!match) return Infinity;

  const value = Number.parseFloat(match[1]);
  return Number.isFinite(value) ? value : Infinity;
}

export function toPrice(display: string | null | undefined): Price {
  if (display == null || isUnavailableText(display)) return UNAVAILABLE;
  const trimmed = display.trim();
  return { kind: 'known', display: trimmed, value: parsePriceToNumber(trimmed) };
}

export function priceLabel(price: Price): string {
  switch (price.kind) {
    case 'known':
      return price.display;
    case 'unavailable':
      return PRICE_NOT_AVAILABLE;
  }
}

/** First `$`-prefixed amount in the text, e.g. "$1,299.99". */
export function findCurrencyAmount(text: string): string | null {
  const match = text.match(/\$[\d,]+(?:\.\d{2})?/);
  return match ? match[0] : null;
}
