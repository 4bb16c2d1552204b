import type { DomainPolicy } from './domain-policy.js';

const MONTHLY_PHRASES = [
  '/month',
  'per month',
  'monthly subscription',
  'monthly plan',
  ' mo.',
  ' mo ',
  'monthly fee',
  'monthly cost',
  'billed monthly',
  'monthly payment',
  'monthly rate',
];

/** "/mo" or "/month" already on the display price. */
const MONTHLY_SUFFIX = /\/mo(?:nth)?\b/i;

const SUBSCRIPTION_PHRASES = ['subscription', 'monthly plan', 'billed monthly', 'recurring'];

export interface BillingContext {
  /** Page content and/or snippet the price was found in. */
  texts: string[];
  policy: DomainPolicy;
  /** Price came from explicit full-retail/outright phrasing. */
  fullRetail?: boolean;
}

/**
 * Append "/month" to a display price when the page bills monthly.
 *
 * Monthly wording alone is not enough on one-time-purchase stores
 * (manufacturer shops list financing in the same breath); those need
 * subscription wording too, and lose a stray "/month" otherwise.
 */
export function applyBillingPeriod(display: string, ctx: BillingContext): string {
  if (ctx.fullRetail) return display;

  const haystack = ctx.texts.map((t) => t.toLowerCase());
  const mentions = (phrases: string[]) => phrases.some((p) => haystack.some((t) => t.includes(p)));

  const isSubscription = mentions(SUBSCRIPTION_PHRASES);
  const isMonthly = mentions(MONTHLY_PHRASES) && (isSubscription || !ctx.policy.oneTimePurchase);
  const hasSuffix = MONTHLY_SUFFIX.test(display) || display.toLowerCase().includes('month');

  if (isMonthly && !hasSuffix) {
    return `${display}/month`;
  }

  if (ctx.policy.oneTimePurchase && !isSubscription && MONTHLY_SUFFIX.test(display)) {
    return display.replace(/\/mo(?:nth)?\b\.?/gi, '').trim();
  }

  return display;
}
