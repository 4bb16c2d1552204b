import type { DomainPolicy } from './domain-policy.js';

/**
 * Cheap price detection on a search snippet, used to skip full-page
 * extraction when the snippet already carries a trustworthy price.
 *
 *  primary  – price good enough for the fast path
 *  backup   – weaker candidate, only used as a fallback after extraction
 *  fullRetail – primary came from explicit "full retail / outright" phrasing
 */
export interface SnippetScan {
  primary: string | null;
  backup: string | null;
  fullRetail: boolean;
}

const AMOUNT = '\\$?([\\d,]+(?:\\.\\d{2})?)';

const FULL_RETAIL_PATTERNS: RegExp[] = [
  'Full retail price',
  'Outright purchase',
  'Buy outright',
  'One-time purchase',
  'Full price',
  'Retail price',
].map((label) => new RegExp(`${label}[:\\s]+${AMOUNT}`, 'i'));

export const FULL_RETAIL_PHRASES = [
  'full retail price',
  'outright purchase',
  'buy outright',
  'one-time purchase',
  'full price',
  'retail price',
];

const INSTALLMENT_CONTEXT = ['/mo', 'per month', 'monthly', 'for 36', 'for 24', 'saving', 'save'];

const LABELED_PRICE = /(?:price|cost|buy)[:\s]+([\d,]+\.?\d{2})/i;
const BARE_DECIMAL = /\b(\d{1,3}(?:,\d{3})*\.\d{2})\b/;
const BARE_DECIMAL_CEILING = 100_000;

const REVIEW_LANGUAGE = [
  /\breview(?:s|ed)?\b/,
  /\bour pick\b/,
  /\bbest\b/,
  /\btop\b/,
  /\bcomparison\b/,
  /\bvs\.?(?=\s|$)/,
  /\bversus\b/,
  /\bpros and cons\b/,
];

export function scanSnippetPrice(snippet: string, policy: DomainPolicy): SnippetScan {
  const scan: SnippetScan = { primary: null, backup: null, fullRetail: false };
  if (!snippet) return scan;

  if (policy.preferFullRetail) {
    for (const pattern of FULL_RETAIL_PATTERNS) {
      const match = snippet.match(pattern);
      if (match) {
        scan.primary = `$${match[1]}`;
        scan.backup = scan.primary;
        scan.fullRetail = true;
        return scan;
      }
    }
  }

  const currency = snippet.match(/\$[\d,]+(?:\.\d{2})?/);
  if (currency && currency.index !== undefined) {
    if (policy.preferFullRetail && isInstallmentContext(snippet, currency.index)) {
      console.log(`[resolver] skipping installment/savings amount ${currency[0]}`);
      return scan;
    }
    scan.primary = currency[0];
    scan.backup = currency[0];
    return scan;
  }

  const labeled = snippet.match(LABELED_PRICE);
  if (labeled) {
    scan.backup = `$${labeled[1]}`;
    return scan;
  }

  const bare = snippet.match(BARE_DECIMAL);
  if (bare && Number.parseFloat(bare[1].replace(/,/g, '')) < BARE_DECIMAL_CEILING) {
    scan.backup = `$${bare[1]}`;
  }

  return scan;
}

/** ~80 characters around the amount mention a payment plan or a saving. */
function isInstallmentContext(snippet: string, index: number): boolean {
  const context = snippet.slice(Math.max(0, index - 30), index + 50).toLowerCase();
  return INSTALLMENT_CONTEXT.some((phrase) => context.includes(phrase));
}

/** Review/editorial wording in the leading 200 characters. */
export function looksLikeReview(snippet: string): boolean {
  const head = snippet.slice(0, 200).toLowerCase();
  return REVIEW_LANGUAGE.some((re) => re.test(head));
}

export function hasFullRetailPhrase(snippet: string): boolean {
  const lower = snippet.toLowerCase();
  return FULL_RETAIL_PHRASES.some((phrase) => lower.includes(phrase));
}

