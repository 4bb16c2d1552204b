import { z } from 'zod';
import type { ExtractClient, ExtractedProduct, LlmClient, SearchHit } from './types.js';
import type { CostLedger } from './cost-ledger.js';
import type { DomainPolicy, DomainPolicyTable } from './domain-policy.js';
import { applyBillingPeriod } from './billing-period.js';
import { hasFullRetailPhrase, looksLikeReview, scanSnippetPrice } from './snippet-price.js';
import { pageContentFor, toExtractPayload } from './payload.js';
import { parseModelObject } from '../../utils/llmJson.js';
import { extractRegistrableDomain } from '../../utils/domain.js';
import { findCurrencyAmount, isUnavailableText, toPrice } from '../../utils/price.js';

export const DEFAULT_TARGET_COUNT = 9;
export const DEFAULT_MAX_CANDIDATES = 15;

const DETAILS_CHARS = 150;
const EXCERPT_CHARS = 4000;

export interface ResolverDeps {
  extractor: ExtractClient;
  llm: LlmClient;
}

export interface ResolveOptions {
  query: string;
  ledger: CostLedger;
  policy: DomainPolicyTable;
  targetCount?: number;
  maxCandidates?: number;
  signal?: AbortSignal;
}

const EXTRACTION_SYSTEM =
  'You extract product listings from web pages. Reply with a single JSON object and nothing else.';

const MARKETPLACE_GUIDANCE = [
  'This is a large marketplace page. The price may appear without a currency symbol,',
  'split across markup ("499" and "00"), or next to words like "price", "list", "deal" or "was".',
  'Search the whole excerpt for any price-like number before giving up.',
].join('\n');

const CARRIER_GUIDANCE = [
  'This is a mobile carrier page. Use the full retail or outright purchase price',
  '(phrases like "Full retail price", "Outright purchase", "Buy outright", "One-time purchase", "Retail price").',
  'Ignore monthly installment figures ("$17.49/mo", "per month", "for 36 months")',
  'and savings or trade-in amounts ("Save $200", "saving", "trade-in credit").',
].join('\n');

const productReplySchema = z.object({
  product_name: z.string().nullish().catch(null),
  details: z.string().nullish().catch(null),
  price: z.union([z.string(), z.number()]).nullish().catch(null),
  deal_info: z.string().nullish().catch(null),
  in_stock: z.union([z.boolean(), z.string()]).nullish().catch(null),
});

type ProductReply = z.infer<typeof productReplySchema>;

export function buildExtractionPrompt(
  hit: SearchHit,
  query: string,
  excerpt: string,
  policy: DomainPolicy
): string {
  const guidance = [policy.richMarkup ? MARKETPLACE_GUIDANCE : '', policy.preferFullRetail ? CARRIER_GUIDANCE : '']
    .filter(Boolean)
    .join('\n\n');

  return [
    `The shopper searched for: "${query}"`,
    '',
    `Page title: ${hit.title}`,
    `Page URL: ${hit.url}`,
    '',
    'Page content:',
    excerpt,
    '',
    ...(guidance ? [guidance, ''] : []),
    'Return a JSON object with these fields:',
    '- "product_name": the product name as the page shows it',
    '- "details": key specs or configuration (storage, size, color, model)',
    '- "price": the current selling price exactly as displayed, e.g. "$499.99" or "From $999"; null if there is none',
    '- "deal_info": discount, sale or promotion text, or "" if none',
    '- "in_stock": true or false',
  ].join('\n');
}

function replyPrice(price: ProductReply['price']): string | null {
  if (typeof price === 'number') return Number.isFinite(price) ? `$${price}` : null;
  if (typeof price === 'string' && !isUnavailableText(price)) return price.trim();
  return null;
}

function replyInStock(value: ProductReply['in_stock']): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return !['false', 'no', 'out of stock'].includes(value.trim().toLowerCase());
  return true;
}

function toProduct(
  hit: SearchHit,
  fields: { productName: string; details: string; display: string; dealInfo: string; inStock: boolean }
): ExtractedProduct {
  return {
    productName: fields.productName,
    details: fields.details,
    price: toPrice(fields.display),
    dealInfo: fields.dealInfo,
    url: hit.url,
    source: extractRegistrableDomain(hit.url),
    inStock: fields.inStock,
  };
}

/**
 * Turn classified hits into priced products, one hit at a time.
 *
 * A snippet price is used directly when it can be trusted; otherwise the
 * page is extracted and read by the model. Hits that end without a price
 * are dropped. Stops once `targetCount` products are priced.
 */
export async function resolveProducts(
  hits: SearchHit[],
  deps: ResolverDeps,
  options: ResolveOptions
): Promise<ExtractedProduct[]> {
  const targetCount = options.targetCount ?? DEFAULT_TARGET_COUNT;
  const maxCandidates = options.maxCandidates ?? DEFAULT_MAX_CANDIDATES;
  const { ledger, signal } = options;
  const products: ExtractedProduct[] = [];

  for (const hit of hits.slice(0, maxCandidates)) {
    if (products.length >= targetCount) break;
    signal?.throwIfAborted();

    const domain = extractRegistrableDomain(hit.url);
    const excluded = options.policy.hardExclusion(hit.url, hit.title);
    if (excluded) {
      console.log(`[resolver] skip ${domain}: ${excluded}`);
      continue;
    }

    const policy = options.policy.policyFor(hit.url);
    const snippet = hit.snippet || hit.rawContent || '';
    const scan = scanSnippetPrice(snippet, policy);

    if (snippet && looksLikeReview(snippet)) {
      console.log(`[resolver] skip ${domain}: review language in snippet`);
      continue;
    }

    let { primary, backup } = scan;
    if (policy.forceFullExtraction || (policy.preferFullRetail && !hasFullRetailPhrase(snippet))) {
      if (primary) console.log(`[resolver] ${domain}: ignoring snippet price ${primary}, full extraction required`);
      primary = null;
      backup = null;
    }

    if (primary) {
      const display = applyBillingPeriod(primary, { texts: [snippet], policy, fullRetail: scan.fullRetail });
      products.push(
        toProduct(hit, {
          productName: hit.title,
          details: snippet.slice(0, DETAILS_CHARS),
          display,
          dealInfo: '',
          inStock: true,
        })
      );
      ledger.recordSnippetResult();
      console.log(`[resolver] ${domain}: snippet price ${display}`);
      continue;
    }

    try {
      const product = await extractProduct(hit, policy, backup, deps, options);
      if (product) {
        products.push(product);
        ledger.recordExtractedResult();
      }
    } catch (err) {
      if (signal?.aborted) throw err;
      console.error(`[resolver] ${domain}: extraction failed:`, err instanceof Error ? err.message : String(err));
    }
  }

  console.log(`[resolver] ${products.length} priced product(s) from ${Math.min(hits.length, maxCandidates)} candidate(s)`);
  return products;
}

async function extractProduct(
  hit: SearchHit,
  policy: DomainPolicy,
  snippetBackup: string | null,
  deps: ResolverDeps,
  options: ResolveOptions
): Promise<ExtractedProduct | null> {
  const { ledger, signal } = options;
  const domain = extractRegistrableDomain(hit.url);
  const snippet = hit.snippet || hit.rawContent || '';

  const envelope = await deps.extractor.extract([hit.url], {
    depth: 'advanced',
    format: policy.richMarkup ? 'markdown' : 'text',
    signal,
  });
  ledger.recordExtraction();

  const payload = toExtractPayload(envelope);
  if (payload.kind === 'error') {
    console.warn(`[extract] ${domain}: ${payload.message}`);
    return null;
  }
  const content = pageContentFor(payload, hit.url);
  if (content === null) {
    console.log(`[extract] ${domain}: no usable content`);
    return null;
  }
  const excerpt = content.slice(0, EXCERPT_CHARS);

  const reply = await deps.llm.complete(buildExtractionPrompt(hit, options.query, excerpt, policy), {
    temperature: 0.2,
    maxTokens: 400,
    system: EXTRACTION_SYSTEM,
    signal,
  });
  ledger.recordExtractionLlmCall();

  const billing = { texts: [excerpt, snippet], policy };
  const parsed = parseModelObject(reply);
  const fields = parsed.ok ? productReplySchema.safeParse(parsed.value) : null;

  if (!fields?.success) {
    const scanned = findCurrencyAmount(excerpt);
    if (!scanned) {
      console.log(`[extract] ${domain}: unreadable reply and no price in content`);
      return null;
    }
    console.log(`[extract] ${domain}: unreadable reply, using content price ${scanned}`);
    return toProduct(hit, {
      productName: hit.title,
      details: '',
      display: applyBillingPeriod(scanned, billing),
      dealInfo: '',
      inStock: true,
    });
  }

  const answer = fields.data;
  const resolved =
    replyPrice(answer.price) ?? findCurrencyAmount(excerpt) ?? snippetBackup;
  if (!resolved) {
    console.log(`[extract] ${domain}: no price found`);
    return null;
  }

  const display = applyBillingPeriod(resolved, billing);
  console.log(`[extract] ${domain}: ${display}`);
  return toProduct(hit, {
    productName: answer.product_name?.trim() || hit.title,
    details: answer.details ?? '',
    display,
    dealInfo: answer.deal_info ?? '',
    inStock: replyInStock(answer.in_stock),
  });
}
