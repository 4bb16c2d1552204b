import type { DealClients, ExtractedProduct, ProviderEnvelope } from './types.js';
import { CostLedger, type CostSummary } from './cost-ledger.js';
import { defaultDomainPolicy, type DomainPolicyTable } from './domain-policy.js';
import { classifyProductPages } from './classifier.js';
import { resolveProducts } from './price-resolver.js';
import { finalizeProducts } from './aggregator.js';
import { toSearchPayload } from './payload.js';
import { SearchPayloadError, UpstreamError } from '../errors.js';

export const SEARCH_MAX_RESULTS = 10;

export type DealSearchOutcome =
  | { kind: 'ok'; products: ExtractedProduct[]; cost: CostSummary }
  | { kind: 'search_failed'; error: UpstreamError | SearchPayloadError };

export interface FindDealsOptions {
  policy?: DomainPolicyTable;
  targetCount?: number;
  signal?: AbortSignal;
}

/**
 * Full search for one query: web search, product-page classification,
 * price resolution, then cheapest-first ordering.
 *
 * Only a failed or unreadable top-level search is reported as a failure.
 * Everything after that degrades per hit and always yields a list.
 */
export async function findDeals(
  query: string,
  clients: DealClients,
  options: FindDealsOptions = {}
): Promise<DealSearchOutcome> {
  const { signal } = options;
  const ledger = new CostLedger();

  let envelope: ProviderEnvelope;
  try {
    envelope = await clients.search.search(query, {
      depth: 'advanced',
      maxResults: SEARCH_MAX_RESULTS,
      includeRawContent: true,
      signal,
    });
  } catch (err) {
    if (signal?.aborted) throw err;
    const message = err instanceof Error ? err.message : String(err);
    console.error('[search] request failed:', message);
    return { kind: 'search_failed', error: new UpstreamError('search', message) };
  }

  const payload = toSearchPayload(envelope);
  switch (payload.kind) {
    case 'error':
      console.error('[search] provider error:', payload.message);
      return { kind: 'search_failed', error: new UpstreamError('search', payload.message) };
    case 'malformed':
      console.error(`[search] unreadable payload (${payload.rawText.length} chars)`);
      return {
        kind: 'search_failed',
        error: new SearchPayloadError('Search results could not be parsed', payload.rawText),
      };
    case 'success':
      break;
  }

  console.log(`[search] "${query}": ${payload.results.length} hit(s)`);

  const candidates = await classifyProductPages(payload.results, clients.llm, ledger, signal);
  console.log(`[classifier] ${candidates.length}/${payload.results.length} hit(s) kept`);

  const resolved = await resolveProducts(candidates, clients, {
    query,
    ledger,
    policy: options.policy ?? defaultDomainPolicy,
    targetCount: options.targetCount,
    signal,
  });
  const products = finalizeProducts(resolved);

  ledger.log();
  return { kind: 'ok', products, cost: ledger.summary() };
}
