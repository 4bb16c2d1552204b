import { z } from 'zod';
import type { LlmClient, SearchHit } from './types.js';
import type { CostLedger } from './cost-ledger.js';
import { parseModelArray } from '../../utils/llmJson.js';
import { extractRegistrableDomain } from '../../utils/domain.js';

export const CLASSIFIER_BATCH_SIZE = 5;
const SNIPPET_CHARS = 300;

const CLASSIFIER_SYSTEM = 'You classify web search results. Reply with a JSON array of numbers and nothing else.';

const indicesSchema = z.array(z.number());

export function buildClassificationPrompt(batch: SearchHit[]): string {
  const listing = batch
    .map((hit, i) =>
      [
        `Result ${i + 1}:`,
        `- Title: ${hit.title}`,
        `- URL: ${hit.url}`,
        `- Snippet: ${(hit.snippet || hit.rawContent || '').slice(0, SNIPPET_CHARS)}`,
      ].join('\n')
    )
    .join('\n\n');

  return [
    'Decide which of these search results are pages where a shopper can buy the product right now.',
    '',
    'KEEP a result only if it is a product page on an online store or a brand store that shows a price',
    'and a purchase action (Add to Cart, Buy Now or similar).',
    '',
    'DROP a result if it is any of:',
    '- a review site or review article, even one that quotes prices',
    '- a comparison page or a "best of" list',
    '- a PDF, spec sheet or other document download',
    '- a news story, blog post or press release',
    '- a forum or discussion board',
    '- social media',
    '- a video platform',
    '- a Q&A site',
    '- an encyclopedia or other informational page',
    '- a product announcement or marketing page with no way to buy',
    '',
    'Results:',
    listing,
    '',
    'Answer with a JSON array of the 1-based numbers of the results to keep, for example [1, 3].',
    'Answer [] if none qualify. No other text.',
  ].join('\n');
}

/**
 * Keep only hits the model judges to be purchasable product pages.
 * Works in batches of five. A batch whose call or reply fails is kept
 * whole: losing good results costs more than showing a stray one.
 */
export async function classifyProductPages(
  hits: SearchHit[],
  llm: LlmClient,
  ledger: CostLedger,
  signal?: AbortSignal
): Promise<SearchHit[]> {
  const kept: SearchHit[] = [];

  for (let start = 0; start < hits.length; start += CLASSIFIER_BATCH_SIZE) {
    const batch = hits.slice(start, start + CLASSIFIER_BATCH_SIZE);

    try {
      const reply = await llm.complete(buildClassificationPrompt(batch), {
        temperature: 0,
        maxTokens: 100,
        system: CLASSIFIER_SYSTEM,
        signal,
      });
      ledger.recordFilteringCall();

      const parsed = parseModelArray(reply);
      if (!parsed.ok) throw new Error(`unparseable classifier reply: ${parsed.error}`);
      const indices = indicesSchema.parse(parsed.value);

      const selected = new Set(indices.filter((n) => Number.isInteger(n) && n >= 1 && n <= batch.length));
      batch.forEach((hit, i) => {
        const domain = extractRegistrableDomain(hit.url);
        if (selected.has(i + 1)) {
          kept.push(hit);
          console.log(`[classifier] kept ${domain} (result ${i + 1} in batch)`);
        } else {
          console.log(`[classifier] dropped ${domain} (result ${i + 1} in batch)`);
        }
      });
    } catch (err) {
      if (signal?.aborted) throw err;
      console.warn(
        `[classifier] batch ${start / CLASSIFIER_BATCH_SIZE + 1} failed, keeping all ${batch.length}:`,
        err instanceof Error ? err.message : String(err)
      );
      kept.push(...batch);
    }
  }

  return kept;
}
