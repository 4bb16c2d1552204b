/**
 * Per-request cost accounting for paid calls (search, page extraction,
 * classification and extraction LLM calls). Created once per request and
 * passed down the pipeline; additive only.
 *
 * Rates are estimates:
 *   search       ~$0.01 per query
 *   extraction   ~$0.02 per URL (advanced depth)
 *   LLM calls    ~$0.002 per call
 */

export const COST_RATES = {
  search: 0.01,
  extraction: 0.02,
  filteringCall: 0.002,
  extractionLlmCall: 0.002,
} as const;

export interface CostSummary {
  searchCost: number;
  extractionCalls: number;
  extractionCost: number;
  filteringCalls: number;
  filteringCost: number;
  extractionLlmCalls: number;
  extractionLlmCost: number;
  snippetBasedResults: number;
  fullExtractionResults: number;
  totalResults: number;
  totalCost: number;
}

export class CostLedger {
  private readonly searchCost = COST_RATES.search;
  private extractionCalls = 0;
  private extractionCost = 0;
  private filteringCalls = 0;
  private filteringCost = 0;
  private extractionLlmCalls = 0;
  private extractionLlmCost = 0;
  private snippetBasedResults = 0;
  private fullExtractionResults = 0;
  private totalResults = 0;

  recordExtraction(): void {
    this.extractionCalls += 1;
    this.extractionCost += COST_RATES.extraction;
    this.fullExtractionResults += 1;
  }

  recordFilteringCall(): void {
    this.filteringCalls += 1;
    this.filteringCost += COST_RATES.filteringCall;
  }

  recordExtractionLlmCall(): void {
    this.extractionLlmCalls += 1;
    this.extractionLlmCost += COST_RATES.extractionLlmCall;
  }

  recordSnippetResult(): void {
    this.snippetBasedResults += 1;
    this.totalResults += 1;
  }

  recordExtractedResult(): void {
    this.totalResults += 1;
  }

  summary(): Readonly<CostSummary> {
    const totalCost = this.searchCost + this.extractionCost + this.filteringCost + this.extractionLlmCost;
    return Object.freeze({
      searchCost: this.searchCost,
      extractionCalls: this.extractionCalls,
      extractionCost: round4(this.extractionCost),
      filteringCalls: this.filteringCalls,
      filteringCost: round4(this.filteringCost),
      extractionLlmCalls: this.extractionLlmCalls,
      extractionLlmCost: round4(this.extractionLlmCost),
      snippetBasedResults: this.snippetBasedResults,
      fullExtractionResults: this.fullExtractionResults,
      totalResults: this.totalResults,
      totalCost: round4(totalCost),
    });
  }

  log(): void {
    const s = this.summary();
    console.log(
      [
        '[cost] ===== COST SUMMARY =====',
        `[cost] search:          $${s.searchCost.toFixed(4)}`,
        `[cost] extraction:      $${s.extractionCost.toFixed(4)} (${s.extractionCalls} calls)`,
        `[cost] llm filtering:   $${s.filteringCost.toFixed(4)} (${s.filteringCalls} calls)`,
        `[cost] llm extraction:  $${s.extractionLlmCost.toFixed(4)} (${s.extractionLlmCalls} calls)`,
        `[cost] total:           $${s.totalCost.toFixed(4)}`,
        `[cost] results: ${s.snippetBasedResults} snippet, ${s.fullExtractionResults} full extraction, ${s.totalResults} total`,
      ].join('\n')
    );
  }
}

function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}
