import type { Price } from '../../utils/price.js';

/** One raw web search result. */
export interface SearchHit {
  title: string;
  url: string;
  /** Provider snippet; may be empty. */
  snippet: string;
  rawContent?: string;
}

export interface ExtractedProduct {
  productName: string;
  /** Specs / configuration. */
  details: string;
  price: Price;
  dealInfo: string;
  url: string;
  /** Registrable domain of `url`. */
  source: string;
  inStock: boolean;
}

export type SearchDepth = 'basic' | 'advanced';
export type ExtractFormat = 'text' | 'markdown';

/**
 * What the search/extract provider hands back: a status and one or more
 * text blocks whose contents still need decoding (JSON or a literal dump).
 */
export interface ProviderEnvelope {
  status: 'success' | 'error';
  content: { text: string }[];
}

export interface SearchOptions {
  depth: SearchDepth;
  maxResults: number;
  includeRawContent: boolean;
  signal?: AbortSignal;
}

export interface ExtractOptions {
  depth: SearchDepth;
  format: ExtractFormat;
  signal?: AbortSignal;
}

export interface SearchClient {
  search(query: string, options: SearchOptions): Promise<ProviderEnvelope>;
}

export interface ExtractClient {
  extract(urls: string[], options: ExtractOptions): Promise<ProviderEnvelope>;
}

export interface CompletionOptions {
  temperature: number;
  maxTokens: number;
  system?: string;
  signal?: AbortSignal;
}

export interface LlmClient {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

export interface DealClients {
  search: SearchClient;
  extractor: ExtractClient;
  llm: LlmClient;
}
