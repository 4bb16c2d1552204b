import fetch from 'node-fetch';
import { cfg } from '../config.js';
import type {
  ExtractClient,
  ExtractOptions,
  ProviderEnvelope,
  SearchClient,
  SearchOptions,
} from './deals/types.js';

export interface TavilyClientOptions {
  apiKey: string;
  baseUrl: string;
}

function errorEnvelope(message: string): ProviderEnvelope {
  return { status: 'error', content: [{ text: message }] };
}

/**
 * Tavily search + extract over REST. Responses are handed back as the raw
 * body inside an envelope; decoding happens in the pipeline.
 */
export class TavilyClient implements SearchClient, ExtractClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(options: TavilyClientOptions = { apiKey: cfg.tavily.apiKey, baseUrl: cfg.tavily.baseUrl }) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    if (!this.apiKey) {
      console.warn('[search] Warning: TAVILY_API_KEY not set. Searches will fail.');
    }
  }

  search(query: string, options: SearchOptions): Promise<ProviderEnvelope> {
    return this.call(
      'search',
      {
        query,
        search_depth: options.depth,
        max_results: options.maxResults,
        include_raw_content: options.includeRawContent,
      },
      options.signal
    );
  }

  extract(urls: string[], options: ExtractOptions): Promise<ProviderEnvelope> {
    return this.call(
      'extract',
      {
        urls,
        extract_depth: options.depth,
        format: options.format,
      },
      options.signal
    );
  }

  private async call(path: 'search' | 'extract', body: Record<string, unknown>, signal?: AbortSignal): Promise<ProviderEnvelope> {
    if (!this.apiKey) {
      return errorEnvelope('Tavily API key not configured');
    }

    const res = await fetch(`${this.baseUrl}/${path}`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal,
    });

    const text = await res.text();
    if (!res.ok) {
      console.error(`[${path}] Tavily error ${res.status}`);
      return errorEnvelope(`Tavily error ${res.status}: ${text}`);
    }
    return { status: 'success', content: [{ text }] };
  }
}
