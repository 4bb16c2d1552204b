import { z } from 'zod';
import type { ProviderEnvelope, SearchHit } from './types.js';
import { tryParseJson } from '../../utils/llmJson.js';
import { parseStructuredLiteral } from '../../utils/structuredLiteral.js';

/**
 * Decoded provider payload.
 *  success   – records were recovered
 *  malformed – text decoded as neither JSON nor a literal dump
 *  error     – provider reported failure, or returned nothing
 */
export type ParsedPayload<T> =
  | { kind: 'success'; results: T[] }
  | { kind: 'malformed'; rawText: string }
  | { kind: 'error'; message: string };

export interface ExtractedPage {
  url: string | null;
  rawContent: string;
}

type Decoded = { ok: true; value: unknown } | { ok: false };

/** JSON first, then the literal-dump format. */
export function decodeStructuredText(text: string): Decoded {
  const json = tryParseJson(text);
  if (json.ok) return json;
  try {
    return { ok: true, value: parseStructuredLiteral(text) };
  } catch {
    return { ok: false };
  }
}

const recordSchema = z.object({}).passthrough();

const searchHitSchema = z.object({
  title: z.string().nullish(),
  url: z.string().min(1),
  content: z.string().nullish(),
  snippet: z.string().nullish(),
  raw_content: z.string().nullish(),
});

const extractRecordSchema = z.object({
  url: z.string().nullish(),
  raw_content: z.string().nullish(),
  content: z.string().nullish(),
});

function envelopeText(envelope: ProviderEnvelope): string {
  return envelope.content[0]?.text ?? '';
}

function envelopeError(envelope: ProviderEnvelope): ParsedPayload<never> | null {
  if (envelope.status !== 'success') {
    return { kind: 'error', message: envelopeText(envelope) || 'Unknown error' };
  }
  if (!envelopeText(envelope)) {
    return { kind: 'error', message: 'Empty response content' };
  }
  return null;
}

function resultsOf(value: unknown): unknown[] | null {
  const parsed = z.object({ results: z.array(z.unknown()) }).safeParse(value);
  return parsed.success ? parsed.data.results : null;
}

export function toSearchPayload(envelope: ProviderEnvelope): ParsedPayload<SearchHit> {
  const failure = envelopeError(envelope);
  if (failure) return failure;

  const text = envelopeText(envelope);
  const decoded = decodeStructuredText(text);
  if (!decoded.ok || !recordSchema.safeParse(decoded.value).success) {
    return { kind: 'malformed', rawText: text };
  }

  const hits: SearchHit[] = [];
  for (const item of resultsOf(decoded.value) ?? []) {
    const parsed = searchHitSchema.safeParse(item);
    if (!parsed.success) continue;
    const { title, url, content, snippet, raw_content } = parsed.data;
    hits.push({
      title: title ?? '',
      url,
      snippet: content ?? snippet ?? '',
      ...(raw_content ? { rawContent: raw_content } : {}),
    });
  }

  return { kind: 'success', results: hits };
}

export function toExtractPayload(envelope: ProviderEnvelope): ParsedPayload<ExtractedPage> {
  const failure = envelopeError(envelope);
  if (failure) return failure;

  const text = envelopeText(envelope);
  const decoded = decodeStructuredText(text);
  if (!decoded.ok) return { kind: 'malformed', rawText: text };

  const results = resultsOf(decoded.value);
  if (results) {
    const pages: ExtractedPage[] = [];
    for (const item of results) {
      const parsed = extractRecordSchema.safeParse(item);
      if (!parsed.success) continue;
      pages.push({
        url: parsed.data.url ?? null,
        rawContent: parsed.data.raw_content ?? parsed.data.content ?? '',
      });
    }
    return { kind: 'success', results: pages };
  }

  const single = extractRecordSchema.safeParse(decoded.value);
  if (single.success && (single.data.raw_content || single.data.content)) {
    return {
      kind: 'success',
      results: [{ url: single.data.url ?? null, rawContent: single.data.raw_content ?? single.data.content ?? '' }],
    };
  }

  return { kind: 'malformed', rawText: text };
}

function rawPageContent(payload: ParsedPayload<ExtractedPage>, url: string): string | null {
  switch (payload.kind) {
    case 'error':
      return null;
    case 'malformed':
      return payload.rawText;
    case 'success': {
      const page = payload.results.find((p) => p.url === url) ?? payload.results[0];
      return page ? page.rawContent : null;
    }
  }
}

/**
 * Page text for `url`: the matching record, else the first one; raw text
 * for a malformed payload. Null when nothing usable came back.
 */
export function pageContentFor(payload: ParsedPayload<ExtractedPage>, url: string): string | null {
  const content = rawPageContent(payload, url);
  if (content === null) return null;
  const trimmed = content.trim();
  return trimmed && trimmed !== 'None' && trimmed !== 'null' ? content : null;
}
