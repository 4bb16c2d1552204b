import { z } from 'zod';
import type OpenAI from 'openai';
import rawVocabulary from '../../config/deal-vocabulary.json';

export type GuardrailVerdict = { ok: true } | { ok: false; reason: string };

export const MIN_INPUT_LENGTH = 3;
export const MAX_INPUT_LENGTH = 1000;

const INJECTION_PATTERNS = [
  /ignore (previous|all|your) instruction/i,
  /you are now/i,
  /roleplay as/i,
  /pretend (you are|to be)/i,
  /disregard.*rules/i,
  /reveal.*prompt/i,
];

const SQL_FRAGMENT = /(union|select|insert|update|delete|drop|create|alter)\s+(all|distinct|from|into|table)/gi;

/** Flagged moderation categories for the text; empty when clean. */
export interface Moderator {
  flaggedCategories(text: string, signal?: AbortSignal): Promise<string[]>;
}

export function createOpenAiModerator(client: OpenAI): Moderator {
  return {
    async flaggedCategories(text, signal) {
      const moderation = await client.moderations.create({ input: text }, { signal });
      const result = moderation.results[0];
      if (!result?.flagged) return [];
      return Object.entries(result.categories)
        .filter(([, flagged]) => flagged === true)
        .map(([category]) => category);
    },
  };
}

const vocabularySchema = z.object({
  dealTerms: z.array(z.string().min(1)),
  intentPhrases: z.array(z.string().min(1)),
  productNouns: z.array(z.string().min(1)),
  brands: z.array(z.string().min(1)),
  modelPatterns: z.array(
    z.string().refine((source) => {
      try {
        new RegExp(source);
        return true;
      } catch {
        return false;
      }
    }, 'invalid regular expression')
  ),
  examples: z.array(z.string()),
});

export type DealVocabulary = z.infer<typeof vocabularySchema>;

export const defaultVocabulary: DealVocabulary = vocabularySchema.parse(rawVocabulary);

export interface GuardrailsOptions {
  /** Null disables the moderation step. */
  moderator: Moderator | null;
  vocabulary?: DealVocabulary;
}

/**
 * Checks a shopper's query before it reaches the deal pipeline: length,
 * prompt-injection phrasing, content moderation and shopping intent.
 */
export class Guardrails {
  private readonly moderator: Moderator | null;
  private readonly vocabulary: DealVocabulary;
  private readonly words: Set<string>;
  private readonly phrases: string[];
  private readonly modelPatterns: RegExp[];

  constructor(options: GuardrailsOptions) {
    this.moderator = options.moderator;
    this.vocabulary = options.vocabulary ?? defaultVocabulary;

    const terms = [...this.vocabulary.dealTerms, ...this.vocabulary.productNouns, ...this.vocabulary.brands].map((t) =>
      t.toLowerCase()
    );
    this.words = new Set(terms.filter((t) => !t.includes(' ')));
    this.phrases = [...this.vocabulary.intentPhrases.map((p) => p.toLowerCase()), ...terms.filter((t) => t.includes(' '))];
    this.modelPatterns = this.vocabulary.modelPatterns.map((source) => new RegExp(source, 'i'));

    if (!this.moderator) {
      console.warn('[guardrails] Warning: moderation disabled.');
    }
  }

  get examples(): string[] {
    return this.vocabulary.examples;
  }

  async checkInput(text: string, signal?: AbortSignal): Promise<GuardrailVerdict> {
    if (!text || !text.trim()) return { ok: false, reason: 'Input cannot be empty' };
    if (text.length < MIN_INPUT_LENGTH) {
      return { ok: false, reason: `Input too short (minimum ${MIN_INPUT_LENGTH} characters)` };
    }
    if (text.length > MAX_INPUT_LENGTH) {
      return { ok: false, reason: `Input too long (maximum ${MAX_INPUT_LENGTH} characters)` };
    }
    if (INJECTION_PATTERNS.some((re) => re.test(text))) {
      return { ok: false, reason: 'Input contains potentially unsafe instructions' };
    }

    if (this.moderator) {
      try {
        const flagged = await this.moderator.flaggedCategories(text, signal);
        if (flagged.length > 0) {
          return { ok: false, reason: `Content flagged as inappropriate: ${flagged.join(', ')}` };
        }
      } catch (err) {
        if (signal?.aborted) throw err;
        // fail open
        console.warn('[guardrails] moderation failed:', err instanceof Error ? err.message : String(err));
      }
    }

    return { ok: true };
  }

  isDealRelated(text: string): GuardrailVerdict {
    const lower = text.toLowerCase();
    const tokens = lower.match(/[a-z0-9]+(?:-[a-z0-9]+)*/g) ?? [];

    const knownWord = tokens.some(
      (token) => this.words.has(token) || (token.endsWith('s') && this.words.has(token.slice(0, -1)))
    );
    const knownPhrase = this.phrases.some((phrase) => lower.includes(phrase));
    const modelToken = this.modelPatterns.some((re) => re.test(lower));

    if (knownWord || knownPhrase || modelToken) return { ok: true };

    return {
      ok: false,
      reason:
        tokens.length <= 1
          ? 'That looks like a single general word. Name a product, brand or model you want to buy.'
          : 'This assistant only finds product deals and prices. Ask about something you want to buy.',
    };
  }

  /**
   * Normalize a query for search: no URLs, HTML tags or SQL-like
   * fragments, only letters, digits, `_` and `.,!?-$%` (any script), single spaces.
   */
  sanitizeForDeals(text: string): string {
    return text
      .replace(/https?:\/\/\S+/g, '')
      .replace(/<[^>]+>/g, '')
      .replace(SQL_FRAGMENT, '')
      .replace(/([!?.]){3,}/g, '$1$1')
      .replace(/[^\p{L}\p{N}_\s.,!?\-$%]/gu, '')
      .replace(/\s+/g, ' ')
      .trim();
  }
}
