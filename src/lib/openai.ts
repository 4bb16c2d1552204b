import OpenAI from 'openai';
import { cfg } from '../config.js';

if (!cfg.openai.apiKey) {
  console.warn('[openai] Warning: OPENAI_API_KEY not set. Classification, extraction and moderation calls will fail.');
}

export const openai = new OpenAI({
  apiKey: cfg.openai.apiKey,
  defaultHeaders: { 'User-Agent': 'deal-scout/1.0' },
});
