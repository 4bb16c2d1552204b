import type OpenAI from 'openai';
import type { CompletionOptions, LlmClient } from './deals/types.js';

/**
 * Adapt a chat-completions client to the prompt-in, text-out contract the
 * deal pipeline uses. Returns the first choice's text, or '' when absent.
 */
export function createOpenAiCompleter(client: OpenAI, model: string): LlmClient {
  return {
    async complete(prompt: string, options: CompletionOptions): Promise<string> {
      const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
      if (options.system) messages.push({ role: 'system', content: options.system });
      messages.push({ role: 'user', content: prompt });

      const response = await client.chat.completions.create(
        {
          model,
          temperature: options.temperature,
          max_tokens: options.maxTokens,
          messages,
        },
        { signal: options.signal }
      );

      return response.choices[0]?.message?.content ?? '';
    },
  };
}
