import { cfg, MODERATION_ENABLED } from './config.js';
import { createApp } from './app.js';
import { openai } from './lib/openai.js';
import { createOpenAiCompleter } from './lib/llm.js';
import { TavilyClient } from './lib/tavily.js';
import { Guardrails, createOpenAiModerator } from './lib/guardrails.js';
import { FixedWindowRateLimiter } from './lib/rate-limit.js';
import { UpstashNotificationStore } from './lib/notification-store.js';

const tavily = new TavilyClient();

const app = createApp({
  clients: {
    search: tavily,
    extractor: tavily,
    llm: createOpenAiCompleter(openai, cfg.openai.model),
  },
  guardrails: new Guardrails({
    moderator: MODERATION_ENABLED && cfg.openai.apiKey ? createOpenAiModerator(openai) : null,
  }),
  rateLimiter: new FixedWindowRateLimiter(cfg.rateLimit),
  store: new UpstashNotificationStore(),
  trustProxy: cfg.trustProxy,
});

// start
app.listen(cfg.port, () => {
  console.log(`[server] running on :${cfg.port} (${cfg.appUrl})`);
});
