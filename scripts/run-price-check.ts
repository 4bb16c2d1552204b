import { cfg } from '../src/config.js';
import { openai } from '../src/lib/openai.js';
import { createOpenAiCompleter } from '../src/lib/llm.js';
import { TavilyClient } from '../src/lib/tavily.js';
import { UpstashNotificationStore } from '../src/lib/notification-store.js';
import { MultiChannelNotifier, ResendNotifier, SnsSmsNotifier, runPriceCheck } from '../src/lib/price-alerts.js';

async function main() {
  const tavily = new TavilyClient();
  const report = await runPriceCheck({
    store: new UpstashNotificationStore(),
    clients: { search: tavily, extractor: tavily, llm: createOpenAiCompleter(openai, cfg.openai.model) },
    notifier: new MultiChannelNotifier([new ResendNotifier(), new SnsSmsNotifier()]),
  });

  console.log(JSON.stringify(report, null, 2));
  if (report.errors.length > 0) process.exitCode = 1;
}

main().catch((err) => {
  console.error('[price-check] fatal:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
