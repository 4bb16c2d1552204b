import express from 'express';
import { z } from 'zod';
import type { DealClients } from '../lib/deals/types.js';
import type { DomainPolicyTable } from '../lib/deals/domain-policy.js';
import { findDeals } from '../lib/deals/pipeline.js';
import type { Guardrails } from '../lib/guardrails.js';
import type { RateLimiter } from '../lib/rate-limit.js';
import { renderNotice, renderPage, renderProductCards } from '../lib/render.js';

export const GENERIC_ERROR = 'An error occurred. Please try again.';
export const RATE_LIMITED = 'Too many searches. Please wait a minute and try again.';
export const SEARCH_UNAVAILABLE = 'Search is unavailable right now. Please try again in a moment.';

export interface DealsRouterDeps {
  clients: DealClients;
  guardrails: Guardrails;
  rateLimiter: RateLimiter;
  policy?: DomainPolicyTable;
}

const searchBodySchema = z.object({
  msg: z.string().optional(),
  query: z.string().optional(),
});

export function createDealsRouter(deps: DealsRouterDeps) {
  const router = express.Router();
  router.use(express.urlencoded({ extended: false }));
  router.use(express.json());

  router.get('/', (_req, res) => {
    res.type('html').send(renderPage());
  });

  // POST /search: form field `msg` or JSON `query`
  router.post('/search', async (req, res) => {
    const body = searchBodySchema.safeParse(req.body ?? {});
    const input = body.success ? (body.data.msg ?? body.data.query ?? '') : '';

    if (!deps.rateLimiter.isAllowed(req.ip ?? 'unknown')) {
      res.status(429).type('html').send(renderPage(renderNotice(RATE_LIMITED), input));
      return;
    }

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const verdict = await deps.guardrails.checkInput(input, controller.signal);
      if (!verdict.ok) {
        res.status(400).type('html').send(renderPage(renderNotice(`Input blocked: ${verdict.reason}`), input));
        return;
      }

      const intent = deps.guardrails.isDealRelated(input);
      if (!intent.ok) {
        res
          .status(400)
          .type('html')
          .send(renderPage(renderNotice(intent.reason, 'warning', deps.guardrails.examples), input));
        return;
      }

      const query = deps.guardrails.sanitizeForDeals(input);
      if (!query) {
        res.status(400).type('html').send(renderPage(renderNotice('Input blocked: Input cannot be empty'), input));
        return;
      }
      console.log(`[server] search "${query}"`);

      const outcome = await findDeals(query, deps.clients, { policy: deps.policy, signal: controller.signal });
      if (outcome.kind === 'search_failed') {
        console.error(`[server] ${outcome.error.name}: ${outcome.error.message}`);
        res.status(502).type('html').send(renderPage(renderNotice(SEARCH_UNAVAILABLE), query));
        return;
      }

      res.type('html').send(renderPage(renderProductCards(outcome.products, query), query));
    } catch (err) {
      if (controller.signal.aborted) {
        console.log('[server] client disconnected, search abandoned');
        return;
      }
      console.error('[server] search failed:', err instanceof Error ? err.stack ?? err.message : String(err));
      res.status(500).type('html').send(renderPage(renderNotice(GENERIC_ERROR), input));
    }
  });

  return router;
}
