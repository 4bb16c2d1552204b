import express from 'express';
import type { TrustProxySetting } from './config.js';
import type { DealClients } from './lib/deals/types.js';
import type { DomainPolicyTable } from './lib/deals/domain-policy.js';
import type { Guardrails } from './lib/guardrails.js';
import type { RateLimiter } from './lib/rate-limit.js';
import type { NotificationStore } from './lib/notification-store.js';
import { createDealsRouter } from './routes/deals.js';
import { createNotifyRouter } from './routes/notify.js';

export interface AppDeps {
  clients: DealClients;
  guardrails: Guardrails;
  rateLimiter: RateLimiter;
  store: NotificationStore;
  policy?: DomainPolicyTable;
  /** Express `trust proxy` value. `req.ip` keys the rate limiter; defaults to false. */
  trustProxy?: TrustProxySetting;
}

export function createApp(deps: AppDeps) {
  const app = express();
  app.set('trust proxy', deps.trustProxy ?? false);

  // health
  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use(createDealsRouter(deps));
  app.use(createNotifyRouter(deps));

  return app;
}
