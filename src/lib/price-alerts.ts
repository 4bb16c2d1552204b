import { Resend } from 'resend';
import { PublishCommand, SNSClient } from '@aws-sdk/client-sns';
import { cfg } from '../config.js';
import type { DealClients } from './deals/types.js';
import { CostLedger } from './deals/cost-ledger.js';
import { defaultDomainPolicy, type DomainPolicyTable } from './deals/domain-policy.js';
import { resolveProducts } from './deals/price-resolver.js';
import { finalizeProducts } from './deals/aggregator.js';
import { toSearchPayload } from './deals/payload.js';
import type { NotificationStore, Subscription } from './notification-store.js';

export const PRICE_CHECK_RESULTS = 3;

export interface PriceDrop {
  productName: string;
  oldPrice: number;
  newPrice: number;
  url: string;
}

export interface AlertNotifier {
  /** True when the alert went out. */
  notify(subscription: Subscription, drop: PriceDrop): Promise<boolean>;
}

export function buildPriceDropMessage(drop: PriceDrop): { subject: string; text: string } {
  const amount = drop.oldPrice - drop.newPrice;
  const percent = (amount / drop.oldPrice) * 100;
  return {
    subject: `Price Drop: ${drop.productName}`,
    text: [
      'Price Drop Alert!',
      '',
      drop.productName,
      '',
      `Price dropped from $${drop.oldPrice.toFixed(2)} to $${drop.newPrice.toFixed(2)}`,
      `You save $${amount.toFixed(2)} (${percent.toFixed(1)}% off!)`,
      '',
      `View deal: ${drop.url}`,
    ].join('\n'),
  };
}

export interface ResendNotifierOptions {
  apiKey: string;
  from: string;
}

/** Email alerts through Resend. Subscribers without an email are not this channel's. */
export class ResendNotifier implements AlertNotifier {
  private readonly resend: Resend | null;
  private readonly from: string;

  constructor(options: ResendNotifierOptions = { apiKey: cfg.alerts.resendApiKey, from: cfg.alerts.fromEmail }) {
    this.resend = options.apiKey ? new Resend(options.apiKey) : null;
    this.from = options.from;
  }

  async notify(subscription: Subscription, drop: PriceDrop): Promise<boolean> {
    if (!subscription.email) return false;
    if (!this.resend) {
      console.warn('[notify] missing resend configuration', { subscriber: subscription.subscriberId });
      return false;
    }

    const { subject, text } = buildPriceDropMessage(drop);
    const { error } = await this.resend.emails.send({ from: this.from, to: subscription.email, subject, text });
    if (error) {
      console.error(`[notify] email to ${subscription.email} failed:`, error.message);
      return false;
    }
    console.log(`[notify] email sent to ${subscription.email}`);
    return true;
  }
}

export interface SnsSmsNotifierOptions {
  /** Null disables SMS delivery. */
  client: SNSClient | null;
}

function defaultSnsOptions(): SnsSmsNotifierOptions {
  return { client: cfg.alerts.smsEnabled ? new SNSClient({ region: cfg.alerts.awsRegion }) : null };
}

/** SMS alerts through AWS SNS direct publish. */
export class SnsSmsNotifier implements AlertNotifier {
  private readonly client: SNSClient | null;

  constructor(options: SnsSmsNotifierOptions = defaultSnsOptions()) {
    this.client = options.client;
  }

  async notify(subscription: Subscription, drop: PriceDrop): Promise<boolean> {
    if (!subscription.phone) return false;
    if (!this.client) {
      console.warn('[notify] SMS alerts disabled, skipping', { subscriber: subscription.subscriberId });
      return false;
    }

    const { text } = buildPriceDropMessage(drop);
    await this.client.send(new PublishCommand({ PhoneNumber: subscription.phone, Message: text }));
    console.log(`[notify] SMS sent to ${subscription.phone}`);
    return true;
  }
}

/**
 * Tries every channel for a subscriber. A failing channel is logged and
 * does not stop the others; the alert counts as sent when any channel delivered.
 */
export class MultiChannelNotifier implements AlertNotifier {
  constructor(private readonly channels: AlertNotifier[]) {}

  async notify(subscription: Subscription, drop: PriceDrop): Promise<boolean> {
    let sent = false;
    for (const channel of this.channels) {
      try {
        if (await channel.notify(subscription, drop)) sent = true;
      } catch (err) {
        console.error(
          `[notify] alert to ${subscription.subscriberId} failed:`,
          err instanceof Error ? err.message : String(err)
        );
      }
    }
    if (!sent) console.warn(`[notify] no channel reached ${subscription.subscriberId}`);
    return sent;
  }
}

export interface PriceCheckDeps {
  store: NotificationStore;
  clients: DealClients;
  notifier: AlertNotifier;
  policy?: DomainPolicyTable;
  now?: () => Date;
}

export interface PriceCheckReport {
  productsChecked: number;
  notificationsSent: number;
  errors: string[];
}

async function cheapestOffer(name: string, deps: PriceCheckDeps): Promise<{ value: number; url: string } | null> {
  const envelope = await deps.clients.search.search(`${name} price`, {
    depth: 'basic',
    maxResults: PRICE_CHECK_RESULTS,
    includeRawContent: true,
  });
  const payload = toSearchPayload(envelope);
  if (payload.kind === 'error') throw new Error(`search failed: ${payload.message}`);
  if (payload.kind === 'malformed') throw new Error('search results could not be parsed');

  const products = finalizeProducts(
    await resolveProducts(payload.results.slice(0, PRICE_CHECK_RESULTS), deps.clients, {
      query: name,
      ledger: new CostLedger(),
      policy: deps.policy ?? defaultDomainPolicy,
    })
  );

  const best = products[0];
  if (!best || best.price.kind !== 'known' || !Number.isFinite(best.price.value)) return null;
  return { value: best.price.value, url: best.url };
}

/**
 * Re-price every tracked product and alert subscribers whose last seen
 * price was higher. One product failing never stops the run.
 */
export async function runPriceCheck(deps: PriceCheckDeps): Promise<PriceCheckReport> {
  const now = deps.now ?? (() => new Date());
  const report: PriceCheckReport = { productsChecked: 0, notificationsSent: 0, errors: [] };

  const products = await deps.store.listProducts();
  console.log(`[price-check] ${products.length} product(s) to check`);

  for (const name of products) {
    report.productsChecked += 1;
    try {
      const offer = await cheapestOffer(name, deps);
      if (!offer) {
        console.warn(`[price-check] no price found for "${name}"`);
        continue;
      }

      const subscriptions = await deps.store.getByProduct(name);
      for (const sub of subscriptions) {
        const last = sub.lastPrice;
        await deps.store.updateLastPrice(name, sub.subscriberId, offer.value, now());

        if (last === null) {
          console.log(`[price-check] first price for "${name}": $${offer.value}`);
        } else if (offer.value < last) {
          console.log(`[price-check] drop for "${name}": $${last} -> $${offer.value}`);
          const sent = await deps.notifier.notify(sub, {
            productName: name,
            oldPrice: last,
            newPrice: offer.value,
            url: offer.url,
          });
          if (sent) report.notificationsSent += 1;
        }
      }
    } catch (err) {
      const message = `Error checking ${name}: ${err instanceof Error ? err.message : String(err)}`;
      console.error(`[price-check] ${message}`);
      report.errors.push(message);
    }
  }

  console.log(`[price-check] done, ${report.notificationsSent} notification(s) sent`);
  return report;
}
