import fetch from 'node-fetch';
import { z } from 'zod';
import { StoreUnavailableError } from './errors.js';

const PRODUCTS_KEY = 'notify:products';

export interface Subscriber {
  email?: string | null;
  phone?: string | null;
}

export interface Subscription {
  productName: string;
  /** Email when given, else phone. */
  subscriberId: string;
  email: string | null;
  phone: string | null;
  createdAt: string;
  lastPrice: number | null;
  lastChecked: string | null;
}

export interface NotificationStore {
  /** False when this subscriber already follows the product. */
  add(productName: string, subscriber: Subscriber): Promise<boolean>;
  getByProduct(productName: string): Promise<Subscription[]>;
  updateLastPrice(productName: string, subscriberId: string, price: number, checkedAt: Date): Promise<boolean>;
  listProducts(): Promise<string[]>;
  remove(productName: string, subscriberId: string): Promise<boolean>;
}

export function subscriberIdOf(subscriber: Subscriber): string {
  const id = subscriber.email?.trim() || subscriber.phone?.trim();
  if (!id) throw new Error('At least one of email or phone must be provided');
  return id;
}

const subscriptionSchema = z.object({
  productName: z.string(),
  subscriberId: z.string(),
  email: z.string().nullable(),
  phone: z.string().nullable(),
  createdAt: z.string(),
  lastPrice: z.number().nullable(),
  lastChecked: z.string().nullable(),
});

const resultSchema = z.object({ result: z.unknown() });

function productKey(productName: string): string {
  return `notify:product:${productName}`;
}

function toStringArray(input: unknown): string[] {
  if (!Array.isArray(input)) return [];
  return input.filter((item): item is string => typeof item === 'string');
}

function parseSubscription(raw: unknown): Subscription | null {
  if (typeof raw !== 'string') return null;
  try {
    const parsed = subscriptionSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export interface UpstashOptions {
  url: string;
  token: string;
}

/**
 * Price-drop subscriptions in Upstash Redis over its REST API: one hash
 * per product (subscriber id → JSON record) plus a set of product names.
 */
export class UpstashNotificationStore implements NotificationStore {
  private readonly base: string;
  private readonly token: string;

  constructor(
    options: UpstashOptions = {
      url: process.env.UPSTASH_REDIS_REST_URL || '',
      token: process.env.UPSTASH_REDIS_REST_TOKEN || '',
    }
  ) {
    this.base = options.url.replace(/\/$/, '');
    this.token = options.token;
    if (!this.base || !this.token) {
      console.warn('[notify] WARNING: Upstash Redis env vars missing. Price-drop subscriptions will not persist.');
    }
  }

  private async call(...parts: string[]): Promise<unknown> {
    if (!this.base || !this.token) {
      throw new StoreUnavailableError('Upstash Redis not configured');
    }

    const encoded = parts.map((p) => encodeURIComponent(p));
    const res = await fetch(`${this.base}/${encoded.join('/')}`, {
      method: 'POST',
      headers: { Authorization: `Bearer ${this.token}` },
    });

    if (!res.ok) {
      const text = await res.text();
      throw new StoreUnavailableError(`Redis error ${res.status}: ${text}`);
    }

    const body = resultSchema.safeParse(await res.json());
    if (!body.success) throw new StoreUnavailableError('Unexpected Redis response');
    return body.data.result;
  }

  async add(productName: string, subscriber: Subscriber): Promise<boolean> {
    const subscriberId = subscriberIdOf(subscriber);
    const record: Subscription = {
      productName,
      subscriberId,
      email: subscriber.email?.trim() || null,
      phone: subscriber.phone?.trim() || null,
      createdAt: new Date().toISOString(),
      lastPrice: null,
      lastChecked: null,
    };

    const created = await this.call('HSETNX', productKey(productName), subscriberId, JSON.stringify(record));
    if (Number(created) !== 1) return false;

    await this.call('SADD', PRODUCTS_KEY, productName);
    console.log(`[notify] subscribed ${subscriberId} to "${productName}"`);
    return true;
  }

  async getByProduct(productName: string): Promise<Subscription[]> {
    const flat = toStringArray(await this.call('HGETALL', productKey(productName)));
    const subscriptions: Subscription[] = [];
    // HGETALL answers [field, value, field, value, ...]
    for (let i = 1; i < flat.length; i += 2) {
      const sub = parseSubscription(flat[i]);
      if (sub) {
        subscriptions.push(sub);
      } else {
        console.warn(`[notify] skipping unreadable subscription ${flat[i - 1]} for "${productName}"`);
      }
    }
    return subscriptions;
  }

  async updateLastPrice(productName: string, subscriberId: string, price: number, checkedAt: Date): Promise<boolean> {
    const existing = parseSubscription(await this.call('HGET', productKey(productName), subscriberId));
    if (!existing) return false;

    const updated: Subscription = { ...existing, lastPrice: price, lastChecked: checkedAt.toISOString() };
    await this.call('HSET', productKey(productName), subscriberId, JSON.stringify(updated));
    return true;
  }

  async listProducts(): Promise<string[]> {
    return toStringArray(await this.call('SMEMBERS', PRODUCTS_KEY)).sort();
  }

  async remove(productName: string, subscriberId: string): Promise<boolean> {
    const removed = await this.call('HDEL', productKey(productName), subscriberId);
    if (Number(removed) !== 1) return false;

    const remaining = await this.call('HLEN', productKey(productName));
    if (Number(remaining) === 0) {
      await this.call('SREM', PRODUCTS_KEY, productName);
    }
    return true;
  }
}
