const mockSend = jest.fn();
const mockSnsSend = jest.fn();

jest.mock('resend', () => ({
  Resend: jest.fn().mockImplementation(() => ({ emails: { send: mockSend } })),
}));

// Mock AWS SDK v3
jest.mock('@aws-sdk/client-sns', () => ({
  SNSClient: jest.fn().mockImplementation(() => ({
    send: mockSnsSend,
  })),
  PublishCommand: jest.fn((input) => ({ input, commandName: 'PublishCommand' })),
}));

import { SNSClient } from '@aws-sdk/client-sns';

import {
  MultiChannelNotifier,
  ResendNotifier,
  SnsSmsNotifier,
  buildPriceDropMessage,
  runPriceCheck,
  type AlertNotifier,
  type PriceDrop,
} from '../../src/lib/price-alerts';
import type { NotificationStore, Subscriber, Subscription } from '../../src/lib/notification-store';
import type {
  CompletionOptions,
  DealClients,
  ExtractOptions,
  ProviderEnvelope,
  SearchOptions,
} from '../../src/lib/deals/types';

const ok = (body: unknown): ProviderEnvelope => ({ status: 'success', content: [{ text: JSON.stringify(body) }] });

function subscription(overrides: Partial<Subscription>): Subscription {
  return {
    productName: 'Widget Pro',
    subscriberId: 'shopper@test.dev',
    email: 'shopper@test.dev',
    phone: null,
    createdAt: '2026-01-01T00:00:00.000Z',
    lastPrice: null,
    lastChecked: null,
    ...overrides,
  };
}

/** In-memory stand-in for the Redis-backed store. */
class MemoryStore implements NotificationStore {
  readonly byProduct = new Map<string, Subscription[]>();
  readonly updates: Array<[string, string, number, string]> = [];

  async add(productName: string, subscriber: Subscriber): Promise<boolean> {
    const id = subscriber.email || subscriber.phone || '';
    const subs = this.byProduct.get(productName) ?? [];
    if (subs.some((s) => s.subscriberId === id)) return false;
    subs.push(subscription({ productName, subscriberId: id, email: subscriber.email ?? null, phone: subscriber.phone ?? null }));
    this.byProduct.set(productName, subs);
    return true;
  }

  async getByProduct(productName: string): Promise<Subscription[]> {
    return (this.byProduct.get(productName) ?? []).map((s) => ({ ...s }));
  }

  async updateLastPrice(productName: string, subscriberId: string, price: number, checkedAt: Date): Promise<boolean> {
    this.updates.push([productName, subscriberId, price, checkedAt.toISOString()]);
    const sub = this.byProduct.get(productName)?.find((s) => s.subscriberId === subscriberId);
    if (!sub) return false;
    sub.lastPrice = price;
    sub.lastChecked = checkedAt.toISOString();
    return true;
  }

  async listProducts(): Promise<string[]> {
    return [...this.byProduct.keys()].sort();
  }

  async remove(productName: string, subscriberId: string): Promise<boolean> {
    const subs = this.byProduct.get(productName) ?? [];
    const next = subs.filter((s) => s.subscriberId !== subscriberId);
    this.byProduct.set(productName, next);
    return next.length !== subs.length;
  }
}

function makeClients() {
  const search = jest.fn<Promise<ProviderEnvelope>, [string, SearchOptions]>();
  const extract = jest.fn<Promise<ProviderEnvelope>, [string[], ExtractOptions]>();
  const complete = jest.fn<Promise<string>, [string, CompletionOptions]>();
  const clients: DealClients = { search: { search }, extractor: { extract }, llm: { complete } };
  return { clients, search, extract, complete };
}

const WIDGET_URL = 'https://www.shopmart.test/widget-pro';

describe('price-alerts', () => {
  beforeEach(() => {
    mockSend.mockReset();
    mockSnsSend.mockReset();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('buildPriceDropMessage', () => {
    it('should describe the drop and the saving', () => {
      const message = buildPriceDropMessage({ productName: 'Widget Pro', oldPrice: 100, newPrice: 80, url: WIDGET_URL });

      expect(message.subject).toBe('Price Drop: Widget Pro');
      expect(message.text.split('\n')).toEqual([
        'Price Drop Alert!',
        '',
        'Widget Pro',
        '',
        'Price dropped from $100.00 to $80.00',
        'You save $20.00 (20.0% off!)',
        '',
        `View deal: ${WIDGET_URL}`,
      ]);
    });
  });

  describe('runPriceCheck', () => {
    let store: MemoryStore;
    let notify: jest.Mock<Promise<boolean>, [Subscription, PriceDrop]>;
    let notifier: AlertNotifier;

    beforeEach(() => {
      store = new MemoryStore();
      notify = jest.fn<Promise<boolean>, [Subscription, PriceDrop]>(async (sub) => Boolean(sub.email));
      notifier = { notify };
    });

    it('should alert only subscribers who saw a higher price', async () => {
      store.byProduct.set('Widget Pro', [
        subscription({ subscriberId: 'dropped@test.dev', email: 'dropped@test.dev', lastPrice: 100 }),
        subscription({ subscriberId: 'new@test.dev', email: 'new@test.dev', lastPrice: null }),
        subscription({ subscriberId: 'cheaper@test.dev', email: 'cheaper@test.dev', lastPrice: 50 }),
        subscription({ subscriberId: '555-123-4567', email: null, phone: '555-123-4567', lastPrice: 120 }),
      ]);
      const { clients, search, extract } = makeClients();
      search.mockResolvedValueOnce(ok({ results: [{ title: 'Widget Pro', url: WIDGET_URL, content: 'Buy now $80.00' }] }));

      const report = await runPriceCheck({
        store,
        clients,
        notifier,
        now: () => new Date('2026-03-01T12:00:00.000Z'),
      });

      expect(search).toHaveBeenCalledWith('Widget Pro price', {
        depth: 'basic',
        maxResults: 3,
        includeRawContent: true,
      });
      expect(extract).not.toHaveBeenCalled();
      expect(report).toEqual({ productsChecked: 1, notificationsSent: 1, errors: [] });
      expect(notify).toHaveBeenCalledTimes(2);
      expect(notify.mock.calls[0][1]).toEqual({ productName: 'Widget Pro', oldPrice: 100, newPrice: 80, url: WIDGET_URL });
      expect(notify.mock.calls[1][1]).toEqual({ productName: 'Widget Pro', oldPrice: 120, newPrice: 80, url: WIDGET_URL });
      expect(store.updates).toEqual([
        ['Widget Pro', 'dropped@test.dev', 80, '2026-03-01T12:00:00.000Z'],
        ['Widget Pro', 'new@test.dev', 80, '2026-03-01T12:00:00.000Z'],
        ['Widget Pro', 'cheaper@test.dev', 80, '2026-03-01T12:00:00.000Z'],
        ['Widget Pro', '555-123-4567', 80, '2026-03-01T12:00:00.000Z'],
      ]);
    });

    it('should record a failing product and keep going', async () => {
      store.byProduct.set('Broken', [subscription({ productName: 'Broken', lastPrice: 10 })]);
      store.byProduct.set('Widget Pro', [subscription({ lastPrice: 100 })]);
      const { clients, search } = makeClients();
      search
        .mockResolvedValueOnce({ status: 'error', content: [{ text: 'quota exceeded' }] })
        .mockResolvedValueOnce(ok({ results: [{ title: 'Widget Pro', url: WIDGET_URL, content: 'Buy now $80.00' }] }));

      const report = await runPriceCheck({ store, clients, notifier });

      expect(report.productsChecked).toBe(2);
      expect(report.notificationsSent).toBe(1);
      expect(report.errors).toEqual(['Error checking Broken: search failed: quota exceeded']);
    });

    it('should leave subscriptions alone when no price is found', async () => {
      store.byProduct.set('Widget Pro', [subscription({ lastPrice: 100 })]);
      const { clients, search } = makeClients();
      search.mockResolvedValueOnce(ok({ results: [] }));

      const report = await runPriceCheck({ store, clients, notifier });

      expect(report).toEqual({ productsChecked: 1, notificationsSent: 0, errors: [] });
      expect(store.updates).toEqual([]);
      expect(notify).not.toHaveBeenCalled();
    });
  });

  describe('ResendNotifier', () => {
    const drop: PriceDrop = { productName: 'Widget Pro', oldPrice: 100, newPrice: 80, url: WIDGET_URL };

    it('should email the subscriber', async () => {
      mockSend.mockResolvedValueOnce({ data: { id: 'email-1' }, error: null });
      const notifier = new ResendNotifier({ apiKey: 'test-key', from: 'Deals <alerts@test.dev>' });

      await expect(notifier.notify(subscription({}), drop)).resolves.toBe(true);
      expect(mockSend).toHaveBeenCalledWith({
        from: 'Deals <alerts@test.dev>',
        to: 'shopper@test.dev',
        subject: 'Price Drop: Widget Pro',
        text: buildPriceDropMessage(drop).text,
      });
    });

    it('should skip phone-only subscribers', async () => {
      const notifier = new ResendNotifier({ apiKey: 'test-key', from: 'alerts@test.dev' });

      const sent = await notifier.notify(subscription({ subscriberId: '555-123-4567', email: null, phone: '555-123-4567' }), drop);

      expect(sent).toBe(false);
      expect(mockSend).not.toHaveBeenCalled();
    });

    it('should not send without an API key', async () => {
      const notifier = new ResendNotifier({ apiKey: '', from: 'alerts@test.dev' });

      await expect(notifier.notify(subscription({}), drop)).resolves.toBe(false);
      expect(mockSend).not.toHaveBeenCalled();
    });

    it('should report a rejected send', async () => {
      mockSend.mockResolvedValueOnce({ data: null, error: { name: 'validation_error', message: 'bad sender' } });
      const notifier = new ResendNotifier({ apiKey: 'test-key', from: 'alerts@test.dev' });

      await expect(notifier.notify(subscription({}), drop)).resolves.toBe(false);
      expect(console.error).toHaveBeenCalledWith('[notify] email to shopper@test.dev failed:', 'bad sender');
    });
  });

  describe('SnsSmsNotifier', () => {
    const drop: PriceDrop = { productName: 'Widget Pro', oldPrice: 100, newPrice: 80, url: WIDGET_URL };
    const texter = subscription({ subscriberId: '+15551234567', email: null, phone: '+15551234567' });

    it('should text the subscriber the alert', async () => {
      mockSnsSend.mockResolvedValueOnce({ MessageId: 'msg-1' });
      const notifier = new SnsSmsNotifier({ client: new SNSClient({ region: 'us-east-1' }) });

      await expect(notifier.notify(texter, drop)).resolves.toBe(true);
      expect(mockSnsSend).toHaveBeenCalledWith({
        input: { PhoneNumber: '+15551234567', Message: buildPriceDropMessage(drop).text },
        commandName: 'PublishCommand',
      });
    });

    it('should skip email-only subscribers', async () => {
      const notifier = new SnsSmsNotifier({ client: new SNSClient({ region: 'us-east-1' }) });

      await expect(notifier.notify(subscription({}), drop)).resolves.toBe(false);
      expect(mockSnsSend).not.toHaveBeenCalled();
    });

    it('should not send when SMS is disabled', async () => {
      const notifier = new SnsSmsNotifier({ client: null });

      await expect(notifier.notify(texter, drop)).resolves.toBe(false);
      expect(mockSnsSend).not.toHaveBeenCalled();
    });
  });

  describe('MultiChannelNotifier', () => {
    const drop: PriceDrop = { productName: 'Widget Pro', oldPrice: 100, newPrice: 80, url: WIDGET_URL };

    function channels() {
      return new MultiChannelNotifier([
        new ResendNotifier({ apiKey: 'test-key', from: 'alerts@test.dev' }),
        new SnsSmsNotifier({ client: new SNSClient({ region: 'us-east-1' }) }),
      ]);
    }

    it('should reach a phone-only subscriber by SMS', async () => {
      mockSnsSend.mockResolvedValueOnce({ MessageId: 'msg-1' });
      const texter = subscription({ subscriberId: '555-123-4567', email: null, phone: '555-123-4567' });

      await expect(channels().notify(texter, drop)).resolves.toBe(true);
      expect(mockSend).not.toHaveBeenCalled();
      expect(mockSnsSend).toHaveBeenCalledTimes(1);
    });

    it('should use both channels when both contacts are present', async () => {
      mockSend.mockResolvedValueOnce({ data: { id: 'email-1' }, error: null });
      mockSnsSend.mockResolvedValueOnce({ MessageId: 'msg-1' });

      await expect(channels().notify(subscription({ phone: '555-123-4567' }), drop)).resolves.toBe(true);
      expect(mockSend).toHaveBeenCalledTimes(1);
      expect(mockSnsSend).toHaveBeenCalledTimes(1);
    });

    it('should still count the email when SMS delivery throws', async () => {
      mockSend.mockResolvedValueOnce({ data: { id: 'email-1' }, error: null });
      mockSnsSend.mockRejectedValueOnce(new Error('InvalidParameter: PhoneNumber'));

      await expect(channels().notify(subscription({ phone: '555-123-4567' }), drop)).resolves.toBe(true);
      expect(console.error).toHaveBeenCalledWith(
        '[notify] alert to shopper@test.dev failed:',
        'InvalidParameter: PhoneNumber'
      );
    });

    it('should report failure when no channel delivered', async () => {
      mockSnsSend.mockRejectedValueOnce(new Error('throttled'));
      const texter = subscription({ subscriberId: '555-123-4567', email: null, phone: '555-123-4567' });

      await expect(channels().notify(texter, drop)).resolves.toBe(false);
      expect(console.warn).toHaveBeenCalledWith('[notify] no channel reached 555-123-4567');
    });
  });
});
