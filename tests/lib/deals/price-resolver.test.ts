import { CostLedger } from '../../../src/lib/deals/cost-ledger';
import { defaultDomainPolicy } from '../../../src/lib/deals/domain-policy';
import { buildExtractionPrompt, resolveProducts } from '../../../src/lib/deals/price-resolver';
import type {
  CompletionOptions,
  ExtractClient,
  ExtractOptions,
  LlmClient,
  ProviderEnvelope,
  SearchHit,
} from '../../../src/lib/deals/types';

const page = (url: string, content: string): ProviderEnvelope => ({
  status: 'success',
  content: [{ text: JSON.stringify({ results: [{ url, raw_content: content }] }) }],
});

function makeDeps() {
  const extract = jest.fn<Promise<ProviderEnvelope>, [string[], ExtractOptions]>();
  const complete = jest.fn<Promise<string>, [string, CompletionOptions]>();
  const extractor: ExtractClient = { extract };
  const llm: LlmClient = { complete };
  return { deps: { extractor, llm }, extract, complete };
}

function run(hits: SearchHit[], deps: { extractor: ExtractClient; llm: LlmClient }, ledger = new CostLedger()) {
  return resolveProducts(hits, deps, { query: 'test query', ledger, policy: defaultDomainPolicy });
}

const SAMSUNG = 'https://www.samsung.com/us/smartphones/galaxy-s24/buy/';

describe('price-resolver.ts', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('fast path', () => {
    it('should use a trusted snippet price without extraction', async () => {
      const { deps, extract } = makeDeps();
      const ledger = new CostLedger();

      const products = await run(
        [{ title: 'Widget Pro', url: 'https://www.store.test/widget', snippet: 'Buy now $499.00' }],
        deps,
        ledger
      );

      expect(products).toEqual([
        {
          productName: 'Widget Pro',
          details: 'Buy now $499.00',
          price: { kind: 'known', display: '$499.00', value: 499 },
          dealInfo: '',
          url: 'https://www.store.test/widget',
          source: 'store.test',
          inStock: true,
        },
      ]);
      expect(extract).not.toHaveBeenCalled();
      expect(ledger.summary().snippetBasedResults).toBe(1);
      expect(ledger.summary().totalResults).toBe(1);
    });

    it('should truncate details to 150 characters', async () => {
      const { deps } = makeDeps();
      const snippet = `Deal $20.00 ${'z'.repeat(300)}`;
      const [product] = await run([{ title: 'Z', url: 'https://store.test/z', snippet }], deps);
      expect(product.details).toBe(snippet.slice(0, 150));
    });

    it('should take the full retail price on a carrier page', async () => {
      const { deps, extract } = makeDeps();
      const [product] = await run(
        [
          {
            title: 'Pixel 8',
            url: 'https://www.verizon.com/smartphones/google-pixel-8/',
            snippet: 'Pixel 8 for $17.49/mo for 36 months. Full retail price: $629.99',
          },
        ],
        deps
      );
      expect(product.price).toEqual({ kind: 'known', display: '$629.99', value: 629.99 });
      expect(extract).not.toHaveBeenCalled();
    });
  });

  describe('rejections', () => {
    it('should skip excluded domains and review snippets without any calls', async () => {
      const { deps, extract, complete } = makeDeps();
      const products = await run(
        [
          { title: 'Unboxing', url: 'https://www.youtube.com/watch?v=abc', snippet: '$499' },
          { title: 'Laptops', url: 'https://news.test/laptops', snippet: 'Our pick: $999 laptop' },
        ],
        deps
      );
      expect(products).toEqual([]);
      expect(extract).not.toHaveBeenCalled();
      expect(complete).not.toHaveBeenCalled();
    });
  });

  describe('full extraction path', () => {
    it('should force extraction on manufacturer stores and use the model answer', async () => {
      const { deps, extract, complete } = makeDeps();
      extract.mockResolvedValueOnce(page(SAMSUNG, 'Galaxy S24 128GB. Now $799.99. Add to cart.'));
      complete.mockResolvedValueOnce(
        '{"product_name": "Galaxy S24", "details": "128GB", "price": "$799.99", "deal_info": "Save $100", "in_stock": true}'
      );
      const ledger = new CostLedger();

      const products = await run(
        [{ title: 'Galaxy S24 | Samsung US', url: SAMSUNG, snippet: 'Galaxy S24 from $899.99' }],
        deps,
        ledger
      );

      expect(extract).toHaveBeenCalledWith([SAMSUNG], { depth: 'advanced', format: 'text', signal: undefined });
      expect(complete.mock.calls[0][1]).toEqual(expect.objectContaining({ temperature: 0.2, maxTokens: 400 }));
      expect(products).toEqual([
        {
          productName: 'Galaxy S24',
          details: '128GB',
          price: { kind: 'known', display: '$799.99', value: 799.99 },
          dealInfo: 'Save $100',
          url: SAMSUNG,
          source: 'samsung.com',
          inStock: true,
        },
      ]);
      expect(ledger.summary()).toEqual(
        expect.objectContaining({
          extractionCalls: 1,
          extractionLlmCalls: 1,
          fullExtractionResults: 1,
          snippetBasedResults: 0,
          totalResults: 1,
        })
      );
    });

    it('should request markdown for rich-markup marketplaces', async () => {
      const { deps, extract, complete } = makeDeps();
      const url = 'https://www.amazon.com/dp/B0TEST';
      extract.mockResolvedValueOnce(page(url, 'Echo Dot price 49 99'));
      complete.mockResolvedValueOnce('{"price": "$49.99"}');

      const [product] = await run([{ title: 'Echo Dot', url, snippet: 'Smart speaker' }], deps);

      expect(extract.mock.calls[0][1].format).toBe('markdown');
      expect(complete.mock.calls[0][0]).toContain('This is a large marketplace page.');
      expect(product.price).toEqual({ kind: 'known', display: '$49.99', value: 49.99 });
    });

    it('should format a numeric price', async () => {
      const { deps, extract, complete } = makeDeps();
      extract.mockResolvedValueOnce(page(SAMSUNG, 'Galaxy'));
      complete.mockResolvedValueOnce('{"price": 1299}');

      const [product] = await run([{ title: 'Galaxy', url: SAMSUNG, snippet: '' }], deps);
      expect(product.price).toEqual({ kind: 'known', display: '$1299', value: 1299 });
    });

    it('should fall back to the first amount in the content when the model has no price', async () => {
      const { deps, extract, complete } = makeDeps();
      extract.mockResolvedValueOnce(page(SAMSUNG, 'Galaxy Tab. Price $1,099.00 today, was $1,199.00'));
      complete.mockResolvedValueOnce('{"product_name": "Galaxy Tab", "price": "Price not available"}');

      const [product] = await run([{ title: 'Tab', url: SAMSUNG, snippet: '' }], deps);
      expect(product.price).toEqual({ kind: 'known', display: '$1,099.00', value: 1099 });
    });

    it('should fall back to the backup snippet price last', async () => {
      const { deps, extract, complete } = makeDeps();
      const url = 'https://store.test/gizmo';
      extract.mockResolvedValueOnce(page(url, 'Gizmo, ships free'));
      complete.mockResolvedValueOnce('{"product_name": "Gizmo", "price": null}');

      const [product] = await run([{ title: 'Gizmo', url, snippet: 'Price: 249.99 at checkout' }], deps);
      expect(product.price).toEqual({ kind: 'known', display: '$249.99', value: 249.99 });
    });

    it('should drop the hit when no price can be found', async () => {
      const { deps, extract, complete } = makeDeps();
      extract.mockResolvedValueOnce(page(SAMSUNG, 'Coming soon'));
      complete.mockResolvedValueOnce('{"product_name": "Galaxy", "price": null}');
      const ledger = new CostLedger();

      expect(await run([{ title: 'Galaxy', url: SAMSUNG, snippet: '' }], deps, ledger)).toEqual([]);
      expect(ledger.summary().totalResults).toBe(0);
    });

    it('should scan the content when the reply is not JSON', async () => {
      const { deps, extract, complete } = makeDeps();
      extract.mockResolvedValueOnce(page(SAMSUNG, 'Buds now only $89.99'));
      complete.mockResolvedValueOnce('Sorry, I cannot help with that.');

      const [product] = await run([{ title: 'Galaxy Buds', url: SAMSUNG, snippet: '' }], deps);
      expect(product).toEqual(
        expect.objectContaining({
          productName: 'Galaxy Buds',
          price: { kind: 'known', display: '$89.99', value: 89.99 },
        })
      );
    });

    it('should drop the hit when the reply is not JSON and the content has no amount', async () => {
      const { deps, extract, complete } = makeDeps();
      extract.mockResolvedValueOnce(page(SAMSUNG, 'Sold out'));
      complete.mockResolvedValueOnce('no idea');

      expect(await run([{ title: 'Galaxy', url: SAMSUNG, snippet: '' }], deps)).toEqual([]);
    });

    it('should read in_stock given as text', async () => {
      const { deps, extract, complete } = makeDeps();
      extract.mockResolvedValueOnce(page(SAMSUNG, 'Galaxy'));
      complete.mockResolvedValueOnce('{"price": "$5.00", "in_stock": "false"}');

      const [product] = await run([{ title: 'Galaxy', url: SAMSUNG, snippet: '' }], deps);
      expect(product.inStock).toBe(false);
    });

    it('should skip the model call when extraction reports an error', async () => {
      const { deps, extract, complete } = makeDeps();
      extract.mockResolvedValueOnce({ status: 'error', content: [{ text: 'blocked' }] });

      expect(await run([{ title: 'Galaxy', url: SAMSUNG, snippet: '' }], deps)).toEqual([]);
      expect(complete).not.toHaveBeenCalled();
    });

    it('should carry on after a hit throws', async () => {
      const { deps, extract, complete } = makeDeps();
      const dell = 'https://www.dell.com/en-us/shop/xps-13';
      extract.mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce(page(dell, 'XPS 13 $999.00'));
      complete.mockResolvedValueOnce('{"price": "$999.00"}');

      const products = await run(
        [
          { title: 'Galaxy', url: SAMSUNG, snippet: '' },
          { title: 'XPS 13', url: dell, snippet: '' },
        ],
        deps
      );
      expect(products.map((p) => p.url)).toEqual([dell]);
    });
  });

  describe('billing period', () => {
    it('should append /month for subscription pages', async () => {
      const { deps, extract, complete } = makeDeps();
      const url = 'https://stream.test/plans/premium';
      extract.mockResolvedValueOnce(page(url, 'Premium plan $9.99 per month, recurring subscription'));
      complete.mockResolvedValueOnce('{"price": "$9.99"}');

      const [product] = await run([{ title: 'Premium', url, snippet: 'Stream everything' }], deps);
      expect(product.price).toEqual({ kind: 'known', display: '$9.99/month', value: 9.99 });
    });

    it('should not append /month on a one-time purchase store without subscription wording', async () => {
      const { deps, extract, complete } = makeDeps();
      const url = 'https://www.dell.com/en-us/shop/monitor';
      extract.mockResolvedValueOnce(page(url, 'Monitor $9.99/month with financing'));
      complete.mockResolvedValueOnce('{"price": "$9.99"}');

      const [product] = await run([{ title: 'Monitor', url, snippet: '' }], deps);
      expect(product.price).toEqual({ kind: 'known', display: '$9.99', value: 9.99 });
    });
  });

  describe('limits', () => {
    it('should stop at the target count', async () => {
      const { deps } = makeDeps();
      const hits = Array.from({ length: 12 }, (_, i) => ({
        title: `Item ${i}`,
        url: `https://store.test/p/${i}`,
        snippet: `Only $${i + 10}.00`,
      }));

      const products = await run(hits, deps);
      expect(products).toHaveLength(9);
      expect(products[8].url).toBe('https://store.test/p/8');
    });

    it('should look at no more than 15 candidates', async () => {
      const { deps, extract } = makeDeps();
      extract.mockResolvedValue({ status: 'error', content: [{ text: 'blocked' }] });
      const hits = Array.from({ length: 20 }, (_, i) => ({ title: `Item ${i}`, url: `${SAMSUNG}${i}`, snippet: '' }));

      expect(await run(hits, deps)).toEqual([]);
      expect(extract).toHaveBeenCalledTimes(15);
    });

    it('should stop when the request is aborted', async () => {
      const { deps } = makeDeps();
      const controller = new AbortController();
      controller.abort();

      await expect(
        resolveProducts([{ title: 'A', url: 'https://store.test/a', snippet: '$1.00' }], deps, {
          query: 'q',
          ledger: new CostLedger(),
          policy: defaultDomainPolicy,
          signal: controller.signal,
        })
      ).rejects.toThrow();
    });
  });

  describe('buildExtractionPrompt', () => {
    it('should include carrier guidance only for carrier pages', () => {
      const hit = { title: 'Phone', url: 'https://www.t-mobile.com/cell-phone/x', snippet: '' };
      const carrierPrompt = buildExtractionPrompt(hit, 'phone', 'content', defaultDomainPolicy.policyFor(hit.url));
      const plainPrompt = buildExtractionPrompt(hit, 'phone', 'content', defaultDomainPolicy.policyFor('https://store.test'));
      expect(carrierPrompt).toContain('This is a mobile carrier page.');
      expect(plainPrompt).not.toContain('This is a mobile carrier page.');
      expect(plainPrompt).toContain('Page URL: https://www.t-mobile.com/cell-phone/x');
    });
  });
});
