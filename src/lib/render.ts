import type { ExtractedProduct } from './deals/types.js';
import { priceLabel } from '../utils/price.js';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Only http(s) links make it into an href. */
export function safeHref(url: string): string {
  return /^https?:\/\//i.test(url) ? escapeHtml(url) : '#';
}

const STYLES = `
  body { font-family: system-ui, sans-serif; max-width: 1100px; margin: 0 auto; padding: 24px; color: #2d3748; }
  form.search { display: flex; gap: 8px; margin-bottom: 24px; }
  form.search input { flex: 1; padding: 10px; font-size: 16px; }
  .deals-container { display: grid; grid-template-columns: repeat(auto-fill, minmax(300px, 1fr)); gap: 20px; }
  .product-card { border: 1px solid #ddd; border-radius: 8px; padding: 16px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
  .product-name { font-size: 18px; font-weight: bold; margin-bottom: 8px; }
  .product-details { font-size: 14px; color: #666; margin-bottom: 12px; }
  .price-section { display: flex; justify-content: space-between; align-items: center; margin-bottom: 12px; }
  .product-price { font-size: 24px; font-weight: bold; color: #2c5282; }
  .deal-badge { background: #48bb78; color: white; padding: 4px 8px; border-radius: 4px; font-size: 12px; }
  .product-link { display: inline-block; background: #3182ce; color: white; padding: 10px 20px; border-radius: 6px; text-decoration: none; }
  .source-tag { display: inline-block; background: #edf2f7; padding: 2px 8px; border-radius: 4px; font-size: 12px; margin-top: 8px; }
  .notice { padding: 12px 16px; border-left: 4px solid #dd6b20; background: #fffaf0; margin-bottom: 16px; }
  .notice.error { border-color: #c53030; background: #fff5f5; }
  .no-results { text-align: center; padding: 40px; color: #718096; }
`;

const SUBSCRIBE_SCRIPT = `
  async function subscribe(button) {
    const contact = (window.prompt('Email or phone number for price-drop alerts:') || '').trim();
    if (!contact) return;
    const channel = contact.indexOf('@') >= 0 ? { email: contact } : { phone: contact };
    const res = await fetch('/api/notify', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(Object.assign({ product_name: button.dataset.product }, channel)),
    });
    const body = await res.json();
    button.textContent = res.ok ? (body.alreadySubscribed ? 'Already subscribed' : 'Subscribed') : (body.detail || 'Failed');
  }
`;

export function renderPage(body = '', query = ''): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Deal Scout</title>
<style>${STYLES}</style>
</head>
<body>
<h1>Deal Scout</h1>
<form class="search" method="post" action="/search">
  <input name="msg" placeholder="What are you shopping for?" value="${escapeHtml(query)}" required>
  <button type="submit">Find deals</button>
</form>
${body}
<script>${SUBSCRIBE_SCRIPT}</script>
</body>
</html>`;
}

export function renderNotice(message: string, kind: 'warning' | 'error' = 'error', examples: string[] = []): string {
  const list = examples.length
    ? `<p><strong>Examples:</strong></p><ul>${examples.map((e) => `<li>"${escapeHtml(e)}"</li>`).join('')}</ul>`
    : '';
  return `<div class="notice ${kind}"><strong>${escapeHtml(message)}</strong>${list}</div>`;
}

function renderCard(product: ExtractedProduct): string {
  const details = product.details ? `<div class="product-details">${escapeHtml(product.details)}</div>` : '';
  const badge = product.dealInfo ? `<div class="deal-badge">${escapeHtml(product.dealInfo)}</div>` : '';
  const source = product.source ? `<div class="source-tag">${escapeHtml(product.source)}</div>` : '';
  return `<div class="product-card">
  <div class="product-name">${escapeHtml(product.productName)}</div>
  ${details}
  <div class="price-section"><div class="product-price">${escapeHtml(priceLabel(product.price))}</div>${badge}</div>
  <a href="${safeHref(product.url)}" target="_blank" rel="noopener" class="product-link">View Deal</a>
  ${source}
</div>`;
}

/** Result grid plus a price-drop subscribe button for the query. */
export function renderProductCards(products: ExtractedProduct[], query: string): string {
  const header = `<h2>Best Deals Found</h2><p>Found ${products.length} products matching your search</p>`;
  const subscribe = `<button type="button" data-product="${escapeHtml(query)}" onclick="subscribe(this)">Notify me when the price drops</button>`;
  if (products.length === 0) {
    return `${header}<div class="no-results"><h3>No deals found</h3><p>Try refining your search or check back later!</p></div>`;
  }
  return `${header}${subscribe}<div class="deals-container">${products.map(renderCard).join('\n')}</div>`;
}
