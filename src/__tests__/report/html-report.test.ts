import { describe, expect, it } from 'vitest';
import type { EnrichedRecord } from '../../services/lookup/enrichment.js';
import type { SlipRecord } from '../../services/parsing/types.js';
import { escapeHtml, formatPrice, renderCardItem, renderHtmlReport } from '../../services/report/html-report.js';
import { organizeRecords } from '../../services/report/organizer.js';

function item(overrides: Partial<SlipRecord> = {}, imageUrl: string | null = null): EnrichedRecord {
  return {
    classification: 'Green',
    imageUrl,
    record: {
      quantity: 2,
      groupName: 'Foundations',
      itemName: 'Llanowar Elves',
      variant: null,
      identifier: '123',
      tier: 'C',
      condition: 'NM',
      isFoil: false,
      localization: null,
      unitPrice: 0.25,
      totalPrice: 0.5,
      position: 0,
      ...overrides,
    },
  };
}

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;',
    );
  });
});

describe('formatPrice', () => {
  it('uses two decimals', () => {
    expect(formatPrice(2)).toBe('$2.00');
    expect(formatPrice(0.5)).toBe('$0.50');
  });
});

describe('renderCardItem', () => {
  it('renders quantity, name, details and price', () => {
    const html = renderCardItem(item(), 4);
    expect(html).toContain('<div class="card-item" data-index="4" onclick="toggleCard(this)">');
    expect(html).toContain('<div class="card-qty">2x</div>');
    expect(html).toContain('<div class="card-name">Llanowar Elves</div>');
    expect(html).toContain('<div class="card-details">Foundations #123 - Near Mint</div>');
    expect(html).toContain('<div class="card-price">$0.50</div>');
  });

  it('adds variant, foil and language badges', () => {
    const html = renderCardItem(item({ variant: 'Borderless', isFoil: true, localization: 'Japanese' }), 0);
    expect(html).toContain(
      '<div class="card-name">Llanowar Elves (Borderless)<span class="card-foil"> &#9733; FOIL</span><span class="card-language"> [Japanese]</span></div>',
    );
  });

  it('carries the image for the hover preview', () => {
    const html = renderCardItem(item({}, 'https://img.test/elves.jpg'), 1);
    expect(html).toContain('data-index="1" data-image="https://img.test/elves.jpg"');
  });

  it('omits the number when there is no identifier', () => {
    const html = renderCardItem(item({ identifier: null, condition: 'LP' }), 0);
    expect(html).toContain('<div class="card-details">Foundations - Lightly Played</div>');
  });

  it('escapes slip text', () => {
    const html = renderCardItem(item({ itemName: 'Fire & Ice' }), 0);
    expect(html).toContain('<div class="card-name">Fire &amp; Ice</div>');
  });
});

describe('renderHtmlReport', () => {
  const report = organizeRecords([
    item({ tier: 'R', itemName: 'B' }),
    item({ tier: 'C', itemName: 'A' }),
    { ...item({ itemName: 'Forest' }), classification: 'Land' },
  ]);

  it('renders the summary', () => {
    const html = renderHtmlReport(report);
    expect(html).toContain('<div class="number">6</div><div class="label">Cards</div>');
    expect(html).toContain('<div class="number">3</div><div class="label">Lines</div>');
    expect(html).toContain('<div class="number">$1.50</div><div class="label">Total Value</div>');
    expect(html).toContain('<span id="progress-count">0</span>/3');
  });

  it('renders sections and tiers with headers', () => {
    const html = renderHtmlReport(report);
    expect(html).toContain('<div class="color-section" id="green">');
    expect(html).toContain('<div class="color-header">Green (4 cards)</div>');
    expect(html).toContain('<div class="tier-header tier-R">Rare (2)</div>');
    expect(html).toContain('<div class="tier-header tier-C">Common (2)</div>');
    expect(html).toContain('<div class="color-header">Land (2 cards)</div>');
  });

  it('links every section from the navigation bar', () => {
    const html = renderHtmlReport(report);
    expect(html).toContain('<div class="nav"><a href="#green">Green (4)</a><a href="#land">Land (2)</a></div>');
  });

  it('leaves the navigation bar out of an empty report', () => {
    expect(renderHtmlReport(organizeRecords([]))).not.toContain('<div class="nav">');
  });

  it('numbers items across the whole page', () => {
    const html = renderHtmlReport(report);
    const indexes = [...html.matchAll(/data-index="(\d+)"/g)].map((m) => m[1]);
    expect(indexes).toEqual(['0', '1', '2']);
  });

  it('shows the order number when given', () => {
    expect(renderHtmlReport(report, { documentId: 'ABC-123' })).toContain('<div class="order-info">Order ABC-123</div>');
    expect(renderHtmlReport(report)).not.toContain('class="order-info"');
  });
});
