import { CONDITION_LABELS, TIER_NAMES } from '../parsing/types.js';
import type { EnrichedRecord } from '../lookup/enrichment.js';
import type { ColorSection, OrganizedReport, TierGroup } from './organizer.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function formatPrice(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

const STYLES = `
  * { box-sizing: border-box; }
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; margin: 0; padding: 20px; background: #1a1a2e; color: #eee; }
  h1 { text-align: center; margin-bottom: 10px; }
  .order-info { text-align: center; color: #aaa; margin-bottom: 20px; }
  .summary { display: flex; justify-content: center; gap: 30px; margin-bottom: 30px; flex-wrap: wrap; }
  .summary-item { background: #16213e; padding: 15px 25px; border-radius: 8px; text-align: center; }
  .summary-item .number { font-size: 2em; font-weight: bold; color: #e94560; }
  .summary-item .label { color: #aaa; font-size: 0.9em; }
  .nav { display: flex; justify-content: center; gap: 10px; flex-wrap: wrap; margin-bottom: 20px; }
  .nav a { color: #eee; background: #16213e; padding: 6px 14px; border-radius: 6px; text-decoration: none; }
  .nav a:hover { background: #e94560; }
  .progress { height: 8px; background: #16213e; border-radius: 4px; margin-bottom: 30px; overflow: hidden; }
  .progress-fill { height: 100%; width: 0; background: #4caf50; transition: width 0.2s; }
  .color-section { margin-bottom: 30px; background: #16213e; border-radius: 12px; overflow: hidden; }
  .color-header { padding: 15px 20px; font-size: 1.4em; font-weight: bold; }
  .tier-section { padding: 10px 20px; }
  .tier-header { font-size: 1.1em; font-weight: 600; padding: 8px 0; border-bottom: 1px solid rgba(255,255,255,0.1); }
  .tier-M { color: #ff8c00; } .tier-R { color: #ffd700; } .tier-U { color: #c0c0c0; } .tier-C { color: #eee; } .tier-S { color: #b388ff; }
  .card-item { display: flex; align-items: center; gap: 12px; padding: 8px; border-radius: 6px; cursor: pointer; }
  .card-item:hover { background: rgba(255,255,255,0.05); }
  .card-item.checked { opacity: 0.4; text-decoration: line-through; }
  .card-qty { font-weight: bold; min-width: 36px; }
  .card-info { flex: 1; }
  .card-details { color: #aaa; font-size: 0.85em; }
  .card-foil { color: #ffd700; }
  .card-language { color: #64b5f6; }
  .card-price { color: #4caf50; }
  #card-preview { position: fixed; display: none; pointer-events: none; z-index: 10; }
  #card-preview img { width: 250px; border-radius: 12px; }
`;

// Checked state survives reloads; hovering an item with an image shows it
const SCRIPT = `
  const items = document.querySelectorAll('.card-item');
  function updateProgress() {
    const checked = document.querySelectorAll('.card-item.checked').length;
    document.getElementById('progress-count').textContent = checked;
    document.getElementById('progress-fill').style.width = (items.length ? checked / items.length * 100 : 0) + '%';
  }
  function toggleCard(element) {
    element.classList.toggle('checked');
    const key = 'card-' + element.dataset.index;
    if (element.classList.contains('checked')) localStorage.setItem(key, 'checked');
    else localStorage.removeItem(key);
    updateProgress();
  }
  items.forEach((item) => {
    if (localStorage.getItem('card-' + item.dataset.index) === 'checked') item.classList.add('checked');
  });
  updateProgress();
  const preview = document.getElementById('card-preview');
  const previewImg = preview.querySelector('img');
  document.querySelectorAll('.card-item[data-image]').forEach((item) => {
    item.addEventListener('mouseenter', () => { previewImg.src = item.dataset.image; preview.style.display = 'block'; });
    item.addEventListener('mousemove', (e) => {
      let x = e.clientX + 20;
      let y = Math.max(10, e.clientY - 100);
      if (x + 260 > window.innerWidth) x = e.clientX - 280;
      if (y + 360 > window.innerHeight) y = window.innerHeight - 360;
      preview.style.left = x + 'px';
      preview.style.top = y + 'px';
    });
    item.addEventListener('mouseleave', () => { preview.style.display = 'none'; });
  });
`;

export function renderCardItem(item: EnrichedRecord, index: number): string {
  const { record } = item;
  const variant = record.variant ? ` (${escapeHtml(record.variant)})` : '';
  const foil = record.isFoil ? '<span class="card-foil"> &#9733; FOIL</span>' : '';
  const language = record.localization
    ? `<span class="card-language"> [${escapeHtml(record.localization)}]</span>`
    : '';
  const image = item.imageUrl ? ` data-image="${escapeHtml(item.imageUrl)}"` : '';
  const number = record.identifier ? ` #${escapeHtml(record.identifier)}` : '';

  return `<div class="card-item" data-index="${index}"${image} onclick="toggleCard(this)">
  <div class="card-qty">${record.quantity}x</div>
  <div class="card-info">
    <div class="card-name">${escapeHtml(record.itemName)}${variant}${foil}${language}</div>
    <div class="card-details">${escapeHtml(record.groupName)}${number} - ${CONDITION_LABELS[record.condition]}</div>
  </div>
  <div class="card-price">${formatPrice(record.totalPrice)}</div>
</div>`;
}

function renderTier(group: TierGroup, startIndex: number): string {
  const items = group.items.map((item, i) => renderCardItem(item, startIndex + i)).join('\n');
  return `<div class="tier-section">
  <div class="tier-header tier-${group.tier}">${TIER_NAMES[group.tier]} (${group.quantity})</div>
  <div class="card-list">
${items}
  </div>
</div>`;
}

function sectionId(section: ColorSection): string {
  return section.classification.toLowerCase();
}

function renderNav(sections: readonly ColorSection[]): string {
  if (sections.length === 0) return '';
  const links = sections.map((section) => `<a href="#${sectionId(section)}">${section.classification} (${section.quantity})</a>`);
  return `<div class="nav">${links.join('')}</div>`;
}

function renderSection(section: ColorSection, startIndex: number): string {
  let index = startIndex;
  const tiers = section.tiers.map((group) => {
    const html = renderTier(group, index);
    index += group.items.length;
    return html;
  });
  return `<div class="color-section" id="${sectionId(section)}">
  <div class="color-header">${section.classification} (${section.quantity} cards)</div>
${tiers.join('\n')}
</div>`;
}

/**
 * Standalone pull checklist for one packing slip. Items are numbered across
 * the whole page so their checked state can be kept in localStorage.
 */
export function renderHtmlReport(report: OrganizedReport, options: { documentId?: string | null } = {}): string {
  let index = 0;
  const sections = report.sections.map((section) => {
    const html = renderSection(section, index);
    index += section.tiers.reduce((sum, group) => sum + group.items.length, 0);
    return html;
  });

  const orderInfo = options.documentId
    ? `<div class="order-info">Order ${escapeHtml(options.documentId)}</div>`
    : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Order - Organized by Color &amp; Rarity</title>
<style>${STYLES}</style>
</head>
<body>
<h1>Order Pull List</h1>
${orderInfo}
<div class="summary">
  <div class="summary-item"><div class="number">${report.totalQuantity}</div><div class="label">Cards</div></div>
  <div class="summary-item"><div class="number">${report.lineCount}</div><div class="label">Lines</div></div>
  <div class="summary-item"><div class="number">${formatPrice(report.totalValue)}</div><div class="label">Total Value</div></div>
  <div class="summary-item"><div class="number"><span id="progress-count">0</span>/${report.lineCount}</div><div class="label">Pulled</div></div>
</div>
${renderNav(report.sections)}
<div class="progress"><div class="progress-fill" id="progress-fill"></div></div>
${sections.join('\n')}
<div id="card-preview"><img alt=""></div>
<script>${SCRIPT}</script>
</body>
</html>
`;
}
