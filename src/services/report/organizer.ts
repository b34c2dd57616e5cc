import type { ColorClass } from '../lookup/classification.js';
import type { EnrichedRecord } from '../lookup/enrichment.js';
import type { Tier } from '../parsing/types.js';

// WUBRG, then multicolour, colourless, lands, and whatever was not looked up
export const COLOR_ORDER: readonly ColorClass[] = [
  'White',
  'Blue',
  'Black',
  'Red',
  'Green',
  'Multicolor',
  'Colorless',
  'Land',
  'Uncategorized',
];

export const TIER_ORDER: readonly Tier[] = ['M', 'R', 'U', 'C', 'S'];

export interface TierGroup {
  tier: Tier;
  quantity: number;
  items: EnrichedRecord[];
}

export interface ColorSection {
  classification: ColorClass;
  quantity: number;
  tiers: TierGroup[];
}

export interface OrganizedReport {
  sections: ColorSection[];
  /** Number of slip lines (records). */
  lineCount: number;
  /** Sum of quantities. */
  totalQuantity: number;
  /** Sum of line totals. */
  totalValue: number;
}

function sumQuantity(items: readonly EnrichedRecord[]): number {
  return items.reduce((sum, item) => sum + item.record.quantity, 0);
}

// Special printings first (they are pulled from a different binder), then by name
function compareForPulling(a: EnrichedRecord, b: EnrichedRecord): number {
  const aVariant = a.record.variant ? 0 : 1;
  const bVariant = b.record.variant ? 0 : 1;
  if (aVariant !== bVariant) return aVariant - bVariant;
  if (a.record.itemName < b.record.itemName) return -1;
  if (a.record.itemName > b.record.itemName) return 1;
  return 0;
}

/**
 * File records by colour, then tier, in pulling order. Empty colours and
 * tiers are left out.
 */
export function organizeRecords(items: readonly EnrichedRecord[]): OrganizedReport {
  const sections: ColorSection[] = [];

  for (const classification of COLOR_ORDER) {
    const inColor = items.filter((item) => item.classification === classification);
    if (inColor.length === 0) continue;

    const tiers: TierGroup[] = [];
    for (const tier of TIER_ORDER) {
      const inTier = inColor.filter((item) => item.record.tier === tier).sort(compareForPulling);
      if (inTier.length === 0) continue;
      tiers.push({ tier, quantity: sumQuantity(inTier), items: inTier });
    }

    sections.push({ classification, quantity: sumQuantity(inColor), tiers });
  }

  return {
    sections,
    lineCount: items.length,
    totalQuantity: sumQuantity(items),
    totalValue: items.reduce((sum, item) => sum + item.record.totalPrice, 0),
  };
}
