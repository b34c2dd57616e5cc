export type Tier = 'M' | 'R' | 'U' | 'C' | 'S';

export type Condition = 'NM' | 'LP' | 'MP' | 'HP';

export const TIER_NAMES: Record<Tier, string> = {
  M: 'Mythic Rare',
  R: 'Rare',
  U: 'Uncommon',
  C: 'Common',
  S: 'Special',
};

export const CONDITION_LABELS: Record<Condition, string> = {
  NM: 'Near Mint',
  LP: 'Lightly Played',
  MP: 'Moderately Played',
  HP: 'Heavily Played',
};

/** One logical slip entry: its start line with every continuation appended. */
export interface MergedEntry {
  text: string;
  /** Zero-based index of the entry-start line in the page lines. */
  position: number;
}

export interface ExtractedFields {
  quantity: number;
  unitPrice: number;
  totalPrice: number;
  identifier: string | null;
  tier: Tier;
  isFoil: boolean;
  condition: Condition;
  localization: string | null;
  /** Item-name text before normalization, variant already lifted out. */
  nameSpan: string;
  variantRaw: string | null;
}

export interface SlipRecord {
  readonly quantity: number;
  readonly groupName: string;
  readonly itemName: string;
  readonly variant: string | null;
  readonly identifier: string | null;
  readonly tier: Tier;
  readonly condition: Condition;
  readonly isFoil: boolean;
  readonly localization: string | null;
  readonly unitPrice: number;
  readonly totalPrice: number;
  readonly position: number;
}

export interface UnparsedLine {
  text: string;
  position: number;
  reason: 'malformed_entry';
}
