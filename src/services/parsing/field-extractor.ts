import type { Condition, ExtractedFields, Tier } from './types.js';

const QUANTITY_REGEX = /^(\d+)/;

const PRICE_REGEX = /\$(\d+\.?\d*)/g;

const IDENTIFIER_REGEX = /#(\d+)/;

// Tier letter, most reliable position first. The last one runs on the full
// merged line: a wrapped entry can end up as "...$1.70M-NearMint".
const TIER_BETWEEN_HYPHENS = /-([MRUCS])-/;
const TIER_BEFORE_KEYWORD = /-([MRUCS])(?:$|-?Near|-?Lightly|-?Moderately|-?Heavily|-?Foil)/;
const TIER_AFTER_PRICE = /\$\d+\.?\d*([MRUCS])-/;

const DEFAULT_TIER: Tier = 'R';

const FOIL_KEYWORD = 'Foil';

const CONDITION_PATTERNS: [RegExp, Condition][] = [
  [/Lightly ?Played/, 'LP'],
  [/Moderately ?Played/, 'MP'],
  [/Heavily ?Played/, 'HP'],
];

const DEFAULT_CONDITION: Condition = 'NM';

function bounded(keyword: string): RegExp {
  // Hyphen, whitespace or string edge on both sides, so "Frenchman" or a
  // language name buried in a card name does not count
  return new RegExp(`(?:^|[-\\s])${keyword}(?:[-\\s]|$)`);
}

// Order matters: first match wins
const LOCALIZATION_PATTERNS: [RegExp, string][] = [
  [bounded('Japanese'), 'Japanese'],
  [bounded('German'), 'German'],
  [bounded('French'), 'French'],
  [bounded('Italian'), 'Italian'],
  [bounded('Spanish'), 'Spanish'],
  [bounded('Portuguese'), 'Portuguese'],
  [bounded('Russian'), 'Russian'],
  [bounded('Korean'), 'Korean'],
  [/ChineseSimplified|SimplifiedChinese/, 'Chinese (Simplified)'],
  [/ChineseTraditional|TraditionalChinese/, 'Chinese (Traditional)'],
  [bounded('Phyrexian'), 'Phyrexian'],
];

const VARIANT_REGEX = /\(([^)]+)\)/;

export function extractQuantity(line: string): number {
  const match = QUANTITY_REGEX.exec(line);
  return match?.[1] ? parseInt(match[1], 10) : 0;
}

/**
 * Unit price and line total are the last two dollar amounts on the merged
 * line, wherever wrapping put them.
 */
export function extractPrices(line: string): { unitPrice: number; totalPrice: number } {
  const amounts = [...line.matchAll(PRICE_REGEX)].map((m) => parseFloat(m[1] ?? '0'));
  if (amounts.length < 2) return { unitPrice: 0, totalPrice: 0 };
  return {
    unitPrice: amounts[amounts.length - 2] ?? 0,
    totalPrice: amounts[amounts.length - 1] ?? 0,
  };
}

export function extractIdentifier(remainder: string): string | null {
  return IDENTIFIER_REGEX.exec(remainder)?.[1] ?? null;
}

export interface TierMatch {
  tier: Tier;
  /** Index of the match in the remainder; null when found on the full line. */
  remainderIndex: number | null;
}

function isTier(value: string | undefined): value is Tier {
  return value === 'M' || value === 'R' || value === 'U' || value === 'C' || value === 'S';
}

export function extractTier(line: string, remainder: string): TierMatch | null {
  for (const pattern of [TIER_BETWEEN_HYPHENS, TIER_BEFORE_KEYWORD]) {
    const match = pattern.exec(remainder);
    if (match && isTier(match[1])) {
      return { tier: match[1], remainderIndex: match.index };
    }
  }

  const displaced = TIER_AFTER_PRICE.exec(line);
  if (displaced && isTier(displaced[1])) {
    return { tier: displaced[1], remainderIndex: null };
  }

  return null;
}

export function extractCondition(line: string): Condition {
  for (const [pattern, condition] of CONDITION_PATTERNS) {
    if (pattern.test(line)) return condition;
  }
  return DEFAULT_CONDITION;
}

export function extractLocalization(line: string): string | null {
  for (const [pattern, language] of LOCALIZATION_PATTERNS) {
    if (pattern.test(line)) return language;
  }
  return null;
}

function trimTrailingHyphens(text: string): string {
  return text.replace(/-+$/, '');
}

/**
 * Text naming the item: everything before the identifier, else before the
 * tier letter, else the first hyphen-delimited token.
 */
export function extractNameSpan(
  remainder: string,
  identifier: string | null,
  tier: TierMatch | null,
): string {
  if (identifier !== null) {
    return trimTrailingHyphens(remainder.slice(0, remainder.indexOf(`#${identifier}`)));
  }
  if (tier && tier.remainderIndex !== null) {
    return trimTrailingHyphens(remainder.slice(0, tier.remainderIndex));
  }
  return remainder.split('-')[0] ?? '';
}

/** Lift a parenthesised treatment ("(Borderless)", "(ExtendedArt)") out of the name span. */
export function splitVariant(nameSpan: string): { name: string; variantRaw: string | null } {
  const match = VARIANT_REGEX.exec(nameSpan);
  if (!match?.[1]) return { name: nameSpan, variantRaw: null };
  return { name: nameSpan.slice(0, match.index).trim(), variantRaw: match[1] };
}

/**
 * Pull the fields out of one entry.
 *
 * `line` is the whole merged entry (quantity, prices, foil, condition and
 * language can sit anywhere in it after wrapping); `remainder` is the part the
 * group splitter left after the catalog group, which carries the name,
 * identifier and tier in order.
 */
export function extractFields(line: string, remainder: string): ExtractedFields {
  const { unitPrice, totalPrice } = extractPrices(line);
  const identifier = extractIdentifier(remainder);
  const tier = extractTier(line, remainder);
  const { name, variantRaw } = splitVariant(extractNameSpan(remainder, identifier, tier));

  return {
    quantity: extractQuantity(line),
    unitPrice,
    totalPrice,
    identifier,
    tier: tier?.tier ?? DEFAULT_TIER,
    isFoil: line.includes(FOIL_KEYWORD),
    condition: extractCondition(line),
    localization: extractLocalization(line),
    nameSpan: name,
    variantRaw,
  };
}
