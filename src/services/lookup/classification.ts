import type { LookupCard } from './client.js';

export type ColorClass =
  | 'White'
  | 'Blue'
  | 'Black'
  | 'Red'
  | 'Green'
  | 'Multicolor'
  | 'Colorless'
  | 'Land'
  | 'Uncategorized';

/** Used when a record was never looked up or the lookup found nothing. */
export const DEFAULT_CLASSIFICATION: ColorClass = 'Uncategorized';

const COLOR_NAMES: Record<string, ColorClass> = {
  W: 'White',
  U: 'Blue',
  B: 'Black',
  R: 'Red',
  G: 'Green',
};

/**
 * Colour bucket a card is filed under. Double-faced cards go by their front
 * face, since that is the side seen when pulling from a collection.
 */
export function classifyCard(card: LookupCard): ColorClass {
  const front = card.card_faces?.[0];
  const typeLine = (front ? front.type_line : card.type_line) ?? '';
  const colors = (front ? front.colors : card.colors) ?? [];

  if (typeLine.includes('Land') && !typeLine.includes('Creature')) return 'Land';

  if (colors.length === 0) return 'Colorless';
  if (colors.length > 1) return 'Multicolor';
  return COLOR_NAMES[colors[0] ?? ''] ?? 'Colorless';
}

export function cardImageUrl(card: LookupCard): string | null {
  if (card.image_uris) return card.image_uris.normal ?? null;
  return card.card_faces?.[0]?.image_uris?.normal ?? null;
}
