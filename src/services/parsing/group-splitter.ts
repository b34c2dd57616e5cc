import type { PrefixTable } from './prefix-table.js';

export type SplitStrategy = 'known_prefix' | 'anchor' | 'first_hyphen' | 'unknown';

export interface SplitResult {
  groupRaw: string;
  remainder: string;
  strategy: SplitStrategy;
}

export const UNKNOWN_GROUP = 'Unknown';

// Capitalised hyphen parts that still belong to a group name
// ("Commander-Legends", "Eternal-Legal", "...-Remastered", "Promo-...").
// Incomplete by construction: a new naming convention will defeat it.
const GROUP_CONTINUATION_WORDS = ['Commander', 'Eternal', 'Legal', 'Remastered', 'Promo'];

const IDENTIFIER_ANCHOR_REGEX = /-#\d+/;

function startsUppercase(part: string): boolean {
  const first = part.charAt(0);
  return first !== '' && first !== first.toLowerCase();
}

function splitAtAnchor(description: string): SplitResult | null {
  const anchor = IDENTIFIER_ANCHOR_REGEX.exec(description);
  if (!anchor) return null;

  const parts = description.slice(0, anchor.index).split('-');
  if (parts.length < 2) return null;

  const groupParts: string[] = [];
  const nameParts: string[] = [];

  parts.forEach((part, index) => {
    if (nameParts.length > 0) {
      nameParts.push(part);
      return;
    }
    const startsName =
      index > 0 &&
      startsUppercase(part) &&
      !GROUP_CONTINUATION_WORDS.some((word) => part.startsWith(word));
    if (startsName) nameParts.push(part);
    else groupParts.push(part);
  });

  if (groupParts.length === 0 || nameParts.length === 0) return null;

  return {
    groupRaw: groupParts.join('-'),
    remainder: nameParts.join('-') + description.slice(anchor.index),
    strategy: 'anchor',
  };
}

/**
 * Separate the catalog group from the rest of an entry description
 * (`<Group>-<Name>(<Variant>)-#<Number>-<Tier>-<Condition>...`).
 *
 * Group names carry their own hyphens and colons, so this is a priority-ordered
 * chain of heuristics rather than a grammar: known prefix, identifier anchor,
 * first hyphen, then the "Unknown" group. It never fails.
 */
export function splitGroup(description: string, table: PrefixTable): SplitResult {
  const prefix = table.match(description);
  if (prefix !== null) {
    return {
      groupRaw: prefix,
      remainder: description.slice(prefix.length + 1),
      strategy: 'known_prefix',
    };
  }

  const anchored = splitAtAnchor(description);
  if (anchored) return anchored;

  const firstHyphen = description.indexOf('-');
  if (firstHyphen > 0) {
    return {
      groupRaw: description.slice(0, firstHyphen),
      remainder: description.slice(firstHyphen + 1),
      strategy: 'first_hyphen',
    };
  }

  return { groupRaw: UNKNOWN_GROUP, remainder: description, strategy: 'unknown' };
}
