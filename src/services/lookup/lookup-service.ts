import pino from 'pino';
import { config } from '../../config/index.js';
import { getErrorMessage } from '../../utils/errors.js';
import { cardImageUrl, classifyCard } from './classification.js';
import type { ColorClass } from './classification.js';
import type { CardSource, LookupCard } from './client.js';
import { GroupCodeIndex } from './group-code-index.js';

const logger = pino({ name: 'lookup-service', level: config.LOG_LEVEL });

export interface LookupMatch {
  classification: ColorClass;
  imageUrl: string | null;
  officialName: string;
}

/** The enrichment capability: one call per record, null on a miss. */
export interface CardLookup {
  lookup(itemName: string, groupName: string, identifier: string | null): Promise<LookupMatch | null>;
}

// Treatment fragments left dangling when a variant's closing parenthesis
// wrapped off the entry
const DANGLING_VARIANTS = [
  'Extended',
  'Borderless',
  'Showcase',
  'Retro Frame',
  'Foil Etched',
  'White Border',
  'Future Sight',
];

/** Name to search by: the item name without wrap artifacts. */
export function searchName(itemName: string): string {
  let name = itemName.trim();
  for (const fragment of DANGLING_VARIANTS) {
    const suffix = `(${fragment}`;
    if (name.endsWith(suffix)) name = name.slice(0, -suffix.length).trim();
  }
  return name.replace(/\s+/g, ' ');
}

function toMatch(card: LookupCard): LookupMatch {
  return {
    classification: classifyCard(card),
    imageUrl: cardImageUrl(card),
    officialName: card.name,
  };
}

/**
 * Finds the exact printing by set code and collector number when the group
 * resolves to a code, then falls back to name search: fuzzy, exact, and
 * fuzzy on the part before the first comma.
 */
export class CardLookupService implements CardLookup {
  constructor(
    private readonly client: CardSource,
    private readonly groups: GroupCodeIndex,
  ) {}

  /** Build the service with a group index from the live set list; an empty index when that fails. */
  static async create(client: CardSource): Promise<CardLookupService> {
    try {
      const sets = await client.fetchSets();
      const groups = GroupCodeIndex.fromSets(sets);
      logger.info({ sets: sets.length, names: groups.size }, 'Loaded set list');
      return new CardLookupService(client, groups);
    } catch (error) {
      logger.warn({ error: getErrorMessage(error) }, 'Could not load set list, using name search only');
      return new CardLookupService(client, GroupCodeIndex.empty());
    }
  }

  async lookup(itemName: string, groupName: string, identifier: string | null): Promise<LookupMatch | null> {
    const card = await this.findCard(searchName(itemName), groupName, identifier);
    return card ? toMatch(card) : null;
  }

  private async findCard(name: string, groupName: string, identifier: string | null): Promise<LookupCard | null> {
    if (identifier) {
      const setCode = this.groups.resolve(groupName);
      if (setCode) {
        const printing = await this.attempt('printing', name, () => this.client.getCardByNumber(setCode, identifier));
        if (printing) return printing;
      }
    }

    if (!name) return null;

    const fuzzy = await this.client.getCardByName(name, 'fuzzy');
    if (fuzzy) return fuzzy;

    const exact = await this.attempt('exact', name, () => this.client.getCardByName(name, 'exact'));
    if (exact) return exact;

    const simple = name.split(',')[0]?.trim() ?? '';
    if (simple && simple !== name) {
      return this.client.getCardByName(simple, 'fuzzy');
    }
    return null;
  }

  // A failed step only moves the search on to the next one
  private async attempt(
    step: string,
    name: string,
    search: () => Promise<LookupCard | null>,
  ): Promise<LookupCard | null> {
    try {
      return await search();
    } catch (error) {
      logger.warn({ step, name, error: getErrorMessage(error) }, 'Lookup step failed, trying the next one');
      return null;
    }
  }
}
