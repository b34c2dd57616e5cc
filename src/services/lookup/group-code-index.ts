import type { LookupSet } from './client.js';

// Set types whose collector numbers differ from the main set
const SKIPPED_SET_TYPES = new Set(['token', 'memorabilia', 'promo', 'alchemy']);

// Marketplace spellings the card database names differently
const MANUAL_OVERRIDES: Record<string, string> = {
  SecretLairDropSeries: 'sld',
  'Secret Lair Drop Series': 'sld',
  SecretLairCountdownKit: 'slc',
  'Secret Lair Countdown Kit': 'slc',
  'Avatar:TheLastAirbender:Eternal-Legal': 'tle',
  'Avatar: The Last Airbender: Eternal-Legal': 'tle',
  'MarvelUniverseEternal-Legal': 'mar',
  'Marvel Universe Eternal-Legal': 'mar',
  TheListReprints: 'plst',
  'The List Reprints': 'plst',
  'TimeSpiral:Remastered': 'tsr',
  'Time Spiral: Remastered': 'tsr',
};

/**
 * Maps catalog-group names, in any of the spellings a slip produces, to the
 * card database's set codes. Built once per run from the set list and passed
 * to the lookup service.
 */
export class GroupCodeIndex {
  private constructor(private readonly codes: ReadonlyMap<string, string>) {}

  static empty(): GroupCodeIndex {
    return new GroupCodeIndex(new Map());
  }

  static fromSets(sets: readonly LookupSet[]): GroupCodeIndex {
    const codes = new Map<string, string>();

    for (const set of sets) {
      if (!set.code || !set.name) continue;
      if (set.set_type && SKIPPED_SET_TYPES.has(set.set_type)) continue;

      codes.set(set.name, set.code);
      codes.set(set.name.replace(/ /g, ''), set.code);
      codes.set(set.name.replace(/: /g, ':'), set.code);

      const bare = set.name.replace(/ /g, '').replace(/:/g, '');
      if (!codes.has(bare)) codes.set(bare, set.code);
    }

    for (const [name, code] of Object.entries(MANUAL_OVERRIDES)) {
      codes.set(name, code);
    }

    return new GroupCodeIndex(codes);
  }

  get size(): number {
    return this.codes.size;
  }

  resolve(groupName: string): string | null {
    const exact = this.codes.get(groupName);
    if (exact) return exact;

    const noSpaces = this.codes.get(groupName.replace(/ /g, ''));
    if (noSpaces) return noSpaces;

    const lower = groupName.toLowerCase();
    for (const [name, code] of this.codes) {
      if (name.toLowerCase() === lower) return code;
    }
    return null;
  }
}
