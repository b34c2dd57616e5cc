import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

export const DEFAULT_PREFIX_TABLE_PATH = fileURLToPath(
  new URL('../../../data/known-groups.json', import.meta.url),
);

const prefixListSchema = z.array(z.string().min(1));

/**
 * Catalog-group names as they appear in slip text (spaces stripped, colons and
 * hyphens kept). Several contain hyphens of their own, so they must be tried
 * before any hyphen-based split. Read-only once built; safe to share across
 * concurrent parses.
 */
export class PrefixTable {
  private readonly prefixes: readonly string[];

  constructor(prefixes: Iterable<string>) {
    const unique = [...new Set(prefixes)];
    // Array#sort is stable, so equal-length prefixes keep their input order
    this.prefixes = Object.freeze(unique.sort((a, b) => b.length - a.length));
  }

  get size(): number {
    return this.prefixes.length;
  }

  /** Longest-first; a prefix only matches when a hyphen follows it. */
  match(text: string): string | null {
    for (const prefix of this.prefixes) {
      if (text.startsWith(`${prefix}-`)) return prefix;
    }
    return null;
  }

  entries(): readonly string[] {
    return this.prefixes;
  }
}

export function loadPrefixTable(path: string = DEFAULT_PREFIX_TABLE_PATH): PrefixTable {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return new PrefixTable(prefixListSchema.parse(raw));
}
