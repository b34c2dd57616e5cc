/**
 * Restores word spacing in names that came out of the slip text glued
 * together ("Abigale,EloquentFirst-Year" -> "Abigale, Eloquent First-Year").
 *
 * Rules run in order; each assumes the spacing added by the ones before it.
 * Pure, and idempotent on text that is already spaced.
 */

export interface NormalizationRule {
  name: string;
  apply: (text: string) => string;
}

function isLower(ch: string): boolean {
  return ch !== ch.toUpperCase() && ch === ch.toLowerCase();
}

function isUpper(ch: string): boolean {
  return ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

/**
 * Space at every lower→upper boundary, except right after an apostrophe and
 * when the capital opens the second half of a hyphenated word ("Spider-Man").
 */
export const camelCaseBoundaries: NormalizationRule = {
  name: 'camel-case-boundaries',
  apply: (text) => {
    let result = '';
    for (let i = 0; i < text.length; i++) {
      const ch = text.charAt(i);
      if (i > 0) {
        const prev = text.charAt(i - 1);
        if (isLower(prev) && isUpper(ch) && prev !== "'" && (i < 2 || text.charAt(i - 2) !== '-')) {
          result += ' ';
        }
      }
      result += ch;
    }
    return result;
  },
};

/** "a,b" -> "a, b"; "Commander:Edge" -> "Commander: Edge" (digit ratios like 1:1 untouched). */
export const punctuationSpacing: NormalizationRule = {
  name: 'punctuation-spacing',
  apply: (text) => text.replace(/,(?=\S)/g, ', ').replace(/:(?=[A-Za-z])/g, ': '),
};

// Word endings seen glued to a following "of" ("Championof", "Visionof")
const OF_ENDINGS = [
  'ion', 'ter', 'ler', 'ant', 'ent', 'int', 'ard', 'ack', 'ock', 'uck',
  'ime', 'ame', 'ome', 'ple', 'tle', 'nce', 'ise', 'ose', 'use', 'ine',
  'one', 'ure', 'ire', 'are', 'ore', 'ide', 'ade', 'ude', 'ive', 'ave',
  'ove', 'all', 'ell', 'ill', 'ull', 'ath', 'eth', 'ith', 'oth', 'uth',
  'lic', 'ric', 'sic', 'tic', 'nic', 'pic',
];

const TO_ENDINGS = ['ack', 'ome', 'urn'];

// Matching ignores case; the matched letters are written back unchanged
const GLUED_OF_REGEX = new RegExp(`(${OF_ENDINGS.join('|')})(of)`, 'gi');
const GLUED_PLURAL_OF_REGEX = /([^o])(s)(of)/gi;
const GLUED_TO_REGEX = new RegExp(`(${TO_ENDINGS.join('|')})(to)`, 'gi');

export const gluedPrepositions: NormalizationRule = {
  name: 'glued-prepositions',
  apply: (text) =>
    text
      .replace(GLUED_OF_REGEX, '$1 $2')
      .replace(GLUED_PLURAL_OF_REGEX, '$1$2 $3')
      .replace(GLUED_TO_REGEX, '$1 $2'),
};

const THE_PHRASES = ['of', 'to', 'at', 'in', 'for', 'from', 'on', 'and'];

const THE_PHRASE_REGEXES: RegExp[] = THE_PHRASES.map((word) => new RegExp(`\\b(${word}) ?(the)\\b`, 'gi'));

export const gluedArticles: NormalizationRule = {
  name: 'glued-articles',
  apply: (text) => {
    let result = text;
    for (const pattern of THE_PHRASE_REGEXES) {
      result = result.replace(pattern, '$1 $2');
    }
    // "thePerished" -> "the Perished"
    return result.replace(/\bthe([A-Z])/g, 'the $1');
  },
};

export const collapseWhitespace: NormalizationRule = {
  name: 'collapse-whitespace',
  apply: (text) => text.replace(/\s+/g, ' ').trim(),
};

export const NAME_RULES: readonly NormalizationRule[] = [
  camelCaseBoundaries,
  punctuationSpacing,
  gluedPrepositions,
  gluedArticles,
  collapseWhitespace,
];

// Group names the generic rules get wrong, applied after them
const GROUP_FIXUPS: [RegExp, string][] = [
  [/FINALFANTASY/g, 'FINAL FANTASY'],
  [/Phyrexia:All Will Be One/g, 'Phyrexia: All Will Be One'],
  [/Avatar:The Last Airbender/g, 'Avatar: The Last Airbender'],
  [/Tarkir:Dragonstorm/g, 'Tarkir: Dragonstorm'],
  [/Commander:/g, 'Commander: '],
  [/Promo Pack:/g, 'Promo Pack: '],
  [/From the Vault:/g, 'From the Vault: '],
];

export const groupFixups: NormalizationRule = {
  name: 'group-fixups',
  apply: (text) => {
    let result = text;
    for (const [pattern, replacement] of GROUP_FIXUPS) {
      result = result.replace(pattern, replacement);
    }
    return result;
  },
};

export const GROUP_RULES: readonly NormalizationRule[] = [...NAME_RULES, groupFixups, collapseWhitespace];

export function applyRules(text: string, rules: readonly NormalizationRule[]): string {
  return rules.reduce((current, rule) => rule.apply(current), text);
}

export function normalizeName(text: string): string {
  if (!text) return text;
  return applyRules(text, NAME_RULES);
}

export function normalizeGroupName(text: string): string {
  if (!text) return text;
  return applyRules(text, GROUP_RULES);
}
