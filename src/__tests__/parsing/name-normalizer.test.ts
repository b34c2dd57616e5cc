import { describe, expect, it } from 'vitest';
import {
  camelCaseBoundaries,
  collapseWhitespace,
  gluedArticles,
  gluedPrepositions,
  groupFixups,
  normalizeGroupName,
  normalizeName,
  punctuationSpacing,
} from '../../services/parsing/name-normalizer.js';

describe('name rules', () => {
  describe('camelCaseBoundaries', () => {
    it('splits lower-to-upper boundaries', () => {
      expect(camelCaseBoundaries.apply('LlanowarElves')).toBe('Llanowar Elves');
    });

    it('leaves hyphenated words joined', () => {
      expect(camelCaseBoundaries.apply('First-Year')).toBe('First-Year');
      expect(camelCaseBoundaries.apply("Marvel'sSpider-Man")).toBe("Marvel's Spider-Man");
    });

    it('does not split after a single letter following a hyphen', () => {
      expect(camelCaseBoundaries.apply('X-oBar')).toBe('X-oBar');
    });

    it('ignores all-caps runs', () => {
      expect(camelCaseBoundaries.apply('FINALFANTASY')).toBe('FINALFANTASY');
    });
  });

  describe('punctuationSpacing', () => {
    it('adds a space after commas and before letters after colons', () => {
      expect(punctuationSpacing.apply('Abigale,Eloquent')).toBe('Abigale, Eloquent');
      expect(punctuationSpacing.apply('Commander:Edge')).toBe('Commander: Edge');
    });

    it('leaves numeric ratios and existing spaces alone', () => {
      expect(punctuationSpacing.apply('1:1')).toBe('1:1');
      expect(punctuationSpacing.apply('a, b')).toBe('a, b');
    });

    it('spaces every comma in a run', () => {
      expect(punctuationSpacing.apply('a,,b')).toBe('a, , b');
    });
  });

  describe('gluedPrepositions', () => {
    it('separates a glued "of" after a known ending', () => {
      expect(gluedPrepositions.apply('Championof the Flame')).toBe('Champion of the Flame');
    });

    it('separates a glued "of" after a plural', () => {
      expect(gluedPrepositions.apply('Visionsof Doom')).toBe('Visions of Doom');
    });

    it('separates a glued "to"', () => {
      expect(gluedPrepositions.apply('Turnto Stone')).toBe('Turn to Stone');
    });

    it('keeps the case of the matched letters', () => {
      expect(gluedPrepositions.apply('VISIONOFX')).toBe('VISION OFX');
      expect(gluedPrepositions.apply('CHAMPIONSOFX')).toBe('CHAMPIONS OFX');
      expect(gluedPrepositions.apply('BACKTOX')).toBe('BACK TOX');
    });
  });

  describe('gluedArticles', () => {
    it('separates "the" from a preceding preposition', () => {
      expect(gluedArticles.apply('Son ofthe Forest')).toBe('Son of the Forest');
    });

    it('separates "the" from a following capital', () => {
      expect(gluedArticles.apply('Call of thePerished')).toBe('Call of the Perished');
    });

    it('keeps the case of the phrase', () => {
      expect(gluedArticles.apply('Lost INTHE Dark')).toBe('Lost IN THE Dark');
    });
  });

  it('collapseWhitespace trims and squeezes', () => {
    expect(collapseWhitespace.apply('  Sol   Ring ')).toBe('Sol Ring');
  });

  it('groupFixups repairs names the generic rules miss', () => {
    expect(groupFixups.apply('FINALFANTASY')).toBe('FINAL FANTASY');
    expect(groupFixups.apply('Tarkir:Dragonstorm')).toBe('Tarkir: Dragonstorm');
  });
});

describe('normalizeName', () => {
  it('restores spacing in a comma-joined name', () => {
    expect(normalizeName('Abigale,EloquentFirst-Year')).toBe('Abigale, Eloquent First-Year');
  });

  it('runs the rules in order', () => {
    expect(normalizeName('ChampionoftheFlame')).toBe('Champion of the Flame');
  });

  it('returns empty input unchanged', () => {
    expect(normalizeName('')).toBe('');
  });

  it.each(['Abigale, Eloquent First-Year', 'Champion of the Flame', "Marvel's Spider-Man", 'Llanowar Elves'])(
    'leaves the already spaced %s unchanged',
    (name) => {
      expect(normalizeName(name)).toBe(name);
      expect(normalizeName(normalizeName(name))).toBe(name);
    },
  );

  it.each([
    'Abigale,EloquentFirst-Year',
    'ChampionoftheFlame',
    'LlanowarElves',
    'Visionsof Doom',
    'Son ofthe Forest',
    'VISIONOFX',
    'BACKTOX',
    'CHAMPIONSOFX',
    'a,,b',
    'Lost INTHE Dark',
    'visionofX',
  ])(
    'is idempotent on the glued %s',
    (raw) => {
      const once = normalizeName(raw);
      expect(normalizeName(once)).toBe(once);
    },
  );
});

describe('normalizeGroupName', () => {
  it.each([
    ['Foundations', 'Foundations'],
    ['FINALFANTASY', 'FINAL FANTASY'],
    ['Commander:Tarkir:Dragonstorm', 'Commander: Tarkir: Dragonstorm'],
    ['Avatar:TheLastAirbender', 'Avatar: The Last Airbender'],
    ['Phyrexia:AllWillBeOne', 'Phyrexia: All Will Be One'],
    ["Marvel'sSpider-Man", "Marvel's Spider-Man"],
  ])('normalizes %s', (raw, expected) => {
    expect(normalizeGroupName(raw)).toBe(expected);
  });

  it('returns empty input unchanged', () => {
    expect(normalizeGroupName('')).toBe('');
  });
});
