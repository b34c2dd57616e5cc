import { describe, expect, it, vi } from 'vitest';

vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { assembleRecord, assembleRecords, entryDescription } from '../../services/parsing/record-assembler.js';
import { PrefixTable, loadPrefixTable } from '../../services/parsing/prefix-table.js';

const table = loadPrefixTable();

describe('entryDescription', () => {
  it('drops the quantity, marker and prices', () => {
    expect(entryDescription('4 Magic-Foundations-SomeName-#123-R-NearMint $0.50 $2.00')).toBe(
      'Foundations-SomeName-#123-R-NearMint',
    );
  });

  it('keeps text pushed past the prices', () => {
    expect(entryDescription('1 Magic-Foundations-Card-#5-M $1.00 $1.00Foil')).toBe('Foundations-Card-#5-M  Foil');
  });

  it('rejects text without the entry-start shape', () => {
    expect(entryDescription('Magic-Foundations-Card')).toBeNull();
    expect(entryDescription('4 Magic-Quantity Description')).toBeNull();
  });

  it('rejects an empty description', () => {
    expect(entryDescription('3 Magic-')).toBeNull();
    expect(entryDescription('3 Magic- $1.00')).toBeNull();
  });
});

describe('assembleRecord', () => {
  it('builds a full record from a complete entry', () => {
    const record = assembleRecord(
      { text: '4 Magic-Foundations-SomeName-#123-R-NearMint $0.50 $2.00', position: 3 },
      table,
    );
    expect(record).toEqual({
      quantity: 4,
      groupName: 'Foundations',
      itemName: 'Some Name',
      variant: null,
      identifier: '123',
      tier: 'R',
      condition: 'NM',
      isFoil: false,
      localization: null,
      unitPrice: 0.5,
      totalPrice: 2,
      position: 3,
    });
  });

  it('returns a frozen record', () => {
    const record = assembleRecord({ text: '2 Magic-Foundations-LlanowarElves', position: 0 }, table);
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('normalizes the group, name and variant', () => {
    const record = assembleRecord(
      { text: '1 Magic-Commander:FINALFANTASY-SolRing(BorderlessArt)-#5-U-LightlyPlayed $1.00 $1.00', position: 0 },
      table,
    );
    expect(record?.groupName).toBe('Commander: FINAL FANTASY');
    expect(record?.itemName).toBe('Sol Ring');
    expect(record?.variant).toBe('Borderless Art');
    expect(record?.tier).toBe('U');
    expect(record?.condition).toBe('LP');
  });

  it('splits on the identifier anchor when no prefix is known', () => {
    const record = assembleRecord({ text: '1 Magic-Some-odd-set-BigCard-#9-U $0.10 $0.10', position: 0 }, new PrefixTable([]));
    expect(record?.groupName).toBe('Some-odd-set');
    expect(record?.itemName).toBe('Big Card');
    expect(record?.identifier).toBe('9');
    expect(record?.tier).toBe('U');
  });

  it('fills defaults for a sparse entry', () => {
    expect(assembleRecord({ text: '2 Magic-Foundations-LlanowarElves', position: 0 }, table)).toEqual({
      quantity: 2,
      groupName: 'Foundations',
      itemName: 'Llanowar Elves',
      variant: null,
      identifier: null,
      tier: 'R',
      condition: 'NM',
      isFoil: false,
      localization: null,
      unitPrice: 0,
      totalPrice: 0,
      position: 0,
    });
  });

  it('returns null for a malformed entry', () => {
    expect(assembleRecord({ text: '3 Magic-', position: 0 }, table)).toBeNull();
  });
});

describe('assembleRecords', () => {
  it('reports malformed entries without stopping', () => {
    const result = assembleRecords(
      [
        { text: '3 Magic-', position: 0 },
        { text: '2 Magic-Foundations-LlanowarElves', position: 1 },
      ],
      table,
    );
    expect(result.records).toHaveLength(1);
    expect(result.records[0]?.position).toBe(1);
    expect(result.unparsed).toEqual([{ text: '3 Magic-', position: 0, reason: 'malformed_entry' }]);
  });

  it('keeps entry order', () => {
    const result = assembleRecords(
      [
        { text: '1 Magic-Foundations-Beta-#2-C', position: 4 },
        { text: '1 Magic-Foundations-Alpha-#1-C', position: 9 },
      ],
      table,
    );
    expect(result.records.map((r) => r.itemName)).toEqual(['Beta', 'Alpha']);
  });
});
