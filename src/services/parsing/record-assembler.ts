import pino from 'pino';
import { config } from '../../config/index.js';
import type { RunContext } from '../logger/run-context.js';
import { extractFields } from './field-extractor.js';
import { splitGroup } from './group-splitter.js';
import { ENTRY_START_REGEX } from './line-classifier.js';
import { normalizeGroupName, normalizeName } from './name-normalizer.js';
import type { PrefixTable } from './prefix-table.js';
import type { MergedEntry, SlipRecord, UnparsedLine } from './types.js';

const logger = pino({ name: 'record-assembler', level: config.LOG_LEVEL });

const PRICE_TOKEN_REGEX = /\$\d+\.?\d*/g;
const DESCRIPTION_REGEX = /Magic-(.+)/;
const HEADER_WORDS = ['Quantity', 'Description'];

const SAMPLE_LENGTH = 80;

/**
 * The entry description: the text after the product-line marker with every
 * price token removed. Info pushed past the prices by a line wrap stays in.
 */
export function entryDescription(text: string): string | null {
  if (!ENTRY_START_REGEX.test(text)) return null;
  if (HEADER_WORDS.some((word) => text.includes(word))) return null;

  const match = DESCRIPTION_REGEX.exec(text.replace(PRICE_TOKEN_REGEX, ''));
  const description = match?.[1]?.trim();
  return description ? description : null;
}

export function assembleRecord(entry: MergedEntry, table: PrefixTable): SlipRecord | null {
  const text = entry.text.trim();
  const description = entryDescription(text);
  if (description === null) return null;

  const { groupRaw, remainder } = splitGroup(description, table);
  const fields = extractFields(text, remainder);

  return Object.freeze({
    quantity: fields.quantity,
    groupName: normalizeGroupName(groupRaw),
    itemName: normalizeName(fields.nameSpan),
    variant: fields.variantRaw === null ? null : normalizeName(fields.variantRaw),
    identifier: fields.identifier,
    tier: fields.tier,
    condition: fields.condition,
    isFoil: fields.isFoil,
    localization: fields.localization,
    unitPrice: fields.unitPrice,
    totalPrice: fields.totalPrice,
    position: entry.position,
  });
}

export interface AssemblyResult {
  records: SlipRecord[];
  unparsed: UnparsedLine[];
}

/**
 * Turn merged entries into records. An entry without the quantity-and-marker
 * shape is reported back as unparsed; it never stops the entries after it.
 */
export function assembleRecords(
  entries: readonly MergedEntry[],
  table: PrefixTable,
  ctx?: RunContext,
): AssemblyResult {
  const records: SlipRecord[] = [];
  const unparsed: UnparsedLine[] = [];

  for (const entry of entries) {
    const record = assembleRecord(entry, table);
    if (record) {
      records.push(record);
      continue;
    }
    unparsed.push({ text: entry.text, position: entry.position, reason: 'malformed_entry' });
    logger.warn(
      { ...ctx, position: entry.position, sample: entry.text.slice(0, SAMPLE_LENGTH) },
      'Could not parse slip entry',
    );
  }

  return { records, unparsed };
}
