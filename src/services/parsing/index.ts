import pino from 'pino';
import { config } from '../../config/index.js';
import type { RunContext } from '../logger/run-context.js';
import { mergeContinuationLines } from './continuation-merger.js';
import type { PrefixTable } from './prefix-table.js';
import { assembleRecords } from './record-assembler.js';
import type { MergedEntry, SlipRecord, UnparsedLine } from './types.js';

const logger = pino({ name: 'slip-parser', level: config.LOG_LEVEL });

const ORDER_NUMBER_REGEX = /Order\s*Number:\s*([A-Z0-9-]+)/;

export interface SlipParseResult {
  entries: MergedEntry[];
  records: SlipRecord[];
  unparsed: UnparsedLine[];
}

/**
 * Parse the extracted text lines of one packing slip, in page order.
 * Synchronous and sequential: the merger's open entry depends on line order.
 */
export function parseSlipLines(
  lines: readonly string[],
  table: PrefixTable,
  ctx?: RunContext,
): SlipParseResult {
  // 1. Fold wrapped lines into their entries
  const entries = mergeContinuationLines(lines);
  logger.debug({ ...ctx, entries: entries.length }, 'Merged slip lines into entries');

  // 2. Split, extract and normalize each entry
  const { records, unparsed } = assembleRecords(entries, table, ctx);

  logger.info(
    { ...ctx, entries: entries.length, records: records.length, unparsed: unparsed.length },
    'Parsed packing slip',
  );
  return { entries, records, unparsed };
}

/** Order number printed in the slip banner, used as the report's document id. */
export function extractOrderNumber(lines: readonly string[]): string | null {
  for (const line of lines) {
    const match = ORDER_NUMBER_REGEX.exec(line);
    if (match?.[1]) return match[1];
  }
  return null;
}

export { classifyLine } from './line-classifier.js';
export type { LineKind } from './line-classifier.js';
export { mergeContinuationLines } from './continuation-merger.js';
export { PrefixTable, loadPrefixTable } from './prefix-table.js';
export { splitGroup, UNKNOWN_GROUP } from './group-splitter.js';
export type { SplitResult, SplitStrategy } from './group-splitter.js';
export { extractFields } from './field-extractor.js';
export { normalizeName, normalizeGroupName } from './name-normalizer.js';
export { assembleRecord, assembleRecords } from './record-assembler.js';
export type { Condition, ExtractedFields, MergedEntry, SlipRecord, Tier, UnparsedLine } from './types.js';
export { CONDITION_LABELS, TIER_NAMES } from './types.js';
