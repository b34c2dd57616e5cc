import pino from 'pino';
import { config } from '../../config/index.js';
import { getErrorMessage } from '../../utils/errors.js';
import type { RunContext } from '../logger/run-context.js';
import type { SlipRecord } from '../parsing/types.js';
import { DEFAULT_CLASSIFICATION } from './classification.js';
import type { ColorClass } from './classification.js';
import { searchName } from './lookup-service.js';
import type { CardLookup, LookupMatch } from './lookup-service.js';

const logger = pino({ name: 'enrichment', level: config.LOG_LEVEL });

/** A parsed record plus what the lookup added; the record itself is never changed. */
export interface EnrichedRecord {
  record: SlipRecord;
  classification: ColorClass;
  imageUrl: string | null;
}

export interface EnrichmentResult {
  enriched: EnrichedRecord[];
  /** Item names (with the name searched) that the lookup could not resolve. */
  failures: string[];
}

export function unenriched(record: SlipRecord): EnrichedRecord {
  return { record, classification: DEFAULT_CLASSIFICATION, imageUrl: null };
}

/**
 * Look up every record once, in slip order. Colour is cached per search name
 * (identical across printings), the image per group + identifier (it differs
 * between printings). A failing lookup only costs that record its extras.
 */
export async function enrichRecords(
  records: readonly SlipRecord[],
  lookup: CardLookup,
  ctx?: RunContext,
): Promise<EnrichmentResult> {
  const colorCache = new Map<string, ColorClass>();
  const imageCache = new Map<string, string | null>();
  const enriched: EnrichedRecord[] = [];
  const failures: string[] = [];

  for (const [i, record] of records.entries()) {
    const name = searchName(record.itemName);
    const colorKey = name.toLowerCase();
    const imageKey = `${record.groupName}\u0000${record.identifier ?? ''}`;

    const cachedColor = colorCache.get(colorKey);
    if (cachedColor !== undefined && imageCache.has(imageKey)) {
      enriched.push({ record, classification: cachedColor, imageUrl: imageCache.get(imageKey) ?? null });
      logger.debug({ ...ctx, index: i + 1, name: record.itemName }, 'Lookup served from cache');
      continue;
    }

    let match: LookupMatch | null = null;
    try {
      match = await lookup.lookup(record.itemName, record.groupName, record.identifier);
    } catch (error) {
      logger.warn({ ...ctx, name: record.itemName, error: getErrorMessage(error) }, 'Lookup failed');
    }

    const result: EnrichedRecord = match
      ? { record, classification: match.classification, imageUrl: match.imageUrl }
      : unenriched(record);

    if (match) {
      logger.debug(
        { ...ctx, index: i + 1, name: record.itemName, officialName: match.officialName, classification: match.classification },
        'Record enriched',
      );
    } else {
      failures.push(`${record.itemName} (searched: ${name})`);
    }

    colorCache.set(colorKey, result.classification);
    imageCache.set(imageKey, result.imageUrl);
    enriched.push(result);
  }

  if (failures.length > 0) {
    logger.warn({ ...ctx, count: failures.length, sample: failures.slice(0, 10) }, 'Some records could not be looked up');
  }

  return { enriched, failures };
}
