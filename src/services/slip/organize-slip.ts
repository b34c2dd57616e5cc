import pino from 'pino';
import { config } from '../../config/index.js';
import type { RunContext } from '../logger/run-context.js';
import { enrichRecords, unenriched } from '../lookup/index.js';
import type { CardLookup } from '../lookup/index.js';
import { extractOrderNumber, parseSlipLines } from '../parsing/index.js';
import type { SlipParseResult } from '../parsing/index.js';
import type { PrefixTable } from '../parsing/prefix-table.js';
import { renderHtmlReport } from '../report/html-report.js';
import { organizeRecords } from '../report/organizer.js';
import type { OrganizedReport } from '../report/organizer.js';

const logger = pino({ name: 'organize-slip', level: config.LOG_LEVEL });

/** Builds the lookup on demand, so a slip without records costs no network calls. */
export type LookupFactory = () => Promise<CardLookup>;

export interface OrganizeOptions {
  prefixTable: PrefixTable;
  /** null skips enrichment; every record is then uncategorized. */
  lookup: CardLookup | LookupFactory | null;
  ctx?: RunContext;
}

export interface OrganizeResult {
  orderNumber: string | null;
  parse: SlipParseResult;
  report: OrganizedReport;
  lookupFailures: string[];
  html: string;
}

/**
 * Whole pipeline for one slip's text lines: parse, enrich, organize, render.
 */
export async function organizeSlip(lines: readonly string[], options: OrganizeOptions): Promise<OrganizeResult> {
  const { prefixTable, lookup, ctx } = options;

  // 1. Parse
  const parse = parseSlipLines(lines, prefixTable, ctx);
  const orderNumber = extractOrderNumber(lines);

  // 2. Enrich (optional)
  let enriched = parse.records.map(unenriched);
  let lookupFailures: string[] = [];
  if (lookup && parse.records.length > 0) {
    const source = typeof lookup === 'function' ? await lookup() : lookup;
    const result = await enrichRecords(parse.records, source, ctx);
    enriched = result.enriched;
    lookupFailures = result.failures;
  }

  // 3. Organize and render
  const report = organizeRecords(enriched);
  const html = renderHtmlReport(report, { documentId: orderNumber });

  logger.info(
    { ...ctx, orderNumber, records: parse.records.length, sections: report.sections.length },
    'Organized packing slip',
  );
  return { orderNumber, parse, report, lookupFailures, html };
}
