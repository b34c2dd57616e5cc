#!/usr/bin/env node
import { existsSync } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { basename, dirname, extname, join } from 'path';
import pino from 'pino';
import { config } from '../config/index.js';
import { readSlipLines } from '../services/document/pdf-text.js';
import { createRunContext } from '../services/logger/run-context.js';
import { CardLookupService, LookupClient } from '../services/lookup/index.js';
import { loadPrefixTable } from '../services/parsing/index.js';
import { organizeSlip } from '../services/slip/organize-slip.js';
import { getErrorMessage } from '../utils/errors.js';

const logger = pino({ name: 'organize-slip-cli', level: config.LOG_LEVEL });

const USAGE = 'Usage: organize-slip <packing_slip.pdf|packing_slip.txt> [output.html]';

function defaultOutputPath(inputPath: string, outputDir: string): string {
  const name = basename(inputPath, extname(inputPath));
  return join(outputDir, `${name}_organized.html`);
}

async function main(argv: string[]): Promise<void> {
  const [inputPath, outputArg] = argv;
  if (!inputPath) {
    logger.error(USAGE);
    process.exitCode = 1;
    return;
  }
  if (!existsSync(inputPath)) {
    logger.error({ inputPath }, 'File not found');
    process.exitCode = 1;
    return;
  }

  const outputPath = outputArg ?? defaultOutputPath(inputPath, config.OUTPUT_DIR);
  const ctx = createRunContext('organize-slip', basename(inputPath));

  try {
    const lines = await readSlipLines(inputPath);
    const lookup = config.LOOKUP_ENABLED ? () => CardLookupService.create(new LookupClient()) : null;

    const result = await organizeSlip(lines, { prefixTable: loadPrefixTable(), lookup, ctx });
    if (result.parse.records.length === 0) {
      logger.error({ ...ctx }, 'No cards found in the packing slip, check the file format');
      process.exitCode = 1;
      return;
    }

    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, result.html, 'utf8');
    logger.info(
      {
        ...ctx,
        outputPath,
        records: result.parse.records.length,
        unparsed: result.parse.unparsed.length,
        lookupFailures: result.lookupFailures.length,
      },
      'Report written',
    );
  } catch (error) {
    logger.error({ ...ctx, error: getErrorMessage(error) }, 'Failed to organize packing slip');
    process.exitCode = 1;
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  logger.fatal({ error: getErrorMessage(error) }, 'Unexpected failure');
  process.exitCode = 1;
});
