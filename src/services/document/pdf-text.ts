import { readFile } from 'fs/promises';
import { extname } from 'path';
import pino from 'pino';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api.js';
import { config } from '../../config/index.js';
import { DocumentReadError, getErrorMessage } from '../../utils/errors.js';

const logger = pino({ name: 'pdf-text', level: config.LOG_LEVEL });

/**
 * Join a page's text items into lines, breaking at pdfjs end-of-line markers.
 * Items are concatenated as-is: the slip's table cells carry no spacing of
 * their own, which is what the parser expects.
 */
export function itemsToLines(items: ReadonlyArray<TextItem | TextMarkedContent>): string[] {
  const lines: string[] = [];
  let current = '';

  for (const item of items) {
    if (!('str' in item)) continue;
    current += item.str;
    if (item.hasEOL) {
      lines.push(current);
      current = '';
    }
  }
  if (current) lines.push(current);

  return lines;
}

async function readBytes(path: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(path));
  } catch (error) {
    throw new DocumentReadError(path, getErrorMessage(error), error);
  }
}

/** Text lines of every page, in page order. */
export async function extractPdfLines(path: string): Promise<string[]> {
  const data = await readBytes(path);

  const doc = await getDocument({ data, isEvalSupported: false, useSystemFonts: true }).promise.catch(
    (error: unknown) => {
      throw new DocumentReadError(path, getErrorMessage(error), error);
    },
  );

  try {
    const lines: string[] = [];
    for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
      const page = await doc.getPage(pageNumber);
      const content = await page.getTextContent();
      lines.push(...itemsToLines(content.items));
      page.cleanup();
    }
    logger.debug({ path, pages: doc.numPages, lines: lines.length }, 'Extracted PDF text');
    return lines;
  } finally {
    await doc.destroy();
  }
}

/**
 * Lines of a packing slip: `.txt` files hold text already extracted one line
 * per row; anything else is read as a PDF.
 */
export async function readSlipLines(path: string): Promise<string[]> {
  if (extname(path).toLowerCase() === '.txt') {
    const bytes = await readBytes(path);
    return Buffer.from(bytes).toString('utf8').split(/\r?\n/);
  }
  return extractPdfLines(path);
}
