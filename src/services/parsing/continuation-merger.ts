import { classifyLine } from './line-classifier.js';
import type { MergedEntry } from './types.js';

/**
 * Fold wrapped lines back into the entry they belong to.
 *
 * Long entries wrap onto following lines without their quantity prefix; those
 * continuations are appended verbatim (the extracted text has no reliable
 * spacing to restore). Page headers, order banners and the total line close the
 * open entry. Anything seen before the first entry start is dropped.
 */
export function mergeContinuationLines(lines: readonly string[]): MergedEntry[] {
  const merged: MergedEntry[] = [];
  let current: MergedEntry | null = null;

  const flush = (): void => {
    if (current) merged.push(current);
    current = null;
  };

  lines.forEach((raw, index) => {
    const line = raw.trim();

    switch (classifyLine(line)) {
      case 'blank':
        return;
      case 'page_noise':
        flush();
        return;
      case 'entry_start':
        flush();
        current = { text: line, position: index };
        return;
      case 'continuation':
        if (current) current.text += line;
        return;
    }
  });

  flush();
  return merged;
}
