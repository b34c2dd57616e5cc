export type LineKind = 'entry_start' | 'continuation' | 'page_noise' | 'blank';

/** Quantity, whitespace, then the product-line marker every card entry carries. */
export const ENTRY_START_REGEX = /^\d+\s+Magic-/;

const NOISE_PREFIXES = ['Quantity Description', 'OrderNumber:'];

// Closing summary, e.g. "201 Total $524.25"
const TOTAL_LINE_REGEX = /^\d+\s+Total\s+\$/;

export function classifyLine(raw: string): LineKind {
  const line = raw.trim();
  if (!line) return 'blank';

  for (const prefix of NOISE_PREFIXES) {
    if (line.startsWith(prefix)) return 'page_noise';
  }
  if (TOTAL_LINE_REGEX.test(line)) return 'page_noise';

  if (ENTRY_START_REGEX.test(line)) return 'entry_start';

  return 'continuation';
}
