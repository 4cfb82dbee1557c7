const PUNCTUATION_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ['“', '"'], // left double quote
  ['”', '"'],
  ['„', '"'], // low double quote
  ['«', '"'], // guillemets
  ['»', '"'],
  ['‘', "'"],
  ['’', "'"],
  ['‚', "'"],
  ['‹', "'"],
  ['›', "'"],
  ['–', '-'], // en dash
  ['—', '-'], // em dash
  ['−', '-'], // minus sign
  ['…', '...'],
  ['\u00a0', ' '], // non-breaking space
];

/**
 * Replace typographic punctuation with plain ASCII. Every replacement is
 * ASCII, so running this twice gives the same result as running it once.
 */
export function normalizeText(value: string): string;
export function normalizeText<T>(value: T): T;
export function normalizeText(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  let text = value;
  for (const [from, to] of PUNCTUATION_REPLACEMENTS) {
    text = text.split(from).join(to);
  }
  return text;
}
