/**
 * Schema text tokenizer.
 *
 * Lowercases, splits on whitespace, and isolates the punctuation that
 * structures CREATE TABLE statements so "varchar(50)," becomes
 * ["varchar", "(", "50", ")", ","].
 */

const PUNCTUATION = /([(),;])/;

// Filler words only; SQL vocabulary such as "on", "not" and "null" stays
export const STOP_WORDS: ReadonlySet<string> = new Set([
  "a",
  "an",
  "the",
  "and",
  "or",
  "of",
  "to",
  "in",
  "is",
  "as",
  "by",
  "for",
  "with",
  "at",
]);

export interface TokenizeOptions {
  removeStopWords?: boolean;
}

export function tokenize(text: string, options: TokenizeOptions = {}): string[] {
  const tokens: string[] = [];

  for (const chunk of text.toLowerCase().split(/\s+/)) {
    for (const piece of chunk.split(PUNCTUATION)) {
      if (piece.length === 0) continue;
      if (options.removeStopWords && STOP_WORDS.has(piece)) continue;
      tokens.push(piece);
    }
  }

  return tokens;
}
