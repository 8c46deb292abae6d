const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;
const MIN_TOKEN_LENGTH = 2;

/**
 * Lowercased word tokens of two or more characters, in text order
 */
export function tokenizeTerms(text: string): string[] {
  const tokens: string[] = [];
  for (const match of text.toLowerCase().matchAll(WORD_PATTERN)) {
    if (match[0].length >= MIN_TOKEN_LENGTH) {
      tokens.push(match[0]);
    }
  }
  return tokens;
}

/**
 * All contiguous n-grams of the token sequence for n = 1..ngramMax,
 * unigrams first
 */
export function buildNgrams(tokens: readonly string[], ngramMax: number): string[] {
  const terms: string[] = [];
  for (let n = 1; n <= ngramMax; n++) {
    for (let start = 0; start + n <= tokens.length; start++) {
      terms.push(tokens.slice(start, start + n).join(' '));
    }
  }
  return terms;
}
