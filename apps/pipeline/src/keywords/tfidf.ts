import { KeywordTerm } from '@app/shared-types';

export interface TfidfOptions {
  minDf: number;
  maxFeatures: number;
}

const SCORE_PRECISION = 1e6;

/**
 * Corpus-level TF-IDF weight per term.
 *
 * Each document is a list of terms. Weights use raw counts, smoothed
 * idf = ln((1 + n) / (1 + df)) + 1 and an L2-normalized vector per
 * document; a term's weight is the sum of its normalized document weights.
 * Terms seen in fewer than `minDf` documents are left out, and when more
 * than `maxFeatures` terms remain only the most frequent are kept.
 */
export function computeTfidf(
  documents: readonly (readonly string[])[],
  options: TfidfOptions,
): KeywordTerm[] {
  const documentCounts = documents.map((terms) => countTerms(terms));
  const documentFrequency = new Map<string, number>();
  const corpusFrequency = new Map<string, number>();

  for (const counts of documentCounts) {
    for (const [term, count] of counts) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      corpusFrequency.set(term, (corpusFrequency.get(term) ?? 0) + count);
    }
  }

  const vocabulary = selectVocabulary(
    documentFrequency,
    corpusFrequency,
    options,
  );
  if (vocabulary.size === 0) {
    return [];
  }

  const n = documents.length;
  const idf = new Map<string, number>();
  for (const term of vocabulary) {
    const df = documentFrequency.get(term) ?? 0;
    idf.set(term, Math.log((1 + n) / (1 + df)) + 1);
  }

  const weights = new Map<string, number>();
  for (const counts of documentCounts) {
    const vector: Array<[string, number]> = [];
    for (const [term, count] of counts) {
      const termIdf = idf.get(term);
      if (termIdf !== undefined) {
        vector.push([term, count * termIdf]);
      }
    }

    const norm = Math.sqrt(
      vector.reduce((total, [, value]) => total + value * value, 0),
    );
    if (norm === 0) continue;

    for (const [term, value] of vector) {
      weights.set(term, (weights.get(term) ?? 0) + value / norm);
    }
  }

  return [...weights].map(([term, weight]) => ({
    term,
    score: Math.round(weight * SCORE_PRECISION) / SCORE_PRECISION,
  }));
}

/**
 * Order by score descending, then term ascending, and keep the first `topK`
 */
export function rankTerms(
  terms: readonly KeywordTerm[],
  topK: number,
): KeywordTerm[] {
  return [...terms]
    .sort((a, b) => b.score - a.score || compareTerms(a.term, b.term))
    .slice(0, topK);
}

function countTerms(terms: readonly string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of terms) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

function selectVocabulary(
  documentFrequency: ReadonlyMap<string, number>,
  corpusFrequency: ReadonlyMap<string, number>,
  options: TfidfOptions,
): Set<string> {
  const candidates = [...documentFrequency]
    .filter(([, df]) => df >= options.minDf)
    .map(([term]) => term);

  if (candidates.length <= options.maxFeatures) {
    return new Set(candidates);
  }

  return new Set(
    candidates
      .sort(
        (a, b) =>
          (corpusFrequency.get(b) ?? 0) - (corpusFrequency.get(a) ?? 0) ||
          compareTerms(a, b),
      )
      .slice(0, options.maxFeatures),
  );
}

// Code-unit order, so results never depend on the host locale
function compareTerms(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
