import { KeywordConfig } from '@app/config';
import { Product } from '@app/shared-types';
import standardStopwords from './data/english-stopwords.json';
import { tokenizeTerms } from './term-tokenizer';

export const STANDARD_STOPWORDS: ReadonlySet<string> = new Set(standardStopwords);

/**
 * Tokens never reported as keywords for `product`: standard and configured
 * stopwords plus the product's own brand and name, and every catalog
 * brand when `excludeAllBrands` is set.
 */
export function buildExclusionSet(
  product: Product,
  catalog: readonly Product[],
  config: KeywordConfig,
): Set<string> {
  const excluded = new Set<string>(STANDARD_STOPWORDS);
  for (const word of config.extraStopwords) {
    excluded.add(word.toLowerCase());
  }

  const identityText = [product.brand, product.productName];
  if (config.excludeAllBrands) {
    identityText.push(...catalog.map((entry) => entry.brand));
  }
  for (const text of identityText) {
    for (const token of tokenizeTerms(text)) {
      excluded.add(token);
    }
  }

  return excluded;
}
