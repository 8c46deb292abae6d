import { ProductFactory, buildPipelineConfig } from '@app/testing';
import { STANDARD_STOPWORDS, buildExclusionSet } from './keyword-exclusions';

describe('buildExclusionSet', () => {
  const product = ProductFactory.create();
  const other = ProductFactory.create({ productId: 'p2', brand: 'Purrfect Pantry' });

  it('should include standard stopwords', () => {
    const excluded = buildExclusionSet(
      product,
      [product, other],
      buildPipelineConfig().keywords,
    );

    expect(STANDARD_STOPWORDS.has('the')).toBe(true);
    expect(excluded.has('the')).toBe(true);
    expect(excluded.has('kibble')).toBe(false);
  });

  it("should exclude the product's own brand and name tokens", () => {
    const excluded = buildExclusionSet(
      product,
      [product, other],
      buildPipelineConfig().keywords,
    );

    for (const token of ['whisker', 'farms', 'indoor', 'salmon', 'recipe']) {
      expect(excluded.has(token)).toBe(true);
    }
    expect(excluded.has('purrfect')).toBe(false);
  });

  it('should exclude every catalog brand when configured', () => {
    const excluded = buildExclusionSet(
      product,
      [product, other],
      buildPipelineConfig({ keywords: { excludeAllBrands: true } }).keywords,
    );

    expect(excluded.has('purrfect')).toBe(true);
    expect(excluded.has('pantry')).toBe(true);
  });

  it('should include extra stopwords case-insensitively', () => {
    const excluded = buildExclusionSet(
      product,
      [product],
      buildPipelineConfig({ keywords: { extraStopwords: ['Kibble'] } }).keywords,
    );

    expect(excluded.has('kibble')).toBe(true);
  });
});
