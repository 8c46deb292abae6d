import { computeTfidf, rankTerms } from './tfidf';

describe('tfidf', () => {
  const documents = [['soft', 'kibble'], ['soft', 'crunchy'], ['soft']];

  describe('computeTfidf', () => {
    it('should sum L2-normalized document weights per term', () => {
      const terms = computeTfidf(documents, { minDf: 1, maxFeatures: 100 });

      expect(rankTerms(terms, 10)).toEqual([
        { term: 'soft', score: 2.017085 },
        { term: 'crunchy', score: 0.861037 },
        { term: 'kibble', score: 0.861037 },
      ]);
    });

    it('should drop terms below the minimum document frequency', () => {
      expect(computeTfidf(documents, { minDf: 2, maxFeatures: 100 })).toEqual([
        { term: 'soft', score: 3 },
      ]);
    });

    it('should keep the most frequent terms when over maxFeatures', () => {
      const terms = computeTfidf(
        [['aa', 'bb', 'bb'], ['aa', 'cc'], ['cc', 'dd']],
        { minDf: 1, maxFeatures: 2 },
      );

      expect(rankTerms(terms, 10)).toEqual([
        { term: 'aa', score: 1.355432 },
        { term: 'bb', score: 0.934702 },
      ]);
    });

    it('should return nothing when no term reaches minDf', () => {
      expect(computeTfidf([['aa'], ['bb']], { minDf: 2, maxFeatures: 10 })).toEqual(
        [],
      );
    });

    it('should return nothing for an empty corpus', () => {
      expect(computeTfidf([], { minDf: 1, maxFeatures: 10 })).toEqual([]);
    });
  });

  describe('rankTerms', () => {
    it('should break score ties by term and cut at topK', () => {
      expect(
        rankTerms(
          [
            { term: 'zesty', score: 1 },
            { term: 'aroma', score: 1 },
            { term: 'bland', score: 2 },
          ],
          2,
        ),
      ).toEqual([
        { term: 'bland', score: 2 },
        { term: 'aroma', score: 1 },
      ]);
    });
  });
});
