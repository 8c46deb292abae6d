import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import { ConfigValidationError } from '@app/shared-types';
import { createTempDir, removeTempDir, writeJsonFile } from '@app/testing';
import { PipelineConfigService } from './pipeline-config.service';

describe('PipelineConfigService', () => {
  const create = (values: Record<string, unknown>) =>
    new PipelineConfigService(new ConfigService(values));

  it('should apply defaults', () => {
    const config = create({ EXTRA_STOPWORDS_FILE: '' }).get();

    expect(config).toEqual({
      inputDir: 'data/raw',
      outputDir: 'data/outputs',
      productsFile: path.resolve('data/raw', 'products.json'),
      cleaning: { minLength: 20 },
      keywords: {
        minDf: 2,
        topK: 20,
        ngramMax: 2,
        maxFeatures: 2000,
        extraStopwords: [],
        excludeAllBrands: false,
      },
      aggregation: { percentDecimals: 1, keywordsPerRecord: 10 },
    });
  });

  it('should load the bundled stopword file by default', () => {
    const { extraStopwords } = create({}).get().keywords;

    expect(extraStopwords).toEqual(
      expect.arrayContaining(['bag', 'cat', 'food', 'kitten']),
    );
    expect(extraStopwords).toHaveLength(23);
  });

  it('should coerce values from the environment', () => {
    const config = create({
      INPUT_DIR: '/srv/raw',
      PRODUCTS_FILE: 'catalog.jsonl',
      MIN_LENGTH: '5',
      TOP_K: '7',
      EXCLUDE_ALL_BRANDS: 'yes',
      PERCENT_DECIMALS: '2',
    }).get();

    expect(config.productsFile).toBe(path.resolve('/srv/raw', 'catalog.jsonl'));
    expect(config.cleaning.minLength).toBe(5);
    expect(config.keywords.topK).toBe(7);
    expect(config.keywords.excludeAllBrands).toBe(true);
    expect(config.aggregation.percentDecimals).toBe(2);
  });

  it('should freeze the configuration', () => {
    const config = create({}).get();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.keywords)).toBe(true);
    expect(Object.isFrozen(config.keywords.extraStopwords)).toBe(true);
  });

  describe('extra stopwords', () => {
    let dir: string;

    beforeEach(() => {
      dir = createTempDir();
    });

    afterEach(() => {
      removeTempDir(dir);
    });

    it('should merge the list and the file, lowercased and sorted', () => {
      const filePath = writeJsonFile(dir, 'stopwords.json', ['Kibble', 'bag', ' ']);

      const config = create({
        EXTRA_STOPWORDS: 'cat, Bag ,,lbs',
        EXTRA_STOPWORDS_FILE: filePath,
      }).get();

      expect(config.keywords.extraStopwords).toEqual(['bag', 'cat', 'kibble', 'lbs']);
    });

    it('should reject a stopword file that is not a string array', () => {
      const filePath = writeJsonFile(dir, 'stopwords.json', { words: ['cat'] });

      expect(() => create({ EXTRA_STOPWORDS_FILE: filePath })).toThrow(
        ConfigValidationError,
      );
    });

    it('should reject a missing stopword file', () => {
      expect(() =>
        create({ EXTRA_STOPWORDS_FILE: path.join(dir, 'missing.json') }),
      ).toThrow(/Cannot load EXTRA_STOPWORDS_FILE/);
    });
  });

  it('should reject invalid numbers', () => {
    expect(() => create({ MIN_DF: '0' })).toThrow(ConfigValidationError);
    expect(() => create({ NGRAM_MAX: 'two' })).toThrow(ConfigValidationError);
  });

  it('should summarize the settings for the run summary', () => {
    expect(
      create({ EXTRA_STOPWORDS: 'cat,bag', EXTRA_STOPWORDS_FILE: '' }).toSummary(),
    ).toMatchObject({
      minLength: 20,
      extraStopwords: 2,
      percentDecimals: 1,
    });
  });
});
