import { Test, TestingModule } from '@nestjs/testing';
import * as fs from 'fs';
import * as path from 'path';
import { PipelineConfigService } from '@app/config';
import {
  KeywordBucket,
  OutputWriteError,
  PIPELINE_FILES,
  RunSummary,
} from '@app/shared-types';
import {
  ProductFactory,
  ReviewFactory,
  createMockPipelineConfigService,
  createTempDir,
  readTextFile,
  removeTempDir,
} from '@app/testing';
import { OutputWriterService } from './output-writer.service';

describe('OutputWriterService', () => {
  let service: OutputWriterService;
  let dir: string;
  let outputDir: string;

  beforeEach(async () => {
    ReviewFactory.resetCounter();
    dir = createTempDir();
    outputDir = path.join(dir, 'outputs');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        OutputWriterService,
        {
          provide: PipelineConfigService,
          useValue: createMockPipelineConfigService({ outputDir }),
        },
      ],
    }).compile();

    service = module.get<OutputWriterService>(OutputWriterService);
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('should write reviews as JSON Lines with snake_case fields', async () => {
    const review = ReviewFactory.createScored({ reviewId: 'r1', date: null });

    await service.writeReviews(PIPELINE_FILES.SCORED_REVIEWS, [review]);

    expect(readTextFile(outputDir, PIPELINE_FILES.SCORED_REVIEWS)).toBe(
      JSON.stringify({
        review_id: 'r1',
        product_id: 'p1',
        rating: 5,
        text: review.text,
        verified: true,
        date: null,
        sentiment_score: 0.6249,
        sentiment_label: 'positive',
      }) + '\n',
    );
  });

  it('should write keywords as CSV and nested JSON', async () => {
    await service.writeKeywords([
      { productId: 'p1', bucket: KeywordBucket.OVERALL, term: 'fresh kibble', score: 1.5, rank: 1 },
      { productId: 'p1', bucket: KeywordBucket.NEGATIVE, term: 'stale', score: 0.75, rank: 1 },
    ]);

    expect(readTextFile(outputDir, PIPELINE_FILES.KEYWORDS_CSV)).toBe(
      'product_id,bucket,term,score,rank\n' +
        'p1,overall,fresh kibble,1.5,1\n' +
        'p1,negative,stale,0.75,1\n',
    );
    expect(JSON.parse(readTextFile(outputDir, PIPELINE_FILES.KEYWORDS_JSON))).toEqual({
      p1: {
        overall: [{ term: 'fresh kibble', score: 1.5, rank: 1 }],
        negative: [{ term: 'stale', score: 0.75, rank: 1 }],
      },
    });
  });

  it('should write the comparison table with quoted cells', async () => {
    const product = ProductFactory.create({ notes: 'grain free, "limited"' });

    await service.writeComparison([
      {
        productId: product.productId,
        displayName: product.brand,
        brand: product.brand,
        productName: product.productName,
        flavor: product.flavor,
        size: product.size,
        notes: product.notes,
        reviewCount: 2,
        ratingDistribution: { 1: 1, 2: 0, 3: 0, 4: 0, 5: 1 },
        avgRating: 3,
        avgLength: 41.5,
        pctPositive: 50,
        pctNeutral: 0,
        pctNegative: 50,
        pctVerified: 100,
        score: 0,
        keywords: {
          [KeywordBucket.POSITIVE]: [{ term: 'love', score: 1 }],
          [KeywordBucket.NEUTRAL]: [],
          [KeywordBucket.NEGATIVE]: [{ term: 'stale', score: 1 }],
          [KeywordBucket.OVERALL]: [
            { term: 'kibble', score: 2 },
            { term: 'cat', score: 1.2 },
          ],
        },
      },
    ]);

    const [, row] = readTextFile(outputDir, PIPELINE_FILES.COMPARISON_CSV).split('\n');
    expect(row).toBe(
      'p1,Whisker Farms,Whisker Farms,Indoor Salmon Recipe,salmon,7 lb,' +
        '"grain free, ""limited""",2,1,0,0,0,1,3,41.5,50,0,50,100,0,love,,stale,kibble;cat',
    );

    const records: Array<Record<string, unknown>> = JSON.parse(
      readTextFile(outputDir, PIPELINE_FILES.COMPARISON_JSON),
    );
    const [record] = records;
    expect(record.rating_distribution).toEqual({ '1': 1, '2': 0, '3': 0, '4': 0, '5': 1 });
    expect(record.keywords).toEqual({
      overall: [
        { term: 'kibble', score: 2 },
        { term: 'cat', score: 1.2 },
      ],
      positive: [{ term: 'love', score: 1 }],
      neutral: [],
      negative: [{ term: 'stale', score: 1 }],
    });
  });

  it('should leave no temporary files behind', async () => {
    await service.writeComparison([]);

    expect(fs.readdirSync(outputDir).sort()).toEqual([
      PIPELINE_FILES.COMPARISON_CSV,
      PIPELINE_FILES.COMPARISON_JSON,
    ]);
  });

  it('should write the run summary as formatted JSON', async () => {
    const summary: RunSummary = {
      startedAt: '2024-03-01T00:00:00.000Z',
      finishedAt: '2024-03-01T00:00:01.000Z',
      durationMs: 1000,
      config: {},
      failedSources: [],
      failedProducts: [],
      cleaning: { stage: 'clean', products: {} },
      sentiment: { stage: 'sentiment', products: {} },
      keywords: { stage: 'keywords', products: {} },
      aggregation: { products: 0, productsWithoutReviews: [], orphanedReviews: {} },
    };

    await service.writeSummary(summary);

    expect(readTextFile(outputDir, PIPELINE_FILES.RUN_SUMMARY)).toBe(
      JSON.stringify(summary, null, 2) + '\n',
    );
  });

  it('should raise OutputWriteError when the directory cannot be created', async () => {
    fs.writeFileSync(outputDir, 'not a directory');

    await expect(service.writeComparison([])).rejects.toBeInstanceOf(
      OutputWriteError,
    );
  });
});
