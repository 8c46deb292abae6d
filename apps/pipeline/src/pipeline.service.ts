import { Injectable, Logger } from '@nestjs/common';
import { PipelineConfigService } from '@app/config';
import {
  OutputWriterService,
  ProductCatalogRepository,
  ReviewSourceRepository,
  isRecord,
} from '@app/datastore';
import {
  CleanedReview,
  CleaningCounts,
  ComparisonRecord,
  FailedProduct,
  FailedSource,
  KeywordCounts,
  KeywordEntry,
  PIPELINE_FILES,
  PipelineStage,
  Product,
  RunSummary,
  ScoredReview,
  SentimentCounts,
  sanitizeForLog,
  toError,
} from '@app/shared-types';
import { AggregatorService } from './aggregation/aggregator.service';
import { CleanerService } from './cleaner/cleaner.service';
import { coerceIdentifier } from './cleaner/review-normalizers';
import { KeywordExtractorService } from './keywords/keyword-extractor.service';
import { SentimentService } from './sentiment/sentiment.service';

/**
 * PipelineService - Runs one full batch over the input directory
 *
 * Flow:
 * 1. Load the product catalog (fatal on failure)
 * 2. Read every review source and group raw records by product id
 * 3. Clean, score, extract keywords and aggregate, product by product
 * 4. Write outputs, comparison table last, then the run summary
 *
 * A product whose stage work throws is recorded as failed and skipped by
 * later stages; every other product carries on. Every catalog product still
 * gets a comparison record, with null metrics when its reviews were lost
 * upstream. Catalog and output failures abort the run.
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    private readonly pipelineConfig: PipelineConfigService,
    private readonly catalogRepository: ProductCatalogRepository,
    private readonly reviewSourceRepository: ReviewSourceRepository,
    private readonly outputWriter: OutputWriterService,
    private readonly cleaner: CleanerService,
    private readonly sentiment: SentimentService,
    private readonly keywordExtractor: KeywordExtractorService,
    private readonly aggregator: AggregatorService,
  ) {}

  async run(): Promise<RunSummary> {
    const startedAt = new Date();
    const config = this.pipelineConfig.get();
    const failedSources: FailedSource[] = [];
    const failedProducts: FailedProduct[] = [];

    this.logger.log(
      `Pipeline run started (input=${config.inputDir}, output=${config.outputDir})`,
    );

    const catalog = await this.catalogRepository.load(config.productsFile);
    const rawByProduct = await this.loadRawReviews(
      config.inputDir,
      failedSources,
    );

    // Stage 1: cleaning
    const cleaningCounts: Record<string, CleaningCounts> = {};
    const cleanedByProduct = new Map<string, CleanedReview[]>();
    for (const [productId, entries] of rawByProduct) {
      const result = this.attempt(productId, 'clean', failedProducts, () =>
        this.cleaner.clean(productId, entries),
      );
      if (result) {
        cleaningCounts[productId] = result.counts;
        cleanedByProduct.set(productId, result.reviews);
      }
    }

    // Stage 2: sentiment
    const sentimentCounts: Record<string, SentimentCounts> = {};
    const scoredByProduct = new Map<string, ScoredReview[]>();
    for (const [productId, reviews] of cleanedByProduct) {
      const result = this.attempt(productId, 'sentiment', failedProducts, () =>
        this.sentiment.scoreReviews(productId, reviews),
      );
      if (result) {
        sentimentCounts[productId] = result.counts;
        scoredByProduct.set(productId, result.reviews);
      }
    }

    const upstreamFailures = new Set(
      failedProducts.map((failure) => failure.productId),
    );

    // Stage 3: keywords, catalog products only
    const keywordCounts: Record<string, KeywordCounts> = {};
    const keywordEntries: KeywordEntry[] = [];
    for (const product of catalog) {
      if (upstreamFailures.has(product.productId)) {
        continue;
      }
      const result = this.attempt(
        product.productId,
        'keywords',
        failedProducts,
        () =>
          this.keywordExtractor.extract(
            product,
            scoredByProduct.get(product.productId) ?? [],
            catalog,
          ),
      );
      if (result) {
        keywordCounts[product.productId] = result.counts;
        keywordEntries.push(...result.entries);
      }
    }

    // Stage 4: aggregation
    const orphanedReviews = this.aggregator.countOrphans(
      catalog,
      scoredByProduct,
    );
    const records: ComparisonRecord[] = [];
    for (const product of catalog) {
      const record = this.attempt(
        product.productId,
        'aggregate',
        failedProducts,
        () =>
          this.aggregator.buildRecord(
            product,
            scoredByProduct.get(product.productId) ?? [],
            keywordEntries,
          ),
      );
      if (record) {
        records.push(record);
      }
    }
    const comparison = this.aggregator.sortRecords(records);

    await this.outputWriter.writeReviews(
      PIPELINE_FILES.CLEANED_REVIEWS,
      this.flatten(cleanedByProduct),
    );
    await this.outputWriter.writeReviews(
      PIPELINE_FILES.SCORED_REVIEWS,
      this.flatten(scoredByProduct),
    );
    await this.outputWriter.writeKeywords(keywordEntries);
    await this.outputWriter.writeComparison(comparison);

    const finishedAt = new Date();
    const summary: RunSummary = {
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      config: this.pipelineConfig.toSummary(),
      failedSources,
      failedProducts,
      cleaning: { stage: 'clean', products: cleaningCounts },
      sentiment: { stage: 'sentiment', products: sentimentCounts },
      keywords: { stage: 'keywords', products: keywordCounts },
      aggregation: this.aggregator.summarize(
        catalog,
        comparison,
        orphanedReviews,
      ),
    };
    await this.outputWriter.writeSummary(summary);

    this.logSummary(summary, catalog);
    return summary;
  }

  /**
   * Read all sources and group their entries by product id.
   * Objects carrying product_id go to that product; everything else falls
   * back to the id in the source file name.
   */
  private async loadRawReviews(
    inputDir: string,
    failedSources: FailedSource[],
  ): Promise<Map<string, unknown[]>> {
    const grouped = new Map<string, unknown[]>();
    const sources = await this.reviewSourceRepository.listSources(inputDir);

    for (const source of sources) {
      try {
        const { entries } = await this.reviewSourceRepository.read(source);
        for (const entry of entries) {
          const productId =
            (isRecord(entry) ? coerceIdentifier(entry.product_id) : null) ??
            source.productIdHint;
          const group = grouped.get(productId) ?? [];
          group.push(entry);
          grouped.set(productId, group);
        }
      } catch (error) {
        const reason = toError(error).message;
        this.logger.warn(
          `Skipping source ${sanitizeForLog(source.fileName)}: ${sanitizeForLog(reason, 200)}`,
        );
        failedSources.push({
          source: source.fileName,
          productId: source.productIdHint,
          reason,
        });
      }
    }

    return new Map(
      [...grouped].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
    );
  }

  /**
   * Run one product's stage work, recording a throw instead of propagating it
   */
  private attempt<T>(
    productId: string,
    stage: PipelineStage,
    failedProducts: FailedProduct[],
    work: () => T,
  ): T | null {
    try {
      return work();
    } catch (error) {
      const err = toError(error);
      this.logger.error(
        `Stage ${stage} failed for product ${sanitizeForLog(productId)}: ${err.message}`,
        err.stack,
      );
      failedProducts.push({ productId, stage, reason: err.message });
      return null;
    }
  }

  private flatten<T>(byProduct: ReadonlyMap<string, T[]>): T[] {
    return [...byProduct.values()].flat();
  }

  private logSummary(summary: RunSummary, catalog: readonly Product[]): void {
    const kept = Object.values(summary.cleaning.products).reduce(
      (total, counts) => total + counts.kept,
      0,
    );
    const input = Object.values(summary.cleaning.products).reduce(
      (total, counts) => total + counts.input,
      0,
    );

    this.logger.log(
      `Pipeline run finished in ${summary.durationMs}ms: ${catalog.length} products, ` +
        `${kept}/${input} reviews kept, ` +
        `${summary.failedSources.length} failed sources, ` +
        `${summary.failedProducts.length} failed products`,
    );

    const orphaned = Object.keys(summary.aggregation.orphanedReviews);
    if (orphaned.length > 0) {
      this.logger.warn(`Orphaned reviews for: ${orphaned.join(', ')}`);
    }
    if (summary.aggregation.productsWithoutReviews.length > 0) {
      this.logger.warn(
        `Products without reviews: ${summary.aggregation.productsWithoutReviews.join(', ')}`,
      );
    }
  }
}
