import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { PipelineConfigService } from '@app/config';
import {
  CleanedReview,
  ComparisonRecord,
  KeywordEntry,
  OutputWriteError,
  PIPELINE_FILES,
  RunSummary,
  ScoredReview,
  toError,
} from '@app/shared-types';
import { renderCsv } from './csv.util';
import {
  COMPARISON_CSV_HEADERS,
  KEYWORD_CSV_HEADERS,
  serializeComparisonRecord,
  serializeComparisonRow,
  serializeKeywordDocument,
  serializeKeywordRow,
  serializeReview,
} from './serializers';

interface PendingFile {
  fileName: string;
  content: string;
}

/**
 * OutputWriterService - Persists every pipeline output under OUTPUT_DIR
 *
 * Each call writes its files to temporary names first and renames them into
 * place only once all of them were written, so a failed run never leaves a
 * half-written table behind. Any file system failure is an OutputWriteError.
 */
@Injectable()
export class OutputWriterService {
  private readonly logger = new Logger(OutputWriterService.name);

  constructor(private readonly pipelineConfig: PipelineConfigService) {}

  get outputDir(): string {
    return this.pipelineConfig.get().outputDir;
  }

  async writeReviews(
    fileName: string,
    reviews: readonly (CleanedReview | ScoredReview)[],
  ): Promise<string> {
    const content = reviews
      .map((review) => JSON.stringify(serializeReview(review)) + '\n')
      .join('');
    const [filePath] = await this.commit([{ fileName, content }]);
    this.logger.log(`Wrote ${reviews.length} reviews -> ${fileName}`);
    return filePath;
  }

  async writeKeywords(entries: readonly KeywordEntry[]): Promise<string[]> {
    const paths = await this.commit([
      {
        fileName: PIPELINE_FILES.KEYWORDS_CSV,
        content: renderCsv(entries.map(serializeKeywordRow), KEYWORD_CSV_HEADERS),
      },
      {
        fileName: PIPELINE_FILES.KEYWORDS_JSON,
        content: this.toJson(serializeKeywordDocument(entries)),
      },
    ]);
    this.logger.log(`Wrote ${entries.length} keyword entries`);
    return paths;
  }

  async writeComparison(records: readonly ComparisonRecord[]): Promise<string[]> {
    const paths = await this.commit([
      {
        fileName: PIPELINE_FILES.COMPARISON_CSV,
        content: renderCsv(
          records.map(serializeComparisonRow),
          COMPARISON_CSV_HEADERS,
        ),
      },
      {
        fileName: PIPELINE_FILES.COMPARISON_JSON,
        content: this.toJson(records.map(serializeComparisonRecord)),
      },
    ]);
    this.logger.log(`Wrote comparison table for ${records.length} products`);
    return paths;
  }

  async writeSummary(summary: RunSummary): Promise<string> {
    const [filePath] = await this.commit([
      { fileName: PIPELINE_FILES.RUN_SUMMARY, content: this.toJson(summary) },
    ]);
    return filePath;
  }

  private toJson(value: unknown): string {
    return JSON.stringify(value, null, 2) + '\n';
  }

  /**
   * Write all files to temporary siblings, then rename them into place
   */
  private async commit(files: readonly PendingFile[]): Promise<string[]> {
    const outputDir = this.outputDir;
    const staged: Array<{ tempPath: string; targetPath: string }> = [];

    try {
      await fs.promises.mkdir(outputDir, { recursive: true });

      for (const file of files) {
        const targetPath = path.join(outputDir, file.fileName);
        const tempPath = `${targetPath}.${process.pid}.tmp`;
        await fs.promises.writeFile(tempPath, file.content, 'utf8');
        staged.push({ tempPath, targetPath });
      }

      for (const { tempPath, targetPath } of staged) {
        await fs.promises.rename(tempPath, targetPath);
      }
    } catch (error) {
      await this.discard(staged.map(({ tempPath }) => tempPath));
      const target = files.map((file) => file.fileName).join(', ');
      throw new OutputWriteError(
        `Cannot write ${target} to ${outputDir}: ${toError(error).message}`,
        outputDir,
        toError(error),
      );
    }

    return staged.map(({ targetPath }) => targetPath);
  }

  private async discard(tempPaths: readonly string[]): Promise<void> {
    for (const tempPath of tempPaths) {
      await fs.promises.rm(tempPath, { force: true }).catch((error: unknown) => {
        this.logger.warn(
          `Could not remove temporary file ${tempPath}: ${toError(error).message}`,
        );
      });
    }
  }
}
