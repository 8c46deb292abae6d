import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import {
  PIPELINE_FILES,
  SourceReadError,
  sanitizeForLog,
  toError,
} from '@app/shared-types';
import { parseRecordFile } from './record-file.util';

/**
 * A raw review file discovered in the input directory
 */
export interface ReviewSource {
  filePath: string;
  fileName: string;
  /** Product id taken from the file name (reviews_<product_id>.json[l]) */
  productIdHint: string;
}

/**
 * Entries read from one source. Unparseable JSON Lines entries are `null`.
 */
export interface ReviewSourceContent {
  source: ReviewSource;
  entries: unknown[];
}

/**
 * ReviewSourceRepository - Discovers and reads raw review files
 *
 * Sources are returned in file-name order so a run never depends on the
 * order in which the file system lists a directory.
 */
@Injectable()
export class ReviewSourceRepository {
  private readonly logger = new Logger(ReviewSourceRepository.name);

  async listSources(inputDir: string): Promise<ReviewSource[]> {
    let fileNames: string[];
    try {
      fileNames = await fs.promises.readdir(inputDir);
    } catch (error) {
      throw new SourceReadError(
        `Cannot list review sources in ${inputDir}: ${toError(error).message}`,
        inputDir,
        toError(error),
      );
    }

    const sources = fileNames
      .map((fileName) => {
        const match = PIPELINE_FILES.REVIEW_SOURCE_PATTERN.exec(fileName);
        return match
          ? {
              filePath: path.join(inputDir, fileName),
              fileName,
              productIdHint: match[1],
            }
          : null;
      })
      .filter((source): source is ReviewSource => source !== null)
      .sort((a, b) => (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0));

    if (sources.length === 0) {
      this.logger.warn(`No review sources found in ${inputDir}`);
    } else {
      this.logger.log(`Found ${sources.length} review sources in ${inputDir}`);
    }

    return sources;
  }

  async read(source: ReviewSource): Promise<ReviewSourceContent> {
    try {
      const content = await fs.promises.readFile(source.filePath, 'utf8');
      const entries = parseRecordFile(source.filePath, content);

      if (entries.length === 0) {
        throw new Error('source contains no records');
      }

      this.logger.debug(
        `Read ${entries.length} entries from ${sanitizeForLog(source.fileName)}`,
      );
      return { source, entries };
    } catch (error) {
      throw new SourceReadError(
        `Cannot read review source ${source.fileName}: ${toError(error).message}`,
        source.filePath,
        toError(error),
      );
    }
  }
}
