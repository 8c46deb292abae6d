import { Injectable, Logger } from '@nestjs/common';
import { PipelineConfigService } from '@app/config';
import { isRecord } from '@app/datastore';
import {
  CleanedReview,
  CleaningCounts,
  RawReviewRecord,
} from '@app/shared-types';
import {
  REVIEW_FIELD_ALIASES,
  coerceIdentifier,
  coerceRating,
  coerceVerified,
  normalizeReviewText,
  parseReviewDate,
  pickField,
} from './review-normalizers';

export interface CleaningResult {
  reviews: CleanedReview[];
  counts: CleaningCounts;
}

export function emptyCleaningCounts(): CleaningCounts {
  return {
    input: 0,
    kept: 0,
    droppedMalformed: 0,
    droppedShortText: 0,
    droppedInvalidRating: 0,
    droppedDuplicateId: 0,
    droppedDuplicateText: 0,
    nullDates: 0,
  };
}

/**
 * CleanerService - Normalizes and filters one product's raw reviews
 *
 * Every record either becomes a CleanedReview or lands in exactly one
 * dropped counter. Checks run in a fixed order (shape, length, rating,
 * duplicate id, duplicate text) and the first occurrence of a duplicate
 * wins, so the same input always yields the same output.
 *
 * Only ids present in the source take part in duplicate-id detection.
 * Reviews without one get `<productId>-<index>`, suffixed when that would
 * collide with an id already in the input.
 */
@Injectable()
export class CleanerService {
  private readonly logger = new Logger(CleanerService.name);

  constructor(private readonly pipelineConfig: PipelineConfigService) {}

  clean(productId: string, entries: readonly unknown[]): CleaningResult {
    const { minLength } = this.pipelineConfig.get().cleaning;
    const counts = emptyCleaningCounts();
    const reviews: CleanedReview[] = [];
    const seenIds = new Set<string>();
    const seenTexts = new Set<string>();
    const takenIds = new Set(
      entries
        .filter(isRecord)
        .map((entry) => this.sourceReviewId(entry))
        .filter((id): id is string => id !== null),
    );

    entries.forEach((entry, index) => {
      counts.input++;

      if (!isRecord(entry)) {
        counts.droppedMalformed++;
        return;
      }

      const text = normalizeReviewText(
        pickField(entry, REVIEW_FIELD_ALIASES.text),
      );
      if (text.length < minLength) {
        counts.droppedShortText++;
        return;
      }

      const rating = coerceRating(pickField(entry, REVIEW_FIELD_ALIASES.rating));
      if (rating === null) {
        counts.droppedInvalidRating++;
        return;
      }

      const sourceId = this.sourceReviewId(entry);
      if (sourceId !== null && seenIds.has(sourceId)) {
        counts.droppedDuplicateId++;
        return;
      }
      if (seenTexts.has(text)) {
        counts.droppedDuplicateText++;
        return;
      }
      const reviewId =
        sourceId ?? this.generateReviewId(productId, index, takenIds);
      seenIds.add(reviewId);
      seenTexts.add(text);

      const date = parseReviewDate(pickField(entry, REVIEW_FIELD_ALIASES.date));
      if (date === null) {
        counts.nullDates++;
      }

      reviews.push({
        reviewId,
        productId,
        rating,
        text,
        verified: coerceVerified(
          pickField(entry, REVIEW_FIELD_ALIASES.verified),
        ),
        date,
      });
    });

    counts.kept = reviews.length;

    this.logger.debug(
      `Cleaned ${productId}: kept ${counts.kept}/${counts.input} ` +
        `(short=${counts.droppedShortText} rating=${counts.droppedInvalidRating} ` +
        `dupId=${counts.droppedDuplicateId} dupText=${counts.droppedDuplicateText} ` +
        `malformed=${counts.droppedMalformed})`,
    );

    return { reviews, counts };
  }

  private sourceReviewId(entry: RawReviewRecord): string | null {
    return coerceIdentifier(pickField(entry, REVIEW_FIELD_ALIASES.reviewId));
  }

  private generateReviewId(
    productId: string,
    index: number,
    takenIds: Set<string>,
  ): string {
    const base = `${productId}-${index}`;
    let candidate = base;
    for (let suffix = 1; takenIds.has(candidate); suffix++) {
      candidate = `${base}-${suffix}`;
    }
    takenIds.add(candidate);
    return candidate;
  }
}
