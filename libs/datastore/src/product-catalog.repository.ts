import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import { z } from 'zod';
import {
  CatalogLoadError,
  Product,
  sanitizeForLog,
  toError,
  TransientError,
  isTransientFsError,
} from '@app/shared-types';
import { parseRecordFile } from './record-file.util';

const identifier = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1, 'product_id must not be empty'));

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    const text = String(value).trim();
    return text.length > 0 ? text : null;
  });

/**
 * Product reference record as stored on disk.
 * `size_variant` is accepted as an alias of `size`.
 */
const productRecordSchema = z.object({
  product_id: identifier,
  brand: optionalText,
  product_name: optionalText,
  flavor: optionalText,
  size: optionalText,
  size_variant: optionalText,
  notes: optionalText,
});

/**
 * ProductCatalogRepository - Loads the static product reference table
 *
 * The catalog is the one input a run cannot do without, so every failure
 * here (missing file, bad JSON, schema violation, duplicate ids) surfaces as
 * a CatalogLoadError and aborts the run. Busy or exhausted file handles are
 * reported as a TransientError instead.
 */
@Injectable()
export class ProductCatalogRepository {
  private readonly logger = new Logger(ProductCatalogRepository.name);

  async load(filePath: string): Promise<Product[]> {
    let entries: unknown[];
    try {
      const content = await fs.promises.readFile(filePath, 'utf8');
      entries = parseRecordFile(filePath, content);
    } catch (error) {
      if (isTransientFsError(error)) {
        throw new TransientError(
          `Product catalog ${filePath} is temporarily unavailable: ${toError(error).message}`,
          toError(error),
        );
      }
      throw new CatalogLoadError(
        `Cannot read product catalog ${filePath}: ${toError(error).message}`,
        toError(error),
      );
    }

    const products: Product[] = [];
    const seen = new Set<string>();

    entries.forEach((entry, index) => {
      const result = productRecordSchema.safeParse(entry);
      if (!result.success) {
        const issues = result.error.issues
          .map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`)
          .join('; ');
        throw new CatalogLoadError(
          `Invalid product record at index ${index} in ${filePath}: ${issues}`,
        );
      }

      const record = result.data;
      if (seen.has(record.product_id)) {
        throw new CatalogLoadError(
          `Duplicate product_id "${sanitizeForLog(record.product_id)}" in ${filePath}`,
        );
      }
      seen.add(record.product_id);

      products.push({
        productId: record.product_id,
        brand: record.brand ?? '',
        productName: record.product_name ?? '',
        flavor: record.flavor,
        size: record.size ?? record.size_variant,
        notes: record.notes,
      });
    });

    if (products.length === 0) {
      this.logger.warn(`Product catalog ${filePath} is empty`);
    } else {
      this.logger.log(`Loaded ${products.length} products from ${filePath}`);
    }

    return products;
  }
}
