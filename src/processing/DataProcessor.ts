import { readFile, writeFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { ProductCatalog } from '../catalog';
import type { VibeGenerator } from '../vibes';
import {
  type ChangeSet,
  type EnrichedProduct,
  type ProcessingStats,
  type ProcessOptions,
  type ProductRow,
  type VibeMethod,
  VibeCartError,
} from '../types';
import { computeContentHash } from '../utils';

export interface DataProcessorConfig {
  method?: VibeMethod;
  defaultCurrency?: string;
}

const CsvRecordsSchema = z.array(z.record(z.string()));

function parseNum(value: string | undefined, fallback = 0): number {
  if (!value || value.trim() === '') return fallback;
  const n = Number(value.trim().replace(/,/g, ''));
  return Number.isNaN(n) ? fallback : n;
}

/**
 * Batch ingest with content-hash change detection.
 * Products are always upserted; vibes are generated only where needed.
 */
export class DataProcessor {
  private config: Required<DataProcessorConfig>;

  constructor(
    private catalog: ProductCatalog,
    private generator: VibeGenerator,
    config: DataProcessorConfig = {}
  ) {
    this.config = {
      method: config.method ?? 'hybrid',
      defaultCurrency: config.defaultCurrency ?? 'MYR',
    };
  }

  // ============================================================================
  // Import
  // ============================================================================

  async loadCsv(path: string): Promise<ProductRow[]> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      throw new VibeCartError(`CSV file not found: ${path}`, { cause: error });
    }

    const records = CsvRecordsSchema.parse(
      parse(raw, {
        columns: true,
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
        bom: true,
      })
    );

    const rows = records.map((rec, idx): ProductRow => ({
      productId: rec.product_id || `prod_${String(idx + 1).padStart(4, '0')}`,
      name: rec.product_name ?? '',
      type: rec.product_type ?? '',
      description: rec.product_description ?? '',
      colors: rec.colors_available ?? '',
      material: rec.material ?? '',
      priceMin: parseNum(rec.price_min),
      priceMax: parseNum(rec.price_max),
      currency: rec.price_currency || this.config.defaultCurrency,
      url: rec.product_url ?? '',
      imageUrl: rec.image_url ?? '',
    }));

    console.log(`DataProcessor: loaded ${rows.length} products from ${path}`);
    return rows;
  }

  // ============================================================================
  // Change Detection
  // ============================================================================

  /**
   * Partition rows by comparing their content hash with the stored one
   */
  async detectChanges(rows: ProductRow[]): Promise<ChangeSet> {
    return this.partition(rows);
  }

  /**
   * Without onLookupError a failed hash lookup aborts the partition;
   * with it, the row is reported and left out of every bucket
   */
  private async partition(
    rows: ProductRow[],
    onLookupError?: (row: ProductRow, error: unknown) => void
  ): Promise<ChangeSet> {
    const changes: ChangeSet = { newRows: [], updatedRows: [], unchangedRows: [] };

    for (const row of rows) {
      let storedHash: string | null;
      try {
        storedHash = await this.catalog.products.contentHash(row.productId);
      } catch (error) {
        if (!onLookupError) throw error;
        onLookupError(row, error);
        continue;
      }

      if (storedHash === null) {
        changes.newRows.push(row);
      } else if (storedHash !== computeContentHash(row)) {
        changes.updatedRows.push(row);
      } else {
        changes.unchangedRows.push(row);
      }
    }

    console.log(
      `DataProcessor: ${changes.newRows.length} new, ` +
        `${changes.updatedRows.length} updated, ` +
        `${changes.unchangedRows.length} unchanged`
    );

    return changes;
  }

  // ============================================================================
  // Processing
  // ============================================================================

  async process(rows: ProductRow[], options: ProcessOptions = {}): Promise<ProcessingStats> {
    const start = Date.now();
    const force = options.forceRegenerate ?? false;
    const method = options.method ?? this.config.method;

    // Rows whose stored hash cannot be read are still upserted; only a forced run generates for them
    const lookupFailed = new Set<string>();
    const changes = await this.partition(rows, (row, error) => {
      console.error(`DataProcessor: failed to look up ${row.productId}`, error);
      lookupFailed.add(row.productId);
    });

    const stats: ProcessingStats = {
      total: rows.length,
      newProducts: changes.newRows.length,
      updatedProducts: changes.updatedRows.length,
      unchangedProducts: changes.unchangedRows.length,
      vibesGenerated: 0,
      vibesSkipped: 0,
      errors: lookupFailed.size,
      processingTimeMs: 0,
    };

    // Every row refreshes price, url and updatedAt
    const failed = new Set<string>();
    for (const row of rows) {
      try {
        await this.catalog.products.upsert(row);
      } catch (error) {
        console.error(`DataProcessor: failed to store product ${row.productId}`, error);
        failed.add(row.productId);
        if (!lookupFailed.has(row.productId)) stats.errors++;
      }
    }

    const unchanged = new Set(changes.unchangedRows.map((row) => row.productId));
    const workRows = force ? rows : [...changes.newRows, ...changes.updatedRows];

    // Last occurrence of a repeated id wins, matching the product store
    const workSet = new Map(workRows.map((row) => [row.productId, row]));
    const handled = new Set<string>([...failed, ...lookupFailed]);

    for (const row of workSet.values()) {
      if (failed.has(row.productId)) continue;
      handled.add(row.productId);

      if (!force && unchanged.has(row.productId) && (await this.catalog.vibes.exists(row.productId))) {
        stats.vibesSkipped++;
        continue;
      }

      if (await this.generateAndStore(row, method)) {
        stats.vibesGenerated++;
      } else {
        stats.errors++;
      }
    }

    if (!force) {
      for (const row of changes.unchangedRows) {
        if (handled.has(row.productId)) continue;
        if (await this.catalog.vibes.exists(row.productId)) {
          handled.add(row.productId);
          stats.vibesSkipped++;
        }
      }
    }

    await this.sweepMissingVibes(method, handled, stats);

    stats.processingTimeMs = Date.now() - start;
    console.log(
      `DataProcessor: ${stats.total} rows, ${stats.vibesGenerated} vibes generated, ` +
        `${stats.vibesSkipped} skipped, ${stats.errors} errors in ${stats.processingTimeMs}ms`
    );

    return stats;
  }

  async processCsv(path: string, options: ProcessOptions = {}): Promise<ProcessingStats> {
    const rows = await this.loadCsv(path);
    return this.process(rows, options);
  }

  /**
   * Generate for every stored product that still has no vibes,
   * including ones left over from earlier runs
   */
  private async sweepMissingVibes(
    method: VibeMethod,
    handled: Set<string>,
    stats: ProcessingStats
  ): Promise<void> {
    let missing: string[];
    try {
      missing = await this.catalog.productsWithoutVibes();
    } catch (error) {
      console.error('DataProcessor: could not list products without vibes', error);
      stats.errors++;
      return;
    }

    for (const productId of missing) {
      if (handled.has(productId)) continue;

      try {
        const product = await this.catalog.products.get(productId);
        if (!product) continue;

        if (await this.generateAndStore(product, method)) {
          stats.vibesGenerated++;
        } else {
          stats.errors++;
        }
      } catch (error) {
        console.error(`DataProcessor: failed to read product ${productId}`, error);
        stats.errors++;
      }
    }
  }

  private async generateAndStore(row: ProductRow, method: VibeMethod): Promise<boolean> {
    try {
      const vibe = await this.generator.generate(row, method);
      await this.catalog.vibes.upsert(vibe);
      return true;
    } catch (error) {
      console.error(`DataProcessor: failed to store vibes for ${row.productId}`, error);
      return false;
    }
  }

  // ============================================================================
  // Export
  // ============================================================================

  /**
   * Every stored product merged with its vibes (empty fields when it has none)
   */
  async exportCatalog(): Promise<EnrichedProduct[]> {
    const products = await this.catalog.products.getAll();

    return Promise.all(
      products.map(async (product): Promise<EnrichedProduct> => {
        const vibe = await this.catalog.vibes.get(product.productId);
        return {
          ...product,
          vibeTags: vibe?.vibeTags ?? [],
          moodSummary: vibe?.moodSummary ?? '',
          idealFor: vibe?.idealFor ?? '',
          stylingTip: vibe?.stylingTip ?? '',
          occasions: vibe?.occasions ?? [],
          category: vibe?.category ?? '',
          subcategory: vibe?.subcategory ?? '',
          materials: vibe?.materials ?? [],
          hasEmbellishment: vibe?.hasEmbellishment ?? false,
          styleAttributes: vibe?.styleAttributes ?? [],
          silhouette: vibe?.silhouette ?? '',
        };
      })
    );
  }

  async exportToJson(path: string): Promise<number> {
    const data = await this.exportCatalog();
    await writeFile(path, JSON.stringify(data, null, 2), 'utf8');
    console.log(`DataProcessor: exported ${data.length} products to ${path}`);
    return data.length;
  }
}
