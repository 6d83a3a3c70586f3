import type { StockCheck, StockRecord, StockStatus, StockVariant } from '../types';

export function stockStatusFor(quantity: number, lowStockThreshold: number = 3): StockStatus {
  if (quantity <= 0) return 'out_of_stock';
  if (quantity <= lowStockThreshold) return 'low_stock';
  return 'in_stock';
}

export function findVariant(record: StockRecord, size: string, color: string): StockVariant | undefined {
  const wantedSize = size.toLowerCase();
  const wantedColor = color.toLowerCase();
  return record.variants.find(
    (variant) =>
      variant.size.toLowerCase() === wantedSize && variant.color.toLowerCase() === wantedColor
  );
}

export function totalInventory(variants: StockVariant[]): number {
  return variants.reduce((sum, variant) => sum + variant.quantity, 0);
}

/**
 * A stock record to persist, with the version it must replace (null for a new record)
 */
export interface StockWrite {
  record: StockRecord;
  expectedVersion: number | null;
}

export type StockAdjustment =
  | { ok: true; quantity: number }
  | { ok: false; reason: 'unknown_product' | 'unknown_variant' | 'insufficient'; available: number };

interface JournalEntry {
  record: StockRecord;
  variant: StockVariant;
  delta: number;
}

/**
 * Working copy of the stock records touched by one operation.
 * Every adjustment is journaled so the whole operation can be undone in reverse order;
 * nothing reaches storage until changes() is committed.
 */
export class StockLedger {
  private working: Map<string, StockRecord> = new Map();
  private journal: JournalEntry[] = [];

  constructor(
    records: StockRecord[],
    private lowStockThreshold: number = 3
  ) {
    for (const record of records) {
      this.working.set(record.productId, structuredClone(record));
    }
  }

  has(productId: string): boolean {
    return this.working.has(productId);
  }

  productName(productId: string): string | undefined {
    return this.working.get(productId)?.productName;
  }

  check(productId: string, size: string, color: string, quantity: number): StockCheck {
    const record = this.working.get(productId);
    const variant = record ? findVariant(record, size, color) : undefined;
    if (!variant) return { available: false, currentQuantity: 0 };

    return { available: variant.quantity >= quantity, currentQuantity: variant.quantity };
  }

  apply(productId: string, size: string, color: string, delta: number): StockAdjustment {
    const record = this.working.get(productId);
    if (!record) return { ok: false, reason: 'unknown_product', available: 0 };

    const variant = findVariant(record, size, color);
    if (!variant) return { ok: false, reason: 'unknown_variant', available: 0 };

    const next = variant.quantity + delta;
    if (next < 0) return { ok: false, reason: 'insufficient', available: variant.quantity };

    this.setQuantity(record, variant, next);
    this.journal.push({ record, variant, delta });
    return { ok: true, quantity: next };
  }

  /**
   * Undo every journaled adjustment, newest first
   */
  rollback(): void {
    let entry = this.journal.pop();
    while (entry) {
      this.setQuantity(entry.record, entry.variant, entry.variant.quantity - entry.delta);
      entry = this.journal.pop();
    }
  }

  get pendingAdjustments(): number {
    return this.journal.length;
  }

  /**
   * Records touched since construction, with totals recomputed and versions bumped
   */
  changes(now: string): StockWrite[] {
    const touched = new Set(this.journal.map((entry) => entry.record));
    const writes: StockWrite[] = [];

    for (const record of touched) {
      writes.push({
        record: {
          ...structuredClone(record),
          lastUpdated: now,
          version: record.version + 1,
        },
        expectedVersion: record.version,
      });
    }

    return writes;
  }

  snapshot(productId: string): StockRecord | undefined {
    const record = this.working.get(productId);
    return record ? structuredClone(record) : undefined;
  }

  private setQuantity(record: StockRecord, variant: StockVariant, quantity: number): void {
    variant.quantity = quantity;
    variant.status = stockStatusFor(quantity, this.lowStockThreshold);
    record.totalInventory = totalInventory(record.variants);
  }
}
