import { z } from 'zod';
import type { VectorCollection, VectorStore } from '../storage';
import type { Order, StockRecord } from '../types';

const OrderIndexSchema = z.object({
  orderId: z.string(),
  customerName: z.string(),
  customerEmail: z.string(),
  status: z.string(),
  totalAmount: z.number(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const StockIndexSchema = z.object({
  productId: z.string(),
  productName: z.string(),
  totalInventory: z.number(),
  lastUpdated: z.string(),
});

export type OrderIndexEntry = z.infer<typeof OrderIndexSchema>;
export type StockIndexEntry = z.infer<typeof StockIndexSchema>;

export interface OrderSearchHit extends OrderIndexEntry {
  similarity: number;
}

export function orderDocumentText(order: Order): string {
  const items = order.items
    .map((item) => `${item.productName} (${item.size}/${item.color})`)
    .join(', ');
  return `Order ${order.orderId} for ${order.customerName}. Items: ${items}. Total: ${order.totalAmount} ${order.currency}. Status: ${order.status}`;
}

export function stockDocumentText(record: StockRecord): string {
  return `Product ${record.productName || record.productId} - Total inventory: ${record.totalInventory}`;
}

/**
 * Derived text index over orders and stock.
 * The order storage stays the source of truth; this index can be rebuilt from it
 * at any time, so write failures here are logged and never fail an operation.
 */
export class OrderSearchIndex {
  private orders: VectorCollection<OrderIndexEntry>;
  private stock: VectorCollection<StockIndexEntry>;

  constructor(store: VectorStore, collectionPrefix: string) {
    this.orders = store.collection(`${collectionPrefix}_orders_index`, OrderIndexSchema);
    this.stock = store.collection(`${collectionPrefix}_stock_index`, StockIndexSchema);
  }

  async indexOrder(order: Order): Promise<void> {
    try {
      await this.orders.upsert([toOrderRecord(order)]);
    } catch (error) {
      console.error(`OrderSearchIndex: failed to index order ${order.orderId}`, error);
    }
  }

  async indexStock(records: StockRecord[]): Promise<void> {
    if (records.length === 0) return;
    try {
      await this.stock.upsert(records.map(toStockRecord));
    } catch (error) {
      console.error('OrderSearchIndex: failed to index stock', error);
    }
  }

  async searchOrders(text: string, k: number = 5): Promise<OrderSearchHit[]> {
    const matches = await this.orders.query(text, k);
    return matches.map((match) => ({ ...match.metadata, similarity: 1 - match.distance }));
  }

  async searchStock(text: string, k: number = 5): Promise<Array<StockIndexEntry & { similarity: number }>> {
    const matches = await this.stock.query(text, k);
    return matches.map((match) => ({ ...match.metadata, similarity: 1 - match.distance }));
  }

  /**
   * Replace the whole index with the given snapshot
   */
  async rebuild(orders: Order[], stock: StockRecord[]): Promise<{ orders: number; stock: number }> {
    await Promise.all([this.orders.clear(), this.stock.clear()]);
    if (orders.length > 0) await this.orders.upsert(orders.map(toOrderRecord));
    if (stock.length > 0) await this.stock.upsert(stock.map(toStockRecord));
    return { orders: orders.length, stock: stock.length };
  }
}

function toOrderRecord(order: Order) {
  return {
    id: order.orderId,
    document: orderDocumentText(order),
    metadata: {
      orderId: order.orderId,
      customerName: order.customerName,
      customerEmail: order.customerEmail,
      status: order.status,
      totalAmount: order.totalAmount,
      createdAt: order.createdAt,
      updatedAt: order.updatedAt,
    },
  };
}

function toStockRecord(record: StockRecord) {
  return {
    id: record.productId,
    document: stockDocumentText(record),
    metadata: {
      productId: record.productId,
      productName: record.productName,
      totalInventory: record.totalInventory,
      lastUpdated: record.lastUpdated,
    },
  };
}
