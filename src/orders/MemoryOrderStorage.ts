import { ConcurrencyConflictError, type Order, type StockRecord } from '../types';
import type { LastUpdatedMarkers, OrderStorage, OrderStorageCommit } from './OrderStorage';

/**
 * In-memory order storage (useful for testing and development).
 * Records are cloned on the way in and out so callers never share state with the store.
 */
export class MemoryOrderStorage implements OrderStorage {
  private orders: Map<string, Order> = new Map();
  private stock: Map<string, StockRecord> = new Map();
  private markers: LastUpdatedMarkers = { orders: null, stock: null };

  async getOrder(orderId: string): Promise<Order | null> {
    const order = this.orders.get(orderId);
    return order ? structuredClone(order) : null;
  }

  async getOrdersByCustomer(customerEmail: string): Promise<Order[]> {
    return Array.from(this.orders.values())
      .filter((order) => order.customerEmail === customerEmail)
      .map((order) => structuredClone(order));
  }

  async listOrders(): Promise<Order[]> {
    return Array.from(this.orders.values(), (order) => structuredClone(order));
  }

  async getStock(productId: string): Promise<StockRecord | null> {
    const record = this.stock.get(productId);
    return record ? structuredClone(record) : null;
  }

  async getStocks(productIds: string[]): Promise<StockRecord[]> {
    const found: StockRecord[] = [];
    for (const productId of new Set(productIds)) {
      const record = this.stock.get(productId);
      if (record) found.push(structuredClone(record));
    }
    return found;
  }

  async listStock(): Promise<StockRecord[]> {
    return Array.from(this.stock.values(), (record) => structuredClone(record));
  }

  async commit(change: OrderStorageCommit): Promise<void> {
    const stockWrites = change.stock ?? [];

    // Verify every expectation before touching anything
    for (const write of stockWrites) {
      const current = this.stock.get(write.record.productId);
      const currentVersion = current ? current.version : null;
      if (currentVersion !== write.expectedVersion) {
        throw new ConcurrencyConflictError(`stock:${write.record.productId}`);
      }
    }

    if (change.order) {
      const current = this.orders.get(change.order.order.orderId);
      const currentLength = current ? current.history.length : null;
      if (currentLength !== change.order.expectedHistoryLength) {
        throw new ConcurrencyConflictError(`order:${change.order.order.orderId}`);
      }
    }

    const now = new Date().toISOString();

    for (const write of stockWrites) {
      this.stock.set(write.record.productId, structuredClone(write.record));
    }
    if (stockWrites.length > 0) {
      this.markers.stock = laterOf(this.markers.stock, now);
    }

    if (change.order) {
      this.orders.set(change.order.order.orderId, structuredClone(change.order.order));
      this.markers.orders = laterOf(this.markers.orders, now);
    }
  }

  async getLastUpdated(): Promise<LastUpdatedMarkers> {
    return { ...this.markers };
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  /**
   * Clear all data (useful for testing)
   */
  clear(): void {
    this.orders.clear();
    this.stock.clear();
    this.markers = { orders: null, stock: null };
  }
}

/**
 * Markers never move backwards, even if the clock does
 */
export function laterOf(previous: string | null, next: string): string {
  return previous !== null && previous > next ? previous : next;
}
