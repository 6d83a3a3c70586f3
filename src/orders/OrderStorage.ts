import type { Order, StockRecord } from '../types';
import type { StockWrite } from './StockLedger';

/**
 * An order to persist. expectedHistoryLength guards against a concurrent writer:
 * history is append-only, so its length acts as the order's version (null for a new order).
 */
export interface OrderWrite {
  order: Order;
  expectedHistoryLength: number | null;
}

export interface OrderStorageCommit {
  stock?: StockWrite[];
  order?: OrderWrite;
}

export interface LastUpdatedMarkers {
  orders: string | null;
  stock: string | null;
}

/**
 * Source of truth for orders and stock.
 * commit() applies every write or none, and throws ConcurrencyConflictError
 * when an expected version no longer matches.
 */
export interface OrderStorage {
  getOrder(orderId: string): Promise<Order | null>;
  getOrdersByCustomer(customerEmail: string): Promise<Order[]>;
  listOrders(): Promise<Order[]>;

  getStock(productId: string): Promise<StockRecord | null>;
  getStocks(productIds: string[]): Promise<StockRecord[]>;
  listStock(): Promise<StockRecord[]>;

  commit(change: OrderStorageCommit): Promise<void>;
  getLastUpdated(): Promise<LastUpdatedMarkers>;

  close(): Promise<void>;
}
