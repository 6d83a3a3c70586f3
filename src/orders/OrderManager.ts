import {
  ConcurrencyConflictError,
  type CreateOrderInput,
  type OperationResult,
  type Order,
  type OrderHistoryEntry,
  type OrderItem,
  type OrderItemInput,
  type OrderStatus,
  type OrderUpdates,
  type Rejection,
  type StockCheck,
  type StockRecord,
  StorageError,
} from '../types';
import { KeyedMutex, generateOrderId } from '../utils';
import type { LastUpdatedMarkers, OrderStorage, OrderStorageCommit } from './OrderStorage';
import type { OrderSearchHit, OrderSearchIndex } from './OrderSearchIndex';
import { fail, ok, reject, rejection } from './results';
import { canTransition, isCancellable, isModifiable } from './stateMachine';
import { StockLedger, findVariant, stockStatusFor, totalInventory, type StockWrite } from './StockLedger';

export interface OrderManagerConfig {
  currency?: string;
  lowStockThreshold?: number;
}

export interface StockImport {
  productId: string;
  productName?: string;
  variants: Array<{ size: string; color: string; quantity: number }>;
}

export interface PermissionCheck {
  allowed: boolean;
  reason: string;
}

const orderKey = (orderId: string) => `order:${orderId}`;
const stockKey = (productId: string) => `stock:${productId}`;

/**
 * Orders and per-variant stock.
 * Every read-modify-write runs under per-key locks (order keys sort before stock keys)
 * and is persisted through one atomic commit with version checks.
 */
export class OrderManager {
  private config: Required<OrderManagerConfig>;
  private mutex = new KeyedMutex();

  constructor(
    private storage: OrderStorage,
    private index: OrderSearchIndex | null = null,
    config: OrderManagerConfig = {}
  ) {
    this.config = {
      currency: config.currency ?? 'MYR',
      lowStockThreshold: config.lowStockThreshold ?? 3,
    };
  }

  // ============================================================================
  // Stock
  // ============================================================================

  async checkStock(
    productId: string,
    size: string,
    color: string,
    quantity: number = 1
  ): Promise<StockCheck> {
    const record = await this.read('check stock', () => this.storage.getStock(productId));
    const variant = record ? findVariant(record, size, color) : undefined;
    if (!variant) return { available: false, currentQuantity: 0 };

    return { available: variant.quantity >= quantity, currentQuantity: variant.quantity };
  }

  async updateStock(
    productId: string,
    size: string,
    color: string,
    delta: number
  ): Promise<OperationResult<StockRecord>> {
    if (!Number.isInteger(delta)) {
      return reject<StockRecord>('validation', `Stock change must be a whole number, got ${delta}`);
    }

    return this.guarded('updateStock', () => this.mutex.runExclusive(stockKey(productId), async () => {
      const record = await this.storage.getStock(productId);
      if (!record) {
        return reject<StockRecord>('not_found', `Product ${productId} not found in stock`);
      }

      const ledger = new StockLedger([record], this.config.lowStockThreshold);
      const adjustment = ledger.apply(productId, size, color, delta);

      if (!adjustment.ok) {
        if (adjustment.reason === 'insufficient') {
          return reject<StockRecord>(
            'insufficient_stock',
            `Insufficient stock for ${productId} ${size}/${color}. Only ${adjustment.available} in stock.`,
            { productId, size, color, available: adjustment.available, requested: -delta }
          );
        }
        return reject<StockRecord>('not_found', `Variant ${size}/${color} not found for product ${productId}`);
      }

      const writes = ledger.changes(new Date().toISOString());
      const failure = await this.persist({ stock: writes });
      if (failure) return fail<StockRecord>(failure);

      await this.index?.indexStock(writes.map((write) => write.record));

      const [updated] = writes;
      return ok(updated.record, `Stock for ${productId} ${size}/${color} is now ${adjustment.quantity}`);
    }));
  }

  /**
   * Seed or replace inventory; statuses and totals are derived from quantities
   */
  async importStock(records: StockImport[]): Promise<OperationResult<{ imported: number }>> {
    for (const record of records) {
      if (!record.productId) {
        return reject<{ imported: number }>('validation', 'Stock record is missing productId');
      }
      const bad = record.variants.find((v) => !Number.isInteger(v.quantity) || v.quantity < 0);
      if (bad) {
        return reject<{ imported: number }>(
          'validation',
          `Invalid quantity ${bad.quantity} for ${record.productId} ${bad.size}/${bad.color}`
        );
      }
    }

    const productIds = records.map((record) => record.productId);

    return this.guarded('importStock', () => this.mutex.runExclusive(productIds.map(stockKey), async () => {
      const existing = new Map(
        (await this.storage.getStocks(productIds)).map((record) => [record.productId, record])
      );
      const now = new Date().toISOString();

      const writes = new Map<string, StockWrite>();
      for (const input of records) {
        const previous = existing.get(input.productId);
        const variants = input.variants.map((variant) => ({
          size: variant.size,
          color: variant.color,
          quantity: variant.quantity,
          status: stockStatusFor(variant.quantity, this.config.lowStockThreshold),
        }));

        writes.set(input.productId, {
          record: {
            productId: input.productId,
            productName: input.productName ?? previous?.productName ?? '',
            variants,
            totalInventory: totalInventory(variants),
            lastUpdated: now,
            version: previous ? previous.version + 1 : 1,
          },
          expectedVersion: previous ? previous.version : null,
        });
      }

      const stock = Array.from(writes.values());
      const failure = await this.persist({ stock });
      if (failure) return fail<{ imported: number }>(failure);

      await this.index?.indexStock(stock.map((write) => write.record));
      return ok({ imported: stock.length }, `Imported stock for ${stock.length} products`);
    }));
  }

  // ============================================================================
  // Orders
  // ============================================================================

  async createOrder(input: CreateOrderInput): Promise<OperationResult<Order>> {
    const invalid = validateItems(input.items);
    if (invalid) return reject<Order>('validation', invalid);

    if (!input.customerName.trim() || !input.customerEmail.trim()) {
      return reject<Order>('validation', 'Customer name and email are required');
    }

    const productIds = input.items.map((item) => item.productId);

    return this.guarded('createOrder', () => this.mutex.runExclusive(productIds.map(stockKey), async () => {
      const ledger = new StockLedger(
        await this.storage.getStocks(productIds),
        this.config.lowStockThreshold
      );

      const unavailable = reserveItems(ledger, input.items);
      if (unavailable) {
        ledger.rollback();
        return fail<Order>(unavailable);
      }

      const now = new Date().toISOString();
      const items = input.items.map((item) => toOrderItem(item, ledger));
      const order: Order = {
        orderId: generateOrderId(),
        customerName: input.customerName,
        customerEmail: input.customerEmail,
        items,
        totalAmount: orderTotal(items),
        currency: input.currency ?? this.config.currency,
        shippingAddress: input.shippingAddress ?? '',
        notes: input.notes ?? '',
        status: 'pending',
        createdAt: now,
        updatedAt: now,
        history: [historyEntry('created', 'Order created', now)],
      };

      const stock = ledger.changes(now);
      const failure = await this.persist({ stock, order: { order, expectedHistoryLength: null } });
      if (failure) return fail<Order>(failure);

      await this.reindex(order, stock);
      return ok(
        order,
        `Order ${order.orderId} created successfully! Total: ${order.currency} ${order.totalAmount.toFixed(2)}`
      );
    }));
  }

  async modifyOrder(orderId: string, updates: OrderUpdates): Promise<OperationResult<Order>> {
    if (
      updates.items === undefined &&
      updates.shippingAddress === undefined &&
      updates.notes === undefined &&
      updates.status === undefined
    ) {
      return reject<Order>('validation', 'No changes requested');
    }

    if (updates.items !== undefined) {
      const invalid = validateItems(updates.items);
      if (invalid) return reject<Order>('validation', invalid);
    }

    if (updates.status === 'cancelled') {
      return reject<Order>('invalid_transition', `Use cancelOrder to cancel order ${orderId}`);
    }

    return this.guarded('modifyOrder', () => this.mutex.runExclusive(orderKey(orderId), async () => {
      const current = await this.storage.getOrder(orderId);
      if (!current) return reject<Order>('not_found', `Order ${orderId} not found.`);

      if (!isModifiable(current.status)) {
        return reject<Order>(
          'invalid_state',
          `Order ${orderId} cannot be modified. Status: ${current.status}`,
          { status: current.status }
        );
      }

      if (updates.status !== undefined && updates.status !== current.status) {
        if (!canTransition(current.status, updates.status)) {
          return reject<Order>(
            'invalid_transition',
            `Cannot change order ${orderId} from ${current.status} to ${updates.status}`,
            { from: current.status, to: updates.status }
          );
        }
      }

      const newItems = updates.items;
      if (newItems === undefined) {
        return this.saveModification(current, updates, [], null);
      }

      const productIds = [...current.items, ...newItems].map((item) => item.productId);

      return this.mutex.runExclusive(productIds.map(stockKey), async () => {
        const ledger = new StockLedger(
          await this.storage.getStocks(productIds),
          this.config.lowStockThreshold
        );

        // Release the original reservation first so the new items can reuse it
        for (const item of current.items) {
          const restored = ledger.apply(item.productId, item.size, item.color, item.quantity);
          if (!restored.ok) {
            ledger.rollback();
            return reject<Order>(
              'invalid_state',
              `Stock for ${item.productName} in ${item.size}/${item.color} no longer exists`
            );
          }
        }

        const unavailable = reserveItems(ledger, newItems);
        if (unavailable) {
          ledger.rollback();
          return fail<Order>(unavailable);
        }

        const items = newItems.map((item) => toOrderItem(item, ledger));
        return this.saveModification(current, updates, items, ledger);
      });
    }));
  }

  async cancelOrder(orderId: string, reason: string = ''): Promise<OperationResult<Order>> {
    return this.guarded('cancelOrder', () => this.mutex.runExclusive(orderKey(orderId), async () => {
      const current = await this.storage.getOrder(orderId);
      if (!current) return reject<Order>('not_found', `Order ${orderId} not found.`);

      if (!isCancellable(current.status)) {
        return reject<Order>(
          'invalid_state',
          `Order ${orderId} cannot be cancelled. Status: ${current.status}`,
          { status: current.status }
        );
      }

      const productIds = current.items.map((item) => item.productId);

      return this.mutex.runExclusive(productIds.map(stockKey), async () => {
        const ledger = new StockLedger(
          await this.storage.getStocks(productIds),
          this.config.lowStockThreshold
        );

        for (const item of current.items) {
          const restored = ledger.apply(item.productId, item.size, item.color, item.quantity);
          if (!restored.ok) {
            ledger.rollback();
            return reject<Order>(
              'invalid_state',
              `Stock for ${item.productName} in ${item.size}/${item.color} no longer exists`
            );
          }
        }

        const now = new Date().toISOString();
        const order: Order = {
          ...current,
          status: 'cancelled',
          updatedAt: now,
          history: [
            ...current.history,
            historyEntry('cancelled', reason ? `Order cancelled. Reason: ${reason}` : 'Order cancelled', now),
          ],
        };

        const stock = ledger.changes(now);
        const failure = await this.persist({
          stock,
          order: { order, expectedHistoryLength: current.history.length },
        });
        if (failure) return fail<Order>(failure);

        await this.reindex(order, stock);
        return ok(order, `Order ${orderId} has been cancelled. Stock has been restored.`);
      });
    }));
  }

  /**
   * Move an order along the status state machine.
   * Cancellation is delegated to cancelOrder so stock is restored.
   */
  async transitionStatus(orderId: string, status: OrderStatus): Promise<OperationResult<Order>> {
    if (status === 'cancelled') {
      return this.cancelOrder(orderId);
    }

    return this.guarded('transitionStatus', () => this.mutex.runExclusive(orderKey(orderId), async () => {
      const current = await this.storage.getOrder(orderId);
      if (!current) return reject<Order>('not_found', `Order ${orderId} not found.`);

      if (!canTransition(current.status, status)) {
        return reject<Order>(
          'invalid_transition',
          `Cannot change order ${orderId} from ${current.status} to ${status}`,
          { from: current.status, to: status }
        );
      }

      const now = new Date().toISOString();
      const order: Order = {
        ...current,
        status,
        updatedAt: now,
        history: [
          ...current.history,
          historyEntry('status_changed', `Status changed from ${current.status} to ${status}`, now),
        ],
      };

      const failure = await this.persist({
        order: { order, expectedHistoryLength: current.history.length },
      });
      if (failure) return fail<Order>(failure);

      await this.index?.indexOrder(order);
      return ok(order, `Order ${orderId} is now ${status}`);
    }));
  }

  async canModifyOrder(orderId: string): Promise<PermissionCheck> {
    const order = await this.read('load order', () => this.storage.getOrder(orderId));
    if (!order) return { allowed: false, reason: 'Order not found' };

    if (isModifiable(order.status)) {
      return { allowed: true, reason: 'Order can be modified' };
    }
    return { allowed: false, reason: `Order is already ${order.status} and cannot be modified` };
  }

  async canCancelOrder(orderId: string): Promise<PermissionCheck> {
    const order = await this.read('load order', () => this.storage.getOrder(orderId));
    if (!order) return { allowed: false, reason: 'Order not found' };

    if (isCancellable(order.status)) {
      return { allowed: true, reason: 'Order can be cancelled' };
    }
    return { allowed: false, reason: `Order is already ${order.status}` };
  }

  // ============================================================================
  // Read Side
  // ============================================================================

  async getOrder(orderId: string): Promise<Order | null> {
    return this.read('load order', () => this.storage.getOrder(orderId));
  }

  async getOrdersByCustomer(customerEmail: string): Promise<Order[]> {
    return this.read('load customer orders', () => this.storage.getOrdersByCustomer(customerEmail));
  }

  async getOrderStatus(orderId: string): Promise<OrderStatus | null> {
    const order = await this.getOrder(orderId);
    return order ? order.status : null;
  }

  async getStockForProduct(productId: string): Promise<StockRecord | null> {
    return this.read('load stock', () => this.storage.getStock(productId));
  }

  async getLastUpdated(): Promise<LastUpdatedMarkers> {
    return this.read('load markers', () => this.storage.getLastUpdated());
  }

  async searchOrders(text: string, k: number = 5): Promise<OrderSearchHit[]> {
    if (!this.index) return [];
    return this.index.searchOrders(text, k);
  }

  /**
   * Rebuild the text index from the order storage
   */
  async rebuildIndex(): Promise<{ orders: number; stock: number }> {
    if (!this.index) return { orders: 0, stock: 0 };

    const [orders, stock] = await Promise.all([
      this.storage.listOrders(),
      this.storage.listStock(),
    ]);
    return this.index.rebuild(orders, stock);
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async saveModification(
    current: Order,
    updates: OrderUpdates,
    items: OrderItem[],
    ledger: StockLedger | null
  ): Promise<OperationResult<Order>> {
    const changes: string[] = [];
    const order: Order = { ...current };

    if (ledger) {
      order.items = items;
      order.totalAmount = orderTotal(items);
      changes.push(`Items updated. New total: ${order.currency} ${order.totalAmount.toFixed(2)}`);
    }

    if (updates.shippingAddress !== undefined) {
      order.shippingAddress = updates.shippingAddress;
      changes.push('Shipping address updated');
    }

    if (updates.notes !== undefined) {
      order.notes = updates.notes;
      changes.push('Notes updated');
    }

    if (updates.status !== undefined && updates.status !== current.status) {
      order.status = updates.status;
      changes.push(`Status changed to ${updates.status}`);
    }

    if (changes.length === 0) {
      return reject<Order>('validation', `No changes to apply to order ${current.orderId}`);
    }

    const now = new Date().toISOString();
    order.updatedAt = now;
    order.history = [...current.history, historyEntry('modified', changes.join('; '), now)];

    const stock = ledger ? ledger.changes(now) : [];
    const failure = await this.persist({
      stock,
      order: { order, expectedHistoryLength: current.history.length },
    });
    if (failure) return fail<Order>(failure);

    await this.reindex(order, stock);
    return ok(order, `Order ${current.orderId} updated: ${changes.join('; ')}`);
  }

  /**
   * Storage faults inside an operation become a storage rejection; the fault is only logged
   */
  private async guarded<T>(
    operation: string,
    fn: () => Promise<OperationResult<T>>
  ): Promise<OperationResult<T>> {
    try {
      return await fn();
    } catch (error) {
      console.error(`OrderManager: ${operation} failed`, error);
      return reject<T>('storage', 'Unable to reach the order store right now. Please try again.');
    }
  }

  /**
   * Read-side faults are logged and rethrown as a StorageError with a generic message
   */
  private async read<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      console.error(`OrderManager: failed to ${what}`, error);
      throw new StorageError('order store unavailable', error);
    }
  }

  /**
   * Returns a rejection when the commit did not happen, otherwise null
   */
  private async persist(change: OrderStorageCommit): Promise<Rejection | null> {
    try {
      await this.storage.commit(change);
      return null;
    } catch (error) {
      if (error instanceof ConcurrencyConflictError) {
        console.warn('OrderManager: commit lost a race', error.message);
        return rejection('conflict', 'The order or stock was changed by another request. Please try again.');
      }
      console.error('OrderManager: failed to persist changes', error);
      return rejection('storage', 'Unable to save changes right now. Please try again.');
    }
  }

  private async reindex(order: Order, stock: StockWrite[]): Promise<void> {
    if (!this.index) return;
    await Promise.all([
      this.index.indexOrder(order),
      this.index.indexStock(stock.map((write) => write.record)),
    ]);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function validateItems(items: OrderItemInput[]): string | null {
  if (items.length === 0) return 'An order needs at least one item';

  for (const item of items) {
    if (!item.productId) return 'Every item needs a productId';
    if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
      return `Invalid quantity ${item.quantity} for ${item.productName ?? item.productId}`;
    }
    if (!Number.isFinite(item.price) || item.price < 0) {
      return `Invalid price ${item.price} for ${item.productName ?? item.productId}`;
    }
  }
  return null;
}

/**
 * Check the summed demand per variant, then reserve each item.
 * Returns the rejection for the first variant that cannot be served.
 */
function reserveItems(ledger: StockLedger, items: OrderItemInput[]): Rejection | null {
  const demand = new Map<string, { item: OrderItemInput; quantity: number }>();
  for (const item of items) {
    const key = `${item.productId}\u0000${item.size.toLowerCase()}\u0000${item.color.toLowerCase()}`;
    const entry = demand.get(key);
    if (entry) {
      entry.quantity += item.quantity;
    } else {
      demand.set(key, { item, quantity: item.quantity });
    }
  }

  for (const { item, quantity } of demand.values()) {
    const check = ledger.check(item.productId, item.size, item.color, quantity);
    if (!check.available) {
      return unavailableItem(ledger, item, quantity, check.currentQuantity);
    }
  }

  for (const item of items) {
    const reserved = ledger.apply(item.productId, item.size, item.color, -item.quantity);
    if (!reserved.ok) {
      return unavailableItem(ledger, item, item.quantity, reserved.available);
    }
  }

  return null;
}

function unavailableItem(
  ledger: StockLedger,
  item: OrderItemInput,
  requested: number,
  available: number
): Rejection {
  const name = item.productName ?? ledger.productName(item.productId) ?? 'item';
  const known = ledger.has(item.productId) && ledger.check(item.productId, item.size, item.color, 0).available;

  return rejection(
    known ? 'insufficient_stock' : 'validation',
    `Sorry, ${name} in ${item.size}/${item.color} is not available. Only ${available} in stock.`,
    { productId: item.productId, size: item.size, color: item.color, available, requested }
  );
}

function toOrderItem(item: OrderItemInput, ledger: StockLedger): OrderItem {
  return {
    productId: item.productId,
    productName: item.productName ?? ledger.productName(item.productId) ?? '',
    size: item.size,
    color: item.color,
    quantity: item.quantity,
    price: item.price,
    subtotal: item.price * item.quantity,
  };
}

function orderTotal(items: OrderItem[]): number {
  return items.reduce((sum, item) => sum + item.subtotal, 0);
}

function historyEntry(action: string, details: string, timestamp: string): OrderHistoryEntry {
  return { action, timestamp, details };
}
