import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MemoryOrderStorage, OrderManager, OrderSearchIndex } from '../../src/orders';
import { MemoryVectorStore } from '../../src/storage';
import {
  ConcurrencyConflictError,
  StorageError,
  type Order,
  type OrderItemInput,
} from '../../src/types';
import { ConceptEmbeddings } from '../helpers/ConceptEmbeddings';
import { expectOk, expectRejected } from '../helpers/results';

const customer = {
  customerName: 'Test Customer',
  customerEmail: 'customer@example.test',
};

function item(overrides: Partial<OrderItemInput> = {}): OrderItemInput {
  return { productId: 'coco', size: 'M', color: 'Black', quantity: 2, price: 150, ...overrides };
}

describe('OrderManager', () => {
  let storage: MemoryOrderStorage;
  let manager: OrderManager;

  async function seedStock(target: OrderManager = manager): Promise<void> {
    expectOk(
      await target.importStock([
        {
          productId: 'coco',
          productName: 'Coco Dress',
          variants: [
            { size: 'M', color: 'Black', quantity: 5 },
            { size: 'S', color: 'Red', quantity: 2 },
          ],
        },
        {
          productId: 'luna',
          productName: 'Luna Heel',
          variants: [{ size: '38', color: 'Gold', quantity: 3 }],
        },
      ])
    );
  }

  async function quantityOf(productId: string, size: string, color: string): Promise<number> {
    return (await manager.checkStock(productId, size, color)).currentQuantity;
  }

  async function placeOrder(items: OrderItemInput[] = [item()]): Promise<Order> {
    return expectOk(await manager.createOrder({ ...customer, items }));
  }

  beforeEach(async () => {
    storage = new MemoryOrderStorage();
    manager = new OrderManager(storage);
    await seedStock();
  });

  // ============================================================================
  // Stock
  // ============================================================================

  describe('checkStock', () => {
    it('should match variants case-insensitively', async () => {
      expect(await manager.checkStock('coco', 'm', 'BLACK', 5)).toEqual({
        available: true,
        currentQuantity: 5,
      });
      expect(await manager.checkStock('coco', 'M', 'Black', 6)).toEqual({
        available: false,
        currentQuantity: 5,
      });
    });

    it('should default to a quantity of one', async () => {
      expect(await manager.checkStock('coco', 'S', 'Red')).toEqual({
        available: true,
        currentQuantity: 2,
      });
    });

    it('should report unknown products and variants as unavailable', async () => {
      expect(await manager.checkStock('ghost', 'M', 'Black')).toEqual({
        available: false,
        currentQuantity: 0,
      });
      expect(await manager.checkStock('coco', 'XL', 'Blue')).toEqual({
        available: false,
        currentQuantity: 0,
      });
    });
  });

  describe('importStock', () => {
    it('should derive statuses, totals and versions', async () => {
      expect(await manager.getStockForProduct('coco')).toMatchObject({
        productName: 'Coco Dress',
        variants: [
          { size: 'M', color: 'Black', quantity: 5, status: 'in_stock' },
          { size: 'S', color: 'Red', quantity: 2, status: 'low_stock' },
        ],
        totalInventory: 7,
        version: 1,
      });
    });

    it('should bump the version and keep the name when re-imported', async () => {
      const result = await manager.importStock([
        { productId: 'coco', variants: [{ size: 'M', color: 'Black', quantity: 0 }] },
      ]);

      expect(result).toEqual({
        ok: true,
        value: { imported: 1 },
        message: 'Imported stock for 1 products',
      });
      expect(await manager.getStockForProduct('coco')).toMatchObject({
        productName: 'Coco Dress',
        variants: [{ size: 'M', color: 'Black', quantity: 0, status: 'out_of_stock' }],
        totalInventory: 0,
        version: 2,
      });
    });

    it('should reject negative quantities', async () => {
      const error = expectRejected(
        await manager.importStock([
          { productId: 'coco', variants: [{ size: 'M', color: 'Black', quantity: -1 }] },
        ])
      );

      expect(error).toEqual({ kind: 'validation', message: 'Invalid quantity -1 for coco M/Black' });
      expect(await quantityOf('coco', 'M', 'Black')).toBe(5);
    });
  });

  describe('updateStock', () => {
    it('should apply a delta and recompute status and total', async () => {
      const result = await manager.updateStock('coco', 'M', 'Black', -2);

      expect(result).toMatchObject({ ok: true, message: 'Stock for coco M/Black is now 3' });
      expect(expectOk(result)).toMatchObject({
        variants: [
          { size: 'M', color: 'Black', quantity: 3, status: 'low_stock' },
          { size: 'S', color: 'Red', quantity: 2, status: 'low_stock' },
        ],
        totalInventory: 5,
        version: 2,
      });
      expect(await quantityOf('coco', 'M', 'Black')).toBe(3);
    });

    it('should restock', async () => {
      const record = expectOk(await manager.updateStock('luna', '38', 'gold', 10));

      expect(record.variants[0]).toEqual({ size: '38', color: 'Gold', quantity: 13, status: 'in_stock' });
    });

    it('should never let a variant go below zero', async () => {
      expectOk(await manager.updateStock('luna', '38', 'Gold', -3));
      const error = expectRejected(await manager.updateStock('luna', '38', 'Gold', -1));

      expect(error).toEqual({
        kind: 'insufficient_stock',
        message: 'Insufficient stock for luna 38/Gold. Only 0 in stock.',
        details: { productId: 'luna', size: '38', color: 'Gold', available: 0, requested: 1 },
      });
      expect(await manager.getStockForProduct('luna')).toMatchObject({
        variants: [{ quantity: 0, status: 'out_of_stock' }],
        version: 2,
      });
    });

    it('should reject a decrement larger than the stock without changing it', async () => {
      const before = await manager.getStockForProduct('coco');

      const error = expectRejected(await manager.updateStock('coco', 'M', 'Black', -6));

      expect(error.message).toBe('Insufficient stock for coco M/Black. Only 5 in stock.');
      expect(await manager.getStockForProduct('coco')).toEqual(before);
    });

    it('should reject unknown products and variants', async () => {
      expect(expectRejected(await manager.updateStock('ghost', 'M', 'Black', 1))).toEqual({
        kind: 'not_found',
        message: 'Product ghost not found in stock',
      });
      expect(expectRejected(await manager.updateStock('coco', 'XL', 'Blue', 1))).toEqual({
        kind: 'not_found',
        message: 'Variant XL/Blue not found for product coco',
      });
    });

    it('should reject fractional deltas', async () => {
      expect(expectRejected(await manager.updateStock('coco', 'M', 'Black', 1.5)).kind).toBe(
        'validation'
      );
    });
  });

  // ============================================================================
  // Create
  // ============================================================================

  describe('createOrder', () => {
    it('should reserve stock and create a pending order', async () => {
      const result = await manager.createOrder({ ...customer, items: [item()] });
      const order = expectOk(result);

      expect(order.orderId).toMatch(/^ORD-\d{8}-[0-9A-F]{6}$/);
      expect(order).toMatchObject({
        ...customer,
        items: [
          {
            productId: 'coco',
            productName: 'Coco Dress',
            size: 'M',
            color: 'Black',
            quantity: 2,
            price: 150,
            subtotal: 300,
          },
        ],
        totalAmount: 300,
        currency: 'MYR',
        shippingAddress: '',
        notes: '',
        status: 'pending',
      });
      expect(order.history).toEqual([
        { action: 'created', timestamp: order.createdAt, details: 'Order created' },
      ]);
      expect(result).toMatchObject({
        message: `Order ${order.orderId} created successfully! Total: MYR 300.00`,
      });
      expect(await quantityOf('coco', 'M', 'Black')).toBe(3);
      expect(await manager.getStockForProduct('coco')).toMatchObject({
        variants: [{ quantity: 3, status: 'low_stock' }, { quantity: 2 }],
        totalInventory: 5,
      });
      expect(await manager.getOrder(order.orderId)).toEqual(order);
    });

    it('should keep the order total equal to the sum of subtotals', async () => {
      const order = await placeOrder([
        item({ quantity: 2, price: 150 }),
        item({ productId: 'luna', size: '38', color: 'Gold', quantity: 1, price: 89.9 }),
      ]);

      for (const line of order.items) {
        expect(line.subtotal).toBe(line.price * line.quantity);
      }
      expect(order.totalAmount).toBe(order.items.reduce((sum, line) => sum + line.subtotal, 0));
      expect(order.totalAmount).toBeCloseTo(389.9);
    });

    it('should reject an order larger than the stock and leave stock untouched', async () => {
      const error = expectRejected(
        await manager.createOrder({
          ...customer,
          items: [item({ productId: 'luna', size: '38', color: 'Gold', quantity: 10 })],
        })
      );

      expect(error).toEqual({
        kind: 'insufficient_stock',
        message: 'Sorry, Luna Heel in 38/Gold is not available. Only 3 in stock.',
        details: { productId: 'luna', size: '38', color: 'Gold', available: 3, requested: 10 },
      });
      expect(await quantityOf('luna', '38', 'Gold')).toBe(3);
      expect(await storage.listOrders()).toEqual([]);
    });

    it('should add up demand for the same variant across lines', async () => {
      const error = expectRejected(
        await manager.createOrder({
          ...customer,
          items: [item({ quantity: 3 }), item({ size: 'm', color: 'BLACK', quantity: 3 })],
        })
      );

      expect(error.message).toBe('Sorry, Coco Dress in M/Black is not available. Only 5 in stock.');
      expect(error.details).toMatchObject({ available: 5, requested: 6 });
      expect(await quantityOf('coco', 'M', 'Black')).toBe(5);
    });

    it('should validate every line before reserving any', async () => {
      expectRejected(
        await manager.createOrder({
          ...customer,
          items: [item({ quantity: 1 }), item({ productId: 'luna', size: '38', color: 'Gold', quantity: 4 })],
        })
      );

      expect(await quantityOf('coco', 'M', 'Black')).toBe(5);
      expect(await quantityOf('luna', '38', 'Gold')).toBe(3);
    });

    it('should reject unknown products as invalid input', async () => {
      const error = expectRejected(
        await manager.createOrder({
          ...customer,
          items: [item({ productId: 'ghost', productName: 'Ghost Dress' })],
        })
      );

      expect(error.kind).toBe('validation');
      expect(error.message).toBe('Sorry, Ghost Dress in M/Black is not available. Only 0 in stock.');
    });

    const malformed: Array<[OrderItemInput[], string]> = [
      [[], 'An order needs at least one item'],
      [[item({ quantity: 0 })], 'Invalid quantity 0 for coco'],
      [[item({ quantity: 1.5 })], 'Invalid quantity 1.5 for coco'],
      [[item({ price: -1 })], 'Invalid price -1 for coco'],
      [[item({ productId: '' })], 'Every item needs a productId'],
    ];

    it.each(malformed)('should reject malformed items (%#)', async (items, message) => {
      expect(expectRejected(await manager.createOrder({ ...customer, items }))).toEqual({
        kind: 'validation',
        message,
      });
    });

    it('should require customer details', async () => {
      const error = expectRejected(
        await manager.createOrder({ customerName: ' ', customerEmail: 'customer@example.test', items: [item()] })
      );
      expect(error.message).toBe('Customer name and email are required');
    });

    it('should keep the productName given on the line', async () => {
      const order = await placeOrder([item({ productName: 'Coco Dress (Limited)' })]);
      expect(order.items[0].productName).toBe('Coco Dress (Limited)');
    });

    it('should let only one of two competing orders take the last units', async () => {
      const results = await Promise.all([
        manager.createOrder({ ...customer, items: [item({ quantity: 3 })] }),
        manager.createOrder({ ...customer, items: [item({ quantity: 3 })] }),
      ]);

      expect(results.filter((result) => result.ok)).toHaveLength(1);
      expect(expectRejected(results[1]).message).toBe(
        'Sorry, Coco Dress in M/Black is not available. Only 2 in stock.'
      );
      expect(await quantityOf('coco', 'M', 'Black')).toBe(2);
    });
  });

  // ============================================================================
  // Modify
  // ============================================================================

  describe('modifyOrder', () => {
    it('should swap items, moving the reservation to the new variant', async () => {
      const order = await placeOrder();

      const result = await manager.modifyOrder(order.orderId, {
        items: [item({ size: 'S', color: 'Red', quantity: 1 })],
      });
      const updated = expectOk(result);

      expect(updated.items).toEqual([
        {
          productId: 'coco',
          productName: 'Coco Dress',
          size: 'S',
          color: 'Red',
          quantity: 1,
          price: 150,
          subtotal: 150,
        },
      ]);
      expect(updated.totalAmount).toBe(150);
      expect(updated.history).toHaveLength(2);
      expect(updated.history[1]).toMatchObject({
        action: 'modified',
        details: 'Items updated. New total: MYR 150.00',
      });
      expect(result).toMatchObject({
        message: `Order ${order.orderId} updated: Items updated. New total: MYR 150.00`,
      });
      expect(await quantityOf('coco', 'M', 'Black')).toBe(5);
      expect(await quantityOf('coco', 'S', 'Red')).toBe(1);
    });

    it('should let new items reuse the quantity the order already holds', async () => {
      const order = await placeOrder();

      const updated = expectOk(
        await manager.modifyOrder(order.orderId, { items: [item({ quantity: 5 })] })
      );

      expect(updated.totalAmount).toBe(750);
      expect(await quantityOf('coco', 'M', 'Black')).toBe(0);
    });

    it('should leave every touched variant as it was when a new item is unavailable', async () => {
      const order = await placeOrder();
      const before = await storage.listStock();

      const error = expectRejected(
        await manager.modifyOrder(order.orderId, {
          items: [
            item({ quantity: 1 }),
            item({ productId: 'luna', size: '38', color: 'Gold', quantity: 10 }),
          ],
        })
      );

      expect(error.message).toBe('Sorry, Luna Heel in 38/Gold is not available. Only 3 in stock.');
      expect(await storage.listStock()).toEqual(before);
      expect(await manager.getOrder(order.orderId)).toEqual(order);
    });

    it('should count the restored quantity when checking a larger request', async () => {
      const order = await placeOrder();

      const error = expectRejected(
        await manager.modifyOrder(order.orderId, { items: [item({ quantity: 6 })] })
      );

      expect(error.message).toBe('Sorry, Coco Dress in M/Black is not available. Only 5 in stock.');
      expect(await quantityOf('coco', 'M', 'Black')).toBe(3);
    });

    it('should update address and notes without touching stock', async () => {
      const order = await placeOrder();

      const updated = expectOk(
        await manager.modifyOrder(order.orderId, {
          shippingAddress: '1 Test Street',
          notes: 'Leave at the door',
        })
      );

      expect(updated).toMatchObject({ shippingAddress: '1 Test Street', notes: 'Leave at the door' });
      expect(updated.history[1].details).toBe('Shipping address updated; Notes updated');
      expect(await quantityOf('coco', 'M', 'Black')).toBe(3);
    });

    it('should accept legal status changes', async () => {
      const order = await placeOrder();

      const updated = expectOk(await manager.modifyOrder(order.orderId, { status: 'confirmed' }));

      expect(updated.status).toBe('confirmed');
      expect(updated.history[1].details).toBe('Status changed to confirmed');
    });

    it('should reject illegal status changes', async () => {
      const order = await placeOrder();

      expect(expectRejected(await manager.modifyOrder(order.orderId, { status: 'shipped' }))).toEqual({
        kind: 'invalid_transition',
        message: `Cannot change order ${order.orderId} from pending to shipped`,
        details: { from: 'pending', to: 'shipped' },
      });
    });

    it('should route cancellation through cancelOrder', async () => {
      const order = await placeOrder();

      const error = expectRejected(await manager.modifyOrder(order.orderId, { status: 'cancelled' }));

      expect(error).toEqual({
        kind: 'invalid_transition',
        message: `Use cancelOrder to cancel order ${order.orderId}`,
      });
      expect(await manager.getOrderStatus(order.orderId)).toBe('pending');
    });

    it('should refuse orders that have shipped', async () => {
      const order = await placeOrder();
      for (const status of ['confirmed', 'processing', 'shipped'] as const) {
        expectOk(await manager.transitionStatus(order.orderId, status));
      }

      expect(expectRejected(await manager.modifyOrder(order.orderId, { notes: 'late' }))).toEqual({
        kind: 'invalid_state',
        message: `Order ${order.orderId} cannot be modified. Status: shipped`,
        details: { status: 'shipped' },
      });
    });

    it('should reject missing orders and empty updates', async () => {
      expect(expectRejected(await manager.modifyOrder('ORD-00000000-000000', { notes: 'x' }))).toEqual({
        kind: 'not_found',
        message: 'Order ORD-00000000-000000 not found.',
      });

      const order = await placeOrder();
      expect(expectRejected(await manager.modifyOrder(order.orderId, {})).message).toBe(
        'No changes requested'
      );
      expect(expectRejected(await manager.modifyOrder(order.orderId, { status: 'pending' })).message).toBe(
        `No changes to apply to order ${order.orderId}`
      );
    });
  });

  // ============================================================================
  // Cancel & Status
  // ============================================================================

  describe('cancelOrder', () => {
    it('should restore reserved stock exactly', async () => {
      const order = await placeOrder([
        item({ quantity: 2 }),
        item({ productId: 'luna', size: '38', color: 'Gold', quantity: 3, price: 89 }),
      ]);

      const result = await manager.cancelOrder(order.orderId, 'changed my mind');
      const cancelled = expectOk(result);

      expect(cancelled.status).toBe('cancelled');
      expect(cancelled.history[1]).toMatchObject({
        action: 'cancelled',
        details: 'Order cancelled. Reason: changed my mind',
      });
      expect(result).toMatchObject({
        message: `Order ${order.orderId} has been cancelled. Stock has been restored.`,
      });
      expect(await quantityOf('coco', 'M', 'Black')).toBe(5);
      expect(await quantityOf('luna', '38', 'Gold')).toBe(3);
      expect(await manager.getStockForProduct('luna')).toMatchObject({
        variants: [{ quantity: 3, status: 'low_stock' }],
      });
    });

    it('should record a cancellation without a reason', async () => {
      const order = await placeOrder();

      const cancelled = expectOk(await manager.cancelOrder(order.orderId));

      expect(cancelled.history[1].details).toBe('Order cancelled');
    });

    it('should refuse to cancel twice', async () => {
      const order = await placeOrder();
      expectOk(await manager.cancelOrder(order.orderId));

      expect(expectRejected(await manager.cancelOrder(order.orderId)).message).toBe(
        `Order ${order.orderId} cannot be cancelled. Status: cancelled`
      );
      expect(await quantityOf('coco', 'M', 'Black')).toBe(5);
    });

    it('should reject missing orders', async () => {
      expect(expectRejected(await manager.cancelOrder('ORD-00000000-000000')).kind).toBe('not_found');
    });
  });

  describe('transitionStatus', () => {
    it('should walk the fulfilment path through to a refund', async () => {
      const order = await placeOrder();
      const path = ['confirmed', 'processing', 'shipped', 'delivered', 'refunded'] as const;

      for (const status of path) {
        const result = await manager.transitionStatus(order.orderId, status);
        expect(result).toMatchObject({ ok: true, message: `Order ${order.orderId} is now ${status}` });
      }

      const final = await manager.getOrder(order.orderId);
      expect(final?.status).toBe('refunded');
      expect(final?.history.map((entry) => entry.action)).toEqual([
        'created',
        'status_changed',
        'status_changed',
        'status_changed',
        'status_changed',
        'status_changed',
      ]);
      expect(final?.history[1].details).toBe('Status changed from pending to confirmed');
      expect(await quantityOf('coco', 'M', 'Black')).toBe(3);
    });

    it('should reject skipping states', async () => {
      const order = await placeOrder();

      expect(expectRejected(await manager.transitionStatus(order.orderId, 'delivered')).kind).toBe(
        'invalid_transition'
      );
    });

    it('should restore stock when transitioning to cancelled', async () => {
      const order = await placeOrder();

      expectOk(await manager.transitionStatus(order.orderId, 'cancelled'));

      expect(await quantityOf('coco', 'M', 'Black')).toBe(5);
    });
  });

  describe('permission checks', () => {
    it('should explain whether an order can change', async () => {
      const order = await placeOrder();

      expect(await manager.canModifyOrder(order.orderId)).toEqual({
        allowed: true,
        reason: 'Order can be modified',
      });
      expect(await manager.canCancelOrder(order.orderId)).toEqual({
        allowed: true,
        reason: 'Order can be cancelled',
      });

      for (const status of ['confirmed', 'processing', 'shipped', 'delivered'] as const) {
        expectOk(await manager.transitionStatus(order.orderId, status));
      }

      expect(await manager.canModifyOrder(order.orderId)).toEqual({
        allowed: false,
        reason: 'Order is already delivered and cannot be modified',
      });
      expect(await manager.canCancelOrder(order.orderId)).toEqual({
        allowed: false,
        reason: 'Order is already delivered',
      });
    });

    it('should report missing orders', async () => {
      expect(await manager.canModifyOrder('nope')).toEqual({ allowed: false, reason: 'Order not found' });
      expect(await manager.canCancelOrder('nope')).toEqual({ allowed: false, reason: 'Order not found' });
    });
  });

  // ============================================================================
  // Read Side
  // ============================================================================

  describe('read side', () => {
    it('should look up orders by id, customer and status', async () => {
      const first = await placeOrder([item({ quantity: 1 })]);
      const second = await placeOrder([item({ quantity: 1 })]);
      await manager.createOrder({
        customerName: 'Other Customer',
        customerEmail: 'other@example.test',
        items: [item({ quantity: 1 })],
      });

      const mine = await manager.getOrdersByCustomer('customer@example.test');
      expect(mine.map((order) => order.orderId).sort()).toEqual([first.orderId, second.orderId].sort());
      expect(await manager.getOrderStatus(first.orderId)).toBe('pending');
      expect(await manager.getOrderStatus('nope')).toBeNull();
      expect(await manager.getOrder('nope')).toBeNull();
      expect(await manager.getStockForProduct('nope')).toBeNull();
    });

    it('should move the last-updated markers on writes', async () => {
      const fresh = new OrderManager(new MemoryOrderStorage());
      expect(await fresh.getLastUpdated()).toEqual({ orders: null, stock: null });

      await seedStock(fresh);
      const afterImport = await fresh.getLastUpdated();
      expect(afterImport.orders).toBeNull();
      expect(afterImport.stock).not.toBeNull();

      expectOk(await fresh.createOrder({ ...customer, items: [item()] }));
      const afterOrder = await fresh.getLastUpdated();
      expect(afterOrder.orders).not.toBeNull();
      expect(afterOrder.stock && afterImport.stock && afterOrder.stock >= afterImport.stock).toBe(true);
    });
  });

  // ============================================================================
  // Storage Failures
  // ============================================================================

  describe('storage failures', () => {
    it('should report a lost race as a conflict', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      vi.spyOn(storage, 'commit').mockRejectedValueOnce(new ConcurrencyConflictError('stock:coco'));

      const error = expectRejected(await manager.createOrder({ ...customer, items: [item()] }));

      expect(error).toEqual({
        kind: 'conflict',
        message: 'The order or stock was changed by another request. Please try again.',
      });
      expect(await quantityOf('coco', 'M', 'Black')).toBe(5);
    });

    it('should log and return a generic rejection when the commit fails', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const fault = new Error('disk full');
      vi.spyOn(storage, 'commit').mockRejectedValueOnce(fault);

      const error = expectRejected(await manager.createOrder({ ...customer, items: [item()] }));

      expect(error.kind).toBe('storage');
      expect(errorSpy).toHaveBeenCalledWith('OrderManager: failed to persist changes', fault);
      expect(await quantityOf('coco', 'M', 'Black')).toBe(5);
      expect(await storage.listOrders()).toEqual([]);
    });

    it('should leave the order unchanged when a cancellation cannot be saved', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const order = await placeOrder();
      vi.spyOn(storage, 'commit').mockRejectedValueOnce(new Error('disk full'));

      expect(expectRejected(await manager.cancelOrder(order.orderId))).toEqual({
        kind: 'storage',
        message: 'Unable to save changes right now. Please try again.',
      });
      expect(await manager.getOrderStatus(order.orderId)).toBe('pending');
      expect(await quantityOf('coco', 'M', 'Black')).toBe(3);
    });
  });

  describe('unreachable order store', () => {
    const fault = new Error('connection reset by order-store.test:27017');
    const unreachable = {
      kind: 'storage',
      message: 'Unable to reach the order store right now. Please try again.',
    };

    it('should turn read faults during createOrder into a storage rejection', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(storage, 'getStocks').mockRejectedValue(fault);

      const error = expectRejected(await manager.createOrder({ ...customer, items: [item()] }));

      expect(error).toEqual(unreachable);
      expect(errorSpy).toHaveBeenCalledWith('OrderManager: createOrder failed', fault);
    });

    it('should turn read faults during order changes into a storage rejection', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const order = await placeOrder();
      vi.spyOn(storage, 'getOrder').mockRejectedValue(fault);

      expect(expectRejected(await manager.cancelOrder(order.orderId))).toEqual(unreachable);
      expect(expectRejected(await manager.modifyOrder(order.orderId, { notes: 'x' }))).toEqual(unreachable);
      expect(expectRejected(await manager.transitionStatus(order.orderId, 'confirmed'))).toEqual(
        unreachable
      );
    });

    it('should turn read faults during stock changes into a storage rejection', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(storage, 'getStock').mockRejectedValue(fault);
      vi.spyOn(storage, 'getStocks').mockRejectedValue(fault);

      expect(expectRejected(await manager.updateStock('coco', 'M', 'Black', 1))).toEqual(unreachable);
      expect(
        expectRejected(
          await manager.importStock([
            { productId: 'coco', variants: [{ size: 'M', color: 'Black', quantity: 1 }] },
          ])
        )
      ).toEqual(unreachable);
    });

    it('should release locks after a fault', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(storage, 'getStocks').mockRejectedValueOnce(fault);

      expectRejected(await manager.createOrder({ ...customer, items: [item()] }));

      expectOk(await manager.createOrder({ ...customer, items: [item()] }));
      expect(await quantityOf('coco', 'M', 'Black')).toBe(3);
    });

    it('should raise a generic StorageError from the read side', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      vi.spyOn(storage, 'getStock').mockRejectedValue(fault);
      vi.spyOn(storage, 'getOrder').mockRejectedValue(fault);

      await expect(manager.checkStock('coco', 'M', 'Black')).rejects.toThrow(
        new StorageError('order store unavailable')
      );
      await expect(manager.getOrder('ORD-00000000-000000')).rejects.toBeInstanceOf(StorageError);
      await expect(manager.canCancelOrder('ORD-00000000-000000')).rejects.toThrow(
        'Storage error: order store unavailable'
      );
      expect(errorSpy).toHaveBeenCalledWith('OrderManager: failed to check stock', fault);
    });
  });

  // ============================================================================
  // Search Index
  // ============================================================================

  describe('search index', () => {
    let indexed: OrderManager;

    beforeEach(async () => {
      const vectors = new MemoryVectorStore(
        new ConceptEmbeddings({ coco: ['coco'], luna: ['luna'] })
      );
      indexed = new OrderManager(storage, new OrderSearchIndex(vectors, 'test'));
    });

    it('should index new orders and their status changes', async () => {
      const order = expectOk(await indexed.createOrder({ ...customer, items: [item()] }));

      const [hit] = await indexed.searchOrders('coco dress');
      expect(hit).toMatchObject({
        orderId: order.orderId,
        customerEmail: 'customer@example.test',
        status: 'pending',
        totalAmount: 300,
      });
      expect(hit.similarity).toBeCloseTo(1);

      expectOk(await indexed.cancelOrder(order.orderId));
      const [afterCancel] = await indexed.searchOrders('coco');
      expect(afterCancel.status).toBe('cancelled');
    });

    it('should rebuild the index from storage', async () => {
      await placeOrder();

      expect(await indexed.rebuildIndex()).toEqual({ orders: 1, stock: 2 });
      expect(await indexed.searchOrders('coco')).toHaveLength(1);
    });

    it('should keep working when indexing fails', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const broken = new OrderManager(
        storage,
        new OrderSearchIndex(
          new MemoryVectorStore({
            embed: async () => {
              throw new Error('embeddings offline');
            },
            embedMany: async () => {
              throw new Error('embeddings offline');
            },
          }),
          'test'
        )
      );

      const order = expectOk(await broken.createOrder({ ...customer, items: [item()] }));

      expect(await broken.getOrder(order.orderId)).toEqual(order);
      expect(errorSpy).toHaveBeenCalledWith(
        `OrderSearchIndex: failed to index order ${order.orderId}`,
        expect.any(Error)
      );
    });

    it('should return nothing without an index', async () => {
      await placeOrder();

      expect(await manager.searchOrders('coco')).toEqual([]);
      expect(await manager.rebuildIndex()).toEqual({ orders: 0, stock: 0 });
    });
  });
});
