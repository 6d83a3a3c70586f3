import { MongoClient, type Collection, type Db } from 'mongodb';
import { ConcurrencyConflictError, type Order, type StockRecord } from '../types';
import type { LastUpdatedMarkers, OrderStorage, OrderStorageCommit } from './OrderStorage';

interface OrderDocument extends Order {
  _id: string;
}

interface StockDocument extends StockRecord {
  _id: string;
}

interface MarkerDocument {
  _id: 'orders' | 'stock';
  lastUpdated: string;
}

export interface MongoOrderStorageConfig {
  uri: string;
  dbName?: string;
  collectionPrefix?: string;
}

function toOrder(doc: OrderDocument): Order {
  const { _id, ...order } = doc;
  return { ...order, orderId: _id };
}

function toStock(doc: StockDocument): StockRecord {
  const { _id, ...record } = doc;
  return { ...record, productId: _id };
}

/**
 * MongoDB order storage
 * Commits run inside a multi-document transaction, which needs a replica set
 */
export class MongoOrderStorage implements OrderStorage {
  private client: MongoClient;
  private db: Db | null = null;
  private config: Required<MongoOrderStorageConfig>;

  constructor(config: MongoOrderStorageConfig, client?: MongoClient) {
    this.config = {
      uri: config.uri,
      dbName: config.dbName || 'vibecart',
      collectionPrefix: config.collectionPrefix || 'vibecart',
    };

    this.client = client ?? new MongoClient(this.config.uri);
  }

  private async ensureConnection(): Promise<Db> {
    if (!this.db) {
      await this.client.connect();
      this.db = this.client.db(this.config.dbName);
      await this.db
        .collection<OrderDocument>(`${this.config.collectionPrefix}_orders`)
        .createIndex({ customerEmail: 1 });
    }
    return this.db;
  }

  private async collections(): Promise<{
    orders: Collection<OrderDocument>;
    stock: Collection<StockDocument>;
    markers: Collection<MarkerDocument>;
  }> {
    const db = await this.ensureConnection();
    const prefix = this.config.collectionPrefix;
    return {
      orders: db.collection<OrderDocument>(`${prefix}_orders`),
      stock: db.collection<StockDocument>(`${prefix}_stock`),
      markers: db.collection<MarkerDocument>(`${prefix}_markers`),
    };
  }

  // ============================================================================
  // Order Operations
  // ============================================================================

  async getOrder(orderId: string): Promise<Order | null> {
    const { orders } = await this.collections();
    const doc = await orders.findOne({ _id: orderId });
    return doc ? toOrder(doc) : null;
  }

  async getOrdersByCustomer(customerEmail: string): Promise<Order[]> {
    const { orders } = await this.collections();
    const docs = await orders.find({ customerEmail }).sort({ createdAt: 1 }).toArray();
    return docs.map(toOrder);
  }

  async listOrders(): Promise<Order[]> {
    const { orders } = await this.collections();
    const docs = await orders.find({}).sort({ createdAt: 1 }).toArray();
    return docs.map(toOrder);
  }

  // ============================================================================
  // Stock Operations
  // ============================================================================

  async getStock(productId: string): Promise<StockRecord | null> {
    const { stock } = await this.collections();
    const doc = await stock.findOne({ _id: productId });
    return doc ? toStock(doc) : null;
  }

  async getStocks(productIds: string[]): Promise<StockRecord[]> {
    if (productIds.length === 0) return [];

    const { stock } = await this.collections();
    const docs = await stock.find({ _id: { $in: Array.from(new Set(productIds)) } }).toArray();
    return docs.map(toStock);
  }

  async listStock(): Promise<StockRecord[]> {
    const { stock } = await this.collections();
    const docs = await stock.find({}).toArray();
    return docs.map(toStock);
  }

  // ============================================================================
  // Commit
  // ============================================================================

  async commit(change: OrderStorageCommit): Promise<void> {
    const { orders, stock, markers } = await this.collections();
    const stockWrites = change.stock ?? [];
    const now = new Date().toISOString();

    const session = this.client.startSession();
    try {
      await session.withTransaction(async () => {
        for (const { record, expectedVersion } of stockWrites) {
          const { productId } = record;

          if (expectedVersion === null) {
            const result = await stock.updateOne(
              { _id: productId },
              { $setOnInsert: record },
              { upsert: true, session }
            );
            if (result.upsertedCount === 0) {
              throw new ConcurrencyConflictError(`stock:${productId}`);
            }
          } else {
            const result = await stock.replaceOne(
              { _id: productId, version: expectedVersion },
              record,
              { session }
            );
            if (result.matchedCount === 0) {
              throw new ConcurrencyConflictError(`stock:${productId}`);
            }
          }
        }

        if (change.order) {
          const { order, expectedHistoryLength } = change.order;

          if (expectedHistoryLength === null) {
            const result = await orders.updateOne(
              { _id: order.orderId },
              { $setOnInsert: order },
              { upsert: true, session }
            );
            if (result.upsertedCount === 0) {
              throw new ConcurrencyConflictError(`order:${order.orderId}`);
            }
          } else {
            const result = await orders.replaceOne(
              { _id: order.orderId, history: { $size: expectedHistoryLength } },
              order,
              { session }
            );
            if (result.matchedCount === 0) {
              throw new ConcurrencyConflictError(`order:${order.orderId}`);
            }
          }
        }

        if (stockWrites.length > 0) {
          await markers.updateOne(
            { _id: 'stock' },
            { $max: { lastUpdated: now } },
            { upsert: true, session }
          );
        }
        if (change.order) {
          await markers.updateOne(
            { _id: 'orders' },
            { $max: { lastUpdated: now } },
            { upsert: true, session }
          );
        }
      });
    } finally {
      await session.endSession();
    }
  }

  async getLastUpdated(): Promise<LastUpdatedMarkers> {
    const { markers } = await this.collections();
    const docs = await markers.find({}).toArray();
    const byId = new Map(docs.map((doc) => [doc._id, doc.lastUpdated]));
    return {
      orders: byId.get('orders') ?? null,
      stock: byId.get('stock') ?? null,
    };
  }

  async close(): Promise<void> {
    await this.client.close();
    this.db = null;
  }
}
