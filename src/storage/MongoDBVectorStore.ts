import { MongoClient, type Collection, type Db, type Document } from 'mongodb';
import type { ZodType } from 'zod';
import type {
  EmbeddingProvider,
  MetadataFilter,
  VectorCollection,
  VectorMatch,
  VectorRecord,
  VectorRecordInput,
  VectorStore,
} from './VectorStore';

interface VectorDocument {
  _id: string;
  document: string;
  metadata: unknown;
  embedding: number[];
  updatedAt: Date;
}

interface VectorSearchHit {
  _id: string;
  document: string;
  metadata: unknown;
  score: number;
}

export interface MongoDBVectorStoreConfig {
  uri: string;
  dbName?: string;
  /**
   * Atlas Vector Search index defined on `embedding` in every collection.
   * Metadata fields used in filters must be declared as filter fields.
   */
  vectorIndexName?: string;
  /**
   * Candidates considered per requested result
   */
  candidatesPerResult?: number;
}

/**
 * MongoDB Atlas vector store
 * One MongoDB collection per named vector collection
 */
export class MongoDBVectorStore implements VectorStore {
  private client: MongoClient;
  private db: Db | null = null;
  private config: Required<MongoDBVectorStoreConfig>;

  constructor(
    config: MongoDBVectorStoreConfig,
    private embeddings: EmbeddingProvider,
    client?: MongoClient
  ) {
    this.config = {
      uri: config.uri,
      dbName: config.dbName || 'vibecart',
      vectorIndexName: config.vectorIndexName || 'vector_index',
      candidatesPerResult: config.candidatesPerResult ?? 10,
    };

    this.client = client ?? new MongoClient(this.config.uri);
  }

  private async ensureConnection(): Promise<Db> {
    if (!this.db) {
      await this.client.connect();
      this.db = this.client.db(this.config.dbName);
    }
    return this.db;
  }

  collection<M>(name: string, schema: ZodType<M>): VectorCollection<M> {
    return new MongoDBVectorCollection(
      name,
      schema,
      async () => {
        const db = await this.ensureConnection();
        return db.collection<VectorDocument>(name);
      },
      this.embeddings,
      this.config
    );
  }

  async close(): Promise<void> {
    await this.client.close();
    this.db = null;
  }
}

class MongoDBVectorCollection<M> implements VectorCollection<M> {
  constructor(
    readonly name: string,
    private schema: ZodType<M>,
    private getCollection: () => Promise<Collection<VectorDocument>>,
    private embeddings: EmbeddingProvider,
    private config: Required<MongoDBVectorStoreConfig>
  ) {}

  async upsert(records: VectorRecordInput<M>[]): Promise<void> {
    if (records.length === 0) return;

    const collection = await this.getCollection();
    const vectors = await this.embeddings.embedMany(records.map((r) => r.document));
    const now = new Date();

    await collection.bulkWrite(
      records.map((record, idx) => ({
        replaceOne: {
          filter: { _id: record.id },
          replacement: {
            document: record.document,
            metadata: record.metadata,
            embedding: vectors[idx],
            updatedAt: now,
          },
          upsert: true,
        },
      })),
      { ordered: false }
    );
  }

  async get(ids: string[]): Promise<VectorRecord<M>[]> {
    if (ids.length === 0) return [];

    const collection = await this.getCollection();
    const docs = await collection
      .find({ _id: { $in: ids } }, { projection: { embedding: 0 } })
      .toArray();

    const byId = new Map(docs.map((doc) => [doc._id, doc]));
    const found: VectorRecord<M>[] = [];
    for (const id of ids) {
      const doc = byId.get(id);
      if (doc) {
        found.push({
          id: doc._id,
          document: doc.document,
          metadata: this.schema.parse(doc.metadata),
          updatedAt: doc.updatedAt,
        });
      }
    }
    return found;
  }

  async query(text: string, k: number, filter?: MetadataFilter): Promise<VectorMatch<M>[]> {
    if (k <= 0) return [];

    const collection = await this.getCollection();
    const queryVector = await this.embeddings.embed(text);

    const vectorSearch: Document = {
      index: this.config.vectorIndexName,
      path: 'embedding',
      queryVector,
      numCandidates: Math.max(k * this.config.candidatesPerResult, 100),
      limit: k,
    };

    if (filter && Object.keys(filter).length > 0) {
      vectorSearch.filter = Object.fromEntries(
        Object.entries(filter).map(([key, value]) => [`metadata.${key}`, value])
      );
    }

    const pipeline: Document[] = [
      { $vectorSearch: vectorSearch },
      {
        $project: {
          document: 1,
          metadata: 1,
          score: { $meta: 'vectorSearchScore' },
        },
      },
    ];

    const hits = await collection.aggregate<VectorSearchHit>(pipeline).toArray();

    // Atlas reports cosine as (1 + cos) / 2
    return hits.map((hit) => ({
      id: hit._id,
      document: hit.document,
      metadata: this.schema.parse(hit.metadata),
      distance: 2 - 2 * hit.score,
    }));
  }

  async listIds(): Promise<string[]> {
    const collection = await this.getCollection();
    const docs = await collection.find({}, { projection: { _id: 1 } }).toArray();
    return docs.map((doc) => doc._id);
  }

  async count(): Promise<number> {
    const collection = await this.getCollection();
    return collection.countDocuments();
  }

  async delete(ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;

    const collection = await this.getCollection();
    const result = await collection.deleteMany({ _id: { $in: ids } });
    return result.deletedCount;
  }

  async clear(): Promise<void> {
    const collection = await this.getCollection();
    await collection.deleteMany({});
  }
}
