export { cosineSimilarity } from './VectorStore';
export type {
  EmbeddingProvider,
  MetadataFilter,
  MetadataValue,
  VectorCollection,
  VectorMatch,
  VectorRecord,
  VectorRecordInput,
  VectorStore,
} from './VectorStore';
export { MemoryVectorStore } from './MemoryVectorStore';
export { MongoDBVectorStore } from './MongoDBVectorStore';
export type { MongoDBVectorStoreConfig } from './MongoDBVectorStore';
export { OpenAIEmbeddingProvider } from './OpenAIEmbeddingProvider';
export type { OpenAIEmbeddingProviderConfig } from './OpenAIEmbeddingProvider';
