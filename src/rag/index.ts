export type {
  MetadataValue,
  VectorMetadata,
  UpsertBatch,
  VectorQueryResult,
  IVectorCollection,
  IVectorIndex,
} from "./types.js";
export { checkUpsertBatch, UpsertBatchSchema, VectorMetadataSchema } from "./types.js";

export {
  createEmbeddingProvider,
  EmbeddingError,
  OpenAIEmbeddingProvider,
  DEFAULT_EMBEDDING_BATCH_SIZE,
  type IEmbeddingProvider,
  type OpenAIProviderOptions,
  type ProviderOptions,
  type ProviderType,
  type EmbeddingProviderStatus,
  type EmbeddingErrorCode,
} from "./embeddings/index.js";

// Vector indexes
export { InMemoryVectorIndex, cosineSimilarity } from "./vectorStore.js";
export { LanceDBVectorIndex, REGISTRY_TABLE } from "./lancedb.js";
