export { createEmbeddingProvider, type ProviderOptions, type ProviderType } from "./factory.js";
export type { IEmbeddingProvider } from "./provider.js";
export {
  OpenAIEmbeddingProvider,
  DEFAULT_EMBEDDING_BATCH_SIZE,
  type OpenAIProviderOptions,
  type EmbeddingsClient,
} from "./openai.js";
export type { EmbeddingProviderStatus, EmbeddingErrorCode } from "./types.js";
export { EmbeddingError } from "./types.js";
