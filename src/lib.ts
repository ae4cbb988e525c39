export * from "./ingest/index.js";
export * from "./rag/index.js";
export {
  IngestConfigSchema,
  DEFAULT_INGEST_CONFIG,
  validateIngestConfig,
  loadConfig,
  saveConfig,
  loadEmbeddingCredentials,
  type IngestConfig,
  type IngestConfigInput,
} from "./utils/config.js";
export {
  ErrorCode,
  PagevaultError,
  ConfigError,
  FetchError,
  VectorIndexError,
  formatErrorForUser,
  isRecoverableError,
} from "./utils/errors.js";
export { runCli } from "./cli.js";
