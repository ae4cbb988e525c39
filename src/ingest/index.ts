export type {
  FetchSuccess,
  FetchFailure,
  FetchResult,
  IPageFetcher,
  FetchStrategy,
  SourceType,
  Chunk,
  SectionInfo,
  ChunkMetadata,
  SourceResult,
  IngestionOutcome,
  IngestionPhase,
  IngestionProgress,
  ProgressListener,
} from "./types.js";

export { chunkMarkdown, splitByHeaderLevel, hardSplit, HEADER_LEVELS } from "./chunker.js";
export { analyzeSection } from "./sectionAnalyzer.js";
export { classifySource } from "./sourceClassifier.js";
export { normalizeUrl, resolveInternalLink } from "./url.js";
export { fetchText, USER_AGENT, type FetchLike, type TextResponse } from "./http.js";
export { HttpPageFetcher, type HttpPageFetcherOptions } from "./pageFetcher.js";
export { resolveSitemap, parseSitemapLocs, type ResolveSitemapOptions } from "./sitemap.js";
export { FetchOrchestrator, type FetchOrchestratorOptions } from "./fetchOrchestrator.js";
export {
  IngestionPipeline,
  type IngestionPipelineOptions,
  type SitemapResolver,
} from "./pipeline.js";
export {
  IngestionJobRunner,
  InMemoryJobStore,
  type IJobStore,
  type IngestionJob,
  type IngestionRunner,
  type JobStatus,
} from "./jobs.js";
