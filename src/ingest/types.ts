/**
 * Ingestion type definitions: fetch results, chunks, crawl strategies and run outcomes.
 */

// ============================================================================
// Fetching
// ============================================================================

export interface FetchSuccess {
  ok: true;
  url: string;
  /** Page text normalized to Markdown */
  markdown: string;
  /** Same-origin links found on the page, fragments stripped */
  internalLinks: Set<string>;
}

export interface FetchFailure {
  ok: false;
  url: string;
  errorMessage: string;
}

/**
 * Outcome of exactly one fetch attempt.
 */
export type FetchResult = FetchSuccess | FetchFailure;

/**
 * Page fetcher capability consumed by the orchestrator.
 * Implementations must resolve (never reject) with a FetchFailure on error.
 */
export interface IPageFetcher {
  fetchPage(url: string, timeoutMs: number): Promise<FetchResult>;
}

export type FetchStrategy =
  | { kind: "single" }
  | { kind: "batch" }
  | { kind: "recursive"; maxDepth: number };

// ============================================================================
// Chunks
// ============================================================================

export type SourceType = "sitemap" | "text" | "page";

export interface Chunk {
  /** Run-wide position, starting at 0 */
  index: number;
  text: string;
  sourceUrl: string;
}

export interface SectionInfo {
  /** "; "-joined "<hashes> <text>" pairs, empty when the chunk has no header */
  headers: string;
  charCount: number;
  wordCount: number;
}

export interface ChunkMetadata extends SectionInfo {
  chunkIndex: number;
  source: string;
  [key: string]: string | number;
}

// ============================================================================
// Run outcome
// ============================================================================

export interface SourceResult {
  url: string;
  chunkCount: number;
  error?: string;
}

export interface IngestionOutcome {
  url: string;
  sourceType: SourceType;
  collection: string;
  totalChunksInserted: number;
  pagesFetched: number;
  pagesFailed: number;
  /** Successful sources in visit order, then failed URLs */
  perSourceResults: SourceResult[];
  durationMs: number;
}

export type IngestionPhase = "fetching" | "chunking" | "storing" | "complete";

export interface IngestionProgress {
  phase: IngestionPhase;
  processed: number;
  total: number;
}

export type ProgressListener = (progress: IngestionProgress) => void;
