import { chunkMarkdown } from "./chunker.js";
import { FetchOrchestrator } from "./fetchOrchestrator.js";
import { analyzeSection } from "./sectionAnalyzer.js";
import { resolveSitemap, type ResolveSitemapOptions } from "./sitemap.js";
import { classifySource } from "./sourceClassifier.js";
import { normalizeUrl } from "./url.js";
import type {
  Chunk,
  ChunkMetadata,
  FetchFailure,
  FetchResult,
  FetchSuccess,
  IngestionOutcome,
  IngestionPhase,
  IPageFetcher,
  ProgressListener,
  SourceResult,
  SourceType,
} from "./types.js";
import type { IVectorIndex } from "../rag/types.js";
import { validateIngestConfig, type IngestConfig, type IngestConfigInput } from "../utils/config.js";
import { ErrorCode, getErrorMessage, VectorIndexError } from "../utils/errors.js";
import { getLogger, type Logger } from "../utils/logger.js";

export type SitemapResolver = (url: string, options: ResolveSitemapOptions) => Promise<string[]>;

export interface IngestionPipelineOptions {
  fetcher: IPageFetcher;
  vectorIndex: IVectorIndex;
  /** Defaults to the HTTP sitemap resolver */
  resolveSitemap?: SitemapResolver;
  onProgress?: ProgressListener;
}

interface PendingChunk extends Chunk {
  id: string;
  metadata: ChunkMetadata;
}

/**
 * Source URL -> fetched pages -> header-aware chunks -> vector index.
 *
 * Configuration is validated before any network or index access. A run that
 * produces no chunks returns a zero outcome; a failed upsert batch stops the
 * run with a VectorIndexError, leaving earlier batches in place.
 */
export class IngestionPipeline {
  private readonly fetcher: IPageFetcher;
  private readonly vectorIndex: IVectorIndex;
  private readonly resolveSitemap: SitemapResolver;
  private readonly onProgress?: ProgressListener;

  constructor(options: IngestionPipelineOptions) {
    this.fetcher = options.fetcher;
    this.vectorIndex = options.vectorIndex;
    this.resolveSitemap = options.resolveSitemap ?? resolveSitemap;
    this.onProgress = options.onProgress;
  }

  async ingest(url: string, configInput: IngestConfigInput = {}): Promise<IngestionOutcome> {
    const config = validateIngestConfig(configInput);
    const startedAt = Date.now();
    const sourceType = classifySource(url);
    const logger = getLogger().child({ source: url, collection: config.collection });

    logger.info("Starting ingestion", { sourceType });

    // 1. Fetch
    const failures: FetchFailure[] = [];
    const orchestrator = new FetchOrchestrator(this.fetcher, {
      timeoutMs: config.timeoutMs,
      onFailure: (failure) => failures.push(failure),
      logger,
    });

    const results = await this.fetchSource(url, sourceType, config, orchestrator, logger);
    const pages = results.filter((result): result is FetchSuccess => result.ok);
    this.report("fetching", pages.length + failures.length, pages.length + failures.length);

    // 2. Chunk
    const chunks: PendingChunk[] = [];
    const perSourceResults: SourceResult[] = [];

    pages.forEach((page, pageIndex) => {
      const pieces = chunkMarkdown(page.markdown, config.chunkSize);
      for (const text of pieces) {
        const chunkIndex = chunks.length;
        chunks.push({
          index: chunkIndex,
          id: `chunk-${chunkIndex}`,
          text,
          sourceUrl: page.url,
          metadata: { ...analyzeSection(text), chunkIndex, source: page.url },
        });
      }
      perSourceResults.push({ url: page.url, chunkCount: pieces.length });
      this.report("chunking", pageIndex + 1, pages.length);
    });

    for (const failure of failures) {
      perSourceResults.push({ url: failure.url, chunkCount: 0, error: failure.errorMessage });
    }

    // 3. Store
    const totalChunksInserted = chunks.length > 0 ? await this.store(chunks, config) : 0;

    const outcome: IngestionOutcome = {
      url,
      sourceType,
      collection: config.collection,
      totalChunksInserted,
      pagesFetched: pages.length,
      pagesFailed: failures.length,
      perSourceResults,
      durationMs: Date.now() - startedAt,
    };

    this.report("complete", totalChunksInserted, totalChunksInserted);
    logger.info("Ingestion complete", {
      chunks: totalChunksInserted,
      pagesFetched: outcome.pagesFetched,
      pagesFailed: outcome.pagesFailed,
      durationMs: outcome.durationMs,
    });

    return outcome;
  }

  private async fetchSource(
    url: string,
    sourceType: SourceType,
    config: IngestConfig,
    orchestrator: FetchOrchestrator,
    logger: Logger
  ): Promise<FetchResult[]> {
    switch (sourceType) {
      case "sitemap": {
        const listed = await this.resolveSitemap(url, { timeoutMs: config.timeoutMs, logger });
        if (listed.length === 0) {
          logger.warn("Sitemap listed no URLs");
          return [];
        }
        // Sitemaps may repeat a page; fetch each normalized URL once, first listing wins
        const urls = Array.from(new Set(listed.map(normalizeUrl)));
        if (urls.length < listed.length) {
          logger.debug("Dropped repeated sitemap URLs", { listed: listed.length, unique: urls.length });
        }
        this.report("fetching", 0, urls.length);
        return await orchestrator.fetch(urls, { kind: "batch" }, config.maxConcurrent);
      }
      case "text":
        return await orchestrator.fetch([url], { kind: "single" }, config.maxConcurrent);
      case "page":
        return await orchestrator.fetch(
          [url],
          { kind: "recursive", maxDepth: config.maxDepth },
          config.maxConcurrent
        );
    }
  }

  /**
   * Upsert chunks in batches of config.batchSize, in order.
   *
   * @returns Number of chunks written
   * @throws {VectorIndexError} On the first failed batch, with insertedBeforeFailure set
   */
  private async store(chunks: PendingChunk[], config: IngestConfig): Promise<number> {
    const collection = await this.vectorIndex.openOrCreateCollection(config.collection, config.embeddingModel);
    let inserted = 0;

    for (let start = 0; start < chunks.length; start += config.batchSize) {
      const batch = chunks.slice(start, start + config.batchSize);
      try {
        await collection.upsertBatch(
          batch.map((chunk) => chunk.id),
          batch.map((chunk) => chunk.text),
          batch.map((chunk) => chunk.metadata)
        );
      } catch (err) {
        throw new VectorIndexError(
          err instanceof VectorIndexError ? err.code : ErrorCode.VECTOR_INDEX_WRITE_FAILED,
          `Upsert of chunks ${start}-${start + batch.length - 1} failed: ${getErrorMessage(err)}`,
          {
            cause: err instanceof Error ? err : undefined,
            collection: config.collection,
            insertedBeforeFailure: inserted,
          }
        );
      }

      inserted += batch.length;
      this.report("storing", inserted, chunks.length);
    }

    return inserted;
  }

  private report(phase: IngestionPhase, processed: number, total: number): void {
    this.onProgress?.({ phase, processed, total });
  }
}
