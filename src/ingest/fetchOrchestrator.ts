import pLimit from "p-limit";
import { normalizeUrl } from "./url.js";
import type { FetchFailure, FetchResult, FetchStrategy, FetchSuccess, IPageFetcher } from "./types.js";
import { ConfigError, ErrorCode, getErrorMessage } from "../utils/errors.js";
import { createErrorTracker, getLogger, type Logger } from "../utils/logger.js";

export interface FetchOrchestratorOptions {
  /** Per-fetch timeout (ms) */
  timeoutMs: number;
  /** Called once for every failed fetch, whatever the strategy */
  onFailure?: (failure: FetchFailure) => void;
  /** Scoped logger, e.g. one carrying the run's source URL */
  logger?: Logger;
}

function requirePositive(value: number, key: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(ErrorCode.CONFIG_INVALID_VALUE, `${key} must be greater than 0`, { configKey: key });
  }
}

/**
 * Runs a fetch strategy over an IPageFetcher.
 *
 * - single: one URL, its result returned even on failure
 * - batch: every URL once, at most maxConcurrent in flight
 * - recursive: breadth-first crawl over same-origin links; each level is one
 *   batch and finishes before the next begins. Failed URLs count as visited.
 */
export class FetchOrchestrator {
  private readonly logger: Logger;
  private readonly trackError: ReturnType<typeof createErrorTracker>;

  constructor(
    private readonly fetcher: IPageFetcher,
    private readonly options: FetchOrchestratorOptions
  ) {
    this.logger = options.logger ?? getLogger();
    this.trackError = createErrorTracker("FetchOrchestrator", this.logger);
  }

  async fetch(seeds: string[], strategy: FetchStrategy, maxConcurrent: number): Promise<FetchResult[]> {
    requirePositive(maxConcurrent, "maxConcurrent");

    switch (strategy.kind) {
      case "single":
        return seeds.length > 0 ? [await this.attempt(seeds[0])] : [];
      case "batch":
        return await this.fetchBatch(seeds, maxConcurrent);
      case "recursive":
        requirePositive(strategy.maxDepth, "maxDepth");
        return await this.crawl(seeds, strategy.maxDepth, maxConcurrent);
    }
  }

  /**
   * Fetch all URLs with a bounded pool. Output order matches input order.
   */
  private async fetchBatch(urls: string[], maxConcurrent: number): Promise<FetchResult[]> {
    const limit = pLimit(maxConcurrent);
    return await Promise.all(urls.map((url) => limit(() => this.attempt(url))));
  }

  private async crawl(seeds: string[], maxDepth: number, maxConcurrent: number): Promise<FetchSuccess[]> {
    const logger = this.logger;
    const visited = new Set<string>();
    const pages: FetchSuccess[] = [];

    let frontier = Array.from(new Set(seeds.map(normalizeUrl)));

    for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
      for (const url of frontier) {
        visited.add(url);
      }
      logger.debug("Crawling level", { depth, urls: frontier.length });

      const results = await this.fetchBatch(frontier, maxConcurrent);

      const next = new Set<string>();
      for (const result of results) {
        if (!result.ok) continue;

        if (result.markdown.trim()) {
          pages.push(result);
        }
        for (const link of result.internalLinks) {
          const normalized = normalizeUrl(link);
          if (!visited.has(normalized)) {
            next.add(normalized);
          }
        }
      }
      frontier = Array.from(next);
    }

    logger.info("Crawl finished", { visited: visited.size, pages: pages.length });
    return pages;
  }

  /**
   * One fetch. A fetcher that rejects is turned into a failure result here.
   */
  private async attempt(url: string): Promise<FetchResult> {
    let result: FetchResult;
    try {
      result = await this.fetcher.fetchPage(url, this.options.timeoutMs);
    } catch (err) {
      this.trackError(err, "fetchPage", url);
      result = { ok: false, url, errorMessage: getErrorMessage(err) };
    }

    if (!result.ok) {
      this.logger.warn("Fetch failed", { url, error: result.errorMessage });
      this.options.onFailure?.(result);
    }
    return result;
  }
}
