/**
 * pagevault CLI
 *
 * Commands:
 *   <url>          - Crawl a page, sitemap or text resource into a collection
 *   query <text>   - Show the chunks of a collection closest to a question
 *
 * Exit codes:
 *   0 - Success
 *   1 - Invalid arguments or configuration
 *   2 - No documents produced (or nothing to query)
 *   3 - Execution failed
 */

import { HttpPageFetcher } from "./ingest/pageFetcher.js";
import { IngestionPipeline, type SitemapResolver } from "./ingest/pipeline.js";
import type { IngestionOutcome, IPageFetcher } from "./ingest/types.js";
import { createEmbeddingProvider } from "./rag/embeddings/factory.js";
import { EmbeddingError } from "./rag/embeddings/types.js";
import type { IEmbeddingProvider } from "./rag/embeddings/provider.js";
import { LanceDBVectorIndex } from "./rag/lancedb.js";
import type { IVectorIndex } from "./rag/types.js";
import { InMemoryVectorIndex } from "./rag/vectorStore.js";
import {
  expandPath,
  loadConfig,
  loadEmbeddingCredentials,
  validateIngestConfig,
  type IngestConfigInput,
} from "./utils/config.js";
import { ConfigError, ErrorCode, formatErrorForUser } from "./utils/errors.js";
import { createLogger } from "./utils/logger.js";

// Exit codes
export const EXIT_SUCCESS = 0;
export const EXIT_INVALID_ARGS = 1;
export const EXIT_NO_DOCUMENTS = 2;
export const EXIT_FAILED = 3;

export const DEFAULT_TOP_K = 5;

export interface IngestCommand {
  command: "ingest";
  url: string;
  /** Only the flags given on the command line */
  overrides: IngestConfigInput;
  dryRun: boolean;
  verbose: boolean;
}

export interface QueryCommand {
  command: "query";
  text: string;
  overrides: IngestConfigInput;
  topK: number;
  verbose: boolean;
}

export interface HelpCommand {
  command: "help";
}

export type CliCommand = IngestCommand | QueryCommand | HelpCommand;

/**
 * Collaborators the CLI builds by default. Tests replace them.
 */
export interface CliDependencies {
  fetcher?: IPageFetcher;
  resolveSitemap?: SitemapResolver;
  createEmbedder?: (model: string) => IEmbeddingProvider;
  createVectorIndex?: (dbDir: string, embedder: IEmbeddingProvider) => IVectorIndex;
}

const NUMERIC_FLAGS: Partial<Record<string, "chunkSize" | "maxDepth" | "maxConcurrent" | "batchSize" | "timeoutMs">> = {
  "--chunk-size": "chunkSize",
  "--max-depth": "maxDepth",
  "--max-concurrent": "maxConcurrent",
  "--batch-size": "batchSize",
  "--timeout": "timeoutMs",
};

const STRING_FLAGS: Partial<Record<string, "collection" | "dbDir" | "embeddingModel">> = {
  "--collection": "collection",
  "--db-dir": "dbDir",
  "--embedding-model": "embeddingModel",
};

/**
 * Parse command line arguments. Returns null (after printing why) when they are unusable.
 * Numbers are passed on as given; range checks happen in config validation.
 */
export function parseArgs(args: string[]): CliCommand | null {
  if (args.length === 0 || args.includes("-h") || args.includes("--help")) {
    return { command: "help" };
  }

  const isQuery = args[0] === "query";
  const overrides: IngestConfigInput = {};
  const positionals: string[] = [];
  let dryRun = false;
  let verbose = false;
  let topK = DEFAULT_TOP_K;

  let i = isQuery ? 1 : 0;
  while (i < args.length) {
    const arg = args[i];
    const numericKey = NUMERIC_FLAGS[arg];
    const stringKey = STRING_FLAGS[arg];

    if (arg === "--top-k" && !isQuery) {
      console.error('Error: --top-k is only valid with "query"');
      return null;
    }
    if (numericKey || stringKey || arg === "--top-k") {
      const value = args[i + 1];
      if (value === undefined) {
        console.error(`Error: ${arg} requires a value`);
        return null;
      }
      if (stringKey) {
        overrides[stringKey] = value;
      } else if (numericKey) {
        overrides[numericKey] = Number(value);
      } else {
        topK = Number(value);
      }
      i += 2;
      continue;
    }

    if (arg === "--dry-run") {
      dryRun = true;
    } else if (arg === "-v" || arg === "--verbose") {
      verbose = true;
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option "${arg}"`);
      return null;
    } else {
      positionals.push(arg);
    }
    i++;
  }

  if (isQuery) {
    if (positionals.length === 0) {
      console.error("Error: query requires the text to search for");
      return null;
    }
    if (!Number.isInteger(topK) || topK <= 0) {
      console.error("Error: --top-k must be a positive integer");
      return null;
    }
    return { command: "query", text: positionals.join(" "), overrides, topK, verbose };
  }

  if (positionals.length !== 1) {
    console.error(positionals.length === 0 ? "Error: Missing URL" : "Error: Expected exactly one URL");
    return null;
  }
  return { command: "ingest", url: positionals[0], overrides, dryRun, verbose };
}

/**
 * Print usage information
 */
function printUsage(): void {
  console.log(`
pagevault

Usage:
  pagevault <url> [options]
  pagevault query <text> [options]

The URL is classified by its shape:
  .../sitemap.xml (or any path containing "sitemap")  every listed page is fetched
  .../*.txt                                           the file is fetched as-is
  anything else                                       same-site links are crawled

Options:
  --collection <name>       Vector index collection (default: docs)
  --db-dir <path>           Vector index directory (default: ./lancedb)
  --embedding-model <name>  Embedding model (default: text-embedding-3-small)
  --chunk-size <n>          Maximum characters per chunk (default: 1000)
  --max-depth <n>           Crawl depth for pages (default: 3)
  --max-concurrent <n>      Fetches in flight (default: 10)
  --batch-size <n>          Chunks per index write (default: 100)
  --timeout <ms>            Per-fetch timeout (default: 30000)
  --dry-run                 Store into memory instead of the db directory
  -v, --verbose             Enable verbose output
  -h, --help                Show this help message

Query Options:
  --top-k <n>               Number of chunks to show (default: ${DEFAULT_TOP_K})

Defaults can be set in ~/.pagevault/config.yaml. Embeddings use OPENAI_API_KEY
and, for OpenAI-compatible servers, OPENAI_BASE_URL.

Examples:
  pagevault https://docs.example.com/guide/ --collection guide --max-depth 2
  pagevault https://docs.example.com/sitemap.xml --chunk-size 1500
  pagevault query "how do I configure retries" --collection guide

Exit Codes:
  0 - Success
  1 - Invalid arguments or configuration
  2 - No documents produced
  3 - Execution failed
`);
}

function printOutcome(outcome: IngestionOutcome): void {
  console.log(`\nIngested ${outcome.url} (${outcome.sourceType}) into "${outcome.collection}"`);
  console.log(`  Pages fetched: ${outcome.pagesFetched}`);
  console.log(`  Pages failed:  ${outcome.pagesFailed}`);
  console.log(`  Chunks stored: ${outcome.totalChunksInserted}`);
  console.log(`  Duration:      ${outcome.durationMs}ms`);

  const failed = outcome.perSourceResults.filter((result) => result.error !== undefined);
  if (failed.length > 0) {
    console.log("\nFailed sources:");
    for (const result of failed) {
      console.log(`  - ${result.url}: ${result.error}`);
    }
  }
}

function defaultEmbedder(model: string): IEmbeddingProvider {
  try {
    return createEmbeddingProvider({ model, ...loadEmbeddingCredentials() });
  } catch (err) {
    if (err instanceof EmbeddingError && err.code === "missing_api_key") {
      throw new ConfigError(ErrorCode.CONFIG_MISSING_API_KEY, undefined, {
        cause: err,
        configKey: "OPENAI_API_KEY",
      });
    }
    throw err;
  }
}

async function runIngest(command: IngestCommand, deps: CliDependencies): Promise<number> {
  const config = validateIngestConfig({ ...(await loadConfig()), ...command.overrides });

  const embedder = (deps.createEmbedder ?? defaultEmbedder)(config.embeddingModel);
  const vectorIndex = deps.createVectorIndex
    ? deps.createVectorIndex(config.dbDir, embedder)
    : command.dryRun
      ? new InMemoryVectorIndex(embedder)
      : new LanceDBVectorIndex(expandPath(config.dbDir), embedder);

  const pipeline = new IngestionPipeline({
    fetcher: deps.fetcher ?? new HttpPageFetcher(),
    vectorIndex,
    resolveSitemap: deps.resolveSitemap,
  });

  const outcome = await pipeline.ingest(command.url, config);
  printOutcome(outcome);

  if (outcome.totalChunksInserted === 0) {
    console.error(`\nNo documents were produced from ${command.url}`);
    return EXIT_NO_DOCUMENTS;
  }
  return EXIT_SUCCESS;
}

async function runQuery(command: QueryCommand, deps: CliDependencies): Promise<number> {
  const config = validateIngestConfig({ ...(await loadConfig()), ...command.overrides });

  const embedder = (deps.createEmbedder ?? defaultEmbedder)(config.embeddingModel);
  const vectorIndex = deps.createVectorIndex
    ? deps.createVectorIndex(config.dbDir, embedder)
    : new LanceDBVectorIndex(expandPath(config.dbDir), embedder);

  const collections = await vectorIndex.listCollections();
  if (!collections.includes(config.collection)) {
    console.error(`Collection "${config.collection}" does not exist`);
    return EXIT_NO_DOCUMENTS;
  }

  const collection = await vectorIndex.openOrCreateCollection(config.collection, config.embeddingModel);
  const results = await collection.query(command.text, command.topK);
  if (results.length === 0) {
    console.error(`Collection "${config.collection}" is empty`);
    return EXIT_NO_DOCUMENTS;
  }

  results.forEach((result, rank) => {
    const source = typeof result.metadata.source === "string" ? result.metadata.source : "";
    const headers = typeof result.metadata.headers === "string" ? result.metadata.headers : "";
    console.log(`\n${rank + 1}. [${result.score.toFixed(3)}] ${source}`);
    if (headers) {
      console.log(`   ${headers}`);
    }
    const preview = result.text.replace(/\s+/g, " ").slice(0, 200);
    console.log(`   ${preview}`);
  });
  return EXIT_SUCCESS;
}

/**
 * CLI entry. Resolves with the process exit code.
 */
export async function runCli(args: string[], deps: CliDependencies = {}): Promise<number> {
  const parsed = parseArgs(args);

  if (!parsed) {
    console.error('Use "pagevault --help" for usage information.');
    return EXIT_INVALID_ARGS;
  }
  if (parsed.command === "help") {
    printUsage();
    return EXIT_SUCCESS;
  }

  const logger = createLogger({ logToFile: process.env.PAGEVAULT_LOG_FILE === "true" });
  if (parsed.verbose) {
    logger.setDebugMode(true);
  }
  await logger.init();

  try {
    return parsed.command === "query"
      ? await runQuery(parsed, deps)
      : await runIngest(parsed, deps);
  } catch (error) {
    console.error(formatErrorForUser(error, parsed.verbose ? "detailed" : "medium"));
    return error instanceof ConfigError ? EXIT_INVALID_ARGS : EXIT_FAILED;
  } finally {
    await logger.close();
  }
}
