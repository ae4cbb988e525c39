import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { ConfigError, ErrorCode } from "./errors.js";

/**
 * Expand tilde (~) to home directory in a path.
 * Also handles Windows %USERPROFILE% environment variable.
 *
 * @param inputPath - The path to expand
 * @returns The expanded absolute path
 *
 * @example
 * expandPath("~/lancedb"); // "/Users/username/lancedb" on macOS
 */
export function expandPath(inputPath: string): string {
  if (!inputPath) return inputPath;

  if (inputPath.startsWith("~/")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === "~") {
    return os.homedir();
  }

  if (process.platform === "win32" && inputPath.includes("%USERPROFILE%")) {
    return inputPath.replace(/%USERPROFILE%/gi, os.homedir());
  }

  return path.resolve(inputPath);
}

// ============================================================================
// Ingestion settings
// ============================================================================

const positiveInt = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` })
    .int(`${label} must be an integer`)
    .positive(`${label} must be greater than 0`);

/**
 * Run settings for one ingestion. Every size, depth and limit must be positive.
 */
export const IngestConfigSchema = z.object({
  /** Vector index collection name */
  collection: z.string().trim().min(1, "collection must not be empty").default("docs"),
  /** Vector index location */
  dbDir: z.string().min(1, "dbDir must not be empty").default("./lancedb"),
  /** Embedding model the collection is bound to */
  embeddingModel: z.string().min(1, "embeddingModel must not be empty").default("text-embedding-3-small"),
  /** Maximum chunk length in characters */
  chunkSize: positiveInt("chunkSize").default(1000),
  /** BFS levels for a recursive crawl */
  maxDepth: positiveInt("maxDepth").default(3),
  /** Fetches in flight within one batch */
  maxConcurrent: positiveInt("maxConcurrent").default(10),
  /** Chunks per vector index upsert */
  batchSize: positiveInt("batchSize").default(100),
  /** Per-fetch timeout (ms) */
  timeoutMs: positiveInt("timeoutMs").default(30000),
});

export type IngestConfig = z.infer<typeof IngestConfigSchema>;
export type IngestConfigInput = z.input<typeof IngestConfigSchema>;

export const DEFAULT_INGEST_CONFIG: IngestConfig = IngestConfigSchema.parse({});

/**
 * Validate ingestion settings, filling defaults.
 *
 * @throws {ConfigError} naming the first offending key
 */
export function validateIngestConfig(input: unknown): IngestConfig {
  const result = IngestConfigSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const configKey = issue.path.join(".");
  throw new ConfigError(ErrorCode.CONFIG_INVALID_VALUE, issue.message, { configKey });
}

// ============================================================================
// Config file (~/.pagevault/config.yaml)
// ============================================================================

/**
 * Get the configuration directory path.
 * PAGEVAULT_CONFIG_DIR overrides ~/.pagevault (tests use it to avoid touching real config).
 */
export function getConfigDir(): string {
  if (process.env.PAGEVAULT_CONFIG_DIR) {
    return process.env.PAGEVAULT_CONFIG_DIR;
  }
  return path.join(os.homedir(), ".pagevault");
}

/**
 * Get the path to the configuration file.
 *
 * @returns The absolute path to config.yaml
 */
export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.yaml");
}

/**
 * Load user defaults from disk.
 *
 * A missing or unreadable file yields an empty object so CLI defaults apply.
 * Keys present in the file are type-checked; defaults are filled later by
 * validateIngestConfig once CLI flags are merged.
 *
 * @throws {ConfigError} If the file is malformed YAML or holds an invalid value
 */
export async function loadConfig(): Promise<Partial<IngestConfig>> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, `Failed to parse ${configPath}`, {
      cause: err instanceof Error ? err : undefined,
    });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = IngestConfigSchema.partial().safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(ErrorCode.CONFIG_INVALID_VALUE, `${configPath}: ${issue.message}`, {
      configKey: issue.path.join("."),
    });
  }
  return result.data;
}

/**
 * Save user defaults to disk.
 *
 * @param config - The values to persist
 */
export async function saveConfig(config: Partial<IngestConfig>): Promise<void> {
  await fs.mkdir(getConfigDir(), { recursive: true });
  await fs.writeFile(getConfigPath(), stringifyYaml(config), "utf-8");
}

// ============================================================================
// Embedding credentials
// ============================================================================

export interface EmbeddingCredentials {
  apiKey?: string;
  baseURL?: string;
}

/**
 * Read embedding provider credentials from the environment.
 */
export function loadEmbeddingCredentials(env: NodeJS.ProcessEnv = process.env): EmbeddingCredentials {
  return {
    apiKey: env.OPENAI_API_KEY || undefined,
    baseURL: env.OPENAI_BASE_URL || undefined,
  };
}
