/**
 * Tests for Config utility
 *
 * Tests that touch the config file point PAGEVAULT_CONFIG_DIR at a temp directory
 * so the user's real ~/.pagevault/ is never read or written.
 */

import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import {
  DEFAULT_INGEST_CONFIG,
  expandPath,
  getConfigDir,
  getConfigPath,
  loadConfig,
  loadEmbeddingCredentials,
  saveConfig,
  validateIngestConfig,
} from "../../src/utils/config.js";
import { ConfigError, ErrorCode } from "../../src/utils/errors.js";

describe("expandPath", () => {
  it("expands the home directory", () => {
    expect(expandPath("~/lancedb")).toBe(path.join(os.homedir(), "lancedb"));
    expect(expandPath("~")).toBe(os.homedir());
  });

  it("resolves relative paths", () => {
    expect(expandPath("./lancedb")).toBe(path.resolve("lancedb"));
  });
});

describe("validateIngestConfig", () => {
  it("fills defaults", () => {
    expect(validateIngestConfig({})).toEqual({
      collection: "docs",
      dbDir: "./lancedb",
      embeddingModel: "text-embedding-3-small",
      chunkSize: 1000,
      maxDepth: 3,
      maxConcurrent: 10,
      batchSize: 100,
      timeoutMs: 30000,
    });
    expect(DEFAULT_INGEST_CONFIG.chunkSize).toBe(1000);
  });

  it("keeps given values", () => {
    const config = validateIngestConfig({ collection: "guide", chunkSize: 500, maxDepth: 1 });
    expect(config).toMatchObject({ collection: "guide", chunkSize: 500, maxDepth: 1, batchSize: 100 });
  });

  it.each([
    [{ chunkSize: 0 }, "chunkSize", "chunkSize must be greater than 0"],
    [{ batchSize: -3 }, "batchSize", "batchSize must be greater than 0"],
    [{ maxDepth: 1.5 }, "maxDepth", "maxDepth must be an integer"],
    [{ timeoutMs: Number("abc") }, "timeoutMs", "timeoutMs must be a number"],
    [{ collection: "" }, "collection", "collection must not be empty"],
  ])("rejects %j", (input, configKey, message) => {
    let caught: unknown;
    try {
      validateIngestConfig(input);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ code: ErrorCode.CONFIG_INVALID_VALUE, configKey, message });
  });
});

describe("Config paths (default)", () => {
  let originalDir: string | undefined;

  beforeEach(() => {
    originalDir = process.env.PAGEVAULT_CONFIG_DIR;
    delete process.env.PAGEVAULT_CONFIG_DIR;
  });

  afterEach(() => {
    process.env.PAGEVAULT_CONFIG_DIR = originalDir;
  });

  it("should return config directory in home folder", () => {
    expect(getConfigDir()).toBe(path.join(os.homedir(), ".pagevault"));
  });

  it("should return config file path", () => {
    expect(getConfigPath()).toBe(path.join(os.homedir(), ".pagevault", "config.yaml"));
  });
});

describe("Config file", () => {
  let tempDir: string;
  let originalDir: string | undefined;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "pagevault-config-test-"));
    originalDir = process.env.PAGEVAULT_CONFIG_DIR;
    process.env.PAGEVAULT_CONFIG_DIR = tempDir;
  });

  afterEach(async () => {
    process.env.PAGEVAULT_CONFIG_DIR = originalDir;
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should use the override directory", () => {
    expect(getConfigPath()).toBe(path.join(tempDir, "config.yaml"));
  });

  it("should return {} when the file does not exist", async () => {
    expect(await loadConfig()).toEqual({});
  });

  it("should save and load values", async () => {
    await saveConfig({ collection: "guide", chunkSize: 800 });

    await expect(fs.access(getConfigPath())).resolves.toBeUndefined();
    expect(await loadConfig()).toEqual({ collection: "guide", chunkSize: 800 });
  });

  it("should read hand-written YAML", async () => {
    await fs.writeFile(getConfigPath(), "dbDir: ~/vectors\nmaxConcurrent: 4\n", "utf-8");

    expect(await loadConfig()).toEqual({ dbDir: "~/vectors", maxConcurrent: 4 });
  });

  it("should treat an empty file as no settings", async () => {
    await fs.writeFile(getConfigPath(), "", "utf-8");

    expect(await loadConfig()).toEqual({});
  });

  it("should reject malformed YAML", async () => {
    await fs.writeFile(getConfigPath(), "collection: [unclosed\n", "utf-8");

    await expect(loadConfig()).rejects.toMatchObject({ code: ErrorCode.CONFIG_PARSE_ERROR });
  });

  it("should reject an invalid value with its key", async () => {
    await fs.writeFile(getConfigPath(), "chunkSize: zero\n", "utf-8");

    await expect(loadConfig()).rejects.toMatchObject({
      code: ErrorCode.CONFIG_INVALID_VALUE,
      configKey: "chunkSize",
    });
  });
});

describe("loadEmbeddingCredentials", () => {
  it("should read the key and base URL", () => {
    expect(loadEmbeddingCredentials({ OPENAI_API_KEY: "test-secret", OPENAI_BASE_URL: "http://localhost:11434/v1" }))
      .toEqual({ apiKey: "test-secret", baseURL: "http://localhost:11434/v1" });
  });

  it("should treat empty values as unset", () => {
    expect(loadEmbeddingCredentials({ OPENAI_API_KEY: "" })).toEqual({ apiKey: undefined, baseURL: undefined });
  });
});
