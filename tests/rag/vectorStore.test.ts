/**
 * Tests for the in-memory vector index
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { InMemoryVectorIndex, cosineSimilarity } from "../../src/rag/vectorStore.js";
import { checkUpsertBatch } from "../../src/rag/types.js";
import { ConfigError, ErrorCode } from "../../src/utils/errors.js";
import { FakeEmbeddingProvider } from "../fakes.js";

describe("cosineSimilarity", () => {
  it("scores identical directions 1 and orthogonal ones 0", () => {
    expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("returns 0 for mismatched or zero vectors", () => {
    expect(cosineSimilarity([1, 2], [1, 2, 3])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe("checkUpsertBatch", () => {
  it("accepts equal lengths", () => {
    expect(checkUpsertBatch({ ids: ["a"], texts: ["x"], metadatas: [{ source: "s" }] })).toBeNull();
  });

  it("reports unequal lengths", () => {
    expect(checkUpsertBatch({ ids: ["a", "b"], texts: ["x"], metadatas: [{}] })).toBe(
      "ids, texts and metadatas must have the same length"
    );
  });
});

describe("InMemoryVectorIndex", () => {
  let embedder: FakeEmbeddingProvider;
  let index: InMemoryVectorIndex;

  beforeEach(() => {
    embedder = new FakeEmbeddingProvider();
    index = new InMemoryVectorIndex(embedder);
  });

  it("creates a collection once and lists it", async () => {
    const first = await index.openOrCreateCollection("docs", "model-a");
    const again = await index.openOrCreateCollection("docs", "model-a");

    expect(again).toBe(first);
    expect(await index.listCollections()).toEqual(["docs"]);
  });

  it("refuses to reopen a collection with another model", async () => {
    await index.openOrCreateCollection("docs", "model-a");

    const error = await index.openOrCreateCollection("docs", "model-b").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      code: ErrorCode.CONFIG_EMBEDDING_MISMATCH,
      message: 'Collection "docs" uses model-a, not model-b',
    });
  });

  it("upserts by id", async () => {
    const collection = await index.openOrCreateCollection("docs", "model-a");

    await collection.upsertBatch(["chunk-0", "chunk-1"], ["alpha", "beta"], [{ source: "a" }, { source: "b" }]);
    await collection.upsertBatch(["chunk-1"], ["gamma"], [{ source: "c" }]);

    expect(await collection.count()).toBe(2);
    const [top] = await collection.query("gamma", 1);
    expect(top).toMatchObject({ id: "chunk-1", text: "gamma", metadata: { source: "c" } });
  });

  it("embeds each batch in one call", async () => {
    const collection = await index.openOrCreateCollection("docs", "model-a");

    await collection.upsertBatch(["1", "2", "3"], ["a", "b", "c"], [{}, {}, {}]);

    expect(embedder.batchCalls).toEqual([["a", "b", "c"]]);
  });

  it("ranks by similarity and honours topK", async () => {
    const collection = await index.openOrCreateCollection("docs", "model-a");
    await collection.upsertBatch(
      ["x", "y", "z"],
      ["zzzz zzzz", "apple banana", "apple pie"],
      [{}, {}, {}]
    );

    const results = await collection.query("apple", 2);

    expect(results.map((r) => r.id)).toEqual(["z", "y"]);
    expect(results[0].score).toBeGreaterThan(results[1].score);
  });

  it("returns nothing from an empty collection or for topK 0", async () => {
    const collection = await index.openOrCreateCollection("docs", "model-a");
    expect(await collection.query("anything", 5)).toEqual([]);

    await collection.upsertBatch(["1"], ["a"], [{}]);
    expect(await collection.query("a", 0)).toEqual([]);
  });

  it("rejects batches of unequal length", async () => {
    const collection = await index.openOrCreateCollection("docs", "model-a");

    await expect(collection.upsertBatch(["1", "2"], ["a"], [{}])).rejects.toMatchObject({
      code: ErrorCode.VECTOR_INDEX_INVALID_BATCH,
      collection: "docs",
    });
    expect(await collection.count()).toBe(0);
  });
});
