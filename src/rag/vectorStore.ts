/**
 * 인메모리 벡터 인덱스 (테스트 및 --dry-run 실행용)
 */

import type { IEmbeddingProvider } from "./embeddings/provider.js";
import {
  checkUpsertBatch,
  type IVectorCollection,
  type IVectorIndex,
  type VectorMetadata,
  type VectorQueryResult,
} from "./types.js";
import { ConfigError, ErrorCode, VectorIndexError } from "../utils/errors.js";

interface StoredRecord {
  id: string;
  text: string;
  vector: number[];
  metadata: VectorMetadata;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0, normA = 0, normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const mag = Math.sqrt(normA) * Math.sqrt(normB);
  return mag === 0 ? 0 : dot / mag;
}

class InMemoryCollection implements IVectorCollection {
  private records: Map<string, StoredRecord> = new Map();

  constructor(
    public readonly name: string,
    public readonly embeddingModel: string,
    private readonly embedder: IEmbeddingProvider
  ) {}

  async upsertBatch(ids: string[], texts: string[], metadatas: VectorMetadata[]): Promise<void> {
    const problem = checkUpsertBatch({ ids, texts, metadatas });
    if (problem) {
      throw new VectorIndexError(ErrorCode.VECTOR_INDEX_INVALID_BATCH, problem, { collection: this.name });
    }
    if (ids.length === 0) return;

    const vectors = await this.embedder.embedBatch(texts);
    for (let i = 0; i < ids.length; i++) {
      this.records.set(ids[i], {
        id: ids[i],
        text: texts[i],
        vector: vectors[i],
        metadata: { ...metadatas[i] },
      });
    }
  }

  async query(queryText: string, topK: number): Promise<VectorQueryResult[]> {
    if (this.records.size === 0 || topK <= 0) return [];

    const queryVector = await this.embedder.embed(queryText);
    const scored: VectorQueryResult[] = [];
    for (const record of this.records.values()) {
      scored.push({
        id: record.id,
        text: record.text,
        score: cosineSimilarity(queryVector, record.vector),
        metadata: record.metadata,
      });
    }

    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, topK);
  }

  async count(): Promise<number> {
    return this.records.size;
  }
}

export class InMemoryVectorIndex implements IVectorIndex {
  private collections: Map<string, InMemoryCollection> = new Map();

  constructor(private readonly embedder: IEmbeddingProvider) {}

  async openOrCreateCollection(name: string, embeddingModelName: string): Promise<IVectorCollection> {
    const existing = this.collections.get(name);
    if (existing) {
      if (existing.embeddingModel !== embeddingModelName) {
        throw new ConfigError(
          ErrorCode.CONFIG_EMBEDDING_MISMATCH,
          `Collection "${name}" uses ${existing.embeddingModel}, not ${embeddingModelName}`,
          { configKey: "embeddingModel" }
        );
      }
      return existing;
    }

    const collection = new InMemoryCollection(name, embeddingModelName, this.embedder);
    this.collections.set(name, collection);
    return collection;
  }

  async listCollections(): Promise<string[]> {
    return Array.from(this.collections.keys());
  }
}
