/**
 * LanceDB-based vector index for persistent embedding storage
 *
 * 컬렉션 하나가 LanceDB 테이블 하나에 대응한다.
 * 컬렉션별 임베딩 모델은 별도 레지스트리 테이블에 기록한다.
 */

import * as lancedb from "@lancedb/lancedb";
import type { Connection, Table } from "@lancedb/lancedb";
import fs from "node:fs/promises";
import { z } from "zod";
import type { IEmbeddingProvider } from "./embeddings/provider.js";
import {
  checkUpsertBatch,
  VectorMetadataSchema,
  type IVectorCollection,
  type IVectorIndex,
  type VectorMetadata,
  type VectorQueryResult,
} from "./types.js";
import { ConfigError, ErrorCode, VectorIndexError } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

/** 컬렉션 -> 임베딩 모델 레지스트리 테이블 */
export const REGISTRY_TABLE = "_pagevault_collections";

/**
 * LanceDB 검색 결과 행 (toArray() 는 타입이 없으므로 zod 로 검증)
 */
const SearchRowSchema = z.object({
  id: z.string(),
  text: z.string(),
  metadata: z.string(),
  _distance: z.number(),
});

const RegistryRowSchema = z.object({
  name: z.string(),
  embeddingModel: z.string(),
});

function quoteSqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function parseMetadata(raw: string): VectorMetadata {
  try {
    const result = VectorMetadataSchema.safeParse(JSON.parse(raw));
    return result.success ? result.data : {};
  } catch {
    return {};
  }
}

class LanceDBCollection implements IVectorCollection {
  constructor(
    public readonly name: string,
    public readonly embeddingModel: string,
    private readonly db: Connection,
    private readonly embedder: IEmbeddingProvider,
    private table: Table | null
  ) {}

  async upsertBatch(ids: string[], texts: string[], metadatas: VectorMetadata[]): Promise<void> {
    const problem = checkUpsertBatch({ ids, texts, metadatas });
    if (problem) {
      throw new VectorIndexError(ErrorCode.VECTOR_INDEX_INVALID_BATCH, problem, { collection: this.name });
    }
    if (ids.length === 0) return;

    const vectors = await this.embedder.embedBatch(texts);
    const records: Array<Record<string, unknown>> = ids.map((id, i) => ({
      id,
      text: texts[i],
      vector: vectors[i],
      source: typeof metadatas[i].source === "string" ? metadatas[i].source : "",
      metadata: JSON.stringify(metadatas[i]),
    }));

    try {
      if (!this.table) {
        this.table = await this.db.createTable(this.name, records);
        return;
      }
      await this.table
        .mergeInsert("id")
        .whenMatchedUpdateAll()
        .whenNotMatchedInsertAll()
        .execute(records);
    } catch (err) {
      throw new VectorIndexError(
        ErrorCode.VECTOR_INDEX_WRITE_FAILED,
        `Upsert into "${this.name}" failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err instanceof Error ? err : undefined, collection: this.name }
      );
    }
  }

  async query(queryText: string, topK: number): Promise<VectorQueryResult[]> {
    if (!this.table || topK <= 0) return [];

    const queryVector = await this.embedder.embed(queryText);
    let rows: unknown[];
    try {
      rows = await this.table
        .vectorSearch(queryVector)
        .distanceType("cosine")
        .limit(topK)
        .toArray();
    } catch (err) {
      throw new VectorIndexError(
        ErrorCode.VECTOR_INDEX_QUERY_FAILED,
        `Query on "${this.name}" failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err instanceof Error ? err : undefined, collection: this.name }
      );
    }

    const results: VectorQueryResult[] = [];
    for (const raw of rows) {
      const row = SearchRowSchema.safeParse(raw);
      if (!row.success) continue;
      results.push({
        id: row.data.id,
        text: row.data.text,
        score: 1 - row.data._distance, // cosine distance -> similarity
        metadata: parseMetadata(row.data.metadata),
      });
    }
    return results;
  }

  async count(): Promise<number> {
    if (!this.table) return 0;
    return await this.table.countRows();
  }
}

export class LanceDBVectorIndex implements IVectorIndex {
  private db: Connection | null = null;
  private readonly dbPath: string;

  constructor(dbPath: string, private readonly embedder: IEmbeddingProvider) {
    this.dbPath = dbPath;
  }

  async initialize(): Promise<void> {
    if (this.db) return;
    try {
      await fs.mkdir(this.dbPath, { recursive: true });
      this.db = await lancedb.connect(this.dbPath);
    } catch (err) {
      throw new VectorIndexError(
        ErrorCode.VECTOR_INDEX_UNAVAILABLE,
        `Cannot open LanceDB at ${this.dbPath}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err instanceof Error ? err : undefined }
      );
    }
  }

  async openOrCreateCollection(name: string, embeddingModelName: string): Promise<IVectorCollection> {
    const db = await this.connection();
    const registered = await this.registeredModel(db, name);

    if (registered !== null && registered !== embeddingModelName) {
      throw new ConfigError(
        ErrorCode.CONFIG_EMBEDDING_MISMATCH,
        `Collection "${name}" uses ${registered}, not ${embeddingModelName}`,
        { configKey: "embeddingModel" }
      );
    }
    if (registered === null) {
      await this.register(db, name, embeddingModelName);
    }

    const tableNames = await db.tableNames();
    const table = tableNames.includes(name) ? await db.openTable(name) : null;
    getLogger().debug("Opened collection", { name, embeddingModel: embeddingModelName, exists: table !== null });

    return new LanceDBCollection(name, embeddingModelName, db, this.embedder, table);
  }

  async listCollections(): Promise<string[]> {
    const db = await this.connection();
    const names = await db.tableNames();
    return names.filter((n) => n !== REGISTRY_TABLE);
  }

  private async connection(): Promise<Connection> {
    await this.initialize();
    if (!this.db) {
      throw new VectorIndexError(ErrorCode.VECTOR_INDEX_UNAVAILABLE, "LanceDB connection not initialized");
    }
    return this.db;
  }

  private async registeredModel(db: Connection, name: string): Promise<string | null> {
    const tableNames = await db.tableNames();
    if (!tableNames.includes(REGISTRY_TABLE)) return null;

    const registry = await db.openTable(REGISTRY_TABLE);
    const rows: unknown[] = await registry
      .query()
      .where(`name = ${quoteSqlString(name)}`)
      .limit(1)
      .toArray();
    const row = RegistryRowSchema.safeParse(rows[0]);
    return row.success ? row.data.embeddingModel : null;
  }

  private async register(db: Connection, name: string, embeddingModel: string): Promise<void> {
    const record = [{ name, embeddingModel, createdAt: new Date().toISOString() }];
    const tableNames = await db.tableNames();
    if (tableNames.includes(REGISTRY_TABLE)) {
      const registry = await db.openTable(REGISTRY_TABLE);
      await registry.add(record);
    } else {
      await db.createTable(REGISTRY_TABLE, record);
    }
  }
}
