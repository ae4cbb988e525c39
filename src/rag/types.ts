/**
 * 벡터 인덱스 타입 정의
 * 컬렉션 단위 upsert / 유사도 검색 인터페이스
 */

import { z } from "zod";

// ============================================================================
// Zod Schemas
// ============================================================================

/**
 * 청크 메타데이터 값 (LanceDB/JSON 양쪽에 그대로 저장 가능한 스칼라만 허용)
 */
export const MetadataValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const VectorMetadataSchema = z.record(MetadataValueSchema);

export type MetadataValue = z.infer<typeof MetadataValueSchema>;
export type VectorMetadata = z.infer<typeof VectorMetadataSchema>;

/**
 * upsert 배치 스키마. ids, texts, metadatas 길이는 같아야 한다.
 */
export const UpsertBatchSchema = z
  .object({
    ids: z.array(z.string().min(1)),
    texts: z.array(z.string()),
    metadatas: z.array(VectorMetadataSchema),
  })
  .refine(
    (batch) => batch.ids.length === batch.texts.length && batch.ids.length === batch.metadatas.length,
    { message: "ids, texts and metadatas must have the same length" }
  );

export type UpsertBatch = z.infer<typeof UpsertBatchSchema>;

// ============================================================================
// Vector Index Interfaces
// ============================================================================

/**
 * 유사도 검색 결과
 */
export interface VectorQueryResult {
  id: string;
  text: string;
  /** 코사인 유사도 (클수록 가까움) */
  score: number;
  metadata: VectorMetadata;
}

/**
 * 열린 컬렉션 핸들
 */
export interface IVectorCollection {
  readonly name: string;
  readonly embeddingModel: string;

  /**
   * id 기준 upsert. 같은 id 는 덮어쓴다.
   * 실패 시 일부만 기록되었을 수 있다 (원자성 보장 없음).
   */
  upsertBatch(ids: string[], texts: string[], metadatas: VectorMetadata[]): Promise<void>;

  /** 유사도 순 상위 topK */
  query(queryText: string, topK: number): Promise<VectorQueryResult[]>;

  /** 저장된 청크 수 */
  count(): Promise<number>;
}

/**
 * 벡터 인덱스 - 이름 있는 컬렉션의 집합
 */
export interface IVectorIndex {
  /**
   * 컬렉션을 열거나 없으면 생성한다.
   * 다른 임베딩 모델로 만들어진 컬렉션을 열면 ConfigError.
   */
  openOrCreateCollection(name: string, embeddingModelName: string): Promise<IVectorCollection>;

  /** 컬렉션 이름 목록 */
  listCollections(): Promise<string[]>;
}

/**
 * upsert 입력 검증. 길이가 맞지 않으면 zod 메시지를 돌려준다.
 */
export function checkUpsertBatch(batch: UpsertBatch): string | null {
  const result = UpsertBatchSchema.safeParse(batch);
  return result.success ? null : result.error.issues[0].message;
}
