/**
 * 임베딩 프로바이더 인터페이스
 *
 * 벡터 인덱스는 이 인터페이스만 알고, 실제 백엔드(OpenAI 호환 API, 테스트용 가짜 등)는 주입된다.
 */

import type { EmbeddingProviderStatus } from "./types.js";

export interface IEmbeddingProvider {
  /**
   * 프로바이더 이름
   * @example 'openai'
   */
  readonly name: string;

  /**
   * 현재 사용 중인 모델 ID
   * @example 'text-embedding-3-small'
   */
  readonly modelId: string;

  /**
   * 단일 텍스트 임베딩 생성
   */
  embed(text: string): Promise<number[]>;

  /**
   * 배치 텍스트 임베딩 생성
   *
   * @returns 임베딩 벡터 배열 (입력 순서 유지)
   */
  embedBatch(texts: string[]): Promise<number[][]>;

  /**
   * 프로바이더 상태 조회
   */
  getStatus(): EmbeddingProviderStatus;
}
