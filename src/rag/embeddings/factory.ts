/**
 * Embedding Provider Factory
 *
 * 임베딩 프로바이더를 생성하는 팩토리 함수
 */

import type { IEmbeddingProvider } from "./provider.js";
import { OpenAIEmbeddingProvider } from "./openai.js";
import { EmbeddingError } from "./types.js";

/**
 * 지원되는 프로바이더 타입
 */
export type ProviderType = "openai";

/**
 * 프로바이더 생성 옵션
 */
export interface ProviderOptions {
  /** 프로바이더 타입 (기본값: 'openai') */
  type?: ProviderType;
  /** 모델 이름 */
  model: string;
  apiKey?: string;
  baseURL?: string;
  /** 요청당 입력 수 */
  batchSize?: number;
}

/**
 * 임베딩 프로바이더 생성 팩토리 함수
 *
 * @example
 * ```typescript
 * const provider = createEmbeddingProvider({
 *   model: "nomic-embed-text",
 *   baseURL: "http://localhost:11434/v1",
 * });
 * ```
 */
export function createEmbeddingProvider(options: ProviderOptions): IEmbeddingProvider {
  const { type = "openai", model, apiKey, baseURL, batchSize } = options;

  switch (type) {
    case "openai":
      return new OpenAIEmbeddingProvider({ model, apiKey, baseURL, batchSize });

    default:
      throw new EmbeddingError(`Unsupported embedding provider: ${String(type)}`, "unsupported_provider");
  }
}
