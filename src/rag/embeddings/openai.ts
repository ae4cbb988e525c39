/**
 * OpenAI 호환 임베딩 프로바이더
 *
 * OPENAI_BASE_URL 로 Ollama 등 OpenAI 호환 서버도 사용할 수 있다.
 */

import OpenAI from "openai";
import type { IEmbeddingProvider } from "./provider.js";
import { EmbeddingError, type EmbeddingProviderStatus } from "./types.js";
import { getLogger } from "../../utils/logger.js";

/** 요청 한 번에 보내는 최대 입력 수 */
export const DEFAULT_EMBEDDING_BATCH_SIZE = 64;

/**
 * OpenAI 클라이언트 중 임베딩 호출에 필요한 부분
 */
export interface EmbeddingsClient {
  embeddings: {
    create(body: OpenAI.EmbeddingCreateParams): Promise<OpenAI.CreateEmbeddingResponse>;
  };
}

export interface OpenAIProviderOptions {
  model: string;
  apiKey?: string;
  baseURL?: string;
  /** 요청당 입력 수 */
  batchSize?: number;
  /** 테스트에서 클라이언트를 주입할 때 사용 */
  client?: EmbeddingsClient;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  public readonly name = "openai";
  public readonly modelId: string;

  private readonly client: EmbeddingsClient;
  private readonly batchSize: number;
  private embeddedCount = 0;

  constructor(options: OpenAIProviderOptions) {
    this.modelId = options.model;
    this.batchSize = options.batchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE;

    if (options.client) {
      this.client = options.client;
    } else {
      // A custom base URL usually points at a local server that ignores the key
      const apiKey = options.apiKey ?? (options.baseURL ? "unused" : undefined);
      if (!apiKey) {
        throw new EmbeddingError(
          "OPENAI_API_KEY is not set",
          "missing_api_key"
        );
      }
      this.client = new OpenAI({ apiKey, baseURL: options.baseURL });
    }
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      vectors.push(...(await this.requestBatch(batch)));
    }

    this.embeddedCount += texts.length;
    return vectors;
  }

  getStatus(): EmbeddingProviderStatus {
    return {
      name: this.name,
      modelId: this.modelId,
      embeddedCount: this.embeddedCount,
    };
  }

  private async requestBatch(batch: string[]): Promise<number[][]> {
    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await this.client.embeddings.create({
        model: this.modelId,
        input: batch,
      });
    } catch (err) {
      throw new EmbeddingError(
        `Embedding request failed: ${err instanceof Error ? err.message : String(err)}`,
        "request_failed",
        { cause: err }
      );
    }

    if (response.data.length !== batch.length) {
      throw new EmbeddingError(
        `Expected ${batch.length} embeddings, got ${response.data.length}`,
        "invalid_response"
      );
    }

    getLogger().debug("Embedded batch", { model: this.modelId, size: batch.length });

    // 응답 순서는 보장되지 않으므로 index 기준으로 정렬
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}
