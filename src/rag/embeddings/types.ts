/**
 * 임베딩 타입 정의
 *
 * 임베딩 프로바이더가 공유하는 상태/에러 타입.
 */

// ============================================================================
// Provider Status
// ============================================================================

/**
 * 임베딩 프로바이더 상태
 */
export interface EmbeddingProviderStatus {
  /** 프로바이더 이름 */
  name: string;
  /** 현재 사용 중인 모델 ID */
  modelId: string;
  /** 지금까지 임베딩한 텍스트 수 */
  embeddedCount: number;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * 임베딩 오류 타입
 */
export type EmbeddingErrorCode =
  | "missing_api_key"
  | "request_failed"
  | "invalid_response"
  | "invalid_input"
  | "unsupported_provider";

/**
 * 임베딩 오류 클래스
 */
export class EmbeddingError extends Error {
  public readonly code: EmbeddingErrorCode;

  constructor(message: string, code: EmbeddingErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingError";
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmbeddingError);
    }
  }
}
