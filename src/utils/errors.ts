/**
 * pagevault error classes
 *
 * Hierarchical errors with:
 * - Error codes (enum, grouped by area)
 * - User-facing messages at three detail levels
 * - Original cause tracking
 * - Recovery hints and recoverability flags
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum ErrorCode {
  // Base errors (1000-1099)
  UNKNOWN = 1000,

  // Config errors (2000-2099)
  CONFIG_INVALID_VALUE = 2000,
  CONFIG_PARSE_ERROR = 2001,
  CONFIG_MISSING_API_KEY = 2002,
  CONFIG_EMBEDDING_MISMATCH = 2003,

  // Fetch errors (3000-3099)
  FETCH_NETWORK_ERROR = 3000,
  FETCH_TIMEOUT = 3001,
  FETCH_HTTP_STATUS = 3002,
  FETCH_INVALID_URL = 3003,

  // Sitemap errors (4000-4099)
  SITEMAP_UNREACHABLE = 4000,
  SITEMAP_MALFORMED = 4001,

  // Vector index errors (5000-5099)
  VECTOR_INDEX_UNAVAILABLE = 5000,
  VECTOR_INDEX_WRITE_FAILED = 5001,
  VECTOR_INDEX_QUERY_FAILED = 5002,
  VECTOR_INDEX_INVALID_BATCH = 5003,
}

// ============================================================================
// User-facing messages
// ============================================================================

interface ErrorMessages {
  minimal: string;
  medium: string;
  detailed: string;
}

const ERROR_MESSAGES: Record<ErrorCode, ErrorMessages> = {
  [ErrorCode.UNKNOWN]: {
    minimal: "Something went wrong.",
    medium: "An unknown error occurred.",
    detailed: "An unknown error occurred. Run with --verbose for more detail.",
  },
  [ErrorCode.CONFIG_INVALID_VALUE]: {
    minimal: "Invalid option.",
    medium: "A configuration value is invalid.",
    detailed: "A configuration value is invalid. Sizes, depths and limits must be positive integers.",
  },
  [ErrorCode.CONFIG_PARSE_ERROR]: {
    minimal: "Config file unreadable.",
    medium: "The configuration file could not be parsed.",
    detailed: "The configuration file could not be parsed as YAML.",
  },
  [ErrorCode.CONFIG_MISSING_API_KEY]: {
    minimal: "API key missing.",
    medium: "No API key is configured for the embedding provider.",
    detailed: "No API key is configured for the embedding provider. Set OPENAI_API_KEY.",
  },
  [ErrorCode.CONFIG_EMBEDDING_MISMATCH]: {
    minimal: "Embedding model mismatch.",
    medium: "The collection was created with a different embedding model.",
    detailed: "The collection was created with a different embedding model. Vectors from different models cannot share a collection.",
  },
  [ErrorCode.FETCH_NETWORK_ERROR]: {
    minimal: "Network error.",
    medium: "The page could not be reached.",
    detailed: "The page could not be reached because of a network error.",
  },
  [ErrorCode.FETCH_TIMEOUT]: {
    minimal: "Timed out.",
    medium: "The page took too long to respond.",
    detailed: "The page did not respond within the configured timeout.",
  },
  [ErrorCode.FETCH_HTTP_STATUS]: {
    minimal: "Bad HTTP status.",
    medium: "The server answered with an error status.",
    detailed: "The server answered with a non-success HTTP status.",
  },
  [ErrorCode.FETCH_INVALID_URL]: {
    minimal: "Invalid URL.",
    medium: "The URL could not be parsed.",
    detailed: "The URL could not be parsed. Only absolute http(s) URLs are supported.",
  },
  [ErrorCode.SITEMAP_UNREACHABLE]: {
    minimal: "Sitemap unreachable.",
    medium: "The sitemap could not be downloaded.",
    detailed: "The sitemap could not be downloaded or returned a non-200 status.",
  },
  [ErrorCode.SITEMAP_MALFORMED]: {
    minimal: "Sitemap malformed.",
    medium: "The sitemap is not valid XML.",
    detailed: "The sitemap is not valid XML and no URLs could be read from it.",
  },
  [ErrorCode.VECTOR_INDEX_UNAVAILABLE]: {
    minimal: "Vector index unavailable.",
    medium: "The vector index could not be opened.",
    detailed: "The vector index could not be opened. Check the --db-dir location.",
  },
  [ErrorCode.VECTOR_INDEX_WRITE_FAILED]: {
    minimal: "Write failed.",
    medium: "A batch could not be written to the vector index.",
    detailed: "A batch could not be written to the vector index. Earlier batches were kept.",
  },
  [ErrorCode.VECTOR_INDEX_QUERY_FAILED]: {
    minimal: "Query failed.",
    medium: "The vector index query failed.",
    detailed: "The vector index query failed.",
  },
  [ErrorCode.VECTOR_INDEX_INVALID_BATCH]: {
    minimal: "Invalid batch.",
    medium: "Batch ids, texts and metadata have different lengths.",
    detailed: "Batch ids, texts and metadata must have the same length.",
  },
};

const RECOVERY_HINTS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.CONFIG_INVALID_VALUE]: "Run `pagevault --help` to see valid options.",
  [ErrorCode.CONFIG_MISSING_API_KEY]: "Export OPENAI_API_KEY, or point OPENAI_BASE_URL at a local OpenAI-compatible server.",
  [ErrorCode.CONFIG_EMBEDDING_MISMATCH]: "Use the original --embedding-model or ingest into a new --collection.",
  [ErrorCode.FETCH_TIMEOUT]: "Raise --timeout or lower --max-concurrent.",
  [ErrorCode.FETCH_NETWORK_ERROR]: "Check your connection and that the host is reachable.",
  [ErrorCode.VECTOR_INDEX_UNAVAILABLE]: "Check that --db-dir is writable.",
  [ErrorCode.VECTOR_INDEX_WRITE_FAILED]: "Re-run the ingestion; chunk ids are stable so existing rows are updated in place.",
};

// Recoverability flags
const RECOVERABLE_ERRORS = new Set<ErrorCode>([
  ErrorCode.FETCH_NETWORK_ERROR,
  ErrorCode.FETCH_TIMEOUT,
  ErrorCode.FETCH_HTTP_STATUS,
  ErrorCode.SITEMAP_UNREACHABLE,
  ErrorCode.VECTOR_INDEX_WRITE_FAILED,
]);

// ============================================================================
// Base Error Class
// ============================================================================

export interface ErrorOptions {
  cause?: Error;
  recoverable?: boolean;
  recoveryHint?: string;
}

export class PagevaultError extends Error {
  public readonly code: ErrorCode;
  public readonly recoverable: boolean;
  public readonly recoveryHint?: string;
  public readonly cause?: Error;
  public readonly timestamp: Date;

  constructor(code: ErrorCode, message?: string, options?: ErrorOptions) {
    super(message || ERROR_MESSAGES[code].medium);

    this.name = "PagevaultError";
    this.code = code;
    this.cause = options?.cause;
    this.recoverable = options?.recoverable ?? RECOVERABLE_ERRORS.has(code);
    this.recoveryHint = options?.recoveryHint ?? RECOVERY_HINTS[code];
    this.timestamp = new Date();

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get user-friendly message at specified detail level
   */
  getUserMessage(level: ErrorLevel = "medium"): string {
    return ERROR_MESSAGES[this.code][level] || this.message;
  }

  /**
   * Serialize error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      recoveryHint: this.recoveryHint,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause ? {
        name: this.cause.name,
        message: this.cause.message,
      } : undefined,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

/**
 * Configuration errors (invalid options, unreadable config file)
 */
export class ConfigError extends PagevaultError {
  public readonly configKey?: string;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: ErrorOptions & { configKey?: string }
  ) {
    super(code, message, options);
    this.name = "ConfigError";
    this.configKey = options?.configKey;
  }
}

/**
 * Page and sitemap fetch errors
 */
export class FetchError extends PagevaultError {
  public readonly url?: string;
  public readonly statusCode?: number;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: ErrorOptions & { url?: string; statusCode?: number }
  ) {
    super(code, message, options);
    this.name = "FetchError";
    this.url = options?.url;
    this.statusCode = options?.statusCode;
  }

  /**
   * Create FetchError from whatever a fetch call rejected with
   */
  static fromError(error: unknown, url?: string): FetchError {
    if (error instanceof FetchError) {
      return error;
    }

    const cause = error instanceof Error ? error : undefined;
    const message = error instanceof Error ? error.message : String(error);
    const lowerMessage = message.toLowerCase();
    const name = error instanceof Error ? error.name : "";

    if (name === "AbortError" || name === "TimeoutError" || lowerMessage.includes("timeout") ||
        lowerMessage.includes("etimedout") || lowerMessage.includes("aborted")) {
      return new FetchError(ErrorCode.FETCH_TIMEOUT, message, { cause, url });
    }
    if (lowerMessage.includes("invalid url")) {
      return new FetchError(ErrorCode.FETCH_INVALID_URL, message, { cause, url });
    }

    // Default to network error for anything fetch() threw
    return new FetchError(ErrorCode.FETCH_NETWORK_ERROR, message, { cause, url });
  }
}

/**
 * Vector index errors (open, write, query)
 */
export class VectorIndexError extends PagevaultError {
  public readonly collection?: string;
  /** Chunks that were written by earlier batches before this failure */
  public readonly insertedBeforeFailure?: number;

  constructor(
    code: ErrorCode,
    message?: string,
    options?: ErrorOptions & { collection?: string; insertedBeforeFailure?: number }
  ) {
    super(code, message, options);
    this.name = "VectorIndexError";
    this.collection = options?.collection;
    this.insertedBeforeFailure = options?.insertedBeforeFailure;
  }
}

// ============================================================================
// Error Formatter Utilities
// ============================================================================

export type ErrorLevel = "minimal" | "medium" | "detailed";

/**
 * Format error for user display based on detail level
 */
export function formatErrorForUser(error: unknown, level: ErrorLevel = "medium"): string {
  if (error instanceof PagevaultError) {
    let message = error.getUserMessage(level);

    if (level !== "minimal" && error.message !== message) {
      message += ` (${error.message})`;
    }

    if (level !== "minimal" && error.recoveryHint) {
      message += `\n\nHint: ${error.recoveryHint}`;
    }

    if (level === "detailed") {
      message += `\n\n[Error code: ${error.code}]`;
      if (error.cause) {
        message += `\n[Cause: ${error.cause.message}]`;
      }
      if (error instanceof FetchError && error.url) {
        message += `\n[URL: ${error.url}]`;
      }
      if (error instanceof VectorIndexError && error.insertedBeforeFailure !== undefined) {
        message += `\n[Chunks written before failure: ${error.insertedBeforeFailure}]`;
      }
    }

    return message;
  }

  if (error instanceof Error) {
    switch (level) {
      case "minimal":
        return "Something went wrong.";
      case "medium":
        return `Error: ${error.message}`;
      case "detailed":
        return `Error: ${error.message}\n${error.stack || ""}`;
    }
  }

  return level === "minimal" ? "Something went wrong." : `Error: ${String(error)}`;
}

/**
 * Check if an error is recoverable
 */
export function isRecoverableError(error: unknown): boolean {
  if (error instanceof PagevaultError) {
    return error.recoverable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnrefused") ||
      message.includes("econnreset") ||
      message.includes("etimedout") ||
      message.includes("network")
    );
  }

  return false;
}

/**
 * Get the error code of any thrown value
 */
export function getErrorCode(error: unknown): ErrorCode {
  return error instanceof PagevaultError ? error.code : ErrorCode.UNKNOWN;
}

/**
 * Plain message of any thrown value, for result records and logs
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
