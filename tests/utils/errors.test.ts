/**
 * Tests for error classes and formatting
 */

import { describe, it, expect } from "@jest/globals";
import {
  ConfigError,
  ErrorCode,
  FetchError,
  PagevaultError,
  VectorIndexError,
  formatErrorForUser,
  getErrorCode,
  getErrorMessage,
  isRecoverableError,
} from "../../src/utils/errors.js";

describe("PagevaultError", () => {
  it("uses the medium message when none is given", () => {
    const error = new PagevaultError(ErrorCode.VECTOR_INDEX_UNAVAILABLE);

    expect(error.message).toBe("The vector index could not be opened.");
    expect(error.recoveryHint).toBe("Check that --db-dir is writable.");
    expect(error.recoverable).toBe(false);
  });

  it("serializes code, cause and hint", () => {
    const cause = new Error("EACCES");
    const json = new PagevaultError(ErrorCode.VECTOR_INDEX_UNAVAILABLE, "Cannot open", { cause }).toJSON();

    expect(json).toMatchObject({
      name: "PagevaultError",
      code: ErrorCode.VECTOR_INDEX_UNAVAILABLE,
      message: "Cannot open",
      recoverable: false,
      cause: { name: "Error", message: "EACCES" },
    });
  });
});

describe("specialized errors", () => {
  it("ConfigError carries the offending key", () => {
    const error = new ConfigError(ErrorCode.CONFIG_INVALID_VALUE, "chunkSize must be greater than 0", {
      configKey: "chunkSize",
    });

    expect(error).toBeInstanceOf(PagevaultError);
    expect(error.name).toBe("ConfigError");
    expect(error.configKey).toBe("chunkSize");
  });

  it("VectorIndexError carries the partial write count", () => {
    const error = new VectorIndexError(ErrorCode.VECTOR_INDEX_WRITE_FAILED, "disk full", {
      collection: "docs",
      insertedBeforeFailure: 200,
    });

    expect(error.insertedBeforeFailure).toBe(200);
    expect(error.recoverable).toBe(true);
  });
});

describe("FetchError.fromError", () => {
  it.each([
    [Object.assign(new Error("This operation was aborted"), { name: "AbortError" }), ErrorCode.FETCH_TIMEOUT],
    [new Error("connect ETIMEDOUT 10.0.0.1:443"), ErrorCode.FETCH_TIMEOUT],
    [new TypeError("Invalid URL"), ErrorCode.FETCH_INVALID_URL],
    [new TypeError("fetch failed"), ErrorCode.FETCH_NETWORK_ERROR],
    ["something odd", ErrorCode.FETCH_NETWORK_ERROR],
  ])("classifies %p", (thrown, code) => {
    const error = FetchError.fromError(thrown, "https://site.test/a");

    expect(error.code).toBe(code);
    expect(error.url).toBe("https://site.test/a");
  });

  it("returns an existing FetchError unchanged", () => {
    const original = new FetchError(ErrorCode.FETCH_HTTP_STATUS, "HTTP 500", { statusCode: 500 });
    expect(FetchError.fromError(original)).toBe(original);
  });
});

describe("formatErrorForUser", () => {
  const error = new VectorIndexError(ErrorCode.VECTOR_INDEX_WRITE_FAILED, "Upsert of chunks 2-3 failed: disk full", {
    cause: new Error("disk full"),
    insertedBeforeFailure: 2,
  });

  it("renders the minimal message alone", () => {
    expect(formatErrorForUser(error, "minimal")).toBe("Write failed.");
  });

  it("adds the specific message and hint at medium level", () => {
    expect(formatErrorForUser(error)).toBe(
      "A batch could not be written to the vector index. (Upsert of chunks 2-3 failed: disk full)" +
        "\n\nHint: Re-run the ingestion; chunk ids are stable so existing rows are updated in place."
    );
  });

  it("adds code, cause and partial count at detailed level", () => {
    const text = formatErrorForUser(error, "detailed");

    expect(text.endsWith(
      "\n\n[Error code: 5001]\n[Cause: disk full]\n[Chunks written before failure: 2]"
    )).toBe(true);
  });

  it("adds the URL of a fetch error at detailed level", () => {
    const fetchError = new FetchError(ErrorCode.FETCH_HTTP_STATUS, "HTTP 404", { url: "https://site.test/x" });

    expect(formatErrorForUser(fetchError, "detailed")).toBe(
      "The server answered with a non-success HTTP status. (HTTP 404)\n\n[Error code: 3002]\n[URL: https://site.test/x]"
    );
  });

  it("formats plain errors and other values", () => {
    expect(formatErrorForUser(new Error("boom"))).toBe("Error: boom");
    expect(formatErrorForUser("boom", "minimal")).toBe("Something went wrong.");
    expect(formatErrorForUser(42)).toBe("Error: 42");
  });
});

describe("helpers", () => {
  it("isRecoverableError follows the code or the message", () => {
    expect(isRecoverableError(new FetchError(ErrorCode.FETCH_TIMEOUT))).toBe(true);
    expect(isRecoverableError(new ConfigError(ErrorCode.CONFIG_INVALID_VALUE))).toBe(false);
    expect(isRecoverableError(new Error("read ECONNRESET"))).toBe(true);
    expect(isRecoverableError("nope")).toBe(false);
  });

  it("getErrorCode falls back to UNKNOWN", () => {
    expect(getErrorCode(new ConfigError(ErrorCode.CONFIG_PARSE_ERROR))).toBe(ErrorCode.CONFIG_PARSE_ERROR);
    expect(getErrorCode(new Error("x"))).toBe(ErrorCode.UNKNOWN);
  });

  it("getErrorMessage reads any thrown value", () => {
    expect(getErrorMessage(new Error("x"))).toBe("x");
    expect(getErrorMessage("y")).toBe("y");
  });
});
