import { ErrorCode, FetchError } from "../utils/errors.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const USER_AGENT = "Mozilla/5.0 (compatible; pagevault/0.1)";

export interface TextResponse {
  status: number;
  ok: boolean;
  contentType: string;
  /** URL after redirects, or the requested URL when the response does not say */
  finalUrl: string;
  body: string;
}

/**
 * GET a resource and read its body under one deadline. Rejects with a
 * FETCH_TIMEOUT FetchError when the deadline passes; any other rejection is
 * classified by FetchError.fromError. Non-2xx statuses resolve normally.
 */
export async function fetchText(
  url: string,
  timeoutMs: number,
  fetchImpl: FetchLike = fetch,
  accept = "text/html,application/xhtml+xml,text/plain,text/markdown,*/*"
): Promise<TextResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, {
      signal: controller.signal,
      redirect: "follow",
      headers: {
        "User-Agent": USER_AGENT,
        Accept: accept,
      },
    });
    const body = await response.text();

    return {
      status: response.status,
      ok: response.ok,
      contentType: (response.headers.get("content-type") ?? "").toLowerCase(),
      finalUrl: response.url || url,
      body,
    };
  } catch (err) {
    if (controller.signal.aborted) {
      throw new FetchError(ErrorCode.FETCH_TIMEOUT, `Timed out after ${timeoutMs}ms`, {
        url,
        cause: err instanceof Error ? err : undefined,
      });
    }
    throw FetchError.fromError(err, url);
  } finally {
    clearTimeout(timeoutId);
  }
}
