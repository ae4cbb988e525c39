import type { SourceType } from "./types.js";

function urlPath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    // Not absolute: treat everything before the query as the path
    return url.split(/[?#]/)[0];
  }
}

/**
 * Pick a fetch strategy for a URL. Sitemap wins over ".txt", so
 * ".../sitemap.txt" is read as a sitemap. Matching is case-sensitive.
 */
export function classifySource(url: string): SourceType {
  if (url.endsWith("sitemap.xml") || urlPath(url).includes("sitemap")) {
    return "sitemap";
  }
  if (url.endsWith(".txt")) {
    return "text";
  }
  return "page";
}
