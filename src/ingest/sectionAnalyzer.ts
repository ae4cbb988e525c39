import { HEADER_LINE_REGEX } from "./chunker.js";
import type { SectionInfo } from "./types.js";

/**
 * Structural summary of a chunk: its header lines (any level, in order) and size counts.
 */
export function analyzeSection(chunk: string): SectionInfo {
  const headers = Array.from(chunk.matchAll(HEADER_LINE_REGEX), (m) => `${m[1]} ${m[2].trim()}`);
  const words = chunk.split(/\s+/).filter(Boolean);

  return {
    headers: headers.join("; "),
    charCount: chunk.length,
    wordCount: words.length,
  };
}
