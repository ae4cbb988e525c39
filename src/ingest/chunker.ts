/**
 * Hierarchical Markdown chunker
 *
 * Splits on "#" sections first and only descends to "##" and "###" for sections
 * that are still longer than the limit. Whatever is left oversized after the
 * last level is cut into fixed windows, so no chunk ever exceeds maxLen.
 */

/** Header markers tried in order, outermost first */
export const HEADER_LEVELS = ["#", "##", "###"] as const;

/** Any-level header line: optional indent, one or more "#", a space, then text */
export const HEADER_LINE_REGEX = /^[ \t]*(#+)[ \t]+(.+)$/gm;

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Split text at every line that starts with exactly `marker` followed by a space.
 * Text before the first header is its own segment. Segments are trimmed and
 * empty ones dropped.
 */
export function splitByHeaderLevel(markdown: string, marker: string): string[] {
  // The trailing space keeps "## " from matching a "### " line
  const pattern = new RegExp(`^[ \\t]*${escapeRegex(marker)} `, "gm");
  const starts: number[] = [];

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(markdown)) !== null) {
    if (match.index > 0) {
      starts.push(match.index);
    }
  }

  const bounds = [0, ...starts, markdown.length];
  const segments: string[] = [];
  for (let i = 0; i < bounds.length - 1; i++) {
    const segment = markdown.slice(bounds[i], bounds[i + 1]).trim();
    if (segment) {
      segments.push(segment);
    }
  }
  return segments;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Cut text into maxLen windows. Windows are trimmed after cutting and empty
 * ones dropped, so a trimmed window is never longer than maxLen.
 * A window never ends between the two halves of a surrogate pair; it ends one
 * unit early instead (unless maxLen is 1 and the pair cannot fit at all).
 */
export function hardSplit(text: string, maxLen: number): string[] {
  const windows: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + maxLen, text.length);
    if (end < text.length && end - start > 1 && isHighSurrogate(text.charCodeAt(end - 1))) {
      end--;
    }

    const window = text.slice(start, end).trim();
    if (window) {
      windows.push(window);
    }
    start = end;
  }
  return windows;
}

function splitAtLevel(segment: string, maxLen: number, level: number): string[] {
  if (segment.length <= maxLen) {
    return [segment];
  }
  if (level >= HEADER_LEVELS.length) {
    return hardSplit(segment, maxLen);
  }

  return splitByHeaderLevel(segment, HEADER_LEVELS[level]).flatMap((part) =>
    splitAtLevel(part, maxLen, level + 1)
  );
}

/**
 * Split Markdown into ordered chunks of at most maxLen characters,
 * preferring header boundaries.
 *
 * @param markdown - Document text
 * @param maxLen - Maximum chunk length, must be positive
 */
export function chunkMarkdown(markdown: string, maxLen: number): string[] {
  if (!Number.isInteger(maxLen) || maxLen <= 0) {
    throw new RangeError(`maxLen must be a positive integer, got ${maxLen}`);
  }

  return splitByHeaderLevel(markdown, HEADER_LEVELS[0]).flatMap((section) =>
    splitAtLevel(section, maxLen, 1)
  );
}
