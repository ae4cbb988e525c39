/**
 * Dedup key for a URL: everything before the fragment.
 * No other canonicalization is applied, so "/a" and "/a/" stay distinct.
 */
export function normalizeUrl(url: string): string {
  const hashIndex = url.indexOf("#");
  return hashIndex === -1 ? url : url.slice(0, hashIndex);
}

/**
 * Resolve an href found on `pageUrl` and keep it only if it is an http(s)
 * link to the same origin. Returns the normalized URL or null.
 */
export function resolveInternalLink(href: string, pageUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  let base: URL;
  let resolved: URL;
  try {
    base = new URL(pageUrl);
    resolved = new URL(trimmed, base);
  } catch {
    return null;
  }

  if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
    return null;
  }
  if (resolved.origin !== base.origin) {
    return null;
  }

  resolved.hash = "";
  return resolved.toString();
}
