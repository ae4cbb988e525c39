import * as cheerio from "cheerio";
import { XMLValidator } from "fast-xml-parser";
import { fetchText, type FetchLike } from "./http.js";
import { ErrorCode, FetchError, getErrorMessage } from "../utils/errors.js";
import { getLogger, type Logger } from "../utils/logger.js";

const SITEMAP_ROOT = /<([\w-]+:)?(urlset|sitemapindex)[\s>]/;

export interface ResolveSitemapOptions {
  timeoutMs: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/**
 * Extract every <loc> value from sitemap XML, namespaced or not, in document order.
 * Values are trimmed and empty ones dropped; duplicates are kept.
 */
export function parseSitemapLocs(xml: string): string[] {
  const $ = cheerio.load(xml, { xml: true });
  const locs: string[] = [];

  $("*").each((_, element) => {
    if (!("name" in element)) return;
    const name = element.name.toLowerCase();
    if (name !== "loc" && !name.endsWith(":loc")) return;

    const value = $(element).text().trim();
    if (value) {
      locs.push(value);
    }
  });

  return locs;
}

/**
 * Reject documents that are not well-formed XML (truncated bodies, unclosed tags).
 * cheerio would otherwise recover whatever locs it can from them.
 */
function assertWellFormed(xml: string, url: string): void {
  const result = XMLValidator.validate(xml);
  if (result !== true) {
    const { msg, line, col } = result.err;
    throw new FetchError(ErrorCode.SITEMAP_MALFORMED, `Invalid XML at ${line}:${col}: ${msg}`, { url });
  }
}

/**
 * Fetch a sitemap and list the URLs it contains.
 * Never throws: an unreachable or malformed sitemap resolves to [] with a warning.
 * Sitemap indexes are not followed; their <loc> entries are returned as-is.
 */
export async function resolveSitemap(url: string, options: ResolveSitemapOptions): Promise<string[]> {
  const logger = options.logger ?? getLogger();

  try {
    const response = await fetchText(
      url,
      options.timeoutMs,
      options.fetchImpl,
      "application/xml,text/xml;q=0.9,*/*;q=0.8"
    );

    if (response.status !== 200) {
      throw new FetchError(ErrorCode.SITEMAP_UNREACHABLE, `HTTP ${response.status}`, {
        url,
        statusCode: response.status,
      });
    }

    const xml = response.body.replace(/^\uFEFF/, "").trimStart();
    assertWellFormed(xml, url);

    const locs = parseSitemapLocs(xml);
    if (locs.length === 0 && !SITEMAP_ROOT.test(xml)) {
      throw new FetchError(ErrorCode.SITEMAP_MALFORMED, "No <urlset> or <sitemapindex> element", { url });
    }
    logger.info("Resolved sitemap", { url, urls: locs.length });
    return locs;
  } catch (err) {
    logger.warn("Sitemap could not be resolved", { url, error: getErrorMessage(err) });
    return [];
  }
}
