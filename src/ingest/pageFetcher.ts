import * as cheerio from "cheerio";
import TurndownService from "turndown";
import { fetchText, type FetchLike } from "./http.js";
import { resolveInternalLink } from "./url.js";
import type { FetchResult, IPageFetcher } from "./types.js";
import { ErrorCode, FetchError, getErrorMessage } from "../utils/errors.js";
import { getLogger } from "../utils/logger.js";

/** Elements that never carry document content */
const STRIPPED_ELEMENTS = "script, style, noscript, template, iframe, svg, nav, header, footer, form";

/** Content types passed through without HTML conversion */
const PLAIN_TEXT_TYPES = ["text/plain", "text/markdown", "text/x-markdown"];

export interface HttpPageFetcherOptions {
  fetchImpl?: FetchLike;
}

/**
 * Fetches a page over HTTP and normalizes it to Markdown.
 *
 * HTML is converted with Turndown (ATX headings, fenced code) after chrome
 * elements are removed; links are read before removal so navigation menus
 * still feed the crawl. Plain text and Markdown bodies are returned as-is.
 */
export class HttpPageFetcher implements IPageFetcher {
  private readonly fetchImpl: FetchLike | undefined;
  private readonly turndown: TurndownService;

  constructor(options: HttpPageFetcherOptions = {}) {
    this.fetchImpl = options.fetchImpl;
    this.turndown = new TurndownService({
      headingStyle: "atx",
      codeBlockStyle: "fenced",
      bulletListMarker: "-",
    });
  }

  async fetchPage(url: string, timeoutMs: number): Promise<FetchResult> {
    try {
      const response = await fetchText(url, timeoutMs, this.fetchImpl);

      if (!response.ok) {
        throw new FetchError(ErrorCode.FETCH_HTTP_STATUS, `HTTP ${response.status}`, {
          url,
          statusCode: response.status,
        });
      }

      if (this.isPlainText(url, response.contentType)) {
        return { ok: true, url, markdown: response.body.trim(), internalLinks: new Set() };
      }

      const { markdown, internalLinks } = this.convertHtml(response.body, response.finalUrl);
      getLogger().debug("Fetched page", { url, chars: markdown.length, links: internalLinks.size });
      return { ok: true, url, markdown, internalLinks };
    } catch (err) {
      return { ok: false, url, errorMessage: getErrorMessage(err) };
    }
  }

  /**
   * HTML -> Markdown plus the page's same-origin links.
   */
  convertHtml(html: string, pageUrl: string): { markdown: string; internalLinks: Set<string> } {
    const $ = cheerio.load(html);

    const internalLinks = new Set<string>();
    $("a[href]").each((_, element) => {
      const href = $(element).attr("href");
      const link = href ? resolveInternalLink(href, pageUrl) : null;
      if (link) {
        internalLinks.add(link);
      }
    });

    $(STRIPPED_ELEMENTS).remove();

    const root = $("main").first().length > 0
      ? $("main").first()
      : $("article").first().length > 0
        ? $("article").first()
        : $("body");
    const contentHtml = root.html() ?? $.html();
    const markdown = this.turndown.turndown(contentHtml).trim();

    return { markdown, internalLinks };
  }

  private isPlainText(url: string, contentType: string): boolean {
    if (PLAIN_TEXT_TYPES.some((type) => contentType.startsWith(type))) {
      return true;
    }
    // Servers often send .txt/.md files as octet-stream or without a type
    return !contentType.includes("html") && /\.(txt|md|markdown)$/.test(new URL(url).pathname);
  }
}
