/**
 * Tests for URL normalization and internal link resolution
 */

import { describe, it, expect } from "@jest/globals";
import { normalizeUrl, resolveInternalLink } from "../../src/ingest/url.js";

const PAGE = "https://example.com/docs/a";

describe("normalizeUrl", () => {
  it("strips the fragment only", () => {
    expect(normalizeUrl("https://example.com/x#frag")).toBe("https://example.com/x");
    expect(normalizeUrl("https://example.com/x?q=1")).toBe("https://example.com/x?q=1");
  });

  it("keeps trailing slashes distinct", () => {
    expect(normalizeUrl("https://example.com/x/")).not.toBe(normalizeUrl("https://example.com/x"));
  });
});

describe("resolveInternalLink", () => {
  it("resolves relative and root-relative links", () => {
    expect(resolveInternalLink("c", PAGE)).toBe("https://example.com/docs/c");
    expect(resolveInternalLink("/guide/b#sec", PAGE)).toBe("https://example.com/guide/b");
    expect(resolveInternalLink("?page=2", PAGE)).toBe("https://example.com/docs/a?page=2");
  });

  it("drops other origins and schemes", () => {
    expect(resolveInternalLink("https://other.com/x", PAGE)).toBeNull();
    expect(resolveInternalLink("http://example.com/x", PAGE)).toBeNull();
    expect(resolveInternalLink("mailto:team@example.com", PAGE)).toBeNull();
    expect(resolveInternalLink("javascript:void(0)", PAGE)).toBeNull();
  });

  it("drops empty and in-page anchors", () => {
    expect(resolveInternalLink("", PAGE)).toBeNull();
    expect(resolveInternalLink("#top", PAGE)).toBeNull();
  });
});
