/**
 * Tests for the hierarchical Markdown chunker
 */

import { describe, it, expect } from "@jest/globals";
import { chunkMarkdown, hardSplit, splitByHeaderLevel } from "../../src/ingest/chunker.js";

function nonWhitespace(text: string): string {
  return text.replace(/\s/g, "");
}

describe("splitByHeaderLevel", () => {
  it("keeps text before the first header as its own segment", () => {
    expect(splitByHeaderLevel("intro\n# A\nx", "#")).toEqual(["intro", "# A\nx"]);
  });

  it("does not split a level-two marker on deeper headers", () => {
    const markdown = "## A\n### B\ntext\n## C";
    expect(splitByHeaderLevel(markdown, "##")).toEqual(["## A\n### B\ntext", "## C"]);
  });

  it("does not treat a level-two header as a level-one split point", () => {
    expect(splitByHeaderLevel("# A\ntext1\n## B\ntext2", "#")).toEqual(["# A\ntext1\n## B\ntext2"]);
  });

  it("returns nothing for empty input", () => {
    expect(splitByHeaderLevel("", "#")).toEqual([]);
  });
});

describe("hardSplit", () => {
  it("cuts fixed windows", () => {
    expect(hardSplit("abcdefg", 3)).toEqual(["abc", "def", "g"]);
  });

  it("trims windows and drops empty ones", () => {
    expect(hardSplit("ab   cd", 3)).toEqual(["ab", "c", "d"]);
    expect(hardSplit("      ", 3)).toEqual([]);
  });

  it("keeps surrogate pairs in one window", () => {
    const chunks = chunkMarkdown("x" + "😀".repeat(10), 4);

    expect(chunks).toEqual(["x😀", "😀😀", "😀😀", "😀😀", "😀😀", "😀"]);
    for (const chunk of chunks) {
      expect(chunk.length).toBeLessThanOrEqual(4);
      expect(Buffer.from(chunk, "utf8").toString("utf8")).toBe(chunk);
    }
  });
});

describe("chunkMarkdown", () => {
  it("returns a small document as one chunk", () => {
    expect(chunkMarkdown("# A\ntext1\n## B\ntext2", 1000)).toEqual(["# A\ntext1\n## B\ntext2"]);
  });

  it("hard-splits an oversized section without sub-headers", () => {
    const chunks = chunkMarkdown("# Big\n" + "a".repeat(2494), 1000);

    expect(chunks.map((c) => c.length)).toEqual([1000, 1000, 500]);
    expect(chunks[0].startsWith("# Big\n")).toBe(true);
  });

  it("descends to level two only inside oversized sections", () => {
    const markdown =
      "# One\nshort\n# Two\n## Two.a\n" + "b".repeat(40) + "\n## Two.b\n" + "c".repeat(40);

    expect(chunkMarkdown(markdown, 60)).toEqual([
      "# One\nshort",
      "# Two",
      "## Two.a\n" + "b".repeat(40),
      "## Two.b\n" + "c".repeat(40),
    ]);
  });

  it("descends to level three before cutting", () => {
    const markdown = "## Part\n### X\n" + "x".repeat(30) + "\n### Y\n" + "y".repeat(30);

    expect(chunkMarkdown(markdown, 40)).toEqual([
      "## Part",
      "### X\n" + "x".repeat(30),
      "### Y\n" + "y".repeat(30),
    ]);
  });

  it("never exceeds the limit and loses no content", () => {
    const markdown = [
      "Preamble paragraph with a few words.",
      "# Guide",
      "Intro text ".repeat(20),
      "## Install",
      "Run the installer. ".repeat(15),
      "### Linux",
      "apt-get install thing ".repeat(12),
      "#### Notes",
      "z".repeat(300),
      "# Reference",
      "Short.",
    ].join("\n");

    for (const maxLen of [25, 80, 150, 1000]) {
      const chunks = chunkMarkdown(markdown, maxLen);
      for (const chunk of chunks) {
        expect(chunk.length).toBeLessThanOrEqual(maxLen);
        expect(chunk).toBe(chunk.trim());
        expect(chunk).not.toBe("");
      }
      expect(nonWhitespace(chunks.join(""))).toBe(nonWhitespace(markdown));
    }
  });

  it("returns no chunks for empty or blank input", () => {
    expect(chunkMarkdown("", 100)).toEqual([]);
    expect(chunkMarkdown("  \n\n ", 100)).toEqual([]);
  });

  it("rejects a non-positive or fractional limit", () => {
    expect(() => chunkMarkdown("text", 0)).toThrow(RangeError);
    expect(() => chunkMarkdown("text", -5)).toThrow(RangeError);
    expect(() => chunkMarkdown("text", 1.5)).toThrow(RangeError);
  });
});
