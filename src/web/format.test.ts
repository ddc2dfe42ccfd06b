// pattern: Functional Core

import { describe, it, expect } from "vitest";
import { formatResult, formatResults, toRecord } from "./format.ts";
import type { WebSearchResult } from "./types.ts";

const paris: WebSearchResult = {
  title: "Paris",
  link: "http://example.com/paris",
  summary: "Paris is the capital of France.",
  fullContent: "Paris is the capital of France.",
};

const lyon: WebSearchResult = {
  title: "Lyon",
  link: "http://example.com/lyon",
  summary: "Lyon sits where the Rhone",
  fullContent: "Lyon sits where the Rhone meets the Saone.",
};

describe("formatResult", () => {
  it("renders title, link and summary on separate lines", () => {
    expect(formatResult(paris)).toBe(
      "Title: Paris\nLink: http://example.com/paris\nSummary: Paris is the capital of France.",
    );
  });

  it("leaves the full content out", () => {
    expect(formatResult(lyon)).toBe("Title: Lyon\nLink: http://example.com/lyon\nSummary: Lyon sits where the Rhone");
  });
});

describe("formatResults", () => {
  it("separates results with exactly one blank line", () => {
    const output = formatResults([paris, lyon, paris]);

    expect(output.split("\n\n")).toHaveLength(3);
    expect(output.match(/^Title: .*\nLink: .*\nSummary: .*$/gm)).toHaveLength(3);
    expect(output).not.toContain("\n\n\n");
    expect(output).toBe(
      "Title: Paris\nLink: http://example.com/paris\nSummary: Paris is the capital of France.\n\n" +
        "Title: Lyon\nLink: http://example.com/lyon\nSummary: Lyon sits where the Rhone\n\n" +
        "Title: Paris\nLink: http://example.com/paris\nSummary: Paris is the capital of France.",
    );
  });

  it("returns an empty string when there are no results", () => {
    expect(formatResults([])).toBe("");
  });
});

describe("toRecord", () => {
  it("exports every field with snake_case full_content", () => {
    expect(toRecord(lyon)).toEqual({
      title: "Lyon",
      link: "http://example.com/lyon",
      summary: "Lyon sits where the Rhone",
      full_content: "Lyon sits where the Rhone meets the Saone.",
    });
  });
});
