// pattern: Functional Core

import type { WebSearchResult } from "./types.ts";

export type WebSearchResultRecord = {
  readonly title: string;
  readonly link: string;
  readonly summary: string;
  readonly full_content: string;
};

export function formatResult(result: WebSearchResult): string {
  return `Title: ${result.title}\nLink: ${result.link}\nSummary: ${result.summary}`;
}

/** One block per result, separated by a single blank line. */
export function formatResults(results: ReadonlyArray<WebSearchResult>): string {
  return results.map(formatResult).join("\n\n");
}

export function toRecord(result: WebSearchResult): WebSearchResultRecord {
  return {
    title: result.title,
    link: result.link,
    summary: result.summary,
    full_content: result.fullContent,
  };
}
