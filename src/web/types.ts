// pattern: Functional Core

/**
 * Shared types for web search.
 * Every backend adapter reduces its provider records to RawHit, and the normalizer turns each
 * hit into a WebSearchResult.
 */

export const BACKEND_KINDS = ["metaphor", "google"] as const;

export type BackendKind = (typeof BACKEND_KINDS)[number];

export type RawHit = {
  readonly title: string;
  readonly url: string;
  readonly raw?: Readonly<Record<string, unknown>>;
};

export interface SearchBackend {
  readonly kind: BackendKind;
  readonly name: string;
  search(query: string, numResults: number): Promise<ReadonlyArray<RawHit>>;
}

export type WebSearchResult = {
  readonly title: string;
  readonly link: string;
  readonly summary: string;
  readonly fullContent: string;
};

export type SearchRequest = {
  readonly query: string;
  readonly numResults: number;
};

export type ExtractionMode = "text" | "readability";

export type NormalizeOptions = {
  readonly maxContentLength: number;
  readonly maxSummaryLength: number;
  readonly fetchTimeout: number;
  readonly extraction: ExtractionMode;
  readonly concurrency: number;
};

export const DEFAULT_NORMALIZE_OPTIONS: NormalizeOptions = {
  maxContentLength: 3500,
  maxSummaryLength: 300,
  fetchTimeout: 10000,
  extraction: "text",
  concurrency: 4,
};
