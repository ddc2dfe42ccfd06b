// pattern: Imperative Shell

import { createSearchBackend, type SearchBackendOptions } from "./backend.ts";
import { normalizeHits } from "./normalize.ts";
import type { NormalizeOptions, SearchBackend, WebSearchResult } from "./types.ts";

export type WebSearch = {
  readonly backend: string;
  search(query: string, numResults: number): Promise<ReadonlyArray<WebSearchResult>>;
};

export type WebSearchOptions = {
  readonly backend: SearchBackend;
  readonly normalize?: Partial<NormalizeOptions>;
};

/** Backend call followed by per-hit normalization, in backend order. */
export function createWebSearch(options: WebSearchOptions): WebSearch {
  const { backend, normalize } = options;

  return {
    backend: backend.name,
    async search(query: string, numResults: number): Promise<ReadonlyArray<WebSearchResult>> {
      const hits = await backend.search(query, numResults);
      return normalizeHits(hits, normalize);
    },
  };
}

export async function googleSearch(
  query: string,
  numResults = 5,
  options: SearchBackendOptions = {},
): Promise<ReadonlyArray<WebSearchResult>> {
  return createWebSearch({ backend: createSearchBackend("google", options) }).search(query, numResults);
}

export async function metaphorSearch(
  query: string,
  numResults = 5,
  options: SearchBackendOptions = {},
): Promise<ReadonlyArray<WebSearchResult>> {
  return createWebSearch({ backend: createSearchBackend("metaphor", options) }).search(query, numResults);
}
