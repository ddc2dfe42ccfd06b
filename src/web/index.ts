// pattern: Functional Core

export type {
  BackendKind,
  ExtractionMode,
  NormalizeOptions,
  RawHit,
  SearchBackend,
  SearchRequest,
  WebSearchResult,
} from "./types.ts";
export { BACKEND_KINDS, DEFAULT_NORMALIZE_OPTIONS } from "./types.ts";
export {
  WebSearchError,
  ConfigurationError,
  UpstreamError,
  FetchError,
  ToolInputError,
} from "./errors.ts";
export { extractVisibleText } from "./extract.ts";
export { normalizeHit, normalizeHits, takeCodePoints, truncateContent } from "./normalize.ts";
export { formatResult, formatResults, toRecord, type WebSearchResultRecord } from "./format.ts";
export { createSearchBackend, type SearchBackendOptions } from "./backend.ts";
export { createGoogleBackend, GOOGLE_SEARCH_URL } from "./providers/google.ts";
export { createMetaphorBackend, METAPHOR_SEARCH_URL } from "./providers/metaphor.ts";
export { createWebSearch, googleSearch, metaphorSearch, type WebSearch } from "./search.ts";
