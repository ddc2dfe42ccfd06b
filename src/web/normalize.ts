// pattern: Imperative Shell

/**
 * Result normalization: fetch the page behind each raw hit, extract its visible text and cut it
 * down to the configured content and summary lengths.
 */

import { FetchError, isTimeoutError, toError } from "./errors.ts";
import { extractVisibleText } from "./extract.ts";
import {
  DEFAULT_NORMALIZE_OPTIONS,
  type NormalizeOptions,
  type RawHit,
  type WebSearchResult,
} from "./types.ts";

function resolveOptions(options?: Partial<NormalizeOptions>): NormalizeOptions {
  const resolved = { ...DEFAULT_NORMALIZE_OPTIONS, ...options };

  if (!Number.isInteger(resolved.maxContentLength) || resolved.maxContentLength <= 0) {
    throw new RangeError(`maxContentLength must be a positive integer, got ${resolved.maxContentLength}`);
  }
  if (!Number.isInteger(resolved.maxSummaryLength) || resolved.maxSummaryLength <= 0) {
    throw new RangeError(`maxSummaryLength must be a positive integer, got ${resolved.maxSummaryLength}`);
  }
  if (!Number.isInteger(resolved.concurrency) || resolved.concurrency < 1) {
    throw new RangeError(`concurrency must be at least 1, got ${resolved.concurrency}`);
  }

  return resolved;
}

function isTextContentType(contentType: string | null): boolean {
  if (contentType === null) return true;
  const mime = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  return mime === "" || mime.startsWith("text/") || mime === "application/xhtml+xml";
}

async function fetchPage(url: string, timeout: number): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, { signal: AbortSignal.timeout(timeout) });
  } catch (error) {
    if (isTimeoutError(error)) {
      throw new FetchError(`fetch of ${url} timed out after ${timeout}ms`, url, toError(error));
    }
    throw new FetchError(`fetch of ${url} failed: ${toError(error).message}`, url, toError(error));
  }

  if (!response.ok) {
    throw new FetchError(`fetch of ${url} failed: ${response.status} ${response.statusText}`, url);
  }

  const contentType = response.headers.get("content-type");
  if (!isTextContentType(contentType)) {
    throw new FetchError(`invalid content type for ${url}: ${contentType ?? "not specified"}`, url);
  }

  try {
    return await response.text();
  } catch (error) {
    throw new FetchError(`could not read body of ${url}: ${toError(error).message}`, url, toError(error));
  }
}

/** First `count` code points of `text`; a surrogate pair is never split. */
export function takeCodePoints(text: string, count: number): string {
  let end = 0;
  for (let taken = 0; taken < count && end < text.length; taken++) {
    const codePoint = text.codePointAt(end) ?? 0;
    end += codePoint > 0xffff ? 2 : 1;
  }
  return text.slice(0, end);
}

/**
 * Limits count code points. The summary is cut from the already-truncated content, so it can
 * never be longer.
 */
export function truncateContent(
  text: string,
  maxContentLength: number,
  maxSummaryLength: number,
): { fullContent: string; summary: string } {
  const fullContent = takeCodePoints(text, maxContentLength);
  return { fullContent, summary: takeCodePoints(fullContent, maxSummaryLength) };
}

export async function normalizeHit(
  hit: RawHit,
  options?: Partial<NormalizeOptions>,
): Promise<WebSearchResult> {
  const resolved = resolveOptions(options);
  const html = await fetchPage(hit.url, resolved.fetchTimeout);
  const text = extractVisibleText(html, resolved.extraction);
  const { fullContent, summary } = truncateContent(
    text,
    resolved.maxContentLength,
    resolved.maxSummaryLength,
  );

  return {
    title: hit.title,
    link: hit.url,
    summary,
    fullContent,
  };
}

/**
 * Normalize a batch of hits with at most `concurrency` page fetches in flight.
 * Results keep the backend's order. Hits whose page cannot be fetched are dropped with a warning;
 * any other failure rejects the whole batch.
 */
export async function normalizeHits(
  hits: ReadonlyArray<RawHit>,
  options?: Partial<NormalizeOptions>,
): Promise<ReadonlyArray<WebSearchResult>> {
  const resolved = resolveOptions(options);
  const slots: Array<WebSearchResult | null> = new Array<WebSearchResult | null>(hits.length).fill(null);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < hits.length) {
      const index = next++;
      const hit = hits[index];
      if (!hit) continue;

      try {
        slots[index] = await normalizeHit(hit, resolved);
      } catch (error) {
        if (!(error instanceof FetchError)) throw error;
        console.warn(`skipping search result ${hit.url}: ${error.message}`);
      }
    }
  }

  const workers = Array.from({ length: Math.min(resolved.concurrency, hits.length) }, () => worker());
  await Promise.all(workers);

  return slots.filter((result): result is WebSearchResult => result !== null);
}
