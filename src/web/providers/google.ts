// pattern: Imperative Shell

import { z } from "zod";
import { ConfigurationError, UpstreamError, isTimeoutError, toError } from "../errors.ts";
import type { RawHit, SearchBackend } from "../types.ts";

export const GOOGLE_SEARCH_URL = "https://www.googleapis.com/customsearch/v1";

// Custom Search rejects num outside 1..10.
const MAX_NUM = 10;

const GoogleApiResponseSchema = z.object({
  items: z.array(
    z
      .object({
        title: z.string().nullish(),
        link: z.string().nullish(),
      })
      .passthrough(),
  ),
});

export type GoogleBackendOptions = {
  readonly getApiKey?: () => string | undefined;
  readonly getEngineId?: () => string | undefined;
  readonly timeout?: number;
};

export function createGoogleBackend(options: GoogleBackendOptions = {}): SearchBackend {
  const getApiKey = options.getApiKey ?? (() => process.env["GOOGLE_API_KEY"]);
  const getEngineId = options.getEngineId ?? (() => process.env["GOOGLE_CSE_ID"]);
  const timeout = options.timeout ?? 30000;

  return {
    kind: "google",
    name: "google",
    async search(query: string, numResults: number): Promise<ReadonlyArray<RawHit>> {
      const apiKey = getApiKey()?.trim();
      const engineId = getEngineId()?.trim();
      if (!apiKey || !engineId) {
        const missing = [!apiKey && "GOOGLE_API_KEY", !engineId && "GOOGLE_CSE_ID"].filter(Boolean);
        throw new ConfigurationError(`${missing.join(" and ")} must be set to use Google search.`);
      }

      const url = new URL(GOOGLE_SEARCH_URL);
      url.searchParams.set("key", apiKey);
      url.searchParams.set("cx", engineId);
      url.searchParams.set("q", query);
      url.searchParams.set("num", String(Math.max(1, Math.min(numResults, MAX_NUM))));

      let response: Response;
      try {
        response = await fetch(url, {
          headers: { "accept": "application/json" },
          signal: AbortSignal.timeout(timeout),
        });
      } catch (err) {
        const reason = isTimeoutError(err) ? `timed out after ${timeout}ms` : toError(err).message;
        throw new UpstreamError(`google search failed: ${reason}`, "google", undefined, toError(err));
      }

      if (!response.ok) {
        throw new UpstreamError(
          `google search failed: ${response.status} ${response.statusText}`,
          "google",
          response.status,
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (err) {
        throw new UpstreamError("google search returned invalid JSON", "google", response.status, toError(err));
      }

      const parsed = GoogleApiResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new UpstreamError("google search response has no items field", "google", response.status);
      }

      const hits: Array<RawHit> = [];
      for (const item of parsed.data.items) {
        if (typeof item.link === "string" && item.link.length > 0) {
          hits.push({ title: item.title ?? "", url: item.link, raw: item });
        }
      }
      return hits;
    },
  };
}
