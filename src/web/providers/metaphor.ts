// pattern: Imperative Shell

import { z } from "zod";
import { ConfigurationError, UpstreamError, isTimeoutError, toError } from "../errors.ts";
import type { RawHit, SearchBackend } from "../types.ts";

export const METAPHOR_SEARCH_URL = "https://api.metaphor.systems/search";

const MetaphorApiResponseSchema = z.object({
  results: z.array(
    z.object({
      title: z.string().nullish(),
      url: z.string().nullish(),
    }),
  ),
});

export type MetaphorBackendOptions = {
  readonly getApiKey?: () => string | undefined;
  readonly timeout?: number;
};

export function createMetaphorBackend(options: MetaphorBackendOptions = {}): SearchBackend {
  const getApiKey = options.getApiKey ?? (() => process.env["METAPHOR_API_KEY"]);
  const timeout = options.timeout ?? 30000;

  return {
    kind: "metaphor",
    name: "metaphor",
    async search(query: string, numResults: number): Promise<ReadonlyArray<RawHit>> {
      const apiKey = getApiKey()?.trim();
      if (!apiKey) {
        throw new ConfigurationError(
          "METAPHOR_API_KEY is not set. Please set the METAPHOR_API_KEY environment variable.",
        );
      }

      let response: Response;
      try {
        response = await fetch(METAPHOR_SEARCH_URL, {
          method: "POST",
          headers: {
            "accept": "application/json",
            "content-type": "application/json",
            "x-api-key": apiKey,
          },
          body: JSON.stringify({ query, numResults }),
          signal: AbortSignal.timeout(timeout),
        });
      } catch (err) {
        const reason = isTimeoutError(err) ? `timed out after ${timeout}ms` : toError(err).message;
        throw new UpstreamError(`metaphor search failed: ${reason}`, "metaphor", undefined, toError(err));
      }

      if (!response.ok) {
        throw new UpstreamError(
          `metaphor search failed: ${response.status} ${response.statusText}`,
          "metaphor",
          response.status,
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (err) {
        throw new UpstreamError("metaphor search returned invalid JSON", "metaphor", response.status, toError(err));
      }

      const parsed = MetaphorApiResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new UpstreamError("metaphor search response has no results field", "metaphor", response.status);
      }

      const hits: Array<RawHit> = [];
      for (const result of parsed.data.results) {
        if (result.url) {
          hits.push({ title: result.title ?? "", url: result.url });
        }
      }
      return hits;
    },
  };
}
