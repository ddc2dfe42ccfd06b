// pattern: Imperative Shell

import { createGoogleBackend } from "./providers/google.ts";
import { createMetaphorBackend } from "./providers/metaphor.ts";
import type { BackendKind, SearchBackend } from "./types.ts";

export type SearchBackendOptions = {
  readonly timeout?: number;
  readonly env?: Readonly<Record<string, string | undefined>>;
};

/**
 * Build the adapter for one backend kind. Credentials are looked up in `env` (default
 * `process.env`) on every search, so rotating a key needs no rebuild.
 */
export function createSearchBackend(
  kind: BackendKind,
  options: SearchBackendOptions = {},
): SearchBackend {
  const env = (name: string) => (options.env ?? process.env)[name];

  switch (kind) {
    case "metaphor":
      return createMetaphorBackend({
        getApiKey: () => env("METAPHOR_API_KEY"),
        timeout: options.timeout,
      });
    case "google":
      return createGoogleBackend({
        getApiKey: () => env("GOOGLE_API_KEY"),
        getEngineId: () => env("GOOGLE_CSE_ID"),
        timeout: options.timeout,
      });
  }
}
