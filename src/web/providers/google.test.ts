// pattern: Imperative Shell

import { describe, it, expect, afterEach, vi } from "vitest";
import { createGoogleBackend, GOOGLE_SEARCH_URL } from "./google.ts";
import { ConfigurationError, UpstreamError } from "../errors.ts";
import { hangingResponse, jsonResponse, mockFetch } from "../test-helpers.ts";

function createTestBackend() {
  return createGoogleBackend({
    getApiKey: () => "test-key",
    getEngineId: () => "test-engine",
  });
}

describe("Google Custom Search backend", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends q, cx, num and key as query parameters", async () => {
    const calls = mockFetch({
      [GOOGLE_SEARCH_URL]: jsonResponse({ items: [] }),
    });

    await createTestBackend().search("typescript release notes", 4);

    expect(calls).toHaveLength(1);
    const url = new URL(calls[0]?.url ?? "");
    expect(url.origin + url.pathname).toBe(GOOGLE_SEARCH_URL);
    expect(url.searchParams.get("q")).toBe("typescript release notes");
    expect(url.searchParams.get("cx")).toBe("test-engine");
    expect(url.searchParams.get("num")).toBe("4");
    expect(url.searchParams.get("key")).toBe("test-key");
  });

  it("clamps num to the range the API accepts", async () => {
    const calls = mockFetch({
      [GOOGLE_SEARCH_URL]: jsonResponse({ items: [] }),
    });

    await createTestBackend().search("query", 25);

    expect(new URL(calls[0]?.url ?? "").searchParams.get("num")).toBe("10");
  });

  it("returns items as raw hits, keeping the provider record", async () => {
    mockFetch({
      [GOOGLE_SEARCH_URL]: jsonResponse({
        items: [
          { title: "Result A", link: "https://example.com/a", snippet: "about a" },
          { link: "https://example.com/b" },
          { title: "No link" },
          { title: "Null link", link: null },
        ],
      }),
    });

    const hits = await createTestBackend().search("query", 3);

    expect(hits).toHaveLength(2);
    expect(hits[0]).toEqual({
      title: "Result A",
      url: "https://example.com/a",
      raw: { title: "Result A", link: "https://example.com/a", snippet: "about a" },
    });
    expect(hits[1]?.title).toBe("");
    expect(hits[1]?.url).toBe("https://example.com/b");
  });

  it("throws ConfigurationError naming every missing variable, before any request", async () => {
    const calls = mockFetch({});

    const backend = createGoogleBackend({
      getApiKey: () => undefined,
      getEngineId: () => undefined,
    });

    await expect(backend.search("query", 1)).rejects.toThrow(
      new ConfigurationError("GOOGLE_API_KEY and GOOGLE_CSE_ID must be set to use Google search."),
    );
    expect(calls).toHaveLength(0);
  });

  it("throws ConfigurationError when only the engine id is missing", async () => {
    const calls = mockFetch({});

    const backend = createGoogleBackend({
      getApiKey: () => "test-key",
      getEngineId: () => "",
    });

    await expect(backend.search("query", 1)).rejects.toThrow("GOOGLE_CSE_ID must be set to use Google search.");
    expect(calls).toHaveLength(0);
  });

  it("throws UpstreamError on a non-2xx response", async () => {
    mockFetch({
      [GOOGLE_SEARCH_URL]: jsonResponse({ error: { code: 403 } }, 403),
    });

    const error = await createTestBackend().search("query", 1).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamError);
    if (!(error instanceof UpstreamError)) return;
    expect(error.status).toBe(403);
    expect(error.backend).toBe("google");
  });

  it("throws UpstreamError when the response has no items", async () => {
    mockFetch({
      [GOOGLE_SEARCH_URL]: jsonResponse({ searchInformation: { totalResults: "0" } }),
    });

    await expect(createTestBackend().search("query", 1)).rejects.toThrow(
      "google search response has no items field",
    );
  });

  it("throws UpstreamError when the body is not JSON", async () => {
    mockFetch({
      [GOOGLE_SEARCH_URL]: () => new Response("<html>quota page</html>", { status: 200 }),
    });

    const error = await createTestBackend().search("query", 1).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamError);
    if (!(error instanceof UpstreamError)) return;
    expect(error.message).toBe("google search returned invalid JSON");
    expect(error.status).toBe(200);
  });

  it("wraps network failures in UpstreamError", async () => {
    mockFetch({});

    await expect(createTestBackend().search("query", 1)).rejects.toThrow(
      `google search failed: fetch failed: no route for ${GOOGLE_SEARCH_URL}?key=test-key&cx=test-engine&q=query&num=1`,
    );
  });

  it("reports a timeout when the request outlives the limit", async () => {
    mockFetch({
      [GOOGLE_SEARCH_URL]: hangingResponse(),
    });

    const backend = createGoogleBackend({
      getApiKey: () => "test-key",
      getEngineId: () => "test-engine",
      timeout: 10,
    });

    await expect(backend.search("query", 1)).rejects.toThrow("google search failed: timed out after 10ms");
  });
});
