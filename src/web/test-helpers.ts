// pattern: Imperative Shell

/**
 * In-process stand-ins for the network. Tests route `globalThis.fetch` through a table of
 * handlers keyed by URL (query string ignored) and read back every call that was made.
 */

import { vi } from "vitest";

export type FetchCall = {
  readonly url: string;
  readonly init: RequestInit | undefined;
};

export type RouteHandler = (init: RequestInit | undefined) => Response | Promise<Response>;

export function urlOf(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

function stripQuery(url: string): string {
  const index = url.indexOf("?");
  return index === -1 ? url : url.slice(0, index);
}

export function mockFetch(routes: Record<string, RouteHandler>): Array<FetchCall> {
  const calls: Array<FetchCall> = [];

  vi.spyOn(globalThis, "fetch").mockImplementation(async (input, init) => {
    const url = urlOf(input);
    calls.push({ url, init });
    const handler = routes[url] ?? routes[stripQuery(url)];
    if (!handler) {
      throw new TypeError(`fetch failed: no route for ${url}`);
    }
    return handler(init);
  });

  return calls;
}

export function htmlPage(body: string, title?: string): RouteHandler {
  const head = title === undefined ? "" : `<head><title>${title}</title></head>`;
  return () =>
    new Response(`<html>${head}<body>${body}</body></html>`, {
      status: 200,
      headers: { "content-type": "text/html; charset=utf-8" },
    });
}

export function jsonResponse(data: unknown, status = 200): RouteHandler {
  return () =>
    new Response(JSON.stringify(data), {
      status,
      headers: { "content-type": "application/json" },
    });
}

/** A handler that only settles when the request's abort signal fires. */
export function hangingResponse(): RouteHandler {
  return (init) =>
    new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      if (!signal) return;
      signal.addEventListener("abort", () => {
        reject(signal.reason);
      });
    });
}
