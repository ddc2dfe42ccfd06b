// pattern: Functional Core

export class WebSearchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "WebSearchError";
  }
}

/** A credential or setting the backend needs is missing. Raised before any request is sent. */
export class ConfigurationError extends WebSearchError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
    this.name = "ConfigurationError";
  }
}

/** The search provider call failed or answered with something other than the expected shape. */
export class UpstreamError extends WebSearchError {
  constructor(
    message: string,
    public readonly backend: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, "UPSTREAM_ERROR", cause);
    this.name = "UpstreamError";
  }
}

/** Fetching or decoding the page behind a single hit failed. */
export class FetchError extends WebSearchError {
  constructor(
    message: string,
    public readonly url: string,
    cause?: Error,
  ) {
    super(message, "FETCH_ERROR", cause);
    this.name = "FetchError";
  }
}

export class ToolInputError extends WebSearchError {
  constructor(
    message: string,
    public readonly issues: ReadonlyArray<string>,
  ) {
    super(message, "TOOL_INPUT_ERROR");
    this.name = "ToolInputError";
  }
}

export function isTimeoutError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
