import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { NormalizeOptions } from "@/web/types.ts";
import { AppConfigSchema, type AppConfig } from "./schema.ts";

export type { AppConfig, SearchConfig, NormalizeConfig } from "./schema.ts";

const DEFAULT_CONFIG_PATH = "config.toml";

/**
 * Load config.toml (or the given path) and apply environment overrides.
 * The default file is optional; an explicit path that does not exist is an error.
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolvedPath = resolve(configPath ?? DEFAULT_CONFIG_PATH);

  let parsed: Record<string, unknown> = {};
  if (configPath !== undefined || existsSync(resolvedPath)) {
    const raw = readFileSync(resolvedPath, "utf-8");
    parsed = TOML.parse(raw);
  }

  const envOverrides: Record<string, unknown> = {};

  if (process.env["WEB_SEARCH_BACKEND"]) {
    const current = parsed["search"];
    const searchObj = typeof current === "object" && current !== null ? { ...current } : {};
    envOverrides["search"] = { ...searchObj, backend: process.env["WEB_SEARCH_BACKEND"] };
  }

  const merged = { ...parsed, ...envOverrides };
  return AppConfigSchema.parse(merged);
}

export function toNormalizeOptions(config: AppConfig): NormalizeOptions {
  return {
    maxContentLength: config.normalize.max_content_length,
    maxSummaryLength: config.normalize.max_summary_length,
    fetchTimeout: config.normalize.fetch_timeout,
    extraction: config.normalize.extraction,
    concurrency: config.normalize.concurrency,
  };
}
