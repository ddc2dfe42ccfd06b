// pattern: Imperative Shell

/**
 * Web search REPL entry point.
 * Composition root that wires the configured backend into the search tool and answers one
 * query per input line.
 */

import * as readline from 'node:readline';
import { pathToFileURL } from 'node:url';
import dotenv from 'dotenv';
import { loadConfig, toNormalizeOptions, type AppConfig } from '@/config/config.ts';
import { createSearchBackend } from '@/web/backend.ts';
import { createWebSearch } from '@/web/search.ts';
import type { SearchBackend } from '@/web/types.ts';
import { createToolRegistry } from '@/tool/registry.ts';
import { createSearchTool } from '@/tool/builtin/search.ts';
import type { ToolRegistry } from '@/tool/types.ts';

export type SearchRegistry = {
  registry: ToolRegistry;
  toolName: string;
  defaultResults: number;
};

/**
 * Build a registry holding the search tool for the configured backend.
 * The backend is chosen here once; pass one in to bypass the providers.
 */
export function createSearchRegistry(config: AppConfig, backend?: SearchBackend): SearchRegistry {
  const selected = backend ?? createSearchBackend(config.search.backend, {
    timeout: config.search.search_timeout,
  });
  const webSearch = createWebSearch({
    backend: selected,
    normalize: toNormalizeOptions(config),
  });

  const tool = createSearchTool({
    search: (query, numResults) => webSearch.search(query, numResults),
    kind: selected.kind,
    maxResults: config.search.max_results,
  });

  const registry = createToolRegistry();
  registry.register(tool);

  return {
    registry,
    toolName: tool.definition.name,
    defaultResults: Math.min(5, config.search.max_results),
  };
}

/**
 * Dispatch a single query line through the registry and return what should be printed.
 * Errors come back as text so the loop keeps running.
 */
export async function runQuery(search: SearchRegistry, line: string): Promise<string> {
  const query = line.trim();
  if (!query) {
    return '';
  }

  const result = await search.registry.dispatch(search.toolName, {
    query,
    num_results: search.defaultResults,
  });

  if (!result.success) {
    return `error: ${result.error ?? 'unknown error'}`;
  }
  return result.output || 'no results';
}

async function main(): Promise<void> {
  dotenv.config();

  const config = loadConfig(process.env['WEB_SEARCH_CONFIG']);
  const search = createSearchRegistry(config);
  console.log(`web search ready (${search.toolName}), enter a query or ctrl-d to quit\n`);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '> ',
  });

  rl.prompt();
  for await (const line of rl) {
    const output = await runQuery(search, line);
    if (output) {
      process.stdout.write(`\n${output}\n\n`);
    }
    rl.prompt();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    console.error('fatal error:', error);
    process.exit(1);
  });
}
