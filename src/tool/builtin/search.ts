// pattern: Imperative Shell

/**
 * Built-in search tool. Runs a query through the configured backend, normalizes every hit and
 * returns the results as one text block. It holds no agent state, so any agent can enable it.
 */

import { z } from 'zod';
import type { Tool } from '../types.ts';
import type { BackendKind, SearchRequest, WebSearchResult } from '../../web/types.ts';
import { ToolInputError } from '../../web/errors.ts';
import { formatResults } from '../../web/format.ts';

export type SearchFn = (query: string, numResults: number) => Promise<ReadonlyArray<WebSearchResult>>;

export type SearchToolOptions = {
  readonly search: SearchFn;
  readonly kind: BackendKind;
  readonly maxResults?: number;
};

const TOOL_NAMES: Record<BackendKind, string> = {
  metaphor: 'metaphor_search',
  google: 'google_search',
};

const PROVIDER_LABELS: Record<BackendKind, string> = {
  metaphor: 'metaphor api',
  google: 'google custom search',
};

const SearchRequestSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  num_results: z.number().int().positive(),
});

export function parseSearchRequest(
  params: Record<string, unknown>,
  maxResults?: number,
): SearchRequest {
  const parsed = SearchRequestSchema.safeParse(params);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`);
    throw new ToolInputError(`invalid search request: ${issues.join('; ')}`, issues);
  }

  const { query, num_results } = parsed.data;
  return {
    query,
    numResults: maxResults === undefined ? num_results : Math.min(num_results, maxResults),
  };
}

/** Run one request and return the serialized results. Errors propagate unchanged. */
export async function handleSearchRequest(
  search: SearchFn,
  request: SearchRequest,
): Promise<string> {
  const results = await search(request.query, request.numResults);
  return formatResults(results);
}

export function createSearchTool(options: SearchToolOptions): Tool {
  const { search, kind, maxResults } = options;
  const name = TOOL_NAMES[kind];

  return {
    definition: {
      name,
      description:
        `To search the web by ${PROVIDER_LABELS[kind]} and return up to <num_results> ` +
        'links relevant to the given <query>. Each result has a title, link and summary.',
      parameters: [
        {
          name: 'query',
          type: 'string',
          description: 'Search query',
          required: true,
        },
        {
          name: 'num_results',
          type: 'integer',
          description: maxResults === undefined
            ? 'Number of results to return'
            : `Number of results to return (at most ${maxResults})`,
          required: true,
        },
      ],
    },
    handler: async (params) => {
      try {
        const request = parseSearchRequest(params, maxResults);
        return {
          success: true,
          output: await handleSearchRequest(search, request),
        };
      } catch (err) {
        return {
          success: false,
          output: '',
          error: `${name} failed: ${err instanceof Error ? err.message : String(err)}`,
        };
      }
    },
  };
}
