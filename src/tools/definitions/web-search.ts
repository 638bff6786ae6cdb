/**
 * Web Search Tool — searches the web via the Tavily API.
 * Runs under the `web_search` deadline scope.
 */
import { z } from 'zod';

import type { ConduitError } from '@/core/errors.js';
import { ToolExecutionError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { createLogger } from '@/observability/logger.js';
import type { ExecutableTool, ToolContext, ToolResult } from '@/tools/types.js';

const logger = createLogger({ name: 'web-search' });

// ─── Constants ──────────────────────────────────────────────────

const TAVILY_API_URL = 'https://api.tavily.com/search';
const MAX_RESULTS_LIMIT = 10;

// ─── Schemas ────────────────────────────────────────────────────

const inputSchema = z.object({
  query: z.string().min(1).max(2000).describe('Search query'),
  maxResults: z.number().int().min(1).max(MAX_RESULTS_LIMIT).default(5)
    .describe('Maximum number of results to return (1-10)'),
});

const tavilyResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z.array(
    z.object({
      title: z.string(),
      url: z.string(),
      content: z.string(),
      score: z.number(),
    }),
  ),
});

// ─── Options ────────────────────────────────────────────────────

export interface WebSearchToolOptions {
  apiKey: string;
  /** Override for tests and proxies. */
  apiUrl?: string;
}

// ─── Factory ────────────────────────────────────────────────────

/** Create a web-search tool that queries the Tavily API. */
export function createWebSearchTool(options: WebSearchToolOptions): ExecutableTool {
  const apiUrl = options.apiUrl ?? TAVILY_API_URL;

  return {
    id: 'web-search',
    name: 'Web Search',
    description:
      'Searches the web. Returns titles, URLs, content snippets and relevance scores ' +
      'for the most relevant pages.',
    category: 'search',
    inputSchema,
    riskLevel: 'low',
    requiresApproval: false,
    sideEffects: false,
    timeoutScope: 'web_search',

    async execute(input: unknown, context: ToolContext): Promise<Result<ToolResult, ConduitError>> {
      const startTime = Date.now();
      const parsed = inputSchema.parse(input);

      const response = await fetch(apiUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${options.apiKey}`,
        },
        body: JSON.stringify({
          query: parsed.query,
          max_results: parsed.maxResults,
          include_answer: true,
        }),
        signal: context.signal,
      });

      if (!response.ok) {
        return err(new ToolExecutionError('web-search', `Search API returned ${String(response.status)}`));
      }

      const body = tavilyResponseSchema.safeParse(await response.json());
      if (!body.success) {
        return err(new ToolExecutionError('web-search', 'Search API returned an unexpected response'));
      }

      const results = body.data.results;
      logger.info('Web search completed', {
        component: 'web-search',
        threadId: context.threadId,
        traceId: context.traceId,
        resultsCount: results.length,
      });

      return ok({
        success: true,
        output: {
          query: parsed.query,
          ...(body.data.answer ? { answer: body.data.answer } : {}),
          results,
        },
        durationMs: Date.now() - startTime,
      });
    },
  };
}
