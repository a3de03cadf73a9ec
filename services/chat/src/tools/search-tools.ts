import { z } from 'zod';
import { errorMessage, logger } from '@parley/shared';
import { defineTool, staticProvider } from './define-tool.js';
import type { ToolProvider } from '../tool-registry.js';
import type { WebSearchCapability, WebSearchResultItem } from './search-client.js';

const log = logger.child({ module: 'search-tools' });

const PROVIDER = 'search';

export function formatResults(results: readonly WebSearchResultItem[]): string {
  if (results.length === 0) return 'No results found';
  return results
    .map((r, i) => `${i + 1}. ${r.title || 'No title'}\n${r.content || 'No description'}\nURL: ${r.url || 'No URL'}\n`)
    .join('\n');
}

/**
 * Search tools answer with text for the model; backend failures become a
 * "Search error: ..." answer rather than a tool failure.
 */
export function createSearchTools(capability: WebSearchCapability, enabled: () => boolean = () => true): ToolProvider {
  async function perform(query: string, maxResults: number, signal?: AbortSignal): Promise<string> {
    try {
      const { results } = await capability.search({ query, maxResults, signal });
      return formatResults(results.slice(0, maxResults));
    } catch (err) {
      if (signal?.aborted) throw err;
      log.warn({ err, query }, 'search failed');
      return `Search error: ${errorMessage(err)}`;
    }
  }

  const maxResults = (fallback: number) =>
    z.number().int().min(1).max(20).default(fallback).describe(`Maximum number of results (default ${fallback})`);

  const tools = [
    defineTool(PROVIDER, {
      name: 'web_search',
      description: 'Search the web and return the top results.',
      schema: z.object({ query: z.string().min(1).describe('The search query') }),
      run: ({ query }, ctx) => perform(query, 5, ctx.signal),
    }),
    defineTool(PROVIDER, {
      name: 'quick_search',
      description: 'Perform a quick web search with a limited number of results.',
      schema: z.object({ query: z.string().min(1).describe('The search query'), max_results: maxResults(3) }),
      run: ({ query, max_results }, ctx) => perform(query, max_results, ctx.signal),
    }),
    defineTool(PROVIDER, {
      name: 'search_definition',
      description: 'Look up the definition of a term or concept.',
      schema: z.object({ term: z.string().min(1).describe('The term to define') }),
      run: ({ term }, ctx) => perform(`what is ${term} definition meaning`, 3, ctx.signal),
    }),
    defineTool(PROVIDER, {
      name: 'search_news',
      description: 'Search for recent news about a topic.',
      schema: z.object({ topic: z.string().min(1).describe('The news topic'), max_results: maxResults(3) }),
      run: ({ topic, max_results }, ctx) => perform(`${topic} news recent`, max_results, ctx.signal),
    }),
  ];

  return staticProvider(PROVIDER, tools, enabled);
}
