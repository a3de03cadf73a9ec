import { z } from 'zod';
import { logger } from '@parley/shared';

const log = logger.child({ module: 'search-client' });

export interface WebSearchParams {
  query: string;
  maxResults: number;
  signal?: AbortSignal;
}

export interface WebSearchResultItem {
  title: string;
  url: string;
  content: string;
}

export interface WebSearchResult {
  query: string;
  results: WebSearchResultItem[];
}

/** Search backend used by the search tools; auth and transport live in the implementation. */
export interface WebSearchCapability {
  search(params: WebSearchParams): Promise<WebSearchResult>;
}

// ---------------------------------------------------------------------------
// DuckDuckGo instant-answer implementation
// ---------------------------------------------------------------------------

const topicSchema = z.object({
  Text: z.string().optional(),
  FirstURL: z.string().optional(),
});

const instantAnswerSchema = z.object({
  Heading: z.string().default(''),
  AbstractText: z.string().default(''),
  AbstractURL: z.string().default(''),
  RelatedTopics: z
    .array(topicSchema.extend({ Topics: z.array(topicSchema).optional() }))
    .default([]),
});

type InstantAnswer = z.infer<typeof instantAnswerSchema>;

function toItems(answer: InstantAnswer, query: string): WebSearchResultItem[] {
  const items: WebSearchResultItem[] = [];
  if (answer.AbstractText) {
    items.push({ title: answer.Heading || query, url: answer.AbstractURL, content: answer.AbstractText });
  }
  const topics = answer.RelatedTopics.flatMap((topic) => (topic.Topics ? topic.Topics : [topic]));
  for (const topic of topics) {
    if (!topic.Text || !topic.FirstURL) continue;
    const [title] = topic.Text.split(' - ');
    items.push({ title: title ?? topic.Text, url: topic.FirstURL, content: topic.Text });
  }
  return items;
}

export function createDuckDuckGoSearch(endpoint: string): WebSearchCapability {
  return {
    async search({ query, maxResults, signal }) {
      const url = new URL(endpoint);
      url.searchParams.set('q', query);
      url.searchParams.set('format', 'json');
      url.searchParams.set('no_html', '1');
      url.searchParams.set('skip_disambig', '1');

      log.debug({ query, maxResults }, 'web search');
      const res = await fetch(url, { headers: { Accept: 'application/json' }, signal });
      if (!res.ok) {
        throw new Error(`search backend returned ${res.status}`);
      }

      const parsed = instantAnswerSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new Error('search backend returned an unexpected payload');
      }
      const results = toItems(parsed.data, query).slice(0, maxResults);
      log.info({ query, results: results.length }, 'web search complete');
      return { query, results };
    },
  };
}
