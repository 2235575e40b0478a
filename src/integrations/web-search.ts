/**
 * Web Search
 * DuckDuckGo Instant Answer client behind a provider-neutral interface
 */

import { z } from 'zod';
import { createLogger, type Logger } from '../logging/logger.js';

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
  source?: string;
}

export interface SearchResponse {
  query: string;
  results: SearchResult[];
  totalResults: number;
}

export interface SearchClient {
  search(query: string, maxResults?: number): Promise<SearchResponse>;
}

export type TravelQueryType = 'attractions' | 'hotels' | 'restaurants' | 'activities';

const DUCKDUCKGO_ENDPOINT = 'https://api.duckduckgo.com/';

const TopicSchema = z.object({
  Text: z.string().default(''),
  FirstURL: z.string().default(''),
});

// Related topics are either results or named groups of results
const RelatedTopicSchema = z.union([
  TopicSchema.extend({ FirstURL: z.string() }),
  z.object({ Name: z.string(), Topics: z.array(TopicSchema).default([]) }),
]);

const InstantAnswerSchema = z.object({
  Heading: z.string().default(''),
  AbstractText: z.string().default(''),
  AbstractURL: z.string().default(''),
  AbstractSource: z.string().default(''),
  // Entries are validated one by one so a malformed topic is skipped
  RelatedTopics: z.array(z.unknown()).default([]),
});

function hostnameOf(url: string): string | undefined {
  try {
    return new URL(url).hostname;
  } catch {
    return undefined;
  }
}

function toResult(topic: z.infer<typeof TopicSchema>): SearchResult | undefined {
  if (!topic.FirstURL || !topic.Text) return undefined;
  // Topic text reads "Title - description"
  const [title, ...rest] = topic.Text.split(' - ');
  return {
    title,
    url: topic.FirstURL,
    snippet: rest.length > 0 ? rest.join(' - ') : topic.Text,
    source: hostnameOf(topic.FirstURL),
  };
}

export interface DuckDuckGoClientOptions {
  endpoint?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export class DuckDuckGoClient implements SearchClient {
  private endpoint: string;
  private timeoutMs: number;
  private logger: Logger;

  constructor(options: DuckDuckGoClientOptions = {}) {
    this.endpoint = options.endpoint ?? DUCKDUCKGO_ENDPOINT;
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.logger = options.logger ?? createLogger({ name: 'web-search' });
  }

  /**
   * Search failures yield an empty result set rather than an error
   */
  async search(query: string, maxResults = 10): Promise<SearchResponse> {
    this.logger.info({ query }, `DuckDuckGo search: ${query}`);

    const url = new URL(this.endpoint);
    url.searchParams.set('q', query);
    url.searchParams.set('format', 'json');
    url.searchParams.set('no_html', '1');
    url.searchParams.set('skip_disambig', '1');

    try {
      const response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`DuckDuckGo returned HTTP ${response.status}`);
      }

      const body = InstantAnswerSchema.parse(await response.json());
      const results = this.collectResults(body).slice(0, maxResults);

      this.logger.info({ query, count: results.length }, `Found ${results.length} results`);
      return { query, results, totalResults: results.length };
    } catch (error) {
      this.logger.error({ query, err: error }, 'DuckDuckGo search error');
      return { query, results: [], totalResults: 0 };
    }
  }

  async searchTravel(destination: string, queryType: TravelQueryType = 'attractions'): Promise<SearchResponse> {
    return this.search(`${destination} ${queryType}`);
  }

  private collectResults(body: z.infer<typeof InstantAnswerSchema>): SearchResult[] {
    const results: SearchResult[] = [];

    if (body.AbstractText && body.AbstractURL) {
      results.push({
        title: body.Heading || body.AbstractSource,
        url: body.AbstractURL,
        snippet: body.AbstractText,
        source: hostnameOf(body.AbstractURL),
      });
    }

    for (const entry of body.RelatedTopics) {
      const parsed = RelatedTopicSchema.safeParse(entry);
      if (!parsed.success) continue;

      const topics = 'Topics' in parsed.data ? parsed.data.Topics : [parsed.data];
      for (const topic of topics) {
        const result = toResult(topic);
        if (result) results.push(result);
      }
    }

    return results;
  }
}
