/**
 * Tavily Search Client
 *
 * Single-attempt news search with a bounded timeout. Any transport error,
 * timeout, non-2xx status or malformed body surfaces as a SearchError.
 */

import { z } from 'zod';
import { SearchError, errorMessage } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type {
  NewsArticle,
  NewsImage,
  SearchClient,
  SearchRequest,
  SearchResponse,
} from '../types/index.js';

export interface TavilyClientOptions {
  apiKey: string;
  endpoint?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

const tavilyResultSchema = z.object({
  title: z.string().nullish(),
  content: z.string().nullish(),
  url: z.string().nullish(),
  published_date: z.string().nullish(),
});

const tavilyImageSchema = z.union([
  z.string(),
  z.object({
    url: z.string().nullish(),
    description: z.string().nullish(),
  }),
]);

const tavilyResponseSchema = z.object({
  answer: z.string().nullish(),
  results: z.array(tavilyResultSchema).nullish(),
  images: z.array(tavilyImageSchema).nullish(),
});

type TavilyImage = z.infer<typeof tavilyImageSchema>;

function toImage(image: TavilyImage): NewsImage {
  if (typeof image === 'string') {
    return { url: image, description: '' };
  }
  return { url: image.url ?? '', description: image.description ?? '' };
}

export class TavilySearchClient implements SearchClient {
  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(options: TavilyClientOptions) {
    this.apiKey = options.apiKey;
    this.endpoint = options.endpoint ?? 'https://api.tavily.com/search';
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.fetchFn = options.fetch ?? globalThis.fetch;
    this.logger = options.logger ?? silentLogger;
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const payload = {
      api_key: this.apiKey,
      query: request.query,
      search_depth: request.depth,
      max_results: request.maxResults,
      include_images: request.includeImages ?? false,
      include_answer: request.includeAnswer ?? false,
    };

    this.logger.info({ query: request.query, depth: request.depth }, 'Searching news');

    let response: Response;
    try {
      response = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      this.logger.error({ error }, 'Search request failed');
      throw new SearchError(`Search request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      this.logger.error({ status: response.status, body: body.slice(0, 200) }, 'Search API error');
      throw new SearchError(`Search API returned ${response.status}`, { status: response.status });
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (error) {
      throw new SearchError('Search API returned invalid JSON', { cause: error });
    }

    const parsed = tavilyResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SearchError(`Unexpected search response: ${parsed.error.message}`);
    }

    const articles: NewsArticle[] = (parsed.data.results ?? []).map((r) => ({
      title: r.title ?? '',
      content: r.content ?? '',
      url: r.url ?? '',
      publishedDate: r.published_date ?? '',
    }));

    const result: SearchResponse = {
      articles,
      images: (parsed.data.images ?? []).map(toImage),
    };
    if (parsed.data.answer) {
      result.answer = parsed.data.answer;
    }

    this.logger.info(
      { articles: result.articles.length, images: result.images.length },
      'Search complete'
    );

    return result;
  }
}
