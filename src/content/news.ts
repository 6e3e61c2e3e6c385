import { ConfigurationError, NewsFetchError, errorMessage } from '../errors.js';
import type { NewsItem } from './types.js';

const NEWS_API_URL = 'https://newsapi.org/v2';

interface NewsApiArticle {
  title: string | null;
  description: string | null;
  url: string | null;
  publishedAt: string | null;
  source?: { name?: string | null } | null;
}

interface NewsApiResponse {
  status: 'ok' | 'error';
  code?: string;
  message?: string;
  articles?: NewsApiArticle[];
}

export interface NewsFetcherOptions {
  apiKey?: string;
  defaultTopic: string;
  pageSize?: number;
}

export class NewsFetcher {
  private readonly apiKey?: string;
  private readonly defaultTopic: string;
  private readonly pageSize: number;

  constructor(options: NewsFetcherOptions) {
    this.apiKey = options.apiKey;
    this.defaultTopic = options.defaultTopic;
    this.pageSize = options.pageSize ?? 5;
  }

  /**
   * Latest articles for a topic, newest first.
   * No matches is an empty list; transport or auth failures throw NewsFetchError.
   */
  async fetchLatest(topic?: string, options: { signal?: AbortSignal } = {}): Promise<NewsItem[]> {
    if (!this.apiKey) {
      throw new ConfigurationError('News API key not configured. Set NEWS_API_KEY.');
    }

    const query = topic?.trim() || this.defaultTopic;
    const params = new URLSearchParams({
      q: query,
      sortBy: 'publishedAt',
      pageSize: String(this.pageSize),
      language: 'en',
    });

    let res: Response;
    try {
      res = await fetch(`${NEWS_API_URL}/everything?${params}`, {
        headers: { 'X-Api-Key': this.apiKey },
        signal: options.signal,
      });
    } catch (err) {
      throw new NewsFetchError(`News API request failed: ${errorMessage(err)}`, { cause: err });
    }

    const data = (await res.json().catch(() => null)) as NewsApiResponse | null;

    if (!res.ok || !data || data.status !== 'ok') {
      const detail = data?.message ?? res.statusText;
      throw new NewsFetchError(`News API ${res.status}: ${detail}`);
    }

    const items = (data.articles ?? [])
      .filter((a) => a.title && a.title !== '[Removed]')
      .map((a) => ({
        title: a.title ?? '',
        description: a.description ?? '',
        url: a.url,
        source: a.source?.name ?? null,
        publishedAt: a.publishedAt,
      }));

    console.log(`[news] ${items.length} article(s) for "${query}"`);
    return items;
  }
}

/** Renders news items as prompt context for the text model. */
export function formatNewsContext(items: NewsItem[], limit = 3): string {
  return items
    .slice(0, limit)
    .map((item) => `Title: ${item.title}\nDescription: ${item.description || 'No description available.'}`)
    .join('\n\n');
}
