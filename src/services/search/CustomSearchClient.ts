import { Dispatcher, request } from 'undici';
import { z } from 'zod';
import { describeError, SearchProviderError } from '../../errors';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { SearchResult } from '../../types';
import { SearchProvider } from './SearchProvider';

const DEFAULT_ENDPOINT = 'https://www.googleapis.com/customsearch/v1';
const MAX_RESULTS_PER_QUERY = 10;

const searchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().default(''),
        link: z.string().default(''),
        snippet: z.string().default('')
      })
    )
    .default([])
});

export interface CustomSearchClientOptions {
  apiKey: string;
  engineId: string;
  endpoint?: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
  logger?: StructuredLogger;
}

export class CustomSearchClient implements SearchProvider {
  public readonly mode = 'speak' as const;

  public constructor(private readonly options: CustomSearchClientOptions) {}

  public async search(query: string, count: number): Promise<SearchResult[]> {
    if (!query.trim()) {
      return [];
    }

    const params = new URLSearchParams({
      key: this.options.apiKey,
      cx: this.options.engineId,
      q: query,
      num: String(Math.max(1, Math.min(MAX_RESULTS_PER_QUERY, count)))
    });
    const timeoutMs = this.options.timeoutMs ?? 10000;
    const startedAt = Date.now();

    const res = await request(`${this.options.endpoint ?? DEFAULT_ENDPOINT}?${params.toString()}`, {
      method: 'GET',
      headers: { accept: 'application/json' },
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      dispatcher: this.options.dispatcher
    }).catch((error: unknown) => {
      throw new SearchProviderError(`Search request failed: ${describeError(error)}`);
    });

    if (res.statusCode < 200 || res.statusCode >= 300) {
      const body = await res.body.text().catch(() => '');
      throw new SearchProviderError(
        `Search request failed (${res.statusCode})${body ? `: ${body.slice(0, 300)}` : ''}`,
        res.statusCode
      );
    }

    const parsed = searchResponseSchema.safeParse(await res.body.json());
    if (!parsed.success) {
      throw new SearchProviderError('Search response had an unexpected shape');
    }

    this.options.logger?.info('Search completed', {
      queryLength: query.length,
      results: parsed.data.items.length,
      elapsedMs: Date.now() - startedAt
    });

    return parsed.data.items;
  }
}
