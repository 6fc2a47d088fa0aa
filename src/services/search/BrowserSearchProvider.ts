import { describeError } from '../../errors';
import { StructuredLogger } from '../../logging/StructuredLogger';
import { runCommand } from '../process/runCommand';
import { SearchResult } from '../../types';
import { SearchProvider } from './SearchProvider';

const SEARCH_URL = 'https://www.google.com/search';

export type UrlOpener = (url: string) => Promise<void>;

export const buildSearchUrl = (query: string): string =>
  `${SEARCH_URL}?${new URLSearchParams({ q: query }).toString()}`;

export const openInDefaultBrowser = async (
  url: string,
  platform: NodeJS.Platform = process.platform
): Promise<void> => {
  if (platform === 'darwin') {
    await runCommand('open', [url], { timeoutMs: 10000 });
    return;
  }

  if (platform === 'win32') {
    // `start` treats the first quoted argument as a window title.
    await runCommand('cmd', ['/c', 'start', '""', url], { timeoutMs: 10000 });
    return;
  }

  await runCommand('xdg-open', [url], { timeoutMs: 10000 });
};

export class BrowserSearchProvider implements SearchProvider {
  public readonly mode = 'browser' as const;

  public constructor(
    private readonly logger?: StructuredLogger,
    private readonly openUrl: UrlOpener = openInDefaultBrowser
  ) {}

  public async search(query: string): Promise<SearchResult[]> {
    if (!query.trim()) {
      return [];
    }

    const url = buildSearchUrl(query);

    try {
      await this.openUrl(url);
      this.logger?.info('Opened search in browser', { queryLength: query.length });
    } catch (error) {
      this.logger?.warn('Could not open browser for search', { url, detail: describeError(error) });
    }

    return [];
  }
}
