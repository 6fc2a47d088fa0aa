import { describe, it, expect, vi } from 'vitest';
import { BrowserSearchProvider, buildSearchUrl } from './BrowserSearchProvider';

describe('buildSearchUrl', () => {
  it('encodes the query as a form parameter', () => {
    expect(buildSearchUrl('weather & news today')).toBe(
      'https://www.google.com/search?q=weather+%26+news+today'
    );
  });
});

describe('BrowserSearchProvider', () => {
  it('opens the results page and returns no results', async () => {
    const openUrl = vi.fn(async (_url: string) => {});
    const provider = new BrowserSearchProvider(undefined, openUrl);

    await expect(provider.search('cats')).resolves.toEqual([]);
    expect(openUrl).toHaveBeenCalledWith('https://www.google.com/search?q=cats');
    expect(provider.mode).toBe('browser');
  });

  it('does not open anything for a blank query', async () => {
    const openUrl = vi.fn(async (_url: string) => {});
    const provider = new BrowserSearchProvider(undefined, openUrl);

    await provider.search('  ');

    expect(openUrl).not.toHaveBeenCalled();
  });

  it('keeps listening when the browser cannot be opened', async () => {
    const provider = new BrowserSearchProvider(undefined, async () => {
      throw new Error('spawn xdg-open ENOENT');
    });

    await expect(provider.search('cats')).resolves.toEqual([]);
  });
});
