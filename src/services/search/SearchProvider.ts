import { SearchMode, SearchResult } from '../../types';

/**
 * `speak` providers return results for playback. `browser` providers show
 * the query elsewhere and return nothing; the caller leaves its result set
 * untouched.
 */
export interface SearchProvider {
  readonly mode: SearchMode;
  search(query: string, count: number): Promise<SearchResult[]>;
}
