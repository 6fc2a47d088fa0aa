import { SearchResult } from '../types';

/**
 * Per-session search state: the current result set, the playback index into
 * it, and the last query that was searched. Owned by one dispatcher.
 */
export class SessionState {
  private results: SearchResult[] = [];
  private index = 0;
  private lastQuery = '';

  public getLastQuery(): string {
    return this.lastQuery;
  }

  public setLastQuery(query: string): void {
    this.lastQuery = query;
  }

  public getIndex(): number {
    return this.index;
  }

  public getResults(): readonly SearchResult[] {
    return this.results;
  }

  public replaceResults(results: SearchResult[]): void {
    this.results = [...results];
    this.index = 0;
  }

  public resetIndex(): void {
    this.index = 0;
  }

  /** Moves to the next entry without wrapping; the index may leave the set. */
  public advance(): number {
    this.index += 1;
    return this.index;
  }

  /** The entry at the current index, or undefined when out of range. */
  public current(): SearchResult | undefined {
    if (this.index < 0 || this.index >= this.results.length) {
      return undefined;
    }

    return this.results[this.index];
  }
}
