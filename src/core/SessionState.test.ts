import { describe, it, expect } from 'vitest';
import { resultsFor } from '../testing/fakes';
import { SessionState } from './SessionState';

describe('SessionState', () => {
  it('starts with no results and an empty last query', () => {
    const state = new SessionState();

    expect(state.current()).toBeUndefined();
    expect(state.getIndex()).toBe(0);
    expect(state.getLastQuery()).toBe('');
  });

  it('resets the index when the results are replaced', () => {
    const state = new SessionState();
    state.replaceResults(resultsFor('a', 'b'));
    state.advance();

    state.replaceResults(resultsFor('c'));

    expect(state.getIndex()).toBe(0);
    expect(state.current()?.snippet).toBe('c');
  });

  it('reports no result once the index runs past the end', () => {
    const state = new SessionState();
    state.replaceResults(resultsFor('a', 'b'));

    expect(state.advance()).toBe(1);
    expect(state.current()?.snippet).toBe('b');
    expect(state.advance()).toBe(2);
    expect(state.current()).toBeUndefined();
  });

  it('keeps its own copy of the result list', () => {
    const state = new SessionState();
    const results = resultsFor('a');
    state.replaceResults(results);

    results.push(...resultsFor('b'));

    expect(state.getResults()).toHaveLength(1);
  });
});
