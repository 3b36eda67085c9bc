import { describe, it, expect, vi, beforeEach } from 'vitest';
import { aggregateMany, estimateValue, formatSummary, runPipeline } from './pipeline.js';
import type { CandidateListing, ListingSource } from './scrapers/types.js';
import { NO_MATCHES_ERROR } from './valuation/aggregate.js';

const LISTINGS: Record<string, CandidateListing[]> = {
  'iphone 11': [
    { title: 'iPhone 11 64GB Black', text_block: 'Sold $350.00' },
    { title: 'iPhone 11 Case Blue', text_block: '$12.99' },
    { title: 'iPhone 11 128GB', text_block: '$410.00 Free shipping' },
  ],
  'jordan 1': [{ title: 'Jordan 1 Retro High', text_block: 'US $180.00' }],
  'pokemon etb': [{ title: 'Pokemon Binder', text_block: '$15.00' }],
};

function fakeSource(failFor: string[] = []): ListingSource & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async fetchListings(query: string) {
      calls.push(query);
      if (failFor.includes(query)) {
        throw new Error('Request failed with status code 503');
      }
      return LISTINGS[query] ?? [];
    },
  };
}

describe('estimateValue', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('summarizes the listings the source returns', async () => {
    const result = await estimateValue('iphone 11', { maxResults: 5, source: fakeSource() });

    expect(result.raw_prices).toEqual(['$350.00', '$410.00']);
    expect(result.average_price).toBe(380);
    expect(result.error).toBeNull();
  });

  it('reports a failed fetch on the summary instead of throwing', async () => {
    const result = await estimateValue('iphone 11', {
      maxResults: 5,
      source: fakeSource(['iphone 11']),
    });

    expect(result).toEqual({
      query: 'iphone 11',
      raw_prices: [],
      cleaned_prices: [],
      count: 0,
      average_price: 0,
      median_price: 0,
      min_price: 0,
      max_price: 0,
      error: 'Request failed with status code 503',
    });
  });

  it('uses a different message when nothing matched', async () => {
    const result = await estimateValue('pokemon etb', { maxResults: 5, source: fakeSource() });

    expect(result.error).toBe(NO_MATCHES_ERROR);
  });

  it('rejects an invalid cap before fetching', async () => {
    const source = fakeSource();

    await expect(estimateValue('iphone 11', { maxResults: 0, source })).rejects.toThrow(RangeError);
    expect(source.calls).toEqual([]);
  });
});

describe('aggregateMany', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('returns one summary per query in input order', async () => {
    const source = fakeSource(['jordan 1']);

    const results = await aggregateMany(['iphone 11', 'jordan 1', 'pokemon etb'], 5, source);

    expect(results.map((r) => r.query)).toEqual(['iphone 11', 'jordan 1', 'pokemon etb']);
    expect(results.map((r) => r.count)).toEqual([2, 0, 0]);
    expect(results[1]?.error).toBe('Request failed with status code 503');
    expect(results[2]?.error).toBe(NO_MATCHES_ERROR);
    expect(source.calls).toEqual(['iphone 11', 'jordan 1', 'pokemon etb']);
  });

  it('runs one query at a time', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const source: ListingSource = {
      async fetchListings() {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return [];
      },
    };

    await aggregateMany(['a', 'b', 'c'], 3, source);

    expect(maxInFlight).toBe(1);
  });

  it('returns an empty list for no queries', async () => {
    expect(await aggregateMany([], 5, fakeSource())).toEqual([]);
  });
});

describe('formatSummary', () => {
  it('prints every field of the summary', async () => {
    const result = await estimateValue('iphone 11', { maxResults: 5, source: fakeSource() });

    expect(formatSummary(result)).toEqual([
      'Query: iphone 11',
      'Error: none',
      'Raw prices: ["$350.00","$410.00"]',
      'Cleaned prices: [350,410]',
      'Count: 2',
      'Average: 380',
      'Median: 380',
      'Min: 350',
      'Max: 410',
    ]);
  });
});

describe('runPipeline', () => {
  it('values every query and logs the summaries', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const results = await runPipeline({
      queries: ['iphone 11', 'jordan 1'],
      maxResults: 5,
      source: fakeSource(),
    });

    expect(results.map((r) => r.count)).toEqual([2, 1]);
    expect(log).toHaveBeenCalledWith('Query: jordan 1');
    expect(log).toHaveBeenCalledWith('Average: 180');
  });
});
