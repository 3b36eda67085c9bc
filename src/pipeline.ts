import { config } from './config.js';
import { createEbaySoldSource } from './scrapers/ebay.js';
import type { CandidateListing, ListingSource } from './scrapers/types.js';
import { aggregate, assertMaxResults, emptySummary } from './valuation/aggregate.js';
import type { ValueSummary } from './valuation/types.js';

function ts(): string {
  return new Date().toISOString();
}

export interface EstimateOptions {
  maxResults: number;
  source: ListingSource;
}

/**
 * Fetches candidate listings for `query` and summarizes their prices.
 * A failed fetch is reported through `error` on the summary, never thrown.
 */
export async function estimateValue(
  query: string,
  opts: EstimateOptions
): Promise<ValueSummary> {
  assertMaxResults(opts.maxResults);

  let candidates: CandidateListing[];
  try {
    candidates = await opts.source.fetchListings(query);
  } catch (error) {
    const errMessage = error instanceof Error ? error.message : String(error);
    console.error(`[${ts()}] Fetch failed for "${query}": ${errMessage}`);
    return emptySummary(query, errMessage);
  }

  return aggregate(candidates, query, opts.maxResults);
}

export async function aggregateMany(
  queries: readonly string[],
  maxResults: number,
  source: ListingSource
): Promise<ValueSummary[]> {
  assertMaxResults(maxResults);

  const results: ValueSummary[] = [];
  for (const query of queries) {
    results.push(await estimateValue(query, { maxResults, source }));
  }
  return results;
}

export function formatSummary(summary: ValueSummary): string[] {
  return [
    `Query: ${summary.query}`,
    `Error: ${summary.error ?? 'none'}`,
    `Raw prices: ${JSON.stringify(summary.raw_prices)}`,
    `Cleaned prices: ${JSON.stringify(summary.cleaned_prices)}`,
    `Count: ${summary.count}`,
    `Average: ${summary.average_price}`,
    `Median: ${summary.median_price}`,
    `Min: ${summary.min_price}`,
    `Max: ${summary.max_price}`,
  ];
}

export async function runPipeline(opts: {
  queries: readonly string[];
  maxResults: number;
  source?: ListingSource;
}): Promise<ValueSummary[]> {
  const source = opts.source ?? createEbaySoldSource();

  console.log(`[${ts()}] Resale value agent starting...`);
  console.log(`[${ts()}] Queries: ${opts.queries.map((q) => `"${q}"`).join(', ')}`);
  console.log(`[${ts()}] Max results per query: ${opts.maxResults}`);
  console.log(`[${ts()}] Save debug HTML: ${config.SAVE_DEBUG_HTML}`);

  const results = await aggregateMany(opts.queries, opts.maxResults, source);

  for (const summary of results) {
    console.log('==========');
    for (const line of formatSummary(summary)) {
      console.log(line);
    }
  }

  const failed = results.filter((r) => r.error !== null).length;
  console.log(`[${ts()}] Done: ${results.length - failed} valued, ${failed} without a value`);
  return results;
}
