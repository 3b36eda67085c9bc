import type { CandidateListing } from '../scrapers/types.js';
import { isAccessory } from './accessory.js';
import { cleanPrice, extractPriceText } from './price.js';
import { titleMatches } from './relevance.js';
import type { ValueSummary } from './types.js';

export const NO_MATCHES_ERROR = 'No matching sold NEW listings found.';

// Promo tiles eBay mixes into result grids
const PLACEHOLDER_TITLE = 'shop on ebay';

export function assertMaxResults(maxResults: number): void {
  if (!Number.isInteger(maxResults) || maxResults <= 0) {
    throw new RangeError(`maxResults must be a positive integer, got ${maxResults}`);
  }
}

function freezeSummary(summary: ValueSummary): ValueSummary {
  Object.freeze(summary.raw_prices);
  Object.freeze(summary.cleaned_prices);
  return Object.freeze(summary);
}

export function emptySummary(
  query: string,
  error: string,
  rawPrices: readonly string[] = []
): ValueSummary {
  return freezeSummary({
    query,
    raw_prices: [...rawPrices],
    cleaned_prices: [],
    count: 0,
    average_price: 0,
    median_price: 0,
    min_price: 0,
    max_price: 0,
    error,
  });
}

export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('median of an empty list');
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? 0;
  return (lower + upper) / 2;
}

// Compensated (Neumaier) summation, so [0.1, 0.2, 0.3] sums to 0.6
function sum(values: readonly number[]): number {
  let total = 0;
  let compensation = 0;
  for (const v of values) {
    const next = total + v;
    if (Math.abs(total) >= Math.abs(v)) {
      compensation += total - next + v;
    } else {
      compensation += v - next + total;
    }
    total = next;
  }
  return total + compensation;
}

function isCandidate(listing: CandidateListing, query: string): boolean {
  const title = listing.title.trim();
  if (!title) return false;
  if (title.toLowerCase().includes(PLACEHOLDER_TITLE)) return false;
  if (!titleMatches(title, query)) return false;
  if (isAccessory(title)) return false;
  return true;
}

/**
 * Collects up to `maxResults` prices from matching listings, in input order,
 * and summarizes them. Listings past the cap are never read.
 */
export function aggregate(
  candidates: Iterable<CandidateListing>,
  query: string,
  maxResults: number
): ValueSummary {
  assertMaxResults(maxResults);

  const rawPrices: string[] = [];
  for (const listing of candidates) {
    if (!isCandidate(listing, query)) continue;

    const priceText = extractPriceText(listing.text_block);
    if (priceText === null) continue;

    rawPrices.push(priceText);
    if (rawPrices.length >= maxResults) break;
  }

  const cleaned: number[] = [];
  for (const raw of rawPrices) {
    const value = cleanPrice(raw);
    if (value !== null && Number.isFinite(value) && value > 0) {
      cleaned.push(value);
    }
  }

  if (cleaned.length === 0) {
    return emptySummary(query, NO_MATCHES_ERROR, rawPrices);
  }

  const total = sum(cleaned);

  return freezeSummary({
    query,
    raw_prices: rawPrices,
    cleaned_prices: cleaned,
    count: cleaned.length,
    average_price: total / cleaned.length,
    median_price: median(cleaned),
    min_price: Math.min(...cleaned),
    max_price: Math.max(...cleaned),
    error: null,
  });
}
