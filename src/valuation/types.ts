export interface ValueSummary {
  query: string;
  raw_prices: readonly string[];
  cleaned_prices: readonly number[];
  count: number;
  average_price: number;
  median_price: number;
  min_price: number;
  max_price: number;
  error: string | null;
}
