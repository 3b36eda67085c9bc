/** One search-result card as seen by the valuation core. */
export interface CandidateListing {
  title: string;
  /** All visible text of the card; the price is searched for here. */
  text_block: string;
  link?: string | null;
}

export interface ListingSource {
  fetchListings(query: string): Promise<CandidateListing[]>;
}
