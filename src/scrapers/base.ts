import type { RegionCode } from './regions.js';

export interface Product {
  readonly name: string;
  readonly price: string;
  readonly url: string;
  readonly site: string;
}

export interface SearchRequest {
  query: string;
  regions: RegionCode[];
  maxPerRegion: number;
}

export type RegionStatus = 'ok' | 'empty' | 'failed';

export interface RegionResult {
  region: RegionCode;
  status: RegionStatus;
  products: Product[];
  // Listing wrappers on the page, before truncation
  candidates: number;
  error?: string;
}

export type SearchOutcome =
  | { status: 'found'; products: Product[]; regions: RegionResult[] }
  | { status: 'empty'; products: []; regions: RegionResult[] };

export interface Scraper {
  name: string;
  search(request: SearchRequest): Promise<SearchOutcome>;
}
