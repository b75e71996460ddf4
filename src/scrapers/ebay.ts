import { Agent as HttpsAgent } from 'https';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Product, Scraper, SearchOutcome, SearchRequest } from './base.js';
import { RotatingHeaderProvider, type HeaderProvider } from './headers.js';
import { DEFAULT_TIMEOUT_MS, fetchRegion, type RegionFetchContext } from './region-fetcher.js';
import { REGION_CODES, uniqueRegions } from './regions.js';
import { InvalidSearchError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';

export const DEFAULT_MAX_PER_REGION = 5;
// Results pages run to a few hundred KB; anything far beyond that is not a search page
export const DEFAULT_MAX_RESPONSE_BYTES = 5 * 1024 * 1024;

export interface HttpClientOptions {
  insecureTls?: boolean;
  maxResponseBytes?: number;
}

export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  const maxResponseBytes = options.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES;
  return axios.create({
    maxRedirects: 5,
    maxContentLength: maxResponseBytes,
    ...(options.insecureTls ? { httpsAgent: new HttpsAgent({ rejectUnauthorized: false }) } : {}),
  });
}

const SearchRequestSchema = z.object({
  query: z.string().trim().min(1, 'Search query must not be empty'),
  regions: z.array(z.enum(REGION_CODES)).min(1, 'At least one region is required'),
  maxPerRegion: z.number().int().positive(),
});

export interface EbayScraperOptions {
  client?: AxiosInstance;
  headers?: HeaderProvider;
  logger?: Logger;
  timeoutMs?: number;
  stripQueryString?: boolean;
  insecureTls?: boolean;  // Disable certificate checks on the default client
  maxResponseBytes?: number;  // Response size cap on the default client
}

/**
 * Searches every requested regional eBay site at once and merges the results.
 * Regions are concatenated in the order they were requested; a region that
 * fails contributes nothing and does not affect the others.
 */
export class EbayScraper implements Scraper {
  name = 'ebay';
  private readonly client: AxiosInstance;
  private readonly headers: HeaderProvider;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly stripQueryString: boolean;

  constructor(options: EbayScraperOptions = {}) {
    this.client = options.client ?? createHttpClient({
      insecureTls: options.insecureTls,
      maxResponseBytes: options.maxResponseBytes,
    });
    this.headers = options.headers ?? new RotatingHeaderProvider();
    this.logger = options.logger ?? createLogger();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.stripQueryString = options.stripQueryString ?? true;
  }

  async search(request: SearchRequest): Promise<SearchOutcome> {
    const parsed = SearchRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new InvalidSearchError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }

    const { query, maxPerRegion } = parsed.data;
    const regions = uniqueRegions(parsed.data.regions);
    const context: RegionFetchContext = {
      client: this.client,
      headers: this.headers,
      maxPerRegion,
      timeoutMs: this.timeoutMs,
      stripQueryString: this.stripQueryString,
      logger: this.logger,
    };

    this.logger.info(`Searching for '${query}' on ${regions.length} eBay sites...`);

    const results = await Promise.all(regions.map((region) => fetchRegion(query, region, context)));
    const products: Product[] = results.flatMap((result) => result.products);

    if (products.length === 0) {
      return { status: 'empty', products: [], regions: results };
    }
    return { status: 'found', products, regions: results };
  }
}
