import { load } from 'cheerio';
import { isAxiosError, type AxiosInstance } from 'axios';
import type { Product, RegionResult } from './base.js';
import type { HeaderProvider } from './headers.js';
import { extractListing, SELECTORS } from './listing-extractor.js';
import { buildSearchUrl, type RegionCode } from './regions.js';
import { describeError } from '../errors.js';
import type { Logger } from '../logger.js';

export const DEFAULT_TIMEOUT_MS = 20_000;

export interface RegionFetchContext {
  client: AxiosInstance;
  headers: HeaderProvider;
  maxPerRegion: number;
  timeoutMs: number;
  stripQueryString: boolean;
  logger: Logger;
}

function describeRequestError(error: unknown, timeoutMs: number): string {
  if (isAxiosError(error)) {
    // ERR_CANCELED comes from the abort signal, the hard bound on slow bodies
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.code === 'ERR_CANCELED') {
      return `timed out after ${timeoutMs}ms`;
    }
    if (error.code) return `${error.code}: ${error.message}`;
  }
  return describeError(error);
}

async function extractProducts(
  html: string,
  region: RegionCode,
  context: RegionFetchContext
): Promise<{ candidates: number; products: Product[] }> {
  const $ = load(html);
  const wrappers = $(SELECTORS.wrapper).toArray();
  if (wrappers.length === 0) return { candidates: 0, products: [] };

  context.logger.info(`Found ${wrappers.length} potential products on eBay ${region}.`);

  const extractions = await Promise.all(
    wrappers
      .slice(0, context.maxPerRegion)
      .map(async (wrapper) =>
        extractListing($(wrapper), region, {
          stripQueryString: context.stripQueryString,
          logger: context.logger,
        })
      )
  );

  const products: Product[] = [];
  for (const extraction of extractions) {
    if (extraction.kind === 'accepted') products.push(extraction.product);
  }
  return { candidates: wrappers.length, products };
}

/**
 * Search one regional site and return whatever listings survive extraction.
 * Resolves for every outcome: a failed request or an unrecognisable page
 * becomes a `failed` or `empty` result with a warning in the log.
 */
export async function fetchRegion(
  query: string,
  region: RegionCode,
  context: RegionFetchContext
): Promise<RegionResult> {
  const url = buildSearchUrl(region, query);
  const { logger } = context;

  try {
    const response = await context.client.get<string>(url, {
      headers: context.headers.next(),
      timeout: context.timeoutMs,
      signal: AbortSignal.timeout(context.timeoutMs),
      responseType: 'text',
      validateStatus: () => true,
    });

    if (response.status < 200 || response.status >= 300) {
      const error = `HTTP ${response.status}`;
      logger.warn(`Error searching eBay ${region}: ${error}`);
      return { region, status: 'failed', products: [], candidates: 0, error };
    }

    const html = typeof response.data === 'string' ? response.data : '';
    const { candidates, products } = await extractProducts(html, region, context);
    if (candidates === 0) {
      logger.warn(`No product cards found on eBay ${region}.`);
      return { region, status: 'empty', products: [], candidates };
    }

    logger.info(`Successfully extracted ${products.length} valid products from eBay ${region}`);
    return { region, status: products.length > 0 ? 'ok' : 'empty', products, candidates };
  } catch (error) {
    const message = describeRequestError(error, context.timeoutMs);
    logger.warn(`Error searching eBay ${region}: ${message}`);
    return { region, status: 'failed', products: [], candidates: 0, error: message };
  }
}
