export type { Product, RegionResult, RegionStatus, Scraper, SearchOutcome, SearchRequest } from './scrapers/base.js';
export {
  EbayScraper,
  createHttpClient,
  DEFAULT_MAX_PER_REGION,
  DEFAULT_MAX_RESPONSE_BYTES,
  type EbayScraperOptions,
  type HttpClientOptions,
} from './scrapers/ebay.js';
export { fetchRegion, DEFAULT_TIMEOUT_MS, type RegionFetchContext } from './scrapers/region-fetcher.js';
export { extractListing, type ListingExtraction, type RejectionReason } from './scrapers/listing-extractor.js';
export { RotatingHeaderProvider, StaticHeaderProvider, type HeaderProvider } from './scrapers/headers.js';
export { REGION_CODES, REGION_DOMAINS, buildSearchUrl, type RegionCode } from './scrapers/regions.js';
export { SpreadsheetExporter, type SpreadsheetExporterOptions } from './export/spreadsheet.js';
export { InvalidSearchError, ExportError, PriceFinderError } from './errors.js';
export { createLogger, silentLogger, type Logger, type LogLevel } from './logger.js';
export { loadConfig, parseConfig, type Config } from './config.js';
