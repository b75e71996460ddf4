import { Command } from 'commander';
import { loadConfig, type Config } from '../../config.js';
import { InvalidSearchError, describeError } from '../../errors.js';
import { SpreadsheetExporter } from '../../export/spreadsheet.js';
import { createLogger, type Logger } from '../../logger.js';
import type { Product, Scraper } from '../../scrapers/base.js';
import { EbayScraper } from '../../scrapers/ebay.js';
import { isRegionCode, siteLabel, type RegionCode, REGION_CODES } from '../../scrapers/regions.js';

export interface SearchCommandOptions {
  output?: string;
  maxProducts?: string;
  regions?: string[];
  dryRun?: boolean;
}

export interface SearchDependencies {
  config: Config;
  scraper: Scraper;
  exporter: Pick<SpreadsheetExporter, 'export'>;
  logger: Logger;
  print: (line: string) => void;
}

function parseIntOption(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidSearchError(`Invalid ${name}: ${value} (expected a positive integer)`);
  }
  return parsed;
}

export function parseRegions(values: string[]): RegionCode[] {
  const codes = values.map((value) => value.trim().toLowerCase());
  const unknown = codes.filter((code) => !isRegionCode(code));
  if (unknown.length > 0) {
    throw new InvalidSearchError(
      `Unknown region${unknown.length > 1 ? 's' : ''}: ${unknown.join(', ')} (choose from ${REGION_CODES.join(', ')})`
    );
  }
  return codes.filter(isRegionCode);
}

function formatProduct(product: Product): string {
  return `  ${product.site.padEnd(10)} ${product.price.padStart(14)}  ${product.name}\n  ${''.padEnd(10)} ${product.url}`;
}

/**
 * Runs one search and exports the results. Returns the process exit code:
 * 0 when products were found (and exported), 1 otherwise.
 */
export async function runSearch(
  query: string,
  options: SearchCommandOptions,
  deps: SearchDependencies
): Promise<number> {
  const { config, scraper, exporter, logger, print } = deps;

  try {
    const regions = options.regions ? parseRegions(options.regions) : config.search.regions;
    const maxPerRegion = parseIntOption(options.maxProducts, 'max-products') ?? config.search.maxPerRegion;

    const outcome = await scraper.search({ query, regions, maxPerRegion });

    print('');
    for (const result of outcome.regions) {
      const label = siteLabel(result.region);
      if (result.status === 'failed') {
        print(`  ${label}: failed (${result.error ?? 'unknown error'})`);
      } else {
        print(`  ${label}: ${result.products.length} products (${result.candidates} listings on page)`);
      }
    }
    print('');

    if (outcome.status === 'empty') {
      logger.warn('No products found. Try a different search term.');
      return 1;
    }

    if (options.dryRun) {
      print(`Found ${outcome.products.length} products [dry run - nothing exported]:`);
      for (const product of outcome.products) {
        print(formatProduct(product));
      }
      return 0;
    }

    const file = await exporter.export(outcome.products, query, options.output);
    print(`Saved ${outcome.products.length} products to ${file}`);
    return 0;
  } catch (error) {
    if (error instanceof InvalidSearchError) {
      logger.error(`Invalid search: ${error.message}`);
    } else {
      logger.error(`Search failed: ${describeError(error)}`);
    }
    return 1;
  }
}

export const searchCommand = new Command('search')
  .description('Compare product prices from multiple eBay sites')
  .argument('<query>', 'Product name to search for')
  .option('-o, --output <file>', 'Output spreadsheet file name')
  .option('-m, --max-products <n>', 'Maximum number of listings to take per region')
  .option('-r, --regions <codes...>', `eBay regions to search (${REGION_CODES.join(', ')})`)
  .option('--dry-run', 'Print the products instead of writing a spreadsheet')
  .action(async (query: string, options: SearchCommandOptions) => {
    try {
      const config = loadConfig();
      const logger = createLogger(config.logLevel);
      const scraper = new EbayScraper({
        logger,
        timeoutMs: config.search.timeoutMs,
        stripQueryString: config.search.stripQueryString,
        insecureTls: config.search.insecureTls,
      });
      const exporter = new SpreadsheetExporter({
        filenamePrefix: config.export.filenamePrefix,
        outputDir: config.export.outputDir,
        logger,
      });

      const code = await runSearch(query, options, {
        config,
        scraper,
        exporter,
        logger,
        print: (line) => console.log(line),
      });
      if (code !== 0) process.exit(code);
    } catch (error) {
      console.error('Search failed:', describeError(error));
      process.exit(1);
    }
  });
