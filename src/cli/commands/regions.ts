import { Command } from 'commander';
import { REGION_CODES, REGION_DOMAINS, buildSearchUrl } from '../../scrapers/regions.js';

export function formatRegionTable(): string[] {
  const lines = [`${'Code'.padEnd(6)}${'Domain'.padEnd(14)}Search URL`, '-'.repeat(72)];
  for (const code of REGION_CODES) {
    lines.push(`${code.padEnd(6)}${REGION_DOMAINS[code].padEnd(14)}${buildSearchUrl(code, '<query>')}`);
  }
  return lines;
}

export const regionsCommand = new Command('regions')
  .description('List the eBay regions that can be searched')
  .action(() => {
    console.log('');
    for (const line of formatRegionTable()) {
      console.log(line);
    }
    console.log('');
  });
