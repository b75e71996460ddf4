export const MARKETPLACE_NAME = 'eBay';

export const REGION_CODES = ['us', 'uk', 'de', 'fr', 'it', 'es', 'au'] as const;

export type RegionCode = (typeof REGION_CODES)[number];

export const REGION_DOMAINS: Record<RegionCode, string> = {
  us: 'ebay.com',
  uk: 'ebay.co.uk',
  de: 'ebay.de',
  fr: 'ebay.fr',
  it: 'ebay.it',
  es: 'ebay.es',
  au: 'ebay.com.au',
};

// Items per results page; 100 keeps one search to a single request
export const RESULTS_PER_PAGE = 100;

export function isRegionCode(value: string): value is RegionCode {
  return (REGION_CODES as readonly string[]).includes(value);
}

export function regionOrigin(region: RegionCode): string {
  return `https://www.${REGION_DOMAINS[region]}`;
}

export function siteLabel(region: RegionCode): string {
  return `${MARKETPLACE_NAME} (${region.toUpperCase()})`;
}

/**
 * Search results URL for one region, e.g.
 * https://www.ebay.co.uk/sch/i.html?_nkw=vintage+camera&_ipg=100
 */
export function buildSearchUrl(region: RegionCode, query: string): string {
  const params = new URLSearchParams();
  params.set('_nkw', query);
  params.set('_ipg', RESULTS_PER_PAGE.toString());
  return `${regionOrigin(region)}/sch/i.html?${params.toString()}`;
}

/** Drops repeated codes, keeping the first occurrence's position. */
export function uniqueRegions(regions: readonly RegionCode[]): RegionCode[] {
  return [...new Set(regions)];
}
