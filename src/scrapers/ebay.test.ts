import { describe, it, expect } from 'vitest';
import { DEFAULT_MAX_RESPONSE_BYTES, EbayScraper, createHttpClient } from './ebay.js';
import { StaticHeaderProvider } from './headers.js';
import { InvalidSearchError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { card, resultsPage } from '../testing/html.js';
import { delay, fakeClient, hostOf, type FakeHandler } from '../testing/fake-http.js';
import { routeTo, startLocalServer } from '../testing/local-server.js';

function scraperFor(handler: FakeHandler): EbayScraper {
  return new EbayScraper({
    client: fakeClient(handler),
    headers: new StaticHeaderProvider(),
    logger: silentLogger,
  });
}

const usPage = resultsPage([
  card({ title: 'Vintage Camera Lens 50mm', price: '$45.00', href: 'https://www.ebay.com/itm/1001' }),
  card({ title: 'Canon FD 28mm Wide Lens', price: '$60.00', href: 'https://www.ebay.com/itm/1002' }),
]);

const ukPage = resultsPage([
  card({ title: 'Helios 44-2 58mm Lens', price: '£35.00', href: 'https://www.ebay.co.uk/itm/2001' }),
]);

describe('EbayScraper.search', () => {
  it('returns the healthy region products when another region fails', async () => {
    const scraper = scraperFor((config) =>
      hostOf(config) === 'www.ebay.com' ? { status: 200, body: usPage } : { status: 500, body: '' }
    );

    const outcome = await scraper.search({ query: 'camera lens', regions: ['us', 'uk'], maxPerRegion: 5 });

    expect(outcome.status).toBe('found');
    expect(outcome.products).toEqual([
      { name: 'Vintage Camera Lens 50mm', price: '$45.00', url: 'https://www.ebay.com/itm/1001', site: 'eBay (US)' },
      { name: 'Canon FD 28mm Wide Lens', price: '$60.00', url: 'https://www.ebay.com/itm/1002', site: 'eBay (US)' },
    ]);
    expect(outcome.regions.map((r) => [r.region, r.status])).toEqual([
      ['us', 'ok'],
      ['uk', 'failed'],
    ]);
  });

  it('concatenates regions in request order regardless of response timing', async () => {
    const scraper = scraperFor(async (config) => {
      if (hostOf(config) === 'www.ebay.co.uk') {
        await delay(30);
        return { status: 200, body: ukPage };
      }
      return { status: 200, body: usPage };
    });

    const outcome = await scraper.search({ query: 'lens', regions: ['uk', 'us'], maxPerRegion: 5 });

    expect(outcome.products.map((p) => p.site)).toEqual(['eBay (UK)', 'eBay (US)', 'eBay (US)']);
  });

  it('has every region request in flight at the same time', async () => {
    const regions = ['us', 'de', 'au'] as const;
    let inFlight = 0;
    let maxInFlight = 0;
    let release: () => void = () => {};
    const allStarted = new Promise<void>((resolve) => {
      release = resolve;
    });

    const scraper = scraperFor(async () => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      if (maxInFlight === regions.length) release();
      // A sequential implementation would sit here until the fallback fires
      await Promise.race([allStarted, delay(1_000)]);
      inFlight -= 1;
      return { status: 200, body: usPage };
    });

    const started = Date.now();
    const outcome = await scraper.search({ query: 'lens', regions: [...regions], maxPerRegion: 5 });

    expect(maxInFlight).toBe(3);
    expect(Date.now() - started).toBeLessThan(1_000);
    expect(outcome.products).toHaveLength(6);
  });

  it('returns an empty outcome when no region has products', async () => {
    const scraper = scraperFor((config) =>
      hostOf(config) === 'www.ebay.fr'
        ? new Error('getaddrinfo ENOTFOUND www.ebay.fr')
        : { status: 200, body: resultsPage([card({ sponsored: true })]) }
    );

    const outcome = await scraper.search({ query: 'lens', regions: ['us', 'fr'], maxPerRegion: 5 });

    expect(outcome).toEqual({
      status: 'empty',
      products: [],
      regions: [
        { region: 'us', status: 'empty', products: [], candidates: 1 },
        { region: 'fr', status: 'failed', products: [], candidates: 0, error: 'getaddrinfo ENOTFOUND www.ebay.fr' },
      ],
    });
  });

  it('requests each region once when codes repeat', async () => {
    const hosts: string[] = [];
    const scraper = scraperFor((config) => {
      hosts.push(hostOf(config));
      return { status: 200, body: usPage };
    });

    const outcome = await scraper.search({ query: 'lens', regions: ['us', 'uk', 'us'], maxPerRegion: 5 });

    expect([...hosts].sort()).toEqual(['www.ebay.co.uk', 'www.ebay.com']);
    expect(outcome.regions.map((r) => r.region)).toEqual(['us', 'uk']);
  });

  it('searches for the trimmed query', async () => {
    const urls: string[] = [];
    const scraper = scraperFor((config) => {
      urls.push(config.url ?? '');
      return { status: 200, body: usPage };
    });

    await scraper.search({ query: '  helios 44  ', regions: ['es'], maxPerRegion: 1 });

    expect(urls).toEqual(['https://www.ebay.es/sch/i.html?_nkw=helios+44&_ipg=100']);
  });

  it.each([
    { query: '   ', regions: ['us' as const], maxPerRegion: 5 },
    { query: 'lens', regions: [], maxPerRegion: 5 },
    { query: 'lens', regions: ['us' as const], maxPerRegion: 0 },
    { query: 'lens', regions: ['us' as const], maxPerRegion: 2.5 },
  ])('rejects an invalid request before any network activity: %j', async (request) => {
    let requests = 0;
    const scraper = scraperFor(() => {
      requests += 1;
      return { status: 200, body: usPage };
    });

    await expect(scraper.search(request)).rejects.toBeInstanceOf(InvalidSearchError);
    expect(requests).toBe(0);
  });

  it('gives identical results for identical pages', async () => {
    const scraper = scraperFor(() => ({ status: 200, body: usPage }));
    const request = { query: 'lens', regions: ['us' as const, 'it' as const], maxPerRegion: 5 };

    const first = await scraper.search(request);
    const second = await scraper.search(request);

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });
});

describe('createHttpClient', () => {
  it('caps response bodies at 5 MB by default', () => {
    expect(DEFAULT_MAX_RESPONSE_BYTES).toBe(5 * 1024 * 1024);
    expect(createHttpClient().defaults.maxContentLength).toBe(DEFAULT_MAX_RESPONSE_BYTES);
    expect(createHttpClient().defaults.maxRedirects).toBe(5);
  });

  it('fails only the region whose page is over the cap', async () => {
    const server = await startLocalServer((_req, res) => {
      res.writeHead(200, { 'Content-Type': 'text/html' });
      res.end(`<html><body>${'x'.repeat(4_096)}</body></html>`);
    });

    try {
      const scraper = new EbayScraper({
        client: routeTo(createHttpClient({ maxResponseBytes: 1_024 }), server.origin),
        headers: new StaticHeaderProvider(),
        logger: silentLogger,
      });

      const outcome = await scraper.search({ query: 'lens', regions: ['au'], maxPerRegion: 5 });

      expect(outcome.status).toBe('empty');
      expect(outcome.regions).toHaveLength(1);
      expect(outcome.regions[0]).toMatchObject({ region: 'au', status: 'failed', candidates: 0 });
      expect(outcome.regions[0].error).toMatch(/maxContentLength size of 1024 exceeded/);
    } finally {
      await server.close();
    }
  });
});
