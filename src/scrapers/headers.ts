/**
 * Request headers sent with every search. eBay answers default HTTP client
 * signatures with a block page, so each request looks like a desktop browser.
 */

export type RequestHeaders = Record<string, string>;

export interface HeaderProvider {
  next(): RequestHeaders;
}

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2.1 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:122.0) Gecko/20100101 Firefox/122.0',
];

const BASE_HEADERS: RequestHeaders = {
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
  Connection: 'keep-alive',
  'Upgrade-Insecure-Requests': '1',
  'Cache-Control': 'max-age=0',
};

export function browserHeaders(userAgent: string): RequestHeaders {
  return { 'User-Agent': userAgent, ...BASE_HEADERS };
}

/** Picks a user agent uniformly at random for each request. */
export class RotatingHeaderProvider implements HeaderProvider {
  constructor(
    private readonly userAgents: readonly string[] = USER_AGENTS,
    private readonly random: () => number = Math.random
  ) {
    if (userAgents.length === 0) {
      throw new Error('RotatingHeaderProvider needs at least one user agent');
    }
  }

  next(): RequestHeaders {
    const index = Math.min(
      Math.floor(this.random() * this.userAgents.length),
      this.userAgents.length - 1
    );
    return browserHeaders(this.userAgents[index]);
  }
}

/** Same headers every time. */
export class StaticHeaderProvider implements HeaderProvider {
  private readonly headers: RequestHeaders;

  constructor(userAgent: string = USER_AGENTS[0]) {
    this.headers = browserHeaders(userAgent);
  }

  next(): RequestHeaders {
    return { ...this.headers };
  }
}
