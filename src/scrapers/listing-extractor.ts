import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { Product } from './base.js';
import { regionOrigin, siteLabel, type RegionCode } from './regions.js';
import { describeError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

export const SELECTORS = {
  wrapper: 'div.s-item__wrapper',
  title: 'div.s-item__title span',
  price: '.s-item__price',
  link: 'a.s-item__link',
} as const;

// Answer blocks ("Shop by category", sponsored carousels) share the wrapper markup
const SPONSORED_CLASS = 'srp-river-answer';
const NEW_LISTING_MARKER = 'New Listing';
const PLACEHOLDER_TITLE = 'shop on ebay';
const MIN_TITLE_LENGTH = 6;

export type RejectionReason =
  | 'sponsored'
  | 'missing-title'
  | 'new-listing-marker'
  | 'placeholder-ad'
  | 'short-title'
  | 'missing-price'
  | 'price-range'
  | 'missing-link'
  | 'malformed';

export type ListingExtraction =
  | { kind: 'accepted'; product: Product }
  | { kind: 'rejected'; reason: RejectionReason };

export interface ExtractOptions {
  stripQueryString?: boolean;
  logger?: Logger;
}

function reject(reason: RejectionReason): ListingExtraction {
  return { kind: 'rejected', reason };
}

function resolveListingUrl(href: string, region: RegionCode, stripQueryString: boolean): string | null {
  let url: URL;
  try {
    url = new URL(href, regionOrigin(region));
  } catch {
    return null;
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') return null;
  if (stripQueryString) {
    url.search = '';
    url.hash = '';
  }
  return url.toString();
}

function applyRules(
  fragment: Cheerio<Element>,
  region: RegionCode,
  stripQueryString: boolean
): ListingExtraction {
  if (fragment.hasClass(SPONSORED_CLASS)) return reject('sponsored');

  const titleElement = fragment.find(SELECTORS.title).first();
  if (titleElement.length === 0) return reject('missing-title');
  const titleText = titleElement.text();
  if (titleText.includes(NEW_LISTING_MARKER)) return reject('new-listing-marker');

  const name = titleText.trim();
  if (name.toLowerCase() === PLACEHOLDER_TITLE) return reject('placeholder-ad');
  if (name.length < MIN_TITLE_LENGTH) return reject('short-title');

  const priceElement = fragment.find(SELECTORS.price).first();
  if (priceElement.length === 0) return reject('missing-price');
  const priceText = priceElement.text();
  // "$10.00 to $20.00": only single prices are kept
  if (priceText.toLowerCase().includes('to')) return reject('price-range');

  const href = fragment.find(SELECTORS.link).first().attr('href')?.trim();
  if (!href) return reject('missing-link');
  const url = resolveListingUrl(href, region, stripQueryString);
  if (!url) return reject('missing-link');

  const product: Product = Object.freeze({
    name,
    price: priceText.trim(),
    url,
    site: siteLabel(region),
  });
  return { kind: 'accepted', product };
}

/**
 * Turn one `div.s-item__wrapper` fragment into a product, or say why it was
 * skipped. Never throws: a fragment that breaks the parser is rejected as
 * `malformed` and the rest of the page is unaffected.
 */
export function extractListing(
  fragment: Cheerio<Element>,
  region: RegionCode,
  options: ExtractOptions = {}
): ListingExtraction {
  const { stripQueryString = true, logger = silentLogger } = options;
  try {
    return applyRules(fragment, region, stripQueryString);
  } catch (error) {
    logger.debug(`Error extracting listing on eBay ${region}: ${describeError(error)}`);
    return reject('malformed');
  }
}
