import { load, type CheerioAPI } from 'cheerio';
import { readEmbeddedJson } from '../extraction/embedded-json';
import { fetchStatic } from '../fetcher/http';
import { getErrorMessage } from '@autofields/shared';
import { linksLogger } from '../utils/logger';
import { extractAdId } from './url';

const SITE_ORIGIN = 'https://www.olx.com.br';
const AD_PATH = /-\d{8,}$/;
const NEXT_PAGE_TEXT = /próxima página/i;

// Without a visible "next" link, a page this full is assumed not to be the last one
const FULL_PAGE_SIZE = 10;

/**
 * Loads a search page; null when it could not be loaded
 */
export type PageLoader = (url: string) => Promise<string | null>;

export interface CollectOptions {
  maxPages?: number;     // highest page number visited (default 100)
  delayMs?: number;      // pause between pages (default 1000)
  timeoutMs?: number;    // default loader only
  userAgent?: string;    // default loader only
  fetchPage?: PageLoader;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function adsFromNextData($: CheerioAPI): string[] {
  const data = readEmbeddedJson($, 'script#__NEXT_DATA__');
  const props = isRecord(data) ? data['props'] : undefined;
  const pageProps = isRecord(props) ? props['pageProps'] : undefined;
  const ads = isRecord(pageProps) ? pageProps['ads'] : undefined;
  if (!Array.isArray(ads)) return [];

  const links: string[] = [];
  for (const ad of ads) {
    const url = isRecord(ad) ? ad['url'] : undefined;
    if (typeof url === 'string' && url.includes('olx.com.br') && !links.includes(url)) {
      links.push(url);
    }
  }
  return links;
}

function adsFromAnchors($: CheerioAPI): string[] {
  const links: string[] = [];
  $('a[href]').each((_, element) => {
    const raw = $(element).attr('href') ?? '';
    const href = (raw.startsWith('/') ? `${SITE_ORIGIN}${raw}` : raw).split('?')[0] ?? '';
    if (AD_PATH.test(href) && (href.includes('autos-e-pecas') || href.includes('carros')) && !links.includes(href)) {
      links.push(href);
    }
  });
  return links;
}

/**
 * Ad URLs listed on a search results page, in page order
 */
export function extractAdLinks($: CheerioAPI): string[] {
  const fromJson = adsFromNextData($);
  if (fromJson.length > 0) return fromJson;
  linksLogger.debug('No ads in __NEXT_DATA__, reading anchors');
  return adsFromAnchors($);
}

export function hasNextPageLink($: CheerioAPI): boolean {
  return $('a')
    .toArray()
    .some(element => NEXT_PAGE_TEXT.test($(element).text()));
}

/**
 * Same search with the page number (`o` parameter) replaced
 */
export function nextPageUrl(url: string, page: number): string {
  const parsed = new URL(url);
  parsed.searchParams.set('o', String(page));
  return parsed.toString();
}

function startPage(url: string): number {
  const page = Number(new URL(url).searchParams.get('o'));
  return Number.isInteger(page) && page > 0 ? page : 1;
}

function staticLoader(timeout?: number, userAgent?: string): PageLoader {
  return async url => {
    const result = await fetchStatic({ url, timeout, userAgent });
    if (!result.success) {
      linksLogger.error(`Could not load ${url}: ${getErrorMessage(result.errorCode)} ${result.errorDetail ?? ''}`.trim());
      return null;
    }
    return result.html;
  };
}

// The same ad shows up under regional hosts and different slugs
function adKey(link: string): string {
  return extractAdId(link) ?? link;
}

/**
 * Walk the result pages of a search and collect every distinct ad URL.
 *
 * Stops at a page that cannot be loaded or adds no new ad, at a page that has no
 * "next" link and fewer than a full page of ads, or after `maxPages`.
 */
export async function collectAdLinks(startUrl: string, options: CollectOptions = {}): Promise<string[]> {
  const { maxPages = 100, delayMs = 1000 } = options;
  const fetchPage = options.fetchPage ?? staticLoader(options.timeoutMs, options.userAgent);
  const links: string[] = [];
  const seen = new Set<string>();
  let page = startPage(startUrl);
  let firstPage = true;

  while (page <= maxPages) {
    const url = firstPage ? startUrl : nextPageUrl(startUrl, page);
    linksLogger.info(`Collecting page ${page}: ${url}`);

    const html = await fetchPage(url);
    if (html === null) break;

    const $ = load(html);
    const pageLinks = extractAdLinks($);
    if (pageLinks.length === 0) {
      linksLogger.warn(`No ads on page ${page}, stopping`);
      break;
    }

    const fresh: string[] = [];
    for (const link of pageLinks) {
      const key = adKey(link);
      if (seen.has(key)) continue;
      seen.add(key);
      fresh.push(link);
    }
    if (fresh.length === 0) {
      linksLogger.warn(`Page ${page} repeats earlier ads, stopping`);
      break;
    }
    links.push(...fresh);
    linksLogger.info(`+${fresh.length} new links (total ${links.length})`);

    if (!hasNextPageLink($) && pageLinks.length < FULL_PAGE_SIZE) {
      linksLogger.info('Last page reached');
      break;
    }

    page++;
    firstPage = false;
    if (page <= maxPages && delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, delayMs));
    }
  }

  return links;
}
