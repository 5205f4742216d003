import { load } from 'cheerio';
import * as http from '../fetcher/http';
import { collectAdLinks, extractAdLinks, hasNextPageLink, nextPageUrl } from './links';

const SEARCH = 'https://www.olx.com.br/autos-e-pecas/carros-vans-e-utilitarios/estado-sp';

function adUrl(id: number): string {
  return `https://sp.olx.com.br/sao-paulo-e-regiao/autos-e-pecas/carros-vans-e-utilitarios/carro-${id}`;
}

function nextDataPage(ids: number[], next = false): string {
  const data = { props: { pageProps: { ads: ids.map(id => ({ subject: `Carro ${id}`, url: adUrl(id) })) } } };
  return `<html><body>
    <script id="__NEXT_DATA__" type="application/json">${JSON.stringify(data)}</script>
    ${next ? '<a class="olx-core-button" href="?o=2">Próxima página</a>' : ''}
  </body></html>`;
}

describe('extractAdLinks', () => {
  it('should read ad URLs from __NEXT_DATA__', () => {
    expect(extractAdLinks(load(nextDataPage([10000001, 10000002])))).toEqual([adUrl(10000001), adUrl(10000002)]);
  });

  it('should skip entries without a listing URL', () => {
    const data = { props: { pageProps: { ads: [{ url: adUrl(10000001) }, { advertisingId: 'banner' }, { url: 'https://ads.example.com/x' }] } } };
    const html = `<script id="__NEXT_DATA__">${JSON.stringify(data)}</script>`;

    expect(extractAdLinks(load(html))).toEqual([adUrl(10000001)]);
  });

  it('should fall back to anchors when the JSON is missing', () => {
    const html = `
      <a href="/autos-e-pecas/carros-vans-e-utilitarios/gol-1-0-1457220451?lis=listing_1">Gol</a>
      <a href="/autos-e-pecas/carros-vans-e-utilitarios/gol-1-0-1457220451">Gol again</a>
      <a href="https://sp.olx.com.br/autos-e-pecas/carros-vans-e-utilitarios/uno-1234567890">Uno</a>
      <a href="/imoveis/apartamento-1234567890">Apartamento</a>
      <a href="/autos-e-pecas/carros-vans-e-utilitarios">Todos</a>`;

    expect(extractAdLinks(load(html))).toEqual([
      'https://www.olx.com.br/autos-e-pecas/carros-vans-e-utilitarios/gol-1-0-1457220451',
      'https://sp.olx.com.br/autos-e-pecas/carros-vans-e-utilitarios/uno-1234567890',
    ]);
  });
});

describe('hasNextPageLink', () => {
  it('should detect the next page button', () => {
    expect(hasNextPageLink(load(nextDataPage([], true)))).toBe(true);
    expect(hasNextPageLink(load('<a>PRÓXIMA PÁGINA</a>'))).toBe(true);
    expect(hasNextPageLink(load('<a>Página anterior</a>'))).toBe(false);
  });
});

describe('nextPageUrl', () => {
  it('should set the page parameter and keep the filters', () => {
    expect(nextPageUrl(`${SEARCH}?me=100000`, 3)).toBe(`${SEARCH}?me=100000&o=3`);
    expect(nextPageUrl(`${SEARCH}?o=2&me=100000`, 4)).toBe(`${SEARCH}?o=4&me=100000`);
  });
});

describe('collectAdLinks', () => {
  it('should follow pages while a next link is present', async () => {
    const pages: Record<string, string> = {
      [SEARCH]: nextDataPage([10000001, 10000002], true),
      [`${SEARCH}?o=2`]: nextDataPage([10000002, 10000003], true),
      [`${SEARCH}?o=3`]: nextDataPage([10000004]),
    };
    const fetchPage = jest.fn(async (url: string) => pages[url] ?? null);

    const links = await collectAdLinks(SEARCH, { fetchPage, delayMs: 0 });

    expect(links).toEqual([adUrl(10000001), adUrl(10000002), adUrl(10000003), adUrl(10000004)]);
    expect(fetchPage).toHaveBeenCalledTimes(3);
  });

  it('should continue without a next link when the page is full', async () => {
    const full = Array.from({ length: 10 }, (_, index) => 20000000 + index);
    const fetchPage = jest
      .fn<Promise<string | null>, [string]>()
      .mockResolvedValueOnce(nextDataPage(full))
      .mockResolvedValueOnce(nextDataPage([30000000]));

    const links = await collectAdLinks(SEARCH, { fetchPage, delayMs: 0 });

    expect(links).toHaveLength(11);
    expect(fetchPage).toHaveBeenNthCalledWith(2, `${SEARCH}?o=2`);
  });

  it('should stop at maxPages', async () => {
    let id = 40000000;
    const fetchPage = jest.fn(async () => nextDataPage([id++], true));

    const links = await collectAdLinks(SEARCH, { fetchPage, maxPages: 2, delayMs: 0 });

    expect(links).toEqual([adUrl(40000000), adUrl(40000001)]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it('should resume from the page given in the start URL', async () => {
    const fetchPage = jest.fn(async () => nextDataPage([50000000], true));

    await collectAdLinks(`${SEARCH}?o=4`, { fetchPage, maxPages: 5, delayMs: 0 });

    expect(fetchPage).toHaveBeenCalledTimes(2);
    expect(fetchPage).toHaveBeenNthCalledWith(1, `${SEARCH}?o=4`);
  });

  it('should count an ad listed under another host or slug once', async () => {
    const moved = 'https://www.olx.com.br/autos-e-pecas/carros-vans-e-utilitarios/carro-usado-10000001';
    const data = { props: { pageProps: { ads: [{ url: adUrl(10000001) }, { url: moved }, { url: adUrl(10000002) }] } } };
    const fetchPage = jest.fn(async () => `<script id="__NEXT_DATA__">${JSON.stringify(data)}</script>`);

    const links = await collectAdLinks(SEARCH, { fetchPage, delayMs: 0 });

    expect(links).toEqual([adUrl(10000001), adUrl(10000002)]);
  });

  it('should load pages statically with the given timeout and user agent', async () => {
    const fetchStatic = jest.spyOn(http, 'fetchStatic').mockResolvedValue({
      success: true,
      url: SEARCH,
      finalUrl: SEARCH,
      httpStatus: 200,
      contentType: 'text/html',
      html: nextDataPage([60000000]),
      errorCode: null,
      errorDetail: null,
      timings: { total: 1 },
      headers: {},
    });

    try {
      const links = await collectAdLinks(SEARCH, { delayMs: 0, timeoutMs: 5000, userAgent: 'test-agent' });

      expect(links).toEqual([adUrl(60000000)]);
      expect(fetchStatic).toHaveBeenCalledWith({ url: SEARCH, timeout: 5000, userAgent: 'test-agent' });
    } finally {
      fetchStatic.mockRestore();
    }
  });

  it('should stop on a page that cannot be loaded or has no ads', async () => {
    const unavailable = jest.fn(async () => null);
    expect(await collectAdLinks(SEARCH, { fetchPage: unavailable, delayMs: 0 })).toEqual([]);

    const empty = jest.fn(async () => nextDataPage([], true));
    expect(await collectAdLinks(SEARCH, { fetchPage: empty, delayMs: 0 })).toEqual([]);
    expect(empty).toHaveBeenCalledTimes(1);
  });
});
