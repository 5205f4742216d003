import type { FieldSpec, JsonPathSegment, Strategy } from '@autofields/shared';
import { classifiedAs } from '../extraction/disambiguate';
import { normalizeText } from '../normalization/text';
import { AD_ID_PATTERN } from './url';

/**
 * JSON documents the listing page embeds, newest layout first, each with the
 * path to the ad object inside it
 */
const AD_JSON_SOURCES = [
  { selector: '#initial-data', attribute: 'data-json', root: ['ad'] },
  { selector: 'script#__NEXT_DATA__', root: ['props', 'pageProps', 'ad'] },
] as const;

function fromAdJson(path: JsonPathSegment[], format?: 'brl', template?: string): Strategy[] {
  return AD_JSON_SOURCES.map((source): Strategy => ({
    kind: 'embeddedJson' as const,
    selector: source.selector,
    ...('attribute' in source ? { attribute: source.attribute } : {}),
    root: [...source.root],
    path,
    ...(format ? { format } : {}),
    ...(template ? { template } : {}),
  }));
}

function adProperty(name: string): JsonPathSegment[] {
  return ['properties', { where: 'name', equals: name }, 'value'];
}

// Label/value rows of the "Detalhes" grid
const DETAILS_LABELS = 'div.ad__sc-wuor06-0 span, div.hfcCRQ span';
const DETAILS_VALUE = 'a, span.olx-color-neutral-120';

function detailsRow(label: string): Strategy {
  return { kind: 'containsText', selector: DETAILS_LABELS, text: label, ancestorDepth: 1, target: DETAILS_VALUE };
}

// Brand, model and year chips under the title
const AD_TAGS = '[data-testid="ad-tags"] a';

const BRL_AMOUNT = 'R\\$\\s*[\\d.,]+';

const SELLER_CUTS = [/último\s*acesso/i, /conta\s*verificada/i, /na\s*olx\s*desde/i, /\s+-\s+/];

// "VW GOL 1.0 2019 - 1457220451 | OLX" style titles: ad id, site name and price suffixes
const TITLE_SUFFIX_CUTS = [/\s*-\s*\d+\s*\|/, /\s*\|\s*OLX/i, /\s*-\s*OLX/i, /\s*-?\s*R\$\s*[\d.,]+/];

// Model part of a title: everything before the year, ad id, site name or price
const TITLE_MODEL =
  '^(.+?)(?=\\s*-\\s*\\d+\\s*\\||\\s*\\|\\s*OLX|\\s*-\\s*OLX|\\s*-?\\s*R\\$\\s*[\\d.,]+|\\s*-\\s*\\d{4}|\\s+\\d{4}|$)';

const TRAILING_YEAR = /\s+\d{4}$/;

const MENU_WORDS = ['menu', 'buscar', 'chat', 'entrar'];

/**
 * A seller name survives cleanup, is 3-49 characters long and is not a navigation label
 */
export function plausibleSellerName(text: string): boolean {
  const name = normalizeText(text, { cutPatterns: SELLER_CUTS });
  if (name === null || name.length < 3 || name.length >= 50) return false;
  const lower = name.toLowerCase();
  return !MENU_WORDS.some(word => lower.includes(word));
}

function plausibleModel(text: string): boolean {
  return text.length > 3 && text.length < 100;
}

export const LISTING_FIELDS: readonly FieldSpec[] = [
  {
    name: 'ad_id',
    required: false,
    strategies: [
      ...fromAdJson(['listId']),
      ...fromAdJson(['adId']),
      { kind: 'css', selector: 'link[rel="canonical"]', attribute: 'attr:href', capture: AD_ID_PATTERN },
      { kind: 'css', selector: 'meta[property="og:url"]', attribute: 'attr:content', capture: AD_ID_PATTERN },
    ],
  },
  {
    name: 'seller_name',
    required: true,
    strategies: [
      { kind: 'css', selector: 'span.typo-body-large.ad__sc-ypp2u2-4.TTTuh' },
      { kind: 'css', selector: '.ad__sc-ypp2u2-12, div[data-testid="account-box"]' },
      ...fromAdJson(['user', 'name']),
      { kind: 'xpath', expression: "//div[@data-testid='account-box']//span" },
      {
        kind: 'regex',
        pattern: '([A-ZÁÉÍÓÚÂÊÔÇ][a-záéíóúâêôç]+(?:\\s+[A-ZÁÉÍÓÚÂÊÔÇ][a-záéíóúâêôç]+)?)\\s+(?:Na OLX desde|Último acesso)',
      },
      { kind: 'regex', pattern: 'Conta verificada\\s+([A-ZÁÉÍÓÚÂÊÔÇ][a-záéíóúâêôç]+(?:\\s+[A-ZÁÉÍÓÚÂÊÔÇ][a-záéíóúâêôç]+)?)' },
    ],
    disambiguator: plausibleSellerName,
    normalize: { cutPatterns: SELLER_CUTS },
  },
  {
    name: 'brand',
    required: false,
    strategies: [...fromAdJson(adProperty('vehicle_brand')), detailsRow('Marca'), { kind: 'css', selector: AD_TAGS }],
    disambiguator: classifiedAs('brand'),
  },
  {
    name: 'model',
    required: true,
    strategies: [
      detailsRow('Modelo'),
      ...fromAdJson(adProperty('vehicle_model')),
      { kind: 'css', selector: 'h1', capture: TITLE_MODEL },
      {
        kind: 'regex',
        pattern: 'Modelo\\s*:?\\s*(.+?)(?=\\s+\\d{4}|\\s*(?:Marca|Tipo|Ano|Potência|Cor|Combustível|$))',
        flags: 'i',
      },
    ],
    disambiguator: plausibleModel,
    normalize: { cutPatterns: [TRAILING_YEAR] },
  },
  {
    name: 'version',
    required: false,
    strategies: [...fromAdJson(['subject']), { kind: 'css', selector: 'h1' }],
    normalize: { cutPatterns: TITLE_SUFFIX_CUTS, segments: 'join' },
  },
  {
    name: 'year',
    required: false,
    strategies: [...fromAdJson(adProperty('regdate')), detailsRow('Ano'), { kind: 'css', selector: AD_TAGS }],
    disambiguator: classifiedAs('year'),
    numeric: true,
  },
  {
    name: 'price',
    required: true,
    strategies: [
      ...fromAdJson(['priceValue'], 'brl'),
      ...fromAdJson(['price'], 'brl'),
      {
        kind: 'css',
        selector: 'h2.olx-text.olx-text--title-large.olx-text--block.ad__sc-1leoitd-0.bJHaGt',
        capture: BRL_AMOUNT,
      },
      { kind: 'css', selector: 'h2.ad__sc-1leoitd-0, span.typo-title-large', capture: BRL_AMOUNT },
      { kind: 'css', selector: 'h2[data-ds-component="DS-Text"], span[class*="price"], h2[class*="price"]', capture: BRL_AMOUNT },
      { kind: 'regex', pattern: BRL_AMOUNT },
    ],
    normalize: { prefixTokens: ['R$'] },
    numeric: true,
  },
  {
    name: 'reference_price',
    required: false,
    strategies: [
      ...fromAdJson(['priceStats', 'fipePrice'], 'brl'),
      ...fromAdJson(['abuyFipePrice', 'fipePrice'], 'brl'),
      { kind: 'containsText', selector: '.LkJa2kno', text: 'FIPE', match: 'deep', childIndex: 0, capture: BRL_AMOUNT },
      { kind: 'containsText', selector: 'span, p', text: 'FIPE', ancestorDepth: 1, capture: BRL_AMOUNT },
    ],
    normalize: { prefixTokens: ['R$'] },
    numeric: true,
  },
  {
    name: 'average_price',
    required: false,
    strategies: [
      ...fromAdJson(['priceStats', 'averagePrice'], 'brl'),
      ...fromAdJson(['abuyPriceRef', 'price_p50'], 'brl'),
      ...fromAdJson(['abuyPriceRef', 'average_price'], 'brl'),
    ],
    normalize: { prefixTokens: ['R$'] },
    numeric: true,
  },
  {
    name: 'phone',
    required: false,
    strategies: [
      ...fromAdJson(['phone', 'phone']),
      { kind: 'css', selector: 'a[href^="tel:"]', attribute: 'attr:href' },
      { kind: 'regex', pattern: '\\(\\d{2}\\)\\s?9?\\d{4}-\\d{4}' },
    ],
    normalize: { prefixTokens: ['tel:'] },
  },
  {
    name: 'location',
    required: false,
    strategies: [
      { kind: 'containsText', selector: 'span, p', text: 'Localização', ancestorDepth: 1 },
      ...fromAdJson(['location'], undefined, '{municipality} - {uf}, {zipcode}'),
      ...fromAdJson(['location'], undefined, '{municipality} - {uf}'),
      ...fromAdJson(['location', 'municipality']),
    ],
    normalize: { prefixTokens: ['Localização'], segments: 'join' },
  },
  {
    name: 'neighbourhood',
    required: false,
    strategies: fromAdJson(['location', 'neighbourhood']),
  },
  {
    name: 'mileage',
    required: false,
    strategies: [...fromAdJson(adProperty('mileage')), detailsRow('Quilometragem')],
    normalize: { cutPatterns: [/\s*km\b/i] },
    numeric: true,
  },
];

/**
 * Element the dynamic backend waits for before snapshotting
 */
export const LISTING_READY_SELECTOR = 'h1';

/**
 * Clicked before snapshot so the phone number is rendered
 */
export const LISTING_REVEAL_TARGETS: readonly string[] = [
  'button[data-testid="show-phone"]',
  'button:has-text("Ver número")',
];
