import type { CheerioAPI } from 'cheerio';
import type { JsonPathSegment, Strategy } from '@autofields/shared';
import { formatBrl, parseBrlAmount } from '../normalization/price';
import { extractLogger } from '../utils/logger';

type EmbeddedJsonStrategy = Extract<Strategy, { kind: 'embeddedJson' }>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function step(value: unknown, segment: JsonPathSegment): unknown {
  if (typeof segment === 'number') {
    return Array.isArray(value) ? value[segment] : undefined;
  }
  if (typeof segment === 'string') {
    return isRecord(value) ? value[segment] : undefined;
  }
  if (!Array.isArray(value)) return undefined;
  return value.find(item => isRecord(item) && String(item[segment.where]) === segment.equals);
}

function walk(value: unknown, path: readonly JsonPathSegment[]): unknown {
  let current = value;
  for (const segment of path) {
    if (current === undefined || current === null) return undefined;
    current = step(current, segment);
  }
  return current;
}

function fillTemplate(value: unknown, template: string): string | null {
  if (!isRecord(value)) return null;
  const fields = value;
  const missing: string[] = [];
  const text = template.replace(/\{(\w+)\}/g, (_, key: string) => {
    const part = fields[key];
    if (typeof part === 'string' || (typeof part === 'number' && isFinite(part))) return String(part);
    missing.push(key);
    return '';
  });
  return missing.length === 0 ? text : null;
}

function render(value: unknown, strategy: EmbeddedJsonStrategy): string | null {
  if (strategy.template) {
    return fillTemplate(value, strategy.template);
  }
  if (typeof value === 'number' && isFinite(value)) {
    return strategy.format === 'brl' ? formatBrl(value) : String(value);
  }
  if (typeof value === 'string') {
    // Strings carry the site's own formatting ("45.900", "R$ 18.500")
    const amount = strategy.format === 'brl' ? parseBrlAmount(value) : null;
    return amount === null ? value : formatBrl(amount);
  }
  return null;
}

/**
 * Read the JSON document embedded in the page (a `data-json` attribute or a
 * script body), or null when it is absent or malformed
 */
export function readEmbeddedJson($: CheerioAPI, selector: string, attribute?: string): unknown {
  const node = $(selector).first();
  if (node.length === 0) return null;

  const source = attribute ? node.attr(attribute) : node.text();
  if (!source || source.trim() === '') return null;

  try {
    return JSON.parse(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    extractLogger.debug(`Embedded JSON under "${selector}" is not valid: ${message}`);
    return null;
  }
}

/**
 * A value inside a JSON blob embedded in the page, located by `root` then `path`
 */
export function locateInEmbeddedJson($: CheerioAPI, strategy: EmbeddedJsonStrategy): string[] {
  const document = readEmbeddedJson($, strategy.selector, strategy.attribute);
  const value = walk(walk(document, strategy.root), strategy.path);
  const text = render(value, strategy);
  return text === null ? [] : [text];
}
