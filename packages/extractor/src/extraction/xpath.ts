import type { CheerioAPI } from 'cheerio';
import { DOMParser } from '@xmldom/xmldom';
import * as xpath from 'xpath';
import type { Strategy } from '@autofields/shared';
import { extractLogger } from '../utils/logger';

type XPathStrategy = Extract<Strategy, { kind: 'xpath' }>;

// Default namespaces would force every step of the expression to be prefixed
const DEFAULT_NAMESPACE = /\sxmlns="[^"]*"/g;

/**
 * Re-serialize the parsed page as XML so the XPath engine can walk it
 */
function toXmlDocument($: CheerioAPI): Document {
  const xml = $.xml().replace(DEFAULT_NAMESPACE, '');
  const log = (message: string): void => extractLogger.debug(`XPath document: ${message}`);
  return new DOMParser({ errorHandler: { warning: log, error: log, fatalError: log } })
    .parseFromString(xml, 'text/xml');
}

/**
 * Evaluate an XPath expression against the page.
 * Node results yield their text (attribute nodes their value); scalar results yield one candidate.
 */
export function locateWithXPath($: CheerioAPI, strategy: XPathStrategy): string[] {
  const result = xpath.select(strategy.expression, toXmlDocument($));

  if (xpath.isArrayOfNodes(result)) {
    return result.map(node => (xpath.isAttribute(node) ? node.value : node.textContent ?? ''));
  }

  if (typeof result === 'string' || typeof result === 'number') {
    return [String(result)];
  }

  if (xpath.isNodeLike(result)) {
    return [result.textContent ?? ''];
  }

  return [];
}
