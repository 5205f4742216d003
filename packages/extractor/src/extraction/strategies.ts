import type { CheerioAPI } from 'cheerio';
import type { Strategy } from '@autofields/shared';
import { locateByAttribute, locateByContainedText, locateChildAt, locateWithCSS } from './css';
import { locateWithRegex } from './regex';
import { locateWithXPath } from './xpath';
import { locateInEmbeddedJson } from './embedded-json';
import { extractLogger } from '../utils/logger';

/**
 * Run one locating strategy against the page.
 * Candidates come back in document order; an invalid selector, expression or
 * pattern yields no candidates instead of throwing.
 */
export function evaluateStrategy($: CheerioAPI, strategy: Strategy): string[] {
  try {
    return locate($, strategy);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    extractLogger.debug(`Strategy ${describeStrategy(strategy)} failed: ${message}`);
    return [];
  }
}

function locate($: CheerioAPI, strategy: Strategy): string[] {
  switch (strategy.kind) {
    case 'css':
      return locateWithCSS($, strategy);

    case 'attributeContains':
      return locateByAttribute($, strategy);

    case 'childAt':
      return locateChildAt($, strategy);

    case 'containsText':
      return locateByContainedText($, strategy);

    case 'regex':
      return locateWithRegex($, strategy);

    case 'xpath':
      return locateWithXPath($, strategy);

    case 'embeddedJson':
      return locateInEmbeddedJson($, strategy);
  }
}

/**
 * Short label for logs and reports
 */
export function describeStrategy(strategy: Strategy): string {
  switch (strategy.kind) {
    case 'css':
    case 'childAt':
    case 'containsText':
      return `${strategy.kind}(${strategy.selector})`;
    case 'attributeContains':
      return `${strategy.kind}(${strategy.attribute}*=${strategy.substring})`;
    case 'regex':
      return `regex(/${strategy.pattern}/)`;
    case 'xpath':
      return `xpath(${strategy.expression})`;
    case 'embeddedJson':
      return `embeddedJson(${strategy.selector})`;
  }
}
