import type { CheerioAPI, Cheerio } from 'cheerio';
import { isTag, type Element } from 'domhandler';
import type { AttributeTarget, Strategy } from '@autofields/shared';
import { applyCapture, collectText, ownText, readTarget } from './text';

type StrategyOf<K extends Strategy['kind']> = Extract<Strategy, { kind: K }>;

function select($: CheerioAPI, selector: string): Element[] {
  return $(selector).toArray().filter(isTag);
}

function readAll(
  $: CheerioAPI,
  elements: Element[],
  attribute: AttributeTarget | undefined,
  capture: string | undefined
): string[] {
  const values: string[] = [];
  for (const element of elements) {
    const raw = readTarget($(element), attribute);
    if (raw === null) continue;
    const value = applyCapture(raw, capture);
    if (value !== null) values.push(value);
  }
  return values;
}

/**
 * Every element matching a CSS selector, in document order
 */
export function locateWithCSS($: CheerioAPI, strategy: StrategyOf<'css'>): string[] {
  return readAll($, select($, strategy.selector), strategy.attribute, strategy.capture);
}

/**
 * Elements whose attribute contains a substring (`[attr*="..."]`)
 */
export function locateByAttribute($: CheerioAPI, strategy: StrategyOf<'attributeContains'>): string[] {
  const needle = strategy.substring.replace(/["\\]/g, '\\$&');
  const selector = `${strategy.tag ?? ''}[${strategy.attribute}*="${needle}"]`;
  return readAll($, select($, selector), strategy.read, strategy.capture);
}

/**
 * `children[n]` of every element matching the selector; negative indexes count from the end
 */
export function locateChildAt($: CheerioAPI, strategy: StrategyOf<'childAt'>): string[] {
  const children = select($, strategy.selector).flatMap(element => $(element).children().eq(strategy.index).toArray());
  return readAll($, children, strategy.attribute, strategy.capture);
}

/**
 * Elements filtered by the text they contain, then optionally widened to an
 * ancestor and narrowed to a descendant or a child position
 */
export function locateByContainedText($: CheerioAPI, strategy: StrategyOf<'containsText'>): string[] {
  const needle = strategy.text.toLowerCase();
  const deep = strategy.match === 'deep';

  const matches = select($, strategy.selector).filter(element => {
    const text = deep ? collectText(element, ' ') : ownText(element);
    return text.toLowerCase().includes(needle);
  });

  const targets: Element[] = [];
  for (const element of matches) {
    let node: Cheerio<Element> = $(element);
    for (let depth = 0; depth < (strategy.ancestorDepth ?? 0); depth++) {
      node = node.parent();
    }
    if (strategy.target) {
      node = node.find(strategy.target);
    }
    if (strategy.childIndex !== undefined) {
      node = node.children().eq(strategy.childIndex);
    }
    for (const target of node.toArray()) {
      if (!targets.includes(target)) targets.push(target);
    }
  }

  return readAll($, targets, 'text', strategy.capture);
}
