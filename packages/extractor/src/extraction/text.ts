import type { Cheerio, CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element } from 'domhandler';
import type { AttributeTarget } from '@autofields/shared';

/**
 * Injected between text nodes while traversing, so adjacent siblings
 * ("Henrique" + "Último acesso há 2 dias") never merge into one token.
 */
export const SEGMENT_SEPARATOR = '\u001F';

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template']);

/**
 * Collect the trimmed text nodes under `node`, joined by `separator`
 */
export function collectText(node: AnyNode, separator: string = SEGMENT_SEPARATOR): string {
  const parts: string[] = [];

  const walk = (current: AnyNode): void => {
    if (isText(current)) {
      const text = current.data.trim();
      if (text !== '') parts.push(text);
      return;
    }
    if (isTag(current) && SKIPPED_TAGS.has(current.name)) return;
    if (hasChildren(current)) {
      for (const child of current.children) walk(child);
    }
  };

  walk(node);
  return parts.join(separator);
}

/**
 * Text of the element's direct text children only
 */
export function ownText(element: Element): string {
  return element.children
    .filter(isText)
    .map(child => child.data.trim())
    .filter(text => text !== '')
    .join(' ');
}

/**
 * Full page text, used by regex strategies
 */
export function pageText($: CheerioAPI): string {
  const body = $('body').get(0);
  if (body) return collectText(body, ' ');
  const root = $.root().get(0);
  return root ? collectText(root, ' ') : '';
}

/**
 * Read the requested target from a single element
 */
export function readTarget($el: Cheerio<Element>, attribute: AttributeTarget = 'text'): string | null {
  const element = $el.get(0);
  if (!element) return null;

  if (attribute === 'text') {
    return collectText(element);
  }

  if (attribute === 'html') {
    return $el.html();
  }

  if (attribute === 'value') {
    return $el.attr('value') ?? null;
  }

  // attr:name format
  return $el.attr(attribute.slice(5)) ?? null;
}

/**
 * Narrow a candidate to the first match of `pattern` (first group when present).
 * Without a pattern the text is returned unchanged; no match drops the candidate.
 */
export function applyCapture(text: string, pattern: string | undefined): string | null {
  if (!pattern) return text;
  const match = text.match(new RegExp(pattern));
  if (!match) return null;
  return match[1] ?? match[0];
}
