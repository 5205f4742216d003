import type { CheerioAPI } from 'cheerio';
import type { Strategy } from '@autofields/shared';
import { pageText } from './text';

type RegexStrategy = Extract<Strategy, { kind: 'regex' }>;

/**
 * Every match of a pattern over the visible page text.
 * Returns the requested group, else the first capturing group, else the full match.
 */
export function locateWithRegex($: CheerioAPI, strategy: RegexStrategy): string[] {
  const flags = strategy.flags ?? '';
  const regex = new RegExp(strategy.pattern, flags.includes('g') ? flags : `${flags}g`);
  const text = pageText($);

  const values: string[] = [];
  for (const match of text.matchAll(regex)) {
    const value = strategy.group !== undefined ? match[strategy.group] : match[1] ?? match[0];
    if (value !== undefined) values.push(value);
  }
  return values;
}
