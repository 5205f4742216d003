import type { CheerioAPI } from 'cheerio';
import type { Candidate, Strategy } from '@autofields/shared';
import type { ResolveOptions } from './types';
import { describeStrategy, evaluateStrategy } from './strategies';
import { extractLogger } from '../utils/logger';

/**
 * Try each strategy in declaration order and return the first plausible candidate.
 *
 * A candidate is plausible when its trimmed text is non-empty and passes the
 * disambiguator. Later strategies are not evaluated once one succeeds.
 */
export function resolve(
  $: CheerioAPI,
  strategies: readonly Strategy[],
  options: ResolveOptions = {}
): Candidate | null {
  for (const [strategyIndex, strategy] of strategies.entries()) {
    const texts = evaluateStrategy($, strategy);

    for (const [position, text] of texts.entries()) {
      const trimmed = text.trim();
      if (trimmed === '') continue;
      if (options.disambiguator && !options.disambiguator(trimmed)) continue;

      return { text, strategyIndex, strategyKind: strategy.kind, position };
    }

    if (texts.length > 0) {
      extractLogger.debug(`${describeStrategy(strategy)} matched ${texts.length} node(s), none plausible`);
    }
  }

  return null;
}
