import type { NormalizeOptions } from '@autofields/shared';
import { SEGMENT_SEPARATOR } from '../extraction/text';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function pickSegments(raw: string, mode: NormalizeOptions['segments']): string {
  const segments = raw.split(SEGMENT_SEPARATOR);
  if (mode === 'join') {
    return segments.map(segment => segment.trim()).filter(segment => segment !== '').join(' ');
  }
  return segments.find(segment => segment.trim() !== '') ?? '';
}

function cut(text: string, patterns: readonly RegExp[]): string {
  let result = text;
  for (const pattern of patterns) {
    const flags = pattern.flags.replace(/[gy]/g, '');
    const match = new RegExp(pattern.source, flags.includes('i') ? flags : `${flags}i`).exec(result);
    if (match) {
      result = result.slice(0, match.index);
    }
  }
  return result;
}

function firstLine(text: string): string {
  return text.split(/\r?\n/).find(line => line.trim() !== '') ?? '';
}

function stripPrefixes(text: string, tokens: readonly string[]): string {
  const patterns = tokens.filter(token => token !== '').map(token => new RegExp(`^${escapeRegExp(token)}`, 'i'));
  let result = text.trimStart();
  let stripped = true;
  while (stripped) {
    stripped = false;
    for (const pattern of patterns) {
      if (pattern.test(result)) {
        result = result.replace(pattern, '').trimStart();
        stripped = true;
      }
    }
  }
  return result;
}

function normalizeOnce(text: string, options: NormalizeOptions): string {
  let result = pickSegments(text, options.segments);
  result = cut(result, options.cutPatterns ?? []);
  result = firstLine(result);
  result = stripPrefixes(result, options.prefixTokens ?? []);
  return result.replace(/\s+/g, ' ').trim();
}

/**
 * Turns a located raw text into the reported value, or null when nothing is left.
 *
 * Steps, in order: keep the first non-blank traversal segment, cut at the first
 * matching pattern, keep the first non-blank line, strip prefix tokens, collapse
 * whitespace. A shortened value can expose a new cut match ("GOL 2019 2020" with a
 * trailing-year cut), so the steps repeat until the value stops changing; applying
 * the normalizer twice therefore gives the same result as applying it once.
 */
export function normalizeText(raw: string, options: NormalizeOptions = {}): string | null {
  // Every pass shortens the text or only turns whitespace into single spaces, so this ends
  let text = raw;
  for (;;) {
    const next = normalizeOnce(text, options);
    if (next === text || next === '') {
      return next === '' ? null : next;
    }
    text = next;
  }
}
