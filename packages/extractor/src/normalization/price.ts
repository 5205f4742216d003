/**
 * Parses a Brazilian-formatted amount into a number.
 *
 * - "R$ 45.900" → 45900
 * - "1.299,50" → 1299.5
 * - "87.000 km" → 87000
 *
 * Returns null when anything other than digits and separators remains.
 */
export function parseBrlAmount(rawValue: string): number | null {
  if (!rawValue || typeof rawValue !== 'string') {
    return null;
  }

  // Step 1: Strip currency and unit tokens
  let processed = rawValue.replace(/R\$/gi, '').replace(/\bkm\b/gi, '');

  // Step 2: Drop all whitespace including NBSP
  processed = processed.replace(/\s+/g, '');

  // Step 3: "." groups thousands, "," is the decimal point
  processed = processed.replace(/\./g, '').replace(',', '.');

  if (!/^\d+(\.\d+)?$/.test(processed)) {
    return null;
  }

  const numericValue = parseFloat(processed);
  return isFinite(numericValue) ? numericValue : null;
}

/**
 * Formats a whole amount the way the listing pages print prices: 99900 → "R$ 99.900"
 */
export function formatBrl(value: number): string {
  const digits = String(Math.round(value)).replace(/\B(?=(\d{3})+(?!\d))/g, '.');
  return `R$ ${digits}`;
}
