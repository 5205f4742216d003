import type { ExtractionReport, ExtractionResult } from '@autofields/shared';

// Values stored without the currency symbol
const CURRENCY_FIELDS = new Set(['price', 'reference_price', 'average_price']);

export function displayValue(result: ExtractionResult): string {
  if (result.status !== 'resolved') {
    return result.status === 'missing' ? '(missing)' : '-';
  }
  return CURRENCY_FIELDS.has(result.field) ? `R$ ${result.value}` : result.value;
}

/**
 * One line per field, then a summary
 */
export function formatReport(report: ExtractionReport): string {
  const width = Math.max(...report.results.map(result => result.field.length), 5);
  const lines: string[] = [];

  if (report.url) lines.push(`URL:     ${report.url}`);
  if (report.backend) lines.push(`Backend: ${report.backend}`);
  if (lines.length > 0) lines.push('');

  for (const result of report.results) {
    lines.push(`${result.field.padEnd(width)}  ${displayValue(result)}`);
  }

  lines.push('');
  lines.push(
    `Resolved ${report.resolvedCount}/${report.total} fields, ${Math.round(report.successRatio * 100)}% of required`
  );
  if (report.missingRequired.length > 0) {
    lines.push(`Missing required: ${report.missingRequired.join(', ')}`);
  }

  return lines.join('\n');
}

export function formatLinks(links: readonly string[]): string {
  return [...links, '', `${links.length} link${links.length === 1 ? '' : 's'} collected`].join('\n');
}
