import type { CheerioAPI } from 'cheerio';
import type {
  AbsenceReason,
  ExtractionReport,
  ExtractionResult,
  FieldSpec,
} from '@autofields/shared';
import type { ExtractOptions } from './types';
import { resolve } from './resolver';
import { normalizeText } from '../normalization/text';
import { parseBrlAmount } from '../normalization/price';
import { loggerSink, type ExtractionEventSink } from '../events';

function absent(spec: FieldSpec, reason: AbsenceReason, detail?: string): ExtractionResult {
  return {
    status: spec.required ? 'missing' : 'not_available',
    field: spec.name,
    required: spec.required,
    value: null,
    strategyIndex: null,
    reason,
    ...(detail !== undefined ? { detail } : {}),
  };
}

/**
 * Resolve and normalize a single field.
 * Errors thrown while doing so become an EXTRACT_FIELD_ERROR result for this field only.
 */
export function extractField(
  $: CheerioAPI,
  spec: FieldSpec,
  events: ExtractionEventSink = loggerSink
): ExtractionResult {
  let result: ExtractionResult;

  try {
    const candidate = resolve($, spec.strategies, { disambiguator: spec.disambiguator });
    const value = candidate ? normalizeText(candidate.text, spec.normalize) : null;

    if (!candidate) {
      result = absent(spec, 'FIELD_ABSENT');
    } else if (value === null) {
      result = absent(spec, 'NORMALIZATION_EMPTY');
    } else {
      result = {
        status: 'resolved',
        field: spec.name,
        required: spec.required,
        value,
        strategyIndex: candidate.strategyIndex,
        strategyKind: candidate.strategyKind,
        ...(spec.numeric ? { amount: parseBrlAmount(value) } : {}),
      };
    }
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    events.emit({ type: 'field_error', field: spec.name, error: err });
    return absent(spec, 'EXTRACT_FIELD_ERROR', err.message);
  }

  if (result.status === 'resolved') {
    events.emit({
      type: 'field_resolved',
      field: result.field,
      strategyIndex: result.strategyIndex,
      strategyKind: result.strategyKind,
    });
  } else {
    events.emit({ type: 'field_absent', field: result.field, required: result.required, reason: result.reason });
  }

  return result;
}

/**
 * Extract every declared field from the page, in declaration order.
 * The document is only read; the returned report is frozen.
 */
export function extractFields(
  $: CheerioAPI,
  specs: readonly FieldSpec[],
  options: ExtractOptions = {}
): ExtractionReport {
  const events = options.events ?? loggerSink;
  const results = specs.map(spec => Object.freeze(extractField($, spec, events)));

  const required = results.filter(result => result.required);
  const missingRequired = required.filter(result => result.status !== 'resolved').map(result => result.field);
  const resolvedRequired = required.length - missingRequired.length;

  return Object.freeze({
    url: options.url ?? null,
    backend: options.backend ?? null,
    results: Object.freeze(results),
    resolvedCount: results.filter(result => result.status === 'resolved').length,
    total: results.length,
    missingRequired: Object.freeze(missingRequired),
    successRatio: required.length === 0 ? 1 : resolvedRequired / required.length,
    complete: missingRequired.length === 0,
  });
}
