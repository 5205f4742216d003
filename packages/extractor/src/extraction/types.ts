import type { AcquisitionBackend, Disambiguator } from '@autofields/shared';
import type { ExtractionEventSink } from '../events';

export interface ResolveOptions {
  disambiguator?: Disambiguator;
}

export interface ExtractOptions {
  events?: ExtractionEventSink;
  url?: string | null;
  backend?: AcquisitionBackend | null;
}
