export { extractFields, extractField } from './extract';
export { resolve } from './resolver';
export { evaluateStrategy, describeStrategy } from './strategies';
export { classifyVehicleToken, classifiedAs } from './disambiguate';
export type { VehicleToken } from './disambiguate';
export { readEmbeddedJson } from './embedded-json';
export { SEGMENT_SEPARATOR, collectText } from './text';
export type { ResolveOptions, ExtractOptions } from './types';
