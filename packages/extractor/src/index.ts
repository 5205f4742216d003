// Listing field extractor
export * from './extraction';
export * from './fetcher';
export * from './listing';
export { normalizeText } from './normalization/text';
export { parseBrlAmount, formatBrl } from './normalization/price';
export { runExtraction } from './pipeline';
export type { RunOptions } from './pipeline';
export { AcquisitionError } from './errors';
export type { BackendAttempt } from './errors';
export { createLoggerSink, loggerSink } from './events';
export type { ExtractionEvent, ExtractionEventSink } from './events';
export { loadConfig, validateEnv, envSchema } from './config/env';
export type { EnvConfig, ExtractorConfig } from './config/env';
export { createLogger, setLogLevel, ExtractorLogger } from './utils/logger';
export type { LogLevel } from './utils/logger';
