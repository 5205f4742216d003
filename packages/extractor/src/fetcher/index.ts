// Fetcher exports
export { fetchStatic, classifyRequestError } from './http';
export { fetchDynamic, classifyError } from './headless';
export { acquirePage, planBackends } from './acquire';
export { getRandomUserAgent, USER_AGENTS, BROWSER_HEADERS } from './user-agents';
export type { FetchResult, FetchOptions } from './types';
export type { HeadlessFetchOptions } from './headless';
export type { AcquireOptions, AcquiredPage } from './acquire';
